// Sever CIR Lowering - Expression handlers

import { exhaustive } from "../errors.js";
import type {
	ArrayExpr,
	CallExpr,
	EnumConstructorExpr,
	Expression,
	FieldExpr,
	IndexExpr,
	Literal,
	OpExpr,
	OpKind,
} from "../sirs/types.js";
import {
	emit,
	freshTemp,
	lookupVariable,
	type LoweringSession,
	unsupported,
} from "./session.js";
import {
	boolConst,
	CirOps,
	type CirOp,
	type CirTemporary,
	type CirValue,
	floatConst,
	functionRef,
	intConst,
	nullConst,
	primitiveType,
	ptrType,
	stringConst,
} from "./types.js";

//==============================================================================
// Operator Mapping
//==============================================================================

/** Source operators with a direct CIR opcode. `pow` and the bit operators have none. */
const OP_MAP: Partial<Record<OpKind, CirOp>> = {
	add: CirOps.Add,
	sub: CirOps.Sub,
	mul: CirOps.Mul,
	div: CirOps.Div,
	mod: CirOps.Mod,
	eq: CirOps.Eq,
	ne: CirOps.Ne,
	lt: CirOps.Lt,
	le: CirOps.Le,
	gt: CirOps.Gt,
	ge: CirOps.Ge,
	and: CirOps.And,
	or: CirOps.Or,
	not: CirOps.Not,
};

export function mapOperator(op: OpKind): CirOp | undefined {
	return OP_MAP[op];
}

//==============================================================================
// Literals
//==============================================================================

/**
 * Integer literals are always i32 and floats f64, whatever the annotation.
 */
export function lowerLiteral(lit: Literal): CirValue {
	switch (lit.kind) {
	case "integer":
		return intConst(lit.value, primitiveType("i32"));
	case "float":
		return floatConst(lit.value, primitiveType("f64"));
	case "string":
		return stringConst(lit.value);
	case "boolean":
		return boolConst(lit.value);
	case "null":
		return nullConst();
	default:
		return exhaustive(lit);
	}
}

//==============================================================================
// Expression Handlers
//==============================================================================

function lowerOperation(s: LoweringSession, expr: OpExpr): CirValue {
	const op = mapOperator(expr.op);
	if (op === undefined) {
		return unsupported(s, "operation '" + expr.op + "'");
	}
	const operands = expr.args.map((arg) => lowerExpression(s, arg));
	const result = freshTemp(s, primitiveType("i32"));
	emit(s, op, operands, result);
	return result;
}

function lowerCall(s: LoweringSession, expr: CallExpr): CirValue {
	const operands: CirValue[] = [functionRef(expr.callee)];
	for (const arg of expr.args) {
		operands.push(lowerExpression(s, arg));
	}
	const result = freshTemp(s, primitiveType("i32"));
	emit(s, CirOps.Call, operands, result);
	return result;
}

/**
 * Emit the alloca for an aggregate literal. The element type is not
 * threaded through; every aggregate is a pointer to i32.
 */
function allocAggregate(s: LoweringSession): CirTemporary {
	const type = ptrType(s.arena.box(primitiveType("i32")));
	const aggregate = freshTemp(s, type);
	emit(s, CirOps.Alloca, [], aggregate);
	return aggregate;
}

function lowerArray(s: LoweringSession, expr: ArrayExpr): CirValue {
	const aggregate = allocAggregate(s);
	expr.elements.forEach((element, i) => {
		const value = lowerExpression(s, element);
		emit(s, CirOps.Store, [aggregate, intConst(i), value]);
	});
	return aggregate;
}

/** struct, hashmap and set literals: one unindexed store per element. */
function lowerUnindexedAggregate(
	s: LoweringSession,
	elements: Iterable<Expression>,
): CirValue {
	const aggregate = allocAggregate(s);
	for (const element of elements) {
		const value = lowerExpression(s, element);
		emit(s, CirOps.Store, [aggregate, value]);
	}
	return aggregate;
}

/**
 * Tag and payload are not encoded; the associated value is lowered only for
 * its side effects and the result is an opaque temporary.
 */
function lowerEnumConstructor(s: LoweringSession, expr: EnumConstructorExpr): CirValue {
	if (expr.value) {
		lowerExpression(s, expr.value);
	}
	return freshTemp(s, primitiveType("i32"));
}

function lowerIndex(s: LoweringSession, expr: IndexExpr): CirValue {
	const base = lowerExpression(s, expr.array);
	const index = lowerExpression(s, expr.index);
	const result = freshTemp(s, primitiveType("i32"));
	emit(s, CirOps.Load, [base, index], result);
	return result;
}

function lowerField(s: LoweringSession, expr: FieldExpr): CirValue {
	const object = lowerExpression(s, expr.object);
	const result = freshTemp(s, primitiveType("i32"));
	emit(s, CirOps.Load, [object], result);
	return result;
}

//==============================================================================
// Dispatch
//==============================================================================

export function lowerExpression(s: LoweringSession, expr: Expression): CirValue {
	switch (expr.kind) {
	case "literal":
		return lowerLiteral(expr.value);
	case "variable":
		return lookupVariable(s, expr.name);
	case "op":
		return lowerOperation(s, expr);
	case "call":
		return lowerCall(s, expr);
	case "array":
		return lowerArray(s, expr);
	case "struct":
		return lowerUnindexedAggregate(s, expr.fields.values());
	case "hashmap":
		return lowerUnindexedAggregate(s, expr.entries.values());
	case "set":
		return lowerUnindexedAggregate(s, expr.elements);
	case "tuple":
	case "record":
		// Placeholder: no allocation, elements are not lowered
		return freshTemp(s, primitiveType("i32"));
	case "enumConstructor":
		return lowerEnumConstructor(s, expr);
	case "index":
		return lowerIndex(s, expr);
	case "field":
		return lowerField(s, expr);
	case "await":
		// No async frame; the awaited value is used directly
		return lowerExpression(s, expr.value);
	case "sample":
	case "infer":
	case "cast":
		return unsupported(s, "expression '" + expr.kind + "'");
	default:
		return exhaustive(expr);
	}
}

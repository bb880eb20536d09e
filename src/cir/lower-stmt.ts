// Sever CIR Lowering - Statement handlers

import { exhaustive } from "../errors.js";
import type {
	AssignStmt,
	IfStmt,
	LValue,
	Statement,
	TryStmt,
} from "../sirs/types.js";
import { lowerExpression } from "./lower-expr.js";
import { lowerMatch } from "./lower-match.js";
import {
	emit,
	lookupVariable,
	type LoweringSession,
	unsupported,
} from "./session.js";
import { CirOps, type CirValue, nullConst } from "./types.js";

//==============================================================================
// Assignment Targets
//==============================================================================

/**
 * Only bare variables are assignable; index and field targets are rejected.
 */
export function lowerLValue(s: LoweringSession, target: LValue): CirValue {
	switch (target.kind) {
	case "variable":
		return lookupVariable(s, target.name);
	case "index":
	case "field":
		return unsupported(s, "lvalue '" + target.kind + "'");
	default:
		return exhaustive(target);
	}
}

//==============================================================================
// Statement Handlers
//==============================================================================

function lowerAssign(s: LoweringSession, stmt: AssignStmt): void {
	const value = lowerExpression(s, stmt.value);
	const target = lowerLValue(s, stmt.target);
	emit(s, CirOps.Store, [target, value]);
}

/**
 * The condition is lowered for its side effects and the then-branch goes
 * straight into the current block; no branch is created and the else-branch
 * is dropped with a warning.
 */
function lowerIf(s: LoweringSession, stmt: IfStmt): void {
	lowerExpression(s, stmt.condition);
	lowerStatements(s, stmt.then);
	if (stmt.else && stmt.else.length > 0) {
		s.reporter.reportWarning(
			null,
			"else branch not lowered to CIR; then branch runs unconditionally",
		);
	}
}

/**
 * Only the protected body is lowered; catch clauses and finally are dropped
 * with a warning.
 */
function lowerTry(s: LoweringSession, stmt: TryStmt): void {
	lowerStatements(s, stmt.body);
	if (stmt.catchClauses.length > 0 || stmt.finallyBody) {
		s.reporter.reportWarning(
			null,
			"catch/finally not lowered to CIR; only the try body is emitted",
		);
	}
}

export function lowerStatement(s: LoweringSession, stmt: Statement): void {
	switch (stmt.kind) {
	case "let":
		// A let-bound name aliases the value directly: no slot, no store
		s.env.set(stmt.name, lowerExpression(s, stmt.value));
		return;
	case "assign":
		lowerAssign(s, stmt);
		return;
	case "return":
		emit(s, CirOps.Ret, [lowerExpression(s, stmt.value)]);
		return;
	case "throw":
		// Errors are not typed yet: a throw returns null
		lowerExpression(s, stmt.value);
		emit(s, CirOps.Ret, [nullConst()]);
		return;
	case "expression":
		lowerExpression(s, stmt.value);
		return;
	case "if":
		lowerIf(s, stmt);
		return;
	case "try":
		lowerTry(s, stmt);
		return;
	case "match":
		lowerMatch(s, stmt, lowerStatements);
		return;
	case "while":
	case "for":
	case "break":
	case "continue":
	case "observe":
	case "probAssert":
		return unsupported(s, "statement '" + stmt.kind + "'");
	default:
		exhaustive(stmt);
	}
}

export function lowerStatements(s: LoweringSession, body: Statement[]): void {
	for (const stmt of body) {
		lowerStatement(s, stmt);
	}
}

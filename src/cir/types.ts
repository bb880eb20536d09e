// Sever CIR Type Definitions
// Core Intermediate Representation: types, values, opcodes, instructions
// and the block/function/module containers that own them.

//==============================================================================
// Type Domain
//==============================================================================

export type CirPrimitiveKind =
	| "void" | "i1"
	| "i8" | "i16" | "i32" | "i64"
	| "u8" | "u16" | "u32" | "u64"
	| "f32" | "f64";

export interface CirPrimitiveType { kind: CirPrimitiveKind }
export interface CirPtrType { kind: "ptr"; pointee: CirType }
export interface CirArrayType { kind: "array"; element: CirType; size: number }
export interface CirFuncType { kind: "func"; params: CirType[]; returns: CirType }
export interface CirRecordType { kind: "record"; fields: Map<string, CirType> }

export type CirType =
	| CirPrimitiveType
	| CirPtrType
	| CirArrayType
	| CirFuncType
	| CirRecordType;

export function primitiveType(kind: CirPrimitiveKind): CirPrimitiveType {
	return { kind };
}

export function ptrType(pointee: CirType): CirPtrType {
	return { kind: "ptr", pointee };
}

export function arrayType(element: CirType, size: number): CirArrayType {
	return { kind: "array", element, size };
}

export function funcType(params: CirType[], returns: CirType): CirFuncType {
	return { kind: "func", params, returns };
}

export function recordType(fields: Map<string, CirType>): CirRecordType {
	return { kind: "record", fields };
}

//==============================================================================
// Value Domain
//==============================================================================

export interface CirVoidConst { kind: "void" }
export interface CirBoolConst { kind: "bool"; value: boolean }
export interface CirIntConst { kind: "int"; value: number; type: CirType }
export interface CirFloatConst { kind: "float"; value: number; type: CirType }
export interface CirStringConst { kind: "string"; value: string }
export interface CirNullConst { kind: "null" }
export interface CirVariable { kind: "variable"; name: string; type: CirType }
export interface CirTemporary { kind: "temporary"; id: number; type: CirType }
export interface CirFunctionRef { kind: "functionRef"; name: string }
export interface CirGlobalRef { kind: "globalRef"; name: string }

export type CirValue =
	| CirVoidConst
	| CirBoolConst
	| CirIntConst
	| CirFloatConst
	| CirStringConst
	| CirNullConst
	| CirVariable
	| CirTemporary
	| CirFunctionRef
	| CirGlobalRef;

export function voidConst(): CirVoidConst {
	return { kind: "void" };
}

export function boolConst(value: boolean): CirBoolConst {
	return { kind: "bool", value };
}

export function intConst(value: number, type: CirType = primitiveType("i32")): CirIntConst {
	return { kind: "int", value, type };
}

export function floatConst(value: number, type: CirType = primitiveType("f64")): CirFloatConst {
	return { kind: "float", value, type };
}

export function stringConst(value: string): CirStringConst {
	return { kind: "string", value };
}

export function nullConst(): CirNullConst {
	return { kind: "null" };
}

export function variable(name: string, type: CirType): CirVariable {
	return { kind: "variable", name, type };
}

export function temporary(id: number, type: CirType): CirTemporary {
	return { kind: "temporary", id, type };
}

export function functionRef(name: string): CirFunctionRef {
	return { kind: "functionRef", name };
}

export function globalRef(name: string): CirGlobalRef {
	return { kind: "globalRef", name };
}

//==============================================================================
// Opcodes
//==============================================================================

export const CirOps = {
	// Arithmetic
	Add: "add",
	Sub: "sub",
	Mul: "mul",
	Div: "div",
	Mod: "mod",

	// Comparison
	Eq: "eq",
	Ne: "ne",
	Lt: "lt",
	Le: "le",
	Gt: "gt",
	Ge: "ge",

	// Logical
	And: "and",
	Or: "or",
	Not: "not",

	// Bitwise
	BitAnd: "bitAnd",
	BitOr: "bitOr",
	BitXor: "bitXor",
	BitNot: "bitNot",
	Shl: "shl",
	Shr: "shr",

	// Memory
	Load: "load",
	Store: "store",
	Alloca: "alloca",

	// Conversion
	Bitcast: "bitcast",
	Trunc: "trunc",
	Extend: "extend",
	IntToFloat: "intToFloat",
	FloatToInt: "floatToInt",

	// Control flow
	Branch: "branch",
	CondBranch: "condBranch",
	Call: "call",
	Ret: "ret",

	// Special
	Phi: "phi",
	Undef: "undef",
} as const;

export type CirOp = (typeof CirOps)[keyof typeof CirOps];

//==============================================================================
// Instructions and Containers
//==============================================================================

export interface CirInstruction {
	id: number;
	op: CirOp;
	operands: CirValue[];
	resultType: CirType | null;
	resultName: string | null;
}

export interface CirBasicBlock {
	label: string;
	instructions: CirInstruction[];
	predecessors: Set<string>;
	successors: Set<string>;
}

export interface CirParam {
	name: string;
	type: CirType;
}

export interface CirFunction {
	name: string;
	params: CirParam[];
	returnType: CirType;
	blocks: CirBasicBlock[];
	isExternal: boolean;
}

export interface CirModule {
	name: string;
	functions: Map<string, CirFunction>;
	globals: Map<string, CirValue>;
	types: Map<string, CirType>;
}

export function createInstruction(
	id: number,
	op: CirOp,
	operands: CirValue[] = [],
): CirInstruction {
	return { id, op, operands, resultType: null, resultName: null };
}

export function createBlock(label: string): CirBasicBlock {
	return {
		label,
		instructions: [],
		predecessors: new Set(),
		successors: new Set(),
	};
}

export function createFunction(name: string): CirFunction {
	return {
		name,
		params: [],
		returnType: primitiveType("void"),
		blocks: [],
		isExternal: false,
	};
}

export function createModule(name: string): CirModule {
	return {
		name,
		functions: new Map(),
		globals: new Map(),
		types: new Map(),
	};
}

//==============================================================================
// Type Guards and Utilities
//==============================================================================

export function isTemporary(value: CirValue): value is CirTemporary {
	return value.kind === "temporary";
}

export function isConstant(value: CirValue): boolean {
	switch (value.kind) {
	case "void":
	case "bool":
	case "int":
	case "float":
	case "string":
	case "null":
		return true;
	default:
		return false;
	}
}

/**
 * Record a control-flow edge on both endpoints.
 */
export function addEdge(from: CirBasicBlock, to: CirBasicBlock): void {
	from.successors.add(to.label);
	to.predecessors.add(from.label);
}

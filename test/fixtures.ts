// Sever CIR - Shared test builders

import type {
	Expression,
	OpKind,
	Pattern,
	SirsType,
	Statement,
} from "../src/sirs/types.js";
import { createSession, type LoweringSession } from "../src/cir/session.js";
import {
	type CirBasicBlock,
	type CirFunction,
	createBlock,
	createFunction,
} from "../src/cir/types.js";
import { ErrorReporter } from "../src/diagnostics.js";

//==============================================================================
// SIRS Builders
//==============================================================================

export const i32: SirsType = { kind: "i32" };

export function int(value: number): Expression {
	return { kind: "literal", value: { kind: "integer", value } };
}

export function str(value: string): Expression {
	return { kind: "literal", value: { kind: "string", value } };
}

export function ref(name: string): Expression {
	return { kind: "variable", name };
}

export function op(kind: OpKind, ...args: Expression[]): Expression {
	return { kind: "op", op: kind, args };
}

export function call(callee: string, ...args: Expression[]): Expression {
	return { kind: "call", callee, args };
}

export function ret(value: Expression): Statement {
	return { kind: "return", value };
}

export function letStmt(name: string, value: Expression): Statement {
	return { kind: "let", name, mutable: false, value };
}

export function litPattern(value: number): Pattern {
	return { kind: "literal", value: { kind: "integer", value } };
}

//==============================================================================
// Lowering Fixtures
//==============================================================================

export interface OpenFunction {
	s: LoweringSession;
	fn: CirFunction;
	entry: CirBasicBlock;
	reporter: ErrorReporter;
}

/**
 * A session positioned inside the entry block of a function named "f".
 */
export function openFunction(): OpenFunction {
	const reporter = new ErrorReporter();
	const s = createSession("test", reporter);
	const fn = createFunction("f");
	const entry = createBlock("f_entry");
	fn.blocks.push(entry);
	s.module.functions.set("f", fn);
	s.currentFunction = fn;
	s.currentBlock = entry;
	return { s, fn, entry, reporter };
}

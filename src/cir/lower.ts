// Sever SIRS to CIR Lowering
// Converts a type-checked SIRS program into a CIR module

import { ErrorReporter } from "../diagnostics.js";
import { CirError } from "../errors.js";
import type { Program, SirsFunction } from "../sirs/types.js";
import { lowerStatements } from "./lower-stmt.js";
import { lowerType } from "./lower-types.js";
import {
	createSession,
	disposeSession,
	type LoweringSession,
} from "./session.js";
import {
	type CirModule,
	createBlock,
	createFunction,
	variable,
} from "./types.js";

//==============================================================================
// Main Lowering Function
//==============================================================================

/**
 * Lower a SIRS program to a CIR module.
 *
 * Two phases:
 * - signatures: every function gets its CIR parameter and return types and
 *   is registered in the module, bodies untouched
 * - bodies: every function body is lowered into its registered CirFunction
 *
 * Every signature exists before the first body is lowered, so a body may
 * call any function in the program, itself included.
 *
 * Fails fast with a CirError; the partially built module is not returned.
 * Details of each failure are also sent to `reporter`.
 */
export function lowerProgram(
	program: Program,
	moduleName: string,
	reporter: ErrorReporter = new ErrorReporter(),
): CirModule {
	const s = createSession(moduleName, reporter);
	try {
		for (const [name, fn] of program.functions) {
			lowerFunctionSignature(s, name, fn);
		}
		for (const [name, fn] of program.functions) {
			lowerFunctionBody(s, name, fn);
		}
		return s.module;
	} catch (err) {
		// Stack exhaustion on deeply nested input
		if (err instanceof RangeError) {
			const oom = CirError.outOfMemory(err.message);
			reporter.reportError(null, oom.message, oom.code);
			throw oom;
		}
		throw err;
	} finally {
		disposeSession(s);
	}
}

//==============================================================================
// Function Lowering
//==============================================================================

export function lowerFunctionSignature(
	s: LoweringSession,
	name: string,
	fn: SirsFunction,
): void {
	const cirFn = createFunction(name);
	for (const param of fn.params) {
		cirFn.params.push({ name: param.name, type: lowerType(s, param.type) });
	}
	cirFn.returnType = lowerType(s, fn.returnType);
	s.module.functions.set(name, cirFn);
}

/**
 * Lower one body into the function registered by the signature phase.
 * The environment starts with only the parameters bound.
 */
export function lowerFunctionBody(
	s: LoweringSession,
	name: string,
	fn: SirsFunction,
): void {
	const cirFn = s.module.functions.get(name);
	if (!cirFn) {
		const err = CirError.undefinedFunction(name);
		s.reporter.reportError(null, err.message, err.code);
		throw err;
	}
	s.currentFunction = cirFn;

	s.env.clear();
	for (const param of cirFn.params) {
		s.env.set(param.name, variable(param.name, param.type));
	}

	const entry = createBlock(name + "_entry");
	cirFn.blocks.push(entry);
	s.currentBlock = entry;

	lowerStatements(s, fn.body);

	s.currentFunction = null;
	s.currentBlock = null;
}

// Sever CIR Lowering - Session state and shared emit helpers

import { ErrorReporter } from "../diagnostics.js";
import { CirError, ErrorCodes } from "../errors.js";
import { TypeArena } from "./type-arena.js";
import {
	createInstruction,
	createModule,
	type CirBasicBlock,
	type CirFunction,
	type CirInstruction,
	type CirModule,
	type CirOp,
	type CirTemporary,
	type CirType,
	type CirValue,
	temporary,
} from "./types.js";

//==============================================================================
// Lowering Session
//==============================================================================

/**
 * Working state of one lowering run over one program. Counters are never
 * reset, so temporary and instruction ids stay unique across functions.
 */
export interface LoweringSession {
	module: CirModule;
	reporter: ErrorReporter;
	arena: TypeArena;
	nextTempId: number;
	nextInstructionId: number;
	nextBlockId: number;
	currentFunction: CirFunction | null;
	currentBlock: CirBasicBlock | null;
	/** Source-level bindings visible in the function body being lowered. */
	env: Map<string, CirValue>;
}

export function createSession(
	moduleName: string,
	reporter: ErrorReporter = new ErrorReporter(),
): LoweringSession {
	return {
		module: createModule(moduleName),
		reporter,
		arena: new TypeArena(),
		nextTempId: 0,
		nextInstructionId: 0,
		nextBlockId: 0,
		currentFunction: null,
		currentBlock: null,
		env: new Map(),
	};
}

/**
 * Drop session-owned state. The module stays valid for the caller.
 */
export function disposeSession(s: LoweringSession): void {
	s.env.clear();
	s.arena.release();
	s.currentFunction = null;
	s.currentBlock = null;
}

//==============================================================================
// Identity
//==============================================================================

export function freshTemp(s: LoweringSession, type: CirType): CirTemporary {
	const temp = temporary(s.nextTempId, type);
	s.nextTempId++;
	return temp;
}

export function freshBlockId(s: LoweringSession): number {
	const id = s.nextBlockId;
	s.nextBlockId++;
	return id;
}

/** Printed name of a temporary, also used as an instruction's resultName. */
export function tempName(temp: CirTemporary): string {
	return "%" + String(temp.id);
}

//==============================================================================
// Emission
//==============================================================================

export function requireBlock(s: LoweringSession): CirBasicBlock {
	if (!s.currentBlock) {
		throw new CirError(ErrorCodes.UndefinedFunction, "Instruction emitted outside a function body");
	}
	return s.currentBlock;
}

/**
 * Append an instruction to the current block. The id is taken at append
 * time, so ids increase in emission order.
 */
export function emit(
	s: LoweringSession,
	op: CirOp,
	operands: CirValue[],
	result?: CirTemporary,
): CirInstruction {
	const block = requireBlock(s);
	const inst = createInstruction(s.nextInstructionId, op, operands);
	s.nextInstructionId++;
	if (result) {
		inst.resultType = result.type;
		inst.resultName = tempName(result);
	}
	block.instructions.push(inst);
	return inst;
}

//==============================================================================
// Failure Helpers
//==============================================================================

/**
 * Report and throw an UnsupportedOperation for a construct.
 */
export function unsupported(s: LoweringSession, construct: string): never {
	const err = CirError.unsupported(construct);
	s.reporter.reportError(null, err.message, err.code);
	throw err;
}

export function lookupVariable(s: LoweringSession, name: string): CirValue {
	const value = s.env.get(name);
	if (value === undefined) {
		const err = CirError.undefinedVariable(name);
		s.reporter.reportError(null, err.message, err.code);
		throw err;
	}
	return value;
}

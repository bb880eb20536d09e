// Sever CIR - SIRS to Core Intermediate Representation lowering
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Expression, Literal, LValue, MatchCase, OpKind, Parameter, Pattern,
	Program, SirsFunction, SirsType, Statement,
} from "./sirs/types.js";

export type {
	CirBasicBlock, CirFunction, CirInstruction, CirModule, CirOp, CirParam,
	CirPrimitiveKind, CirTemporary, CirType, CirValue,
} from "./cir/types.js";

export type { ErrorCode, LoweringErrorCode, ValidationError, ValidationResult } from "./errors.js";

export type { Diagnostic, DiagnosticLevel, SourceLocation } from "./diagnostics.js";

//==============================================================================
// Constructors
//==============================================================================

export { createProgram, sirsFunction } from "./sirs/types.js";

export {
	arrayType, funcType, primitiveType, ptrType, recordType,
	boolConst, floatConst, functionRef, globalRef, intConst, nullConst,
	stringConst, temporary, variable, voidConst,
	CirOps, addEdge, createBlock, createFunction, createInstruction, createModule,
	isConstant, isTemporary,
} from "./cir/types.js";

//==============================================================================
// Errors and Diagnostics
//==============================================================================

export { CirError, ErrorCodes, invalidResult, isLoweringError, validResult } from "./errors.js";

export { ErrorReporter, formatDiagnostic } from "./diagnostics.js";

//==============================================================================
// Reading SIRS
//==============================================================================

export { decodeSirsText, parseSirs, parseSirsText, validateSirs } from "./sirs/parser.js";

export { SirsDocumentSchema } from "./sirs/schemas.js";

//==============================================================================
// Lowering
//==============================================================================

export { lowerProgram } from "./cir/lower.js";

export { lowerType } from "./cir/lower-types.js";

export { createSession, disposeSession, type LoweringSession } from "./cir/session.js";

export { TypeArena, type TypeHandle } from "./cir/type-arena.js";

//==============================================================================
// Driver and Output
//==============================================================================

export {
	checkSirs, compileSirs,
	type CheckResult, type CompileOptions, type CompileResult,
} from "./driver.js";

export {
	cirModuleToJson, printCir, printCirType, printCirValue, printInstruction,
	type JsonValue,
} from "./cir/printer.js";

//==============================================================================
// CLI Utilities
//==============================================================================

export {
	defaultModuleName,
	parseArgs,
	type Options as CLIOptions,
} from "./cli-utils.js";

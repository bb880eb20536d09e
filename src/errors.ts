// Sever CIR Error Types
// Error domain for SIRS document reading and CIR lowering

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Lowering errors
	UnsupportedOperation: "UnsupportedOperation",
	InvalidType: "InvalidType",
	UndefinedVariable: "UndefinedVariable",
	UndefinedFunction: "UndefinedFunction",
	OutOfMemory: "OutOfMemory",

	// Document errors
	ParseError: "ParseError",
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Codes the lowering pass can fail with. */
export type LoweringErrorCode = Extract<
	ErrorCode,
	"UnsupportedOperation" | "InvalidType" | "UndefinedVariable" | "UndefinedFunction" | "OutOfMemory"
>;

//==============================================================================
// CIR Error Class
//==============================================================================

export class CirError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "CirError";
		this.code = code;
	}

	/**
	 * Create an UnsupportedOperation error
	 */
	static unsupported(construct: string): CirError {
		return new CirError(
			ErrorCodes.UnsupportedOperation,
			"Unsupported " + construct + " in CIR lowering",
		);
	}

	/**
	 * Create an InvalidType error
	 */
	static invalidType(kind: string): CirError {
		return new CirError(
			ErrorCodes.InvalidType,
			"Unsupported type in CIR lowering: " + kind,
		);
	}

	/**
	 * Create an UndefinedVariable error
	 */
	static undefinedVariable(name: string): CirError {
		return new CirError(
			ErrorCodes.UndefinedVariable,
			"Undefined variable '" + name + "' in CIR lowering",
		);
	}

	/**
	 * Create an UndefinedFunction error
	 */
	static undefinedFunction(name: string): CirError {
		return new CirError(
			ErrorCodes.UndefinedFunction,
			"Function '" + name + "' has no lowered signature",
		);
	}

	static outOfMemory(detail: string): CirError {
		return new CirError(ErrorCodes.OutOfMemory, "Out of memory: " + detail);
	}

	static parse(message: string): CirError {
		return new CirError(ErrorCodes.ParseError, "Parse error: " + message);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(path: string, message: string): CirError {
		return new CirError(
			ErrorCodes.ValidationError,
			"Validation error at " + path + ": " + message,
		);
	}
}

/**
 * Narrow an unknown thrown value to a lowering failure.
 */
export function isLoweringError(
	err: unknown,
): err is CirError & { code: LoweringErrorCode } {
	if (!(err instanceof CirError)) return false;
	return err.code !== ErrorCodes.ParseError && err.code !== ErrorCodes.ValidationError;
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T | undefined;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (value.kind) {
 *   case "int": return ...;
 *   case "float": return ...;
 *   default:
 *     exhaustive(value); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}

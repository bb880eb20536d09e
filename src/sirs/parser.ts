// Sever SIRS Reader
// Two-phase validation: Zod safeParse for structure, then semantic checks.

import { isInteger, isSafeNumber, LosslessNumber, parse } from "lossless-json";
import type { z } from "zod/v4";
import {
	CirError,
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "../errors.js";
import { SirsDocumentSchema } from "./schemas.js";
import type { Program } from "./types.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Semantic Checks
//==============================================================================

function checkProgram(program: Program): ValidationError[] {
	const errors: ValidationError[] = [];
	if (!program.functions.has(program.entry)) {
		errors.push({
			path: "program.entry",
			message: "Entry function '" + program.entry + "' is not defined",
		});
	}
	return errors;
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Validate a decoded SIRS document and build its AST.
 */
export function validateSirs(raw: unknown): ValidationResult<Program> {
	const parsed = SirsDocumentSchema.safeParse(raw);
	if (!parsed.success) {
		return invalidResult(zodToValidationErrors(parsed.error));
	}
	const errors = checkProgram(parsed.data);
	if (errors.length > 0) {
		return invalidResult(errors);
	}
	return validResult(parsed.data);
}

/**
 * Like validateSirs, but throws a ValidationError for the first issue.
 */
export function parseSirs(raw: unknown): Program {
	const result = validateSirs(raw);
	if (result.valid && result.value) {
		return result.value;
	}
	const first = result.errors[0];
	throw first
		? CirError.validation(first.path, first.message)
		: CirError.validation("$", "Invalid SIRS document");
}

/**
 * Safe integers decode to numbers. Fractions, exponents and integers beyond
 * 2^53 stay LosslessNumber so literals keep the form they were written in.
 */
function parseSirsNumber(value: string): number | LosslessNumber {
	return isInteger(value) && isSafeNumber(value)
		? Number(value)
		: new LosslessNumber(value);
}

/**
 * Decode JSON text; malformed JSON is a ParseError.
 */
export function decodeSirsText(text: string): unknown {
	try {
		return parse(text, null, parseSirsNumber);
	} catch (err) {
		if (err instanceof SyntaxError) {
			throw CirError.parse(err.message);
		}
		throw err;
	}
}

export function parseSirsText(text: string): Program {
	return parseSirs(decodeSirsText(text));
}

// Sever Compile Driver
// Text in, CIR module out: read -> validate -> lower, one reporter throughout.

import { ErrorReporter } from "./diagnostics.js";
import { CirError, ErrorCodes, type ValidationResult } from "./errors.js";
import { lowerProgram } from "./cir/lower.js";
import type { CirModule } from "./cir/types.js";
import { validateSirs, decodeSirsText } from "./sirs/parser.js";
import type { Program } from "./sirs/types.js";

export interface CompileOptions {
	moduleName: string;
	/** Source file name used in diagnostic locations. */
	file?: string | undefined;
	/** Log each phase with a [cir] prefix. */
	verbose?: boolean | undefined;
	reporter?: ErrorReporter | undefined;
}

export type CheckResult =
	| { ok: true; program: Program; diagnostics: ErrorReporter }
	| { ok: false; error: CirError; diagnostics: ErrorReporter };

export type CompileResult =
	| { ok: true; module: CirModule; program: Program; diagnostics: ErrorReporter }
	| { ok: false; error: CirError; diagnostics: ErrorReporter };

function log(options: CompileOptions, message: string): void {
	if (options.verbose) {
		console.log("[cir] " + message);
	}
}

/**
 * Read and validate a SIRS document without lowering it.
 */
export function checkSirs(text: string, options: CompileOptions): CheckResult {
	const diagnostics = options.reporter ?? new ErrorReporter();
	diagnostics.setCurrentFile(options.file ?? null);

	let raw: unknown;
	try {
		log(options, "parsing " + (options.file ?? "<input>"));
		raw = decodeSirsText(text);
	} catch (err) {
		return fail(diagnostics, err);
	}

	log(options, "validating");
	let result: ValidationResult<Program>;
	try {
		result = validateSirs(raw);
	} catch (err) {
		return fail(diagnostics, err);
	}
	if (!result.valid || !result.value) {
		for (const issue of result.errors) {
			diagnostics.reportErrorWithHint(null, issue.message, "at " + issue.path);
		}
		const first = result.errors[0];
		const error = first
			? CirError.validation(first.path, first.message)
			: CirError.validation("$", "Invalid SIRS document");
		return { ok: false, error, diagnostics };
	}
	return { ok: true, program: result.value, diagnostics };
}

/**
 * Read, validate and lower a SIRS document. Failures are returned, never
 * thrown; every failure also leaves at least one error in `diagnostics`.
 */
export function compileSirs(text: string, options: CompileOptions): CompileResult {
	const checked = checkSirs(text, options);
	if (!checked.ok) return checked;
	const { program, diagnostics } = checked;

	try {
		log(options, "lowering " + String(program.functions.size) + " function(s) into module " + options.moduleName);
		const module = lowerProgram(program, options.moduleName, diagnostics);
		log(options, "done");
		return { ok: true, module, program, diagnostics };
	} catch (err) {
		return fail(diagnostics, err);
	}
}

function fail(
	diagnostics: ErrorReporter,
	err: unknown,
): { ok: false; error: CirError; diagnostics: ErrorReporter } {
	// Stack exhaustion while decoding or validating deeply nested input
	if (err instanceof RangeError) {
		return fail(diagnostics, CirError.outOfMemory(err.message));
	}
	if (err instanceof CirError) {
		// Most lowering errors were reported where they were raised
		if (err.code === ErrorCodes.ParseError || !diagnostics.hasErrors()) {
			diagnostics.reportError(null, err.message, err.code);
		}
		return { ok: false, error: err, diagnostics };
	}
	throw err;
}

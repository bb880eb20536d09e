#!/usr/bin/env node
// Sever CIR command line: lower a SIRS document and print the CIR module.

import { readFile, writeFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { defaultModuleName, parseArgs, USAGE } from "./cli-utils.js";
import { cirModuleToJson, printCir } from "./cir/printer.js";
import { formatDiagnostic } from "./diagnostics.js";
import { checkSirs, compileSirs, type CheckResult, type CompileResult } from "./driver.js";

export const ExitCodes = {
	Ok: 0,
	CompileFailure: 1,
	Usage: 2,
} as const;

/** Where the CLI writes; defaults to the console. */
export interface CliIO {
	out: (text: string) => void;
	err: (text: string) => void;
}

const consoleIO: CliIO = {
	out: (text) => { console.log(text); },
	err: (text) => { console.error(text); },
};

/**
 * Run the CLI with the given arguments and return the exit code.
 */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
	const { path, options, errors } = parseArgs(args);
	if (options.help) {
		io.out(USAGE);
		return ExitCodes.Ok;
	}
	for (const message of errors) {
		io.err("error: " + message);
	}
	if (errors.length > 0 || path === null) {
		if (path === null) io.err("error: no input file provided");
		io.err(USAGE);
		return ExitCodes.Usage;
	}

	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (err) {
		io.err("error: cannot read " + path + ": " + (err instanceof Error ? err.message : String(err)));
		return ExitCodes.Usage;
	}

	const compileOptions = {
		moduleName: options.moduleName ?? defaultModuleName(path),
		file: path,
		verbose: options.verbose,
	};
	let result: CheckResult | CompileResult;
	if (options.validate) {
		result = checkSirs(text, compileOptions);
	} else {
		result = compileSirs(text, compileOptions);
	}
	for (const d of result.diagnostics.getDiagnostics()) {
		io.err(formatDiagnostic(d));
	}
	if (!result.ok) {
		return ExitCodes.CompileFailure;
	}
	if (!("module" in result)) {
		io.out(path + ": ok");
		return ExitCodes.Ok;
	}

	const rendered = options.emit === "json"
		? JSON.stringify(cirModuleToJson(result.module), null, "\t") + "\n"
		: printCir(result.module);
	if (options.output) {
		await writeFile(options.output, rendered, "utf-8");
		if (options.verbose) console.log("[cir] wrote " + options.output);
	} else {
		io.out(rendered.trimEnd());
	}
	return ExitCodes.Ok;
}

function isEntryPoint(): boolean {
	const script = process.argv[1];
	if (script === undefined) return false;
	return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
	process.exitCode = await runCli(process.argv.slice(2));
}

/**
 * Sever CIR CLI Utilities
 *
 * Argument parsing and file naming helpers, kept apart from cli.ts so they
 * can be tested without spawning a process.
 */

import { basename } from "node:path";

export type EmitFormat = "text" | "json";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	validate: boolean;
	help: boolean;
	emit: EmitFormat;
	moduleName?: string | undefined;
	output?: string | undefined;
}

export interface ParsedArgs {
	path: string | null;
	options: Options;
	/** Usage problems, such as an unknown flag or a missing option value. */
	errors: string[];
}

export const USAGE = `Usage: sever-cir <file.sirs.json> [options]
       sever-cir validate <file.sirs.json>
       sever-cir help

Options:
  --emit <text|json>     Output format (default: text)
  --module-name <name>   CIR module name (default: file name without extension)
  -o, --output <path>    Write the module to a file instead of stdout
  --validate             Validate the document only, do not lower it
  -v, --verbose          Log each compiler phase
  -h, --help             Show this help`;

/**
 * Module name for a source path: the file name without `.sirs.json` or `.json`.
 *
 * Examples:
 *   "examples/fib.sirs.json" → "fib"
 *   "main.json" → "main"
 */
export function defaultModuleName(path: string): string {
	const file = basename(path);
	for (const suffix of [".sirs.json", ".json"]) {
		if (file.endsWith(suffix) && file.length > suffix.length) {
			return file.slice(0, -suffix.length);
		}
	}
	return file;
}

function normalizeArgs(args: string[]): string[] {
	const subcommands: Record<string, string> = {
		validate: "--validate",
		help: "--help",
	};
	return args.map((arg) => subcommands[arg] ?? arg);
}

function consumeNextArg(normalized: string[], i: number): string | undefined {
	const nextArg = normalized[i + 1];
	if (nextArg !== undefined && !nextArg.startsWith("-")) return nextArg;
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--validate": options.validate = true; return true;
	case "--help": case "-h": options.help = true; return true;
	default: return false;
	}
}

const VALUE_OPTIONS = new Set(["--emit", "--module-name", "--output", "-o"]);

function processValueOption(parsed: ParsedArgs, arg: string, value: string): void {
	const { options } = parsed;
	switch (arg) {
	case "--emit":
		if (value === "text" || value === "json") options.emit = value;
		else parsed.errors.push("Unknown emit format '" + value + "' (expected text or json)");
		return;
	case "--module-name":
		options.moduleName = value;
		return;
	default:
		options.output = value;
	}
}

/**
 * Parse command-line arguments
 *
 * Supports:
 *   - Positional path argument (the last one wins)
 *   - Flags: --verbose/-v, --help/-h, --validate
 *   - Options with values: --emit, --module-name, --output/-o
 *   - Subcommand style: validate, help
 */
export function parseArgs(args: string[]): ParsedArgs {
	const normalized = normalizeArgs(args);
	const parsed: ParsedArgs = {
		path: null,
		options: { verbose: false, validate: false, help: false, emit: "text" },
		errors: [],
	};

	for (let i = 0; i < normalized.length; i++) {
		const arg = normalized[i];
		if (arg === undefined) break;
		if (processFlag(parsed.options, arg)) continue;
		if (VALUE_OPTIONS.has(arg)) {
			const value = consumeNextArg(normalized, i);
			if (value === undefined) {
				parsed.errors.push("Missing value for " + arg);
			} else {
				processValueOption(parsed, arg, value);
				i++;
			}
			continue;
		}
		if (arg.startsWith("-")) {
			parsed.errors.push("Unknown option " + arg);
			continue;
		}
		parsed.path = arg;
	}

	return parsed;
}

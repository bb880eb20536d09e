// Sever Diagnostics
// Collects compiler messages; reporting never stops a pass by itself.

//==============================================================================
// Types
//==============================================================================

export interface SourceLocation {
	file: string;
	line: number;
	column: number;
}

export type DiagnosticLevel = "error" | "warning" | "info";

export interface Diagnostic {
	level: DiagnosticLevel;
	location: SourceLocation | null;
	message: string;
	hint: string | null;
	code: string;
}

//==============================================================================
// Error Reporter
//==============================================================================

export class ErrorReporter {
	private readonly diagnostics: Diagnostic[] = [];
	private currentFile: string | null = null;

	/**
	 * Locations reported as null are attributed to this file.
	 */
	setCurrentFile(file: string | null): void {
		this.currentFile = file;
	}

	reportError(location: SourceLocation | null, message: string, code = ""): void {
		this.push({ level: "error", location, message, hint: null, code });
	}

	reportErrorWithHint(
		location: SourceLocation | null,
		message: string,
		hint: string,
	): void {
		this.push({ level: "error", location, message, hint, code: "" });
	}

	reportWarning(location: SourceLocation | null, message: string): void {
		this.push({ level: "warning", location, message, hint: null, code: "" });
	}

	reportInfo(location: SourceLocation | null, message: string): void {
		this.push({ level: "info", location, message, hint: null, code: "" });
	}

	hasErrors(): boolean {
		return this.diagnostics.some((d) => d.level === "error");
	}

	errorCount(): number {
		return this.diagnostics.filter((d) => d.level === "error").length;
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics;
	}

	clear(): void {
		this.diagnostics.length = 0;
	}

	/**
	 * Print every collected diagnostic. Errors go to stderr via console.error,
	 * warnings and info via console.warn.
	 */
	printAll(): void {
		for (const d of this.diagnostics) {
			if (d.level === "error") {
				console.error(formatDiagnostic(d));
			} else {
				console.warn(formatDiagnostic(d));
			}
		}
	}

	private push(d: Diagnostic): void {
		if (d.location === null && this.currentFile !== null) {
			d.location = { file: this.currentFile, line: 0, column: 0 };
		}
		this.diagnostics.push(d);
	}
}

//==============================================================================
// Formatting
//==============================================================================

function formatLocation(loc: SourceLocation): string {
	if (loc.line === 0) return loc.file;
	return loc.file + ":" + String(loc.line) + ":" + String(loc.column);
}

/**
 * Render a diagnostic as `file:line:col: level[code]: message`, with the hint
 * (if any) on a second line.
 */
export function formatDiagnostic(d: Diagnostic): string {
	const prefix = d.location ? formatLocation(d.location) + ": " : "";
	const code = d.code ? "[" + d.code + "]" : "";
	const head = prefix + d.level + code + ": " + d.message;
	return d.hint ? head + "\n  hint: " + d.hint : head;
}

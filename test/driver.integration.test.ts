// SPDX-License-Identifier: MIT
// Sever Compile Driver - Integration Tests

import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { ErrorReporter } from "../src/diagnostics.js";
import { checkSirs, compileSirs } from "../src/driver.js";

//==============================================================================
// Test Fixtures
//==============================================================================

function source(body: unknown[], entry = "main"): string {
	return JSON.stringify({
		program: {
			entry,
			functions: { main: { args: [{ name: "x", type: "i32" }], return: "i32", body } },
		},
	});
}

const returnsX = source([{ return: { var: "x" } }]);

/** Raw document text for `main` returning the given expression text. */
function returning(expression: string): string {
	return "{\"program\": {\"entry\": \"main\", \"functions\": {\"main\": "
		+ "{\"args\": [], \"return\": \"i32\", \"body\": [{\"return\": " + expression + "}]}}}}";
}

function nestedAdds(depth: number): string {
	return "{\"op\": {\"kind\": \"add\", \"args\": [{\"literal\": 1}, ".repeat(depth)
		+ "{\"literal\": 1}"
		+ "]}}".repeat(depth);
}

//==============================================================================
// Test Suite
//==============================================================================

describe("compileSirs", () => {
	it("lowers a valid document", () => {
		const result = compileSirs(returnsX, { moduleName: "m" });
		assert.equal(result.ok, true);
		if (!result.ok) return;
		assert.equal(result.module.name, "m");
		assert.deepEqual([...result.module.functions.keys()], ["main"]);
		assert.equal(result.program.entry, "main");
		assert.equal(result.diagnostics.getDiagnostics().length, 0);
	});

	it("returns malformed JSON as a ParseError", () => {
		const result = compileSirs("{", { moduleName: "m" });
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, "ParseError");
		const [diag] = result.diagnostics.getDiagnostics();
		assert.ok(diag);
		assert.equal(diag.code, "ParseError");
		assert.match(diag.message, /^Parse error: /);
	});

	it("reports each validation issue with its path as a hint", () => {
		const result = compileSirs(source([], "nope"), { moduleName: "m", file: "x.sirs.json" });
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, "ValidationError");
		assert.equal(result.error.message, "Validation error at program.entry: Entry function 'nope' is not defined");
		assert.deepEqual(result.diagnostics.getDiagnostics(), [{
			level: "error",
			location: { file: "x.sirs.json", line: 0, column: 0 },
			message: "Entry function 'nope' is not defined",
			hint: "at program.entry",
			code: "",
		}]);
	});

	it("returns lowering failures instead of throwing", () => {
		const result = compileSirs(
			source([{ return: { op: { kind: "pow", args: [{ var: "x" }, { literal: 2 }] } } }]),
			{ moduleName: "m" },
		);
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, "UnsupportedOperation");
		assert.equal(result.diagnostics.errorCount(), 1);
		assert.equal(result.diagnostics.getDiagnostics()[0]?.message, "Unsupported operation 'pow' in CIR lowering");
	});

	it("lowers a whole-valued float literal as a float constant", () => {
		const result = compileSirs(returning("{\"literal\": 2.0}"), { moduleName: "m" });
		assert.equal(result.ok, true);
		if (!result.ok) return;
		const [ret] = result.module.functions.get("main")?.blocks[0]?.instructions ?? [];
		assert.ok(ret);
		assert.equal(ret.op, "ret");
		assert.deepEqual(ret.operands, [{ kind: "float", value: 2, type: { kind: "f64" } }]);
	});

	it("returns an integer literal above 2^53 as a ValidationError", () => {
		const result = compileSirs(returning("{\"literal\": 9007199254740993}"), { moduleName: "m" });
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, "ValidationError");
		assert.equal(result.diagnostics.hasErrors(), true);
	});

	it("returns stack exhaustion on deeply nested documents as OutOfMemory", () => {
		const result = compileSirs(returning(nestedAdds(20_000)), { moduleName: "m" });
		assert.equal(result.ok, false);
		if (result.ok) return;
		assert.equal(result.error.code, "OutOfMemory");
		assert.deepEqual(result.diagnostics.getDiagnostics().map((d) => d.code), ["OutOfMemory"]);
	});

	it("keeps warnings on success", () => {
		const result = compileSirs(source([
			{ if: { condition: { var: "x" }, then: [{ return: { literal: 1 } }], else: [{ return: { literal: 2 } }] } },
		]), { moduleName: "m" });
		assert.equal(result.ok, true);
		assert.deepEqual(result.diagnostics.getDiagnostics().map((d) => d.level), ["warning"]);
	});

	it("uses the reporter it is given", () => {
		const reporter = new ErrorReporter();
		const result = compileSirs("[", { moduleName: "m", reporter });
		assert.equal(result.diagnostics, reporter);
		assert.equal(reporter.hasErrors(), true);
	});

	it("logs each phase when verbose", () => {
		const logMock = mock.method(console, "log", () => undefined);
		try {
			compileSirs(returnsX, { moduleName: "m", verbose: true });
			assert.deepEqual(logMock.mock.calls.map((c) => c.arguments[0]), [
				"[cir] parsing <input>",
				"[cir] validating",
				"[cir] lowering 1 function(s) into module m",
				"[cir] done",
			]);
		} finally {
			logMock.mock.restore();
		}
	});

	it("stays quiet by default", () => {
		const logMock = mock.method(console, "log", () => undefined);
		try {
			compileSirs(returnsX, { moduleName: "m" });
			assert.equal(logMock.mock.callCount(), 0);
		} finally {
			logMock.mock.restore();
		}
	});
});

describe("checkSirs", () => {
	it("validates without lowering", () => {
		const result = checkSirs(
			source([{ return: { op: { kind: "pow", args: [{ var: "x" }, { literal: 2 }] } } }]),
			{ moduleName: "m" },
		);
		assert.equal(result.ok, true);
		assert.equal("module" in result, false);
	});
});

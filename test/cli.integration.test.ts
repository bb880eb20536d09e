// SPDX-License-Identifier: MIT
// Sever CIR CLI - Integration Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { type CliIO, ExitCodes, runCli } from "../src/cli.js";
import { USAGE } from "../src/cli-utils.js";

//==============================================================================
// Test Fixtures
//==============================================================================

interface Captured extends CliIO {
	stdout: string[];
	stderr: string[];
}

function capture(): Captured {
	const stdout: string[] = [];
	const stderr: string[] = [];
	return {
		stdout,
		stderr,
		out: (text) => { stdout.push(text); },
		err: (text) => { stderr.push(text); },
	};
}

function document(body: unknown[]): string {
	return JSON.stringify({
		program: { entry: "main", functions: { main: { return: "i32", body } } },
	});
}

const DEMO_TEXT = [
	"module demo",
	"",
	"fn main() -> i32 {",
	"main_entry:",
	"  %0 = add 2, 3 : i32  ; #0",
	"  ret %0  ; #1",
	"}",
].join("\n");

//==============================================================================
// Test Suite
//==============================================================================

describe("runCli", () => {
	let dir: string;
	let demoPath: string;
	let failingPath: string;

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), "sever-cir-"));
		demoPath = join(dir, "demo.sirs.json");
		failingPath = join(dir, "failing.sirs.json");
		await writeFile(demoPath, document([
			{ return: { op: { kind: "add", args: [{ literal: 2 }, { literal: 3 }] } } },
		]));
		await writeFile(failingPath, document([
			{ return: { op: { kind: "pow", args: [{ literal: 2 }, { literal: 3 }] } } },
		]));
	});

	after(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("prints usage for help", async () => {
		const io = capture();
		assert.equal(await runCli(["help"], io), ExitCodes.Ok);
		assert.deepEqual(io.stdout, [USAGE]);
	});

	it("fails with a usage error without an input file", async () => {
		const io = capture();
		assert.equal(await runCli([], io), ExitCodes.Usage);
		assert.equal(io.stderr[0], "error: no input file provided");
	});

	it("fails with a usage error on a bad option", async () => {
		const io = capture();
		assert.equal(await runCli(["--emit", "yaml", demoPath], io), ExitCodes.Usage);
		assert.equal(io.stderr[0], "error: Unknown emit format 'yaml' (expected text or json)");
	});

	it("fails with a usage error on an unreadable file", async () => {
		const io = capture();
		assert.equal(await runCli([join(dir, "missing.json")], io), ExitCodes.Usage);
		assert.match(io.stderr[0] ?? "", /^error: cannot read /);
	});

	it("prints the lowered module as text", async () => {
		const io = capture();
		assert.equal(await runCli([demoPath], io), ExitCodes.Ok);
		assert.deepEqual(io.stdout, [DEMO_TEXT]);
		assert.deepEqual(io.stderr, []);
	});

	it("prints JSON under a chosen module name", async () => {
		const io = capture();
		assert.equal(await runCli([demoPath, "--emit", "json", "--module-name", "other"], io), ExitCodes.Ok);
		const json: unknown = JSON.parse(io.stdout[0] ?? "");
		assert.ok(json !== null && typeof json === "object" && "name" in json);
		assert.equal(json.name, "other");
	});

	it("validates without printing a module", async () => {
		const io = capture();
		assert.equal(await runCli(["validate", failingPath], io), ExitCodes.Ok);
		assert.deepEqual(io.stdout, [failingPath + ": ok"]);
	});

	it("exits 1 and prints diagnostics on a compile failure", async () => {
		const io = capture();
		assert.equal(await runCli([failingPath], io), ExitCodes.CompileFailure);
		assert.deepEqual(io.stdout, []);
		assert.deepEqual(io.stderr, [
			failingPath + ": error[UnsupportedOperation]: Unsupported operation 'pow' in CIR lowering",
		]);
	});

	it("writes the module to --output", async () => {
		const io = capture();
		const outPath = join(dir, "demo.cir");
		assert.equal(await runCli([demoPath, "-o", outPath], io), ExitCodes.Ok);
		assert.deepEqual(io.stdout, []);
		assert.equal(await readFile(outPath, "utf-8"), DEMO_TEXT + "\n");
	});
});

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	CirError,
	ErrorCodes,
	exhaustive,
	invalidResult,
	isLoweringError,
	validResult,
} from "../src/errors.js";

describe("CirError class", () => {
	it("constructor sets code, message and name", () => {
		const err = new CirError(ErrorCodes.InvalidType, "test msg");
		assert.equal(err.code, "InvalidType");
		assert.equal(err.message, "test msg");
		assert.equal(err.name, "CirError");
		assert.ok(err instanceof Error);
	});
});

describe("Static factories", () => {
	it("unsupported names the construct", () => {
		const err = CirError.unsupported("operation 'pow'");
		assert.equal(err.code, "UnsupportedOperation");
		assert.equal(err.message, "Unsupported operation 'pow' in CIR lowering");
	});

	it("invalidType names the type kind", () => {
		const err = CirError.invalidType("struct");
		assert.equal(err.code, "InvalidType");
		assert.equal(err.message, "Unsupported type in CIR lowering: struct");
	});

	it("undefinedVariable names the variable", () => {
		const err = CirError.undefinedVariable("y");
		assert.equal(err.code, "UndefinedVariable");
		assert.equal(err.message, "Undefined variable 'y' in CIR lowering");
	});

	it("undefinedFunction names the function", () => {
		const err = CirError.undefinedFunction("g");
		assert.equal(err.code, "UndefinedFunction");
		assert.equal(err.message, "Function 'g' has no lowered signature");
	});

	it("outOfMemory keeps the detail", () => {
		const err = CirError.outOfMemory("Maximum call stack size exceeded");
		assert.equal(err.code, "OutOfMemory");
		assert.equal(err.message, "Out of memory: Maximum call stack size exceeded");
	});

	it("parse and validation", () => {
		assert.equal(CirError.parse("bad token").message, "Parse error: bad token");
		const err = CirError.validation("program.entry", "missing");
		assert.equal(err.code, "ValidationError");
		assert.equal(err.message, "Validation error at program.entry: missing");
	});
});

describe("isLoweringError", () => {
	it("accepts the lowering codes", () => {
		assert.equal(isLoweringError(CirError.unsupported("x")), true);
		assert.equal(isLoweringError(CirError.outOfMemory("x")), true);
	});

	it("rejects document errors and foreign values", () => {
		assert.equal(isLoweringError(CirError.parse("x")), false);
		assert.equal(isLoweringError(CirError.validation("$", "x")), false);
		assert.equal(isLoweringError(new Error("x")), false);
		assert.equal(isLoweringError("UnsupportedOperation"), false);
	});
});

describe("ValidationResult helpers", () => {
	it("validResult carries the value", () => {
		assert.deepEqual(validResult(42), { valid: true, errors: [], value: 42 });
	});

	it("invalidResult carries the errors", () => {
		const result = invalidResult<number>([{ path: "$", message: "bad" }]);
		assert.equal(result.valid, false);
		assert.deepEqual(result.errors, [{ path: "$", message: "bad" }]);
		assert.equal(result.value, undefined);
	});
});

describe("exhaustive", () => {
	it("throws for any value that reaches it", () => {
		assert.throws(
			() => exhaustive("leak" as never),
			/Unexpected value: leak/,
		);
	});
});

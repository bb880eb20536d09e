// SPDX-License-Identifier: MIT
// Sever CIR Printer - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { lowerProgram } from "../../src/cir/lower.js";
import {
	cirModuleToJson,
	printCir,
	printCirType,
	printCirValue,
	printInstruction,
} from "../../src/cir/printer.js";
import {
	addEdge,
	arrayType,
	boolConst,
	CirOps,
	createBlock,
	createFunction,
	createInstruction,
	createModule,
	floatConst,
	funcType,
	functionRef,
	globalRef,
	intConst,
	nullConst,
	primitiveType,
	ptrType,
	recordType,
	stringConst,
	temporary,
	variable,
	voidConst,
} from "../../src/cir/types.js";
import { createProgram, sirsFunction } from "../../src/sirs/types.js";
import { i32, int, op, ret } from "../fixtures.js";

function demoModule() {
	const program = createProgram({
		main: sirsFunction([], i32, [ret(op("add", int(2), int(3)))]),
	});
	return lowerProgram(program, "demo");
}

describe("printCirType", () => {
	it("prints primitive and composite types", () => {
		const i8 = primitiveType("i8");
		assert.equal(printCirType(primitiveType("u64")), "u64");
		assert.equal(printCirType(ptrType(i8)), "*i8");
		assert.equal(printCirType(ptrType(ptrType(i8))), "**i8");
		assert.equal(printCirType(arrayType(primitiveType("i32"), 4)), "[4 x i32]");
		assert.equal(printCirType(funcType([primitiveType("i32"), primitiveType("i1")], primitiveType("void"))), "fn(i32, i1) -> void");
		assert.equal(printCirType(recordType(new Map([["x", primitiveType("f64")], ["y", i8]]))), "{ x: f64, y: i8 }");
	});
});

describe("printCirValue", () => {
	it("prints constants", () => {
		assert.equal(printCirValue(intConst(5)), "5");
		assert.equal(printCirValue(floatConst(2)), "2.0");
		assert.equal(printCirValue(floatConst(2.5)), "2.5");
		assert.equal(printCirValue(boolConst(true)), "true");
		assert.equal(printCirValue(stringConst("a\"b")), "\"a\\\"b\"");
		assert.equal(printCirValue(nullConst()), "null");
		assert.equal(printCirValue(voidConst()), "void");
	});

	it("prints references", () => {
		assert.equal(printCirValue(variable("x", primitiveType("i32"))), "$x");
		assert.equal(printCirValue(temporary(3, primitiveType("i32"))), "%3");
		assert.equal(printCirValue(functionRef("f")), "@f");
		assert.equal(printCirValue(globalRef("g")), "@g");
	});
});

describe("printInstruction", () => {
	it("prints a value-producing instruction", () => {
		const inst = createInstruction(0, CirOps.Add, [intConst(2), intConst(3)]);
		inst.resultType = primitiveType("i32");
		inst.resultName = "%0";
		assert.equal(printInstruction(inst), "%0 = add 2, 3 : i32  ; #0");
	});

	it("prints instructions without operands or result", () => {
		assert.equal(printInstruction(createInstruction(4, CirOps.Branch)), "branch  ; #4");
		assert.equal(
			printInstruction(createInstruction(1, CirOps.Store, [temporary(0, primitiveType("i32")), intConst(0), intConst(10)])),
			"store %0, 0, 10  ; #1",
		);
	});
});

describe("printCir", () => {
	it("prints a lowered module", () => {
		assert.equal(printCir(demoModule()), [
			"module demo",
			"",
			"fn main() -> i32 {",
			"main_entry:",
			"  %0 = add 2, 3 : i32  ; #0",
			"  ret %0  ; #1",
			"}",
			"",
		].join("\n"));
	});

	it("annotates edges and prints types, globals and external functions", () => {
		const module = createModule("m");
		module.types.set("Str", ptrType(primitiveType("i8")));
		module.globals.set("answer", intConst(42));

		const puts = createFunction("puts");
		puts.isExternal = true;
		puts.params.push({ name: "s", type: ptrType(primitiveType("i8")) });
		puts.returnType = primitiveType("i32");
		module.functions.set("puts", puts);

		const f = createFunction("f");
		f.params.push({ name: "x", type: primitiveType("i32") });
		const a = createBlock("a");
		const b = createBlock("b");
		addEdge(a, b);
		f.blocks.push(a, b);
		module.functions.set("f", f);

		assert.equal(printCir(module), [
			"module m",
			"",
			"type Str = *i8",
			"",
			"global answer = 42",
			"",
			"extern fn puts(s: *i8) -> i32",
			"",
			"fn f(x: i32) -> void {",
			"a:  ; succs: b",
			"b:  ; preds: a",
			"}",
			"",
		].join("\n"));
	});
});

describe("cirModuleToJson", () => {
	it("converts maps to objects", () => {
		assert.deepEqual(cirModuleToJson(demoModule()), {
			name: "demo",
			functions: {
				main: {
					name: "main",
					params: [],
					returnType: { kind: "i32" },
					isExternal: false,
					blocks: [{
						label: "main_entry",
						predecessors: [],
						successors: [],
						instructions: [
							{
								id: 0,
								op: "add",
								operands: [
									{ kind: "int", value: 2, type: { kind: "i32" } },
									{ kind: "int", value: 3, type: { kind: "i32" } },
								],
								resultType: { kind: "i32" },
								resultName: "%0",
							},
							{
								id: 1,
								op: "ret",
								operands: [{ kind: "temporary", id: 0, type: { kind: "i32" } }],
								resultType: null,
								resultName: null,
							},
						],
					}],
				},
			},
			globals: {},
			types: {},
		});
	});

	it("sorts edge labels", () => {
		const module = createModule("m");
		const f = createFunction("f");
		const entry = createBlock("entry");
		addEdge(entry, createBlock("z"));
		addEdge(entry, createBlock("a"));
		f.blocks.push(entry);
		module.functions.set("f", f);
		const json = cirModuleToJson(module);
		assert.deepEqual(JSON.parse(JSON.stringify(json)).functions.f.blocks[0].successors, ["a", "z"]);
	});

	it("serializes records, globals and references", () => {
		const module = createModule("m");
		module.types.set("P", recordType(new Map([["x", primitiveType("i32")]])));
		module.globals.set("name", stringConst("sever"));
		module.globals.set("entry", functionRef("main"));
		assert.deepEqual(cirModuleToJson(module), {
			name: "m",
			functions: {},
			globals: {
				name: { kind: "string", value: "sever" },
				entry: { kind: "functionRef", name: "main" },
			},
			types: {
				P: { kind: "record", fields: { x: { kind: "i32" } } },
			},
		});
	});
});

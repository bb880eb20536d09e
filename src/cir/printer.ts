// Sever CIR Printer
// Human-readable text dump and plain-JSON form of a CIR module.

import { exhaustive } from "../errors.js";
import type {
	CirBasicBlock,
	CirFunction,
	CirInstruction,
	CirModule,
	CirType,
	CirValue,
} from "./types.js";

//==============================================================================
// Text Format
//==============================================================================

export function printCirType(t: CirType): string {
	switch (t.kind) {
	case "ptr":
		return "*" + printCirType(t.pointee);
	case "array":
		return "[" + String(t.size) + " x " + printCirType(t.element) + "]";
	case "func":
		return "fn(" + t.params.map(printCirType).join(", ") + ") -> " + printCirType(t.returns);
	case "record": {
		const fields = [...t.fields].map(([name, type]) => name + ": " + printCirType(type));
		return "{ " + fields.join(", ") + " }";
	}
	default:
		return t.kind;
	}
}

export function printCirValue(v: CirValue): string {
	switch (v.kind) {
	case "void":
		return "void";
	case "bool":
		return String(v.value);
	case "int":
		return String(v.value);
	case "float":
		return Number.isInteger(v.value) ? v.value.toFixed(1) : String(v.value);
	case "string":
		return JSON.stringify(v.value);
	case "null":
		return "null";
	case "variable":
		return "$" + v.name;
	case "temporary":
		return "%" + String(v.id);
	case "functionRef":
	case "globalRef":
		return "@" + v.name;
	default:
		return exhaustive(v);
	}
}

/**
 * `%3 = add 2, 3 : i32  ; #0` for value-producing instructions,
 * `ret %3  ; #1` otherwise.
 */
export function printInstruction(inst: CirInstruction): string {
	const operands = inst.operands.map(printCirValue).join(", ");
	let text = operands ? inst.op + " " + operands : inst.op;
	if (inst.resultName !== null) {
		text = inst.resultName + " = " + text;
	}
	if (inst.resultType !== null) {
		text += " : " + printCirType(inst.resultType);
	}
	return text + "  ; #" + String(inst.id);
}

function printEdges(block: CirBasicBlock): string {
	const notes: string[] = [];
	if (block.predecessors.size > 0) {
		notes.push("preds: " + [...block.predecessors].join(", "));
	}
	if (block.successors.size > 0) {
		notes.push("succs: " + [...block.successors].join(", "));
	}
	return notes.length > 0 ? "  ; " + notes.join("; ") : "";
}

function printBlock(block: CirBasicBlock): string[] {
	const lines = [block.label + ":" + printEdges(block)];
	for (const inst of block.instructions) {
		lines.push("  " + printInstruction(inst));
	}
	return lines;
}

function printFunction(fn: CirFunction): string {
	const params = fn.params.map((p) => p.name + ": " + printCirType(p.type)).join(", ");
	const head = (fn.isExternal ? "extern fn " : "fn ") + fn.name + "(" + params + ") -> " + printCirType(fn.returnType);
	if (fn.isExternal) return head;
	const lines = [head + " {"];
	for (const block of fn.blocks) {
		lines.push(...printBlock(block));
	}
	lines.push("}");
	return lines.join("\n");
}

export function printCir(module: CirModule): string {
	const lines: string[] = ["module " + module.name];
	for (const [name, type] of module.types) {
		lines.push("", "type " + name + " = " + printCirType(type));
	}
	for (const [name, value] of module.globals) {
		lines.push("", "global " + name + " = " + printCirValue(value));
	}
	for (const fn of module.functions.values()) {
		lines.push("", printFunction(fn));
	}
	return lines.join("\n") + "\n";
}

//==============================================================================
// JSON Form
//==============================================================================

export type JsonValue =
	| null
	| boolean
	| number
	| string
	| JsonValue[]
	| { [key: string]: JsonValue };

function typeToJson(t: CirType): JsonValue {
	switch (t.kind) {
	case "ptr":
		return { kind: "ptr", pointee: typeToJson(t.pointee) };
	case "array":
		return { kind: "array", element: typeToJson(t.element), size: t.size };
	case "func":
		return { kind: "func", params: t.params.map(typeToJson), returns: typeToJson(t.returns) };
	case "record": {
		const fields: Record<string, JsonValue> = {};
		for (const [name, type] of t.fields) fields[name] = typeToJson(type);
		return { kind: "record", fields };
	}
	default:
		return { kind: t.kind };
	}
}

function valueToJson(v: CirValue): JsonValue {
	switch (v.kind) {
	case "void":
	case "null":
		return { kind: v.kind };
	case "bool":
	case "string":
		return { kind: v.kind, value: v.value };
	case "int":
	case "float":
		return { kind: v.kind, value: v.value, type: typeToJson(v.type) };
	case "variable":
		return { kind: v.kind, name: v.name, type: typeToJson(v.type) };
	case "temporary":
		return { kind: v.kind, id: v.id, type: typeToJson(v.type) };
	case "functionRef":
	case "globalRef":
		return { kind: v.kind, name: v.name };
	default:
		return exhaustive(v);
	}
}

function instructionToJson(inst: CirInstruction): JsonValue {
	return {
		id: inst.id,
		op: inst.op,
		operands: inst.operands.map(valueToJson),
		resultType: inst.resultType ? typeToJson(inst.resultType) : null,
		resultName: inst.resultName,
	};
}

function blockToJson(block: CirBasicBlock): JsonValue {
	return {
		label: block.label,
		predecessors: [...block.predecessors].sort(),
		successors: [...block.successors].sort(),
		instructions: block.instructions.map(instructionToJson),
	};
}

function functionToJson(fn: CirFunction): JsonValue {
	return {
		name: fn.name,
		params: fn.params.map((p) => ({ name: p.name, type: typeToJson(p.type) })),
		returnType: typeToJson(fn.returnType),
		isExternal: fn.isExternal,
		blocks: fn.blocks.map(blockToJson),
	};
}

/**
 * Convert a module to plain JSON: maps become objects keyed by name and
 * edge sets become sorted label arrays.
 */
export function cirModuleToJson(module: CirModule): JsonValue {
	const functions: Record<string, JsonValue> = {};
	for (const [name, fn] of module.functions) functions[name] = functionToJson(fn);
	const globals: Record<string, JsonValue> = {};
	for (const [name, value] of module.globals) globals[name] = valueToJson(value);
	const types: Record<string, JsonValue> = {};
	for (const [name, type] of module.types) types[name] = typeToJson(type);
	return { name: module.name, functions, globals, types };
}

// Generate the JSON Schema for SIRS documents from the Zod schema
// Usage: tsx scripts/generate-schemas.ts

import { mkdirSync, writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { SirsDocumentSchema } from "../src/sirs/schemas.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const outDir = resolve(__dirname, "..", "schemas");

/**
 * JSON Schema key priority order.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "patternProperties", "additionalProperties", "required",
	"items", "additionalItems", "contains", "minItems", "maxItems", "uniqueItems",
	"oneOf", "anyOf", "allOf", "not", "if", "then", "else", "discriminator",
	"minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum", "multipleOf",
	"minLength", "maxLength", "pattern", "format",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * 1. Objects with "$ref" → "$ref" first, then alphabetical
 * 2. Schema objects → jsonSchemaKeyOrder, then alphabetical
 * 3. Default → alphabetical
 */
function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);

	let priorityOrder: string[];
	if ("$ref" in record) {
		priorityOrder = ["$ref"];
	} else if ("type" in record || "$schema" in record) {
		priorityOrder = jsonSchemaKeyOrder;
	} else {
		priorityOrder = [];
	}

	const prioritySet = new Set(priorityOrder);
	const priorityKeys = priorityOrder.filter(k => keys.includes(k));
	const remainingKeys = keys.filter(k => !prioritySet.has(k)).sort();
	return [...priorityKeys, ...remainingKeys];
}

/** Recursively sort object keys for deterministic output. */
function sortKeys(obj: unknown): unknown {
	if (Array.isArray(obj)) return obj.map(sortKeys);
	if (!isRecord(obj)) return obj;

	const sorted: Record<string, unknown> = {};
	for (const key of sortObjectKeys(obj)) {
		sorted[key] = sortKeys(obj[key]);
	}
	return sorted;
}

// The schema describes what authors write, so it is generated from the
// input side of the transforms.
const jsonSchema = z.toJSONSchema(SirsDocumentSchema, {
	target: "draft-2020-12",
	io: "input",
	// Numbers decoded as LosslessNumber are plain JSON numbers on the input side
	unrepresentable: "any",
});

const output = {
	...jsonSchema,
	$id: "sirs.schema.json",
	title: "SIRS Program Document",
};

mkdirSync(outDir, { recursive: true });
const filePath = resolve(outDir, "sirs.schema.json");
writeFileSync(filePath, JSON.stringify(sortKeys(output), null, "\t") + "\n");
console.log("Generated schemas/sirs.schema.json");

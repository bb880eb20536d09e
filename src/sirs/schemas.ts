// Sever SIRS Zod Schemas
// Single source of truth for the SIRS JSON document format.
//
// Every variant is a single-key object ({"let": {...}}, {"var": "x"}, ...),
// so each alternative is a strict object and the union discriminates on the
// key. Schemas transform straight into the AST interfaces from types.ts.
// Recursive schemas are annotated with z.ZodType<ExplicitType> because the
// recursion goes through z.lazy.

import { isInteger, isSafeNumber, LosslessNumber } from "lossless-json";
import { z } from "zod/v4";
import type {
	CatchClause,
	Constant,
	Expression,
	Literal,
	LValue,
	MatchCase,
	Parameter,
	Pattern,
	Program,
	SirsFunction,
	SirsType,
	Statement,
} from "./types.js";

//==============================================================================
// Helpers
//==============================================================================

/** A decoded number, plain or as written in the source text. */
const JsonNumberSchema = z.union([
	z.number(),
	z.instanceof(LosslessNumber).transform(n => Number(n.value)),
]);

function toMap<T>(record: Record<string, T>): Map<string, T> {
	return new Map(Object.entries(record));
}

//==============================================================================
// Types
//==============================================================================

const PrimitiveTypeName = z.enum([
	"void", "bool",
	"i8", "i16", "i32", "i64",
	"u8", "u16", "u32", "u64",
	"f32", "f64",
	"str",
]);

const DistributionKind = z.enum([
	"uniform", "normal", "categorical", "bernoulli",
	"exponential", "gamma", "beta",
]);

export const TypeSchema: z.ZodType<SirsType> = z.lazy(() => z.union([
	PrimitiveTypeName.transform((name): SirsType => ({ kind: name })),
	z.strictObject({ array: z.object({ element: TypeSchema, size: JsonNumberSchema.pipe(z.number().int().nonnegative()) }) })
		.transform(({ array }): SirsType => ({ kind: "array", element: array.element, size: array.size })),
	z.strictObject({ slice: z.object({ element: TypeSchema }) })
		.transform(({ slice }): SirsType => ({ kind: "slice", element: slice.element })),
	z.strictObject({ optional: TypeSchema })
		.transform(({ optional }): SirsType => ({ kind: "optional", inner: optional })),
	z.strictObject({ struct: z.record(z.string(), TypeSchema) })
		.transform(({ struct }): SirsType => ({ kind: "struct", fields: toMap(struct) })),
	z.strictObject({ union: z.record(z.string(), TypeSchema) })
		.transform(({ union }): SirsType => ({ kind: "union", variants: toMap(union) })),
	z.strictObject({ enum: z.object({ name: z.string(), variants: z.record(z.string(), TypeSchema.nullable()) }) })
		.transform(({ enum: e }): SirsType => ({ kind: "enum", name: e.name, variants: toMap(e.variants) })),
	z.strictObject({ discriminated_union: z.object({ discriminant: z.string(), variants: z.record(z.string(), TypeSchema) }) })
		.transform(({ discriminated_union: d }): SirsType => ({
			kind: "discriminatedUnion",
			discriminant: d.discriminant,
			variants: toMap(d.variants),
		})),
	z.strictObject({ error: z.string() })
		.transform(({ error }): SirsType => ({ kind: "error", name: error })),
	z.strictObject({ hashmap: z.object({ key: TypeSchema, value: TypeSchema }) })
		.transform(({ hashmap }): SirsType => ({ kind: "hashmap", key: hashmap.key, value: hashmap.value })),
	z.strictObject({ set: TypeSchema })
		.transform(({ set }): SirsType => ({ kind: "set", element: set })),
	z.strictObject({ tuple: z.array(TypeSchema) })
		.transform(({ tuple }): SirsType => ({ kind: "tuple", elements: tuple })),
	z.strictObject({ record: z.object({ name: z.string(), fields: z.record(z.string(), TypeSchema) }) })
		.transform(({ record }): SirsType => ({ kind: "record", name: record.name, fields: toMap(record.fields) })),
	z.strictObject({ function: z.object({ args: z.array(TypeSchema), return: TypeSchema }) })
		.transform(({ function: f }): SirsType => ({ kind: "function", params: f.args, returns: f.return })),
	z.strictObject({ interface: z.string() })
		.transform(({ interface: name }): SirsType => ({ kind: "interface", name })),
	z.strictObject({ trait_object: z.string() })
		.transform(({ trait_object }): SirsType => ({ kind: "traitObject", trait: trait_object })),
	z.strictObject({ generic_instance: z.object({ base: z.string(), args: z.array(TypeSchema) }) })
		.transform(({ generic_instance: g }): SirsType => ({ kind: "genericInstance", base: g.base, args: g.args })),
	z.strictObject({ distribution: z.object({ kind: DistributionKind, param_types: z.array(TypeSchema).default([]) }) })
		.transform(({ distribution: d }): SirsType => ({ kind: "distribution", distribution: d.kind, params: d.param_types })),
]));

//==============================================================================
// Literals
//==============================================================================

/**
 * Number tokens written with a fraction or exponent are float literals, even
 * when whole ("2.0", "1e3"). Integer literals must be exact in a double.
 */
const WrittenNumberSchema = z
	.instanceof(LosslessNumber)
	.refine(n => !isInteger(n.value) || isSafeNumber(n.value), {
		error: "Integer literal is outside the exactly representable range",
	})
	.transform((n): Literal => isInteger(n.value)
		? { kind: "integer", value: Number(n.value) }
		: { kind: "float", value: Number(n.value) });

/** Plain numbers without a fractional part read as integer literals. */
export const LiteralSchema: z.ZodType<Literal> = z.union([
	WrittenNumberSchema,
	z.union([z.number(), z.string(), z.boolean(), z.null()])
		.transform((value): Literal => {
			if (value === null) return { kind: "null" };
			if (typeof value === "boolean") return { kind: "boolean", value };
			if (typeof value === "string") return { kind: "string", value };
			return Number.isInteger(value)
				? { kind: "integer", value }
				: { kind: "float", value };
		}),
]);

const OpKindSchema = z.enum([
	"add", "sub", "mul", "div", "mod", "pow",
	"eq", "ne", "lt", "le", "gt", "ge",
	"and", "or", "not",
	"bitand", "bitor", "bitxor", "bitnot",
	"shl", "shr",
]);

//==============================================================================
// Expressions
//==============================================================================

export const ExpressionSchema: z.ZodType<Expression> = z.lazy(() => z.union([
	z.strictObject({ literal: LiteralSchema })
		.transform(({ literal }): Expression => ({ kind: "literal", value: literal })),
	z.strictObject({ var: z.string() })
		.transform(({ var: name }): Expression => ({ kind: "variable", name })),
	z.strictObject({ call: z.object({ function: z.string(), args: z.array(ExpressionSchema) }) })
		.transform(({ call }): Expression => ({ kind: "call", callee: call.function, args: call.args })),
	z.strictObject({ op: z.object({ kind: OpKindSchema, args: z.array(ExpressionSchema) }) })
		.transform(({ op }): Expression => ({ kind: "op", op: op.kind, args: op.args })),
	z.strictObject({ index: z.object({ array: ExpressionSchema, index: ExpressionSchema }) })
		.transform(({ index }): Expression => ({ kind: "index", array: index.array, index: index.index })),
	z.strictObject({ field: z.object({ object: ExpressionSchema, field: z.string() }) })
		.transform(({ field }): Expression => ({ kind: "field", object: field.object, field: field.field })),
	z.strictObject({ array: z.array(ExpressionSchema) })
		.transform(({ array }): Expression => ({ kind: "array", elements: array })),
	z.strictObject({ struct: z.record(z.string(), ExpressionSchema) })
		.transform(({ struct }): Expression => ({ kind: "struct", fields: toMap(struct) })),
	z.strictObject({ sample: z.object({ distribution: z.string(), params: z.array(ExpressionSchema).default([]) }) })
		.transform(({ sample }): Expression => ({ kind: "sample", distribution: sample.distribution, params: sample.params })),
	z.strictObject({ infer: z.object({ model: ExpressionSchema, data: ExpressionSchema }) })
		.transform(({ infer }): Expression => ({ kind: "infer", model: infer.model, data: infer.data })),
	z.strictObject({ cast: z.object({ value: ExpressionSchema, type: TypeSchema }) })
		.transform(({ cast }): Expression => ({ kind: "cast", value: cast.value, type: cast.type })),
	z.strictObject({ enum_constructor: z.object({ type: z.string(), variant: z.string(), value: ExpressionSchema.optional() }) })
		.transform(({ enum_constructor: e }): Expression => ({
			kind: "enumConstructor",
			enumType: e.type,
			variant: e.variant,
			value: e.value,
		})),
	z.strictObject({ hashmap: z.record(z.string(), ExpressionSchema) })
		.transform(({ hashmap }): Expression => ({ kind: "hashmap", entries: toMap(hashmap) })),
	z.strictObject({ set: z.array(ExpressionSchema) })
		.transform(({ set }): Expression => ({ kind: "set", elements: set })),
	z.strictObject({ tuple: z.array(ExpressionSchema) })
		.transform(({ tuple }): Expression => ({ kind: "tuple", elements: tuple })),
	z.strictObject({ record: z.object({ type: z.string(), fields: z.record(z.string(), ExpressionSchema) }) })
		.transform(({ record }): Expression => ({ kind: "record", recordType: record.type, fields: toMap(record.fields) })),
	z.strictObject({ await: ExpressionSchema })
		.transform(({ await: value }): Expression => ({ kind: "await", value })),
]));

//==============================================================================
// Assignment Targets and Patterns
//==============================================================================

export const LValueSchema: z.ZodType<LValue> = z.lazy(() => z.union([
	z.strictObject({ var: z.string() })
		.transform(({ var: name }): LValue => ({ kind: "variable", name })),
	z.strictObject({ index: z.object({ array: LValueSchema, index: ExpressionSchema }) })
		.transform(({ index }): LValue => ({ kind: "index", array: index.array, index: index.index })),
	z.strictObject({ field: z.object({ object: LValueSchema, field: z.string() }) })
		.transform(({ field }): LValue => ({ kind: "field", object: field.object, field: field.field })),
]));

export const PatternSchema: z.ZodType<Pattern> = z.lazy(() => z.union([
	z.literal("_").transform((): Pattern => ({ kind: "wildcard" })),
	z.strictObject({ wildcard: z.literal(true) })
		.transform((): Pattern => ({ kind: "wildcard" })),
	z.strictObject({ literal: LiteralSchema })
		.transform(({ literal }): Pattern => ({ kind: "literal", value: literal })),
	z.strictObject({ var: z.string() })
		.transform(({ var: name }): Pattern => ({ kind: "variable", name })),
	z.strictObject({ struct: z.record(z.string(), PatternSchema) })
		.transform(({ struct }): Pattern => ({ kind: "struct", fields: toMap(struct) })),
	z.strictObject({ enum: z.object({ type: z.string(), variant: z.string(), value: PatternSchema.optional() }) })
		.transform(({ enum: e }): Pattern => ({
			kind: "enum",
			enumType: e.type,
			variant: e.variant,
			valuePattern: e.value,
		})),
]));

//==============================================================================
// Statements
//==============================================================================

const MatchCaseSchema: z.ZodType<MatchCase> = z.lazy(() => z.object({
	pattern: PatternSchema,
	body: z.array(StatementSchema),
}));

const CatchClauseSchema: z.ZodType<CatchClause> = z.lazy(() => z.object({
	type: z.string().optional(),
	var: z.string().optional(),
	body: z.array(StatementSchema),
}).transform((c): CatchClause => ({ exceptionType: c.type, variable: c.var, body: c.body })));

export const StatementSchema: z.ZodType<Statement> = z.lazy(() => z.union([
	z.literal("break").transform((): Statement => ({ kind: "break" })),
	z.literal("continue").transform((): Statement => ({ kind: "continue" })),
	z.strictObject({ let: z.object({ name: z.string(), type: TypeSchema.optional(), mutable: z.boolean().default(false), value: ExpressionSchema }) })
		.transform(({ let: s }): Statement => ({ kind: "let", name: s.name, type: s.type, mutable: s.mutable, value: s.value })),
	z.strictObject({ assign: z.object({ target: LValueSchema, value: ExpressionSchema }) })
		.transform(({ assign }): Statement => ({ kind: "assign", target: assign.target, value: assign.value })),
	z.strictObject({ if: z.object({ condition: ExpressionSchema, then: z.array(StatementSchema), else: z.array(StatementSchema).optional() }) })
		.transform(({ if: s }): Statement => ({ kind: "if", condition: s.condition, then: s.then, else: s.else })),
	z.strictObject({ match: z.object({ value: ExpressionSchema, cases: z.array(MatchCaseSchema) }) })
		.transform(({ match }): Statement => ({ kind: "match", value: match.value, cases: match.cases })),
	z.strictObject({ while: z.object({ condition: ExpressionSchema, body: z.array(StatementSchema) }) })
		.transform(({ while: s }): Statement => ({ kind: "while", condition: s.condition, body: s.body })),
	z.strictObject({ for: z.object({ variable: z.string(), iterable: ExpressionSchema, body: z.array(StatementSchema) }) })
		.transform(({ for: s }): Statement => ({ kind: "for", variable: s.variable, iterable: s.iterable, body: s.body })),
	z.strictObject({
		try: z.object({
			body: z.array(StatementSchema),
			catch: z.array(CatchClauseSchema).default([]),
			finally: z.array(StatementSchema).optional(),
		}),
	}).transform(({ try: s }): Statement => ({
		kind: "try",
		body: s.body,
		catchClauses: s.catch,
		finallyBody: s.finally,
	})),
	z.strictObject({ throw: ExpressionSchema })
		.transform(({ throw: value }): Statement => ({ kind: "throw", value })),
	z.strictObject({ return: ExpressionSchema })
		.transform(({ return: value }): Statement => ({ kind: "return", value })),
	z.strictObject({ observe: z.object({ distribution: z.string(), params: z.array(ExpressionSchema).default([]), value: ExpressionSchema }) })
		.transform(({ observe: s }): Statement => ({
			kind: "observe",
			distribution: s.distribution,
			params: s.params,
			value: s.value,
		})),
	z.strictObject({ prob_assert: z.object({ condition: ExpressionSchema, confidence: JsonNumberSchema.pipe(z.number().min(0).max(1)) }) })
		.transform(({ prob_assert: s }): Statement => ({ kind: "probAssert", condition: s.condition, confidence: s.confidence })),
	z.strictObject({ expression: ExpressionSchema })
		.transform(({ expression }): Statement => ({ kind: "expression", value: expression })),
]));

//==============================================================================
// Program Document
//==============================================================================

const ParameterSchema: z.ZodType<Parameter> = z.object({
	name: z.string().min(1),
	type: TypeSchema,
});

const FunctionSchema: z.ZodType<SirsFunction> = z.object({
	args: z.array(ParameterSchema).default([]),
	return: TypeSchema.default({ kind: "void" }),
	body: z.array(StatementSchema).default([]),
	inline: z.boolean().default(false),
	pure: z.boolean().default(false),
}).transform((f): SirsFunction => ({
	params: f.args,
	returnType: f.return,
	body: f.body,
	inline: f.inline,
	pure: f.pure,
}));

const ConstantSchema: z.ZodType<Constant> = z.object({
	type: TypeSchema,
	value: ExpressionSchema,
});

export const SirsDocumentSchema: z.ZodType<Program> = z.object({
	program: z.object({
		entry: z.string().min(1),
		functions: z.record(z.string(), FunctionSchema).default({}),
		types: z.record(z.string(), TypeSchema).default({}),
		constants: z.record(z.string(), ConstantSchema).default({}),
	}),
}).transform(({ program }): Program => ({
	entry: program.entry,
	functions: toMap(program.functions),
	types: toMap(program.types),
	constants: toMap(program.constants),
}));

// Sever SIRS AST
// Type-checked source program consumed by the CIR lowering pass.
//
// The JSON reader in schemas.ts produces these; tests may also build them
// directly.

//==============================================================================
// Type Domain
//==============================================================================

export type PrimitiveTypeName =
	| "void" | "bool"
	| "i8" | "i16" | "i32" | "i64"
	| "u8" | "u16" | "u32" | "u64"
	| "f32" | "f64"
	| "str";

export type DistributionKind =
	| "uniform" | "normal" | "categorical" | "bernoulli"
	| "exponential" | "gamma" | "beta";

export interface PrimitiveType { kind: PrimitiveTypeName }
export interface ArrayType { kind: "array"; element: SirsType; size: number }
export interface SliceType { kind: "slice"; element: SirsType }
export interface OptionalType { kind: "optional"; inner: SirsType }
export interface StructType { kind: "struct"; fields: Map<string, SirsType> }
export interface UnionType { kind: "union"; variants: Map<string, SirsType> }
export interface EnumType { kind: "enum"; name: string; variants: Map<string, SirsType | null> }
export interface DiscriminatedUnionType { kind: "discriminatedUnion"; discriminant: string; variants: Map<string, SirsType> }
export interface ErrorType { kind: "error"; name: string }
export interface HashMapType { kind: "hashmap"; key: SirsType; value: SirsType }
export interface SetType { kind: "set"; element: SirsType }
export interface TupleType { kind: "tuple"; elements: SirsType[] }
export interface RecordType { kind: "record"; name: string; fields: Map<string, SirsType> }
export interface FunctionType { kind: "function"; params: SirsType[]; returns: SirsType }
export interface InterfaceType { kind: "interface"; name: string }
export interface TraitObjectType { kind: "traitObject"; trait: string }
export interface GenericInstanceType { kind: "genericInstance"; base: string; args: SirsType[] }
export interface DistributionType { kind: "distribution"; distribution: DistributionKind; params: SirsType[] }

export type SirsType =
	| PrimitiveType | ArrayType | SliceType | OptionalType
	| StructType | UnionType | EnumType | DiscriminatedUnionType | ErrorType
	| HashMapType | SetType | TupleType | RecordType
	| FunctionType | InterfaceType | TraitObjectType | GenericInstanceType
	| DistributionType;

//==============================================================================
// Literals and Operators
//==============================================================================

export type Literal =
	| { kind: "integer"; value: number }
	| { kind: "float"; value: number }
	| { kind: "string"; value: string }
	| { kind: "boolean"; value: boolean }
	| { kind: "null" };

export type OpKind =
	| "add" | "sub" | "mul" | "div" | "mod" | "pow"
	| "eq" | "ne" | "lt" | "le" | "gt" | "ge"
	| "and" | "or" | "not"
	| "bitand" | "bitor" | "bitxor" | "bitnot"
	| "shl" | "shr";

//==============================================================================
// Expression Domain
//==============================================================================

export interface LiteralExpr { kind: "literal"; value: Literal }
export interface VariableExpr { kind: "variable"; name: string }
export interface CallExpr { kind: "call"; callee: string; args: Expression[] }
export interface OpExpr { kind: "op"; op: OpKind; args: Expression[] }
export interface IndexExpr { kind: "index"; array: Expression; index: Expression }
export interface FieldExpr { kind: "field"; object: Expression; field: string }
export interface ArrayExpr { kind: "array"; elements: Expression[] }
export interface StructExpr { kind: "struct"; fields: Map<string, Expression> }
export interface SampleExpr { kind: "sample"; distribution: string; params: Expression[] }
export interface InferExpr { kind: "infer"; model: Expression; data: Expression }
export interface CastExpr { kind: "cast"; value: Expression; type: SirsType }
export interface EnumConstructorExpr { kind: "enumConstructor"; enumType: string; variant: string; value?: Expression | undefined }
export interface HashMapExpr { kind: "hashmap"; entries: Map<string, Expression> }
export interface SetExpr { kind: "set"; elements: Expression[] }
export interface TupleExpr { kind: "tuple"; elements: Expression[] }
export interface RecordExpr { kind: "record"; recordType: string; fields: Map<string, Expression> }
export interface AwaitExpr { kind: "await"; value: Expression }

export type Expression =
	| LiteralExpr | VariableExpr | CallExpr | OpExpr
	| IndexExpr | FieldExpr
	| ArrayExpr | StructExpr
	| SampleExpr | InferExpr | CastExpr
	| EnumConstructorExpr | HashMapExpr | SetExpr | TupleExpr | RecordExpr
	| AwaitExpr;

//==============================================================================
// Assignment Targets and Patterns
//==============================================================================

export type LValue =
	| { kind: "variable"; name: string }
	| { kind: "index"; array: LValue; index: Expression }
	| { kind: "field"; object: LValue; field: string };

export interface LiteralPattern { kind: "literal"; value: Literal }
export interface VariablePattern { kind: "variable"; name: string }
export interface WildcardPattern { kind: "wildcard" }
export interface StructPattern { kind: "struct"; fields: Map<string, Pattern> }
export interface EnumPattern { kind: "enum"; enumType: string; variant: string; valuePattern?: Pattern | undefined }

export type Pattern =
	| LiteralPattern | VariablePattern | WildcardPattern
	| StructPattern | EnumPattern;

//==============================================================================
// Statement Domain
//==============================================================================

export interface MatchCase { pattern: Pattern; body: Statement[] }
export interface CatchClause { exceptionType?: string | undefined; variable?: string | undefined; body: Statement[] }

export interface LetStmt { kind: "let"; name: string; type?: SirsType | undefined; mutable: boolean; value: Expression }
export interface AssignStmt { kind: "assign"; target: LValue; value: Expression }
export interface IfStmt { kind: "if"; condition: Expression; then: Statement[]; else?: Statement[] | undefined }
export interface MatchStmt { kind: "match"; value: Expression; cases: MatchCase[] }
export interface WhileStmt { kind: "while"; condition: Expression; body: Statement[] }
export interface ForStmt { kind: "for"; variable: string; iterable: Expression; body: Statement[] }
export interface TryStmt { kind: "try"; body: Statement[]; catchClauses: CatchClause[]; finallyBody?: Statement[] | undefined }
export interface ThrowStmt { kind: "throw"; value: Expression }
export interface ReturnStmt { kind: "return"; value: Expression }
export interface BreakStmt { kind: "break" }
export interface ContinueStmt { kind: "continue" }
export interface ObserveStmt { kind: "observe"; distribution: string; params: Expression[]; value: Expression }
export interface ProbAssertStmt { kind: "probAssert"; condition: Expression; confidence: number }
export interface ExpressionStmt { kind: "expression"; value: Expression }

export type Statement =
	| LetStmt | AssignStmt | IfStmt | MatchStmt | WhileStmt | ForStmt
	| TryStmt | ThrowStmt | ReturnStmt | BreakStmt | ContinueStmt
	| ObserveStmt | ProbAssertStmt | ExpressionStmt;

//==============================================================================
// Program
//==============================================================================

export interface Parameter { name: string; type: SirsType }

export interface SirsFunction {
	params: Parameter[];
	returnType: SirsType;
	body: Statement[];
	inline: boolean;
	pure: boolean;
}

export interface Constant { type: SirsType; value: Expression }

export interface Program {
	entry: string;
	functions: Map<string, SirsFunction>;
	types: Map<string, SirsType>;
	constants: Map<string, Constant>;
}

/**
 * Build a program from a plain function table. Entry defaults to the first
 * function name.
 */
export function createProgram(
	functions: Record<string, SirsFunction>,
	entry?: string,
): Program {
	const table = new Map(Object.entries(functions));
	return {
		entry: entry ?? table.keys().next().value ?? "",
		functions: table,
		types: new Map(),
		constants: new Map(),
	};
}

/**
 * Build a function with default flags.
 */
export function sirsFunction(
	params: Parameter[],
	returnType: SirsType,
	body: Statement[],
): SirsFunction {
	return { params, returnType, body, inline: false, pure: false };
}

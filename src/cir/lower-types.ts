// Sever CIR Lowering - Source type to CIR type

import { CirError, exhaustive } from "../errors.js";
import type { SirsType } from "../sirs/types.js";
import type { LoweringSession } from "./session.js";
import { arrayType, type CirType, primitiveType, ptrType } from "./types.js";

/**
 * Lower a SIRS type to its CIR representation.
 *
 * - `str` becomes a pointer to i8
 * - slices drop their length and become element pointers
 * - optionals become pointers, with null encoded as the zero pointer
 *
 * Aggregates, unions, enums, interfaces and the other nominal or generic
 * types have no CIR form yet and fail with InvalidType after one diagnostic.
 */
export function lowerType(s: LoweringSession, t: SirsType): CirType {
	switch (t.kind) {
	case "void": return primitiveType("void");
	case "bool": return primitiveType("i1");
	case "i8": return primitiveType("i8");
	case "i16": return primitiveType("i16");
	case "i32": return primitiveType("i32");
	case "i64": return primitiveType("i64");
	case "u8": return primitiveType("u8");
	case "u16": return primitiveType("u16");
	case "u32": return primitiveType("u32");
	case "u64": return primitiveType("u64");
	case "f32": return primitiveType("f32");
	case "f64": return primitiveType("f64");
	case "str":
		return ptrType(s.arena.box(primitiveType("i8")));
	case "array":
		return arrayType(s.arena.box(lowerType(s, t.element)), t.size);
	case "slice":
		return ptrType(s.arena.box(lowerType(s, t.element)));
	case "optional":
		return ptrType(s.arena.box(lowerType(s, t.inner)));
	case "struct":
	case "union":
	case "enum":
	case "discriminatedUnion":
	case "error":
	case "hashmap":
	case "set":
	case "tuple":
	case "record":
	case "function":
	case "interface":
	case "traitObject":
	case "genericInstance":
	case "distribution":
		return invalidType(s, t.kind);
	default:
		return exhaustive(t);
	}
}

function invalidType(s: LoweringSession, kind: string): never {
	const err = CirError.invalidType(kind);
	s.reporter.reportError(null, err.message, err.code);
	throw err;
}

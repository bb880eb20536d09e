// Sever CIR Lowering - Match statement control flow
//
// A match over K cases produces 2K + 1 blocks:
//
//   <start>  --true-->  match_case_*_0  ----------------+
//      |false                                           |
//   match_next_*_0  --true-->  match_case_*_1  ---------+
//      |false                                           |
//     ...                                               v
//   match_next_*_{K-1}  ----------------------->  match_cont_*
//
// condBranch/branch instructions carry only their condition; the edges are
// recorded in each block's predecessor/successor sets.

import { CirError, ErrorCodes, exhaustive } from "../errors.js";
import type { MatchStmt, Pattern, Statement } from "../sirs/types.js";
import { lowerExpression, lowerLiteral } from "./lower-expr.js";
import {
	emit,
	freshBlockId,
	freshTemp,
	type LoweringSession,
	requireBlock,
} from "./session.js";
import {
	addEdge,
	boolConst,
	CirOps,
	type CirValue,
	createBlock,
	primitiveType,
} from "./types.js";

/** Lowers a statement list into the current block. */
export type LowerBodyFn = (s: LoweringSession, body: Statement[]) => void;

//==============================================================================
// Patterns
//==============================================================================

/**
 * Produce the boolean that decides whether `pattern` matches `scrutinee`.
 * Literal patterns compare with `eq`; variable, wildcard, struct and enum
 * patterns always match (sub-fields and tags are not checked).
 */
export function lowerPattern(
	s: LoweringSession,
	pattern: Pattern,
	scrutinee: CirValue,
): CirValue {
	switch (pattern.kind) {
	case "literal": {
		const result = freshTemp(s, primitiveType("i1"));
		emit(s, CirOps.Eq, [scrutinee, lowerLiteral(pattern.value)], result);
		return result;
	}
	case "variable":
	case "wildcard":
	case "struct":
	case "enum":
		return boolConst(true);
	default:
		return exhaustive(pattern);
	}
}

/**
 * Bind the names a pattern introduces. Every name is bound to the whole
 * scrutinee, including names nested in struct and enum patterns.
 */
export function bindPatternVariables(
	s: LoweringSession,
	pattern: Pattern,
	scrutinee: CirValue,
): void {
	switch (pattern.kind) {
	case "variable":
		s.env.set(pattern.name, scrutinee);
		return;
	case "struct":
		for (const field of pattern.fields.values()) {
			bindPatternVariables(s, field, scrutinee);
		}
		return;
	case "enum":
		if (pattern.valuePattern) {
			bindPatternVariables(s, pattern.valuePattern, scrutinee);
		}
		return;
	case "literal":
	case "wildcard":
		return;
	default:
		exhaustive(pattern);
	}
}

//==============================================================================
// Match Statement
//==============================================================================

/**
 * Lower a match statement. Blocks are appended to the current function as
 * case₀, next₀, case₁, next₁, …, continuation, and the continuation becomes
 * the current block.
 */
export function lowerMatch(
	s: LoweringSession,
	stmt: MatchStmt,
	lowerBody: LowerBodyFn,
): void {
	const fn = s.currentFunction;
	if (!fn) {
		throw new CirError(ErrorCodes.UndefinedFunction, "match lowered outside a function body");
	}
	const scrutinee = lowerExpression(s, stmt.value);

	const cont = createBlock(`match_cont_${freshBlockId(s)}`);
	const arms = stmt.cases.map((matchCase, i) => ({
		matchCase,
		body: createBlock(`match_case_${freshBlockId(s)}_${i}`),
		next: createBlock(`match_next_${freshBlockId(s)}_${i}`),
	}));

	let test = requireBlock(s);
	for (const { matchCase, body, next } of arms) {
		s.currentBlock = test;
		const matches = lowerPattern(s, matchCase.pattern, scrutinee);
		emit(s, CirOps.CondBranch, [matches]);
		addEdge(test, body);
		addEdge(test, next);

		s.currentBlock = body;
		bindPatternVariables(s, matchCase.pattern, scrutinee);
		lowerBody(s, matchCase.body);
		const exit = requireBlock(s);
		emit(s, CirOps.Branch, []);
		addEdge(exit, cont);

		test = next;
	}
	// Nothing matched (or no cases): fall through to the continuation
	addEdge(test, cont);

	for (const { body, next } of arms) {
		fn.blocks.push(body, next);
	}
	fn.blocks.push(cont);
	s.currentBlock = cont;
}

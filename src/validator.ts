// SPDX-License-Identifier: MIT
// Planar Diagram Document Validator
// Two-phase validation: Zod safeParse for structure, then index semantics.

import type { z } from "zod/v4";

import {
	invalidResult,
	validResult,
	type ValidationError,
	type ValidationResult,
} from "./errors.js";
import {
	PlanarDocumentSchema,
	type DocExpr,
	type DocIndex,
	type DocStatement,
	type DocTensor,
	type PlanarDocument,
} from "./zod-schemas.js";

export const DEFAULT_BRAIDING_NAME = "τ";

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
	braidingName: string;
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function withPath(state: ValidationState, segments: string[], check: () => void): void {
	state.path.push(...segments);
	check();
	state.path.length -= segments.length;
}

function report(state: ValidationState, message: string, value?: unknown): void {
	state.errors.push(
		value === undefined
			? { path: currentPath(state), message }
			: { path: currentPath(state), message, value },
	);
}

//==============================================================================
// Index Bookkeeping
//==============================================================================

function tensorIndices(t: DocTensor): DocIndex[] {
	return [...t.left, ...(t.right ?? [])];
}

/** Index occurrences of one product term; sums are checked term by term */
function countTermIndices(expr: DocExpr, counts: Map<DocIndex, number>): void {
	switch (expr.kind) {
	case "tensor":
		for (const i of tensorIndices(expr)) counts.set(i, (counts.get(i) ?? 0) + 1);
		return;
	case "conj":
		countTermIndices(expr.arg, counts);
		return;
	case "product":
		for (const f of expr.factors) countTermIndices(f, counts);
		return;
	case "sum": {
		// a nested sum contributes the open legs of its first term
		const first = expr.terms[0];
		if (first === undefined) return;
		const inner = new Map<DocIndex, number>();
		countTermIndices(first.expr, inner);
		for (const [i, n] of inner) {
			if (n === 1) counts.set(i, (counts.get(i) ?? 0) + 1);
		}
		return;
	}
	case "scalar":
		return;
	}
}

function checkBraidingArity(state: ValidationState, expr: DocExpr): void {
	switch (expr.kind) {
	case "tensor":
		if (expr.object === state.braidingName &&
			(expr.left.length !== 2 || (expr.right ?? []).length !== 2)) {
			report(state, "braiding " + state.braidingName + " needs two output and two input indices");
		}
		return;
	case "conj":
		withPath(state, ["arg"], () => { checkBraidingArity(state, expr.arg); });
		return;
	case "product":
		expr.factors.forEach((f, i) => {
			withPath(state, ["factors", String(i)], () => { checkBraidingArity(state, f); });
		});
		return;
	case "sum":
		expr.terms.forEach((t, i) => {
			withPath(state, ["terms", String(i), "expr"], () => { checkBraidingArity(state, t.expr); });
		});
		return;
	case "scalar":
		return;
	}
}

/**
 * Every index of a term occurs once (free) or twice (contracted), and the
 * free ones are exactly the left-hand side's.
 */
function checkTermIndices(state: ValidationState, expr: DocExpr, outgoing: readonly DocIndex[] | undefined): void {
	if (expr.kind === "sum") {
		expr.terms.forEach((t, i) => {
			withPath(state, ["terms", String(i), "expr"], () => { checkTermIndices(state, t.expr, outgoing); });
		});
		return;
	}
	const counts = new Map<DocIndex, number>();
	countTermIndices(expr, counts);
	for (const [index, n] of counts) {
		if (n > 2) report(state, "index " + String(index) + " appears " + String(n) + " times", index);
	}
	if (outgoing === undefined) return;
	for (const [index, n] of counts) {
		if (n === 1 && !outgoing.includes(index)) {
			report(state, "free index " + String(index) + " is missing from the left-hand side", index);
		}
	}
	for (const index of outgoing) {
		if (counts.get(index) !== 1) {
			report(state, "left-hand side index " + String(index) + " is not a free index of the right-hand side", index);
		}
	}
}

function checkStatement(state: ValidationState, node: DocStatement): void {
	switch (node.kind) {
	case "assign": {
		const outgoing = node.lhs.kind === "tensor" ? tensorIndices(node.lhs) : [];
		if (new Set(outgoing).size !== outgoing.length) {
			withPath(state, ["lhs"], () => { report(state, "left-hand side repeats an index"); });
		}
		withPath(state, ["rhs"], () => {
			checkBraidingArity(state, node.rhs);
			checkTermIndices(state, node.rhs, outgoing);
		});
		return;
	}
	case "block":
		node.body.forEach((s, i) => {
			withPath(state, ["body", String(i)], () => { checkStatement(state, s); });
		});
		return;
	case "annotated":
		return;
	default:
		checkBraidingArity(state, node);
		checkTermIndices(state, node, undefined);
	}
}

//==============================================================================
// Public Validator
//==============================================================================

export function validateDocument(doc: unknown): ValidationResult<PlanarDocument> {
	// Phase 1: Structural validation via Zod
	const parsed = PlanarDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<PlanarDocument>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	const state: ValidationState = {
		errors: [],
		path: ["program"],
		braidingName: parsed.data.braidingName ?? DEFAULT_BRAIDING_NAME,
	};
	checkStatement(state, parsed.data.program);
	if (state.errors.length > 0) {
		return invalidResult<PlanarDocument>(state.errors);
	}
	return validResult(parsed.data);
}

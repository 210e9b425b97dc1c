// SPDX-License-Identifier: MIT
// Structural queries and rewrites over tensor expressions

import { exhaustive } from "../errors.js";
import type { Index, Statement, TensorExpr, TensorTerm } from "../types.js";

//==============================================================================
// Queries
//==============================================================================

/** Every tensor term of an expression, left to right */
export function collectTensors(expr: TensorExpr): TensorTerm[] {
	switch (expr.kind) {
	case "tensor":
		return [expr];
	case "scalar":
		return [];
	case "conj":
		return collectTensors(expr.arg);
	case "product":
		return [...collectTensors(expr.left), ...collectTensors(expr.right)];
	case "sum":
		return expr.terms.flatMap((t) => collectTensors(t.expr));
	default:
		return exhaustive(expr);
	}
}

/** True when the expression contains no tensor term at all */
export function isScalarExpr(expr: TensorExpr): boolean {
	return collectTensors(expr).length === 0;
}

/** True when the expression contains at least one tensor term */
export function isTensorExpression(expr: TensorExpr): boolean {
	return !isScalarExpr(expr);
}

/**
 * A general tensor is a single tensor term, possibly multiplied by scalar
 * factors on either side.
 */
export interface GeneralTensor {
	term: TensorTerm;
	scalars: TensorExpr[];
}

export function decomposeGeneralTensor(expr: TensorExpr): GeneralTensor | undefined {
	if (expr.kind === "tensor") {
		return { term: expr, scalars: [] };
	}
	if (expr.kind !== "product") {
		return undefined;
	}
	if (isScalarExpr(expr.left)) {
		const inner = decomposeGeneralTensor(expr.right);
		return inner && { term: inner.term, scalars: [expr.left, ...inner.scalars] };
	}
	if (isScalarExpr(expr.right)) {
		const inner = decomposeGeneralTensor(expr.left);
		return inner && { term: inner.term, scalars: [...inner.scalars, expr.right] };
	}
	return undefined;
}

/** True when some index occurs twice on the same term (a self-trace) */
export function hasTraceIndices(term: TensorTerm): boolean {
	const all = [...term.left, ...term.right];
	return new Set(all).size !== all.length;
}

/** All legs of a term in planar reading order: left, then right reversed */
export function planarOrder(term: TensorTerm): Index[] {
	return [...term.left, ...[...term.right].reverse()];
}

/** Count every index occurrence in an expression */
export function countIndices(expr: TensorExpr): Map<Index, number> {
	const counts = new Map<Index, number>();
	for (const term of collectTensors(expr)) {
		for (const i of [...term.left, ...term.right]) {
			counts.set(i, (counts.get(i) ?? 0) + 1);
		}
	}
	return counts;
}

/** Indices occurring exactly once in a product term (its open legs) */
export function freeIndices(expr: TensorExpr): Index[] {
	if (expr.kind === "sum") {
		const first = expr.terms[0];
		return first ? freeIndices(first.expr) : [];
	}
	const free: Index[] = [];
	for (const [i, n] of countIndices(expr)) {
		if (n === 1) free.push(i);
	}
	return free;
}

//==============================================================================
// Rewrites
//==============================================================================

export type TermMapper = (term: TensorTerm) => TensorTerm;

/** Rebuild an expression with every tensor term replaced through `fn` */
export function mapTerms(expr: TensorExpr, fn: TermMapper): TensorExpr {
	switch (expr.kind) {
	case "tensor":
		return fn(expr);
	case "scalar":
		return expr;
	case "conj":
		return { kind: "conj", arg: mapTerms(expr.arg, fn) };
	case "product":
		return { kind: "product", left: mapTerms(expr.left, fn), right: mapTerms(expr.right, fn) };
	case "sum":
		return { kind: "sum", terms: expr.terms.map((t) => ({ sign: t.sign, expr: mapTerms(t.expr, fn) })) };
	default:
		return exhaustive(expr);
	}
}

/**
 * Rebuild a statement with every tensor term (left-hand sides included)
 * replaced through `fn`. Annotated blocks are left alone.
 */
export function mapStatementTerms(node: Statement, fn: TermMapper): Statement {
	switch (node.kind) {
	case "assign":
		return {
			...node,
			lhs: node.lhs.kind === "tensor" ? fn(node.lhs) : node.lhs,
			rhs: mapTerms(node.rhs, fn),
		};
	case "block":
		return { ...node, body: node.body.map((s) => mapStatementTerms(s, fn)) };
	case "annotated":
	case "braiding":
		return node;
	default:
		return mapTerms(node, fn);
	}
}

/** Substitute indices throughout a statement */
export function replaceIndices(node: Statement, fn: (i: Index) => Index): Statement {
	return mapStatementTerms(node, (t) => ({
		...t,
		left: t.left.map(fn),
		right: t.right.map(fn),
	}));
}

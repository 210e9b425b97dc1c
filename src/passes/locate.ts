// SPDX-License-Identifier: MIT
// Index lookup and braiding purge

import { PlanarError, exhaustive } from "../errors.js";
import { formatExpr, formatTerm } from "../format.js";
import type { Index, ObjectRef, Statement, TensorExpr, TensorTerm } from "../types.js";
import { isNamed } from "../types.js";

//==============================================================================
// Locate
//==============================================================================

export interface IndexLocation {
	object: ObjectRef;
	adjoint: boolean;
	/** 0-based leg position; right legs follow the left legs */
	leg: number;
}

/**
 * Find the term carrying `index`, searching its left legs before its right
 * legs. `undefined` means the index is external or not placed yet.
 */
export function locateIndex(index: Index, terms: readonly TensorTerm[]): IndexLocation | undefined {
	for (const t of terms) {
		const l = t.left.indexOf(index);
		if (l !== -1) return { object: t.object, adjoint: t.adjoint, leg: l };
		const r = t.right.indexOf(index);
		if (r !== -1) return { object: t.object, adjoint: t.adjoint, leg: r + t.left.length };
	}
	return undefined;
}

//==============================================================================
// Purge
//==============================================================================

function isBraiding(expr: TensorExpr, braidingName: string): expr is TensorTerm {
	return expr.kind === "tensor" && isNamed(expr.object, braidingName);
}

/** A crossing can only be dropped when its legs are mutually transposed */
function assertRemovable(term: TensorTerm): void {
	const [l1, l2] = term.left;
	const [r1, r2] = term.right;
	if (term.left.length !== 2 || term.right.length !== 2 || l1 !== r2 || l2 !== r1) {
		throw PlanarError.unsafeBraidingRemoval(formatTerm(term));
	}
}

function purgeExpr(expr: TensorExpr, braidingName: string): TensorExpr {
	switch (expr.kind) {
	case "tensor":
		if (isBraiding(expr, braidingName)) {
			// a lone crossing has no neighbour to hand its legs to
			throw PlanarError.unsafeBraidingRemoval(formatTerm(expr));
		}
		return expr;
	case "scalar":
		return expr;
	case "conj":
		return { kind: "conj", arg: purgeExpr(expr.arg, braidingName) };
	case "product": {
		if (isBraiding(expr.left, braidingName)) {
			if (isBraiding(expr.right, braidingName)) {
				// nothing would be left to carry the legs
				throw PlanarError.unsafeBraidingRemoval(formatExpr(expr));
			}
			assertRemovable(expr.left);
			return purgeExpr(expr.right, braidingName);
		}
		if (isBraiding(expr.right, braidingName)) {
			assertRemovable(expr.right);
			return purgeExpr(expr.left, braidingName);
		}
		return {
			kind: "product",
			left: purgeExpr(expr.left, braidingName),
			right: purgeExpr(expr.right, braidingName),
		};
	}
	case "sum":
		return { kind: "sum", terms: expr.terms.map((t) => ({ sign: t.sign, expr: purgeExpr(t.expr, braidingName) })) };
	default:
		return exhaustive(expr);
	}
}

/**
 * Remove crossing placeholders from the products of a statement. Refuses any
 * placeholder whose removal would change the value of the expression.
 */
export function purgeBraidings(node: Statement, braidingName: string): Statement {
	switch (node.kind) {
	case "assign":
		return { ...node, rhs: purgeExpr(node.rhs, braidingName) };
	case "block":
		return { ...node, body: node.body.map((s) => purgeBraidings(s, braidingName)) };
	case "annotated":
	case "braiding":
		return node;
	default:
		return purgeExpr(node, braidingName);
	}
}

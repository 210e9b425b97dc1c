// SPDX-License-Identifier: MIT
// Conjugation normalization
//
// conj(A[l; r]) is the adjoint A'[r; l]. Conjugation distributes over sums and
// products, so after this pass conj only ever wraps scalar expressions.

import { exhaustive } from "../errors.js";
import { isScalarExpr } from "../analysis/tensors.js";
import type { Statement, TensorExpr } from "../types.js";

/** Conjugate an expression, pushing the conjugation down to its leaves */
function conjugate(expr: TensorExpr): TensorExpr {
	switch (expr.kind) {
	case "tensor":
		return { ...expr, adjoint: !expr.adjoint, left: expr.right, right: expr.left };
	case "scalar":
		return { kind: "conj", arg: expr };
	case "conj":
		return normalizeExpr(expr.arg);
	case "product":
		return { kind: "product", left: conjugate(expr.left), right: conjugate(expr.right) };
	case "sum":
		return { kind: "sum", terms: expr.terms.map((t) => ({ sign: t.sign, expr: conjugate(t.expr) })) };
	default:
		return exhaustive(expr);
	}
}

function normalizeExpr(expr: TensorExpr): TensorExpr {
	switch (expr.kind) {
	case "tensor":
	case "scalar":
		return expr;
	case "conj":
		return isScalarExpr(expr.arg) && expr.arg.kind !== "conj"
			? { kind: "conj", arg: normalizeExpr(expr.arg) }
			: conjugate(expr.arg);
	case "product":
		return { kind: "product", left: normalizeExpr(expr.left), right: normalizeExpr(expr.right) };
	case "sum":
		return { kind: "sum", terms: expr.terms.map((t) => ({ sign: t.sign, expr: normalizeExpr(t.expr) })) };
	default:
		return exhaustive(expr);
	}
}

/**
 * Replace every conjugated tensor reference by its adjoint-tagged form.
 * Applying it twice gives the same tree as applying it once.
 */
export function normalizeAdjoints(node: Statement): Statement {
	switch (node.kind) {
	case "assign":
		return { ...node, rhs: normalizeExpr(node.rhs) };
	case "block":
		return { ...node, body: node.body.map(normalizeAdjoints) };
	case "annotated":
	case "braiding":
		return node;
	default:
		return normalizeExpr(node);
	}
}

// SPDX-License-Identifier: MIT
// Document desugaring
// Turns a validated JSON diagram document into the expression tree.

import {
	named,
	product,
	type AssignmentNode,
	type ScalarTerm,
	type Statement,
	type TensorExpr,
	type TensorTerm,
} from "./types.js";
import type {
	DocExpr,
	DocScalar,
	DocStatement,
	DocTensor,
	PlanarDocument,
} from "./zod-schemas.js";

function desugarTensor(t: DocTensor): TensorTerm {
	return {
		kind: "tensor",
		object: named(t.object),
		adjoint: t.adjoint ?? false,
		left: [...t.left],
		right: [...(t.right ?? [])],
	};
}

function desugarScalar(s: DocScalar): ScalarTerm {
	return { kind: "scalar", value: s.value };
}

export function desugarExpr(expr: DocExpr): TensorExpr {
	switch (expr.kind) {
	case "tensor":
		return desugarTensor(expr);
	case "scalar":
		return desugarScalar(expr);
	case "conj":
		return { kind: "conj", arg: desugarExpr(expr.arg) };
	case "sum":
		return {
			kind: "sum",
			terms: expr.terms.map((t) => ({ sign: t.sign, expr: desugarExpr(t.expr) })),
		};
	case "product": {
		const [first, ...rest] = expr.factors.map(desugarExpr);
		if (first === undefined) return { kind: "scalar", value: 1 };
		return product(first, ...rest);
	}
	}
}

export function desugarStatement(node: DocStatement): Statement {
	switch (node.kind) {
	case "assign": {
		const assignment: AssignmentNode = {
			kind: "assign",
			lhs: node.lhs.kind === "tensor" ? desugarTensor(node.lhs) : desugarScalar(node.lhs),
			rhs: desugarExpr(node.rhs),
			definition: node.definition ?? false,
		};
		return assignment;
	}
	case "block": {
		const body = node.body.map(desugarStatement);
		return node.header === undefined ? { kind: "block", body } : { kind: "block", header: node.header, body };
	}
	case "annotated":
		return { kind: "annotated", annotation: node.annotation, body: node.body.map(desugarStatement) };
	default:
		return desugarExpr(node);
	}
}

/** The program of a document as an expression tree */
export function desugarDocument(doc: PlanarDocument): Statement {
	return desugarStatement(doc.program);
}

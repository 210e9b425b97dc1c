// SPDX-License-Identifier: MIT
// Textual rendering of expression trees and contraction plans

import { exhaustive } from "./errors.js";
import type {
	ContractionPlan,
	Index,
	LocalEntry,
	ObjectRef,
	SpaceRef,
	Statement,
	TensorExpr,
	TensorTerm,
} from "./types.js";

export type LocalNamer = (handle: number) => string;

const defaultNamer: LocalNamer = (handle) => "%" + String(handle);

/** Namer that reads display names out of an arena snapshot */
export function namerFor(locals: readonly LocalEntry[]): LocalNamer {
	return (handle) => locals[handle]?.name ?? defaultNamer(handle);
}

function formatObject(object: ObjectRef, namer: LocalNamer): string {
	return object.kind === "named" ? object.name : namer(object.handle);
}

function formatIndices(indices: readonly Index[]): string {
	return indices.map(String).join(" ");
}

export function formatTerm(term: TensorTerm, namer: LocalNamer = defaultNamer): string {
	const right = term.right.length > 0 ? " " + formatIndices(term.right) : "";
	return formatObject(term.object, namer) +
		(term.adjoint ? "'" : "") +
		"[" + formatIndices(term.left) + ";" + right + "]";
}

function formatSpace(ref: SpaceRef, namer: LocalNamer): string {
	return "space(" +
		formatObject(ref.object, namer) +
		(ref.adjoint ? "'" : "") +
		", " + String(ref.leg) + ")" +
		(ref.dual ? "'" : "");
}

function formatFactor(expr: TensorExpr, namer: LocalNamer): string {
	const text = formatExpr(expr, namer);
	return expr.kind === "sum" ? "(" + text + ")" : text;
}

export function formatExpr(expr: TensorExpr, namer: LocalNamer = defaultNamer): string {
	switch (expr.kind) {
	case "tensor":
		return formatTerm(expr, namer);
	case "scalar":
		return String(expr.value);
	case "conj":
		return "conj(" + formatExpr(expr.arg, namer) + ")";
	case "product":
		return formatFactor(expr.left, namer) + " * " + formatFactor(expr.right, namer);
	case "sum":
		return expr.terms.map((t, i) => {
			const text = formatFactor(t.expr, namer);
			if (i === 0) return t.sign === "-" ? "-" + text : text;
			return (t.sign === "-" ? " - " : " + ") + text;
		}).join("");
	default:
		return exhaustive(expr);
	}
}

function indent(text: string): string {
	return text.split("\n").map((line) => "    " + line).join("\n");
}

/** Render any statement; nested bodies are indented and closed with `end` */
export function formatNode(node: Statement, namer: LocalNamer = defaultNamer): string {
	switch (node.kind) {
	case "assign":
		return (node.lhs.kind === "tensor" ? formatTerm(node.lhs, namer) : String(node.lhs.value)) +
			(node.definition ? " := " : " = ") +
			formatExpr(node.rhs, namer);
	case "block": {
		const body = node.body.map((s) => formatNode(s, namer)).join("\n");
		if (node.header === undefined) return body;
		return node.header + "\n" + indent(body) + "\nend";
	}
	case "annotated":
		return "@" + node.annotation + " begin\n" +
			indent(node.body.map((s) => formatNode(s, namer)).join("\n")) +
			"\nend";
	case "braiding":
		return namer(node.handle) +
			" = braiding(" +
			node.spaces.map((s) => formatSpace(s, namer)).join(", ") +
			")";
	default:
		return formatExpr(node, namer);
	}
}

/** Render a complete plan: bindings, arity checks, program and write-backs */
export function formatPlan(plan: ContractionPlan): string {
	const namer = namerFor(plan.locals);
	const lines: string[] = [];
	for (const b of plan.bindings) {
		if (!b.isNew) lines.push("bind " + namer(b.handle) + " <- " + b.name);
	}
	for (const c of plan.checks) {
		lines.push(
			"check " + c.name + ": (numout, numin) == (" +
				String(c.numout) + ", " + String(c.numin) + ")",
		);
	}
	const program = formatNode(plan.program, namer);
	if (program.length > 0) lines.push(program);
	for (const b of plan.bindings) {
		if (b.isOutput) lines.push("store " + b.name + " <- " + namer(b.handle));
	}
	return lines.join("\n");
}

// SPDX-License-Identifier: MIT
// Planar contraction decomposition
//
// Lowers sums of products of general tensors into binary contractions whose
// intermediate results (temporaries) have a leg order that keeps every later
// contraction planar.

import { PlanarError } from "../errors.js";
import { formatExpr, type LocalNamer } from "../format.js";
import { isCyclicPermutation, possiblePlanarComplements, possiblePlanarIndices } from "../analysis/cyclic.js";
import type { PlanarComplement } from "../analysis/cyclic.js";
import {
	decomposeGeneralTensor,
	hasTraceIndices,
	isScalarExpr,
	isTensorExpression,
} from "../analysis/tensors.js";
import type { LocalArena } from "../temporaries.js";
import type {
	AssignmentNode,
	Index,
	ProductNode,
	Statement,
	TensorExpr,
	TensorTerm,
} from "../types.js";
import { sameIndices } from "../types.js";

//==============================================================================
// Targets and Context
//==============================================================================

/**
 * Required leg order of a (sub)expression. A declared target is an existing
 * left-hand side and must be met exactly; a suggested target is the preferred
 * order of a temporary that does not exist yet.
 */
export interface Target {
	kind: "declared" | "suggested";
	left: Index[];
	right: Index[];
}

export const declared = (left: Index[], right: Index[]): Target => ({ kind: "declared", left, right });
export const suggested = (left: Index[], right: Index[]): Target => ({ kind: "suggested", left, right });

export interface DecomposeContext {
	arena: LocalArena;
	/** Temporary definitions emitted so far, in execution order */
	pre: AssignmentNode[];
}

const reversed = <T>(items: readonly T[]): T[] => [...items].reverse();

function namerOf(ctx: DecomposeContext): LocalNamer {
	return (h) => ctx.arena.nameOf(h);
}

/** Emit `tmp[left; right] := rhs` and return the temporary's term */
function temporary(ctx: DecomposeContext, left: Index[], right: Index[], rhs: TensorExpr): TensorTerm {
	const object = ctx.arena.allocate("temporary");
	const lhs: TensorTerm = { kind: "tensor", object, adjoint: false, left, right };
	ctx.pre.push({ kind: "assign", lhs, rhs, definition: true });
	return lhs;
}

//==============================================================================
// Binary Products
//==============================================================================

function findPlanarMatch(expr: ProductNode, order: readonly Index[]): PlanarComplement | undefined {
	for (const ind1 of possiblePlanarIndices(expr.left)) {
		for (const ind2 of possiblePlanarIndices(expr.right)) {
			for (const c of possiblePlanarComplements(ind1, ind2)) {
				if (isCyclicPermutation([...c.open1, ...c.open2], order)) return c;
			}
		}
	}
	return undefined;
}

/** Lower an operand; anything that is not a single general tensor becomes a temporary */
function lowerOperand(expr: TensorExpr, target: Target, ctx: DecomposeContext): TensorExpr {
	const lowered = extractContractionPairs(expr, target, ctx);
	if (isScalarExpr(lowered) || decomposeGeneralTensor(lowered) !== undefined) {
		return lowered;
	}
	return temporary(ctx, target.left, target.right, lowered);
}

function extractProduct(expr: ProductNode, target: Target, ctx: DecomposeContext): TensorExpr {
	const match = findPlanarMatch(expr, [...target.left, ...reversed(target.right)]);
	if (match === undefined) {
		throw PlanarError.nonPlanar(formatExpr(expr, namerOf(ctx)));
	}
	let { open1: o1, open2: o2 } = match;
	const { contracted1: c1, contracted2: c2 } = match;

	let a1: TensorExpr;
	let a2: TensorExpr;
	if (o2.every((i) => target.left.includes(i)) && o1.every((i) => target.right.includes(i))) {
		// the right operand supplies the target's leading legs
		a1 = lowerOperand(expr.right, suggested(o2, reversed(c2)), ctx);
		a2 = lowerOperand(expr.left, suggested(c1, reversed(o1)), ctx);
		[o1, o2] = [o2, o1];
	} else {
		a1 = lowerOperand(expr.left, suggested(o1, reversed(c1)), ctx);
		a2 = lowerOperand(expr.right, suggested(c2, reversed(o2)), ctx);
	}

	if (isScalarExpr(a1) || isScalarExpr(a2)) {
		const scaled: TensorExpr = { kind: "product", left: a1, right: a2 };
		return target.kind === "suggested" ? temporary(ctx, o1, reversed(o2), scaled) : scaled;
	}

	// suggestions are not binding: re-derive the split from the actual legs
	const g1 = decomposeGeneralTensor(a1);
	const g2 = decomposeGeneralTensor(a2);
	if (g1 === undefined || g2 === undefined) {
		throw PlanarError.unknownExpression(formatExpr(expr, namerOf(ctx)));
	}
	if (o1.every((i) => g1.term.right.includes(i)) && o2.every((i) => g2.term.left.includes(i))) {
		[a1, a2] = [a2, a1];
		[o1, o2] = [o2, o1];
	}

	if (target.kind === "suggested") {
		return temporary(ctx, o1, reversed(o2), { kind: "product", left: a1, right: a2 });
	}
	if (sameIndices(target.left, o1) && sameIndices(target.right, reversed(o2))) {
		return { kind: "product", left: a1, right: a2 };
	}
	if (sameIndices(target.left, o2) && sameIndices(target.right, reversed(o1))) {
		return { kind: "product", left: a2, right: a1 };
	}
	return temporary(ctx, o1, reversed(o2), { kind: "product", left: a1, right: a2 });
}

//==============================================================================
// Expression Lowering
//==============================================================================

/**
 * Decompose `rhs` into elementary binary contractions of tensors without
 * inner traces, appending temporaries to `ctx.pre`. Returns the lowered
 * expression, whose leg order meets `target` up to rotation.
 */
export function extractContractionPairs(rhs: TensorExpr, target: Target, ctx: DecomposeContext): TensorExpr {
	if (isScalarExpr(rhs)) {
		return rhs;
	}
	const general = decomposeGeneralTensor(rhs);
	if (general !== undefined) {
		return hasTraceIndices(general.term) && target.kind === "suggested"
			? temporary(ctx, target.left, target.right, rhs)
			: rhs;
	}
	switch (rhs.kind) {
	case "product":
		return extractProduct(rhs, target, ctx);
	case "sum":
		return {
			kind: "sum",
			terms: rhs.terms.map((t) => ({ sign: t.sign, expr: extractContractionPairs(t.expr, target, ctx) })),
		};
	default:
		throw PlanarError.unknownExpression(formatExpr(rhs, namerOf(ctx)));
	}
}

//==============================================================================
// Statement Lowering
//==============================================================================

function withTemporaries(pre: AssignmentNode[], statement: Statement): Statement {
	return pre.length === 0 ? statement : { kind: "block", body: [...pre, statement] };
}

/** Header-less blocks are plain sequences and merge into their parent */
export function flattenBlocks(body: readonly Statement[]): Statement[] {
	return body.flatMap((s) => (s.kind === "block" && s.header === undefined ? flattenBlocks(s.body) : [s]));
}

/**
 * Lower every tensor statement of `node` into binary contractions. Temporary
 * definitions are placed right before the statement that consumes them.
 */
export function decomposeContractions(node: Statement, arena: LocalArena): Statement {
	switch (node.kind) {
	case "annotated":
	case "braiding":
		return node;
	case "block": {
		const body = flattenBlocks(node.body.map((s) => decomposeContractions(s, arena)));
		return node.header === undefined ? { kind: "block", body } : { kind: "block", header: node.header, body };
	}
	case "assign": {
		if (!isTensorExpression(node.rhs)) return node;
		const ctx: DecomposeContext = { arena, pre: [] };
		const target = node.lhs.kind === "tensor"
			? declared(node.lhs.left, node.lhs.right)
			: declared([], []);
		const rhs = extractContractionPairs(node.rhs, target, ctx);
		return withTemporaries(ctx.pre, { ...node, rhs });
	}
	default: {
		if (!isTensorExpression(node)) return node;
		const ctx: DecomposeContext = { arena, pre: [] };
		const [order] = possiblePlanarIndices(node);
		if (order === undefined) {
			throw PlanarError.nonPlanar(formatExpr(node, namerOf(ctx)));
		}
		const lowered = extractContractionPairs(node, suggested(order, []), ctx);
		return withTemporaries(ctx.pre, lowered);
	}
	}
}

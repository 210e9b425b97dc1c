// SPDX-License-Identifier: MIT
// Planar index-ordering search
//
// An ordering lists the open legs of a (sub)diagram in the cyclic order in
// which they meet its boundary. Only rotations are allowed, never reversal.

import { PlanarError } from "../errors.js";
import { formatExpr } from "../format.js";
import type { Index, TensorExpr } from "../types.js";
import { decomposeGeneralTensor, isScalarExpr, planarOrder } from "./tensors.js";

//==============================================================================
// Cyclic Sequences
//==============================================================================

export function rotate<T>(items: readonly T[], shift: number): T[] {
	const n = items.length;
	if (n === 0) return [];
	const k = ((shift % n) + n) % n;
	return [...items.slice(k), ...items.slice(0, k)];
}

/** True when `a` is a rotation of `b` */
export function isCyclicPermutation(a: readonly Index[], b: readonly Index[]): boolean {
	if (a.length !== b.length) return false;
	if (a.length === 0) return true;
	for (let k = 0; k < a.length; k++) {
		if (rotate(a, k).every((x, i) => x === b[i])) return true;
	}
	return false;
}

function hasDuplicates(indices: readonly Index[]): boolean {
	return new Set(indices).size !== indices.length;
}

/**
 * Strip planar self-traces: repeatedly drop pairs of equal indices that are
 * neighbours in the cyclic order. Non-adjacent duplicates are left in place.
 */
export function planarUnique(indices: readonly Index[]): Index[] {
	const oind = [...indices];
	let removing = true;
	while (removing) {
		removing = false;
		const n = oind.length;
		for (let i = 0; i < n && n > 1; i++) {
			const j = (i + 1) % n;
			if (oind[i] === oind[j]) {
				// remove the higher position first so the lower one stays valid
				oind.splice(Math.max(i, j), 1);
				oind.splice(Math.min(i, j), 1);
				removing = true;
				break;
			}
		}
	}
	return oind;
}

//==============================================================================
// Binary Complements
//==============================================================================

/**
 * One way of gluing two planar operands: `ind1` read as `open1 ++ contracted1`,
 * `ind2` read as `contracted2 ++ open2`, with `contracted2` the reverse of
 * `contracted1`. The glued boundary reads `open1 ++ open2`.
 */
export interface PlanarComplement {
	open1: Index[];
	open2: Index[];
	contracted1: Index[];
	contracted2: Index[];
}

export function possiblePlanarComplements(
	ind1: readonly Index[],
	ind2: readonly Index[],
): PlanarComplement[] {
	if (ind1.length === 0 || ind2.length === 0) {
		return [{ open1: [...ind1], open2: [...ind2], contracted1: [], contracted2: [] }];
	}
	const shared = new Set(ind1.filter((i) => ind2.includes(i)));
	if (shared.size === 0) {
		// disconnected operands can be placed side by side at any rotation
		const all: PlanarComplement[] = [];
		for (let i = 0; i < ind1.length; i++) {
			for (let j = 0; j < ind2.length; j++) {
				all.push({ open1: rotate(ind1, i), open2: rotate(ind2, j), contracted1: [], contracted2: [] });
			}
		}
		return all;
	}
	const k = shared.size;
	for (let i = 0; i < ind1.length; i++) {
		const rot1 = rotate(ind1, i);
		const contracted1 = rot1.slice(ind1.length - k);
		if (!contracted1.every((x) => shared.has(x))) continue;
		const contracted2 = [...contracted1].reverse();
		for (let j = 0; j < ind2.length; j++) {
			const rot2 = rotate(ind2, j);
			if (contracted2.every((x, p) => rot2[p] === x)) {
				return [{
					open1: rot1.slice(0, ind1.length - k),
					open2: rot2.slice(k),
					contracted1,
					contracted2,
				}];
			}
		}
	}
	return [];
}

//==============================================================================
// Admissible Orderings
//==============================================================================

/**
 * Every cyclic ordering of the open legs under which `expr` can be drawn
 * without crossings. An empty result means the expression is not planar.
 */
export function possiblePlanarIndices(expr: TensorExpr): Index[][] {
	if (isScalarExpr(expr)) {
		return [[]];
	}
	const general = decomposeGeneralTensor(expr);
	if (general !== undefined) {
		const ind = planarUnique(planarOrder(general.term));
		return hasDuplicates(ind) ? [] : [ind];
	}
	switch (expr.kind) {
	case "product": {
		const inds: Index[][] = [];
		for (const ind1 of possiblePlanarIndices(expr.left)) {
			for (const ind2 of possiblePlanarIndices(expr.right)) {
				for (const c of possiblePlanarComplements(ind1, ind2)) {
					inds.push([...c.open1, ...c.open2]);
				}
			}
		}
		return inds;
	}
	case "sum": {
		const [first, ...rest] = expr.terms;
		if (first === undefined) return [[]];
		let inds = possiblePlanarIndices(first.expr);
		for (const t of rest) {
			const other = possiblePlanarIndices(t.expr);
			inds = inds.filter((ind) => other.some((o) => isCyclicPermutation(o, ind)));
		}
		return inds;
	}
	default:
		throw PlanarError.unknownExpression(formatExpr(expr));
	}
}

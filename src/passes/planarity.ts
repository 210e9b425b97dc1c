// SPDX-License-Identifier: MIT
// Planarity check
//
// An assignment is planar when some admissible ordering of its right-hand side
// is a rotation of the left-hand side's order (left legs, then right legs
// reversed).

import { PlanarError } from "../errors.js";
import { formatExpr, formatNode, type LocalNamer } from "../format.js";
import { isCyclicPermutation, possiblePlanarIndices } from "../analysis/cyclic.js";
import { isTensorExpression } from "../analysis/tensors.js";
import type { AssignmentNode, Index, Statement } from "../types.js";

function targetOrder(node: AssignmentNode, namer?: LocalNamer): Index[] {
	if (node.lhs.kind !== "tensor") return [];
	const [order, ...others] = possiblePlanarIndices(node.lhs);
	if (order === undefined || others.length > 0) {
		throw PlanarError.nonPlanar(formatNode(node.lhs, namer));
	}
	return order;
}

function checkAssignment(node: AssignmentNode, namer?: LocalNamer): void {
	if (!isTensorExpression(node.rhs)) return;
	const target = targetOrder(node, namer);
	const candidates = possiblePlanarIndices(node.rhs);
	if (candidates.length === 0) {
		throw PlanarError.nonPlanar(formatExpr(node.rhs, namer));
	}
	if (!candidates.some((ind) => isCyclicPermutation(ind, target))) {
		throw PlanarError.nonPlanar(formatNode(node, namer));
	}
}

/**
 * Reject any assignment whose right-hand side cannot be drawn without
 * crossings in the left-hand side's cyclic order. Returns the node unchanged.
 */
export function checkPlanarity(node: Statement, namer?: LocalNamer): Statement {
	switch (node.kind) {
	case "assign":
		checkAssignment(node, namer);
		break;
	case "block":
		for (const s of node.body) checkPlanarity(s, namer);
		break;
	default:
		break;
	}
	return node;
}

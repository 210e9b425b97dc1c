// SPDX-License-Identifier: MIT
// Planar ordering search - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	isCyclicPermutation,
	planarUnique,
	possiblePlanarComplements,
	possiblePlanarIndices,
	rotate,
} from "../src/analysis/cyclic.js";
import { ErrorCodes, PlanarError } from "../src/errors.js";
import { conj, minus, product, scalar, sum, tensor } from "../src/types.js";

describe("rotate", () => {
	it("shifts left by a positive amount", () => {
		assert.deepEqual(rotate([1, 2, 3], 1), [2, 3, 1]);
	});

	it("wraps negative shifts", () => {
		assert.deepEqual(rotate([1, 2, 3], -1), [3, 1, 2]);
	});

	it("returns an empty list for an empty input", () => {
		assert.deepEqual(rotate([], 2), []);
	});
});

describe("isCyclicPermutation", () => {
	it("accepts rotations", () => {
		assert.equal(isCyclicPermutation(["a", "b", "c"], ["c", "a", "b"]), true);
	});

	it("rejects reversals", () => {
		assert.equal(isCyclicPermutation(["a", "b", "c"], ["c", "b", "a"]), false);
	});

	it("rejects lists of different length", () => {
		assert.equal(isCyclicPermutation(["a", "b"], ["a", "b", "c"]), false);
	});

	it("treats two empty orderings as equal", () => {
		assert.equal(isCyclicPermutation([], []), true);
	});
});

describe("planarUnique", () => {
	it("removes a neighbouring pair", () => {
		assert.deepEqual(planarUnique(["a", "x", "x", "b"]), ["a", "b"]);
	});

	it("removes a pair that wraps around the end", () => {
		assert.deepEqual(planarUnique(["x", "a", "b", "x"]), ["a", "b"]);
	});

	it("keeps non-adjacent duplicates", () => {
		assert.deepEqual(planarUnique(["a", "x", "b", "x"]), ["a", "x", "b", "x"]);
	});

	it("removes nested traces one layer at a time", () => {
		assert.deepEqual(planarUnique(["a", "x", "y", "y", "x"]), ["a"]);
	});
});

describe("possiblePlanarComplements", () => {
	it("splits a single shared leg", () => {
		assert.deepEqual(possiblePlanarComplements(["a", "x"], ["x", "b"]), [
			{ open1: ["a"], open2: ["b"], contracted1: ["x"], contracted2: ["x"] },
		]);
	});

	it("requires the shared legs to meet in reverse order", () => {
		assert.deepEqual(possiblePlanarComplements(["a", "x", "y"], ["y", "x", "b"]), [
			{ open1: ["a"], open2: ["b"], contracted1: ["x", "y"], contracted2: ["y", "x"] },
		]);
	});

	it("finds nothing when the shared legs would cross", () => {
		assert.deepEqual(possiblePlanarComplements(["a", "x", "y"], ["x", "y", "b"]), []);
	});

	it("offers every rotation pair for disconnected operands", () => {
		assert.deepEqual(possiblePlanarComplements(["a"], ["b", "c"]), [
			{ open1: ["a"], open2: ["b", "c"], contracted1: [], contracted2: [] },
			{ open1: ["a"], open2: ["c", "b"], contracted1: [], contracted2: [] },
		]);
	});

	it("returns the single trivial split when one side has no legs", () => {
		assert.deepEqual(possiblePlanarComplements([], ["b"]), [
			{ open1: [], open2: ["b"], contracted1: [], contracted2: [] },
		]);
	});
});

describe("possiblePlanarIndices", () => {
	it("gives the empty ordering for scalars", () => {
		assert.deepEqual(possiblePlanarIndices(scalar(2)), [[]]);
	});

	it("reads a tensor as left legs then reversed right legs", () => {
		assert.deepEqual(possiblePlanarIndices(tensor("A", ["a", "b"], ["c", "d"])), [["a", "b", "d", "c"]]);
	});

	it("strips a planar self-trace", () => {
		assert.deepEqual(possiblePlanarIndices(tensor("A", ["a", "x"], ["b", "x"])), [["a", "b"]]);
	});

	it("rejects a crossing self-trace", () => {
		assert.deepEqual(possiblePlanarIndices(tensor("A", ["a", "x"], ["x", "b"])), []);
	});

	it("glues the open legs of a product", () => {
		const expr = product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"]));
		assert.deepEqual(possiblePlanarIndices(expr), [["a", "b"]]);
	});

	it("closes a ring of matrices to the empty ordering", () => {
		const expr = product(tensor("A", [1], [2]), tensor("B", [2], [3]), tensor("C", [3], [1]));
		assert.deepEqual(possiblePlanarIndices(expr), [[]]);
	});

	it("keeps the orderings every term of a sum admits", () => {
		const expr = sum(tensor("A", ["a", "b"], ["c"]), minus(tensor("B", ["b", "c"], ["a"])));
		assert.deepEqual(possiblePlanarIndices(expr), [["a", "b", "c"]]);
	});

	it("drops orderings a later term does not admit", () => {
		const expr = sum(tensor("A", ["a", "b"], ["c"]), tensor("B", ["a", "c"], ["b"]));
		assert.deepEqual(possiblePlanarIndices(expr), []);
	});

	it("throws on a conjugated tensor", () => {
		assert.throws(
			() => possiblePlanarIndices(conj(tensor("A", ["a"], ["b"]))),
			(e: unknown) => e instanceof PlanarError &&
				e.code === ErrorCodes.UnknownExpression &&
				e.message === "unknown tensor expression: conj(A[a; b])",
		);
	});
});

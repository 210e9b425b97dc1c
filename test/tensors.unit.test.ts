// SPDX-License-Identifier: MIT
// Tensor expression queries - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	collectTensors,
	countIndices,
	decomposeGeneralTensor,
	freeIndices,
	hasTraceIndices,
	isScalarExpr,
	mapStatementTerms,
	planarOrder,
	replaceIndices,
} from "../src/analysis/tensors.js";
import {
	annotated,
	assign,
	conj,
	product,
	scalar,
	sum,
	tensor,
} from "../src/types.js";

const A = tensor("A", ["a"], ["c"]);
const B = tensor("B", ["c"], ["b"]);

describe("collectTensors", () => {
	it("lists terms left to right, skipping scalars", () => {
		assert.deepEqual(collectTensors(product(A, scalar(2), B)), [A, B]);
	});

	it("looks through conjugation and sums", () => {
		assert.deepEqual(collectTensors(sum(conj(A), B)), [A, B]);
	});
});

describe("isScalarExpr", () => {
	it("is true for products of scalars", () => {
		assert.equal(isScalarExpr(product(scalar(2), conj(scalar("z")))), true);
	});

	it("is false once a tensor appears", () => {
		assert.equal(isScalarExpr(product(scalar(2), A)), false);
	});
});

describe("decomposeGeneralTensor", () => {
	it("splits a scaled tensor into term and scalars", () => {
		assert.deepEqual(decomposeGeneralTensor(product(scalar(2), A)), { term: A, scalars: [scalar(2)] });
	});

	it("keeps scalar order on both sides", () => {
		const expr = product(scalar(2), A, scalar("z"));
		assert.deepEqual(decomposeGeneralTensor(expr), { term: A, scalars: [scalar(2), scalar("z")] });
	});

	it("rejects a product of two tensors", () => {
		assert.equal(decomposeGeneralTensor(product(A, B)), undefined);
	});
});

describe("index queries", () => {
	it("detects a self-trace", () => {
		assert.equal(hasTraceIndices(tensor("A", ["a", "x"], ["x"])), true);
		assert.equal(hasTraceIndices(A), false);
	});

	it("reads legs in planar order", () => {
		assert.deepEqual(planarOrder(tensor("A", ["a", "b"], ["c", "d"])), ["a", "b", "d", "c"]);
	});

	it("counts every occurrence", () => {
		assert.deepEqual([...countIndices(product(A, B))], [["a", 1], ["c", 2], ["b", 1]]);
	});

	it("finds the free indices of a product", () => {
		assert.deepEqual(freeIndices(product(A, B)), ["a", "b"]);
	});

	it("uses the first term of a sum", () => {
		assert.deepEqual(freeIndices(sum(product(A, B), tensor("C", ["a"], ["b"]))), ["a", "b"]);
	});
});

describe("rewrites", () => {
	it("replaces indices on both sides of an assignment", () => {
		const node = assign(tensor("E", ["a"], ["b"]), tensor("A", ["a"], ["b"]));
		const replaced = replaceIndices(node, (i) => (i === "a" ? "z" : i));
		assert.deepEqual(replaced, assign(tensor("E", ["z"], ["b"]), tensor("A", ["z"], ["b"])));
	});

	it("leaves annotated blocks alone", () => {
		const node = annotated("notensor", [assign(tensor("E", ["a"], ["b"]), A)]);
		assert.equal(mapStatementTerms(node, (t) => ({ ...t, adjoint: true })), node);
	});
});

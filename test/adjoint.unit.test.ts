// SPDX-License-Identifier: MIT
// Conjugation normalization - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { normalizeAdjoints } from "../src/passes/adjoint.js";
import {
	annotated,
	assign,
	block,
	conj,
	define,
	minus,
	product,
	scalar,
	sum,
	tensor,
} from "../src/types.js";

const A = tensor("A", ["a"], ["b", "c"]);
const B = tensor("B", ["c"], ["d"]);

describe("normalizeAdjoints", () => {
	it("turns a conjugated tensor into its adjoint with swapped legs", () => {
		assert.deepEqual(normalizeAdjoints(conj(A)), tensor("A", ["b", "c"], ["a"], true));
	});

	it("flips an adjoint back", () => {
		const adjoint = tensor("A", ["b"], ["a"], true);
		assert.deepEqual(normalizeAdjoints(conj(adjoint)), tensor("A", ["a"], ["b"]));
	});

	it("distributes over products", () => {
		assert.deepEqual(
			normalizeAdjoints(conj(product(A, B))),
			product(tensor("A", ["b", "c"], ["a"], true), tensor("B", ["d"], ["c"], true)),
		);
	});

	it("distributes over sums and keeps the signs", () => {
		const expr = conj(sum(tensor("A", ["a"], ["b"]), minus(tensor("B", ["a"], ["b"]))));
		assert.deepEqual(
			normalizeAdjoints(expr),
			sum(tensor("A", ["b"], ["a"], true), minus(tensor("B", ["b"], ["a"], true))),
		);
	});

	it("cancels a double conjugation", () => {
		assert.deepEqual(normalizeAdjoints(conj(conj(A))), A);
		assert.deepEqual(normalizeAdjoints(conj(conj(scalar("z")))), scalar("z"));
	});

	it("keeps the conjugation of a scalar", () => {
		assert.deepEqual(normalizeAdjoints(conj(scalar("z"))), conj(scalar("z")));
	});

	it("conjugates scalar factors of a conjugated product", () => {
		assert.deepEqual(
			normalizeAdjoints(conj(product(scalar("z"), B))),
			product(conj(scalar("z")), tensor("B", ["d"], ["c"], true)),
		);
	});

	it("rewrites the right-hand side of assignments inside blocks", () => {
		const node = block([assign(tensor("E", ["b", "c"], ["a"]), conj(A))], "for i in 1:2");
		assert.deepEqual(
			normalizeAdjoints(node),
			block([assign(tensor("E", ["b", "c"], ["a"]), tensor("A", ["b", "c"], ["a"], true))], "for i in 1:2"),
		);
	});

	it("leaves annotated blocks untouched", () => {
		const node = annotated("notensor", [define(tensor("E", ["b", "c"], ["a"]), conj(A))]);
		assert.equal(normalizeAdjoints(node), node);
	});

	it("is idempotent", () => {
		const node = define(
			tensor("E", ["d"], ["a"]),
			conj(product(sum(conj(tensor("A", ["b"], ["a"])), tensor("C", ["a"], ["b"])), conj(conj(tensor("B", ["b"], ["d"]))))),
		);
		const once = normalizeAdjoints(node);
		assert.deepEqual(normalizeAdjoints(once), once);
	});
});

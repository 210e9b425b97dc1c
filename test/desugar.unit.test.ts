// SPDX-License-Identifier: MIT
// Document desugaring - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { desugarDocument, desugarExpr, desugarStatement } from "../src/desugar.js";
import {
	annotated,
	block,
	conj,
	define,
	minus,
	product,
	scalar,
	sum,
	tensor,
} from "../src/types.js";
import type { DocTensor, PlanarDocument } from "../src/zod-schemas.js";

const A: DocTensor = { kind: "tensor", object: "A", left: ["a"], right: ["c"] };
const B: DocTensor = { kind: "tensor", object: "B", left: ["c"], right: ["b"] };

describe("desugarExpr", () => {
	it("fills in a missing right group and adjoint flag", () => {
		assert.deepEqual(desugarExpr({ kind: "tensor", object: "A", left: ["a"] }), tensor("A", ["a"]));
	});

	it("keeps the adjoint flag", () => {
		assert.deepEqual(
			desugarExpr({ kind: "tensor", object: "A", adjoint: true, left: [1], right: [2] }),
			tensor("A", [1], [2], true),
		);
	});

	it("folds factors to the left", () => {
		const C: DocTensor = { kind: "tensor", object: "C", left: ["b"], right: ["d"] };
		assert.deepEqual(
			desugarExpr({ kind: "product", factors: [A, B, C] }),
			product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"]), tensor("C", ["b"], ["d"])),
		);
	});

	it("carries signs, scalars and conjugation", () => {
		assert.deepEqual(
			desugarExpr({
				kind: "sum",
				terms: [
					{ sign: "+", expr: { kind: "product", factors: [{ kind: "scalar", value: 2 }, A] } },
					{ sign: "-", expr: { kind: "conj", arg: A } },
				],
			}),
			sum(product(scalar(2), tensor("A", ["a"], ["c"])), minus(conj(tensor("A", ["a"], ["c"])))),
		);
	});
});

describe("desugarStatement", () => {
	it("treats an assignment without a flag as an overwrite", () => {
		const node = desugarStatement({ kind: "assign", lhs: A, rhs: A });
		assert.ok(node.kind === "assign");
		assert.equal(node.definition, false);
	});

	it("keeps block headers and annotations", () => {
		const body = [{ kind: "assign" as const, definition: true, lhs: { kind: "scalar" as const, value: "s" }, rhs: { kind: "scalar" as const, value: 1 } }];
		assert.deepEqual(
			desugarStatement({ kind: "block", header: "for i in 1:2", body }),
			block([define(scalar("s"), scalar(1))], "for i in 1:2"),
		);
		assert.deepEqual(
			desugarStatement({ kind: "block", body }),
			block([define(scalar("s"), scalar(1))]),
		);
		assert.deepEqual(
			desugarStatement({ kind: "annotated", annotation: "notensor", body }),
			annotated("notensor", [define(scalar("s"), scalar(1))]),
		);
	});
});

describe("desugarDocument", () => {
	it("returns the program of a document", () => {
		const document: PlanarDocument = {
			version: "1.0.0",
			program: {
				kind: "assign",
				definition: true,
				lhs: { kind: "tensor", object: "E", left: ["a"], right: ["b"] },
				rhs: { kind: "product", factors: [A, B] },
			},
		};
		assert.deepEqual(
			desugarDocument(document),
			define(tensor("E", ["a"], ["b"]), product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"]))),
		);
	});
});

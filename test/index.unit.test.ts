// SPDX-License-Identifier: MIT
// Planar Diagram Compiler Main Index - Unit Tests
// Tests the public API exported from src/index.ts

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import * as planar from "../src/index.js";

//==============================================================================
// Test Suite
//==============================================================================

describe("Main Index Exports - Unit Tests", () => {

	describe("Function Exports", () => {
		const expected = [
			"compilePlanar",
			"planStatements",
			"validateDocument",
			"desugarDocument",
			"formatPlan",
			"executePlan",
			"runCli",
			"parseArgs",
		] as const;

		for (const name of expected) {
			it(`should export ${name}`, () => {
				assert.equal(typeof planar[name], "function");
			});
		}

		it("should export the reference backend and schemas", () => {
			assert.equal(typeof planar.spaceBackend.contract, "function");
			assert.equal(typeof planar.PlanarDocumentSchema.safeParse, "function");
			assert.equal(planar.DEFAULT_BRAIDING_NAME, "τ");
		});
	});

	describe("Document to plan", () => {
		it("should validate, desugar and compile a document", () => {
			const result = planar.validateDocument({
				version: "1.0.0",
				program: {
					kind: "assign",
					definition: true,
					lhs: { kind: "tensor", object: "E", left: ["a"], right: ["b"] },
					rhs: { kind: "tensor", object: "A", adjoint: true, left: ["a"], right: ["b"] },
				},
			});
			assert.ok(result.valid && result.value !== undefined);
			const plan = planar.compilePlanar(planar.desugarDocument(result.value));
			assert.equal(
				planar.formatPlan(plan),
				"bind A <- A\n" +
					"check A: (numout, numin) == (1, 1)\n" +
					"E[a; b] := A'[a; b]\n" +
					"store E <- E",
			);
		});
	});
});

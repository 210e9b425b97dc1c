// SPDX-License-Identifier: MIT
// Compiler pipeline - Integration Tests

import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { possiblePlanarComplements, possiblePlanarIndices } from "../src/analysis/cyclic.js";
import { freeIndices, isTensorExpression, planarOrder } from "../src/analysis/tensors.js";
import { compilePlanar, planStatements, type CompileOptions } from "../src/compiler.js";
import { ErrorCodes, PlanarError } from "../src/errors.js";
import { executePlan } from "../src/execution/executor.js";
import { formatSpaceTensor, spaceBackend, spaceTensor, type SpaceTensor } from "../src/execution/space-backend.js";
import { formatNode, formatPlan } from "../src/format.js";
import {
	assign,
	conj,
	define,
	product,
	sameIndices,
	scalar,
	sum,
	tensor,
	type AssignmentNode,
	type Statement,
} from "../src/types.js";

//==============================================================================
// Test Fixtures
//==============================================================================

const E = tensor("E", ["a"], ["b"]);
const matrixProduct = define(E, product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"])));
const chain = define(
	E,
	product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["d"]), tensor("C", ["d"], ["b"])),
);

function crossing(name: string, right: [string, string]): Statement {
	return define(
		E,
		product(
			tensor("A", ["a"], ["p", "q"]),
			tensor(name, ["p", "q"], ["x", "y"]),
			tensor("B", right, ["b"]),
		),
	);
}

function spaces(catalog: Record<string, [string[], string[]]>): Map<string, SpaceTensor> {
	return new Map(Object.entries(catalog).map(([name, [c, d]]): [string, SpaceTensor] => [name, spaceTensor(c, d)]));
}

function resultOf(objects: ReadonlyMap<string, SpaceTensor>, name: string): string {
	const t = objects.get(name);
	assert.ok(t !== undefined, name + " should be written");
	return formatSpaceTensor(t);
}

function assignments(node: Statement): AssignmentNode[] {
	return node.kind === "assign" ? [node] : [];
}

//==============================================================================
// Test Suite
//==============================================================================

describe("compilePlanar", () => {
	describe("plans", () => {
		it("compiles a matrix product into a single contraction", () => {
			assert.equal(
				formatPlan(compilePlanar(matrixProduct)),
				"bind A <- A\n" +
					"bind B <- B\n" +
					"check A: (numout, numin) == (1, 1)\n" +
					"check B: (numout, numin) == (1, 1)\n" +
					"E[a; b] := A[a; c] * B[c; b]\n" +
					"store E <- E",
			);
		});

		it("constructs a crossing and threads it through a temporary", () => {
			const plan = compilePlanar(crossing("τ", ["x", "y"]));
			assert.equal(
				formatPlan(plan),
				"bind A <- A\n" +
					"bind B <- B\n" +
					"check A: (numout, numin) == (1, 2)\n" +
					"check B: (numout, numin) == (2, 1)\n" +
					"τ1 = braiding(space(B, 0), space(B, 1))\n" +
					"tmp1[a; x y] := A[a; p q] * τ1[p q; x y]\n" +
					"E[a; b] := tmp1[a; x y] * B[x y; b]\n" +
					"store E <- E",
			);
			assert.equal(planStatements(plan).length, 3);
		});

		it("removes a crossing by renaming its strands", () => {
			const plan = compilePlanar(crossing("τ", ["y", "x"]), { mode: "remove" });
			assert.equal(
				formatPlan(plan),
				"bind A <- A\n" +
					"bind B <- B\n" +
					"check A: (numout, numin) == (1, 2)\n" +
					"check B: (numout, numin) == (2, 1)\n" +
					"E[a; b] := A[a; y x] * B[y x; b]\n" +
					"store E <- E",
			);
		});

		it("is deterministic", () => {
			assert.deepEqual(compilePlanar(chain), compilePlanar(chain));
		});

		it("uses a custom placeholder name", () => {
			const plan = compilePlanar(crossing("X", ["x", "y"]), { braidingName: "X" });
			assert.deepEqual(plan.bindings.map((b) => b.name), ["A", "B", "E"]);
			assert.equal(plan.locals.filter((l) => l.role === "braiding").length, 1);
		});

		it("treats the default placeholder name as an object under a custom one", () => {
			const plan = compilePlanar(crossing("τ", ["x", "y"]), { braidingName: "X" });
			assert.deepEqual(plan.bindings.map((b) => b.name), ["A", "τ", "B", "E"]);
		});
	});

	describe("invariants", () => {
		const shapes: [string, Statement, CompileOptions?][] = [
			["a chain of four", define(
				E,
				product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["d"]), tensor("C", ["d"], ["e"]), tensor("D", ["e"], ["b"])),
			)],
			["swapped operands", define(tensor("E", ["b"], ["a"]), product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"])))],
			["a target with every leg outgoing", define(
				tensor("E", ["a", "b"]),
				product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"])),
			)],
			["a disconnected product", define(
				tensor("E", ["a", "d"], ["c", "b"]),
				product(tensor("A", ["a"], ["d"]), tensor("B", ["b"], ["c"])),
			)],
			["a traced operand", define(E, product(tensor("A", ["a", "x"], ["c", "x"]), tensor("B", ["c"], ["b"])))],
			["a sum operand", define(
				E,
				product(sum(tensor("A", ["a"], ["c"]), tensor("B", ["a"], ["c"])), tensor("C", ["c"], ["b"])),
			)],
			["a scalar factor", define(E, product(scalar(2), tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"])))],
			["a conjugated product", define(E, conj(product(tensor("B", ["b"], ["c"]), tensor("A", ["c"], ["a"]))))],
			["a constructed crossing", crossing("τ", ["x", "y"])],
			["a removed crossing", crossing("τ", ["y", "x"]), { mode: "remove" }],
			["a ring closed onto a scalar", define(
				scalar("s"),
				product(tensor("A", [1], [2]), tensor("B", [2], [3]), tensor("C", [3], [1])),
			)],
			["an assignment to an existing object", assign(E, product(tensor("A", ["a"], ["c"]), tensor("B", ["c"], ["b"])))],
		];

		for (const [name, node, options] of shapes) {
			it(`keeps free indices and planar leg order for ${name}`, () => {
				const statements = planStatements(compilePlanar(node, options));
				const lowered = statements.flatMap(assignments);
				assert.ok(lowered.length > 0);
				for (const statement of lowered) {
					const { lhs, rhs } = statement;
					const target = lhs.kind === "tensor" ? planarOrder(lhs) : [];
					assert.deepEqual(new Set(freeIndices(rhs)), new Set(target));
					if (rhs.kind !== "product" || !isTensorExpression(rhs.left) || !isTensorExpression(rhs.right)) {
						continue;
					}
					const orders = possiblePlanarIndices(rhs.left).flatMap((ind1) =>
						possiblePlanarIndices(rhs.right).flatMap((ind2) =>
							possiblePlanarComplements(ind1, ind2).map((c) => [...c.open1, ...c.open2]),
						),
					);
					assert.ok(
						orders.some((order) => sameIndices(order, target)),
						`${formatNode(statement)} does not read its legs in target order`,
					);
				}
			});
		}

		it("gives the same spaces whether a crossing is constructed or removed", () => {
			const constructed = executePlan(
				compilePlanar(crossing("τ", ["x", "y"])),
				spaceBackend,
				spaces({ A: [["V"], ["W", "X"]], B: [["X", "W"], ["U"]] }),
			);
			const removed = executePlan(
				compilePlanar(crossing("τ", ["y", "x"]), { mode: "remove" }),
				spaceBackend,
				spaces({ A: [["V"], ["W", "X"]], B: [["W", "X"], ["U"]] }),
			);
			assert.equal(resultOf(constructed.objects, "E"), "[V; U]");
			assert.equal(resultOf(removed.objects, "E"), resultOf(constructed.objects, "E"));
		});

		it("runs a decomposed ring against the space backend", () => {
			const ring = define(
				scalar("s"),
				product(tensor("A", [1], [2]), tensor("B", [2], [3]), tensor("C", [3], [1])),
			);
			const result = executePlan(
				compilePlanar(ring),
				spaceBackend,
				spaces({ A: [["V"], ["W"]], B: [["W"], ["X"]], C: [["X"], ["V"]] }),
			);
			assert.equal(resultOf(result.scalars, "s"), "[;]");
		});
	});

	describe("failures", () => {
		it("rejects a non-planar diagram", () => {
			const node = define(
				tensor("E", ["a", "b", "c"]),
				product(tensor("A", ["a"], ["x"]), tensor("B", ["x"], ["b", "c"])),
			);
			assert.throws(
				() => compilePlanar(node),
				(e: unknown) => e instanceof PlanarError &&
					e.code === ErrorCodes.NonPlanar &&
					e.message === "not a planar diagram expression: E[a b c;] := A[a; x] * B[x; b c]",
			);
		});

		it("checks uses against known signatures", () => {
			const objects = new Map([["A", { numout: 2, numin: 1 }], ["B", { numout: 1, numin: 1 }]]);
			assert.throws(
				() => compilePlanar(matrixProduct, { objects }),
				(e: unknown) => e instanceof PlanarError &&
					e.code === ErrorCodes.ArityError &&
					e.message === "incorrect number of input-output indices: (1, 1) instead of (2, 1) for A.",
			);
		});

		it("refuses to remove a placeholder with nothing to absorb it", () => {
			const node = define(tensor("E", ["a", "b"], ["x", "y"]), tensor("τ", ["a", "b"], ["x", "y"]));
			assert.throws(
				() => compilePlanar(node, { mode: "remove" }),
				(e: unknown) => e instanceof PlanarError && e.code === ErrorCodes.UnsafeBraidingRemoval,
			);
		});

		it("validates its options", () => {
			assert.throws(
				() => compilePlanar(matrixProduct, { braidingName: "" }),
				(e: unknown) => e instanceof PlanarError &&
					e.code === ErrorCodes.ValidationError &&
					e.message.startsWith("Validation error at options.braidingName: "),
			);
		});
	});

	describe("verbose logging", () => {
		it("reports each pass on console.warn", () => {
			const warn = mock.method(console, "warn", () => undefined);
			try {
				compilePlanar(matrixProduct, { verbose: true });
				assert.deepEqual(warn.mock.calls.map((c) => c.arguments[0]), [
					"[PlanarCompiler] normalized adjoints",
					"[PlanarCompiler] bound 3 object(s), 2 arity check(s)",
					"[PlanarCompiler] constructed 0 braiding(s)",
					"[PlanarCompiler] planarity verified",
					"[PlanarCompiler] decomposed into 1 statement(s) with 0 temporaries",
					"[PlanarCompiler]   E[a; b] := A[a; c] * B[c; b]",
				]);
			} finally {
				warn.mock.restore();
			}
		});

		it("stays quiet by default", () => {
			const warn = mock.method(console, "warn", () => undefined);
			try {
				compilePlanar(matrixProduct);
				assert.equal(warn.mock.callCount(), 0);
			} finally {
				warn.mock.restore();
			}
		});
	});
});

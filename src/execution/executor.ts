// SPDX-License-Identifier: MIT
// Contraction plan executor
//
// Runs a compiled plan against a TensorBackend. Evaluation is label driven:
// a product contracts the indices its operands share, and every result is
// permuted into the leg order of the term it is assigned to.

import { PlanarError, exhaustive } from "../errors.js";
import { formatExpr, namerFor, type LocalNamer } from "../format.js";
import { isScalarExpr, isTensorExpression } from "../analysis/tensors.js";
import type {
	ContractionPlan,
	Index,
	ObjectRef,
	SpaceRef,
	Statement,
	TensorExpr,
	TensorTerm,
} from "../types.js";
import type { OperandLeg, ScalarFactor, TensorBackend } from "./backend.js";

export interface ExecutionResult<T> {
	/** The inputs, overwritten and extended by every object the plan writes */
	objects: Map<string, T>;
	/** Results of scalar-valued statements, keyed by their target symbol */
	scalars: Map<string, T>;
	/** Value of the last bare expression statement */
	value?: T;
}

/** A tensor together with the index carried by each of its legs */
interface Labeled<T> {
	value: T;
	labels: Index[];
	numout: number;
}

class PlanExecutor<T, S> {
	private readonly locals = new Map<number, T>();
	private readonly namer: LocalNamer;
	readonly objects: Map<string, T>;
	readonly scalars = new Map<string, T>();
	last: T | undefined;

	constructor(
		private readonly plan: ContractionPlan,
		private readonly backend: TensorBackend<T, S>,
		inputs: ReadonlyMap<string, T>,
	) {
		this.namer = namerFor(plan.locals);
		this.objects = new Map(inputs);
	}

	//==========================================================================
	// Objects
	//==========================================================================

	bind(): void {
		for (const b of this.plan.bindings) {
			if (b.isNew) continue;
			const value = this.objects.get(b.name);
			if (value === undefined) {
				throw PlanarError.unboundObject(b.name);
			}
			this.locals.set(b.handle, value);
		}
		for (const c of this.plan.checks) {
			const value = this.lookup({ kind: "local", handle: c.handle });
			const numout = this.backend.numout(value);
			const numin = this.backend.numin(value);
			if (numout !== c.numout || numin !== c.numin) {
				throw PlanarError.arityError([numout, numin], [c.numout, c.numin], c.name);
			}
		}
	}

	writeBack(): void {
		for (const b of this.plan.bindings) {
			if (!b.isOutput) continue;
			const value = this.locals.get(b.handle);
			if (value === undefined) {
				throw PlanarError.unboundObject(b.name);
			}
			this.objects.set(b.name, value);
		}
	}

	private lookup(ref: ObjectRef): T {
		const value = ref.kind === "local" ? this.locals.get(ref.handle) : this.objects.get(ref.name);
		if (value === undefined) {
			throw PlanarError.unboundObject(ref.kind === "local" ? this.namer(ref.handle) : ref.name);
		}
		return value;
	}

	private store(ref: ObjectRef, value: T): void {
		if (ref.kind === "local") this.locals.set(ref.handle, value);
		else this.objects.set(ref.name, value);
	}

	private spaceOf(ref: SpaceRef): S {
		const object = this.lookup(ref.object);
		const view = ref.adjoint ? this.backend.adjoint(object) : object;
		const space = this.backend.space(view, ref.leg);
		return ref.dual ? this.backend.dual(space) : space;
	}

	//==========================================================================
	// Labeled Evaluation
	//==========================================================================

	private term(term: TensorTerm): Labeled<T> {
		const object = this.lookup(term.object);
		const used: [number, number] = term.adjoint
			? [term.right.length, term.left.length]
			: [term.left.length, term.right.length];
		const actual: [number, number] = [this.backend.numout(object), this.backend.numin(object)];
		if (used[0] !== actual[0] || used[1] !== actual[1]) {
			throw PlanarError.arityError(actual, used, this.objectName(term.object));
		}
		const value = term.adjoint ? this.backend.adjoint(object) : object;
		return this.traceOut({ value, labels: [...term.left, ...term.right], numout: term.left.length });
	}

	private objectName(ref: ObjectRef): string {
		return ref.kind === "local" ? this.namer(ref.handle) : ref.name;
	}

	/** Trace out every index that occurs on two legs of the same tensor */
	private traceOut(t: Labeled<T>): Labeled<T> {
		const positions = new Map<Index, number[]>();
		t.labels.forEach((label, p) => positions.set(label, [...(positions.get(label) ?? []), p]));
		const traces: [number, number][] = [];
		for (const [p, q] of positions.values()) {
			if (p !== undefined && q !== undefined) traces.push([p, q]);
		}
		if (traces.length === 0) return t;
		const kept = t.labels
			.map((label, p) => ({ label, p }))
			.filter(({ label }) => positions.get(label)?.length === 1);
		const numout = kept.filter(({ p }) => p < t.numout).length;
		return {
			value: this.backend.transpose(t.value, { traces, output: kept.map(({ p }) => p), numout }),
			labels: kept.map(({ label }) => label),
			numout,
		};
	}

	private contract(a: Labeled<T>, b: Labeled<T>): Labeled<T> {
		const pairs: [number, number][] = [];
		a.labels.forEach((label, i) => {
			const j = b.labels.indexOf(label);
			if (j >= 0) pairs.push([i, j]);
		});
		const open = (t: Labeled<T>, other: Labeled<T>, operand: 0 | 1): { leg: OperandLeg; label: Index }[] =>
			t.labels.flatMap((label, leg) => (other.labels.includes(label) ? [] : [{ leg: { operand, leg }, label }]));
		const openA = open(a, b, 0);
		const output = [...openA, ...open(b, a, 1)];
		return {
			value: this.backend.contract(a.value, b.value, {
				pairs,
				output: output.map(({ leg }) => leg),
				numout: openA.length,
			}),
			labels: output.map(({ label }) => label),
			numout: openA.length,
		};
	}

	/** Permute `t` so that its legs carry `left` then `right` */
	private arrange(t: Labeled<T>, left: readonly Index[], right: readonly Index[], expr: TensorExpr): T {
		const wanted = [...left, ...right];
		const output = wanted.map((label) => t.labels.indexOf(label));
		if (wanted.length !== t.labels.length || output.some((p) => p < 0)) {
			throw PlanarError.unknownExpression(formatExpr(expr, this.namer));
		}
		const identity = output.every((p, i) => p === i) && t.numout === left.length;
		return identity
			? t.value
			: this.backend.transpose(t.value, { traces: [], output, numout: left.length });
	}

	private scalarFactors(expr: TensorExpr, conjugate = false): ScalarFactor[] {
		switch (expr.kind) {
		case "scalar":
			return [{ value: expr.value, conjugate }];
		case "conj":
			return this.scalarFactors(expr.arg, !conjugate);
		case "product":
			return [...this.scalarFactors(expr.left, conjugate), ...this.scalarFactors(expr.right, conjugate)];
		default:
			throw PlanarError.unknownExpression(formatExpr(expr, this.namer));
		}
	}

	private scaled(t: Labeled<T>, factors: readonly ScalarFactor[]): Labeled<T> {
		return { ...t, value: factors.reduce((v, f) => this.backend.scale(v, f), t.value) };
	}

	private evaluate(expr: TensorExpr): Labeled<T> {
		switch (expr.kind) {
		case "tensor":
			return this.term(expr);
		case "product":
			if (isScalarExpr(expr.left)) return this.scaled(this.evaluate(expr.right), this.scalarFactors(expr.left));
			if (isScalarExpr(expr.right)) return this.scaled(this.evaluate(expr.left), this.scalarFactors(expr.right));
			return this.contract(this.evaluate(expr.left), this.evaluate(expr.right));
		case "sum": {
			const [first, ...rest] = expr.terms;
			if (first === undefined) {
				throw PlanarError.unknownExpression(formatExpr(expr, this.namer));
			}
			const head = this.evaluate(first.expr);
			const start = first.sign === "-" ? this.scaled(head, [{ value: -1, conjugate: false }]) : head;
			const left = start.labels.slice(0, start.numout);
			const right = start.labels.slice(start.numout);
			const value = rest.reduce((acc, t) => this.backend.add(
				acc,
				this.arrange(this.evaluate(t.expr), left, right, t.expr),
				t.sign === "-" ? -1 : 1,
			), start.value);
			return { ...start, value };
		}
		case "scalar":
		case "conj":
			throw PlanarError.unknownExpression(formatExpr(expr, this.namer));
		default:
			return exhaustive(expr);
		}
	}

	//==========================================================================
	// Statements
	//==========================================================================

	run(node: Statement): void {
		switch (node.kind) {
		case "assign": {
			if (!isTensorExpression(node.rhs)) return;
			const result = this.evaluate(node.rhs);
			if (node.lhs.kind === "scalar") {
				this.scalars.set(String(node.lhs.value), this.arrange(result, [], [], node.rhs));
				return;
			}
			const value = this.arrange(result, node.lhs.left, node.lhs.right, node.rhs);
			this.store(node.lhs.object, node.lhs.adjoint ? this.backend.adjoint(value) : value);
			return;
		}
		case "block":
			// a header is a label; the body runs once
			for (const s of node.body) this.run(s);
			return;
		case "annotated":
			return;
		case "braiding": {
			const [v1, v2] = node.spaces;
			this.locals.set(node.handle, this.backend.braiding(this.spaceOf(v1), this.spaceOf(v2)));
			return;
		}
		default:
			if (isTensorExpression(node)) this.last = this.evaluate(node).value;
		}
	}
}

/**
 * Execute `plan` with `inputs` as the existing objects. Returns the object
 * environment after every new and assigned object has been written back.
 */
export function executePlan<T, S>(
	plan: ContractionPlan,
	backend: TensorBackend<T, S>,
	inputs: ReadonlyMap<string, T>,
): ExecutionResult<T> {
	const executor = new PlanExecutor(plan, backend, inputs);
	executor.bind();
	executor.run(plan.program);
	executor.writeBack();
	const result: ExecutionResult<T> = { objects: executor.objects, scalars: executor.scalars };
	if (executor.last !== undefined) result.value = executor.last;
	return result;
}

// SPDX-License-Identifier: MIT
// Object binding
//
// Every surface object used by an expression is bound to a local alias. A
// reference and its adjoint are the same object. Each occurrence of an object
// that exists before the expression runs gets an arity check comparing the
// legs used against the object's own (numout, numin).

import { PlanarError } from "../errors.js";
import { collectTensors, mapStatementTerms } from "../analysis/tensors.js";
import type { LocalArena } from "../temporaries.js";
import type {
	ArityCheck,
	ObjectBinding,
	Statement,
	TensorTerm,
} from "../types.js";

export interface ObjectSignature {
	numout: number;
	numin: number;
}

export interface BindOptions {
	braidingName: string;
	/** Known signatures; when given, arity checks run at compile time */
	objects?: ReadonlyMap<string, ObjectSignature>;
}

export interface BindResult {
	node: Statement;
	bindings: ObjectBinding[];
	checks: ArityCheck[];
}

interface ObjectUse {
	isNew: boolean;
	isOutput: boolean;
}

//==============================================================================
// Discovery
//==============================================================================

function noteInput(uses: Map<string, ObjectUse>, term: TensorTerm, braidingName: string): void {
	if (term.object.kind !== "named" || term.object.name === braidingName) return;
	if (!uses.has(term.object.name)) {
		uses.set(term.object.name, { isNew: false, isOutput: false });
	}
}

function noteOutput(
	uses: Map<string, ObjectUse>,
	term: TensorTerm,
	definition: boolean,
	braidingName: string,
): void {
	if (term.object.kind !== "named") return;
	const name = term.object.name;
	if (name === braidingName) {
		throw PlanarError.reservedName(name);
	}
	const use = uses.get(name);
	if (use === undefined) {
		uses.set(name, { isNew: definition, isOutput: true });
	} else {
		use.isOutput = true;
	}
}

function discover(node: Statement, uses: Map<string, ObjectUse>, braidingName: string): void {
	switch (node.kind) {
	case "assign":
		for (const t of collectTensors(node.rhs)) noteInput(uses, t, braidingName);
		if (node.lhs.kind === "tensor") {
			noteOutput(uses, node.lhs, node.definition, braidingName);
		}
		return;
	case "block":
		for (const s of node.body) discover(s, uses, braidingName);
		return;
	case "annotated":
	case "braiding":
		return;
	default:
		for (const t of collectTensors(node)) noteInput(uses, t, braidingName);
	}
}

//==============================================================================
// Binding
//==============================================================================

/** Leg counts as seen by the underlying object, undoing the adjoint view */
function usedCounts(term: TensorTerm): [number, number] {
	return term.adjoint
		? [term.right.length, term.left.length]
		: [term.left.length, term.right.length];
}

function sameCheck(a: ArityCheck, b: ArityCheck): boolean {
	return a.handle === b.handle && a.numout === b.numout && a.numin === b.numin;
}

function runChecks(checks: readonly ArityCheck[], objects: ReadonlyMap<string, ObjectSignature>): void {
	for (const check of checks) {
		const signature = objects.get(check.name);
		if (signature === undefined) continue;
		if (signature.numout !== check.numout || signature.numin !== check.numin) {
			throw PlanarError.arityError(
				[signature.numout, signature.numin],
				[check.numout, check.numin],
				check.name,
			);
		}
	}
}

/**
 * Bind every object of `node` to a local alias and collect the arity checks
 * of pre-existing objects.
 */
export function bindObjects(node: Statement, arena: LocalArena, options: BindOptions): BindResult {
	const uses = new Map<string, ObjectUse>();
	discover(node, uses, options.braidingName);

	// existing objects first, then the ones this expression introduces
	const ordered = [
		...[...uses].filter(([, u]) => !u.isNew),
		...[...uses].filter(([, u]) => u.isNew),
	];
	const bindings: ObjectBinding[] = ordered.map(([name, use]) => ({
		handle: arena.alias(name).handle,
		name,
		isNew: use.isNew,
		isOutput: use.isOutput,
	}));

	const checks: ArityCheck[] = [];
	const rewritten = mapStatementTerms(node, (term) => {
		if (term.object.kind !== "named") return term;
		const name = term.object.name;
		const use = uses.get(name);
		const handle = arena.lookupAlias(name);
		if (use === undefined || handle === undefined) return term;
		if (!use.isNew) {
			const [numout, numin] = usedCounts(term);
			const check = { handle, name, numout, numin };
			if (!checks.some((c) => sameCheck(c, check))) checks.push(check);
		}
		return { ...term, object: { kind: "local", handle } };
	});

	if (options.objects !== undefined) {
		runChecks(checks, options.objects);
	}
	return { node: rewritten, bindings, checks };
}

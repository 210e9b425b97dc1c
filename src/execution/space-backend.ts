// SPDX-License-Identifier: MIT
// Space-only reference backend
//
// Tensors carry nothing but their leg spaces, so running a plan against this
// backend checks that every contraction pairs a space with its dual and
// reports the spaces of each result.

import { PlanarError } from "../errors.js";
import type { ObjectSignature } from "../passes/bind.js";
import type { ObjectCatalog } from "../zod-schemas.js";
import type {
	ContractionSpec,
	TensorBackend,
	TransposeSpec,
} from "./backend.js";

export interface Space {
	name: string;
	dual: boolean;
}

export interface SpaceTensor {
	codomain: Space[];
	domain: Space[];
}

//==============================================================================
// Spaces
//==============================================================================

/** `V` is a space, `V'` its dual */
export function parseSpace(text: string): Space {
	return text.endsWith("'")
		? { name: text.slice(0, -1), dual: true }
		: { name: text, dual: false };
}

export function formatSpace(space: Space): string {
	return space.name + (space.dual ? "'" : "");
}

export function dualSpace(space: Space): Space {
	return { name: space.name, dual: !space.dual };
}

export function sameSpace(a: Space, b: Space): boolean {
	return a.name === b.name && a.dual === b.dual;
}

export function spaceTensor(codomain: readonly string[], domain: readonly string[]): SpaceTensor {
	return { codomain: codomain.map(parseSpace), domain: domain.map(parseSpace) };
}

/** `[V W; X']`: codomain spaces, then domain spaces */
export function formatSpaceTensor(t: SpaceTensor): string {
	const right = t.domain.length > 0 ? " " + t.domain.map(formatSpace).join(" ") : "";
	return "[" + t.codomain.map(formatSpace).join(" ") + ";" + right + "]";
}

function legSpaces(t: SpaceTensor): Space[] {
	return [...t.codomain, ...t.domain.map(dualSpace)];
}

function legSpace(t: SpaceTensor, leg: number): Space {
	const space = legSpaces(t)[leg];
	if (space === undefined) {
		throw new RangeError("leg " + String(leg) + " out of range for " + formatSpaceTensor(t));
	}
	return space;
}

function fromLegs(legs: readonly Space[], numout: number): SpaceTensor {
	return {
		codomain: legs.slice(0, numout),
		domain: legs.slice(numout).map(dualSpace),
	};
}

function assertContractible(a: Space, b: Space, context: string): void {
	if (!sameSpace(a, dualSpace(b))) {
		throw PlanarError.spaceMismatch(formatSpace(dualSpace(a)), formatSpace(b), context);
	}
}

//==============================================================================
// Backend
//==============================================================================

export const spaceBackend: TensorBackend<SpaceTensor, Space> = {
	numout: (t) => t.codomain.length,
	numin: (t) => t.domain.length,
	space: legSpace,
	dual: dualSpace,
	adjoint: (t) => ({ codomain: t.domain, domain: t.codomain }),
	braiding: (v1, v2) => ({ codomain: [v2, v1], domain: [v1, v2] }),

	contract(a: SpaceTensor, b: SpaceTensor, spec: ContractionSpec): SpaceTensor {
		for (const [i, j] of spec.pairs) {
			assertContractible(legSpace(a, i), legSpace(b, j), "contract legs " + String(i) + " and " + String(j));
		}
		const legs = spec.output.map(({ operand, leg }) => legSpace(operand === 0 ? a : b, leg));
		return fromLegs(legs, spec.numout);
	},

	transpose(t: SpaceTensor, spec: TransposeSpec): SpaceTensor {
		for (const [i, j] of spec.traces) {
			assertContractible(legSpace(t, i), legSpace(t, j), "trace legs " + String(i) + " and " + String(j));
		}
		return fromLegs(spec.output.map((leg) => legSpace(t, leg)), spec.numout);
	},

	add(a: SpaceTensor, b: SpaceTensor): SpaceTensor {
		const expected = formatSpaceTensor(a);
		const got = formatSpaceTensor(b);
		if (expected !== got) {
			throw PlanarError.spaceMismatch(expected, got, "add");
		}
		return a;
	},

	scale: (t) => t,
};

//==============================================================================
// Catalogs
//==============================================================================

export function catalogTensors(catalog: ObjectCatalog): Map<string, SpaceTensor> {
	return new Map(
		Object.entries(catalog).map(([name, e]): [string, SpaceTensor] => [name, spaceTensor(e.codomain, e.domain)]),
	);
}

export function catalogSignatures(catalog: ObjectCatalog): Map<string, ObjectSignature> {
	return new Map(
		Object.entries(catalog).map(([name, e]): [string, ObjectSignature] => [name, { numout: e.codomain.length, numin: e.domain.length }]),
	);
}

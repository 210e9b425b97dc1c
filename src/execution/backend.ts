// SPDX-License-Identifier: MIT
// Tensor backend contract
//
// Legs are numbered 0-based across codomain then domain: a tensor with
// numout outputs and numin inputs has legs 0..numout+numin-1, the first
// numout of which are outgoing.

/** A leg of one of the two operands of a binary contraction */
export interface OperandLeg {
	operand: 0 | 1;
	leg: number;
}

export interface ContractionSpec {
	/** Contracted legs, (leg of a, leg of b) */
	pairs: [number, number][];
	/** Order of the open legs in the result */
	output: OperandLeg[];
	/** How many of the output legs are outgoing */
	numout: number;
}

export interface TransposeSpec {
	/** Pairs of legs traced against each other */
	traces: [number, number][];
	/** Order of the remaining legs in the result */
	output: number[];
	numout: number;
}

/** A scalar factor; symbols are resolved by the backend */
export interface ScalarFactor {
	value: number | string;
	conjugate: boolean;
}

/**
 * Everything a contraction plan needs from a tensor library. `T` is the
 * tensor type and `S` the type of a single leg's vector space.
 */
export interface TensorBackend<T, S> {
	numout(t: T): number;
	numin(t: T): number;
	/** Space of leg `leg`; for an incoming leg this is the dual of its domain space */
	space(t: T, leg: number): S;
	dual(s: S): S;
	adjoint(t: T): T;
	/** Crossing V1 ⊗ V2 → V2 ⊗ V1 */
	braiding(v1: S, v2: S): T;
	contract(a: T, b: T, spec: ContractionSpec): T;
	transpose(t: T, spec: TransposeSpec): T;
	add(a: T, b: T, sign: 1 | -1): T;
	scale(t: T, factor: ScalarFactor): T;
}

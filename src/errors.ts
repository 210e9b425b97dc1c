// SPDX-License-Identifier: MIT
// Planar Diagram Compiler Error Types
// Error domain for diagram compilation and plan execution

import type { Index } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Binding errors
	ArityError: "ArityError",
	ReservedName: "ReservedName",
	UnboundObject: "UnboundObject",

	// Braiding errors
	UnresolvedBraiding: "UnresolvedBraiding",
	UnsafeBraidingRemoval: "UnsafeBraidingRemoval",

	// Structural errors
	NonPlanar: "NonPlanar",
	UnknownExpression: "UnknownExpression",

	// Execution errors
	SpaceMismatch: "SpaceMismatch",

	// Validation errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Planar Error Class
//==============================================================================

export class PlanarError extends Error {
	readonly code: ErrorCode;
	/** Textual form of the offending sub-expression, when there is one */
	readonly expression?: string;

	constructor(code: ErrorCode, message: string, expression?: string) {
		super(message);
		this.name = "PlanarError";
		this.code = code;
		if (expression !== undefined) this.expression = expression;
	}

	/**
	 * Create an ArityError for an object used with the wrong number of legs.
	 * Counts are (output legs, input legs).
	 */
	static arityError(
		expected: readonly [number, number],
		got: readonly [number, number],
		name: string,
	): PlanarError {
		return new PlanarError(
			ErrorCodes.ArityError,
			"incorrect number of input-output indices: " +
				formatCounts(got) +
				" instead of " +
				formatCounts(expected) +
				" for " +
				name +
				".",
		);
	}

	/**
	 * Create an ArityError for a braiding placeholder without 2+2 legs
	 */
	static braidingArity(name: string, expression: string): PlanarError {
		return new PlanarError(
			ErrorCodes.ArityError,
			"The name " +
				name +
				" is reserved for the braiding, and should have two input and two output indices.",
			expression,
		);
	}

	static reservedName(name: string): PlanarError {
		return new PlanarError(
			ErrorCodes.ReservedName,
			"The name " + name + " is reserved for the braiding, and should not be assigned to.",
		);
	}

	static unboundObject(name: string): PlanarError {
		return new PlanarError(ErrorCodes.UnboundObject, "Unbound object: " + name);
	}

	static unresolvedBraiding(
		pairs: readonly (readonly [Index, Index])[],
		expression: string,
	): PlanarError {
		const listed = pairs.map(([a, b]) => "(" + String(a) + ", " + String(b) + ")").join(", ");
		return new PlanarError(
			ErrorCodes.UnresolvedBraiding,
			"cannot determine the spaces of indices " +
				listed +
				" for the braiding tensors in " +
				expression,
			expression,
		);
	}

	static unsafeBraidingRemoval(expression: string): PlanarError {
		return new PlanarError(
			ErrorCodes.UnsafeBraidingRemoval,
			"unable to remove braiding tensor " + expression,
			expression,
		);
	}

	static nonPlanar(expression: string): PlanarError {
		return new PlanarError(
			ErrorCodes.NonPlanar,
			"not a planar diagram expression: " + expression,
			expression,
		);
	}

	static unknownExpression(expression: string): PlanarError {
		return new PlanarError(
			ErrorCodes.UnknownExpression,
			"unknown tensor expression: " + expression,
			expression,
		);
	}

	static spaceMismatch(expected: string, got: string, context: string): PlanarError {
		return new PlanarError(
			ErrorCodes.SpaceMismatch,
			"Space mismatch (" + context + "): expected " + expected + ", got " + got,
		);
	}

	static validation(
		path: string,
		message: string,
		value?: unknown,
	): PlanarError {
		return new PlanarError(
			ErrorCodes.ValidationError,
			"Validation error at " +
				path +
				": " +
				message +
				(value !== undefined ? " (value: " + JSON.stringify(value) + ")" : ""),
		);
	}
}

function formatCounts([nout, nin]: readonly [number, number]): string {
	return "(" + String(nout) + ", " + String(nin) + ")";
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

/**
 * Combine multiple validation results.
 */
export function combineResults<T>(
	results: ValidationResult<T>[],
): ValidationResult<T[]> {
	const allErrors = results.flatMap((r) => r.errors);
	if (allErrors.length > 0) {
		return invalidResult(allErrors);
	}
	const values: T[] = [];
	for (const r of results) {
		if (r.value !== undefined) values.push(r.value);
	}
	return validResult(values);
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}

// SPDX-License-Identifier: MIT
// Planar Diagram Compiler Type Definitions
// Expression tree, object references and contraction plan shapes

//==============================================================================
// Indices and Object References
//==============================================================================

/** A leg label: symbolic (string) or positional (number) */
export type Index = string | number;

export interface NamedObject {
	kind: "named";
	name: string;
}

/** Compilation-local object, see LocalArena */
export interface LocalObject {
	kind: "local";
	handle: number;
}

export type ObjectRef = NamedObject | LocalObject;

//==============================================================================
// Expression Domain
//==============================================================================

export interface TensorTerm {
	kind: "tensor";
	object: ObjectRef;
	adjoint: boolean;
	/** Codomain-side (outgoing) legs */
	left: Index[];
	/** Domain-side (incoming) legs */
	right: Index[];
}

export interface ScalarTerm {
	kind: "scalar";
	value: number | string;
}

export interface ConjNode {
	kind: "conj";
	arg: TensorExpr;
}

export interface SumTerm {
	sign: "+" | "-";
	expr: TensorExpr;
}

export interface SumNode {
	kind: "sum";
	terms: SumTerm[];
}

export interface ProductNode {
	kind: "product";
	left: TensorExpr;
	right: TensorExpr;
}

/** Anything that may appear on the right-hand side of an assignment */
export type TensorExpr =
	| TensorTerm
	| ScalarTerm
	| ConjNode
	| SumNode
	| ProductNode;

export interface AssignmentNode {
	kind: "assign";
	lhs: TensorTerm | ScalarTerm;
	rhs: TensorExpr;
	/** `:=` introduces a new object, `=` overwrites an existing one */
	definition: boolean;
}

/** Opaque control construct; the header is carried but never interpreted */
export interface BlockNode {
	kind: "block";
	header?: string;
	body: Statement[];
}

/** Region excluded from every rewriting pass */
export interface AnnotatedBlock {
	kind: "annotated";
	annotation: string;
	body: Statement[];
}

/**
 * "The vector space on leg `leg` of `object`", read through the adjoint view
 * when `adjoint` is set and dualized when `dual` is set.
 */
export interface SpaceRef {
	object: ObjectRef;
	adjoint: boolean;
	leg: number;
	dual: boolean;
}

/** Construction of an explicit crossing tensor into a local handle */
export interface BraidingNode {
	kind: "braiding";
	handle: number;
	spaces: [SpaceRef, SpaceRef];
}

export type Statement =
	| AssignmentNode
	| BlockNode
	| AnnotatedBlock
	| BraidingNode
	| TensorExpr;

//==============================================================================
// Constructors
//==============================================================================

export const named = (name: string): NamedObject => ({ kind: "named", name });
export const local = (handle: number): LocalObject => ({ kind: "local", handle });

export function tensor(
	object: string | ObjectRef,
	left: Index[],
	right: Index[] = [],
	adjoint = false,
): TensorTerm {
	return {
		kind: "tensor",
		object: typeof object === "string" ? named(object) : object,
		adjoint,
		left,
		right,
	};
}

export const scalar = (value: number | string): ScalarTerm => ({ kind: "scalar", value });

export const conj = (arg: TensorExpr): ConjNode => ({ kind: "conj", arg });

/** Left-folded product of one or more factors */
export function product(first: TensorExpr, ...rest: TensorExpr[]): TensorExpr {
	return rest.reduce<TensorExpr>(
		(left, right) => ({ kind: "product", left, right }),
		first,
	);
}

export function sum(...terms: (TensorExpr | SumTerm)[]): SumNode {
	return {
		kind: "sum",
		terms: terms.map((t): SumTerm => ("sign" in t ? t : { sign: "+", expr: t })),
	};
}

export const minus = (expr: TensorExpr): SumTerm => ({ sign: "-", expr });

export function assign(lhs: TensorTerm | ScalarTerm, rhs: TensorExpr): AssignmentNode {
	return { kind: "assign", lhs, rhs, definition: false };
}

export function define(lhs: TensorTerm | ScalarTerm, rhs: TensorExpr): AssignmentNode {
	return { kind: "assign", lhs, rhs, definition: true };
}

export function block(body: Statement[], header?: string): BlockNode {
	return header === undefined ? { kind: "block", body } : { kind: "block", header, body };
}

export function annotated(annotation: string, body: Statement[]): AnnotatedBlock {
	return { kind: "annotated", annotation, body };
}

//==============================================================================
// Type Guards
//==============================================================================

export function isNamed(object: ObjectRef, name: string): boolean {
	return object.kind === "named" && object.name === name;
}

export function sameObject(a: ObjectRef, b: ObjectRef): boolean {
	if (a.kind === "named" && b.kind === "named") return a.name === b.name;
	if (a.kind === "local" && b.kind === "local") return a.handle === b.handle;
	return false;
}

export function sameIndices(a: readonly Index[], b: readonly Index[]): boolean {
	return a.length === b.length && a.every((x, i) => x === b[i]);
}

/** Structural equality of two tensor terms */
export function sameTerm(a: TensorTerm, b: TensorTerm): boolean {
	return sameObject(a.object, b.object) &&
		a.adjoint === b.adjoint &&
		sameIndices(a.left, b.left) &&
		sameIndices(a.right, b.right);
}

//==============================================================================
// Contraction Plan
//==============================================================================

export type LocalRole = "alias" | "temporary" | "braiding";

export interface LocalEntry {
	handle: number;
	role: LocalRole;
	/** Display name: the surface name for aliases, a generated one otherwise */
	name: string;
}

/** Binding between a surface object and its local alias */
export interface ObjectBinding {
	handle: number;
	name: string;
	/** True when the object is introduced by a definition in this expression */
	isNew: boolean;
	/** True when the object is written to (assigned or defined) */
	isOutput: boolean;
}

/** Runtime check of an existing object's leg counts at one occurrence */
export interface ArityCheck {
	handle: number;
	name: string;
	numout: number;
	numin: number;
}

export interface ContractionPlan {
	locals: readonly LocalEntry[];
	bindings: ObjectBinding[];
	checks: ArityCheck[];
	program: Statement;
}

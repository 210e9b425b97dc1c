// SPDX-License-Identifier: MIT
// Braiding resolution
//
// A crossing placeholder τ[i2b i1b; i1a i2a] (adjoint: τ'[i1b i2b; i2a i1a])
// carries two strands, (i1a -> i1b) and (i2a -> i2b). Constructing it needs
// the vector space of each strand; removing it identifies the two ends of each
// strand with one another.

import { PlanarError } from "../errors.js";
import { formatNode, formatTerm } from "../format.js";
import {
	collectTensors,
	isTensorExpression,
	mapStatementTerms,
	replaceIndices,
} from "../analysis/tensors.js";
import type { LocalArena } from "../temporaries.js";
import type {
	BraidingNode,
	Index,
	SpaceRef,
	Statement,
	TensorTerm,
} from "../types.js";
import { isNamed, sameTerm } from "../types.js";
import { locateIndex, purgeBraidings } from "./locate.js";

//==============================================================================
// Shared Helpers
//==============================================================================

interface Strands {
	i1a: Index;
	i1b: Index;
	i2a: Index;
	i2b: Index;
}

function strandsOf(term: TensorTerm, braidingName: string): Strands {
	const [l1, l2] = term.left;
	const [r1, r2] = term.right;
	if (term.left.length !== 2 || term.right.length !== 2 ||
		l1 === undefined || l2 === undefined || r1 === undefined || r2 === undefined) {
		throw PlanarError.braidingArity(braidingName, formatTerm(term));
	}
	return term.adjoint
		? { i1b: l1, i2b: l2, i2a: r1, i1a: r2 }
		: { i2b: l1, i1b: l2, i1a: r1, i2a: r2 };
}

/** The tensor terms a statement's braidings are resolved against */
interface StatementTerms {
	terms: TensorTerm[];
	/** Indices bound by the left-hand side */
	outgoing: Index[];
	/** Left-hand side of an assignment, seen from the right-hand side */
	lhsAsRhs?: TensorTerm;
}

function statementTerms(node: Statement): StatementTerms | undefined {
	if (node.kind === "assign") {
		if (!isTensorExpression(node.rhs)) return undefined;
		const terms = collectTensors(node.rhs);
		if (node.lhs.kind !== "tensor") return { terms, outgoing: [] };
		const outgoing = [...node.lhs.left, ...node.lhs.right];
		if (node.definition) return { terms, outgoing };
		const lhsAsRhs: TensorTerm = {
			...node.lhs,
			adjoint: !node.lhs.adjoint,
			left: node.lhs.right,
			right: node.lhs.left,
		};
		return { terms, outgoing, lhsAsRhs };
	}
	if (node.kind === "block" || node.kind === "annotated" || node.kind === "braiding") {
		return undefined;
	}
	return isTensorExpression(node) ? { terms: collectTensors(node), outgoing: [] } : undefined;
}

function splitPlaceholders(
	terms: readonly TensorTerm[],
	braidingName: string,
): { placeholders: TensorTerm[]; others: TensorTerm[] } {
	const placeholders: TensorTerm[] = [];
	const others: TensorTerm[] = [];
	for (const t of terms) {
		if (!isNamed(t.object, braidingName)) {
			others.push(t);
		} else if (!placeholders.some((p) => sameTerm(p, t))) {
			placeholders.push(t);
		}
	}
	return { placeholders, others };
}

//==============================================================================
// Construction
//==============================================================================

export interface BraidingOptions {
	braidingName: string;
}

type SpaceMap = ReadonlyMap<Index, SpaceRef>;

function withStrand(spaces: SpaceMap, a: Index, b: Index, ref: SpaceRef): SpaceMap {
	const next = new Map(spaces);
	next.set(a, ref).set(b, ref);
	return next;
}

/**
 * Resolve the space of strand (a -> b) from a neighbouring term: the term
 * holding `a` gives the space as is, the one holding `b` gives its dual.
 */
function resolveStrand(a: Index, b: Index, neighbours: readonly TensorTerm[]): SpaceRef | undefined {
	const atA = locateIndex(a, neighbours);
	if (atA !== undefined) return { ...atA, dual: false };
	const atB = locateIndex(b, neighbours);
	if (atB !== undefined) return { ...atB, dual: true };
	return undefined;
}

/**
 * Propagate resolved spaces along strands shared between placeholders until
 * nothing changes. Returns the final map and whatever is still unresolved.
 */
export function closeStrands(
	initial: SpaceMap,
	unresolved: readonly (readonly [Index, Index])[],
): { spaces: SpaceMap; unresolved: (readonly [Index, Index])[] } {
	let spaces = initial;
	let pending = [...unresolved];
	let changed = true;
	while (changed) {
		changed = false;
		const next: (readonly [Index, Index])[] = [];
		for (const [x, y] of pending) {
			const known = spaces.get(x) ?? spaces.get(y);
			if (known !== undefined) {
				spaces = withStrand(spaces, x, y, known);
				changed = true;
			} else {
				next.push([x, y]);
			}
		}
		pending = next;
	}
	return { spaces, unresolved: pending };
}

function constructStatement(node: Statement, arena: LocalArena, braidingName: string): Statement {
	if (node.kind === "block") {
		return { ...node, body: node.body.map((s) => constructStatement(s, arena, braidingName)) };
	}
	const found = statementTerms(node);
	if (found === undefined) return node;
	const { placeholders, others } = splitPlaceholders(found.terms, braidingName);
	if (placeholders.length === 0) return node;
	const neighbours = found.lhsAsRhs ? [...others, found.lhsAsRhs] : others;

	let spaces: SpaceMap = new Map();
	const unresolved: (readonly [Index, Index])[] = [];
	for (const p of placeholders) {
		const { i1a, i1b, i2a, i2b } = strandsOf(p, braidingName);
		for (const [a, b] of [[i1a, i1b], [i2a, i2b]] as const) {
			const ref = resolveStrand(a, b, neighbours);
			if (ref === undefined) unresolved.push([a, b]);
			else spaces = withStrand(spaces, a, b, ref);
		}
	}
	const closed = closeStrands(spaces, unresolved);
	const namer = (h: number): string => arena.nameOf(h);
	if (closed.unresolved.length > 0) {
		throw PlanarError.unresolvedBraiding(closed.unresolved, formatNode(node, namer));
	}

	const constructions: BraidingNode[] = [];
	let rewritten: Statement = node;
	for (const p of placeholders) {
		const { i1b, i2b } = strandsOf(p, braidingName);
		const s1 = closed.spaces.get(i1b);
		const s2 = closed.spaces.get(i2b);
		if (s1 === undefined || s2 === undefined) {
			throw PlanarError.unresolvedBraiding([[i1b, i2b]], formatNode(node, namer));
		}
		const { handle } = arena.allocate("braiding");
		constructions.push({ kind: "braiding", handle, spaces: [s1, s2] });
		rewritten = mapStatementTerms(rewritten, (t) =>
			sameTerm(t, p) ? { ...t, object: { kind: "local", handle } } : t);
	}
	return { kind: "block", body: [...constructions, rewritten] };
}

/**
 * Replace every crossing placeholder by an explicitly constructed braiding
 * tensor whose spaces are read off neighbouring objects.
 */
export function constructBraidings(node: Statement, arena: LocalArena, options: BraidingOptions): Statement {
	return constructStatement(node, arena, options.braidingName);
}

//==============================================================================
// Removal
//==============================================================================

export type IndexMap = ReadonlyMap<Index, Index>;

/** Follow a chain of identifications to its representative */
export function representative(map: IndexMap, index: Index): Index {
	let current = index;
	const seen = new Set<Index>();
	let next = map.get(current);
	while (next !== undefined && next !== current && !seen.has(next)) {
		seen.add(current);
		current = next;
		next = map.get(current);
	}
	return current;
}

/**
 * Identify indices `a` and `b`. An output-bound index wins; between two
 * positional indices the larger wins; otherwise `a` does.
 */
export function uniteIndices(map: IndexMap, a: Index, b: Index, outgoing: readonly Index[]): IndexMap {
	const ra = representative(map, a);
	const rb = representative(map, b);
	let rep: Index;
	if (outgoing.includes(ra)) rep = ra;
	else if (outgoing.includes(rb)) rep = rb;
	else if (typeof ra === "number" && typeof rb === "number") rep = Math.max(ra, rb);
	else rep = ra;
	const next = new Map(map);
	next.set(ra, rep).set(rb, rep);
	return next;
}

/** Collapse chains so every index maps straight to its representative */
export function closeIndexMap(map: IndexMap): IndexMap {
	return new Map([...map.keys()].map((k): [Index, Index] => [k, representative(map, k)]));
}

function removeStatement(node: Statement, braidingName: string): Statement {
	if (node.kind === "block") {
		return { ...node, body: node.body.map((s) => removeStatement(s, braidingName)) };
	}
	const found = statementTerms(node);
	if (found === undefined) return node;
	const { placeholders } = splitPlaceholders(found.terms, braidingName);
	if (placeholders.length === 0) return node;

	let map: IndexMap = new Map();
	for (const p of placeholders) {
		const { i1a, i1b, i2a, i2b } = strandsOf(p, braidingName);
		map = uniteIndices(map, i1a, i1b, found.outgoing);
		map = uniteIndices(map, i2a, i2b, found.outgoing);
	}
	const closed = closeIndexMap(map);
	const replaced = replaceIndices(node, (i) => closed.get(i) ?? i);
	return purgeBraidings(replaced, braidingName);
}

/**
 * Remove every crossing placeholder by identifying the two ends of each of
 * its strands, then dropping the (now transposed) placeholder terms.
 */
export function removeBraidings(node: Statement, options: BraidingOptions): Statement {
	return removeStatement(node, options.braidingName);
}

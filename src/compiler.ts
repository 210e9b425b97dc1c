// SPDX-License-Identifier: MIT
// Planar Diagram Compiler Pipeline
// normalize → bind → braidings → planarity → decompose

import { PlanarError } from "./errors.js";
import { formatNode } from "./format.js";
import { normalizeAdjoints } from "./passes/adjoint.js";
import { bindObjects, type ObjectSignature } from "./passes/bind.js";
import { constructBraidings, removeBraidings } from "./passes/braiding.js";
import { decomposeContractions, flattenBlocks } from "./passes/decompose.js";
import { checkPlanarity } from "./passes/planarity.js";
import { LocalArena } from "./temporaries.js";
import type { ContractionPlan, Statement } from "./types.js";
import { DEFAULT_BRAIDING_NAME } from "./validator.js";
import { CompileOptionsSchema, type CompileMode } from "./zod-schemas.js";

//==============================================================================
// Options
//==============================================================================

export interface CompileOptions {
	/** What to do with crossing placeholders (default "construct") */
	mode?: CompileMode;
	/** Reserved placeholder name (default "τ") */
	braidingName?: string;
	/** Known object signatures; enables compile-time arity checks */
	objects?: ReadonlyMap<string, ObjectSignature>;
	/** Report each pass on stderr */
	verbose?: boolean;
}

interface ResolvedOptions {
	mode: CompileMode;
	braidingName: string;
	objects: ReadonlyMap<string, ObjectSignature> | undefined;
	verbose: boolean;
}

function resolveOptions(options: CompileOptions): ResolvedOptions {
	const parsed = CompileOptionsSchema.safeParse(options);
	if (!parsed.success) {
		const [issue] = parsed.error.issues;
		throw PlanarError.validation(
			issue ? "options." + issue.path.map(String).join(".") : "options",
			issue?.message ?? "invalid compile options",
		);
	}
	return {
		mode: parsed.data.mode ?? "construct",
		braidingName: parsed.data.braidingName ?? DEFAULT_BRAIDING_NAME,
		objects: parsed.data.objects,
		verbose: parsed.data.verbose ?? false,
	};
}

//==============================================================================
// Pipeline
//==============================================================================

function countStatements(node: Statement): number {
	switch (node.kind) {
	case "block":
		return node.body.reduce((n, s) => n + countStatements(s), 0);
	case "annotated":
		return 0;
	default:
		return 1;
	}
}

/**
 * Compile a diagram statement into a contraction plan. Every failure aborts
 * with a PlanarError; no partial plan is returned.
 */
export function compilePlanar(node: Statement, options: CompileOptions = {}): ContractionPlan {
	const opts = resolveOptions(options);
	const arena = new LocalArena();
	const namer = (h: number): string => arena.nameOf(h);
	const log = (message: string): void => {
		if (opts.verbose) console.warn("[PlanarCompiler] " + message);
	};

	const normalized = normalizeAdjoints(node);
	log("normalized adjoints");

	const bound = bindObjects(normalized, arena, {
		braidingName: opts.braidingName,
		...(opts.objects !== undefined ? { objects: opts.objects } : {}),
	});
	log(
		"bound " + String(bound.bindings.length) + " object(s), " +
			String(bound.checks.length) + " arity check(s)" +
			(opts.objects !== undefined ? " verified" : ""),
	);

	const braided = opts.mode === "remove"
		? removeBraidings(bound.node, { braidingName: opts.braidingName })
		: constructBraidings(bound.node, arena, { braidingName: opts.braidingName });
	log(
		opts.mode === "remove"
			? "removed braiding placeholders"
			: "constructed " + String(arena.countOf("braiding")) + " braiding(s)",
	);

	checkPlanarity(braided, namer);
	log("planarity verified");

	const program = decomposeContractions(braided, arena);
	log(
		"decomposed into " + String(countStatements(program)) + " statement(s) with " +
			String(arena.countOf("temporary")) + " temporar" +
			(arena.countOf("temporary") === 1 ? "y" : "ies"),
	);
	if (opts.verbose) {
		for (const line of formatNode(program, namer).split("\n")) log("  " + line);
	}

	return {
		locals: arena.snapshot(),
		bindings: bound.bindings,
		checks: bound.checks,
		program,
	};
}

/** The plan's program as the ordered list of statements to execute */
export function planStatements(plan: ContractionPlan): Statement[] {
	return flattenBlocks([plan.program]);
}

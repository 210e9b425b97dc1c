// SPDX-License-Identifier: MIT
// planar-compile command

import { compilePlanar, type CompileOptions } from "./compiler.js";
import { parseArgs, readJsonFile, type Options } from "./cli-utils.js";
import { desugarDocument } from "./desugar.js";
import { PlanarError } from "./errors.js";
import { executePlan } from "./execution/executor.js";
import {
	catalogSignatures,
	catalogTensors,
	formatSpaceTensor,
	spaceBackend,
} from "./execution/space-backend.js";
import { formatPlan } from "./format.js";
import type { ContractionPlan } from "./types.js";
import { validateDocument } from "./validator.js";
import { ObjectCatalogSchema, type ObjectCatalog, type PlanarDocument } from "./zod-schemas.js";

export interface CliIO {
	stdout(line: string): void;
	stderr(line: string): void;
}

const consoleIO: CliIO = {
	stdout: (line) => { console.log(line); },
	stderr: (line) => { console.error(line); },
};

export const USAGE = [
	"Usage: planar-compile <document.json> [options]",
	"",
	"Options:",
	"  --mode <construct|remove>  How to treat crossing placeholders",
	"  --objects <catalog.json>   Object spaces for arity checks and a space dry run",
	"  --validate                 Validate the document and stop",
	"  --verbose, -v              Report each compiler pass",
	"  --help, -h                 Show this message",
].join("\n");

async function loadCatalog(path: string, io: CliIO): Promise<ObjectCatalog | undefined> {
	const read = await readJsonFile(path);
	if (!read.ok) {
		io.stderr(read.error);
		return undefined;
	}
	const parsed = ObjectCatalogSchema.safeParse(read.value);
	if (!parsed.success) {
		for (const issue of parsed.error.issues) {
			io.stderr("  " + (issue.path.map(String).join(".") || "$") + ": " + issue.message);
		}
		return undefined;
	}
	return parsed.data;
}

async function loadDocument(path: string, io: CliIO): Promise<PlanarDocument | undefined> {
	const read = await readJsonFile(path);
	if (!read.ok) {
		io.stderr(read.error);
		return undefined;
	}
	const result = validateDocument(read.value);
	if (!result.valid || result.value === undefined) {
		io.stderr("Validation failed:");
		for (const e of result.errors) io.stderr("  " + e.path + ": " + e.message);
		return undefined;
	}
	return result.value;
}

function compileOptions(doc: PlanarDocument, options: Options, catalog: ObjectCatalog | undefined): CompileOptions {
	const mode = options.mode ?? doc.mode;
	return {
		verbose: options.verbose,
		...(mode !== undefined ? { mode } : {}),
		...(doc.braidingName !== undefined ? { braidingName: doc.braidingName } : {}),
		...(catalog !== undefined ? { objects: catalogSignatures(catalog) } : {}),
	};
}

function dryRun(plan: ContractionPlan, catalog: ObjectCatalog, io: CliIO): void {
	const result = executePlan(plan, spaceBackend, catalogTensors(catalog));
	io.stdout("");
	io.stdout("Spaces:");
	for (const b of plan.bindings) {
		const t = result.objects.get(b.name);
		if (b.isOutput && t !== undefined) io.stdout("  " + b.name + " " + formatSpaceTensor(t));
	}
	for (const [name, t] of result.scalars) io.stdout("  " + name + " " + formatSpaceTensor(t));
}

/**
 * Run the command with `args` (without the node and script entries).
 * Returns the process exit code.
 */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
	const { path, options, errors } = parseArgs(args);
	if (options.help) {
		io.stdout(USAGE);
		return 0;
	}
	if (errors.length > 0 || path === null) {
		for (const e of errors) io.stderr(e);
		io.stderr(USAGE);
		return 1;
	}

	const doc = await loadDocument(path, io);
	if (doc === undefined) return 1;
	if (options.validate) {
		io.stdout("Validation passed");
		return 0;
	}

	let catalog: ObjectCatalog | undefined;
	if (options.objects !== undefined) {
		catalog = await loadCatalog(options.objects, io);
		if (catalog === undefined) return 1;
	}

	try {
		const plan = compilePlanar(desugarDocument(doc), compileOptions(doc, options, catalog));
		io.stdout(formatPlan(plan));
		if (catalog !== undefined) dryRun(plan, catalog, io);
		return 0;
	} catch (e) {
		if (e instanceof PlanarError) {
			io.stderr(e.code + ": " + e.message);
			return 1;
		}
		throw e;
	}
}

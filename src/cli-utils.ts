/**
 * Planar Compiler CLI Utilities
 *
 * Extracted CLI functions for testability and reusability:
 * - Argument parsing (with support for flags and options)
 * - File I/O (reading JSON documents and object catalogs)
 */

import { readFile } from "node:fs/promises";

import type { CompileMode } from "./zod-schemas.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	validate: boolean;
	help: boolean;
	mode?: CompileMode;
	objects?: string;
}

export interface ParsedArgs {
	path: string | null;
	options: Options;
	/** Problems with individual arguments, in the order they were seen */
	errors: string[];
}

/**
 * Read and parse a JSON file
 *
 * @returns The parsed value, or the reason it could not be read
 */
export async function readJsonFile(
	filePath: string,
): Promise<{ ok: true; value: unknown } | { ok: false; error: string }> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (e) {
		return { ok: false, error: "cannot read " + filePath + ": " + (e instanceof Error ? e.message : String(e)) };
	}
	try {
		const value: unknown = JSON.parse(content);
		return { ok: true, value };
	} catch (e) {
		return { ok: false, error: "invalid JSON in " + filePath + ": " + (e instanceof Error ? e.message : String(e)) };
	}
}

export function parseMode(value: string): CompileMode | undefined {
	return value === "construct" || value === "remove" ? value : undefined;
}

/**
 * Parse command-line arguments
 *
 * Supports:
 *   - Positional document path
 *   - Flags: --verbose/-v, --help/-h, --validate
 *   - Options with values: --mode <construct|remove>, --objects <path>
 *   - Subcommand style: validate, help
 */
function normalizeArgs(args: string[]): string[] {
	const subcommands: Record<string, string> = {
		validate: "--validate",
		help: "--help",
	};
	return args.flatMap((arg) => [subcommands[arg] ?? arg]);
}

function consumeNextArg(normalized: string[], i: number): string | undefined {
	const nextArg = normalized[i + 1];
	return nextArg !== undefined && !nextArg.startsWith("-") ? nextArg : undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--validate": options.validate = true; return true;
	case "--help": case "-h": options.help = true; return true;
	default: return false;
	}
}

function processValueOption(parsed: ParsedArgs, arg: string, nextVal: string): void {
	if (arg === "--objects") {
		parsed.options.objects = nextVal;
		return;
	}
	const mode = parseMode(nextVal);
	if (mode === undefined) parsed.errors.push("unknown mode: " + nextVal);
	else parsed.options.mode = mode;
}

export function parseArgs(args: string[]): ParsedArgs {
	const normalized = normalizeArgs(args);
	const parsed: ParsedArgs = {
		path: null,
		options: { verbose: false, validate: false, help: false },
		errors: [],
	};

	for (let i = 0; i < normalized.length; i++) {
		const arg = normalized[i];
		if (arg === undefined) break;
		if (processFlag(parsed.options, arg)) continue;
		if (arg === "--mode" || arg === "--objects") {
			const nextVal = consumeNextArg(normalized, i);
			if (nextVal === undefined) {
				parsed.errors.push(arg + " needs a value");
			} else {
				processValueOption(parsed, arg, nextVal);
				i++;
			}
			continue;
		}
		if (arg.startsWith("-")) parsed.errors.push("unknown option: " + arg);
		else parsed.path = arg;
	}

	return parsed;
}

// SPDX-License-Identifier: MIT
// Planar Diagram Compiler - Main Entry Point

// Types
export type {
	AnnotatedBlock,
	ArityCheck,
	AssignmentNode,
	BlockNode,
	BraidingNode,
	ConjNode,
	ContractionPlan,
	Index,
	LocalEntry,
	LocalObject,
	LocalRole,
	NamedObject,
	ObjectBinding,
	ObjectRef,
	ProductNode,
	ScalarTerm,
	SpaceRef,
	Statement,
	SumNode,
	SumTerm,
	TensorExpr,
	TensorTerm,
} from "./types.js";

// Constructors and guards
export {
	annotated,
	assign,
	block,
	conj,
	define,
	isNamed,
	local,
	minus,
	named,
	product,
	sameIndices,
	sameObject,
	sameTerm,
	scalar,
	sum,
	tensor,
} from "./types.js";

// Errors
export {
	ErrorCodes,
	PlanarError,
	combineResults,
	exhaustive,
	invalidResult,
	validResult,
	type ErrorCode,
	type ValidationError,
	type ValidationResult,
} from "./errors.js";

// Compiler
export { compilePlanar, planStatements, type CompileOptions } from "./compiler.js";
export { LocalArena } from "./temporaries.js";

// Passes
export { normalizeAdjoints } from "./passes/adjoint.js";
export {
	bindObjects,
	type BindOptions,
	type BindResult,
	type ObjectSignature,
} from "./passes/bind.js";
export {
	closeIndexMap,
	closeStrands,
	constructBraidings,
	removeBraidings,
	representative,
	uniteIndices,
	type BraidingOptions,
	type IndexMap,
} from "./passes/braiding.js";
export { locateIndex, purgeBraidings, type IndexLocation } from "./passes/locate.js";
export { checkPlanarity } from "./passes/planarity.js";
export {
	declared,
	decomposeContractions,
	extractContractionPairs,
	flattenBlocks,
	suggested,
	type DecomposeContext,
	type Target,
} from "./passes/decompose.js";

// Analysis
export {
	isCyclicPermutation,
	planarUnique,
	possiblePlanarComplements,
	possiblePlanarIndices,
	rotate,
	type PlanarComplement,
} from "./analysis/cyclic.js";
export {
	collectTensors,
	decomposeGeneralTensor,
	freeIndices,
	isScalarExpr,
	isTensorExpression,
	type GeneralTensor,
} from "./analysis/tensors.js";

// Documents
export * from "./zod-schemas.js";
export { DEFAULT_BRAIDING_NAME, validateDocument } from "./validator.js";
export { desugarDocument, desugarExpr, desugarStatement } from "./desugar.js";
export {
	formatExpr,
	formatNode,
	formatPlan,
	formatTerm,
	namerFor,
	type LocalNamer,
} from "./format.js";

// Execution
export type {
	ContractionSpec,
	OperandLeg,
	ScalarFactor,
	TensorBackend,
	TransposeSpec,
} from "./execution/backend.js";
export { executePlan, type ExecutionResult } from "./execution/executor.js";
export {
	catalogSignatures,
	catalogTensors,
	dualSpace,
	formatSpace,
	formatSpaceTensor,
	parseSpace,
	sameSpace,
	spaceBackend,
	spaceTensor,
	type Space,
	type SpaceTensor,
} from "./execution/space-backend.js";

// CLI
export { parseArgs, parseMode, readJsonFile, type Options, type ParsedArgs } from "./cli-utils.js";
export { runCli, USAGE, type CliIO } from "./cli-runner.js";

// SPDX-License-Identifier: MIT
// Planar Diagram Zod Schemas
// Schemas for serialized diagram documents, object catalogs and compile options.
//
// Document interfaces are written out by hand: z.union typed as z.ZodType
// erases recursive inferred types, so recursive schemas are annotated with
// z.ZodType<ExplicitType>.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

export const IndexSchema = z.union([z.string().min(1), z.number().int()])
	.meta({ id: "Index", title: "Index", description: "Symbolic or positional leg label" });

//==============================================================================
// Document Domain - Manual Interfaces
//==============================================================================

export type DocIndex = string | number;

export interface DocTensor {
	kind: "tensor";
	object: string;
	adjoint?: boolean | undefined;
	left: DocIndex[];
	right?: DocIndex[] | undefined;
}
export interface DocScalar { kind: "scalar"; value: number | string }
export interface DocConj { kind: "conj"; arg: DocExpr }
export interface DocSumTerm { sign: "+" | "-"; expr: DocExpr }
export interface DocSum { kind: "sum"; terms: DocSumTerm[] }
export interface DocProduct { kind: "product"; factors: DocExpr[] }

export type DocExpr = DocTensor | DocScalar | DocConj | DocSum | DocProduct;

export interface DocAssign {
	kind: "assign";
	lhs: DocTensor | DocScalar;
	rhs: DocExpr;
	definition?: boolean | undefined;
}
export interface DocBlock { kind: "block"; header?: string | undefined; body: DocStatement[] }
export interface DocAnnotated { kind: "annotated"; annotation: string; body: DocStatement[] }

export type DocStatement = DocAssign | DocBlock | DocAnnotated | DocExpr;

export type CompileMode = "construct" | "remove";

export interface PlanarDocument {
	version: string;
	description?: string | undefined;
	mode?: CompileMode | undefined;
	braidingName?: string | undefined;
	program: DocStatement;
}

//==============================================================================
// Zod Schemas - Expressions
//==============================================================================

export const DocTensorSchema = z.object({
	kind: z.literal("tensor"),
	object: z.string().min(1),
	adjoint: z.boolean().optional(),
	left: z.array(IndexSchema),
	right: z.array(IndexSchema).optional(),
}).meta({ id: "Tensor", title: "Tensor Reference", description: "Named object with its codomain (left) and domain (right) legs" });

export const DocScalarSchema = z.object({
	kind: z.literal("scalar"),
	value: z.union([z.number(), z.string().min(1)]),
}).meta({ id: "Scalar", title: "Scalar", description: "Numeric literal or scalar symbol" });

export const DocConjSchema: z.ZodType<DocConj> = z.object({
	kind: z.literal("conj"),
	get arg() { return DocExprSchema; },
}).meta({ id: "Conj", title: "Conjugation", description: "Complex conjugate of an expression" });

export const DocSumSchema: z.ZodType<DocSum> = z.object({
	kind: z.literal("sum"),
	get terms() {
		return z.array(z.object({ sign: z.enum(["+", "-"]), expr: DocExprSchema })).min(1);
	},
}).meta({ id: "Sum", title: "Linear Combination", description: "Signed sum of expressions with equal open legs" });

export const DocProductSchema: z.ZodType<DocProduct> = z.object({
	kind: z.literal("product"),
	get factors() { return z.array(DocExprSchema).min(2); },
}).meta({ id: "Product", title: "Product", description: "Contraction of two or more factors, folded left to right" });

/** Union of all expression variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const DocExprSchema: z.ZodType<DocExpr> = z.union([
	DocTensorSchema,
	DocScalarSchema,
	DocConjSchema,
	DocSumSchema,
	DocProductSchema,
]).meta({ id: "Expr", title: "Tensor Expression", description: "Right-hand side of a diagram statement" });

//==============================================================================
// Zod Schemas - Statements
//==============================================================================

export const DocAssignSchema: z.ZodType<DocAssign> = z.object({
	kind: z.literal("assign"),
	lhs: z.union([DocTensorSchema, DocScalarSchema]),
	get rhs() { return DocExprSchema; },
	definition: z.boolean().optional(),
}).meta({ id: "Assign", title: "Assignment", description: "Assignment (=) or definition (:=) of a left-hand side" });

export const DocBlockSchema: z.ZodType<DocBlock> = z.object({
	kind: z.literal("block"),
	header: z.string().optional(),
	get body() { return z.array(DocStatementSchema); },
}).meta({ id: "Block", title: "Block", description: "Opaque control construct around a statement sequence" });

export const DocAnnotatedSchema: z.ZodType<DocAnnotated> = z.object({
	kind: z.literal("annotated"),
	annotation: z.string().min(1),
	get body() { return z.array(DocStatementSchema); },
}).meta({ id: "Annotated", title: "Annotated Block", description: "Region excluded from rewriting" });

export const DocStatementSchema: z.ZodType<DocStatement> = z.union([
	DocAssignSchema,
	DocBlockSchema,
	DocAnnotatedSchema,
	DocExprSchema,
]).meta({ id: "Statement", title: "Statement", description: "Any diagram statement" });

export const PlanarDocumentSchema: z.ZodType<PlanarDocument> = z.object({
	version: SemVer,
	description: z.string().optional(),
	mode: z.enum(["construct", "remove"]).optional(),
	braidingName: z.string().min(1).optional(),
	program: DocStatementSchema,
}).meta({ id: "PlanarDocument", title: "Planar Diagram Document", description: "A diagram program with its compilation mode" });

//==============================================================================
// Zod Schemas - Objects and Options
//==============================================================================

export const ObjectSignatureSchema = z.object({
	numout: z.number().int().nonnegative(),
	numin: z.number().int().nonnegative(),
}).meta({ id: "ObjectSignature", title: "Object Signature", description: "Number of output and input legs of an object" });

/** Leg spaces of a catalogued object; a trailing ' marks a dual space */
export const CatalogEntrySchema = z.object({
	codomain: z.array(z.string().min(1)),
	domain: z.array(z.string().min(1)),
}).meta({ id: "CatalogEntry", title: "Catalog Entry", description: "Codomain and domain spaces of an object" });

export const ObjectCatalogSchema = z.record(z.string(), CatalogEntrySchema)
	.meta({ id: "ObjectCatalog", title: "Object Catalog", description: "Spaces of the objects a diagram reads" });

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;
export type ObjectCatalog = z.infer<typeof ObjectCatalogSchema>;

export const CompileOptionsSchema = z.object({
	mode: z.enum(["construct", "remove"]).optional(),
	braidingName: z.string().min(1).optional(),
	objects: z.map(z.string(), ObjectSignatureSchema).optional(),
	verbose: z.boolean().optional(),
});

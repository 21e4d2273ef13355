/**
 * graphform — Declaration Schemas
 *
 * Shape validation for declaration documents (and the attribute values
 * persisted in state) using Zod.
 */

import { z } from "zod";

import { RESOURCE_KINDS, type AttributeValue } from "../graph/types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

const IDENTIFIER = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

export const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(attributeValueSchema),
    z.record(z.string(), attributeValueSchema),
  ]),
);

export const attributesSchema = z.record(z.string(), attributeValueSchema);

export const resourceKindSchema = z.enum(RESOURCE_KINDS);

/**
 * A single resource declaration
 */
export const resourceDeclarationSchema = z
  .object({
    type: z.string().regex(IDENTIFIER, "type must start with a letter and use [a-zA-Z0-9_-]"),
    name: z.string().regex(/^[a-zA-Z0-9_-]+$/, "name may only use [a-zA-Z0-9_-]"),
    kind: resourceKindSchema,
    attributes: attributesSchema.optional(),
    dependsOn: z.array(z.string().regex(/^[a-zA-Z][a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+$/, "expected <type>.<name>")).optional(),
  })
  .strict();

/**
 * Declaration document
 */
export const declarationDocumentSchema = z
  .object({
    resources: z.array(resourceDeclarationSchema),
    outputs: z.record(z.string(), attributeValueSchema).optional(),
  })
  .strict();

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

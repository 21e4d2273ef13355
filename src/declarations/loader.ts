/**
 * graphform — Declaration Loader
 */

import fs from "node:fs/promises";

import { DeclarationValidationError } from "../errors.js";
import type { DeclarationDocument } from "../graph/types.js";
import { declarationDocumentSchema, formatZodIssues } from "./schema.js";

/** Validate an already-parsed JSON value as a declaration document. */
export function parseDeclarations(input: unknown, source?: string): DeclarationDocument {
  const result = declarationDocumentSchema.safeParse(input);
  if (!result.success) {
    throw new DeclarationValidationError(formatZodIssues(result.error), source);
  }
  return result.data;
}

export async function loadDeclarationFile(filePath: string): Promise<DeclarationDocument> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new DeclarationValidationError(
      [`cannot read file: ${err instanceof Error ? err.message : String(err)}`],
      filePath,
    );
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DeclarationValidationError(
      [`not valid JSON: ${err instanceof Error ? err.message : String(err)}`],
      filePath,
    );
  }
  return parseDeclarations(json, filePath);
}

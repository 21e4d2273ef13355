/**
 * graphform — Declaration Loader Tests
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, it, expect, afterEach } from "vitest";
import { DeclarationValidationError, isPreExecutionError } from "../errors.js";
import { loadDeclarationFile, parseDeclarations } from "./loader.js";

describe("parseDeclarations", () => {
  it("accepts a valid document", () => {
    const doc = parseDeclarations({
      resources: [
        { type: "network", name: "main", kind: "network", attributes: { cidr_block: "10.0.0.0/16", tags: { env: "dev" } } },
        { type: "registry", name: "app", kind: "registry", dependsOn: ["network.main"] },
      ],
      outputs: { url: "${registry.app.url}" },
    });

    expect(doc.resources).toHaveLength(2);
    expect(doc.resources[1].dependsOn).toEqual(["network.main"]);
    expect(doc.outputs).toEqual({ url: "${registry.app.url}" });
  });

  it("reports each issue with its path", () => {
    try {
      parseDeclarations({ resources: [{ type: "network", name: "main", kind: "database" }] }, "stack.json");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DeclarationValidationError);
      expect(isPreExecutionError(err)).toBe(true);
      expect(err).toHaveProperty("issues.length", 1);
      expect(String(err instanceof Error ? err.message : err)).toMatch(/^Invalid declarations in stack\.json:\n {2}- resources\.0\.kind: /);
    }
  });

  it("rejects unknown keys on a resource", () => {
    expect(() =>
      parseDeclarations({ resources: [{ type: "network", name: "main", kind: "network", attrs: {} }] }),
    ).toThrow(DeclarationValidationError);
  });

  it("rejects malformed dependsOn addresses", () => {
    expect(() =>
      parseDeclarations({ resources: [{ type: "registry", name: "app", kind: "registry", dependsOn: ["network"] }] }),
    ).toThrow(/expected <type>\.<name>/);
  });

  it("rejects attribute values that are not JSON", () => {
    expect(() =>
      parseDeclarations({ resources: [{ type: "network", name: "main", kind: "network", attributes: { at: new Date() } }] }),
    ).toThrow(DeclarationValidationError);
  });
});

describe("loadDeclarationFile", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function tempFile(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "graphform-decl-"));
    dirs.push(dir);
    const file = path.join(dir, "stack.json");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("reads and validates a JSON file", async () => {
    const file = tempFile(JSON.stringify({ resources: [{ type: "network", name: "main", kind: "network" }] }));
    const doc = await loadDeclarationFile(file);
    expect(doc.resources[0]).toEqual({ type: "network", name: "main", kind: "network" });
  });

  it("turns invalid JSON into a declaration error", async () => {
    const file = tempFile("{ resources: ");
    await expect(loadDeclarationFile(file)).rejects.toThrow(/not valid JSON/);
  });

  it("turns a missing file into a declaration error", async () => {
    await expect(loadDeclarationFile(path.join(os.tmpdir(), "graphform-missing", "none.json"))).rejects.toBeInstanceOf(
      DeclarationValidationError,
    );
  });
});

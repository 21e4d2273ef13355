/**
 * graphform — Reference Expression Tests
 */

import { describe, it, expect } from "vitest";
import {
  KNOWN_AFTER_APPLY,
  collectReferences,
  isReference,
  parseReferences,
  resolveAttributes,
  type OutputLookup,
} from "./references.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const outputs: Record<string, Record<string, string | number | null>> = {
  "network.main": { id: "net-000001", cidr_block: "10.0.0.0/16" },
  "registry.app": { id: "repo-000002", url: "registry.sim.local/web-app" },
  "compute-service.api": { id: "svc-000003", port: 3000 },
};

const lookup: OutputLookup = (address) => outputs[address];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("parseReferences", () => {
  it("finds every reference in order", () => {
    expect(parseReferences("${network.main.id}/${registry.app.url}")).toEqual([
      { address: "network.main", type: "network", name: "main", output: "id" },
      { address: "registry.app", type: "registry", name: "app", output: "url" },
    ]);
  });

  it("accepts hyphenated types and names", () => {
    expect(parseReferences("${identity-role.web-task.arn}")).toEqual([
      { address: "identity-role.web-task", type: "identity-role", name: "web-task", output: "arn" },
    ]);
  });

  it("ignores plain strings and malformed expressions", () => {
    expect(parseReferences("10.0.0.0/16")).toEqual([]);
    expect(parseReferences("${network.main}")).toEqual([]);
    expect(parseReferences("$network.main.id")).toEqual([]);
  });
});

describe("isReference", () => {
  it("is true only for a string that is exactly one reference", () => {
    expect(isReference("${network.main.id}")).toBe(true);
    expect(isReference("${registry.app.url}:v1")).toBe(false);
    expect(isReference(" ${network.main.id}")).toBe(false);
  });
});

describe("collectReferences", () => {
  it("walks nested arrays and objects with dotted attribute paths", () => {
    const refs = collectReferences("compute-service.api", {
      image: "${registry.app.url}:v1",
      security_policy_ids: ["sg-static", "${security-policy.web.id}"],
      environment: { NETWORK: "${network.main.id}" },
      port: 3000,
    });

    expect(refs).toEqual([
      { from: "compute-service.api", attribute: "image", to: "registry.app", output: "url" },
      { from: "compute-service.api", attribute: "security_policy_ids.1", to: "security-policy.web", output: "id" },
      { from: "compute-service.api", attribute: "environment.NETWORK", to: "network.main", output: "id" },
    ]);
  });
});

describe("resolveAttributes", () => {
  it("substitutes a whole-string reference with the raw output value", () => {
    const result = resolveAttributes({ port: "${compute-service.api.port}" }, lookup);
    expect(result.values).toEqual({ port: 3000 });
    expect(result.unknown).toEqual([]);
  });

  it("interpolates embedded references as text", () => {
    const result = resolveAttributes(
      { image: "${registry.app.url}:v1", label: "port-${compute-service.api.port}" },
      lookup,
    );
    expect(result.values).toEqual({ image: "registry.sim.local/web-app:v1", label: "port-3000" });
  });

  it("resolves inside arrays and objects", () => {
    const result = resolveAttributes(
      { ids: ["${network.main.id}"], env: { CIDR: "${network.main.cidr_block}" } },
      lookup,
    );
    expect(result.values).toEqual({ ids: ["net-000001"], env: { CIDR: "10.0.0.0/16" } });
  });

  it("marks unresolvable attributes as known after apply", () => {
    const result = resolveAttributes(
      {
        network_id: "${network.other.id}",
        tags: { owner: "${registry.missing.url}-x" },
        name: "web",
      },
      lookup,
    );
    expect(result.values).toEqual({
      network_id: KNOWN_AFTER_APPLY,
      tags: { owner: `${KNOWN_AFTER_APPLY}-x` },
      name: "web",
    });
    expect(result.unknown).toEqual(["network_id", "tags"]);
  });

  it("treats a null output as a known value", () => {
    const result = resolveAttributes({ cidr: "${network.none.cidr_block}" }, () => ({ cidr_block: null }));
    expect(result.values).toEqual({ cidr: null });
    expect(result.unknown).toEqual([]);
  });
});

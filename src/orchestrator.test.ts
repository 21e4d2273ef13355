/**
 * graphform — Orchestrator Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ExecutionEvent } from "./engine/types.js";
import { CyclicDependencyError, StateCorruptionError, StateLockError, UndeclaredReferenceError } from "./errors.js";
import type { DeclarationDocument, ResourceDeclaration } from "./graph/types.js";
import { createLogger } from "./logging/index.js";
import { Orchestrator } from "./orchestrator.js";
import { SimulatedProvider, type SimulatedCall } from "./provider/simulated.js";
import { InMemoryStateStore } from "./state/storage.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NETWORK: ResourceDeclaration = { type: "network", name: "main", kind: "network", attributes: { cidr_block: "10.0.0.0/16" } };
const POLICY: ResourceDeclaration = {
  type: "security-policy",
  name: "web",
  kind: "security-policy",
  attributes: { network_id: "${network.main.id}", ingress: [{ port: 443 }] },
};
const ROLE: ResourceDeclaration = { type: "identity-role", name: "task", kind: "identity-role", attributes: { name: "web-task" } };
const REGISTRY: ResourceDeclaration = { type: "registry", name: "app", kind: "registry", attributes: { name: "web-app" } };
const SERVICE: ResourceDeclaration = {
  type: "compute-service",
  name: "api",
  kind: "compute-service",
  attributes: {
    image: "${registry.app.url}:v1",
    port: 3000,
    role_arn: "${identity-role.task.arn}",
    security_policy_ids: ["${security-policy.web.id}"],
  },
};

function webStack(): DeclarationDocument {
  return {
    resources: [NETWORK, POLICY, ROLE, REGISTRY, SERVICE],
    outputs: { endpoint: "${compute-service.api.endpoint}", repository: "${registry.app.url}" },
  };
}

function chainedServices(port: number): DeclarationDocument {
  return {
    resources: [
      { type: "compute-service", name: "backend", kind: "compute-service", attributes: { image: "api:v1", port } },
      {
        type: "compute-service",
        name: "front",
        kind: "compute-service",
        attributes: { image: "web:v1", environment: { API: "${compute-service.backend.endpoint}" } },
      },
    ],
  };
}

function callsOf(provider: SimulatedProvider, operation: SimulatedCall["operation"]): Array<string | undefined> {
  return provider.calls.filter((c) => c.operation === operation).map((c) => c.address);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Orchestrator", () => {
  let store: InMemoryStateStore;
  let provider: SimulatedProvider;
  let failService: boolean;
  let orchestrator: Orchestrator;

  beforeEach(async () => {
    store = new InMemoryStateStore();
    await store.initialize();
    failService = false;
    provider = new SimulatedProvider({
      shouldFail: (call) => failService && call.address === "compute-service.api" && "capacity unavailable",
    });
    orchestrator = new Orchestrator({
      store,
      provider,
      execution: { maxConcurrency: 1 },
      logger: createLogger("test", { level: "fatal" }),
      lockOwner: "tester:1",
    });
  });

  describe("plan", () => {
    it("plans every resource of a fresh stack without calling the provider", async () => {
      const plan = await orchestrator.plan(webStack());

      expect(plan.summary).toEqual({ create: 5, update: 0, replace: 0, destroy: 0 });
      expect(plan.outputs).toEqual({ endpoint: "(known after apply)", repository: "(known after apply)" });
      expect(provider.calls).toEqual([]);
    });
  });

  describe("apply", () => {
    it("creates producers before consumers and resolves stack outputs", async () => {
      const report = await orchestrator.apply(webStack());

      expect(report.status).toBe("succeeded");
      const created = callsOf(provider, "create");
      expect(created.slice(0, 3).sort()).toEqual(["identity-role.task", "network.main", "registry.app"]);
      expect(created.slice(3)).toEqual(["security-policy.web", "compute-service.api"]);
      expect(report.outputs).toEqual({
        endpoint: "http://svc-000005.svc.sim.local:3000",
        repository: "registry.sim.local/web-app",
      });
      expect((await store.load()).size).toBe(5);
    });

    it("passes resolved outputs into consumer attributes", async () => {
      await orchestrator.apply(webStack());

      const snapshot = await store.load();
      const registryId = snapshot.get("registry.app")?.id;
      const policyId = snapshot.get("security-policy.web")?.id;
      const service = provider.calls.find((c) => c.operation === "create" && c.address === "compute-service.api");
      expect(service?.attributes).toMatchObject({
        image: "registry.sim.local/web-app:v1",
        security_policy_ids: [policyId],
      });
      expect(registryId).toMatch(/^repo-/);
    });

    it("converges: a second apply of the same stack does nothing", async () => {
      await orchestrator.apply(webStack());
      const before = provider.calls.length;

      const second = await orchestrator.apply(webStack());

      expect(second.plan.actions).toEqual([]);
      expect(second.status).toBe("succeeded");
      expect(provider.calls.length).toBe(before);
    });

    it("keeps completed work after a failure and finishes on the next run", async () => {
      failService = true;
      const first = await orchestrator.apply(webStack());

      expect(first.status).toBe("failed");
      expect(first.errors).toEqual(['Provider failed to create "compute-service.api": capacity unavailable']);
      expect([...(await store.load()).keys()].sort()).toEqual([
        "identity-role.task",
        "network.main",
        "registry.app",
        "security-policy.web",
      ]);

      failService = false;
      const second = await orchestrator.apply(webStack());

      expect(second.plan.actions.map((a) => a.id)).toEqual(["create:compute-service.api"]);
      expect(second.status).toBe("succeeded");
      expect((await store.load()).size).toBe(5);
    });

    it("destroys resources dropped from the declarations", async () => {
      await orchestrator.apply(webStack());

      const report = await orchestrator.apply({ resources: [NETWORK, POLICY, ROLE, REGISTRY] });

      expect(report.plan.actions.map((a) => a.id)).toEqual(["destroy:compute-service.api"]);
      expect((await store.load()).has("compute-service.api")).toBe(false);
      expect(provider.listIds()).toHaveLength(4);
    });

    it("rejects a removed resource that is still referenced before any provider call", async () => {
      await orchestrator.apply(webStack());
      const before = provider.calls.length;

      await expect(orchestrator.apply({ resources: [NETWORK, POLICY, ROLE, SERVICE] })).rejects.toThrow(
        UndeclaredReferenceError,
      );
      expect(provider.calls.length).toBe(before);
      expect((await store.load()).size).toBe(5);
      expect(await store.getLock()).toBeNull();
    });

    it("re-resolves consumers of an output changed by an in-place update", async () => {
      await orchestrator.apply(chainedServices(3000));

      const report = await orchestrator.apply(chainedServices(4000));

      expect(report.status).toBe("succeeded");
      expect(report.plan.actions.map((a) => a.id)).toEqual([
        "update:compute-service.backend",
        "update:compute-service.front",
      ]);
      expect((await store.load()).get("compute-service.front")?.attributes).toEqual({
        image: "web:v1",
        environment: { API: "http://svc-000001.svc.sim.local:4000" },
      });
      expect((await orchestrator.plan(chainedServices(4000))).actions).toEqual([]);
    });

    it("updates only the changed resource when no output it exposes changes", async () => {
      await orchestrator.apply(webStack());

      const tagged = { ...NETWORK, attributes: { ...NETWORK.attributes, tags: { env: "dev" } } };
      const report = await orchestrator.apply({ ...webStack(), resources: [tagged, POLICY, ROLE, REGISTRY, SERVICE] });

      expect(report.plan.actions.map((a) => a.id)).toEqual(["update:network.main"]);
      expect(callsOf(provider, "update")).toEqual(["network.main"]);
    });

    it("reports a dependency cycle ahead of the state lock", async () => {
      await store.acquireLock({ id: "other", operation: "apply", lockedBy: "ci:42", lockedAt: "2026-01-01T00:00:00.000Z" });
      const cyclic: DeclarationDocument = {
        resources: [
          { type: "compute-service", name: "a", kind: "compute-service", attributes: { peer: "${compute-service.b.endpoint}" } },
          { type: "compute-service", name: "b", kind: "compute-service", attributes: { peer: "${compute-service.a.endpoint}" } },
        ],
      };

      await expect(orchestrator.apply(cyclic)).rejects.toBeInstanceOf(CyclicDependencyError);
      expect(provider.calls).toEqual([]);
    });

    it("refuses to run while another holder has the state lock", async () => {
      await store.acquireLock({ id: "other", operation: "apply", lockedBy: "ci:42", lockedAt: "2026-01-01T00:00:00.000Z" });

      const run = orchestrator.apply(webStack());

      await expect(run).rejects.toBeInstanceOf(StateLockError);
      await expect(run).rejects.toThrow("State is locked by ci:42 since 2026-01-01T00:00:00.000Z");
      expect(provider.calls).toEqual([]);
    });

    it("releases the lock after a run", async () => {
      await orchestrator.apply(webStack());
      expect(await store.getLock()).toBeNull();
    });

    it("reports a cancelled run without starting actions", async () => {
      const controller = new AbortController();
      controller.abort();

      const report = await orchestrator.apply(webStack(), { signal: controller.signal });

      expect(report.status).toBe("cancelled");
      expect(report.outcomes.every((o) => o.status === "not-attempted")).toBe(true);
      expect(provider.calls).toEqual([]);
    });

    it("forwards executor events to subscribers", async () => {
      const events: ExecutionEvent[] = [];
      const unsubscribe = orchestrator.on((e) => events.push(e));

      await orchestrator.apply({ resources: [NETWORK] });
      unsubscribe();
      await orchestrator.apply({ resources: [] });

      expect(events.map((e) => e.type)).toEqual(["apply:start", "action:start", "action:complete", "apply:complete"]);
    });
  });

  describe("destroy", () => {
    it("tears down dependents before their dependencies", async () => {
      await orchestrator.apply(webStack());

      const report = await orchestrator.destroy();

      expect(report.status).toBe("succeeded");
      const destroyed = callsOf(provider, "destroy");
      expect(destroyed[0]).toBe("compute-service.api");
      expect(destroyed.slice(1, 4).sort()).toEqual(["identity-role.task", "registry.app", "security-policy.web"]);
      expect(destroyed[4]).toBe("network.main");
      expect((await store.load()).size).toBe(0);
      expect(provider.listIds()).toEqual([]);
      expect(report.outputs).toEqual({});
    });

    it("is a no-op on empty state", async () => {
      const report = await orchestrator.destroy();
      expect(report.plan.actions).toEqual([]);
      expect(report.status).toBe("succeeded");
    });
  });

  describe("verify", () => {
    it("checks every recorded resource", async () => {
      await orchestrator.apply(webStack());
      expect(await orchestrator.verify()).toEqual({ checked: 5 });
    });

    it("flags resources deleted out of band", async () => {
      await orchestrator.apply(webStack());
      const id = (await store.load()).get("registry.app")?.id ?? "";
      provider.forget(id);

      const run = orchestrator.verify();

      await expect(run).rejects.toBeInstanceOf(StateCorruptionError);
      await expect(run).rejects.toHaveProperty("addresses", ["registry.app"]);
    });
  });
});

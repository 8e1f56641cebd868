/**
 * API Tests
 *
 * Boots the whole application on an in-memory role store seeded with the
 * demo instance, and drives it with inject().
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { InMemoryRoleStore, clearSubscribers, loadConfig, setAuthProvider } from "@arbor/platform";
import { bootstrap, type AppContext } from "./bootstrap.js";
import { buildApp } from "./app.js";
import { DEMO_INSTANCE_ID, seedDemoInstance, type DemoSeedResult } from "./demo.js";

let context: AppContext;
let seeded: DemoSeedResult;
let app: FastifyInstance;

const asUser = (id: string) => ({ authorization: `Bearer ${id}` });

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  clearSubscribers();
  setAuthProvider(null);

  context = await bootstrap({
    config: loadConfig({ NODE_ENV: "test", SUPER_ADMIN_USER_IDS: "staff-1" }),
    store: new InMemoryRoleStore(),
  });
  seeded = await seedDemoInstance(context.admin);
  app = await buildApp(context, { env: {} });
  await app.ready();
});

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
});

describe("bootstrap", () => {
  it("uses the in-memory store outside production", () => {
    expect(context.config.roleStore).toBe("memory");
  });

  it("seeds one role per template", () => {
    expect(Object.keys(seeded.roleIds)).toEqual(["Administrator", "Editor", "Contributor", "Public"]);
  });
});

describe("HTTP boundary", () => {
  it("answers the health check", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("ok");
  });

  it("sets security headers", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
  });

  it("reflects the request origin in development", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/health",
      headers: { origin: "http://localhost:3000" },
    });
    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:3000");
  });
});

describe("permissions on the demo instance", () => {
  it("gives unassigned users the default role", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/instances/demo/permissions/plot",
      headers: asUser("visitor-1"),
    });
    const { data } = res.json();
    expect(data.level).toBe("write");
    expect(data.fields.ownerOrigId).toBe("read");
    expect(data.fields.width).toBe("write");
  });

  it("lists user-defined fields", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/instances/demo/permissions/tree",
      headers: asUser("demo-contributor"),
    });
    const { data } = res.json();
    expect(data.level).toBe("read");
    expect(data.fields["udf:Stewardship"]).toBe("read");
  });

  it("lets contributors add photos they will own", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/instances/demo/decisions",
      headers: { ...asUser("demo-contributor"), "content-type": "application/json" },
      payload: JSON.stringify({ action: "create", object: { modelType: "treePhoto" } }),
    });
    expect(res.json().data.decision).toEqual({ allowed: true, via: "ownership" });
  });

  it("refuses species changes while species editing is off", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/instances/demo/decisions?enforce=true",
      headers: { ...asUser("demo-admin"), "content-type": "application/json" },
      payload: JSON.stringify({ action: "update", object: { modelType: "Species", id: "sp-1" } }),
    });
    expect(res.statusCode).toBe(403);
    expect(res.json().denial).toEqual({
      status: 403,
      code: "permission_denied",
      reason: "feature-disabled",
      action: "update",
      modelType: "Species",
      objectId: "sp-1",
      instanceId: DEMO_INSTANCE_ID,
      userId: "demo-admin",
      message: "Changes to species records are disabled in this instance.",
    });
  });

  it("lets super admins read but not write", async () => {
    await context.admin.assignRole("staff-1", DEMO_INSTANCE_ID, seeded.roleIds["Contributor"] ?? "");

    const read = await app.inject({
      method: "GET",
      url: "/api/instances/demo/permissions/plot",
      headers: asUser("staff-1"),
    });
    expect(read.json().data.fields.ownerOrigId).toBe("read");

    const write = await app.inject({
      method: "POST",
      url: "/api/instances/demo/decisions",
      headers: { ...asUser("staff-1"), "content-type": "application/json" },
      payload: JSON.stringify({ action: "delete", object: { modelType: "Tree", id: "tree-1", ownerId: "bob" } }),
    });
    expect(write.json().data.decision).toEqual({ allowed: false, reason: "not-owner" });
  });
});

describe("role changes", () => {
  it("are visible to the next request without waiting for the cache to expire", async () => {
    const before = await app.inject({
      method: "GET",
      url: "/api/instances/demo/permissions/species",
      headers: asUser("visitor-2"),
    });
    expect(before.json().data.level).toBe("read");

    await context.admin.assignRole("visitor-2", DEMO_INSTANCE_ID, seeded.roleIds["Administrator"] ?? "");

    const after = await app.inject({
      method: "GET",
      url: "/api/instances/demo/permissions/species",
      headers: asUser("visitor-2"),
    });
    expect(after.json().data.level).toBe("write");
  });
});

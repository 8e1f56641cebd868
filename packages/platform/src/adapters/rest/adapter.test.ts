/**
 * REST Adapter Tests
 *
 * Drives the permission routes through fastify.inject(); no sockets.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { defineModel, type Instance } from "@arbor/contracts";
import { registerPermissionRoutes, statusForError } from "./adapter.js";
import { DevAuthProvider, setAuthProvider } from "../../auth/index.js";
import { RoleRegistry } from "../../core/authz/role-registry.js";
import { InMemoryRoleStore, type InstanceRef } from "../../core/authz/role-store.js";
import { clearModelRegistry, registerModels } from "../../core/models/model-registry.js";
import {
  resetObservability,
  setObservabilityProvider,
  type ObservabilityProvider,
} from "../../core/observability/index.js";
import {
  ConfigurationInvariantViolation,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from "../../core/errors.js";

const PHILLY: Instance = {
  id: "inst-1",
  name: "Philadelphia",
  urlName: "philly",
  features: [],
  userDefinedFields: [],
};

async function seededStore(): Promise<InMemoryRoleStore> {
  const store = new InMemoryRoleStore();
  await store.saveInstance(PHILLY);
  await store.saveRole({
    id: "role-editor",
    instanceId: "inst-1",
    name: "Editor",
    isDefault: false,
    grants: [
      { modelType: "Plot", level: "write" },
      { modelType: "Plot", fieldName: "width", level: "read" },
    ],
  });
  await store.saveRole({
    id: "role-public",
    instanceId: "inst-1",
    name: "Public",
    isDefault: true,
    grants: [
      { modelType: "Plot", level: "read" },
      { modelType: "Tree", level: "read", ownedLevel: "write" },
    ],
  });
  await store.saveAssignment({ userId: "alice", instanceId: "inst-1", roleId: "role-editor" });
  return store;
}

async function buildTestApp(store: InMemoryRoleStore): Promise<FastifyInstance> {
  const app = Fastify();
  await registerPermissionRoutes(app, { registry: new RoleRegistry(store) });
  await app.ready();
  return app;
}

const asUser = (id: string) => ({ authorization: `Bearer ${id}` });

let app: FastifyInstance;

beforeEach(async () => {
  clearModelRegistry();
  registerModels([
    defineModel({
      name: "Plot",
      description: "A planting site",
      fields: [
        { name: "width", type: "float", description: "Plot width" },
        { name: "notes", type: "string", description: "Notes" },
      ],
    }),
    defineModel({
      name: "Tree",
      description: "A tree",
      fields: [
        { name: "diameter", type: "float", description: "Trunk diameter" },
        { name: "createdBy", type: "string", description: "Added by" },
      ],
      ownership: { field: "createdBy" },
    }),
  ]);
  setAuthProvider(new DevAuthProvider());
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  app = await buildTestApp(await seededStore());
});

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
  resetObservability();
});

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

describe("statusForError", () => {
  it("maps each engine error to its status", () => {
    expect(statusForError(new ValidationError("bad"))).toBe(400);
    expect(statusForError(new NotFoundError("Instance", "x"))).toBe(404);
    expect(statusForError(new ConfigurationInvariantViolation("bad"))).toBe(422);
    expect(
      statusForError(
        new PermissionDeniedError({
          status: 403,
          code: "permission_denied",
          reason: "not-owner",
          action: "update",
          modelType: "Tree",
          instanceId: "inst-1",
          userId: "bob",
          message: "You can only update a tree you added.",
        })
      )
    ).toBe(403);
  });

  it("maps anything else to 500", () => {
    expect(statusForError(new Error("boom"))).toBe(500);
    expect(statusForError("boom")).toBe(500);
  });
});

// ---------------------------------------------------------------------------
// Permissions
// ---------------------------------------------------------------------------

describe("GET /api/instances/:urlName/permissions/:model", () => {
  it("returns the model level and the field map", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/instances/PHILLY/permissions/plot",
      headers: asUser("alice"),
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      data: {
        instanceId: "inst-1",
        modelType: "Plot",
        level: "write",
        fields: { width: "read", notes: "write" },
      },
    });
  });

  it("answers anonymous callers from the read-only default role", async () => {
    const res = await app.inject({ method: "GET", url: "/api/instances/philly/permissions/Tree" });
    expect(res.json().data.level).toBe("read");
  });

  it("returns 404 for an unknown instance", async () => {
    const res = await app.inject({ method: "GET", url: "/api/instances/atlantis/permissions/plot" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ success: false, error: 'Instance "atlantis" not found' });
  });

  it("returns 400 for an unknown model", async () => {
    const res = await app.inject({ method: "GET", url: "/api/instances/philly/permissions/shrub" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid model type: "shrub"');
    expect(res.json().fieldErrors).toEqual([
      { field: "modelType", message: 'Unknown model "shrub"', code: "invalid_model" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

describe("POST /api/instances/:urlName/decisions", () => {
  const post = (payload: unknown, headers: Record<string, string> = {}, query = "") =>
    app.inject({
      method: "POST",
      url: `/api/instances/philly/decisions${query}`,
      headers,
      payload: JSON.stringify(payload),
    });

  it("returns an allowing decision without a denial", async () => {
    const res = await post(
      { action: "update", object: { modelType: "Plot", id: "plot-1" } },
      { ...asUser("alice"), "content-type": "application/json" }
    );
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      data: { decision: { allowed: true, via: "model-grant" }, denial: null },
    });
  });

  it("returns a refusal as data with its denial", async () => {
    const res = await post(
      { action: "update", object: { modelType: "plot", id: "plot-1" } },
      { "content-type": "application/json" }
    );
    expect(res.statusCode).toBe(200);
    const { data } = res.json();
    expect(data.decision).toEqual({ allowed: false, reason: "insufficient-model-grant" });
    expect(data.denial).toEqual({
      status: 403,
      code: "permission_denied",
      reason: "insufficient-model-grant",
      action: "update",
      modelType: "Plot",
      objectId: "plot-1",
      instanceId: "inst-1",
      userId: null,
      message: "You do not have permission to update this plot.",
    });
  });

  it("answers 403 with the denial when enforcing", async () => {
    const res = await post(
      { action: "delete", object: { modelType: "Tree", id: "tree-1", ownerId: "bob" } },
      { ...asUser("carol"), "content-type": "application/json" },
      "?enforce=true"
    );
    expect(res.statusCode).toBe(403);
    const body = res.json();
    expect(body.success).toBe(false);
    expect(body.error).toBe("You can only delete a tree you added.");
    expect(body.denial.reason).toBe("not-owner");
    expect(body.denial.userId).toBe("carol");
  });

  it("allows owners through their owner-scoped grant", async () => {
    const res = await post(
      { action: "update", object: { modelType: "Tree", id: "tree-1", ownerId: "bob" } },
      { ...asUser("bob"), "content-type": "application/json" },
      "?enforce=true"
    );
    expect(res.statusCode).toBe(200);
    expect(res.json().data.decision).toEqual({ allowed: true, via: "ownership" });
  });

  it("checks the named field writes", async () => {
    const res = await post(
      { action: "update", object: { modelType: "Plot", id: "plot-1" }, fields: ["notes", "width"] },
      { ...asUser("alice"), "content-type": "application/json" }
    );
    const { data } = res.json();
    expect(data.decision).toEqual({
      allowed: false,
      reason: "insufficient-field-grant",
      fields: ["plot.width"],
    });
    expect(data.denial.message).toBe("You do not have permission to edit: plot.width.");
  });

  it("enforces field writes with 403", async () => {
    const res = await post(
      { action: "update", object: { modelType: "Plot", id: "plot-1" }, fields: ["width"] },
      { ...asUser("alice"), "content-type": "application/json" },
      "?enforce=true"
    );
    expect(res.statusCode).toBe(403);
    expect(res.json().denial.fields).toEqual(["plot.width"]);
  });

  it("refuses objects of another instance", async () => {
    const res = await post(
      { action: "read", object: { modelType: "Plot", id: "plot-9", instanceId: "inst-2" } },
      { ...asUser("alice"), "content-type": "application/json" }
    );
    expect(res.json().data.decision).toEqual({ allowed: false, reason: "cross-instance" });
  });

  it("returns 400 for a malformed body", async () => {
    const res = await post(
      { action: "chop", object: { modelType: "Plot" } },
      { ...asUser("alice"), "content-type": "application/json" }
    );
    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("Invalid decision request");
    expect(body.fieldErrors[0].field).toBe("action");
  });

  it("returns 400 for unparseable JSON", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/instances/philly/decisions",
      headers: { "content-type": "application/json" },
      payload: "{",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Field descriptors
// ---------------------------------------------------------------------------

describe("GET /api/instances/:urlName/fields/:identifier", () => {
  it("describes a field of a new object", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/instances/philly/fields/plot.notes",
      headers: asUser("alice"),
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({
      label: "Notes",
      identifier: "plot.notes",
      value: null,
      displayValue: null,
      dataType: "string",
      isVisible: true,
      isEditable: true,
      choices: null,
    });
  });

  it("takes the label from the query", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/instances/philly/fields/plot.width?label=Width",
      headers: asUser("alice"),
    });
    expect(res.json().data.label).toBe("Width");
    expect(res.json().data.isEditable).toBe(false);
  });

  it("returns 400 for a malformed identifier", async () => {
    const res = await app.inject({ method: "GET", url: "/api/instances/philly/fields/plotwidth" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('expected a string with the format "model.field", got "plotwidth"');
  });
});

// ---------------------------------------------------------------------------
// Boundary
// ---------------------------------------------------------------------------

describe("boundary", () => {
  it("serves the auth config without identifying the caller", async () => {
    const res = await app.inject({ method: "GET", url: "/api/auth/config" });
    expect(res.statusCode).toBe(200);
    expect(res.json().provider).toBe("dev");
  });

  it("captures unexpected errors and answers with a generic 500", async () => {
    class BrokenStore extends InMemoryRoleStore {
      override async findInstance(_ref: InstanceRef): Promise<Instance | null> {
        throw new Error("connection reset");
      }
    }
    const captured: string[] = [];
    const provider: ObservabilityProvider = {
      name: "test",
      captureException: (error) => captured.push(error.message),
      captureMessage: () => {},
      flush: async () => {},
    };
    setObservabilityProvider(provider);
    vi.spyOn(console, "error").mockImplementation(() => {});

    const broken = await buildTestApp(new BrokenStore());
    const res = await broken.inject({ method: "GET", url: "/api/instances/philly/permissions/plot" });
    await broken.close();

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ success: false, error: "An unexpected error occurred." });
    expect(captured).toEqual(["connection reset"]);
  });
});

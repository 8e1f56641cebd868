/**
 * Object Permission Checker Tests
 *
 * Covers the check order and every denial reason:
 *   - cross-instance isolation beats any grant
 *   - read needs read, mutations need write
 *   - owner-scoped escalation and not-owner
 *   - instance feature toggles
 *   - super-admin read access
 *   - zero-grant fallback denies everything
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ANONYMOUS,
  MODEL_ACTIONS,
  defineModel,
  type AuthorizableObject,
  type Instance,
  type PermissionContext,
  type RoleGrant,
  type User,
} from "@arbor/contracts";
import { canPerform, decide, filterPermitted, modelPermission } from "./object-permission.js";
import { buildPermissionContext } from "./context.js";
import { freezeRole, zeroGrantRole } from "./role.js";
import { clearModelRegistry, registerModels } from "../models/model-registry.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const MODELS = [
  defineModel({
    name: "Plot",
    description: "A planting site",
    fields: [{ name: "width", type: "float", description: "Plot width" }],
  }),
  defineModel({
    name: "Tree",
    description: "A tree in a plot",
    fields: [
      { name: "diameter", type: "float", description: "Trunk diameter" },
      { name: "createdBy", type: "string", description: "Added by" },
    ],
    ownership: { field: "createdBy" },
  }),
  defineModel({
    name: "TreePhoto",
    description: "A photo of a tree",
    fields: [
      { name: "image", type: "string", description: "Image" },
      { name: "createdBy", type: "string", description: "Added by" },
    ],
    ownership: { field: "createdBy" },
    requiresFeature: "photo_uploads",
  }),
];

const I1: Instance = { id: "i1", name: "One", urlName: "one", features: [], userDefinedFields: [] };

const U: User = { kind: "user", id: "u", isSuperAdmin: false };
const ROOT: User = { kind: "user", id: "root", isSuperAdmin: true };

function contextWith(
  grants: RoleGrant[],
  user: User = U,
  instance: Instance = I1
): PermissionContext {
  const role = freezeRole({ id: "r", instanceId: instance.id, name: "Test", isDefault: false, grants });
  return buildPermissionContext(user, instance, role);
}

function obj(modelType: string, overrides: Partial<AuthorizableObject> = {}): AuthorizableObject {
  return { modelType, id: `${modelType}-1`, instanceId: "i1", ...overrides };
}

beforeEach(() => {
  clearModelRegistry();
  registerModels(MODELS);
});

// ---------------------------------------------------------------------------
// Model grants
// ---------------------------------------------------------------------------

describe("model grants", () => {
  it("allows updates with a write grant", () => {
    const editor = contextWith([{ modelType: "Plot", level: "write" }]);
    expect(decide(editor, "update", obj("Plot"))).toEqual({ allowed: true, via: "model-grant" });
  });

  it("refuses updates with a read grant", () => {
    const viewer = contextWith([{ modelType: "Plot", level: "read" }]);
    expect(canPerform(viewer, "read", obj("Plot"))).toBe(true);
    expect(decide(viewer, "update", obj("Plot"))).toEqual({
      allowed: false,
      reason: "insufficient-model-grant",
    });
  });

  it("refuses everything without a grant", () => {
    const ctx = contextWith([{ modelType: "Tree", level: "write" }]);
    for (const action of MODEL_ACTIONS) {
      expect(canPerform(ctx, action, obj("Plot"))).toBe(false);
    }
  });

  it("refuses unknown model types", () => {
    const ctx = contextWith([{ modelType: "Bench", level: "write" }]);
    expect(decide(ctx, "read", obj("Bench"))).toEqual({
      allowed: false,
      reason: "insufficient-model-grant",
    });
  });

  it("denies every action under the zero-grant role", () => {
    const ctx = buildPermissionContext(U, I1, zeroGrantRole("i1"));
    for (const model of ["Plot", "Tree"]) {
      for (const action of MODEL_ACTIONS) {
        expect(canPerform(ctx, action, obj(model, { ownerId: "someone" }))).toBe(false);
      }
    }
  });
});

// ---------------------------------------------------------------------------
// Cross-instance isolation
// ---------------------------------------------------------------------------

describe("cross-instance isolation", () => {
  it("refuses objects of another instance whatever the grant", () => {
    const ctx = contextWith([{ modelType: "Plot", level: "write" }]);
    expect(decide(ctx, "read", obj("Plot", { instanceId: "i2" }))).toEqual({
      allowed: false,
      reason: "cross-instance",
    });
  });

  it("holds for super admins and owners too", () => {
    const admin = contextWith([{ modelType: "Tree", level: "read", ownedLevel: "write" }], ROOT);
    const foreign = obj("Tree", { instanceId: "i2", ownerId: "root" });
    for (const action of MODEL_ACTIONS) {
      expect(decide(admin, action, foreign)).toEqual({ allowed: false, reason: "cross-instance" });
    }
  });
});

// ---------------------------------------------------------------------------
// Ownership
// ---------------------------------------------------------------------------

describe("owner-scoped escalation", () => {
  const ownerEditor = () =>
    contextWith([{ modelType: "Tree", level: "read", ownedLevel: "write" }]);

  it("allows owners to update their own objects", () => {
    expect(decide(ownerEditor(), "update", obj("Tree", { ownerId: "u" }))).toEqual({
      allowed: true,
      via: "ownership",
    });
  });

  it("refuses other users' objects with not-owner", () => {
    expect(decide(ownerEditor(), "update", obj("Tree", { ownerId: "v" }))).toEqual({
      allowed: false,
      reason: "not-owner",
    });
  });

  it("allows creating an object the requester will own", () => {
    const draft: AuthorizableObject = { modelType: "Tree", instanceId: "i1" };
    expect(decide(ownerEditor(), "create", draft)).toEqual({ allowed: true, via: "ownership" });
  });

  it("refuses creating an object on someone else's behalf", () => {
    const draft: AuthorizableObject = { modelType: "Tree", instanceId: "i1", ownerId: "v" };
    expect(decide(ownerEditor(), "create", draft)).toEqual({ allowed: false, reason: "not-owner" });
  });

  it("uses the base grant when it already suffices", () => {
    expect(decide(ownerEditor(), "read", obj("Tree", { ownerId: "v" }))).toEqual({
      allowed: true,
      via: "model-grant",
    });
  });

  it("never treats anonymous users as owners", () => {
    const ctx = contextWith([{ modelType: "Tree", level: "read", ownedLevel: "write" }], ANONYMOUS);
    const draft: AuthorizableObject = { modelType: "Tree", instanceId: "i1" };
    expect(decide(ctx, "create", draft)).toEqual({ allowed: false, reason: "not-owner" });
  });

  it("ignores an owner-scoped level on a model without ownership", () => {
    const ctx = contextWith([{ modelType: "Plot", level: "read", ownedLevel: "write" }]);
    expect(decide(ctx, "update", obj("Plot", { ownerId: "u" }))).toEqual({
      allowed: false,
      reason: "insufficient-model-grant",
    });
  });

  it("reports insufficient-model-grant when even the owned level would not do", () => {
    const ctx = contextWith([{ modelType: "Tree", level: "none", ownedLevel: "read" }]);
    expect(decide(ctx, "delete", obj("Tree", { ownerId: "u" }))).toEqual({
      allowed: false,
      reason: "insufficient-model-grant",
    });
  });
});

// ---------------------------------------------------------------------------
// Features and super admins
// ---------------------------------------------------------------------------

describe("instance features", () => {
  const photoGrants: RoleGrant[] = [{ modelType: "TreePhoto", level: "write" }];

  it("refuses changes to a model whose feature is off", () => {
    const ctx = contextWith(photoGrants);
    expect(decide(ctx, "create", obj("TreePhoto"))).toEqual({
      allowed: false,
      reason: "feature-disabled",
    });
    expect(canPerform(ctx, "read", obj("TreePhoto"))).toBe(true);
  });

  it("allows changes once the feature is on", () => {
    const withPhotos: Instance = { ...I1, features: ["photo_uploads"] };
    const ctx = contextWith(photoGrants, U, withPhotos);
    expect(canPerform(ctx, "delete", obj("TreePhoto"))).toBe(true);
  });
});

describe("super admins", () => {
  it("may read without a grant", () => {
    const ctx = contextWith([], ROOT);
    expect(decide(ctx, "read", obj("Plot"))).toEqual({ allowed: true, via: "super-admin" });
  });

  it("may not write without a grant", () => {
    const ctx = contextWith([], ROOT);
    expect(decide(ctx, "update", obj("Plot"))).toEqual({
      allowed: false,
      reason: "insufficient-model-grant",
    });
  });
});

// ---------------------------------------------------------------------------
// Helpers over many objects
// ---------------------------------------------------------------------------

describe("filterPermitted", () => {
  it("keeps permitted objects in order", () => {
    const ctx = contextWith([{ modelType: "Tree", level: "read", ownedLevel: "write" }]);
    const trees = [
      obj("Tree", { id: "a", ownerId: "u" }),
      obj("Tree", { id: "b", ownerId: "v" }),
      obj("Tree", { id: "c", ownerId: "u" }),
      obj("Tree", { id: "d", ownerId: "u", instanceId: "i2" }),
    ];
    expect(filterPermitted(ctx, "update", trees).map((t) => t.id)).toEqual(["a", "c"]);
  });
});

describe("modelPermission", () => {
  it("reports the model grant level", () => {
    const ctx = contextWith([{ modelType: "Plot", level: "write" }]);
    expect(modelPermission(ctx, "Plot")).toBe("write");
    expect(modelPermission(ctx, "Tree")).toBe("none");
    expect(modelPermission(ctx, "Bench")).toBe("none");
  });

  it("raises super admins to read", () => {
    expect(modelPermission(contextWith([], ROOT), "Tree")).toBe("read");
  });
});

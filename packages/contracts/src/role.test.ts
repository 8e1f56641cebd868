/**
 * Role Schemas Tests
 *
 * These schemas guard every path by which role data enters the engine.
 */

import { describe, it, expect } from "vitest";
import { roleGrantSchema, roleSchema, assignmentSchema, grantKey } from "./role.js";
import { instanceSchema } from "./instance.js";

describe("roleGrantSchema", () => {
  it("accepts a model-level grant", () => {
    const result = roleGrantSchema.safeParse({ modelType: "Plot", level: "write" });
    expect(result.success).toBe(true);
  });

  it("accepts a model-level grant with an owner-scoped level", () => {
    const result = roleGrantSchema.safeParse({
      modelType: "Tree",
      level: "read",
      ownedLevel: "write",
    });
    expect(result.success).toBe(true);
  });

  it("rejects model types that are not PascalCase", () => {
    expect(roleGrantSchema.safeParse({ modelType: "plot", level: "read" }).success).toBe(false);
  });

  it("rejects unknown levels", () => {
    expect(roleGrantSchema.safeParse({ modelType: "Plot", level: "admin" }).success).toBe(false);
  });

  it("rejects owner-scoped levels on field grants", () => {
    const result = roleGrantSchema.safeParse({
      modelType: "Tree",
      fieldName: "diameter",
      level: "read",
      ownedLevel: "write",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["ownedLevel"]);
    }
  });
});

describe("roleSchema", () => {
  it("defaults isDefault to false and grants to empty", () => {
    const role = roleSchema.parse({ id: "r1", instanceId: "i1", name: "Viewer" });
    expect(role.isDefault).toBe(false);
    expect(role.grants).toEqual([]);
  });

  it("rejects an empty name", () => {
    expect(roleSchema.safeParse({ id: "r1", instanceId: "i1", name: "" }).success).toBe(false);
  });
});

describe("assignmentSchema", () => {
  it("requires user, instance and role", () => {
    expect(assignmentSchema.safeParse({ userId: "u1", instanceId: "i1" }).success).toBe(false);
    expect(
      assignmentSchema.safeParse({ userId: "u1", instanceId: "i1", roleId: "r1" }).success
    ).toBe(true);
  });
});

describe("instanceSchema", () => {
  it("defaults features and user-defined fields", () => {
    const instance = instanceSchema.parse({ id: "i1", name: "Philly", urlName: "philly" });
    expect(instance.features).toEqual([]);
    expect(instance.userDefinedFields).toEqual([]);
  });

  it("rejects url names that start with a digit", () => {
    expect(instanceSchema.safeParse({ id: "i1", name: "X", urlName: "1city" }).success).toBe(false);
  });
});

describe("grantKey", () => {
  it("keys model grants by model and field grants by model.field", () => {
    expect(grantKey("Plot")).toBe("Plot");
    expect(grantKey("Plot", "width")).toBe("Plot.width");
  });
});

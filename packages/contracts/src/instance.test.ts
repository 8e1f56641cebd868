/**
 * Instances and Field Types Tests
 */

import { describe, it, expect } from "vitest";
import { fieldTypeSchema } from "./field-types.js";
import { instanceSchema, udfFieldName, userDefinedFieldSchema } from "./instance.js";

describe("fieldTypeSchema", () => {
  it("accepts the known field types", () => {
    expect(fieldTypeSchema.safeParse("geometry").success).toBe(true);
    expect(fieldTypeSchema.safeParse("choice").success).toBe(true);
  });

  it("rejects anything else", () => {
    expect(fieldTypeSchema.safeParse("rich_text").success).toBe(false);
  });
});

describe("instanceSchema", () => {
  it("defaults features and user-defined fields to empty lists", () => {
    expect(instanceSchema.parse({ id: "inst-1", name: "Philadelphia", urlName: "philly" })).toEqual({
      id: "inst-1",
      name: "Philadelphia",
      urlName: "philly",
      features: [],
      userDefinedFields: [],
    });
  });

  it("requires URL names to start with a letter", () => {
    const result = instanceSchema.safeParse({ id: "inst-1", name: "X", urlName: "9lives" });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe("URL names start with a letter");
  });
});

describe("userDefinedFieldSchema", () => {
  it("accepts names with spaces and apostrophes", () => {
    const udf = { modelType: "Tree", name: "Steward's Notes", type: "string" };
    expect(userDefinedFieldSchema.parse(udf)).toEqual(udf);
  });

  it("rejects names with dots", () => {
    expect(userDefinedFieldSchema.safeParse({ modelType: "Tree", name: "a.b", type: "string" }).success).toBe(
      false
    );
  });
});

describe("udfFieldName", () => {
  it("prefixes the name", () => {
    expect(udfFieldName("Stewardship")).toBe("udf:Stewardship");
  });
});

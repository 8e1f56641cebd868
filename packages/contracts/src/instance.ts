/**
 * Instance
 *
 * A tenant: one organization's isolated map dataset. Roles and domain
 * objects belong to exactly one instance, and nothing is ever evaluated
 * against a role from a different one.
 */

import { z } from "zod";
import { fieldTypeSchema, type FieldType } from "./field-types.js";

/** Optional instance features that gate whole models. */
export const INSTANCE_FEATURES = {
  PHOTO_UPLOADS: "photo_uploads",
  SPECIES_EDITING: "species_editing",
} as const;

export type InstanceFeature = (typeof INSTANCE_FEATURES)[keyof typeof INSTANCE_FEATURES];

/**
 * A field an instance adds to one of its models at runtime.
 * Addressed in grants and identifiers as `udf:<name>`.
 */
export interface UserDefinedField {
  modelType: string;
  name: string;
  type: FieldType;
  /** Allowed values for "choice" fields */
  choices?: string[];
}

export interface Instance {
  id: string;
  name: string;
  /** Unique per deployment, compared case-insensitively */
  urlName: string;
  /** Enabled optional features (see INSTANCE_FEATURES) */
  features: string[];
  userDefinedFields: UserDefinedField[];
}

/** Prefix that marks a user-defined field name. */
export const UDF_PREFIX = "udf:";

export function udfFieldName(name: string): string {
  return `${UDF_PREFIX}${name}`;
}

// ---------------------------------------------------------------------------
// Schemas (raw records from storage)
// ---------------------------------------------------------------------------

export const userDefinedFieldSchema = z.object({
  modelType: z.string().min(1),
  name: z.string().min(1).regex(/^[\w ']+$/, "UDF names may contain letters, digits, spaces and apostrophes"),
  type: fieldTypeSchema,
  choices: z.array(z.string()).optional(),
});

export const instanceSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  urlName: z.string().min(1).regex(/^[A-Za-z][\w-]*$/, "URL names start with a letter"),
  features: z.array(z.string()).default([]),
  userDefinedFields: z.array(userDefinedFieldSchema).default([]),
});

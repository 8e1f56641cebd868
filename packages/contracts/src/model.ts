/**
 * Model Definition
 *
 * A model is one kind of geolocated feature (or related record) that an
 * instance maintains: Plot, Tree, TreePhoto, Species.
 *
 * The authorization engine uses model definitions to:
 *   - Know which field names exist (unknown fields resolve to "none")
 *   - Know whether objects of the model have an owner
 *   - Know which instance feature, if any, must be on to change them
 *   - Label and type fields in field descriptors
 */

import type { FieldType } from "./field-types.js";

// ---------------------------------------------------------------------------
// Field Definition
// ---------------------------------------------------------------------------

export interface ModelFieldDefinition {
  /** Property name, camelCase (e.g., "canopyHeight") */
  name: string;

  type: FieldType;

  /** Plain English description. Used as the default label of a field descriptor. */
  description: string;

  /** For "choice" fields: the allowed values */
  options?: string[];

  /** Value shown when describing a field of an object that does not exist yet */
  defaultValue?: unknown;
}

// ---------------------------------------------------------------------------
// Model Definition
// ---------------------------------------------------------------------------

export interface ModelDefinition {
  /** Singular name, PascalCase (e.g., "TreePhoto") */
  name: string;

  description: string;

  fields: ModelFieldDefinition[];

  /**
   * Present when objects of this model record who created them.
   * Owner-scoped grants only ever apply to such models.
   */
  ownership?: {
    /** The field holding the owner's user id */
    field: string;
  };

  /**
   * Instance feature that must be enabled for objects of this model
   * to be created, updated or deleted.
   */
  requiresFeature?: string;
}

/**
 * Helper to declare a model with type checking.
 *
 * @example
 * export const PlotModel = defineModel({
 *   name: "Plot",
 *   description: "A planting site.",
 *   fields: [{ name: "width", type: "float", description: "Plot width" }],
 * });
 */
export function defineModel(definition: ModelDefinition): ModelDefinition {
  return definition;
}

// ---------------------------------------------------------------------------
// Objects under evaluation
// ---------------------------------------------------------------------------

/**
 * A concrete domain object, already loaded by the caller.
 * The engine never fetches objects; it decides over what it is given.
 */
export interface AuthorizableObject {
  modelType: string;

  /** Absent for an object that is about to be created */
  id?: string;

  /** The instance this object belongs to */
  instanceId: string;

  /** User id of the creator, for models that support ownership */
  ownerId?: string | null;

  /** Built-in field values, keyed by field name */
  fields?: Record<string, unknown>;

  /** User-defined field values, keyed by UDF name (without the prefix) */
  udfs?: Record<string, unknown>;
}

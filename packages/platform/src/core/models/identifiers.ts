/**
 * Identifiers
 *
 * Conversions between the names the outside world uses and the engine's
 * model types:
 *
 *   "Plot"            model type (PascalCase, as registered)
 *   "plot"            object name (camelCase, used in identifiers and errors)
 *   "plot.width"      field identifier
 *   "tree.udf:Stewardship"  user-defined field identifier
 */

import { getModel } from "./model-registry.js";
import { ValidationError, type FieldError } from "../errors.js";

/** "TreePhoto" → "treePhoto" */
export function toObjectName(modelName: string): string {
  return modelName.charAt(0).toLowerCase() + modelName.slice(1);
}

/** "treePhoto" → "TreePhoto" */
export function toModelName(objectName: string): string {
  return objectName.charAt(0).toUpperCase() + objectName.slice(1);
}

/**
 * Resolves an inbound model name to a registered model type.
 * Accepts either the model name or its object name.
 *
 * @throws ValidationError when no such model is registered
 */
export function resolveModelType(name: string): string {
  const modelName = toModelName(name);
  if (!getModel(modelName)) {
    throw new ValidationError(`invalid model type: "${name}"`, [
      { field: "modelType", message: `Unknown model "${name}"`, code: "invalid_model" },
    ]);
  }
  return modelName;
}

/**
 * "<objectName>.<field>" where the field is a plain name or "udf:" plus a
 * name of word characters, spaces and apostrophes. The object name must
 * also belong to a registered model.
 */
const IDENTIFIER_PATTERN = /^([a-z][A-Za-z0-9]*)\.((?:udf:)?[\w ']+)$/;

export interface FieldIdentifier {
  /** Registered model type, e.g. "Plot" */
  modelType: string;
  /** Field name as used in grants, e.g. "width" or "udf:Stewardship" */
  fieldName: string;
  /** The identifier as given */
  identifier: string;
}

/**
 * Parses "plot.width" into its model type and field name.
 *
 * @throws ValidationError for malformed identifiers and unknown models
 */
export function parseFieldIdentifier(identifier: string): FieldIdentifier {
  const match = IDENTIFIER_PATTERN.exec(identifier);
  if (!match) {
    throw new ValidationError(
      `expected a string with the format "model.field", got "${identifier}"`,
      [{ field: "identifier", message: "Malformed field identifier", code: "invalid_identifier" }]
    );
  }
  const [, objectName, fieldName] = match;
  return { modelType: resolveModelType(objectName), fieldName, identifier };
}

/** "Plot", "width" → "plot.width" */
export function toFieldIdentifier(modelType: string, fieldName: string): string {
  return `${toObjectName(modelType)}.${fieldName}`;
}

/**
 * Flattens messages keyed by field ("plot.width") into the FieldError list
 * ValidationError carries.
 */
export function toFieldErrors(
  packaged: Record<string, string[]>,
  code: string
): FieldError[] {
  return Object.entries(packaged).flatMap(([field, messages]) =>
    messages.map((message) => ({ field, message, code }))
  );
}

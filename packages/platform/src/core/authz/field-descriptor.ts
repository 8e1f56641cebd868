/**
 * Field Descriptors
 *
 * Everything an edit form needs to render one field of one object:
 * its label, current value, type, choices, and whether the context may
 * see or change it. Values of fields the context cannot read are withheld.
 */

import type { AuthorizableObject, FieldType, PermissionContext } from "@arbor/contracts";
import { UDF_PREFIX } from "@arbor/contracts";
import { findField } from "../models/model-registry.js";
import { parseFieldIdentifier } from "../models/identifiers.js";
import { fieldPermission, isFieldEditable } from "./field-permission.js";
import { ValidationError } from "../errors.js";

export interface FieldDescriptor {
  label: string;
  /** "plot.width", "tree.udf:Stewardship" */
  identifier: string;
  value: unknown;
  displayValue: string | null;
  dataType: FieldType;
  isVisible: boolean;
  isEditable: boolean;
  choices: string[] | null;
}

export interface DescribeFieldOptions {
  /** Overrides the field's description as label */
  label?: string;
}

function fieldValue(object: AuthorizableObject, fieldName: string): unknown {
  if (fieldName.startsWith(UDF_PREFIX)) {
    return object.udfs?.[fieldName.slice(UDF_PREFIX.length)] ?? null;
  }
  return object.fields?.[fieldName] ?? null;
}

/**
 * Describes field `identifier` ("plot.width") of an existing object.
 *
 * @throws ValidationError for malformed identifiers, identifiers naming
 *   another model than the object's, and fields the instance does not know
 */
export function describeField(
  context: PermissionContext,
  object: AuthorizableObject,
  identifier: string,
  options: DescribeFieldOptions = {}
): FieldDescriptor {
  return describe(context, object, identifier, options, fieldValue);
}

/**
 * Describes a field of an object that is about to be created. The value
 * is the field's default, and the requester counts as the owner.
 */
export function describeNewField(
  context: PermissionContext,
  modelType: string,
  identifier: string,
  options: DescribeFieldOptions = {}
): FieldDescriptor {
  const draft: AuthorizableObject = { modelType, instanceId: context.instance.id };
  return describe(context, draft, identifier, options, (_object, fieldName) => {
    const field = findField(context.instance, modelType, fieldName);
    return field?.definition.defaultValue ?? null;
  });
}

function describe(
  context: PermissionContext,
  object: AuthorizableObject,
  identifier: string,
  options: DescribeFieldOptions,
  valueOf: (object: AuthorizableObject, fieldName: string) => unknown
): FieldDescriptor {
  const { modelType, fieldName } = parseFieldIdentifier(identifier);
  if (modelType !== object.modelType) {
    throw new ValidationError(
      `"${identifier}" does not name a field of ${object.modelType}`,
      [{ field: "identifier", message: "Model mismatch", code: "invalid_identifier" }]
    );
  }

  const field = findField(context.instance, modelType, fieldName);
  if (!field) {
    throw new ValidationError(`unknown field "${identifier}"`, [
      { field: "identifier", message: "Unknown field", code: "invalid_identifier" },
    ]);
  }

  const level = fieldPermission(context, modelType, fieldName, object);
  const isVisible = level !== "none";
  const value = isVisible ? valueOf(object, fieldName) : null;

  return {
    label: options.label ?? field.definition.description,
    identifier,
    value,
    displayValue: value === null ? null : String(value),
    dataType: field.definition.type,
    isVisible,
    isEditable: isFieldEditable(context, modelType, fieldName, object),
    choices: field.definition.options ?? null,
  };
}

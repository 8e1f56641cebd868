/**
 * Model Registry
 *
 * The closed set of domain models the engine can decide about.
 * The domain registers its models at startup; the checker and resolver
 * dispatch over this set instead of asking objects to authorize themselves.
 */

import type { Instance, ModelDefinition, ModelFieldDefinition } from "@arbor/contracts";
import { UDF_PREFIX } from "@arbor/contracts";

/** Registered models, keyed by model name */
const models = new Map<string, ModelDefinition>();

/**
 * Registers a model definition. Throws on duplicate names.
 */
export function registerModel(model: ModelDefinition) {
  if (models.has(model.name)) {
    throw new Error(
      `Model "${model.name}" is already registered. Model names must be unique.`
    );
  }
  if (model.ownership && !model.fields.some((f) => f.name === model.ownership?.field)) {
    throw new Error(
      `Model "${model.name}" declares ownership field "${model.ownership.field}" but has no such field.`
    );
  }
  models.set(model.name, model);
}

export function registerModels(modelList: ModelDefinition[]) {
  for (const model of modelList) {
    registerModel(model);
  }
}

export function getModel(name: string): ModelDefinition | undefined {
  return models.get(name);
}

export function getAllModels(): ModelDefinition[] {
  return Array.from(models.values());
}

/** True when objects of the model record an owner. */
export function supportsOwnership(name: string): boolean {
  return models.get(name)?.ownership !== undefined;
}

/**
 * True unless the model requires an instance feature the instance lacks.
 */
export function featureEnabled(instance: Instance, modelType: string): boolean {
  const feature = models.get(modelType)?.requiresFeature;
  return feature === undefined || instance.features.includes(feature);
}

/**
 * A field as the engine sees it: a built-in field, or a user-defined field
 * the instance added to the model.
 */
export interface KnownField {
  /** As used in grants: "width" or "udf:Stewardship" */
  name: string;
  definition: ModelFieldDefinition;
  userDefined: boolean;
}

/**
 * Looks up a field of a model in the context of one instance.
 * Returns undefined for unknown models and unknown fields.
 */
export function findField(
  instance: Instance,
  modelType: string,
  fieldName: string
): KnownField | undefined {
  const model = models.get(modelType);
  if (!model) return undefined;

  if (fieldName.startsWith(UDF_PREFIX)) {
    const udfName = fieldName.slice(UDF_PREFIX.length);
    const udf = instance.userDefinedFields.find(
      (u) => u.modelType === modelType && u.name === udfName
    );
    if (!udf) return undefined;
    return {
      name: fieldName,
      userDefined: true,
      definition: {
        name: fieldName,
        type: udf.type,
        description: udf.name,
        options: udf.choices,
      },
    };
  }

  const field = model.fields.find((f) => f.name === fieldName);
  return field ? { name: field.name, definition: field, userDefined: false } : undefined;
}

/**
 * Every field of a model known to one instance: built-ins first,
 * then the instance's user-defined fields in declaration order.
 */
export function knownFields(instance: Instance, modelType: string): KnownField[] {
  const model = models.get(modelType);
  if (!model) return [];

  const builtIn: KnownField[] = model.fields.map((f) => ({
    name: f.name,
    definition: f,
    userDefined: false,
  }));
  const udfs: KnownField[] = instance.userDefinedFields
    .filter((u) => u.modelType === modelType)
    .map((u) => ({
      name: `${UDF_PREFIX}${u.name}`,
      userDefined: true,
      definition: {
        name: `${UDF_PREFIX}${u.name}`,
        type: u.type,
        description: u.name,
        options: u.choices,
      },
    }));

  return [...builtIn, ...udfs];
}

/** Clears all registered models (for testing) */
export function clearModelRegistry() {
  models.clear();
}

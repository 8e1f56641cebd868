/**
 * Grant Validation
 *
 * Every path that persists or loads RoleGrants runs through here, so a
 * contradictory grant set never reaches the registry:
 *
 *   1. Each grant matches roleGrantSchema
 *   2. At most one grant per (model) and per (model, field)
 *   3. A field grant never exceeds its model grant
 *   4. ownedLevel only on models that support ownership, and never below level
 *   5. On administrative writes, models are registered and field grants name
 *      a built-in field or one of the instance's user-defined fields
 *
 * The resolver clamps anyway; this is the write-time half of the same invariant.
 */

import type { Instance, RoleGrant } from "@arbor/contracts";
import { compareLevels, grantKey, roleGrantSchema } from "@arbor/contracts";
import { findField, getModel } from "../models/model-registry.js";
import { toFieldIdentifier, toObjectName, toFieldErrors } from "../models/identifiers.js";
import { ConfigurationInvariantViolation, ValidationError } from "../errors.js";

/**
 * Administrative writes reject grants for unregistered models and unknown
 * fields of `instance`. Loading stored data does not: a grant for a retired
 * model or a removed user-defined field is inert rather than fatal.
 */
export type GrantValidationOptions =
  | { requireKnownModels: false }
  | { requireKnownModels: true; instance: Instance };

/**
 * Parses raw grants. Throws ValidationError listing every malformed grant,
 * keyed by its position ("grants.2.level").
 */
export function parseGrants(raw: unknown[]): RoleGrant[] {
  const grants: RoleGrant[] = [];
  const problems: Record<string, string[]> = {};

  raw.forEach((candidate, i) => {
    const result = roleGrantSchema.safeParse(candidate);
    if (result.success) {
      grants.push(result.data);
      return;
    }
    for (const issue of result.error.issues) {
      const key = ["grants", i, ...issue.path].join(".");
      problems[key] = [...(problems[key] ?? []), issue.message];
    }
  });

  if (Object.keys(problems).length > 0) {
    throw new ValidationError("Malformed role grants", toFieldErrors(problems, "invalid_grant"));
  }
  return grants;
}

function keyFor(grant: RoleGrant): string {
  return grant.fieldName === undefined
    ? toObjectName(grant.modelType)
    : toFieldIdentifier(grant.modelType, grant.fieldName);
}

/**
 * Checks a complete grant set of one role.
 *
 * @throws ConfigurationInvariantViolation with every violation found
 */
export function assertGrantInvariants(
  grants: readonly RoleGrant[],
  options: GrantValidationOptions
): void {
  const violations: Record<string, string[]> = {};
  const add = (grant: RoleGrant, message: string) => {
    const key = keyFor(grant);
    violations[key] = [...(violations[key] ?? []), message];
  };

  const seen = new Set<string>();
  const modelGrants = new Map<string, RoleGrant>();

  for (const grant of grants) {
    const key = grantKey(grant.modelType, grant.fieldName);
    if (seen.has(key)) {
      add(grant, "Duplicate grant");
      continue;
    }
    seen.add(key);
    if (grant.fieldName === undefined) {
      modelGrants.set(grant.modelType, grant);
    }
  }

  for (const grant of grants) {
    const model = getModel(grant.modelType);
    if (!model && options.requireKnownModels) {
      add(grant, `Unknown model "${grant.modelType}"`);
      continue;
    }

    if (grant.fieldName !== undefined) {
      if (
        model &&
        options.requireKnownModels &&
        !findField(options.instance, grant.modelType, grant.fieldName)
      ) {
        add(grant, `Unknown field "${grant.fieldName}" of model "${grant.modelType}"`);
        continue;
      }
      const modelGrantLevel = modelGrants.get(grant.modelType)?.level ?? "none";
      if (compareLevels(grant.level, modelGrantLevel) > 0) {
        add(grant, `Field grant "${grant.level}" exceeds model grant "${modelGrantLevel}"`);
      }
      continue;
    }

    if (grant.ownedLevel !== undefined) {
      if (model && !model.ownership) {
        add(grant, `Model "${grant.modelType}" does not support ownership`);
      }
      if (compareLevels(grant.ownedLevel, grant.level) < 0) {
        add(grant, `Owner-scoped level "${grant.ownedLevel}" is below the base level "${grant.level}"`);
      }
    }
  }

  if (Object.keys(violations).length > 0) {
    throw new ConfigurationInvariantViolation("Contradictory role grants", violations);
  }
}

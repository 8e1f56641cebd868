/**
 * Error Taxonomy
 *
 * Only structurally invalid input is an error. A refused permission is a
 * normal return value (PermissionDecision) everywhere except at the
 * boundary, where enforce() turns it into PermissionDeniedError.
 *
 * The REST adapter maps these to HTTP status codes:
 *   NotFoundError                    → 404
 *   ValidationError                  → 400
 *   PermissionDeniedError            → 403
 *   ConfigurationInvariantViolation  → 422
 */

import type { PermissionDenial } from "@arbor/contracts";

/** A per-field problem, as rendered next to a form input. */
export interface FieldError {
  field: string;
  message: string;
  code: string;
}

/**
 * The referenced instance (or role, for administration) does not exist.
 * Nothing can be decided without a tenant.
 */
export class NotFoundError extends Error {
  public readonly resource: string;
  public readonly reference: string;

  constructor(resource: string, reference: string) {
    super(`${resource} "${reference}" not found`);
    this.name = "NotFoundError";
    this.resource = resource;
    this.reference = reference;
  }
}

/**
 * Malformed input: an unknown model type name, a bad field identifier,
 * a raw record that fails its schema.
 */
export class ValidationError extends Error {
  public readonly fieldErrors: FieldError[];

  constructor(message: string, fieldErrors: FieldError[] = []) {
    super(message);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }
}

/**
 * A role or grant change that would break a data model invariant.
 * Raised on the write path so contradictory grants never reach the registry.
 *
 * `violations` is keyed by "object.field" (e.g., "plot.width"), or by the
 * object name alone for model-level problems.
 */
export class ConfigurationInvariantViolation extends Error {
  public readonly violations: Record<string, string[]>;

  constructor(message: string, violations: Record<string, string[]> = {}) {
    super(message);
    this.name = "ConfigurationInvariantViolation";
    this.violations = violations;
  }
}

/**
 * Thrown by enforce helpers only. Carries the structured denial so the
 * calling layer can render it without re-deriving anything.
 */
export class PermissionDeniedError extends Error {
  public readonly denial: PermissionDenial;

  constructor(denial: PermissionDenial) {
    super(denial.message);
    this.name = "PermissionDeniedError";
    this.denial = denial;
  }
}

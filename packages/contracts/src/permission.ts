/**
 * Permission Definitions
 *
 * The vocabulary every authorization decision is expressed in:
 * permission levels, model actions, denial reasons, and the decision value.
 *
 * Levels are totally ordered: none < read < write. Combining two grants
 * never needs anything beyond min/max over that order.
 */

// ---------------------------------------------------------------------------
// Levels
// ---------------------------------------------------------------------------

/** Ordered from weakest to strongest. */
export const PERMISSION_LEVELS = ["none", "read", "write"] as const;

export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];

function rank(level: PermissionLevel): number {
  return PERMISSION_LEVELS.indexOf(level);
}

/** Negative when a < b, zero when equal, positive when a > b. */
export function compareLevels(a: PermissionLevel, b: PermissionLevel): number {
  return rank(a) - rank(b);
}

/** The weaker of two levels. Used to clamp field grants to their model grant. */
export function minLevel(a: PermissionLevel, b: PermissionLevel): PermissionLevel {
  return compareLevels(a, b) <= 0 ? a : b;
}

/** The stronger of two levels. */
export function maxLevel(a: PermissionLevel, b: PermissionLevel): PermissionLevel {
  return compareLevels(a, b) >= 0 ? a : b;
}

/** True when `granted` is at least `required`. */
export function levelSatisfies(
  granted: PermissionLevel,
  required: PermissionLevel
): boolean {
  return compareLevels(granted, required) >= 0;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export const MODEL_ACTIONS = ["create", "read", "update", "delete"] as const;

/** A model-level operation on a single object. */
export type ModelAction = (typeof MODEL_ACTIONS)[number];

/**
 * The level an action needs from the model grant.
 * Reading needs read; every mutation needs write.
 */
export function requiredLevelFor(action: ModelAction): PermissionLevel {
  return action === "read" ? "read" : "write";
}

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

/**
 * Why an action was refused. The caller turns this into a user-facing message.
 *
 *   cross-instance            object lives in another instance
 *   insufficient-model-grant  role's model grant is too weak
 *   insufficient-field-grant  one or more fields are not writable/readable
 *   not-owner                 only an owner-scoped grant would allow it
 *   feature-disabled          the instance has switched the model's feature off
 */
export type DenialReason =
  | "cross-instance"
  | "insufficient-model-grant"
  | "insufficient-field-grant"
  | "not-owner"
  | "feature-disabled";

/** Which permission source allowed an action. */
export type GrantSource = "model-grant" | "ownership" | "super-admin" | "field-grant";

/**
 * Result of a decision function. Denial is data, not an exception.
 */
export type PermissionDecision =
  | { allowed: true; via: GrantSource }
  | { allowed: false; reason: DenialReason; fields?: string[] };

/** Narrows a decision to its denied variant. */
export type DeniedDecision = Extract<PermissionDecision, { allowed: false }>;

export function isDenied(decision: PermissionDecision): decision is DeniedDecision {
  return !decision.allowed;
}

/**
 * Permission Context
 *
 * The resolved (user, instance, role) triple used for every decision in one
 * logical operation. The platform builds it once per request and passes it
 * explicitly to each check; nothing re-derives it ad hoc.
 *
 * Also home to the small cross-cutting contracts the platform provides:
 * the structured Logger and domain events.
 */

import type { Instance } from "./instance.js";
import type { Role } from "./role.js";

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

export interface AuthenticatedUser {
  kind: "user";
  id: string;
  /** Super admins may read everything inside an instance, never write */
  isSuperAdmin: boolean;
}

export interface AnonymousUser {
  kind: "anonymous";
}

export type User = AuthenticatedUser | AnonymousUser;

/** The single anonymous marker. Compare with `user.kind`, not identity. */
export const ANONYMOUS: AnonymousUser = Object.freeze({ kind: "anonymous" });

/** The user's id, or null for anonymous requests. */
export function userIdOf(user: User): string | null {
  return user.kind === "user" ? user.id : null;
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/**
 * Immutable and short-lived: never cache it beyond the operation it was
 * built for, since grants may change between operations.
 */
export interface PermissionContext {
  readonly user: User;
  readonly instance: Instance;
  /** Never null: falls back to the default role or a zero-grant role */
  readonly role: Role;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/**
 * Structured logger.
 * Platform code uses this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** Event types emitted by role administration. */
export type AuthzEventType =
  | "role.created"
  | "role.updated"
  | "role.deleted"
  | "assignment.changed"
  | "instance.updated";

/**
 * Emitted after a role, grant or assignment change has been persisted.
 * Every event names the instance whose cached roles are now stale.
 */
export interface DomainEvent {
  type: AuthzEventType;
  instanceId: string;
  payload: Record<string, unknown>;
  timestamp?: Date;
}

export interface EventSubscriber {
  /** Exact event type, or "*" for all events */
  eventType: AuthzEventType | "*";

  /** Human-readable name for logging */
  name: string;

  handler: (event: DomainEvent) => Promise<void>;
}

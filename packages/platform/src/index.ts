/**
 * @arbor/platform
 *
 * The authorization engine. Provides the model registry, the role
 * registry and stores, permission decisions, role administration and
 * the HTTP adapter.
 */

// Config
export { loadConfig, type AppConfig, type RoleStoreKind } from "./core/config/index.js";

// Errors
export {
  NotFoundError,
  ValidationError,
  ConfigurationInvariantViolation,
  PermissionDeniedError,
  type FieldError,
} from "./core/errors.js";

// Logging
export { createLogger, logDecision, type DecisionLogEntry } from "./core/logging/index.js";

// Observability
export {
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Event Bus
export { subscribe, subscribeAll, publish, getSubscriberCount, clearSubscribers } from "./core/event-bus/index.js";

// Models
export {
  registerModel,
  registerModels,
  getModel,
  getAllModels,
  supportsOwnership,
  featureEnabled,
  findField,
  knownFields,
  clearModelRegistry,
  type KnownField,
} from "./core/models/model-registry.js";
export {
  toObjectName,
  toModelName,
  resolveModelType,
  parseFieldIdentifier,
  toFieldIdentifier,
  toFieldErrors,
  type FieldIdentifier,
} from "./core/models/identifiers.js";

// Roles
export {
  InMemoryRoleStore,
  isUrlNameRef,
  describeInstanceRef,
  type RoleStore,
  type InstanceRef,
  type InstanceRoleData,
} from "./core/authz/role-store.js";
export {
  RoleRegistry,
  roleInSnapshot,
  type RoleSnapshot,
  type RoleRegistryOptions,
} from "./core/authz/role-registry.js";
export {
  RoleAdministration,
  type EmitFn,
  type RoleAdministrationOptions,
} from "./core/authz/role-admin.js";
export { parseGrants, assertGrantInvariants, type GrantValidationOptions } from "./core/authz/grant-validation.js";
export { zeroGrantRole, anonymousRole, ownsObject } from "./core/authz/role.js";

// Decisions
export {
  buildPermissionContext,
  resolvePermissionContext,
  contextsEquivalent,
} from "./core/authz/context.js";
export {
  fieldPermission,
  fieldPermissions,
  isFieldVisible,
  isFieldEditable,
  readableFields,
  writableFields,
  redactObject,
  checkFieldWrites,
} from "./core/authz/field-permission.js";
export { decide, canPerform, filterPermitted, modelPermission } from "./core/authz/object-permission.js";
export {
  reportDenial,
  denialFor,
  enforce,
  enforceFieldWrites,
  type DenialInput,
  type DenialTarget,
} from "./core/authz/reporter.js";
export {
  describeField,
  describeNewField,
  type FieldDescriptor,
  type DescribeFieldOptions,
} from "./core/authz/field-descriptor.js";

// Database
export { initDatabase, getDatabase, closeDatabase, type Database } from "./core/database/connection.js";
export { runMigrations, ROLE_TABLE_MIGRATIONS } from "./core/database/migrate.js";
export { PostgresRoleStore } from "./core/database/postgres-role-store.js";

// Authentication
export { initAuthProvider, getAuthProvider, setAuthProvider, DevAuthProvider } from "./auth/index.js";

// Adapters
export { registerPermissionRoutes, statusForError, type PermissionRouteOptions } from "./adapters/rest/adapter.js";
export { authMiddleware } from "./adapters/rest/auth-middleware.js";

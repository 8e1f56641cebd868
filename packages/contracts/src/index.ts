/**
 * @arbor/contracts
 *
 * Public API: the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Permissions
export type {
  PermissionLevel,
  ModelAction,
  DenialReason,
  GrantSource,
  PermissionDecision,
  DeniedDecision,
} from "./permission.js";
export {
  PERMISSION_LEVELS,
  MODEL_ACTIONS,
  compareLevels,
  minLevel,
  maxLevel,
  levelSatisfies,
  requiredLevelFor,
  isDenied,
} from "./permission.js";

// Field types
export type { FieldType } from "./field-types.js";
export { FIELD_TYPES, fieldTypeSchema } from "./field-types.js";

// Instances
export type { Instance, InstanceFeature, UserDefinedField } from "./instance.js";
export {
  INSTANCE_FEATURES,
  UDF_PREFIX,
  udfFieldName,
  instanceSchema,
  userDefinedFieldSchema,
} from "./instance.js";

// Roles
export type { Role, RoleGrant, Assignment, NewRole } from "./role.js";
export {
  permissionLevelSchema,
  roleGrantSchema,
  roleSchema,
  assignmentSchema,
  newRoleSchema,
  grantKey,
} from "./role.js";

// Models
export type {
  ModelDefinition,
  ModelFieldDefinition,
  AuthorizableObject,
} from "./model.js";
export { defineModel } from "./model.js";

// Context
export type {
  User,
  AuthenticatedUser,
  AnonymousUser,
  PermissionContext,
  Logger,
  DomainEvent,
  AuthzEventType,
  EventSubscriber,
} from "./context.js";
export { ANONYMOUS, userIdOf } from "./context.js";

// Denials
export type { PermissionDenial } from "./denial.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";

/**
 * Permission Denial
 *
 * The structured value a negative decision turns into at the boundary.
 * The calling layer renders it as a 403 response, or uses it to drop an
 * item from a list or a field from a form. How it is surfaced is not the
 * engine's concern; its shape is.
 */

import type { DenialReason, ModelAction } from "./permission.js";

export interface PermissionDenial {
  status: 403;
  code: "permission_denied";
  reason: DenialReason;
  action: ModelAction;
  modelType: string;
  /** Absent when the target was a model type or a not-yet-created object */
  objectId?: string;
  instanceId: string;
  /** Null for anonymous requests */
  userId: string | null;
  /** Field identifiers ("tree.diameter") for field-level denials */
  fields?: string[];
  /** Safe to show to the user */
  message: string;
}

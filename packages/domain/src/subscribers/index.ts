/**
 * Domain Event Subscribers
 *
 * Reactions to role administration events. Subscribers are registered at
 * startup via the platform's event bus and run after the change has been
 * persisted; a failing subscriber never undoes it.
 */

import type { EventSubscriber } from "@arbor/contracts";

/**
 * Keeps a plain trail of who was given which role.
 *
 * Listens for: "assignment.changed"
 */
const onAssignmentChanged: EventSubscriber = {
  eventType: "assignment.changed",
  name: "LogAssignmentChange",
  async handler(event) {
    const { userId, roleId } = event.payload;
    console.log(
      JSON.stringify({
        level: "info",
        context: "subscriber",
        message: roleId === null ? "User unassigned" : "User assigned to role",
        instanceId: event.instanceId,
        userId,
        roleId,
      })
    );
  },
};

/**
 * Notes instances whose feature toggles or user-defined fields changed,
 * since both alter which fields and models are editable.
 *
 * Listens for: "instance.updated"
 */
const onInstanceUpdated: EventSubscriber = {
  eventType: "instance.updated",
  name: "LogInstanceUpdate",
  async handler(event) {
    console.log(
      JSON.stringify({
        level: "info",
        context: "subscriber",
        message: "Instance settings changed",
        instanceId: event.instanceId,
      })
    );
  },
};

export const eventSubscribers: EventSubscriber[] = [onAssignmentChanged, onInstanceUpdated];

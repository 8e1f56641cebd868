/**
 * Event Bus
 *
 * Routes domain events from role administration to subscribers: chiefly
 * the RoleRegistry, which refreshes the affected instance's snapshot.
 *
 *   - Exact match ("role.updated") and wildcard ("*") subscriptions
 *   - All matching handlers run concurrently via Promise.allSettled
 *   - A failing subscriber is logged and captured, never rethrown:
 *     the change that emitted the event has already been persisted
 */

import type { DomainEvent, EventSubscriber } from "@arbor/contracts";
import { captureException } from "../observability/index.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("event-bus");

/** Registered subscribers, keyed by event type */
const subscribers = new Map<string, EventSubscriber[]>();

export function subscribe(subscriber: EventSubscriber): void {
  const existing = subscribers.get(subscriber.eventType) ?? [];
  subscribers.set(subscriber.eventType, [...existing, subscriber]);
}

export function subscribeAll(subs: EventSubscriber[]): void {
  for (const sub of subs) {
    subscribe(sub);
  }
}

/**
 * Publishes an event to every exact and wildcard subscriber.
 * Resolves once all handlers have settled.
 */
export async function publish(event: DomainEvent): Promise<void> {
  const enriched: DomainEvent = {
    ...event,
    timestamp: event.timestamp ?? new Date(),
  };

  const handlers = [
    ...(subscribers.get(enriched.type) ?? []),
    ...(subscribers.get("*") ?? []),
  ];
  if (handlers.length === 0) return;

  const results = await Promise.allSettled(
    handlers.map((sub) => sub.handler(enriched))
  );

  results.forEach((result, i) => {
    if (result.status === "fulfilled") return;
    const subscriber = handlers[i];
    const reason: unknown = result.reason;
    logger.error("Subscriber failed", {
      subscriber: subscriber.name,
      eventType: enriched.type,
      instanceId: enriched.instanceId,
      error: reason instanceof Error ? reason.message : String(reason),
    });
    if (reason instanceof Error) {
      captureException(reason, {
        subscriber: subscriber.name,
        eventType: enriched.type,
        instanceId: enriched.instanceId,
      });
    }
  });
}

export function getSubscriberCount(): number {
  let count = 0;
  for (const subs of subscribers.values()) {
    count += subs.length;
  }
  return count;
}

/** Clears all subscribers (for test isolation) */
export function clearSubscribers(): void {
  subscribers.clear();
}

/**
 * src/shared/messaging/events.ts
 *
 * WHY:
 * - Decouples "a member was written" from "what the outside world must hear about it".
 * - Services publish after the transaction commits; adapters (billing gateway,
 *   chat notifier) subscribe at the DI layer only. Services never import adapters.
 *
 * RULES:
 * - Events are discriminated unions on the `type` field.
 * - Payloads are JSON-serializable snapshots (no Date objects, no repos).
 * - Subscribers are best-effort: they report warnings, they never fail the write.
 */

// ── Event types ─────────────────────────────────────────────

export type MemberPersistedEvent = {
  type: 'member.persisted';
  requestId: string | null;
  member: {
    id: number;
    email: string;
    firstName: string | null;
    lastName: string | null;
    monthlyPaymentAmount: number;
  };
};

export type MemberUnsuspendedEvent = {
  type: 'member.unsuspended';
  requestId: string | null;
  member: {
    id: number;
    fullName: string;
    telegramUsername: string | null;
  };
  /** YYYY-MM-DD, or null when the member has no payments. */
  paidUntil: string | null;
};

export type DomainEvent = MemberPersistedEvent | MemberUnsuspendedEvent;

export type DomainEventType = DomainEvent['type'];

export type EventOf<T extends DomainEventType> = Extract<DomainEvent, { type: T }>;

// ── Subscriber contract ─────────────────────────────────────

export type HandlerOutcome = {
  /** Non-fatal, operator-visible problems (e.g. the bill was not created). */
  warnings: string[];
};

export const NO_WARNINGS: HandlerOutcome = Object.freeze({ warnings: [] });

export type EventHandler<T extends DomainEventType> = (event: EventOf<T>) => Promise<HandlerOutcome>;

export interface EventBus {
  subscribe<T extends DomainEventType>(type: T, handler: EventHandler<T>): void;

  /**
   * Runs every subscriber of event.type in registration order and collects
   * their warnings. Never rejects because of a subscriber.
   */
  publish(event: DomainEvent): Promise<HandlerOutcome>;
}

export function isEventOfType<T extends DomainEventType>(
  event: DomainEvent,
  type: T,
): event is EventOf<T> {
  return event.type === type;
}

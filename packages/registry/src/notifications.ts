/**
 * Registry notifications.
 *
 * The registry publishes one notification per committed state change,
 * after the change is visible. Sinks are synchronous and run inside the
 * mutating call.
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent, EventSource, Side, SymbolHash } from "@intent-registry/types";
import type { EventStore, RegistryEventType } from "@intent-registry/event-store";
import { REGISTRY_EVENTS } from "@intent-registry/event-store";

// =============================================================================
// Notification Types
// =============================================================================

export type RegistryNotification =
  | {
      readonly type: "IntentSubmitted";
      readonly intentId: number;
      readonly submitter: Address;
      readonly side: Side;
      readonly amount: bigint;
      readonly limitPrice: bigint;
      readonly symbol: SymbolHash;
      readonly seq: number;
    }
  | {
      readonly type: "IntentExecuted";
      readonly intentId: number;
      readonly executor: Address;
      readonly executedAmount: bigint;
      readonly avgPrice: bigint;
      readonly seq: number;
    }
  | {
      readonly type: "IntentCancelled";
      readonly intentId: number;
      readonly by: Address;
      readonly seq: number;
    }
  | {
      readonly type: "ControllerChanged";
      readonly previous: Address;
      readonly next: Address;
      readonly seq: number;
    }
  | {
      readonly type: "KeeperChanged";
      readonly previous: Address;
      readonly next: Address;
      readonly seq: number;
    }
  | {
      readonly type: "BoundsChanged";
      readonly minAmount: bigint;
      readonly maxAmount: bigint;
      readonly seq: number;
    }
  | {
      readonly type: "FeeChanged";
      readonly previous: number;
      readonly next: number;
      readonly seq: number;
    }
  | {
      readonly type: "TreasuryTopped";
      readonly amount: bigint;
      readonly from: Address;
      readonly seq: number;
    }
  | {
      readonly type: "TreasuryWithdrawn";
      readonly to: Address;
      readonly amount: bigint;
      readonly seq: number;
    }
  | {
      readonly type: "Paused";
      readonly paused: boolean;
      readonly seq: number;
    };

export type RegistryNotificationType = RegistryNotification["type"];

export interface NotificationSink {
  publish(notification: RegistryNotification): void;
}

/**
 * Keeps every notification in memory. Useful in tests and as a fan-in
 * point for callers that poll.
 */
export class CollectingSink implements NotificationSink {
  private readonly _notifications: RegistryNotification[] = [];

  publish(notification: RegistryNotification): void {
    this._notifications.push(notification);
  }

  get notifications(): readonly RegistryNotification[] {
    return [...this._notifications];
  }

  ofType<T extends RegistryNotificationType>(
    type: T,
  ): readonly Extract<RegistryNotification, { type: T }>[] {
    return this._notifications.filter(
      (n): n is Extract<RegistryNotification, { type: T }> => n.type === type,
    );
  }

  clear(): void {
    this._notifications.length = 0;
  }
}

// =============================================================================
// Event Store Sink
// =============================================================================

interface EventMapping {
  readonly streamId: string;
  readonly type: RegistryEventType;
  readonly source: EventSource;
  readonly actor: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Map a notification to its stream, event type and JSON-safe payload.
 */
export function toEventMapping(notification: RegistryNotification): EventMapping {
  switch (notification.type) {
    case "IntentSubmitted":
      return {
        streamId: `intent-${notification.intentId}`,
        type: REGISTRY_EVENTS.INTENT_SUBMITTED,
        source: "intents",
        actor: notification.submitter,
        payload: {
          intentId: notification.intentId,
          submitter: notification.submitter,
          side: notification.side,
          amount: notification.amount.toString(),
          limitPrice: notification.limitPrice.toString(),
          symbol: notification.symbol,
          seq: notification.seq,
        },
      };
    case "IntentExecuted":
      return {
        streamId: `intent-${notification.intentId}`,
        type: REGISTRY_EVENTS.INTENT_EXECUTED,
        source: "executions",
        actor: notification.executor,
        payload: {
          intentId: notification.intentId,
          executor: notification.executor,
          executedAmount: notification.executedAmount.toString(),
          avgPrice: notification.avgPrice.toString(),
          seq: notification.seq,
        },
      };
    case "IntentCancelled":
      return {
        streamId: `intent-${notification.intentId}`,
        type: REGISTRY_EVENTS.INTENT_CANCELLED,
        source: "intents",
        actor: notification.by,
        payload: {
          intentId: notification.intentId,
          by: notification.by,
          seq: notification.seq,
        },
      };
    case "ControllerChanged":
    case "KeeperChanged":
      return {
        streamId: "config",
        type:
          notification.type === "ControllerChanged"
            ? REGISTRY_EVENTS.CONTROLLER_CHANGED
            : REGISTRY_EVENTS.KEEPER_CHANGED,
        source: "config",
        actor: "owner",
        payload: {
          previous: notification.previous,
          next: notification.next,
          seq: notification.seq,
        },
      };
    case "BoundsChanged":
      return {
        streamId: "config",
        type: REGISTRY_EVENTS.BOUNDS_CHANGED,
        source: "config",
        actor: "owner",
        payload: {
          minAmount: notification.minAmount.toString(),
          maxAmount: notification.maxAmount.toString(),
          seq: notification.seq,
        },
      };
    case "FeeChanged":
      return {
        streamId: "config",
        type: REGISTRY_EVENTS.FEE_CHANGED,
        source: "config",
        actor: "owner",
        payload: {
          previous: notification.previous,
          next: notification.next,
          seq: notification.seq,
        },
      };
    case "Paused":
      return {
        streamId: "config",
        type: REGISTRY_EVENTS.PAUSED,
        source: "config",
        actor: "owner",
        payload: { paused: notification.paused, seq: notification.seq },
      };
    case "TreasuryTopped":
      return {
        streamId: "treasury",
        type: REGISTRY_EVENTS.TREASURY_TOPPED,
        source: "treasury",
        actor: notification.from,
        payload: {
          amount: notification.amount.toString(),
          from: notification.from,
          seq: notification.seq,
        },
      };
    case "TreasuryWithdrawn":
      return {
        streamId: "treasury",
        type: REGISTRY_EVENTS.TREASURY_WITHDRAWN,
        source: "treasury",
        actor: "owner",
        payload: {
          to: notification.to,
          amount: notification.amount.toString(),
          seq: notification.seq,
        },
      };
  }
}

/**
 * Appends every notification to an event store as a DomainEvent.
 *
 * Streams: `intent-<id>` for intent lifecycle, `treasury`, `config`.
 * Events published under one sequence marker share a correlation id.
 */
export class EventStoreNotificationSink implements NotificationSink {
  private readonly store: EventStore;

  constructor(store: EventStore) {
    this.store = store;
  }

  publish(notification: RegistryNotification): void {
    const mapping = toEventMapping(notification);
    const event: DomainEvent = {
      type: mapping.type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor: mapping.actor,
        correlationId: `seq-${notification.seq}`,
        source: mapping.source,
      },
      payload: mapping.payload,
    };
    this.store.append(mapping.streamId, [event]);
  }
}

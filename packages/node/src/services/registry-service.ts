/**
 * RegistryService — Composition root for the registry packages.
 *
 * Route handlers delegate to this service. It owns one Registry, the
 * event store its notifications are written to, the catalog those
 * events are checked against, and the transfer port withdrawals go
 * through.
 */

import {
  Registry,
  EventStoreNotificationSink,
  RecordingTransferPort,
  FEE_DENOMINATOR,
  MAX_BULK_QUERY,
  SIDE_BUY,
  SIDE_SELL,
} from "@intent-registry/registry";
import type { LogicalClock, TransferPort } from "@intent-registry/registry";
import { InMemoryEventStore, createRegistryCatalog } from "@intent-registry/event-store";
import type {
  EventCatalog,
  StoredEvent,
  EventQuery,
  EventStoreIntegrityResult,
} from "@intent-registry/event-store";
import type { Address, IntentInput, IntentRecord } from "@intent-registry/types";

// =============================================================================
// Configuration
// =============================================================================

export interface RegistryServiceConfig {
  readonly owner: Address;
  readonly controller: Address;
  readonly keeper: Address;
  readonly feeBps?: number | undefined;
  readonly minAmount?: bigint | undefined;
  readonly maxAmount?: bigint | undefined;
  readonly maxIntents?: number | undefined;
}

export interface RegistryServiceDeps {
  readonly clock?: LogicalClock | undefined;

  /** Defaults to a RecordingTransferPort */
  readonly transfer?: TransferPort | undefined;
}

export interface RegistryConstants {
  readonly feeDenominator: number;
  readonly sideBuy: number;
  readonly sideSell: number;
  readonly maxIntents: number;
  readonly maxBulkQuery: number;
}

export interface EventStoreHealth {
  readonly integrity: EventStoreIntegrityResult;

  /** Number of stored events whose payload fails its catalog schema */
  readonly invalidPayloads: number;
}

// =============================================================================
// Service
// =============================================================================

export class RegistryService {
  readonly registry: Registry;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;
  readonly transfer: TransferPort;

  private _ready = false;

  constructor(config: RegistryServiceConfig, deps: RegistryServiceDeps = {}) {
    this.eventStore = new InMemoryEventStore();
    this.catalog = createRegistryCatalog();
    this.transfer = deps.transfer ?? new RecordingTransferPort();

    this.registry = new Registry(
      {
        owner: config.owner,
        controller: config.controller,
        keeper: config.keeper,
        feeBps: config.feeBps,
        minAmount: config.minAmount,
        maxAmount: config.maxAmount,
        maxIntents: config.maxIntents,
      },
      {
        sink: new EventStoreNotificationSink(this.eventStore),
        transfer: this.transfer,
        clock: deps.clock,
      },
    );

    this._ready = this.checkEventStore().integrity.valid;
  }

  // ─── Intents ───────────────────────────────────────────────────────

  submitIntent(caller: Address, input: IntentInput, feePaid: bigint): IntentRecord {
    const id = this.registry.submit(caller, input, feePaid);
    return this.registry.intents.get(id);
  }

  submitBatch(
    caller: Address,
    entries: readonly IntentInput[],
    totalFee: bigint,
  ): readonly IntentRecord[] {
    const ids = this.registry.submitBatch(caller, entries, totalFee);
    return ids.map((id) => this.registry.intents.get(id));
  }

  constants(): RegistryConstants {
    return {
      feeDenominator: FEE_DENOMINATOR,
      sideBuy: SIDE_BUY,
      sideSell: SIDE_SELL,
      maxIntents: this.registry.maxIntents,
      maxBulkQuery: MAX_BULK_QUERY,
    };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(query?: EventQuery): readonly StoredEvent[] {
    return this.eventStore.readAll(query);
  }

  /** Undefined for a stream that was never written. */
  readStreamEvents(
    streamId: string,
    query?: EventQuery,
  ): readonly StoredEvent[] | undefined {
    if (this.eventStore.streamVersion(streamId) === 0) {
      return undefined;
    }
    return this.eventStore.read(streamId, query);
  }

  // ─── Health ────────────────────────────────────────────────────────

  checkEventStore(): EventStoreHealth {
    const integrity = this.eventStore.verifyIntegrity();
    const invalidPayloads = this.eventStore
      .readAll()
      .filter((stored) => !this.catalog.validate(stored.event.type, stored.event.payload))
      .length;
    return { integrity, invalidPayloads };
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}

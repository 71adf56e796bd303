/**
 * Tests for the Registry facade.
 *
 * Verifies:
 * - Role checks, pause gate and their ordering
 * - Intent lifecycle exclusivity
 * - Fee collection and treasury withdrawals
 * - Owner configuration
 * - Reentrancy guards on withdraw and execute
 * - Notifications and sequence markers
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "@intent-registry/types";
import { Registry } from "../src/registry.js";
import { RegistryError } from "../src/errors.js";
import { SequenceClock } from "../src/clock.js";
import type {
  NotificationSink,
  RegistryNotification,
  RegistryNotificationType,
} from "../src/notifications.js";
import { RecordingTransferPort } from "../src/transfer.js";
import type { TransferPort } from "../src/transfer.js";
import {
  CONTROLLER,
  KEEPER,
  MIXED_CASE,
  OWNER,
  PAYEE,
  STRANGER,
  SYMBOL_A,
  SYMBOL_B,
  buy,
  createRegistry,
  sell,
} from "./fixtures.js";
import type { TestRegistry } from "./fixtures.js";

const ZERO: Address = "0x0000000000000000000000000000000000000000";

/**
 * Sink that throws on one notification type and keeps everything else.
 */
class RejectingSink implements NotificationSink {
  rejects: RegistryNotificationType | undefined;
  readonly published: RegistryNotification[] = [];

  publish(notification: RegistryNotification): void {
    if (notification.type === this.rejects) {
      throw new Error(`sink rejected ${notification.type}`);
    }
    this.published.push(notification);
  }
}

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof RegistryError) return err.code;
    throw err;
  }
  throw new Error("expected a RegistryError");
}

describe("Registry", () => {
  let t: TestRegistry;

  beforeEach(() => {
    t = createRegistry();
  });

  // ─── Construction ───────────────────────────────────────────────────

  describe("construction", () => {
    it("applies defaults", () => {
      expect(t.registry.config).toEqual({
        owner: OWNER,
        controller: CONTROLLER,
        keeper: KEEPER,
        paused: false,
        feeBps: 0,
        minAmount: 1n,
        maxAmount: 2n ** 256n - 1n,
      });
      expect(t.registry.treasuryBalance).toBe(0n);
      expect(t.registry.maxIntents).toBe(10_000);
    });

    it("rejects the null identity for any role", () => {
      expect(codeOf(() => createRegistry({ owner: ZERO }))).toBe("ZERO_ADDRESS");
      expect(codeOf(() => createRegistry({ keeper: ZERO }))).toBe("ZERO_ADDRESS");
    });

    it("validates fee, bounds and capacity", () => {
      expect(codeOf(() => createRegistry({ feeBps: 10_001 }))).toBe("INVALID_FEE");
      expect(codeOf(() => createRegistry({ minAmount: 5n, maxAmount: 4n }))).toBe(
        "BOUNDS_INVALID",
      );
      expect(codeOf(() => createRegistry({ maxIntents: 10_001 }))).toBe("BOUNDS_INVALID");
    });

    it("honors a lowered capacity", () => {
      const { registry } = createRegistry({ maxIntents: 2 });
      registry.submit(CONTROLLER, buy(1n), 0n);
      registry.submit(CONTROLLER, buy(1n), 0n);
      expect(codeOf(() => registry.submit(CONTROLLER, buy(1n), 0n))).toBe("CAPACITY_EXCEEDED");
    });
  });

  // ─── Scenarios ──────────────────────────────────────────────────────

  describe("scenarios", () => {
    it("three intents with the second executed", () => {
      const { registry } = t;
      const id1 = registry.submit(CONTROLLER, buy(100n), 0n);
      const id2 = registry.submit(CONTROLLER, sell(200n), 0n);
      const id3 = registry.submit(CONTROLLER, buy(300n), 0n);
      registry.execute(KEEPER, id2, 200n, 10n);

      expect([id1, id2, id3]).toEqual([1, 2, 3]);
      expect(registry.analytics.countPending()).toBe(2);
      expect(registry.analytics.countExecuted()).toBe(1);
      expect(registry.analytics.countCancelled()).toBe(0);
      expect(registry.intents.lastIds(2)).toEqual([id3, id2]);
    });

    it("a 25 bps fee on 1e15 requires exactly 2.5e12", () => {
      const { registry, sink } = createRegistry({ feeBps: 25 });
      const amount = 10n ** 15n;

      expect(codeOf(() =>
        registry.submit(CONTROLLER, buy(amount, SYMBOL_A, 100n), 2_499_999_999_999n),
      )).toBe("INSUFFICIENT_FEE");
      expect(registry.treasuryBalance).toBe(0n);
      expect(sink.notifications).toEqual([]);

      const id = registry.submit(CONTROLLER, buy(amount, SYMBOL_A, 100n), 2_500_000_000_000n);
      expect(id).toBe(1);
      expect(registry.treasuryBalance).toBe(2_500_000_000_000n);
    });

    it("pause blocks submission but not cancellation", () => {
      const { registry } = t;
      const id = registry.submit(CONTROLLER, buy(10n), 0n);
      registry.setPaused(OWNER, true);

      expect(codeOf(() => registry.submit(CONTROLLER, buy(10n), 0n))).toBe("PAUSED");
      expect(registry.cancel(CONTROLLER, id).cancelled).toBe(true);
    });
  });

  // ─── Roles & Gate ───────────────────────────────────────────────────

  describe("roles and pause gate", () => {
    it("requires the controller to submit", () => {
      expect(codeOf(() => t.registry.submit(STRANGER, buy(10n), 0n))).toBe("NOT_CONTROLLER");
      expect(codeOf(() => t.registry.submitBatch(KEEPER, [buy(10n)], 0n))).toBe("NOT_CONTROLLER");
    });

    it("requires the keeper to execute", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      expect(codeOf(() => t.registry.execute(CONTROLLER, id, 10n, 1n))).toBe("NOT_KEEPER");
    });

    it("requires the owner to configure", () => {
      expect(codeOf(() => t.registry.setFeeBps(CONTROLLER, 5))).toBe("NOT_OWNER");
      expect(codeOf(() => t.registry.setPaused(KEEPER, true))).toBe("NOT_OWNER");
      expect(codeOf(() => t.registry.setBounds(STRANGER, 1n, 2n))).toBe("NOT_OWNER");
      expect(codeOf(() => t.registry.setController(STRANGER, STRANGER))).toBe("NOT_OWNER");
      expect(codeOf(() => t.registry.setKeeper(STRANGER, STRANGER))).toBe("NOT_OWNER");
    });

    it("accepts role addresses in any case", () => {
      const { registry } = createRegistry({ controller: MIXED_CASE });
      expect(registry.config.controller).toBe("0xabcdef0123456789abcdef0123456789abcdef01");
      expect(registry.submit("0xABCDEF0123456789ABCDEF0123456789ABCDEF01", buy(1n), 0n)).toBe(1);
    });

    it("checks the role before the pause gate", () => {
      t.registry.setPaused(OWNER, true);
      expect(codeOf(() => t.registry.submit(STRANGER, buy(10n), 0n))).toBe("NOT_CONTROLLER");
    });

    it("checks the pause gate before validation", () => {
      t.registry.setPaused(OWNER, true);
      expect(codeOf(() => t.registry.submit(CONTROLLER, buy(0n), 0n))).toBe("PAUSED");
      expect(codeOf(() => t.registry.execute(KEEPER, 999, 0n, 0n))).toBe("PAUSED");
      expect(codeOf(() => t.registry.submitBatch(CONTROLLER, [], 0n))).toBe("PAUSED");
    });

    it("resumes after unpausing", () => {
      t.registry.setPaused(OWNER, true);
      t.registry.setPaused(OWNER, false);
      expect(t.registry.submit(CONTROLLER, buy(10n), 0n)).toBe(1);
    });
  });

  // ─── Lifecycle ──────────────────────────────────────────────────────

  describe("lifecycle", () => {
    it("an executed intent cannot be cancelled", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      t.registry.execute(KEEPER, id, 10n, 1n);

      expect(codeOf(() => t.registry.cancel(OWNER, id))).toBe("ALREADY_EXECUTED");
      expect(codeOf(() => t.registry.execute(KEEPER, id, 10n, 1n))).toBe("ALREADY_EXECUTED");
    });

    it("a cancelled intent cannot be executed", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      t.registry.cancel(CONTROLLER, id);

      expect(codeOf(() => t.registry.execute(KEEPER, id, 10n, 1n))).toBe("ALREADY_CANCELLED");
      expect(codeOf(() => t.registry.cancel(OWNER, id))).toBe("ALREADY_CANCELLED");
    });

    it("rejects over-filling", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      expect(codeOf(() => t.registry.execute(KEEPER, id, 11n, 1n))).toBe("AMOUNT_OUT_OF_BOUNDS");
    });

    it("records a partial fill as a terminal execution", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      const execution = t.registry.execute(KEEPER, id, 4n, 7n);

      expect(execution.executedAmount).toBe(4n);
      expect(t.registry.intents.get(id).executedAmount).toBe(4n);
      expect(t.registry.executions.get(id)).toEqual(execution);
    });

    it("only the submitter or owner may cancel", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      expect(codeOf(() => t.registry.cancel(KEEPER, id))).toBe("UNAUTHORIZED");
    });

    it("a former controller may still cancel its own intents", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      t.registry.setController(OWNER, STRANGER);
      expect(t.registry.cancel(CONTROLLER, id).cancelled).toBe(true);
    });
  });

  // ─── Batch ──────────────────────────────────────────────────────────

  describe("submitBatch", () => {
    it("commits nothing when one entry is invalid", () => {
      t.registry.submit(CONTROLLER, buy(10n), 0n);
      t.sink.clear();

      expect(codeOf(() =>
        t.registry.submitBatch(CONTROLLER, [buy(10n), { ...sell(5n), side: 0 }], 0n),
      )).toBe("INVALID_SIDE");
      expect(t.registry.intents.count).toBe(1);
      expect(t.sink.notifications).toEqual([]);
    });

    it("publishes one submission per entry and a single fee deposit", () => {
      const { registry, sink } = createRegistry({ feeBps: 100 });
      const ids = registry.submitBatch(CONTROLLER, [buy(1_000n), sell(2_000n, SYMBOL_B)], 30n);

      expect(ids).toEqual([1, 2]);
      expect(registry.treasuryBalance).toBe(30n);
      expect(sink.notifications.map((n) => n.type)).toEqual([
        "IntentSubmitted",
        "IntentSubmitted",
        "TreasuryTopped",
      ]);
      expect(sink.notifications.map((n) => n.seq)).toEqual([1, 1, 1]);
    });
  });

  // ─── Bulk fetches ───────────────────────────────────────────────────

  describe("bulk fetches", () => {
    // The two bulk fetches deliberately disagree on missing ids.
    it("intent bulk fetch fails on a missing id", () => {
      t.registry.submit(CONTROLLER, buy(10n), 0n);
      expect(codeOf(() => t.registry.intents.getMany([1, 99]))).toBe("NOT_FOUND");
    });

    it("execution bulk fetch fills missing ids with a zero-valued record", () => {
      const id = t.registry.submit(CONTROLLER, buy(10n), 0n);
      t.registry.execute(KEEPER, id, 10n, 3n);

      const records = t.registry.executions.getMany([id, 99]);
      expect(records.map((r) => r.intentId)).toEqual([1, 0]);
      expect(records.map((r) => r.executedAmount)).toEqual([10n, 0n]);
    });
  });

  // ─── Treasury ───────────────────────────────────────────────────────

  describe("treasury", () => {
    it("withdraws exactly the balance to zero", () => {
      t.registry.topUpTreasury(STRANGER, 1_000n);

      expect(t.registry.withdraw(OWNER, PAYEE, 1_000n)).toBe(0n);
      expect(t.transfer.transfers).toEqual([{ to: PAYEE, amount: 1_000n }]);
    });

    it("fails to withdraw one more than the balance", () => {
      t.registry.topUpTreasury(STRANGER, 1_000n);
      expect(codeOf(() => t.registry.withdraw(OWNER, PAYEE, 1_001n))).toBe("TRANSFER_FAILED");
      expect(t.registry.treasuryBalance).toBe(1_000n);
    });

    it("only the owner may withdraw", () => {
      t.registry.topUpTreasury(STRANGER, 1_000n);
      expect(codeOf(() => t.registry.withdraw(CONTROLLER, PAYEE, 1n))).toBe("UNAUTHORIZED");
    });

    it("rejects an empty top-up", () => {
      expect(codeOf(() => t.registry.topUpTreasury(STRANGER, 0n))).toBe("ZERO_AMOUNT");
    });

    it("rolls back a failed transfer", () => {
      const failing: TransferPort = { transfer: () => ({ ok: false, reason: "rejected" }) };
      const { registry, sink } = createRegistry({}, undefined, failing);
      registry.topUpTreasury(STRANGER, 500n);

      expect(codeOf(() => registry.withdraw(OWNER, PAYEE, 200n))).toBe("TRANSFER_FAILED");
      expect(registry.treasuryBalance).toBe(500n);
      expect(sink.ofType("TreasuryWithdrawn")).toEqual([]);
    });
  });

  // ─── Configuration ──────────────────────────────────────────────────

  describe("configuration", () => {
    it("replaces the controller", () => {
      t.registry.setController(OWNER, STRANGER);

      expect(codeOf(() => t.registry.submit(CONTROLLER, buy(1n), 0n))).toBe("NOT_CONTROLLER");
      expect(t.registry.submit(STRANGER, buy(1n), 0n)).toBe(1);
      expect(t.sink.ofType("ControllerChanged")).toEqual([
        { type: "ControllerChanged", previous: CONTROLLER, next: STRANGER, seq: 1 },
      ]);
    });

    it("rejects the null identity as a new role holder", () => {
      expect(codeOf(() => t.registry.setController(OWNER, ZERO))).toBe("ZERO_ADDRESS");
      expect(codeOf(() => t.registry.setKeeper(OWNER, ZERO))).toBe("ZERO_ADDRESS");
    });

    it("applies new bounds to later submissions only", () => {
      const early = t.registry.submit(CONTROLLER, buy(5n), 0n);
      t.registry.setBounds(OWNER, 10n, 20n);

      expect(codeOf(() => t.registry.submit(CONTROLLER, buy(9n), 0n))).toBe("AMOUNT_OUT_OF_BOUNDS");
      expect(codeOf(() => t.registry.submit(CONTROLLER, buy(21n), 0n))).toBe("AMOUNT_OUT_OF_BOUNDS");
      expect(t.registry.submit(CONTROLLER, buy(10n), 0n)).toBe(2);
      expect(t.registry.submit(CONTROLLER, buy(20n), 0n)).toBe(3);
      expect(t.registry.intents.get(early).amount).toBe(5n);
    });

    it("rejects inverted bounds", () => {
      expect(codeOf(() => t.registry.setBounds(OWNER, 5n, 4n))).toBe("BOUNDS_INVALID");
      t.registry.setBounds(OWNER, 4n, 4n);
      expect(t.registry.config.minAmount).toBe(4n);
      expect(t.registry.config.maxAmount).toBe(4n);
    });

    it("accepts fees up to 10000 bps", () => {
      expect(codeOf(() => t.registry.setFeeBps(OWNER, 10_001))).toBe("INVALID_FEE");
      t.registry.setFeeBps(OWNER, 10_000);
      expect(t.registry.config.feeBps).toBe(10_000);
      expect(t.sink.ofType("FeeChanged")).toEqual([
        { type: "FeeChanged", previous: 0, next: 10_000, seq: 1 },
      ]);
    });
  });

  // ─── Reentrancy ─────────────────────────────────────────────────────

  describe("reentrancy", () => {
    it("a transfer cannot re-enter withdraw", () => {
      let target: Registry | undefined;
      const nested: string[] = [];
      const reentrant: TransferPort = {
        transfer: (to, amount) => {
          try {
            target?.withdraw(OWNER, to, amount);
          } catch (err) {
            if (err instanceof RegistryError) nested.push(err.code);
          }
          return { ok: true };
        },
      };
      const { registry } = createRegistry({}, undefined, reentrant);
      target = registry;
      registry.topUpTreasury(STRANGER, 1_000n);

      expect(registry.withdraw(OWNER, PAYEE, 600n)).toBe(400n);
      expect(nested).toEqual(["REENTRANT_CALL"]);
      expect(registry.treasuryBalance).toBe(400n);
    });

    it("a notification handler cannot re-enter execute", () => {
      let target: Registry | undefined;
      const nested: string[] = [];
      const sink: NotificationSink = {
        publish: (notification) => {
          if (notification.type !== "IntentExecuted") return;
          try {
            target?.execute(KEEPER, 2, 1n, 1n);
          } catch (err) {
            if (err instanceof RegistryError) nested.push(err.code);
          }
        },
      };
      const registry = new Registry(
        { owner: OWNER, controller: CONTROLLER, keeper: KEEPER },
        { sink, transfer: new RecordingTransferPort() },
      );
      target = registry;
      registry.submit(CONTROLLER, buy(10n), 0n);
      registry.submit(CONTROLLER, buy(10n), 0n);

      registry.execute(KEEPER, 1, 10n, 1n);

      expect(nested).toEqual(["REENTRANT_CALL"]);
      expect(registry.intents.get(2).executed).toBe(false);
      expect(registry.executions.count).toBe(1);
    });
  });

  // ─── Notifications & Sequence ───────────────────────────────────────

  describe("notifications", () => {
    it("publishes the submission before its fee deposit, under one marker", () => {
      const { registry, sink } = createRegistry({ feeBps: 100 });
      registry.submit(CONTROLLER, buy(1_000n, SYMBOL_B, 55n), 10n);

      expect(sink.notifications).toEqual([
        {
          type: "IntentSubmitted",
          intentId: 1,
          submitter: CONTROLLER,
          side: 1,
          amount: 1_000n,
          limitPrice: 55n,
          symbol: SYMBOL_B,
          seq: 1,
        },
        { type: "TreasuryTopped", amount: 10n, from: CONTROLLER, seq: 1 },
      ]);
    });

    it("reports who cancelled", () => {
      t.registry.submit(CONTROLLER, buy(10n), 0n);
      t.registry.cancel(OWNER, 1);

      expect(t.sink.ofType("IntentCancelled")).toEqual([
        { type: "IntentCancelled", intentId: 1, by: OWNER, seq: 2 },
      ]);
    });

    it("reports withdrawals and top-ups", () => {
      t.registry.topUpTreasury(STRANGER, 50n);
      t.registry.withdraw(OWNER, PAYEE, 20n);

      expect(t.sink.notifications).toEqual([
        { type: "TreasuryTopped", amount: 50n, from: STRANGER, seq: 1 },
        { type: "TreasuryWithdrawn", to: PAYEE, amount: 20n, seq: 2 },
      ]);
    });

    it("failed mutations do not consume sequence markers", () => {
      const clock = new SequenceClock();
      const { registry, sink } = createRegistry({}, clock);

      expect(() => registry.submit(STRANGER, buy(1n), 0n)).toThrow(RegistryError);
      expect(() => registry.submit(CONTROLLER, buy(0n), 0n)).toThrow(RegistryError);
      expect(clock.peek()).toBe(0);
      expect(sink.notifications).toEqual([]);

      registry.submit(CONTROLLER, buy(1n), 0n);
      expect(registry.intents.get(1).createdAt).toBe(1);
    });

    it("toggles the pause flag with a notification each time", () => {
      t.registry.setPaused(OWNER, true);
      t.registry.setPaused(OWNER, false);

      expect(t.sink.ofType("Paused")).toEqual([
        { type: "Paused", paused: true, seq: 1 },
        { type: "Paused", paused: false, seq: 2 },
      ]);
    });
  });

  // ─── Failed notifications ───────────────────────────────────────────

  describe("when the sink throws", () => {
    let sink: RejectingSink;
    let transfer: RecordingTransferPort;
    let registry: Registry;

    beforeEach(() => {
      sink = new RejectingSink();
      transfer = new RecordingTransferPort();
      registry = new Registry(
        { owner: OWNER, controller: CONTROLLER, keeper: KEEPER, feeBps: 100 },
        { sink, transfer },
      );
    });

    it("leaves no trace of a rejected submission", () => {
      sink.rejects = "IntentSubmitted";

      expect(() => registry.submit(CONTROLLER, buy(1_000n), 10n)).toThrow(
        "sink rejected IntentSubmitted",
      );
      expect(registry.intents.count).toBe(0);
      expect(registry.treasuryBalance).toBe(0n);
      expect(registry.intents.idsBySubmitter(CONTROLLER)).toEqual([]);
      expect(registry.intents.idsBySymbol(SYMBOL_A)).toEqual([]);

      sink.rejects = undefined;
      expect(registry.submit(CONTROLLER, buy(1_000n), 10n)).toBe(1);
    });

    it("undoes a submission whose fee notification fails", () => {
      sink.rejects = "TreasuryTopped";

      expect(() => registry.submit(CONTROLLER, buy(1_000n), 10n)).toThrow(
        "sink rejected TreasuryTopped",
      );
      expect(registry.intents.count).toBe(0);
      expect(registry.treasuryBalance).toBe(0n);
    });

    it("undoes a whole batch and keeps earlier intents", () => {
      registry.submit(CONTROLLER, buy(1_000n), 10n);
      sink.rejects = "TreasuryTopped";

      expect(() =>
        registry.submitBatch(CONTROLLER, [buy(1_000n), sell(2_000n, SYMBOL_B)], 30n),
      ).toThrow("sink rejected TreasuryTopped");
      expect(registry.intents.count).toBe(1);
      expect(registry.intents.idsBySymbol(SYMBOL_A)).toEqual([1]);
      expect(registry.intents.idsBySymbol(SYMBOL_B)).toEqual([]);
      expect(registry.treasuryBalance).toBe(10n);

      sink.rejects = undefined;
      expect(registry.submitBatch(CONTROLLER, [buy(1_000n)], 10n)).toEqual([2]);
    });

    it("undoes a rejected execution and releases the guard", () => {
      registry.submit(CONTROLLER, buy(1_000n), 10n);
      sink.rejects = "IntentExecuted";

      expect(() => registry.execute(KEEPER, 1, 500n, 7n)).toThrow("sink rejected IntentExecuted");
      expect(registry.intents.get(1).executed).toBe(false);
      expect(registry.intents.get(1).executedAmount).toBe(0n);
      expect(registry.executions.count).toBe(0);

      sink.rejects = undefined;
      expect(registry.execute(KEEPER, 1, 500n, 7n).executedAmount).toBe(500n);
    });

    it("undoes a rejected cancellation", () => {
      registry.submit(CONTROLLER, buy(1_000n), 10n);
      sink.rejects = "IntentCancelled";

      expect(() => registry.cancel(CONTROLLER, 1)).toThrow("sink rejected IntentCancelled");
      expect(registry.intents.get(1).cancelled).toBe(false);
    });

    it("undoes rejected configuration changes and top-ups", () => {
      sink.rejects = "FeeChanged";
      expect(() => registry.setFeeBps(OWNER, 50)).toThrow("sink rejected FeeChanged");
      expect(registry.config.feeBps).toBe(100);

      sink.rejects = "Paused";
      expect(() => registry.setPaused(OWNER, true)).toThrow("sink rejected Paused");
      expect(registry.config.paused).toBe(false);

      sink.rejects = "TreasuryTopped";
      expect(() => registry.topUpTreasury(STRANGER, 500n)).toThrow("sink rejected TreasuryTopped");
      expect(registry.treasuryBalance).toBe(0n);
    });

    it("keeps the debit of a completed withdrawal", () => {
      registry.topUpTreasury(STRANGER, 500n);
      sink.rejects = "TreasuryWithdrawn";

      expect(() => registry.withdraw(OWNER, PAYEE, 200n)).toThrow(
        "sink rejected TreasuryWithdrawn",
      );
      expect(transfer.transfers).toEqual([{ to: PAYEE, amount: 200n }]);
      expect(registry.treasuryBalance).toBe(300n);
    });
  });
});

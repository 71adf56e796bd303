/**
 * Registry — the single entry point for every mutation.
 *
 * Composes:
 * - IntentStore: intent records and their indexes
 * - ExecutionLedger: one execution record per executed intent
 * - TreasuryAccount: fee balance and owner withdrawals
 * - AccessPolicy: role predicates
 * - RegistryAnalytics: aggregate scans
 *
 * Every mutation checks the caller's role first, then the pause gate,
 * then hands off to the component that validates and commits. The
 * logical clock is read once per committed mutation, and exactly one
 * notification per state change is published after it commits. If the
 * sink throws, the change is undone before the error reaches the caller.
 * A withdrawal is the exception: once the transfer has gone out, the
 * debit stays.
 *
 * There is no ownership transfer. The owner is fixed at construction.
 */

import type {
  Address,
  ExecutionRecord,
  IntentInput,
  IntentRecord,
  RegistryConfig,
} from "@intent-registry/types";
import { isAddress, isZeroAddress, normalizeAddress, sameAddress } from "@intent-registry/types";
import { AccessPolicy } from "./access-policy.js";
import { RegistryAnalytics } from "./analytics.js";
import type { LogicalClock } from "./clock.js";
import { SequenceClock } from "./clock.js";
import { FEE_DENOMINATOR, MAX_INTENTS, MAX_UINT256 } from "./constants.js";
import { RegistryError } from "./errors.js";
import type { ExecutionQueries } from "./execution-ledger.js";
import { ExecutionLedger } from "./execution-ledger.js";
import type { IntentQueries } from "./intent-store.js";
import { IntentStore } from "./intent-store.js";
import type { NotificationSink, RegistryNotification } from "./notifications.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import type { TransferPort } from "./transfer.js";
import { TreasuryAccount } from "./treasury-account.js";
import type { RegistryDeps, RegistryOptions, RegistrySnapshot } from "./types.js";

// =============================================================================
// Validation helpers
// =============================================================================

function checkRoleAddress(role: string, address: Address): Address {
  if (!isAddress(address)) {
    throw new RegistryError("INVALID_ADDRESS", `${role} '${String(address)}' is not a valid address`);
  }
  if (isZeroAddress(address)) {
    throw new RegistryError("ZERO_ADDRESS", `${role} must not be the null address`);
  }
  return normalizeAddress(address);
}

function checkFee(feeBps: number): number {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > FEE_DENOMINATOR) {
    throw new RegistryError(
      "INVALID_FEE",
      `Fee must be an integer in [0, ${FEE_DENOMINATOR}] bps, got ${feeBps}`,
    );
  }
  return feeBps;
}

function checkBounds(minAmount: bigint, maxAmount: bigint): void {
  if (minAmount < 0n || minAmount > maxAmount) {
    throw new RegistryError(
      "BOUNDS_INVALID",
      `Bounds [${minAmount}, ${maxAmount}] are invalid`,
    );
  }
}

function submitted(intent: IntentRecord): RegistryNotification {
  return {
    type: "IntentSubmitted",
    intentId: intent.id,
    submitter: intent.submitter,
    side: intent.side,
    amount: intent.amount,
    limitPrice: intent.limitPrice,
    symbol: intent.symbol,
    seq: intent.createdAt,
  };
}

/**
 * A collected submission fee, announced under the submission's marker.
 */
function feeCollected(amount: bigint, from: Address, seq: number): RegistryNotification[] {
  return amount === 0n ? [] : [{ type: "TreasuryTopped", amount, from, seq }];
}

function highestMarker(snapshot: RegistrySnapshot): number {
  let max = 0;
  for (const intent of snapshot.intents) max = Math.max(max, intent.createdAt);
  for (const execution of snapshot.executions) max = Math.max(max, execution.createdAt);
  return max;
}

// =============================================================================
// Registry
// =============================================================================

export class Registry {
  private _config: RegistryConfig;
  private readonly store: IntentStore;
  private readonly ledger: ExecutionLedger;
  private readonly treasury: TreasuryAccount;
  private readonly guard = new ReentrancyGuard();
  private readonly sink: NotificationSink;
  private readonly transfer: TransferPort;
  private readonly clock: LogicalClock;

  /** Read-only intent queries */
  readonly intents: IntentQueries;

  /** Read-only execution queries */
  readonly executions: ExecutionQueries;

  readonly analytics: RegistryAnalytics;
  readonly policy: AccessPolicy;

  constructor(options: RegistryOptions, deps: RegistryDeps) {
    const minAmount = options.minAmount ?? 1n;
    const maxAmount = options.maxAmount ?? MAX_UINT256;
    checkBounds(minAmount, maxAmount);

    this._config = {
      owner: checkRoleAddress("Owner", options.owner),
      controller: checkRoleAddress("Controller", options.controller),
      keeper: checkRoleAddress("Keeper", options.keeper),
      paused: options.paused ?? false,
      feeBps: checkFee(options.feeBps ?? 0),
      minAmount,
      maxAmount,
    };

    this.store = new IntentStore(options.maxIntents ?? MAX_INTENTS);
    this.ledger = new ExecutionLedger(this.store);
    this.treasury = new TreasuryAccount();
    this.sink = deps.sink;
    this.transfer = deps.transfer;
    this.clock = deps.clock ?? new SequenceClock();

    this.intents = this.store;
    this.executions = this.ledger;
    this.analytics = new RegistryAnalytics(this.store, this.ledger);
    this.policy = new AccessPolicy(() => this._config, this.store);
  }

  // ───────────────────────────────────────────────────────────────────────
  // State
  // ───────────────────────────────────────────────────────────────────────

  get config(): RegistryConfig {
    return this._config;
  }

  get treasuryBalance(): bigint {
    return this.treasury.balance;
  }

  get maxIntents(): number {
    return this.store.capacity;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Intents
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Submit one intent as the controller. The fee paid goes to the treasury.
   * Returns the new intent id.
   */
  submit(caller: Address, input: IntentInput, feePaid: bigint): number {
    this.requireController(caller);
    this.requireActive();

    const count = this.store.count;
    const balance = this.treasury.balance;
    const intent = this.store.submit(input, caller, feePaid, this._config, this.clock);
    this.treasury.deposit(feePaid);

    this.publish(
      [submitted(intent), ...feeCollected(feePaid, intent.submitter, intent.createdAt)],
      () => {
        this.store.truncate(count);
        this.treasury.rollbackTo(balance);
      },
    );

    return intent.id;
  }

  /**
   * Submit several intents at once. Either every entry is stored or none
   * is. Returns the new ids in entry order.
   */
  submitBatch(
    caller: Address,
    entries: readonly IntentInput[],
    totalFeePaid: bigint,
  ): readonly number[] {
    this.requireController(caller);
    this.requireActive();

    const count = this.store.count;
    const balance = this.treasury.balance;
    const created = this.store.submitBatch(
      entries,
      caller,
      totalFeePaid,
      this._config,
      this.clock,
    );
    this.treasury.deposit(totalFeePaid);

    const first = created[0];
    this.publish(
      [
        ...created.map(submitted),
        ...(first === undefined
          ? []
          : feeCollected(totalFeePaid, first.submitter, first.createdAt)),
      ],
      () => {
        this.store.truncate(count);
        this.treasury.rollbackTo(balance);
      },
    );

    return created.map((intent) => intent.id);
  }

  /**
   * Execute a pending intent as the keeper.
   */
  execute(
    caller: Address,
    intentId: number,
    executedAmount: bigint,
    avgPrice: bigint,
  ): ExecutionRecord {
    return this.guard.run("execute", () => {
      this.requireKeeper(caller);
      this.requireActive();

      const previous = this.store.get(intentId);
      const { execution } = this.ledger.execute(
        intentId,
        executedAmount,
        avgPrice,
        caller,
        this.clock,
      );

      this.publish(
        [
          {
            type: "IntentExecuted",
            intentId,
            executor: execution.executor,
            executedAmount: execution.executedAmount,
            avgPrice: execution.avgPrice,
            seq: execution.createdAt,
          },
        ],
        () => this.ledger.revert(previous),
      );

      return execution;
    });
  }

  /**
   * Cancel a pending intent as its submitter or the owner. Allowed while
   * paused.
   */
  cancel(caller: Address, intentId: number): IntentRecord {
    const previous = this.store.get(intentId);
    const cancelled = this.store.cancel(intentId, caller, this._config.owner);

    this.publish(
      [{ type: "IntentCancelled", intentId, by: normalizeAddress(caller), seq: this.clock.now() }],
      () => this.store.restore(previous),
    );

    return cancelled;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Treasury
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Anyone may top up the treasury. Returns the new balance.
   */
  topUpTreasury(from: Address, amount: bigint): bigint {
    if (!isAddress(from)) {
      throw new RegistryError("INVALID_ADDRESS", `'${String(from)}' is not a valid address`);
    }
    if (amount <= 0n) {
      throw new RegistryError("ZERO_AMOUNT", "Top-up amount must be greater than zero");
    }
    const before = this.treasury.balance;
    const balance = this.treasury.deposit(amount);
    this.publish(
      [{ type: "TreasuryTopped", amount, from: normalizeAddress(from), seq: this.clock.now() }],
      () => this.treasury.rollbackTo(before),
    );
    return balance;
  }

  /**
   * Pay out of the treasury as the owner. Returns the new balance.
   */
  withdraw(caller: Address, to: Address, amount: bigint): bigint {
    return this.guard.run("withdraw", () => {
      const balance = this.treasury.withdraw(
        to,
        amount,
        caller,
        this._config.owner,
        this.transfer,
      );
      // The transfer has gone out; the debit stands
      this.publish(
        [{ type: "TreasuryWithdrawn", to: normalizeAddress(to), amount, seq: this.clock.now() }],
        () => undefined,
      );
      return balance;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Configuration (owner only)
  // ───────────────────────────────────────────────────────────────────────

  setController(caller: Address, controller: Address): void {
    this.requireOwner(caller);
    const next = checkRoleAddress("Controller", controller);
    const before = this._config;
    this._config = { ...before, controller: next };
    this.publish(
      [{ type: "ControllerChanged", previous: before.controller, next, seq: this.clock.now() }],
      () => this.restoreConfig(before),
    );
  }

  setKeeper(caller: Address, keeper: Address): void {
    this.requireOwner(caller);
    const next = checkRoleAddress("Keeper", keeper);
    const before = this._config;
    this._config = { ...before, keeper: next };
    this.publish(
      [{ type: "KeeperChanged", previous: before.keeper, next, seq: this.clock.now() }],
      () => this.restoreConfig(before),
    );
  }

  /**
   * Change the inclusive amount bounds. Existing intents are unaffected.
   */
  setBounds(caller: Address, minAmount: bigint, maxAmount: bigint): void {
    this.requireOwner(caller);
    checkBounds(minAmount, maxAmount);
    const before = this._config;
    this._config = { ...before, minAmount, maxAmount };
    this.publish(
      [{ type: "BoundsChanged", minAmount, maxAmount, seq: this.clock.now() }],
      () => this.restoreConfig(before),
    );
  }

  setFeeBps(caller: Address, feeBps: number): void {
    this.requireOwner(caller);
    const next = checkFee(feeBps);
    const before = this._config;
    this._config = { ...before, feeBps: next };
    this.publish(
      [{ type: "FeeChanged", previous: before.feeBps, next, seq: this.clock.now() }],
      () => this.restoreConfig(before),
    );
  }

  setPaused(caller: Address, paused: boolean): void {
    this.requireOwner(caller);
    const before = this._config;
    this._config = { ...before, paused };
    this.publish(
      [{ type: "Paused", paused, seq: this.clock.now() }],
      () => this.restoreConfig(before),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (Persistence)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Copy of the full registry state. Amounts stay bigints; use
   * snapshotToJson() for a JSON-safe form.
   * Can be restored with Registry.fromSnapshot().
   */
  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      config: this._config,
      maxIntents: this.store.capacity,
      treasuryBalance: this.treasury.balance,
      intents: this.store.exportIntents(),
      executions: this.ledger.exportExecutions(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild a registry from a snapshot. Nothing is published.
   *
   * Without a clock in `deps`, a SequenceClock continues after the
   * highest marker found in the snapshot.
   */
  static fromSnapshot(snapshot: RegistrySnapshot, deps: RegistryDeps): Registry {
    if (snapshot.version !== 1) {
      throw new RegistryError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version ${String(snapshot.version)}`,
      );
    }
    if (snapshot.treasuryBalance < 0n) {
      throw new RegistryError("INVALID_SNAPSHOT", "Treasury balance must not be negative");
    }

    const { config } = snapshot;
    let registry: Registry;
    try {
      registry = new Registry(
        { ...config, maxIntents: snapshot.maxIntents },
        { ...deps, clock: deps.clock ?? new SequenceClock(highestMarker(snapshot)) },
      );
    } catch (err) {
      if (err instanceof RegistryError) {
        throw new RegistryError("INVALID_SNAPSHOT", `Snapshot config rejected: ${err.message}`);
      }
      throw err;
    }

    registry.store.importIntents(snapshot.intents);
    registry.ledger.importExecutions(snapshot.executions);
    registry.treasury.deposit(snapshot.treasuryBalance);
    return registry;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireController(caller: Address): void {
    if (!sameAddress(caller, this._config.controller)) {
      throw new RegistryError("NOT_CONTROLLER", `${caller} is not the controller`);
    }
  }

  private requireKeeper(caller: Address): void {
    if (!sameAddress(caller, this._config.keeper)) {
      throw new RegistryError("NOT_KEEPER", `${caller} is not the keeper`);
    }
  }

  private requireOwner(caller: Address): void {
    if (!sameAddress(caller, this._config.owner)) {
      throw new RegistryError("NOT_OWNER", `${caller} is not the owner`);
    }
  }

  private requireActive(): void {
    if (this._config.paused) {
      throw new RegistryError("PAUSED", "Registry is paused");
    }
  }

  private restoreConfig(config: RegistryConfig): void {
    this._config = config;
  }

  /**
   * Publish the notifications of a change that is already applied. If
   * the sink throws, `undo` reverts the change and the error propagates.
   */
  private publish(notifications: readonly RegistryNotification[], undo: () => void): void {
    try {
      for (const notification of notifications) {
        this.sink.publish(notification);
      }
    } catch (err) {
      undo();
      throw err;
    }
  }
}

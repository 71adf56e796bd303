/**
 * TreasuryAccount — the registry's fee balance.
 *
 * Rules:
 * - The balance never goes negative
 * - Deposits are unconditional
 * - A withdrawal debits first, then transfers; a failed or throwing
 *   transfer restores the balance and surfaces as TRANSFER_FAILED
 */

import type { Address } from "@intent-registry/types";
import { isAddress, isZeroAddress, sameAddress } from "@intent-registry/types";
import { RegistryError } from "./errors.js";
import type { TransferPort, TransferResult } from "./transfer.js";

export class TreasuryAccount {
  private _balance: bigint;

  constructor(initialBalance: bigint = 0n) {
    if (initialBalance < 0n) {
      throw new RegistryError("INVALID_SNAPSHOT", "Treasury balance must not be negative");
    }
    this._balance = initialBalance;
  }

  get balance(): bigint {
    return this._balance;
  }

  deposit(amount: bigint): bigint {
    if (amount < 0n) {
      throw new RegistryError("ZERO_AMOUNT", "Deposit must not be negative");
    }
    this._balance += amount;
    return this._balance;
  }

  /**
   * Pay `amount` out to `to`. Only the owner may withdraw.
   *
   * Checks, in order: caller is owner, well-formed non-null payee,
   * non-zero amount, sufficient balance. Returns the balance after the withdrawal.
   */
  withdraw(
    to: Address,
    amount: bigint,
    caller: Address,
    owner: Address,
    transfer: TransferPort,
  ): bigint {
    if (!sameAddress(caller, owner)) {
      throw new RegistryError("UNAUTHORIZED", `${caller} may not withdraw from the treasury`);
    }
    if (!isAddress(to)) {
      throw new RegistryError("INVALID_ADDRESS", `'${String(to)}' is not a valid address`);
    }
    if (isZeroAddress(to)) {
      throw new RegistryError("ZERO_ADDRESS", "Withdrawal target must not be the null address");
    }
    if (amount <= 0n) {
      throw new RegistryError("ZERO_AMOUNT", "Withdrawal amount must be greater than zero");
    }
    if (amount > this._balance) {
      throw new RegistryError(
        "TRANSFER_FAILED",
        `Withdrawal of ${amount} exceeds treasury balance ${this._balance}`,
      );
    }

    this._balance -= amount;

    let result: TransferResult;
    try {
      result = transfer.transfer(to, amount);
    } catch (err) {
      this._balance += amount;
      if (err instanceof RegistryError) throw err;
      throw new RegistryError("TRANSFER_FAILED", `Transfer to ${to} failed: ${String(err)}`);
    }
    if (!result.ok) {
      this._balance += amount;
      throw new RegistryError("TRANSFER_FAILED", `Transfer to ${to} failed: ${result.reason}`);
    }

    return this._balance;
  }

  /**
   * Put the balance back to a value read earlier in the same mutation.
   */
  rollbackTo(balance: bigint): void {
    this._balance = balance;
  }
}

/**
 * Transfer primitive used by treasury withdrawals.
 *
 * Synchronous: a withdrawal either completes within the call or is
 * rolled back. Implementations report failure through the result; a
 * thrown error is also treated as a failed transfer.
 */

import type { Address } from "@intent-registry/types";

export type TransferResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

export interface TransferPort {
  transfer(to: Address, amount: bigint): TransferResult;
}

export interface TransferRecord {
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * Records every transfer it is asked to make and always succeeds.
 */
export class RecordingTransferPort implements TransferPort {
  private readonly _transfers: TransferRecord[] = [];

  transfer(to: Address, amount: bigint): TransferResult {
    this._transfers.push({ to, amount });
    return { ok: true };
  }

  get transfers(): readonly TransferRecord[] {
    return [...this._transfers];
  }

  get totalTransferred(): bigint {
    return this._transfers.reduce((sum, t) => sum + t.amount, 0n);
  }
}

/**
 * Shared test fixtures for the registry package.
 */

import type { Address, IntentInput, SymbolHash } from "@intent-registry/types";
import { SIDE_BUY, SIDE_SELL } from "@intent-registry/types";
import type { LogicalClock } from "../src/clock.js";
import { CollectingSink } from "../src/notifications.js";
import { Registry } from "../src/registry.js";
import { RecordingTransferPort } from "../src/transfer.js";
import type { TransferPort } from "../src/transfer.js";
import type { RegistryOptions } from "../src/types.js";

export const OWNER: Address = "0x1111111111111111111111111111111111111111";
export const CONTROLLER: Address = "0x2222222222222222222222222222222222222222";
export const KEEPER: Address = "0x3333333333333333333333333333333333333333";
export const STRANGER: Address = "0x4444444444444444444444444444444444444444";
export const PAYEE: Address = "0x5555555555555555555555555555555555555555";
export const MIXED_CASE: Address = "0xAbCdEf0123456789AbCdEf0123456789AbCdEf01";

export const SYMBOL_A: SymbolHash = `0x${"aa".repeat(32)}`;
export const SYMBOL_B: SymbolHash = `0x${"bb".repeat(32)}`;

export function buy(amount: bigint, symbol: SymbolHash = SYMBOL_A, limitPrice = 100n): IntentInput {
  return { side: SIDE_BUY, amount, limitPrice, symbol };
}

export function sell(amount: bigint, symbol: SymbolHash = SYMBOL_A, limitPrice = 100n): IntentInput {
  return { side: SIDE_SELL, amount, limitPrice, symbol };
}

export interface TestRegistry {
  readonly registry: Registry;
  readonly sink: CollectingSink;
  readonly transfer: RecordingTransferPort;
}

export function createRegistry(
  options: Partial<RegistryOptions> = {},
  clock?: LogicalClock,
  transfer?: TransferPort,
): TestRegistry {
  const sink = new CollectingSink();
  const recording = new RecordingTransferPort();
  const registry = new Registry(
    { owner: OWNER, controller: CONTROLLER, keeper: KEEPER, ...options },
    { sink, transfer: transfer ?? recording, clock },
  );
  return { registry, sink, transfer: recording };
}

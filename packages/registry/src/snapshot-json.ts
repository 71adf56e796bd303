/**
 * JSON form of a registry snapshot.
 *
 * Amounts, prices and the balance travel as decimal strings, the same
 * way the HTTP views render them. Everything else keeps its shape.
 */

import type { ExecutionRecord, IntentRecord, RegistryConfig } from "@intent-registry/types";
import { RegistryError } from "./errors.js";
import type { RegistrySnapshot } from "./types.js";

type WithStringAmounts<T> = {
  readonly [K in keyof T]: T[K] extends bigint ? string : T[K];
};

export type IntentRecordJson = WithStringAmounts<IntentRecord>;
export type ExecutionRecordJson = WithStringAmounts<ExecutionRecord>;
export type RegistryConfigJson = WithStringAmounts<RegistryConfig>;

export interface RegistrySnapshotJson {
  readonly version: 1;
  readonly config: RegistryConfigJson;
  readonly maxIntents: number;
  readonly treasuryBalance: string;
  readonly intents: readonly IntentRecordJson[];
  readonly executions: readonly ExecutionRecordJson[];
  readonly createdAt: string;
}

export function snapshotToJson(snapshot: RegistrySnapshot): RegistrySnapshotJson {
  const { config } = snapshot;
  return {
    version: snapshot.version,
    config: {
      ...config,
      minAmount: config.minAmount.toString(),
      maxAmount: config.maxAmount.toString(),
    },
    maxIntents: snapshot.maxIntents,
    treasuryBalance: snapshot.treasuryBalance.toString(),
    intents: snapshot.intents.map((intent) => ({
      ...intent,
      amount: intent.amount.toString(),
      limitPrice: intent.limitPrice.toString(),
      executedAmount: intent.executedAmount.toString(),
    })),
    executions: snapshot.executions.map((execution) => ({
      ...execution,
      executedAmount: execution.executedAmount.toString(),
      avgPrice: execution.avgPrice.toString(),
    })),
    createdAt: snapshot.createdAt,
  };
}

/**
 * Turn the JSON form back into a snapshot for Registry.fromSnapshot().
 * Records are checked again when the snapshot is restored.
 *
 * @throws {RegistryError} INVALID_SNAPSHOT when an amount is not a
 *   non-negative decimal integer
 */
export function snapshotFromJson(json: RegistrySnapshotJson): RegistrySnapshot {
  const { config } = json;
  return {
    version: json.version,
    config: {
      ...config,
      minAmount: toAmount(config.minAmount, "config.minAmount"),
      maxAmount: toAmount(config.maxAmount, "config.maxAmount"),
    },
    maxIntents: json.maxIntents,
    treasuryBalance: toAmount(json.treasuryBalance, "treasuryBalance"),
    intents: json.intents.map((intent, i) => ({
      ...intent,
      amount: toAmount(intent.amount, `intents[${i}].amount`),
      limitPrice: toAmount(intent.limitPrice, `intents[${i}].limitPrice`),
      executedAmount: toAmount(intent.executedAmount, `intents[${i}].executedAmount`),
    })),
    executions: json.executions.map((execution, i) => ({
      ...execution,
      executedAmount: toAmount(execution.executedAmount, `executions[${i}].executedAmount`),
      avgPrice: toAmount(execution.avgPrice, `executions[${i}].avgPrice`),
    })),
    createdAt: json.createdAt,
  };
}

function toAmount(value: string, field: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new RegistryError("INVALID_SNAPSHOT", `${field} must be a decimal integer, got "${value}"`);
  }
  return BigInt(value);
}

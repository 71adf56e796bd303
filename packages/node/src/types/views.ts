/**
 * Response views.
 *
 * JSON has no bigint, so amounts, prices and balances are rendered as
 * decimal strings. Everything else passes through unchanged.
 */

import type {
  Address,
  ExecutionRecord,
  IntentRecord,
  IntentState,
  RegistryConfig,
  SymbolHash,
} from "@intent-registry/types";
import { intentState } from "@intent-registry/types";
import type { RegistrySummary, SideBreakdown } from "@intent-registry/registry";

// =============================================================================
// View Types
// =============================================================================

export interface IntentView {
  readonly id: number;
  readonly submitter: Address;
  readonly side: number;
  readonly amount: string;
  readonly limitPrice: string;
  readonly symbol: SymbolHash;
  readonly createdAt: number;
  readonly executedAmount: string;
  readonly executed: boolean;
  readonly cancelled: boolean;
  readonly state: IntentState;
}

export interface ExecutionView {
  readonly intentId: number;
  readonly executor: Address;
  readonly executedAmount: string;
  readonly avgPrice: string;
  readonly createdAt: number;
}

export interface ConfigView {
  readonly owner: Address;
  readonly controller: Address;
  readonly keeper: Address;
  readonly paused: boolean;
  readonly feeBps: number;
  readonly minAmount: string;
  readonly maxAmount: string;
}

export interface SummaryView {
  readonly totalIntents: number;
  readonly pending: number;
  readonly executed: number;
  readonly cancelled: number;
  readonly executions: number;
  readonly totalVolume: string;
  readonly executedVolume: string;
  readonly volumeBySide: SideBreakdown<string>;
  readonly countBySide: SideBreakdown<number>;
  readonly fillRateBps: number;
  readonly cancellationRateBps: number;
  readonly executionRateBps: number;
}

// =============================================================================
// Converters
// =============================================================================

export function toIntentView(intent: IntentRecord): IntentView {
  return {
    id: intent.id,
    submitter: intent.submitter,
    side: intent.side,
    amount: intent.amount.toString(),
    limitPrice: intent.limitPrice.toString(),
    symbol: intent.symbol,
    createdAt: intent.createdAt,
    executedAmount: intent.executedAmount.toString(),
    executed: intent.executed,
    cancelled: intent.cancelled,
    state: intentState(intent),
  };
}

export function toExecutionView(execution: ExecutionRecord): ExecutionView {
  return {
    intentId: execution.intentId,
    executor: execution.executor,
    executedAmount: execution.executedAmount.toString(),
    avgPrice: execution.avgPrice.toString(),
    createdAt: execution.createdAt,
  };
}

export function toConfigView(config: RegistryConfig): ConfigView {
  return {
    owner: config.owner,
    controller: config.controller,
    keeper: config.keeper,
    paused: config.paused,
    feeBps: config.feeBps,
    minAmount: config.minAmount.toString(),
    maxAmount: config.maxAmount.toString(),
  };
}

export function toSummaryView(summary: RegistrySummary): SummaryView {
  return {
    ...summary,
    totalVolume: summary.totalVolume.toString(),
    executedVolume: summary.executedVolume.toString(),
    volumeBySide: {
      buy: summary.volumeBySide.buy.toString(),
      sell: summary.volumeBySide.sell.toString(),
    },
  };
}

/**
 * AccessPolicy — role predicates over the current config and intent state.
 *
 * Stateless: every answer is a pure function of the config snapshot and
 * the intent record at the moment of the call. Used by the registry for
 * its own checks and exposed as read-only queries.
 */

import type { Address, IntentRecord, RegistryConfig } from "@intent-registry/types";
import { sameAddress } from "@intent-registry/types";

/**
 * Whether `caller` may cancel `intent`: the submitter or the owner.
 */
export function isCancelAuthorized(
  intent: IntentRecord,
  caller: Address,
  owner: Address,
): boolean {
  return sameAddress(caller, intent.submitter) || sameAddress(caller, owner);
}

export interface IntentLookup {
  find(intentId: number): IntentRecord | undefined;
}

export class AccessPolicy {
  private readonly config: () => RegistryConfig;
  private readonly intents: IntentLookup;

  constructor(config: () => RegistryConfig, intents: IntentLookup) {
    this.config = config;
    this.intents = intents;
  }

  isOwner(address: Address): boolean {
    return sameAddress(address, this.config().owner);
  }

  isController(address: Address): boolean {
    return sameAddress(address, this.config().controller);
  }

  isKeeper(address: Address): boolean {
    return sameAddress(address, this.config().keeper);
  }

  /**
   * True when the intent exists, is still pending, and `caller` is its
   * submitter or the owner. The pause gate does not apply to cancellation.
   */
  canCancel(intentId: number, caller: Address): boolean {
    const intent = this.intents.find(intentId);
    if (intent === undefined || intent.executed || intent.cancelled) {
      return false;
    }
    return isCancelAuthorized(intent, caller, this.config().owner);
  }

  /**
   * True when the intent exists, is still pending, and the registry is
   * not paused.
   */
  canExecute(intentId: number): boolean {
    const intent = this.intents.find(intentId);
    if (intent === undefined || intent.executed || intent.cancelled) {
      return false;
    }
    return !this.config().paused;
  }
}

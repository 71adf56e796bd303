/**
 * Per-operation reentrancy guard.
 *
 * An operation holds its flag for the whole call, including any
 * external transfer and notification dispatch. A nested call into the
 * same operation fails instead of running. The flag is released on
 * every exit path.
 */

import { RegistryError } from "./errors.js";

export class ReentrancyGuard {
  private readonly _active = new Set<string>();

  run<T>(operation: string, fn: () => T): T {
    if (this._active.has(operation)) {
      throw new RegistryError(
        "REENTRANT_CALL",
        `Re-entrant call into '${operation}' rejected`,
      );
    }

    this._active.add(operation);
    try {
      return fn();
    } finally {
      this._active.delete(operation);
    }
  }

  isActive(operation: string): boolean {
    return this._active.has(operation);
  }
}

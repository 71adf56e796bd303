/**
 * Identity Types
 *
 * Callers, submitters, keepers, controllers and the owner are all
 * identified by a 20-byte hex address. Symbols are identified by a
 * fixed-size 32-byte hash.
 *
 * Addresses compare case-insensitively; the registry stores them lowercase.
 */

/** A `0x`-prefixed 20-byte hex identity. */
export type Address = `0x${string}`;

/** A `0x`-prefixed 32-byte hex symbol identifier. */
export type SymbolHash = `0x${string}`;

/** The null identity. Never a valid owner, controller, keeper or payee. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const SYMBOL_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isSymbolHash(value: unknown): value is SymbolHash {
  return typeof value === "string" && SYMBOL_PATTERN.test(value);
}

/**
 * Lowercase an address so it can be used as a map key or compared with `===`.
 */
export function normalizeAddress(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

export function normalizeSymbol(symbol: SymbolHash): SymbolHash {
  return `0x${symbol.slice(2).toLowerCase()}`;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(address: Address): boolean {
  return sameAddress(address, ZERO_ADDRESS);
}

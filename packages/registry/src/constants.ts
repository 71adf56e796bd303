/**
 * Constants exposed to integrators.
 */

export { SIDE_BUY, SIDE_SELL } from "@intent-registry/types";

/** Basis-point denominator for fee rates. */
export const FEE_DENOMINATOR = 10_000;

/** Hard cap on the number of intents a registry will ever hold. */
export const MAX_INTENTS = 10_000;

/** Maximum number of ids accepted by a bulk fetch. */
export const MAX_BULK_QUERY = 200;

/** Largest unsigned 256-bit value; the default upper amount bound. */
export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * Index slicing shared by the intent store and execution ledger.
 */

/**
 * Inclusive index range over an ordered index.
 *
 * `to` is clamped to the last valid index. Empty when `from` is out of
 * range or `from > to`.
 */
export function sliceRange(
  order: readonly number[],
  from: number,
  to: number,
): readonly number[] {
  if (!Number.isInteger(from) || !Number.isInteger(to)) return [];
  if (from < 0 || from >= order.length || from > to) return [];
  const last = Math.min(to, order.length - 1);
  return order.slice(from, last + 1);
}

/**
 * The last `n` entries, newest first. `n` is clamped to the index size;
 * a non-finite `n` counts as 0.
 */
export function lastN(order: readonly number[], n: number): readonly number[] {
  if (!Number.isFinite(n)) return [];
  const count = Math.min(Math.max(Math.trunc(n), 0), order.length);
  if (count === 0) return [];
  return order.slice(order.length - count).reverse();
}

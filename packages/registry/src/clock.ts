/**
 * Logical clocks.
 *
 * A logical clock stands in for "block height": it is read once per
 * committed mutation and the value becomes that mutation's sequence
 * marker. Markers are positive safe integers; 0 means "absent".
 */

export interface LogicalClock {
  now(): number;
}

/**
 * Every read is a new transaction: yields 1, 2, 3, ...
 */
export class SequenceClock implements LogicalClock {
  private _last: number;

  constructor(start = 0) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`SequenceClock start must be a non-negative integer, got ${start}`);
    }
    this._last = start;
  }

  now(): number {
    this._last += 1;
    return this._last;
  }

  /** The last value handed out, without advancing. */
  peek(): number {
    return this._last;
  }
}

/**
 * A clock whose value only changes when told to. Several transactions
 * may share a marker, like several calls mined in one block.
 */
export class ManualClock implements LogicalClock {
  private _value: number;

  constructor(initial = 1) {
    this._value = ManualClock.check(initial);
  }

  now(): number {
    return this._value;
  }

  set(value: number): void {
    const next = ManualClock.check(value);
    if (next < this._value) {
      throw new RangeError(`ManualClock cannot move backwards (${this._value} → ${next})`);
    }
    this._value = next;
  }

  advance(by = 1): number {
    this.set(this._value + by);
    return this._value;
  }

  private static check(value: number): number {
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new RangeError(`Clock value must be a positive integer, got ${value}`);
    }
    return value;
  }
}

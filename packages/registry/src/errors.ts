/**
 * Registry errors.
 *
 * Every failure surfaces synchronously as a RegistryError carrying a
 * stable code and a category. Mutations that throw leave no partial
 * state behind.
 */

export type RegistryErrorCode =
  // validation
  | "INVALID_SIDE"
  | "ZERO_AMOUNT"
  | "AMOUNT_OUT_OF_BOUNDS"
  | "INVALID_PRICE"
  | "INVALID_SYMBOL"
  | "INVALID_ADDRESS"
  | "ZERO_ADDRESS"
  | "INVALID_FEE"
  | "BOUNDS_INVALID"
  | "INVALID_SNAPSHOT"
  // state
  | "NOT_FOUND"
  | "ALREADY_EXECUTED"
  | "ALREADY_CANCELLED"
  | "PAUSED"
  | "REENTRANT_CALL"
  // authorization
  | "UNAUTHORIZED"
  | "NOT_CONTROLLER"
  | "NOT_KEEPER"
  | "NOT_OWNER"
  // capacity
  | "CAPACITY_EXCEEDED"
  // funds
  | "INSUFFICIENT_FEE"
  | "TRANSFER_FAILED";

export type RegistryErrorCategory =
  | "validation"
  | "state"
  | "authorization"
  | "capacity"
  | "funds";

const CATEGORIES: Record<RegistryErrorCode, RegistryErrorCategory> = {
  INVALID_SIDE: "validation",
  ZERO_AMOUNT: "validation",
  AMOUNT_OUT_OF_BOUNDS: "validation",
  INVALID_PRICE: "validation",
  INVALID_SYMBOL: "validation",
  INVALID_ADDRESS: "validation",
  ZERO_ADDRESS: "validation",
  INVALID_FEE: "validation",
  BOUNDS_INVALID: "validation",
  INVALID_SNAPSHOT: "validation",
  NOT_FOUND: "state",
  ALREADY_EXECUTED: "state",
  ALREADY_CANCELLED: "state",
  PAUSED: "state",
  REENTRANT_CALL: "state",
  UNAUTHORIZED: "authorization",
  NOT_CONTROLLER: "authorization",
  NOT_KEEPER: "authorization",
  NOT_OWNER: "authorization",
  CAPACITY_EXCEEDED: "capacity",
  INSUFFICIENT_FEE: "funds",
  TRANSFER_FAILED: "funds",
};

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly category: RegistryErrorCategory;

  /**
   * The category defaults to the code's usual one. An oversized bulk
   * query reuses BOUNDS_INVALID under the "capacity" category.
   */
  constructor(
    code: RegistryErrorCode,
    message: string,
    category: RegistryErrorCategory = CATEGORIES[code],
  ) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.category = category;
  }
}

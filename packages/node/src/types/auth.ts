/**
 * Authentication types.
 *
 * Every request acts on behalf of a caller address. The registry itself
 * decides what that address may do (owner, controller, keeper); the
 * HTTP layer only establishes who is calling.
 */

import type { Address } from "@intent-registry/types";

/** How the caller identity was established. */
export type AuthType = "api-key" | "header" | "anonymous";

export interface AuthContext {
  readonly type: AuthType;

  /** Address the request acts as */
  readonly caller: Address;

  /** The API key used, when `type` is "api-key" */
  readonly keyId?: string | undefined;
}

/** A configured API key bound to a caller address. */
export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}

import type { PublicKey } from "@solana/web3.js";
import type { AccountStore } from "./account_store.js";

export type PermissionCheck = {
  store: AccountStore;
  router: PublicKey;
  permission: PublicKey;
  order: PublicKey;
  taker: PublicKey;
  pdaAuthority: PublicKey;
};

export type PermissionGrant = {
  accepted: boolean;
  /** Fees the router already moved to the pda authority; credited as the fill's tip. */
  fees: bigint;
};

/**
 * Auction / priority-fee router that authorizes permissioned fills.
 */
export interface PermissionRouter {
  checkPermission(check: PermissionCheck): PermissionGrant;
}

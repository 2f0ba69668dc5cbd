import { blob, struct, u16, u8 } from "@solana/buffer-layout";
import { publicKey, u64 } from "@solana/buffer-layout-utils";
import type { PublicKey } from "@solana/web3.js";
import { DISCRIMINATORS } from "../idl/coder.js";
import { fail } from "../errors.js";

export type GlobalConfigRecord = {
  emergencyMode: number;
  flashTakeOrderBlocked: number;
  newOrdersBlocked: number;
  ordersTakingBlocked: number;
  hostFeeBps: number;
  padding0: Uint8Array;
  orderCloseDelaySeconds: bigint;
  padding1: Uint8Array;

  pdaAuthorityPreviousLamportsBalance: bigint;
  totalTipAmount: bigint;
  hostTipAmount: bigint;

  pdaAuthority: PublicKey;
  pdaAuthorityBump: bigint;
  adminAuthority: PublicKey;
  adminAuthorityCached: PublicKey;

  txnFeeCost: bigint;
  ataCreationCost: bigint;
  padding2: Uint8Array;
};

export const GlobalConfigLayout = struct<GlobalConfigRecord>([
  u8("emergencyMode"),
  u8("flashTakeOrderBlocked"),
  u8("newOrdersBlocked"),
  u8("ordersTakingBlocked"),
  u16("hostFeeBps"),
  blob(2, "padding0"),
  u64("orderCloseDelaySeconds"),
  blob(9 * 8, "padding1"),
  u64("pdaAuthorityPreviousLamportsBalance"),
  u64("totalTipAmount"),
  u64("hostTipAmount"),
  publicKey("pdaAuthority"),
  u64("pdaAuthorityBump"),
  publicKey("adminAuthority"),
  publicKey("adminAuthorityCached"),
  u64("txnFeeCost"),
  u64("ataCreationCost"),
  blob(241 * 8, "padding2"),
]);

/** Discriminator + record, 2168 bytes. */
export const GLOBAL_CONFIG_SIZE = 8 + GlobalConfigLayout.span;

export function emptyGlobalConfig(): GlobalConfigRecord {
  return GlobalConfigLayout.decode(Buffer.alloc(GlobalConfigLayout.span));
}

export function decodeGlobalConfig(data: Buffer): GlobalConfigRecord {
  if (data.length < GLOBAL_CONFIG_SIZE) fail("InvalidAccount", "global_config_data_too_short");
  if (!data.subarray(0, 8).equals(DISCRIMINATORS.GlobalConfig)) fail("InvalidAccount", "global_config_discriminator_mismatch");
  return GlobalConfigLayout.decode(data, 8);
}

export function encodeGlobalConfig(config: GlobalConfigRecord): Buffer {
  const data = Buffer.alloc(GLOBAL_CONFIG_SIZE);
  DISCRIMINATORS.GlobalConfig.copy(data, 0);
  GlobalConfigLayout.encode(config, data, 8);
  return data;
}

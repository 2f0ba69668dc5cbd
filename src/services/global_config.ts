import { PublicKey } from "@solana/web3.js";
import type { GlobalConfigRecord } from "../state/global_config.js";
import { ensure, fail } from "../errors.js";

export const UPDATE_VALUE_SIZE = 128;
export const MAX_HOST_FEE_BPS = 10_000;

export const UpdateGlobalConfigMode = {
  UpdateEmergencyMode: 0,
  UpdateFlashTakeOrderBlocked: 1,
  UpdateBlockNewOrders: 2,
  UpdateBlockOrderTaking: 3,
  UpdateHostFeeBps: 4,
  UpdateAdminAuthorityCached: 5,
  UpdateOrderTakingPermissionless: 6,
  UpdateOrderCloseDelaySeconds: 7,
  UpdateTxnFeeCost: 8,
  UpdateAtaCreationCost: 9,
} as const;
export type UpdateGlobalConfigMode = (typeof UpdateGlobalConfigMode)[keyof typeof UpdateGlobalConfigMode];

export type GlobalConfigValue =
  | { kind: "flag"; value: boolean }
  | { kind: "u16"; value: number }
  | { kind: "u64"; value: bigint }
  | { kind: "pubkey"; value: PublicKey };

/**
 * Pack a typed value into the fixed 128-byte update payload (little-endian, zero-padded).
 */
export function encodeGlobalConfigValue(v: GlobalConfigValue): number[] {
  const out = Buffer.alloc(UPDATE_VALUE_SIZE);
  switch (v.kind) {
    case "flag":
      out.writeUInt8(v.value ? 1 : 0, 0);
      break;
    case "u16":
      out.writeUInt16LE(v.value, 0);
      break;
    case "u64":
      out.writeBigUInt64LE(v.value, 0);
      break;
    case "pubkey":
      v.value.toBuffer().copy(out, 0);
      break;
  }
  return [...out];
}

function readFlag(value: Buffer): number {
  const flag = value.readUInt8(0);
  ensure(flag === 0 || flag === 1, "InvalidFlag", `flag:${flag}`);
  return flag;
}

export type InitializeGlobalConfigParams = {
  adminAuthority: PublicKey;
  pdaAuthority: PublicKey;
  pdaAuthorityBump: number;
  pdaAuthorityLamports: bigint;
};

export function initializeGlobalConfig(config: GlobalConfigRecord, p: InitializeGlobalConfigParams): void {
  config.emergencyMode = 0;
  config.flashTakeOrderBlocked = 0;
  config.newOrdersBlocked = 0;
  config.ordersTakingBlocked = 0;
  config.hostFeeBps = 0;
  config.orderCloseDelaySeconds = 0n;

  config.adminAuthority = p.adminAuthority;
  config.adminAuthorityCached = p.adminAuthority;
  config.pdaAuthority = p.pdaAuthority;
  config.pdaAuthorityBump = BigInt(p.pdaAuthorityBump);

  config.totalTipAmount = 0n;
  config.hostTipAmount = 0n;
  config.pdaAuthorityPreviousLamportsBalance = p.pdaAuthorityLamports;

  config.txnFeeCost = 0n;
  config.ataCreationCost = 0n;
}

export function updateGlobalConfig(config: GlobalConfigRecord, mode: number, rawValue: readonly number[]): void {
  ensure(rawValue.length === UPDATE_VALUE_SIZE, "InvalidParameterType", `value_len:${rawValue.length}`);
  const value = Buffer.from(rawValue);

  switch (mode) {
    case UpdateGlobalConfigMode.UpdateEmergencyMode:
      config.emergencyMode = readFlag(value);
      return;
    case UpdateGlobalConfigMode.UpdateFlashTakeOrderBlocked:
      config.flashTakeOrderBlocked = readFlag(value);
      return;
    case UpdateGlobalConfigMode.UpdateBlockNewOrders:
      config.newOrdersBlocked = readFlag(value);
      return;
    case UpdateGlobalConfigMode.UpdateBlockOrderTaking:
      config.ordersTakingBlocked = readFlag(value);
      return;
    case UpdateGlobalConfigMode.UpdateHostFeeBps: {
      const bps = value.readUInt16LE(0);
      ensure(bps <= MAX_HOST_FEE_BPS, "InvalidHostFee", `bps:${bps}`);
      config.hostFeeBps = bps;
      return;
    }
    case UpdateGlobalConfigMode.UpdateAdminAuthorityCached:
      config.adminAuthorityCached = new PublicKey(value.subarray(0, 32));
      return;
    case UpdateGlobalConfigMode.UpdateOrderTakingPermissionless:
      // kept for wire compatibility; permissionless taking is per order now
      readFlag(value);
      return;
    case UpdateGlobalConfigMode.UpdateOrderCloseDelaySeconds:
      config.orderCloseDelaySeconds = value.readBigUInt64LE(0);
      return;
    case UpdateGlobalConfigMode.UpdateTxnFeeCost:
      config.txnFeeCost = value.readBigUInt64LE(0);
      return;
    case UpdateGlobalConfigMode.UpdateAtaCreationCost:
      config.ataCreationCost = value.readBigUInt64LE(0);
      return;
    default:
      fail("InvalidConfigOption", `update_global_config_mode:${mode}`);
  }
}

/**
 * Two-step admin rotation: the cached admin signs, then becomes the admin.
 */
export function updateGlobalConfigAdmin(config: GlobalConfigRecord, signer: PublicKey): void {
  ensure(signer.equals(config.adminAuthorityCached), "InvalidAdminAuthority", `signer:${signer.toBase58()}`);
  config.adminAuthority = config.adminAuthorityCached;
}

// kill-switches

export function ensureEmergencyModeDisabled(config: GlobalConfigRecord): void {
  ensure(config.emergencyMode === 0, "EmergencyModeEnabled");
}

export function ensureNewOrdersAllowed(config: GlobalConfigRecord): void {
  ensure(config.newOrdersBlocked === 0, "CreatingNewOrdersBlocked");
}

export function ensureOrderTakingAllowed(config: GlobalConfigRecord): void {
  ensure(config.ordersTakingBlocked === 0, "OrderTakingBlocked");
}

export function ensureFlashTakingAllowed(config: GlobalConfigRecord): void {
  ensure(config.flashTakeOrderBlocked === 0, "FlashTakeOrderBlocked");
}

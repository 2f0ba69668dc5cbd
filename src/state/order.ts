import { blob, struct, u8 } from "@solana/buffer-layout";
import { publicKey, u64 } from "@solana/buffer-layout-utils";
import { PublicKey } from "@solana/web3.js";
import { DISCRIMINATORS } from "../idl/coder.js";
import { fail } from "../errors.js";

export const OrderStatus = { Active: 0, Filled: 1, Cancelled: 2 } as const;
export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export const OrderType = { Vanilla: 0 } as const;
export type OrderType = (typeof OrderType)[keyof typeof OrderType];

export type OrderRecord = {
  globalConfig: PublicKey;
  maker: PublicKey;
  inputMint: PublicKey;
  inputMintProgramId: PublicKey;
  outputMint: PublicKey;
  outputMintProgramId: PublicKey;

  initialInputAmount: bigint;
  expectedOutputAmount: bigint;
  remainingInputAmount: bigint;
  filledOutputAmount: bigint;
  tipAmount: bigint;
  numberOfFills: bigint;

  orderType: number;
  status: number;
  inVaultBump: number;
  flashIxLock: number;
  permissionless: number;
  padding0: Uint8Array;

  lastUpdatedTimestamp: bigint;
  flashStartTakerOutputBalance: bigint;
  counterparty: PublicKey;
  padding: Uint8Array;
};

export const OrderLayout = struct<OrderRecord>([
  publicKey("globalConfig"),
  publicKey("maker"),
  publicKey("inputMint"),
  publicKey("inputMintProgramId"),
  publicKey("outputMint"),
  publicKey("outputMintProgramId"),
  u64("initialInputAmount"),
  u64("expectedOutputAmount"),
  u64("remainingInputAmount"),
  u64("filledOutputAmount"),
  u64("tipAmount"),
  u64("numberOfFills"),
  u8("orderType"),
  u8("status"),
  u8("inVaultBump"),
  u8("flashIxLock"),
  u8("permissionless"),
  blob(3, "padding0"),
  u64("lastUpdatedTimestamp"),
  u64("flashStartTakerOutputBalance"),
  publicKey("counterparty"),
  blob(120, "padding"),
]);

/** Discriminator + record, 424 bytes. */
export const ORDER_SIZE = 8 + OrderLayout.span;

export function isOrderTerminal(order: OrderRecord): boolean {
  return order.status === OrderStatus.Filled || order.status === OrderStatus.Cancelled;
}

export function hasCounterparty(order: OrderRecord): boolean {
  return !order.counterparty.equals(PublicKey.default);
}

/**
 * Record as it reads from a freshly allocated account: every field zero.
 */
export function emptyOrder(): OrderRecord {
  return OrderLayout.decode(Buffer.alloc(OrderLayout.span));
}

export function decodeOrder(data: Buffer): OrderRecord {
  if (data.length < ORDER_SIZE) fail("InvalidAccount", "order_data_too_short");
  if (!data.subarray(0, 8).equals(DISCRIMINATORS.Order)) fail("InvalidAccount", "order_discriminator_mismatch");
  return OrderLayout.decode(data, 8);
}

export function encodeOrder(order: OrderRecord): Buffer {
  const data = Buffer.alloc(ORDER_SIZE);
  DISCRIMINATORS.Order.copy(data, 0);
  OrderLayout.encode(order, data, 8);
  return data;
}

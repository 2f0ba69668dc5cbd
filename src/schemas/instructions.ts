import BN from "bn.js";
import { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { U64_MAX } from "../utils/math.js";

/**
 * Borsh-decoded values come back as BN / PublicKey / Buffer / number.
 * These schemas check them and convert u64s to bigint.
 */

const u64 = z
  .custom<BN>((v) => BN.isBN(v), "expected_u64")
  .transform((v) => BigInt(v.toString()))
  .refine((v) => v >= 0n && v <= U64_MAX, "u64_out_of_range");

const u8 = z.number().int().min(0).max(255);
const u16 = z.number().int().min(0).max(65_535);

const pubkey = z.custom<PublicKey>((v) => v instanceof PublicKey, "expected_pubkey");
const bytes = z.custom<Buffer>((v) => Buffer.isBuffer(v), "expected_bytes");

export const NoArgsZ = z.object({});

export const CreateOrderArgsZ = z.object({
  input_amount: u64,
  output_amount: u64,
  order_type: u8,
});
export type CreateOrderArgs = z.infer<typeof CreateOrderArgsZ>;

export const TakeOrderArgsZ = z.object({
  input_amount: u64,
  min_output_amount: u64,
  tip_amount_permissionless_taking: u64,
});
export type TakeOrderArgs = z.infer<typeof TakeOrderArgsZ>;

export const UpdateGlobalConfigArgsZ = z.object({
  mode: u16,
  value: z.array(u8).length(128),
});
export type UpdateGlobalConfigArgs = z.infer<typeof UpdateGlobalConfigArgsZ>;

export const UpdateOrderArgsZ = z.object({
  mode: u16,
  value: bytes,
});
export type UpdateOrderArgs = z.infer<typeof UpdateOrderArgsZ>;

export const LogUserSwapBalancesArgsZ = z.object({
  swap_program_id: pubkey,
});
export type LogUserSwapBalancesArgs = z.infer<typeof LogUserSwapBalancesArgsZ>;

export const AssertUserSwapBalancesEndArgsZ = z.object({
  max_input_amount_change: u64,
  min_output_amount_change: u64,
});
export type AssertUserSwapBalancesEndArgs = z.infer<typeof AssertUserSwapBalancesEndArgsZ>;

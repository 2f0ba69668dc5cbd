import { struct } from "@solana/buffer-layout";
import { u64 } from "@solana/buffer-layout-utils";
import { DISCRIMINATORS } from "../idl/coder.js";
import { fail } from "../errors.js";

export type UserSwapBalancesRecord = {
  userLamports: bigint;
  inputTaBalance: bigint;
  outputTaBalance: bigint;
};

export const UserSwapBalancesLayout = struct<UserSwapBalancesRecord>([
  u64("userLamports"),
  u64("inputTaBalance"),
  u64("outputTaBalance"),
]);

export const USER_SWAP_BALANCES_SIZE = 8 + UserSwapBalancesLayout.span;

export function decodeUserSwapBalances(data: Buffer): UserSwapBalancesRecord {
  if (data.length < USER_SWAP_BALANCES_SIZE) fail("InvalidAccount", "swap_balances_data_too_short");
  if (!data.subarray(0, 8).equals(DISCRIMINATORS.UserSwapBalancesState)) {
    fail("InvalidAccount", "swap_balances_discriminator_mismatch");
  }
  return UserSwapBalancesLayout.decode(data, 8);
}

export function encodeUserSwapBalances(state: UserSwapBalancesRecord): Buffer {
  const data = Buffer.alloc(USER_SWAP_BALANCES_SIZE);
  DISCRIMINATORS.UserSwapBalancesState.copy(data, 0);
  UserSwapBalancesLayout.encode(state, data, 8);
  return data;
}

import { PublicKey } from "@solana/web3.js";

export const SEEDS = {
  authority: Buffer.from("authority"),
  escrowVault: Buffer.from("escrow_vault"),
  intermediary: Buffer.from("intermediary"),
  userSwapBalances: Buffer.from("user_swap_balances"),
  assertSwapBalances: Buffer.from("assert_swap_balances"),
};

/**
 * Custodial authority holding tips and owning every vault:
 * seeds = ["authority", global_config]
 */
export function derivePdaAuthority(programId: PublicKey, globalConfig: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([SEEDS.authority, globalConfig.toBuffer()], programId);
}

/**
 * One escrow vault per (config, mint):
 * seeds = ["escrow_vault", global_config, mint]
 */
export function deriveEscrowVault(programId: PublicKey, globalConfig: PublicKey, mint: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([SEEDS.escrowVault, globalConfig.toBuffer(), mint.toBuffer()], programId);
}

/**
 * Temporary WSOL account used to unwrap native output for the maker:
 * seeds = ["intermediary", order]
 */
export function deriveIntermediaryOutput(programId: PublicKey, order: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([SEEDS.intermediary, order.toBuffer()], programId);
}

export function deriveUserSwapBalances(programId: PublicKey, maker: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([SEEDS.userSwapBalances, maker.toBuffer()], programId);
}

export function deriveAssertSwapBalances(programId: PublicKey, maker: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([SEEDS.assertSwapBalances, maker.toBuffer()], programId);
}

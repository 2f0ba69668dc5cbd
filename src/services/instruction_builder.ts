/**
 * Instruction builders
 *
 * Builds unsigned instructions for the limit-order program from the IDL:
 * accounts are laid out in IDL order, args borsh-encoded with the discriminator.
 * An absent optional account is passed as the program id.
 */

import { getAssociatedTokenAddressSync, NATIVE_MINT, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import {
  SYSVAR_INSTRUCTIONS_PUBKEY,
  SystemProgram,
  TransactionInstruction,
  type PublicKey,
} from "@solana/web3.js";
import BN from "bn.js";
import { encodeInstructionData, instructionAccounts, type InstructionName } from "../idl/coder.js";
import { PERMISSION_ROUTER_PROGRAM_ID, PROGRAM_ID } from "../solana.js";
import { GLOBAL_CONFIG_SIZE } from "../state/global_config.js";
import { ORDER_SIZE } from "../state/order.js";
import { deriveAssertSwapBalances, deriveEscrowVault, deriveIntermediaryOutput, derivePdaAuthority, deriveUserSwapBalances } from "../utils/pda.js";
import { encodeGlobalConfigValue, type GlobalConfigValue } from "./global_config.js";

/**
 * Serialized instruction format for JSON transport
 */
export type SerializedInstruction = {
  programId: string;
  keys: Array<{
    pubkey: string;
    isSigner: boolean;
    isWritable: boolean;
  }>;
  data: string; // base64
};

export function serializeInstruction(ix: TransactionInstruction): SerializedInstruction {
  return {
    programId: ix.programId.toBase58(),
    keys: ix.keys.map((k) => ({ pubkey: k.pubkey.toBase58(), isSigner: k.isSigner, isWritable: k.isWritable })),
    data: ix.data.toString("base64"),
  };
}

type AccountKeys = Record<string, PublicKey | null>;

function buildInstruction(
  name: InstructionName,
  accounts: AccountKeys,
  args: Record<string, unknown>,
  programId: PublicKey,
): TransactionInstruction {
  const keys = instructionAccounts(name).map((acc) => {
    const pubkey = accounts[acc.name];
    if (pubkey === undefined || (pubkey === null && !acc.optional)) {
      throw new Error(`missing_account:${name}.${acc.name}`);
    }
    return {
      pubkey: pubkey ?? programId,
      isSigner: acc.signer,
      isWritable: acc.writable && pubkey !== null,
    };
  });

  return new TransactionInstruction({ programId, keys, data: encodeInstructionData(name, args) });
}

const u64 = (v: bigint) => new BN(v.toString());

// accounts allocated by the caller before initialization

export function buildCreateProgramAccountIx(p: {
  payer: PublicKey;
  account: PublicKey;
  kind: "order" | "global_config";
  lamports?: bigint;
  programId?: PublicKey;
}): TransactionInstruction {
  return SystemProgram.createAccount({
    fromPubkey: p.payer,
    newAccountPubkey: p.account,
    lamports: Number(p.lamports ?? 0n),
    space: p.kind === "order" ? ORDER_SIZE : GLOBAL_CONFIG_SIZE,
    programId: p.programId ?? PROGRAM_ID,
  });
}

// admin

export function buildInitializeGlobalConfigIx(p: {
  adminAuthority: PublicKey;
  globalConfig: PublicKey;
  programId?: PublicKey;
}): TransactionInstruction {
  const programId = p.programId ?? PROGRAM_ID;
  const [pdaAuthority] = derivePdaAuthority(programId, p.globalConfig);
  return buildInstruction(
    "initialize_global_config",
    {
      admin_authority: p.adminAuthority,
      pda_authority: pdaAuthority,
      global_config: p.globalConfig,
      system_program: SystemProgram.programId,
    },
    {},
    programId,
  );
}

export function buildInitializeVaultIx(p: {
  adminAuthority: PublicKey;
  globalConfig: PublicKey;
  mint: PublicKey;
  tokenProgram?: PublicKey;
  programId?: PublicKey;
}): TransactionInstruction {
  const programId = p.programId ?? PROGRAM_ID;
  const [pdaAuthority] = derivePdaAuthority(programId, p.globalConfig);
  const [vault] = deriveEscrowVault(programId, p.globalConfig, p.mint);
  return buildInstruction(
    "initialize_vault",
    {
      admin_authority: p.adminAuthority,
      global_config: p.globalConfig,
      pda_authority: pdaAuthority,
      mint: p.mint,
      vault,
      token_program: p.tokenProgram ?? TOKEN_PROGRAM_ID,
      system_program: SystemProgram.programId,
    },
    {},
    programId,
  );
}

export function buildUpdateGlobalConfigIx(p: {
  adminAuthority: PublicKey;
  globalConfig: PublicKey;
  mode: number;
  value: GlobalConfigValue;
  programId?: PublicKey;
}): TransactionInstruction {
  return buildInstruction(
    "update_global_config",
    { admin_authority: p.adminAuthority, global_config: p.globalConfig },
    { mode: p.mode, value: encodeGlobalConfigValue(p.value) },
    p.programId ?? PROGRAM_ID,
  );
}

export function buildUpdateGlobalConfigAdminIx(p: {
  adminAuthorityCached: PublicKey;
  globalConfig: PublicKey;
  programId?: PublicKey;
}): TransactionInstruction {
  return buildInstruction(
    "update_global_config_admin",
    { admin_authority_cached: p.adminAuthorityCached, global_config: p.globalConfig },
    {},
    p.programId ?? PROGRAM_ID,
  );
}

export function buildWithdrawHostTipIx(p: {
  adminAuthority: PublicKey;
  globalConfig: PublicKey;
  programId?: PublicKey;
}): TransactionInstruction {
  const programId = p.programId ?? PROGRAM_ID;
  const [pdaAuthority] = derivePdaAuthority(programId, p.globalConfig);
  return buildInstruction(
    "withdraw_host_tip",
    {
      admin_authority: p.adminAuthority,
      global_config: p.globalConfig,
      pda_authority: pdaAuthority,
      system_program: SystemProgram.programId,
    },
    {},
    programId,
  );
}

// orders

export type CreateOrderIxParams = {
  maker: PublicKey;
  globalConfig: PublicKey;
  order: PublicKey;
  inputMint: PublicKey;
  outputMint: PublicKey;
  makerAta: PublicKey;
  inputAmount: bigint;
  outputAmount: bigint;
  orderType?: number;
  inputTokenProgram?: PublicKey;
  outputTokenProgram?: PublicKey;
  programId?: PublicKey;
};

export function buildCreateOrderIx(p: CreateOrderIxParams): TransactionInstruction {
  const programId = p.programId ?? PROGRAM_ID;
  const [pdaAuthority] = derivePdaAuthority(programId, p.globalConfig);
  const [inputVault] = deriveEscrowVault(programId, p.globalConfig, p.inputMint);
  return buildInstruction(
    "create_order",
    {
      maker: p.maker,
      global_config: p.globalConfig,
      pda_authority: pdaAuthority,
      order: p.order,
      input_mint: p.inputMint,
      output_mint: p.outputMint,
      maker_ata: p.makerAta,
      input_vault: inputVault,
      input_token_program: p.inputTokenProgram ?? TOKEN_PROGRAM_ID,
      output_token_program: p.outputTokenProgram ?? TOKEN_PROGRAM_ID,
    },
    { input_amount: u64(p.inputAmount), output_amount: u64(p.outputAmount), order_type: p.orderType ?? 0 },
    programId,
  );
}

export function buildUpdateOrderIx(p: {
  maker: PublicKey;
  globalConfig: PublicKey;
  order: PublicKey;
  mode: number;
  value: Buffer;
  programId?: PublicKey;
}): TransactionInstruction {
  return buildInstruction(
    "update_order",
    { maker: p.maker, global_config: p.globalConfig, order: p.order },
    { mode: p.mode, value: p.value },
    p.programId ?? PROGRAM_ID,
  );
}

export function buildCloseOrderAndClaimTipIx(p: {
  maker: PublicKey;
  globalConfig: PublicKey;
  order: PublicKey;
  inputMint: PublicKey;
  outputMint: PublicKey;
  makerInputAta: PublicKey;
  inputTokenProgram?: PublicKey;
  programId?: PublicKey;
}): TransactionInstruction {
  const programId = p.programId ?? PROGRAM_ID;
  const [pdaAuthority] = derivePdaAuthority(programId, p.globalConfig);
  const [inputVault] = deriveEscrowVault(programId, p.globalConfig, p.inputMint);
  return buildInstruction(
    "close_order_and_claim_tip",
    {
      maker: p.maker,
      order: p.order,
      global_config: p.globalConfig,
      pda_authority: pdaAuthority,
      input_mint: p.inputMint,
      output_mint: p.outputMint,
      maker_input_ata: p.makerInputAta,
      input_vault: inputVault,
      input_token_program: p.inputTokenProgram ?? TOKEN_PROGRAM_ID,
      system_program: SystemProgram.programId,
    },
    {},
    programId,
  );
}

// taking

export type TakeOrderIxParams = {
  taker: PublicKey;
  maker: PublicKey;
  globalConfig: PublicKey;
  order: PublicKey;
  inputMint: PublicKey;
  outputMint: PublicKey;
  takerInputAta: PublicKey;
  takerOutputAta: PublicKey;
  inputAmount: bigint;
  minOutputAmount: bigint;
  tipAmountPermissionlessTaking: bigint;
  /** Routed through the permission router; the permission account is the order itself. */
  permissioned?: boolean;
  /** Native output without a maker token account goes through the intermediary. */
  unwrapNativeOutput?: boolean;
  inputTokenProgram?: PublicKey;
  outputTokenProgram?: PublicKey;
  permissionRouter?: PublicKey;
  programId?: PublicKey;
};

function takeAccounts(p: TakeOrderIxParams, programId: PublicKey): AccountKeys {
  const outputTokenProgram = p.outputTokenProgram ?? TOKEN_PROGRAM_ID;
  const [pdaAuthority] = derivePdaAuthority(programId, p.globalConfig);
  const [inputVault] = deriveEscrowVault(programId, p.globalConfig, p.inputMint);
  const unwrap = (p.unwrapNativeOutput ?? false) && p.outputMint.equals(NATIVE_MINT);

  return {
    taker: p.taker,
    maker: p.maker,
    global_config: p.globalConfig,
    pda_authority: pdaAuthority,
    order: p.order,
    input_mint: p.inputMint,
    output_mint: p.outputMint,
    input_vault: inputVault,
    taker_input_ata: p.takerInputAta,
    taker_output_ata: p.takerOutputAta,
    intermediary_output_token_account: unwrap ? deriveIntermediaryOutput(programId, p.order)[0] : null,
    maker_output_ata: unwrap ? null : getAssociatedTokenAddressSync(p.outputMint, p.maker, true, outputTokenProgram),
    permission_router: p.permissionRouter ?? PERMISSION_ROUTER_PROGRAM_ID,
    permission: p.permissioned ? p.order : null,
    sysvar_instructions: SYSVAR_INSTRUCTIONS_PUBKEY,
    input_token_program: p.inputTokenProgram ?? TOKEN_PROGRAM_ID,
    output_token_program: outputTokenProgram,
    system_program: SystemProgram.programId,
  };
}

function takeArgs(p: TakeOrderIxParams): Record<string, unknown> {
  return {
    input_amount: u64(p.inputAmount),
    min_output_amount: u64(p.minOutputAmount),
    tip_amount_permissionless_taking: u64(p.tipAmountPermissionlessTaking),
  };
}

export function buildTakeOrderIx(p: TakeOrderIxParams): TransactionInstruction {
  const programId = p.programId ?? PROGRAM_ID;
  return buildInstruction("take_order", takeAccounts(p, programId), takeArgs(p), programId);
}

/**
 * Start/end pair; the taker's own instructions go in between.
 */
export function buildFlashTakeOrderIxs(p: TakeOrderIxParams): { start: TransactionInstruction; end: TransactionInstruction } {
  const programId = p.programId ?? PROGRAM_ID;
  const accounts = takeAccounts(p, programId);
  return {
    start: buildInstruction("flash_take_order_start", accounts, takeArgs(p), programId),
    end: buildInstruction("flash_take_order_end", accounts, takeArgs(p), programId),
  };
}

// balance bracketing

export function buildLogUserSwapBalancesIxs(p: {
  maker: PublicKey;
  inputMint: PublicKey;
  outputMint: PublicKey;
  inputTa: PublicKey;
  outputTa: PublicKey;
  swapProgramId: PublicKey;
  programId?: PublicKey;
}): { start: TransactionInstruction; end: TransactionInstruction } {
  const programId = p.programId ?? PROGRAM_ID;
  const [state] = deriveUserSwapBalances(programId, p.maker);
  const accounts: AccountKeys = {
    maker: p.maker,
    input_mint: p.inputMint,
    output_mint: p.outputMint,
    input_ta: p.inputTa,
    output_ta: p.outputTa,
    user_swap_balance_state: state,
    system_program: SystemProgram.programId,
    sysvar_instructions: SYSVAR_INSTRUCTIONS_PUBKEY,
  };
  const args = { swap_program_id: p.swapProgramId };
  return {
    start: buildInstruction("log_user_swap_balances_start", accounts, args, programId),
    end: buildInstruction("log_user_swap_balances_end", accounts, args, programId),
  };
}

export function buildAssertUserSwapBalancesIxs(p: {
  maker: PublicKey;
  inputTa: PublicKey;
  outputTa: PublicKey;
  maxInputAmountChange: bigint;
  minOutputAmountChange: bigint;
  programId?: PublicKey;
}): { start: TransactionInstruction; end: TransactionInstruction } {
  const programId = p.programId ?? PROGRAM_ID;
  const [state] = deriveAssertSwapBalances(programId, p.maker);
  const accounts: AccountKeys = {
    maker: p.maker,
    input_ta: p.inputTa,
    output_ta: p.outputTa,
    user_swap_balance_state: state,
    system_program: SystemProgram.programId,
    sysvar_instructions: SYSVAR_INSTRUCTIONS_PUBKEY,
  };
  return {
    start: buildInstruction("assert_user_swap_balances_start", accounts, {}, programId),
    end: buildInstruction(
      "assert_user_swap_balances_end",
      accounts,
      {
        max_input_amount_change: u64(p.maxInputAmountChange),
        min_output_amount_change: u64(p.minOutputAmountChange),
      },
      programId,
    ),
  };
}

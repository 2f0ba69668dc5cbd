import { SYSVAR_INSTRUCTIONS_PUBKEY, SystemProgram, type PublicKey } from "@solana/web3.js";
import { decodeInstructionData, instructionDiscriminator, type InstructionName } from "../idl/coder.js";
import { ensure } from "../errors.js";
import {
  AssertUserSwapBalancesEndArgsZ,
  LogUserSwapBalancesArgsZ,
  NoArgsZ,
} from "../schemas/instructions.js";
import {
  decodeUserSwapBalances,
  encodeUserSwapBalances,
  USER_SWAP_BALANCES_SIZE,
  type UserSwapBalancesRecord,
} from "../state/swap_balances.js";
import { ensureTokenAccount, readTokenAccount } from "../services/escrow_vault.js";
import { ensureSameAccounts, ensureTopLevelInvocation, type InstructionPair } from "../services/flash_ixs.js";
import {
  ensureSwapBalanceChange,
  findOrderedEnd,
  findOrderedStart,
  findSiblingEnd,
  findSiblingStart,
} from "../services/swap_balance_ixs.js";
import { isTokenProgram } from "../solana.js";
import { deriveAssertSwapBalances, deriveUserSwapBalances } from "../utils/pda.js";
import { defineHandler, ensureKey, requiredKey, resolveAccounts, type HandlerContext, type ResolvedAccounts } from "./context.js";

const LOG_PAIR: InstructionPair = {
  start: instructionDiscriminator("log_user_swap_balances_start"),
  end: instructionDiscriminator("log_user_swap_balances_end"),
};

const ASSERT_PAIR: InstructionPair = {
  start: instructionDiscriminator("assert_user_swap_balances_start"),
  end: instructionDiscriminator("assert_user_swap_balances_end"),
};

type SwapAccounts = {
  maker: PublicKey;
  inputTa: PublicKey;
  outputTa: PublicKey;
  state: PublicKey;
};

function resolveSwapAccounts(ctx: HandlerContext, name: InstructionName): { keys: SwapAccounts; all: ResolvedAccounts } {
  const a = resolveAccounts(ctx, name);
  ensureKey(requiredKey(a, "system_program"), SystemProgram.programId, "system_program");
  ensureKey(requiredKey(a, "sysvar_instructions"), SYSVAR_INSTRUCTIONS_PUBKEY, "sysvar_instructions");
  return {
    keys: {
      maker: requiredKey(a, "maker"),
      inputTa: requiredKey(a, "input_ta"),
      outputTa: requiredKey(a, "output_ta"),
      state: requiredKey(a, "user_swap_balance_state"),
    },
    all: a,
  };
}

/**
 * Token balance owned by the maker; a missing or empty account reads as 0.
 */
function makerTokenBalance(ctx: HandlerContext, address: PublicKey, maker: PublicKey, mint: PublicKey | null): bigint {
  const account = ctx.store.get(address);
  if (!account || !isTokenProgram(account.owner)) return 0n;

  const raw = readTokenAccount(ctx.store, address, "swap_token_account");
  if (mint) ensureTokenAccount(raw, { mint, authority: maker }, "swap_token_account");
  else ensure(raw.owner.equals(maker), "InvalidTokenAuthority", address.toBase58());
  return raw.amount;
}

function snapshot(ctx: HandlerContext, k: SwapAccounts, mints: { input: PublicKey; output: PublicKey } | null): UserSwapBalancesRecord {
  return {
    userLamports: ctx.store.lamports(k.maker),
    inputTaBalance: makerTokenBalance(ctx, k.inputTa, k.maker, mints?.input ?? null),
    outputTaBalance: makerTokenBalance(ctx, k.outputTa, k.maker, mints?.output ?? null),
  };
}

function openState(ctx: HandlerContext, k: SwapAccounts, expected: PublicKey, record: UserSwapBalancesRecord): void {
  ensureKey(k.state, expected, "user_swap_balance_state");
  ctx.store.allocate(k.state, ctx.programId, USER_SWAP_BALANCES_SIZE);
  ctx.store.setData(k.state, encodeUserSwapBalances(record));
}

function takeState(ctx: HandlerContext, k: SwapAccounts, expected: PublicKey): UserSwapBalancesRecord {
  ensureKey(k.state, expected, "user_swap_balance_state");
  const account = ctx.store.getRequired(k.state, "user_swap_balance_state");
  ensure(account.owner.equals(ctx.programId), "InvalidAccount", "user_swap_balance_state_owner");
  const record = decodeUserSwapBalances(account.data);
  ctx.store.close(k.state, k.maker);
  return record;
}

function pairedSwapProgram(ix: { data: Buffer }, expected: InstructionName): PublicKey | null {
  const decoded = decodeInstructionData(ix.data);
  if (!decoded || decoded.name !== expected) return null;
  const parsed = LogUserSwapBalancesArgsZ.safeParse(decoded.data);
  return parsed.success ? parsed.data.swap_program_id : null;
}

// strict sibling variant

export const logUserSwapBalancesStartHandler = defineHandler(LogUserSwapBalancesArgsZ, (ctx, args) => {
  const { keys: k, all } = resolveSwapAccounts(ctx, "log_user_swap_balances_start");

  const end = findSiblingEnd(ctx.view, ctx.programId, args.swap_program_id, LOG_PAIR);
  ensureSameAccounts(ctx.ix, end.ix);
  const endSwapProgram = pairedSwapProgram(end.ix, "log_user_swap_balances_end");
  ensure(endSwapProgram !== null && endSwapProgram.equals(args.swap_program_id), "FlashIxsArgsMismatch", "swap_program_id");

  const mints = { input: requiredKey(all, "input_mint"), output: requiredKey(all, "output_mint") };
  const [expected] = deriveUserSwapBalances(ctx.programId, k.maker);
  openState(ctx, k, expected, snapshot(ctx, k, mints));
});

export const logUserSwapBalancesEndHandler = defineHandler(LogUserSwapBalancesArgsZ, (ctx, args) => {
  const { keys: k, all } = resolveSwapAccounts(ctx, "log_user_swap_balances_end");

  const start = findSiblingStart(ctx.view, ctx.programId, args.swap_program_id, LOG_PAIR);
  ensureSameAccounts(ctx.ix, start.ix);
  const startSwapProgram = pairedSwapProgram(start.ix, "log_user_swap_balances_start");
  ensure(startSwapProgram !== null && startSwapProgram.equals(args.swap_program_id), "FlashIxsArgsMismatch", "swap_program_id");

  const [expected] = deriveUserSwapBalances(ctx.programId, k.maker);
  const before = takeState(ctx, k, expected);
  const mints = { input: requiredKey(all, "input_mint"), output: requiredKey(all, "output_mint") };
  const after = snapshot(ctx, k, mints);

  ctx.emit({
    name: "UserSwapBalanceDiffs",
    maker: k.maker,
    swapProgramId: args.swap_program_id,
    userLamportsBefore: before.userLamports,
    userLamportsAfter: after.userLamports,
    inputTaBalanceBefore: before.inputTaBalance,
    inputTaBalanceAfter: after.inputTaBalance,
    outputTaBalanceBefore: before.outputTaBalance,
    outputTaBalanceAfter: after.outputTaBalance,
  });
  ctx.log.info({ maker: k.maker.toBase58(), swapProgram: args.swap_program_id.toBase58() }, "user_swap_balances_logged");
});

// ordering variant

export const assertUserSwapBalancesStartHandler = defineHandler(NoArgsZ, (ctx) => {
  const { keys: k } = resolveSwapAccounts(ctx, "assert_user_swap_balances_start");
  ensureTopLevelInvocation(ctx.view, ctx.programId);

  const end = findOrderedEnd(ctx.view, ctx.programId, ASSERT_PAIR);
  ensureSameAccounts(ctx.ix, end.ix);

  const [expected] = deriveAssertSwapBalances(ctx.programId, k.maker);
  openState(ctx, k, expected, snapshot(ctx, k, null));
});

export const assertUserSwapBalancesEndHandler = defineHandler(AssertUserSwapBalancesEndArgsZ, (ctx, args) => {
  const { keys: k } = resolveSwapAccounts(ctx, "assert_user_swap_balances_end");
  ensureTopLevelInvocation(ctx.view, ctx.programId);

  const start = findOrderedStart(ctx.view, ctx.programId, ASSERT_PAIR);
  ensureSameAccounts(ctx.ix, start.ix);

  const [expected] = deriveAssertSwapBalances(ctx.programId, k.maker);
  const before = takeState(ctx, k, expected);
  const after = snapshot(ctx, k, null);

  const change = ensureSwapBalanceChange(
    { input: before.inputTaBalance, output: before.outputTaBalance },
    { input: after.inputTaBalance, output: after.outputTaBalance },
    args.max_input_amount_change,
    args.min_output_amount_change,
  );
  ctx.log.info(
    { maker: k.maker.toBase58(), spent: change.inputSpent.toString(), received: change.outputReceived.toString() },
    "user_swap_balances_asserted",
  );
});

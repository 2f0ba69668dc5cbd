import type { TransactionInstruction } from "@solana/web3.js";
import { decodeInstructionData, instructionDiscriminator, type InstructionName } from "../idl/coder.js";
import { fail } from "../errors.js";
import { TakeOrderArgsZ, type TakeOrderArgs } from "../schemas/instructions.js";
import type { OrderRecord } from "../state/order.js";
import { readTokenAccount, releaseFromVault } from "../services/escrow_vault.js";
import {
  ensureSameAccounts,
  ensureSameArgs,
  ensureTopLevelInvocation,
  findPairedEnd,
  findPairedStart,
  type InstructionPair,
} from "../services/flash_ixs.js";
import {
  ensureEmergencyModeDisabled,
  ensureFlashTakingAllowed,
  ensureOrderTakingAllowed,
} from "../services/global_config.js";
import { flashPayOrderOutput, flashWithdrawOrderInput } from "../services/orders.js";
import { checkedSub, minBig } from "../utils/math.js";
import { defineHandler, emitOrderDisplay, saveGlobalConfig, saveOrder, type HandlerContext } from "./context.js";
import {
  collectTip,
  ensureMakerOutputDestination,
  loadTakeState,
  payOutputToMaker,
  resolveTakeAccounts,
  resolveTip,
  type TakeAccounts,
} from "./take_order.js";

export const FLASH_TAKE_ORDER_PAIR: InstructionPair = {
  start: instructionDiscriminator("flash_take_order_start"),
  end: instructionDiscriminator("flash_take_order_end"),
};

const FLASH_GUARDS = [ensureEmergencyModeDisabled, ensureOrderTakingAllowed, ensureFlashTakingAllowed];

function pairedArgs(ix: TransactionInstruction, expected: InstructionName): TakeOrderArgs {
  const decoded = decodeInstructionData(ix.data);
  if (!decoded || decoded.name !== expected) fail("FlashIxsArgsMismatch", "paired_ix_undecodable");

  const parsed = TakeOrderArgsZ.safeParse(decoded.data);
  if (!parsed.success) fail("FlashIxsArgsMismatch", "paired_ix_args_invalid");
  return parsed.data;
}

/**
 * Checks shared by both halves, run before any state is touched: call depth,
 * the maker's output destination, then pairing.
 */
function verifyFlashPair(
  ctx: HandlerContext,
  a: TakeAccounts,
  order: OrderRecord,
  args: TakeOrderArgs,
  side: "start" | "end",
): void {
  ensureTopLevelInvocation(ctx.view, ctx.programId);
  ensureMakerOutputDestination(a, order);

  if (side === "start") {
    const end = findPairedEnd(ctx.view, ctx.programId, FLASH_TAKE_ORDER_PAIR);
    ensureSameAccounts(ctx.ix, end.ix);
    ensureSameArgs(args, pairedArgs(end.ix, "flash_take_order_end"));
  } else {
    const start = findPairedStart(ctx.view, ctx.programId, FLASH_TAKE_ORDER_PAIR);
    ensureSameAccounts(ctx.ix, start.ix);
    ensureSameArgs(args, pairedArgs(start.ix, "flash_take_order_start"));
  }
}

export const flashTakeOrderStartHandler = defineHandler(TakeOrderArgsZ, (ctx, args) => {
  const a = resolveTakeAccounts(ctx, "flash_take_order_start");
  const { config, order } = loadTakeState(ctx, a, FLASH_GUARDS);
  verifyFlashPair(ctx, a, order, args, "start");

  const effects = flashWithdrawOrderInput(order, args.input_amount, args.min_output_amount);

  releaseFromVault(ctx.store, {
    vault: a.inputVault,
    to: a.takerInputAta,
    pdaAuthority: a.pdaAuthority,
    mint: order.inputMint,
    amount: effects.inputToSendToTaker,
  });
  order.flashStartTakerOutputBalance = readTokenAccount(ctx.store, a.takerOutputAta, "taker_output_ata").amount;

  saveOrder(ctx, a.order, order);
  saveGlobalConfig(ctx, a.globalConfig, config);

  ctx.log.debug(
    { order: a.order.toBase58(), input: effects.inputToSendToTaker.toString(), snapshot: order.flashStartTakerOutputBalance.toString() },
    "flash_take_order_started",
  );
});

export const flashTakeOrderEndHandler = defineHandler(TakeOrderArgsZ, (ctx, args) => {
  const a = resolveTakeAccounts(ctx, "flash_take_order_end");
  const { config, order } = loadTakeState(ctx, a, FLASH_GUARDS);
  verifyFlashPair(ctx, a, order, args, "end");

  const source = resolveTip(ctx, a, order, args);

  // output the taker acquired since start; capped at the declared minimum
  const takerOutputNow = readTokenAccount(ctx.store, a.takerOutputAta, "taker_output_ata").amount;
  const acquired = checkedSub(takerOutputNow, order.flashStartTakerOutputBalance);
  const outputAmount = acquired === 0n ? args.min_output_amount : minBig(acquired, args.min_output_amount);

  const effects = flashPayOrderOutput(config, order, args.input_amount, outputAmount, source.tip, ctx.now);

  payOutputToMaker(ctx, a, order, effects.outputToSendToMaker);
  collectTip(ctx, a, config, source);
  order.flashStartTakerOutputBalance = 0n;

  saveOrder(ctx, a.order, order);
  saveGlobalConfig(ctx, a.globalConfig, config);

  ctx.log.info(
    {
      order: a.order.toBase58(),
      input: effects.inputToSendToTaker.toString(),
      output: effects.outputToSendToMaker.toString(),
      tip: source.tip.toString(),
    },
    "flash_take_order_completed",
  );
  emitOrderDisplay(ctx, a.order, order);
});

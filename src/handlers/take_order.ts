import { getAssociatedTokenAddressSync } from "@solana/spl-token";
import { SYSVAR_INSTRUCTIONS_PUBKEY, SystemProgram, type PublicKey } from "@solana/web3.js";
import type { InstructionName } from "../idl/coder.js";
import { ensure, fail } from "../errors.js";
import { TakeOrderArgsZ, type TakeOrderArgs } from "../schemas/instructions.js";
import type { GlobalConfigRecord } from "../state/global_config.js";
import type { OrderRecord } from "../state/order.js";
import {
  closeTokenAccount,
  createTokenAccount,
  ensureTokenAccount,
  readTokenAccount,
  releaseFromVault,
  transferLamports,
  transferTokens,
} from "../services/escrow_vault.js";
import { ensureEmergencyModeDisabled, ensureOrderTakingAllowed } from "../services/global_config.js";
import { canBeTakenBy, takeOrder } from "../services/orders.js";
import { reconcileAuthorityBalance } from "../services/tip_ledger.js";
import { isNativeMint } from "../solana.js";
import { deriveEscrowVault, deriveIntermediaryOutput } from "../utils/pda.js";
import {
  defineHandler,
  emitOrderDisplay,
  ensureKey,
  loadGlobalConfig,
  loadOrder,
  optionalKey,
  requiredKey,
  resolveAccounts,
  saveGlobalConfig,
  saveOrder,
  type HandlerContext,
} from "./context.js";

export type TakeAccounts = {
  taker: PublicKey;
  maker: PublicKey;
  globalConfig: PublicKey;
  pdaAuthority: PublicKey;
  order: PublicKey;
  inputMint: PublicKey;
  outputMint: PublicKey;
  inputVault: PublicKey;
  takerInputAta: PublicKey;
  takerOutputAta: PublicKey;
  intermediaryOutputTokenAccount: PublicKey | null;
  makerOutputAta: PublicKey | null;
  permissionRouter: PublicKey;
  permission: PublicKey | null;
  inputTokenProgram: PublicKey;
  outputTokenProgram: PublicKey;
};

export function resolveTakeAccounts(ctx: HandlerContext, name: InstructionName): TakeAccounts {
  const a = resolveAccounts(ctx, name);
  ensureKey(requiredKey(a, "sysvar_instructions"), SYSVAR_INSTRUCTIONS_PUBKEY, "sysvar_instructions");
  ensureKey(requiredKey(a, "system_program"), SystemProgram.programId, "system_program");

  return {
    taker: requiredKey(a, "taker"),
    maker: requiredKey(a, "maker"),
    globalConfig: requiredKey(a, "global_config"),
    pdaAuthority: requiredKey(a, "pda_authority"),
    order: requiredKey(a, "order"),
    inputMint: requiredKey(a, "input_mint"),
    outputMint: requiredKey(a, "output_mint"),
    inputVault: requiredKey(a, "input_vault"),
    takerInputAta: requiredKey(a, "taker_input_ata"),
    takerOutputAta: requiredKey(a, "taker_output_ata"),
    intermediaryOutputTokenAccount: optionalKey(a, "intermediary_output_token_account"),
    makerOutputAta: optionalKey(a, "maker_output_ata"),
    permissionRouter: requiredKey(a, "permission_router"),
    permission: optionalKey(a, "permission"),
    inputTokenProgram: requiredKey(a, "input_token_program"),
    outputTokenProgram: requiredKey(a, "output_token_program"),
  };
}

export type TakeState = {
  config: GlobalConfigRecord;
  order: OrderRecord;
};

/**
 * Load config, run its kill-switch guards, then load the order and check
 * every relation the take accounts must satisfy.
 */
export function loadTakeState(
  ctx: HandlerContext,
  a: TakeAccounts,
  guards: readonly ((config: GlobalConfigRecord) => void)[],
): TakeState {
  const config = loadGlobalConfig(ctx, a.globalConfig);
  guards.forEach((guard) => guard(config));
  ensure(config.pdaAuthority.equals(a.pdaAuthority), "InvalidPdaAuthority");

  const order = loadOrder(ctx, a.order);
  ensure(order.globalConfig.equals(a.globalConfig), "InvalidAccount", "order_global_config");
  ensure(order.maker.equals(a.maker), "InvalidOrderOwner");
  ensureKey(a.inputMint, order.inputMint, "input_mint");
  ensureKey(a.outputMint, order.outputMint, "output_mint");
  ensureKey(a.inputTokenProgram, order.inputMintProgramId, "input_token_program");
  ensureKey(a.outputTokenProgram, order.outputMintProgramId, "output_token_program");

  const [expectedVault] = deriveEscrowVault(ctx.programId, a.globalConfig, order.inputMint);
  ensureKey(a.inputVault, expectedVault, "input_vault");

  ensureTokenAccount(readTokenAccount(ctx.store, a.takerInputAta, "taker_input_ata"), { mint: order.inputMint, authority: a.taker }, "taker_input_ata");
  ensureTokenAccount(readTokenAccount(ctx.store, a.takerOutputAta, "taker_output_ata"), { mint: order.outputMint, authority: a.taker }, "taker_output_ata");

  return { config, order };
}

export type TipSource = {
  tip: bigint;
  permissioned: boolean;
};

/**
 * Permissioned fills take the router's fee as tip; otherwise the taker's
 * declared permissionless tip applies.
 */
export function resolveTip(ctx: HandlerContext, a: TakeAccounts, order: OrderRecord, args: TakeOrderArgs): TipSource {
  ensureKey(a.permissionRouter, ctx.permissionRouterProgramId, "permission_router");

  let source: TipSource = { tip: args.tip_amount_permissionless_taking, permissioned: false };

  if (a.permission) {
    ensure(a.permission.equals(a.order), "PermissionDoesNotMatchOrder", a.permission.toBase58());
    if (!ctx.permissionRouter) fail("PermissionNotGranted", "no_router");

    const grant = ctx.permissionRouter.checkPermission({
      store: ctx.store,
      router: a.permissionRouter,
      permission: a.permission,
      order: a.order,
      taker: a.taker,
      pdaAuthority: a.pdaAuthority,
    });
    ensure(grant.accepted, "PermissionNotGranted");
    source = { tip: grant.fees, permissioned: true };
  }

  canBeTakenBy(order, a.taker, source.permissioned);
  return source;
}

/**
 * A maker output account must be the maker's ATA; without one the output mint must be native.
 */
export function ensureMakerOutputDestination(a: TakeAccounts, order: OrderRecord): void {
  if (a.makerOutputAta) {
    const expectedAta = getAssociatedTokenAddressSync(order.outputMint, a.maker, true, order.outputMintProgramId);
    ensure(a.makerOutputAta.equals(expectedAta), "InvalidAtaAddress", a.makerOutputAta.toBase58());
    return;
  }
  if (!isNativeMint(order.outputMint)) fail("MakerOutputAtaRequired");
}

/**
 * Move the maker's output. WSOL output without a maker token account is
 * unwrapped through a temporary intermediary account into native lamports.
 */
export function payOutputToMaker(ctx: HandlerContext, a: TakeAccounts, order: OrderRecord, amount: bigint): void {
  ensureMakerOutputDestination(a, order);

  if (a.makerOutputAta) {
    transferTokens(ctx.store, {
      source: a.takerOutputAta,
      destination: a.makerOutputAta,
      authority: a.taker,
      amount,
      mint: order.outputMint,
    });
    return;
  }

  if (!a.intermediaryOutputTokenAccount) fail("IntermediaryOutputTokenAccountRequired");

  const [expectedIntermediary] = deriveIntermediaryOutput(ctx.programId, a.order);
  ensureKey(a.intermediaryOutputTokenAccount, expectedIntermediary, "intermediary_output_token_account");

  createTokenAccount(ctx.store, {
    address: a.intermediaryOutputTokenAccount,
    mint: order.outputMint,
    authority: a.pdaAuthority,
    tokenProgram: order.outputMintProgramId,
  });
  transferTokens(ctx.store, {
    source: a.takerOutputAta,
    destination: a.intermediaryOutputTokenAccount,
    authority: a.taker,
    amount,
    mint: order.outputMint,
  });
  closeTokenAccount(ctx.store, a.intermediaryOutputTokenAccount, a.maker, a.pdaAuthority);
}

/**
 * Permissionless tips come from the taker; then the authority balance must account for them.
 */
export function collectTip(ctx: HandlerContext, a: TakeAccounts, config: GlobalConfigRecord, source: TipSource): void {
  if (!source.permissioned) transferLamports(ctx.store, a.taker, a.pdaAuthority, source.tip);
  reconcileAuthorityBalance(config, ctx.store.lamports(a.pdaAuthority), source.tip);
}

export const takeOrderHandler = defineHandler(TakeOrderArgsZ, (ctx, args) => {
  const a = resolveTakeAccounts(ctx, "take_order");
  const { config, order } = loadTakeState(ctx, a, [ensureEmergencyModeDisabled, ensureOrderTakingAllowed]);

  const source = resolveTip(ctx, a, order, args);
  const effects = takeOrder(config, order, args.input_amount, args.min_output_amount, source.tip, ctx.now);

  payOutputToMaker(ctx, a, order, effects.outputToSendToMaker);
  releaseFromVault(ctx.store, {
    vault: a.inputVault,
    to: a.takerInputAta,
    pdaAuthority: a.pdaAuthority,
    mint: order.inputMint,
    amount: effects.inputToSendToTaker,
  });
  collectTip(ctx, a, config, source);

  saveOrder(ctx, a.order, order);
  saveGlobalConfig(ctx, a.globalConfig, config);

  ctx.log.info(
    {
      order: a.order.toBase58(),
      input: effects.inputToSendToTaker.toString(),
      output: effects.outputToSendToMaker.toString(),
      tip: source.tip.toString(),
    },
    "order_taken",
  );
  emitOrderDisplay(ctx, a.order, order);
});

import { SystemProgram } from "@solana/web3.js";
import { ensure } from "../errors.js";
import { CreateOrderArgsZ, NoArgsZ, UpdateOrderArgsZ } from "../schemas/instructions.js";
import { emptyOrder, ORDER_SIZE } from "../state/order.js";
import {
  depositToVault,
  ensureTokenAccount,
  readTokenAccount,
  releaseFromVault,
  transferLamports,
} from "../services/escrow_vault.js";
import { ensureEmergencyModeDisabled, ensureNewOrdersAllowed } from "../services/global_config.js";
import { closeOrderAndClaimTip, createOrder, updateOrder } from "../services/orders.js";
import { syncAuthorityBalance } from "../services/tip_ledger.js";
import { isTokenProgram } from "../solana.js";
import { deriveEscrowVault } from "../utils/pda.js";
import {
  defineHandler,
  emitOrderDisplay,
  ensureKey,
  ensureZeroedAccount,
  loadGlobalConfig,
  loadOrder,
  requiredKey,
  resolveAccounts,
  saveGlobalConfig,
  saveOrder,
} from "./context.js";

export const createOrderHandler = defineHandler(CreateOrderArgsZ, (ctx, args) => {
  const a = resolveAccounts(ctx, "create_order");
  const maker = requiredKey(a, "maker");
  const globalConfigKey = requiredKey(a, "global_config");
  const pdaAuthority = requiredKey(a, "pda_authority");
  const orderKey = requiredKey(a, "order");
  const inputMint = requiredKey(a, "input_mint");
  const outputMint = requiredKey(a, "output_mint");
  const makerAta = requiredKey(a, "maker_ata");
  const inputVault = requiredKey(a, "input_vault");
  const inputTokenProgram = requiredKey(a, "input_token_program");
  const outputTokenProgram = requiredKey(a, "output_token_program");

  const config = loadGlobalConfig(ctx, globalConfigKey);
  ensureEmergencyModeDisabled(config);
  ensureNewOrdersAllowed(config);
  ensure(config.pdaAuthority.equals(pdaAuthority), "InvalidPdaAuthority");
  ensure(isTokenProgram(inputTokenProgram), "InvalidAccount", "input_token_program");
  ensure(isTokenProgram(outputTokenProgram), "InvalidAccount", "output_token_program");

  const [expectedVault, vaultBump] = deriveEscrowVault(ctx.programId, globalConfigKey, inputMint);
  ensureKey(inputVault, expectedVault, "input_vault");
  const vault = readTokenAccount(ctx.store, inputVault, "input_vault");
  ensureTokenAccount(vault, { mint: inputMint, authority: pdaAuthority }, "input_vault");

  const makerTokens = readTokenAccount(ctx.store, makerAta, "maker_ata");
  ensureTokenAccount(makerTokens, { mint: inputMint, authority: maker }, "maker_ata");

  ensureZeroedAccount(ctx, orderKey, ORDER_SIZE, "order");

  const order = emptyOrder();
  createOrder(order, {
    globalConfig: globalConfigKey,
    maker,
    inputMint,
    inputMintProgramId: inputTokenProgram,
    outputMint,
    outputMintProgramId: outputTokenProgram,
    inputAmount: args.input_amount,
    outputAmount: args.output_amount,
    orderType: args.order_type,
    inVaultBump: vaultBump,
    now: ctx.now,
  });

  depositToVault(ctx.store, { from: makerAta, vault: inputVault, owner: maker, mint: inputMint, amount: args.input_amount });
  saveOrder(ctx, orderKey, order);

  ctx.log.info(
    { order: orderKey.toBase58(), input: args.input_amount.toString(), output: args.output_amount.toString() },
    "order_created",
  );
  emitOrderDisplay(ctx, orderKey, order);
});

export const updateOrderHandler = defineHandler(UpdateOrderArgsZ, (ctx, args) => {
  const a = resolveAccounts(ctx, "update_order");
  const maker = requiredKey(a, "maker");
  const globalConfigKey = requiredKey(a, "global_config");
  const orderKey = requiredKey(a, "order");

  const order = loadOrder(ctx, orderKey);
  ensure(order.maker.equals(maker), "InvalidOrderOwner");
  ensure(order.globalConfig.equals(globalConfigKey), "InvalidAccount", "order_global_config");

  updateOrder(order, args.mode, args.value);
  saveOrder(ctx, orderKey, order);

  ctx.log.info({ order: orderKey.toBase58(), mode: args.mode }, "order_updated");
});

export const closeOrderAndClaimTipHandler = defineHandler(NoArgsZ, (ctx) => {
  const a = resolveAccounts(ctx, "close_order_and_claim_tip");
  const maker = requiredKey(a, "maker");
  const orderKey = requiredKey(a, "order");
  const globalConfigKey = requiredKey(a, "global_config");
  const pdaAuthority = requiredKey(a, "pda_authority");
  const inputMint = requiredKey(a, "input_mint");
  const outputMint = requiredKey(a, "output_mint");
  const makerInputAta = requiredKey(a, "maker_input_ata");
  const inputVault = requiredKey(a, "input_vault");
  ensureKey(requiredKey(a, "system_program"), SystemProgram.programId, "system_program");

  const config = loadGlobalConfig(ctx, globalConfigKey);
  ensureEmergencyModeDisabled(config);
  ensure(config.pdaAuthority.equals(pdaAuthority), "InvalidPdaAuthority");

  const order = loadOrder(ctx, orderKey);
  ensure(order.maker.equals(maker), "InvalidOrderOwner");
  ensure(order.globalConfig.equals(globalConfigKey), "InvalidAccount", "order_global_config");
  ensureKey(inputMint, order.inputMint, "input_mint");
  ensureKey(outputMint, order.outputMint, "output_mint");
  ensureKey(requiredKey(a, "input_token_program"), order.inputMintProgramId, "input_token_program");

  const [expectedVault] = deriveEscrowVault(ctx.programId, globalConfigKey, order.inputMint);
  ensureKey(inputVault, expectedVault, "input_vault");

  const makerTokens = readTokenAccount(ctx.store, makerInputAta, "maker_input_ata");
  ensureTokenAccount(makerTokens, { mint: order.inputMint, authority: maker }, "maker_input_ata");

  const refund = order.remainingInputAmount;
  const tip = closeOrderAndClaimTip(config, order, ctx.now);

  releaseFromVault(ctx.store, { vault: inputVault, to: makerInputAta, pdaAuthority, mint: order.inputMint, amount: refund });
  transferLamports(ctx.store, pdaAuthority, maker, tip);
  syncAuthorityBalance(config, ctx.store.lamports(pdaAuthority));
  saveGlobalConfig(ctx, globalConfigKey, config);

  emitOrderDisplay(ctx, orderKey, order);
  const reclaimed = ctx.store.close(orderKey, maker);

  ctx.log.info(
    { order: orderKey.toBase58(), refund: refund.toString(), tip: tip.toString(), reclaimed: reclaimed.toString() },
    "order_closed",
  );
});

/**
 * Local flash-fill walkthrough
 *
 * Runs a maker/taker round against the in-process processor: config and vault
 * setup, an order, a flash fill routed through a stand-in aggregator, then the
 * maker closing after the close delay and the admin withdrawing the host tip.
 * Prints the flash transaction as JSON and a tip audit after each phase.
 *
 * Usage: npm run simulate
 */

import { ACCOUNT_SIZE, AccountLayout, AccountState, TOKEN_PROGRAM_ID, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { PublicKey, TransactionInstruction } from "@solana/web3.js";
import { env } from "../config.js";
import { DISCRIMINATORS } from "../idl/coder.js";
import { logger } from "../logger.js";
import { AccountStore } from "../services/account_store.js";
import type { ProgramHandler } from "../services/builtin_programs.js";
import { tokenBalanceOrZero, transferTokens } from "../services/escrow_vault.js";
import { UpdateGlobalConfigMode } from "../services/global_config.js";
import {
  buildCloseOrderAndClaimTipIx,
  buildCreateOrderIx,
  buildCreateProgramAccountIx,
  buildFlashTakeOrderIxs,
  buildInitializeGlobalConfigIx,
  buildInitializeVaultIx,
  buildUpdateGlobalConfigIx,
  buildUpdateOrderIx,
  buildWithdrawHostTipIx,
  serializeInstruction,
} from "../services/instruction_builder.js";
import { TransactionProcessor, type TransactionResult } from "../services/processor.js";
import { auditTipAccounting } from "../services/tip_ledger.js";
import { PROGRAM_ID } from "../solana.js";
import { decodeGlobalConfig } from "../state/global_config.js";
import { decodeOrder, isOrderTerminal, type OrderRecord } from "../state/order.js";
import { derivePdaAuthority } from "../utils/pda.js";

const log = logger.child({ module: "simulate" });

const AGGREGATOR_PROGRAM_ID = PublicKey.unique();
const START = 1_700_000_000n;
const ORDER_RENT = 3_000_000n;

function seedTokenAccount(store: AccountStore, address: PublicKey, mint: PublicKey, owner: PublicKey, amount: bigint): void {
  const data = Buffer.alloc(ACCOUNT_SIZE);
  AccountLayout.encode(
    {
      mint,
      owner,
      amount,
      delegateOption: 0,
      delegate: PublicKey.default,
      state: AccountState.Initialized,
      isNativeOption: 0,
      isNative: 0n,
      delegatedAmount: 0n,
      closeAuthorityOption: 0,
      closeAuthority: PublicKey.default,
    },
    data,
  );
  store.set(address, { owner: TOKEN_PROGRAM_ID, lamports: 0n, data });
}

/**
 * Constant-price pool: keys [trader_in, pool_in, pool_out, trader_out, trader, pool], data [amount_in u64, amount_out u64].
 */
const aggregator: ProgramHandler = (ix, ctx) => {
  const [traderIn, poolIn, poolOut, traderOut, trader, pool] = ix.keys.map((k) => k.pubkey);
  if (!traderIn || !poolIn || !poolOut || !traderOut || !trader || !pool) throw new Error("aggregator_keys");

  transferTokens(ctx.store, { source: traderIn, destination: poolIn, authority: trader, amount: ix.data.readBigUInt64LE(0) });
  transferTokens(ctx.store, { source: poolOut, destination: traderOut, authority: pool, amount: ix.data.readBigUInt64LE(8) });
};

function aggregatorSwapIx(keys: PublicKey[], amountIn: bigint, amountOut: bigint): TransactionInstruction {
  const data = Buffer.alloc(16);
  data.writeBigUInt64LE(amountIn, 0);
  data.writeBigUInt64LE(amountOut, 8);
  return new TransactionInstruction({
    programId: AGGREGATOR_PROGRAM_ID,
    keys: keys.map((pubkey) => ({ pubkey, isSigner: false, isWritable: true })),
    data,
  });
}

function liveOrders(store: AccountStore): Array<{ address: PublicKey; order: OrderRecord }> {
  return store
    .addresses()
    .map((address) => ({ address, account: store.getRequired(address, "order") }))
    .filter(({ account }) => account.owner.equals(PROGRAM_ID) && account.data.subarray(0, 8).equals(DISCRIMINATORS.Order))
    .map(({ address, account }) => ({ address, order: decodeOrder(account.data) }));
}

function audit(store: AccountStore, globalConfig: PublicKey, phase: string): void {
  const config = decodeGlobalConfig(store.getRequired(globalConfig, "global_config").data);
  const orders = liveOrders(store);
  const result = auditTipAccounting(config, orders.map((o) => o.order));

  log.info(
    {
      phase,
      expectedTotal: result.expectedTotal.toString(),
      recordedTotal: result.recordedTotal.toString(),
      consistent: result.consistent,
      openOrders: orders.filter((o) => !isOrderTerminal(o.order)).length,
    },
    "tip_audit",
  );
  if (!result.consistent) throw new Error(`tip ledger drifted after ${phase}`);
}

function mustSucceed(result: TransactionResult, step: string): void {
  if (!result.ok) {
    throw new Error(`${step} failed at instruction ${result.instructionIndex}: ${result.error.message}`);
  }
  log.info({ step, events: result.events.length }, "step_ok");
}

async function main() {
  const store = new AccountStore();
  let clock = START;
  const processor = new TransactionProcessor(store, { clock: () => clock });
  processor.registerProgram(AGGREGATOR_PROGRAM_ID, aggregator);

  const admin = PublicKey.unique();
  const maker = PublicKey.unique();
  const taker = PublicKey.unique();
  const pool = PublicKey.unique();
  const globalConfig = PublicKey.unique();
  const order = PublicKey.unique();
  const inputMint = PublicKey.unique();
  const outputMint = PublicKey.unique();
  const [pdaAuthority] = derivePdaAuthority(PROGRAM_ID, globalConfig);

  for (const wallet of [admin, maker, taker]) store.credit(wallet, 1_000_000_000n);

  const ata = (mint: PublicKey, owner: PublicKey) => getAssociatedTokenAddressSync(mint, owner, true);
  seedTokenAccount(store, ata(inputMint, maker), inputMint, maker, 1_000_000n);
  seedTokenAccount(store, ata(outputMint, maker), outputMint, maker, 0n);
  seedTokenAccount(store, ata(inputMint, taker), inputMint, taker, 0n);
  seedTokenAccount(store, ata(outputMint, taker), outputMint, taker, 0n);
  seedTokenAccount(store, ata(inputMint, pool), inputMint, pool, 0n);
  seedTokenAccount(store, ata(outputMint, pool), outputMint, pool, 10_000_000n);

  // 1. config, vault, fees
  mustSucceed(
    processor.processTransaction({
      instructions: [
        buildCreateProgramAccountIx({ payer: admin, account: globalConfig, kind: "global_config" }),
        buildInitializeGlobalConfigIx({ adminAuthority: admin, globalConfig }),
        buildInitializeVaultIx({ adminAuthority: admin, globalConfig, mint: inputMint }),
        buildUpdateGlobalConfigIx({
          adminAuthority: admin,
          globalConfig,
          mode: UpdateGlobalConfigMode.UpdateHostFeeBps,
          value: { kind: "u16", value: 250 },
        }),
        buildUpdateGlobalConfigIx({
          adminAuthority: admin,
          globalConfig,
          mode: UpdateGlobalConfigMode.UpdateOrderCloseDelaySeconds,
          value: { kind: "u64", value: BigInt(env.DEFAULT_CLOSE_DELAY_SEC) },
        }),
      ],
      signers: [admin, globalConfig],
    }),
    "setup",
  );

  // 2. maker escrows 1_000_000 input for at least 2_000_000 output
  mustSucceed(
    processor.processTransaction({
      instructions: [
        buildCreateProgramAccountIx({ payer: maker, account: order, kind: "order", lamports: ORDER_RENT }),
        buildCreateOrderIx({
          maker,
          globalConfig,
          order,
          inputMint,
          outputMint,
          makerAta: ata(inputMint, maker),
          inputAmount: 1_000_000n,
          outputAmount: 2_000_000n,
        }),
        buildUpdateOrderIx({ maker, globalConfig, order, mode: 0, value: Buffer.from([1]) }),
      ],
      signers: [maker, order],
    }),
    "create_order",
  );

  // 3. taker borrows half the input, sells it on the pool, repays the maker
  const { start, end } = buildFlashTakeOrderIxs({
    taker,
    maker,
    globalConfig,
    order,
    inputMint,
    outputMint,
    takerInputAta: ata(inputMint, taker),
    takerOutputAta: ata(outputMint, taker),
    inputAmount: 500_000n,
    minOutputAmount: 1_000_000n,
    tipAmountPermissionlessTaking: 5_000n,
  });
  const swap = aggregatorSwapIx(
    [ata(inputMint, taker), ata(inputMint, pool), ata(outputMint, pool), ata(outputMint, taker), taker, pool],
    500_000n,
    1_050_000n,
  );
  const flashTx = [start, swap, end];
  log.info({ instructions: flashTx.map(serializeInstruction) }, "flash_transaction");

  mustSucceed(processor.processTransaction({ instructions: flashTx, signers: [taker] }), "flash_fill");
  log.info(
    {
      makerOutput: tokenBalanceOrZero(store, ata(outputMint, maker)).toString(),
      takerProfit: tokenBalanceOrZero(store, ata(outputMint, taker)).toString(),
      authorityLamports: store.lamports(pdaAuthority).toString(),
    },
    "after_flash_fill",
  );
  audit(store, globalConfig, "flash_fill");

  // 4. maker closes once the delay has passed, admin sweeps the host tip
  clock += BigInt(env.DEFAULT_CLOSE_DELAY_SEC);
  mustSucceed(
    processor.processTransaction({
      instructions: [
        buildCloseOrderAndClaimTipIx({
          maker,
          globalConfig,
          order,
          inputMint,
          outputMint,
          makerInputAta: ata(inputMint, maker),
        }),
        buildWithdrawHostTipIx({ adminAuthority: admin, globalConfig }),
      ],
      signers: [maker, admin],
    }),
    "close_and_withdraw",
  );
  audit(store, globalConfig, "close_and_withdraw");

  log.info(
    {
      makerInputRefund: tokenBalanceOrZero(store, ata(inputMint, maker)).toString(),
      makerLamports: store.lamports(maker).toString(),
      adminLamports: store.lamports(admin).toString(),
    },
    "final_balances",
  );
}

main()
  .then(() => {
    log.info("simulation complete");
    process.exit(0);
  })
  .catch((err) => {
    log.error({ err }, "simulation failed");
    process.exit(1);
  });

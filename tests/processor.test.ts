import { NATIVE_MINT } from "@solana/spl-token";
import { ComputeBudgetProgram, PublicKey, TransactionInstruction } from "@solana/web3.js";
import { beforeEach, describe, expect, it } from "vitest";
import type { ProgramHandler } from "../src/services/builtin_programs.js";
import { UpdateGlobalConfigMode } from "../src/services/global_config.js";
import {
  buildAssertUserSwapBalancesIxs,
  buildCloseOrderAndClaimTipIx,
  buildFlashTakeOrderIxs,
  buildLogUserSwapBalancesIxs,
  buildTakeOrderIx,
  buildUpdateGlobalConfigAdminIx,
  buildUpdateGlobalConfigIx,
  buildUpdateOrderIx,
  buildWithdrawHostTipIx,
} from "../src/services/instruction_builder.js";
import type { PermissionCheck, PermissionGrant, PermissionRouter } from "../src/services/permission_router.js";
import { auditTipAccounting } from "../src/services/tip_ledger.js";
import { PROGRAM_ID } from "../src/solana.js";
import { OrderStatus } from "../src/state/order.js";
import { deriveEscrowVault } from "../src/utils/pda.js";
import {
  START_TIME,
  STARTING_LAMPORTS,
  ORDER_RENT,
  createHarness,
  expectFailure,
  expectOk,
  mintTokens,
  newTaker,
  openOrder,
  putTokenAccount,
  setHostFee,
  takeParams,
  tokenBalance,
  type Harness,
  type OpenedOrder,
  type Taker,
} from "./helpers.js";

const swapProgram = PublicKey.unique();
const noopProgram = PublicKey.unique();

/** Stand-in for an aggregator: mints `amount` into keys[0]. */
const mintingSwap: ProgramHandler = (ix, ctx) => {
  const destination = ix.keys[0];
  if (!destination) throw new Error("swap_destination_missing");
  mintTokens(ctx.store, destination.pubkey, ix.data.readBigUInt64LE(0));
};

function swapIx(destination: PublicKey, amount: bigint): TransactionInstruction {
  const data = Buffer.alloc(8);
  data.writeBigUInt64LE(amount);
  return new TransactionInstruction({
    programId: swapProgram,
    keys: [{ pubkey: destination, isSigner: false, isWritable: true }],
    data,
  });
}

const noopIx = () => new TransactionInstruction({ programId: noopProgram, keys: [], data: Buffer.alloc(0) });

function withPrograms(h: Harness): Harness {
  h.processor.registerProgram(swapProgram, mintingSwap);
  h.processor.registerProgram(noopProgram, () => undefined);
  return h;
}

const vaultOf = (h: Harness) => deriveEscrowVault(PROGRAM_ID, h.globalConfig, h.inputMint)[0];

describe("take_order", () => {
  let h: Harness;
  beforeEach(() => {
    h = withPrograms(createHarness());
  });

  it("settles partial fills, tips and closing end to end", () => {
    setHostFee(h, 250);
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);

    const events = expectOk(h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n, tip: 101n }))], [t.taker]));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ name: "OrderDisplay", remainingInputAmount: 500n, filledOutputAmount: 1000n, tipAmount: 98n });

    expect(tokenBalance(h.store, o.makerOutputAta)).toBe(1000n);
    expect(tokenBalance(h.store, t.takerInputAta)).toBe(500n);
    expect(tokenBalance(h.store, vaultOf(h))).toBe(500n);
    expect(h.store.lamports(h.pdaAuthority)).toBe(101n);
    expect(h.store.lamports(t.taker)).toBe(STARTING_LAMPORTS - 101n);
    expect(h.readConfig()).toMatchObject({ hostTipAmount: 3n, totalTipAmount: 101n, pdaAuthorityPreviousLamportsBalance: 101n });

    expectOk(h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }))], [t.taker]));
    const filled = h.readOrder(o.order);
    expect(filled.status).toBe(OrderStatus.Filled);
    expect(filled.numberOfFills).toBe(2n);
    expect(tokenBalance(h.store, o.makerOutputAta)).toBe(2000n);

    expectOk(
      h.run(
        [
          buildCloseOrderAndClaimTipIx({
            maker: o.maker,
            globalConfig: h.globalConfig,
            order: o.order,
            inputMint: h.inputMint,
            outputMint: h.outputMint,
            makerInputAta: o.makerInputAta,
          }),
        ],
        [o.maker],
      ),
    );
    expect(h.store.exists(o.order)).toBe(false);
    expect(h.store.lamports(o.maker)).toBe(STARTING_LAMPORTS + 98n);
    expect(h.store.lamports(h.pdaAuthority)).toBe(3n);
    expect(h.readConfig().totalTipAmount).toBe(3n);

    expectOk(h.run([buildWithdrawHostTipIx({ adminAuthority: h.admin, globalConfig: h.globalConfig })], [h.admin]));
    expect(h.store.lamports(h.admin)).toBe(STARTING_LAMPORTS + 3n);
    expect(h.store.lamports(h.pdaAuthority)).toBe(0n);
    expect(h.readConfig()).toMatchObject({ hostTipAmount: 0n, totalTipAmount: 0n });
  });

  it("rolls back every instruction when one fails", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);

    const result = h.run(
      [
        buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n })),
        buildTakeOrderIx(takeParams(h, o, t, { input: 600n, minOutput: 1200n })),
      ],
      [t.taker],
    );

    expectFailure(result, "OrderInputAmountTooLarge", 1);
    expect(h.readOrder(o.order).remainingInputAmount).toBe(1000n);
    expect(tokenBalance(h.store, vaultOf(h))).toBe(1000n);
    expect(tokenBalance(h.store, t.takerOutputAta)).toBe(2000n);
    expect(tokenBalance(h.store, t.takerInputAta)).toBe(0n);
  });

  it("requires the taker's signature", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    expectFailure(h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }))], []), "MissingSigner", 0);
  });

  it("rejects a price below the maker's", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    expectFailure(
      h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 999n }))], [t.taker]),
      "OrderOutputAmountInvalid",
      0,
    );
  });

  it("requires a maker output account for non-native output", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    const ix = buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));
    ix.keys[11] = { pubkey: PROGRAM_ID, isSigner: false, isWritable: false };

    expectFailure(h.run([ix], [t.taker]), "MakerOutputAtaRequired", 0);
  });

  it("restricts takers to the order's counterparty", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    expectOk(
      h.run(
        [
          buildUpdateOrderIx({
            maker: o.maker,
            globalConfig: h.globalConfig,
            order: o.order,
            mode: 1,
            value: PublicKey.unique().toBuffer(),
          }),
        ],
        [o.maker],
      ),
    );

    expectFailure(
      h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }))], [t.taker]),
      "CounterpartyDisallowed",
      0,
    );
  });

  it("refuses permissionless fills unless the maker enabled them", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n, permissionless: false });
    const t = newTaker(h, 2000n);
    expectFailure(
      h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }))], [t.taker]),
      "PermissionRequiredPermissionlessNotEnabled",
      0,
    );
  });
});

describe("native output", () => {
  it("unwraps the maker's output into lamports", () => {
    const h = createHarness({}, { output: NATIVE_MINT });
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);

    expectOk(
      h.run(
        [buildTakeOrderIx({ ...takeParams(h, o, t, { input: 500n, minOutput: 1000n }), unwrapNativeOutput: true })],
        [t.taker],
      ),
    );

    expect(h.store.lamports(o.maker)).toBe(STARTING_LAMPORTS - ORDER_RENT + 1000n);
    expect(tokenBalance(h.store, t.takerOutputAta)).toBe(1000n);
    expect(h.store.lamports(t.takerOutputAta)).toBe(1000n);
  });
});

describe("closing", () => {
  it("waits for the configured delay before refunding", () => {
    const h = createHarness();
    expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateOrderCloseDelaySeconds, { kind: "u64", value: 100n }));
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const close = buildCloseOrderAndClaimTipIx({
      maker: o.maker,
      globalConfig: h.globalConfig,
      order: o.order,
      inputMint: h.inputMint,
      outputMint: h.outputMint,
      makerInputAta: o.makerInputAta,
    });

    h.setTime(START_TIME + 99n);
    expectFailure(h.run([close], [o.maker]), "NotEnoughTimePassedSinceLastUpdate", 0);

    h.setTime(START_TIME + 100n);
    const events = expectOk(h.run([close], [o.maker]));
    expect(events[0]).toMatchObject({ name: "OrderDisplay", status: OrderStatus.Cancelled });
    expect(tokenBalance(h.store, o.makerInputAta)).toBe(1000n);
    expect(h.store.exists(o.order)).toBe(false);
    expect(h.store.lamports(o.maker)).toBe(STARTING_LAMPORTS);
  });

  it("only lets the maker close", () => {
    const h = createHarness();
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const intruder = PublicKey.unique();

    const close = buildCloseOrderAndClaimTipIx({
      maker: intruder,
      globalConfig: h.globalConfig,
      order: o.order,
      inputMint: h.inputMint,
      outputMint: h.outputMint,
      makerInputAta: o.makerInputAta,
    });
    expectFailure(h.run([close], [intruder]), "InvalidOrderOwner", 0);
  });
});

describe("kill switches", () => {
  it("emergency mode blocks new orders", () => {
    const h = createHarness();
    expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateEmergencyMode, { kind: "flag", value: true }));
    expect(() => openOrder(h, { inputAmount: 1000n, outputAmount: 2000n })).toThrow(
      "transaction failed at 1: EmergencyModeEnabled",
    );
  });

  it("new orders can be blocked on their own", () => {
    const h = createHarness();
    expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateBlockNewOrders, { kind: "flag", value: true }));
    expect(() => openOrder(h, { inputAmount: 1000n, outputAmount: 2000n })).toThrow(
      "transaction failed at 1: CreatingNewOrdersBlocked",
    );
  });

  it("order taking can be blocked", () => {
    const h = createHarness();
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateBlockOrderTaking, { kind: "flag", value: true }));

    expectFailure(
      h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }))], [t.taker]),
      "OrderTakingBlocked",
      0,
    );
  });

  it("flash taking can be blocked while regular taking continues", () => {
    const h = withPrograms(createHarness());
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateFlashTakeOrderBlocked, { kind: "flag", value: true }));

    const { start, end } = buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));
    expectFailure(h.run([start, end], [t.taker]), "FlashTakeOrderBlocked", 0);
    expectOk(h.run([buildTakeOrderIx(takeParams(h, o, t, { input: 500n, minOutput: 1000n }))], [t.taker]));
  });

  it("only the admin flips switches", () => {
    const h = createHarness();
    const other = PublicKey.unique();
    const ix = buildUpdateGlobalConfigIx({
      adminAuthority: other,
      globalConfig: h.globalConfig,
      mode: UpdateGlobalConfigMode.UpdateEmergencyMode,
      value: { kind: "flag", value: true },
    });
    expectFailure(h.run([ix], [other]), "InvalidAdminAuthority", 0);
  });
});

describe("admin rotation", () => {
  it("hands control to the cached admin once it signs", () => {
    const h = createHarness();
    const next = PublicKey.unique();
    expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateAdminAuthorityCached, { kind: "pubkey", value: next }));
    expect(h.readConfig().adminAuthority.equals(h.admin)).toBe(true);

    expectOk(h.run([buildUpdateGlobalConfigAdminIx({ adminAuthorityCached: next, globalConfig: h.globalConfig })], [next]));
    expect(h.readConfig().adminAuthority.equals(next)).toBe(true);

    expectFailure(
      h.updateConfig(UpdateGlobalConfigMode.UpdateHostFeeBps, { kind: "u16", value: 100 }),
      "InvalidAdminAuthority",
      0,
    );
  });
});

describe("flash_take_order", () => {
  let h: Harness;
  beforeEach(() => {
    h = withPrograms(createHarness());
  });

  it("lends the input and settles with the swap's output", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const { start, end } = buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));

    const events = expectOk(h.run([start, swapIx(t.takerOutputAta, 1000n), end], [t.taker]));
    expect(events).toHaveLength(1);

    const order = h.readOrder(o.order);
    expect(order.remainingInputAmount).toBe(500n);
    expect(order.flashIxLock).toBe(0);
    expect(order.flashStartTakerOutputBalance).toBe(0n);
    expect(tokenBalance(h.store, o.makerOutputAta)).toBe(1000n);
    expect(tokenBalance(h.store, t.takerInputAta)).toBe(500n);
    expect(tokenBalance(h.store, t.takerOutputAta)).toBe(0n);
  });

  it("fails and rolls back when the swap comes up short", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const { start, end } = buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));

    expectFailure(h.run([start, swapIx(t.takerOutputAta, 400n), end], [t.taker]), "OrderOutputAmountInvalid", 2);
    expect(h.readOrder(o.order).flashIxLock).toBe(0);
    expect(tokenBalance(h.store, vaultOf(h))).toBe(1000n);
    expect(tokenBalance(h.store, t.takerInputAta)).toBe(0n);
  });

  it("needs both halves", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    const { start, end } = buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));

    expectFailure(h.run([start], [t.taker]), "FlashIxsNotEnded", 0);
    expectFailure(h.run([end], [t.taker]), "FlashIxsNotStarted", 0);
    expectFailure(h.run([start, start, end], [t.taker]), "FlashTxWithUnexpectedIxs", 0);
  });

  it("needs identical halves", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    const params = takeParams(h, o, t, { input: 500n, minOutput: 1000n });
    const { start } = buildFlashTakeOrderIxs(params);

    const higher = buildFlashTakeOrderIxs({ ...params, minOutputAmount: 1200n }).end;
    expectFailure(h.run([start, higher], [t.taker]), "FlashIxsArgsMismatch", 0);

    const elsewhere = buildFlashTakeOrderIxs({ ...params, takerInputAta: PublicKey.unique() }).end;
    expectFailure(h.run([start, elsewhere], [t.taker]), "FlashIxsAccountMismatch", 0);
  });

  it("checks the maker's output account before lending", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const { start, end } = buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));
    start.keys[11] = { pubkey: PROGRAM_ID, isSigner: false, isWritable: false };
    end.keys[11] = { pubkey: PROGRAM_ID, isSigner: false, isWritable: false };

    expectFailure(h.run([start], [t.taker]), "MakerOutputAtaRequired", 0);
    expectFailure(h.run([start, swapIx(t.takerOutputAta, 1000n), end], [t.taker]), "MakerOutputAtaRequired", 0);
    expect(tokenBalance(h.store, t.takerInputAta)).toBe(0n);
  });

  it("cannot be invoked from another program", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 2000n);
    const { start, end } = buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 500n, minOutput: 1000n }));
    const relay = PublicKey.unique();
    h.processor.registerProgram(relay, (_ix, ctx) => ctx.invoke(start));

    const relayIx = new TransactionInstruction({ programId: relay, keys: [], data: Buffer.alloc(0) });
    expectFailure(h.run([relayIx, end], [t.taker]), "CPINotAllowed", 0);
  });
});

describe("flash transaction surroundings", () => {
  let h: Harness;
  beforeEach(() => {
    h = withPrograms(createHarness());
  });

  const flashPair = (o: OpenedOrder, t: Taker) =>
    buildFlashTakeOrderIxs(takeParams(h, o, t, { input: 250n, minOutput: 500n }));

  it("rejects foreign programs before the start", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const { start, end } = flashPair(o, t);

    expectFailure(h.run([noopIx(), start, swapIx(t.takerOutputAta, 500n), end], [t.taker]), "FlashTxWithUnexpectedIxs", 1);
    expect(h.readOrder(o.order).remainingInputAmount).toBe(1000n);
  });

  it("rejects another call of this program after the end", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const { start, end } = flashPair(o, t);
    const take = buildTakeOrderIx(takeParams(h, o, t, { input: 250n, minOutput: 500n }));

    expectFailure(h.run([start, swapIx(t.takerOutputAta, 500n), end, take], [t.taker]), "FlashTxWithUnexpectedIxs", 0);
    expect(h.readOrder(o.order).remainingInputAmount).toBe(1000n);
    expect(tokenBalance(h.store, t.takerInputAta)).toBe(0n);
  });

  it("rejects a second flash pair in the same transaction", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const first = flashPair(o, t);
    const second = flashPair(o, t);

    expectFailure(
      h.run(
        [first.start, swapIx(t.takerOutputAta, 500n), first.end, second.start, swapIx(t.takerOutputAta, 500n), second.end],
        [t.taker],
      ),
      "FlashTxWithUnexpectedIxs",
      0,
    );
  });

  it("accepts compute budget instructions around the pair", () => {
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 0n);
    const { start, end } = flashPair(o, t);

    const budget = ComputeBudgetProgram.setComputeUnitLimit({ units: 400_000 });
    const price = ComputeBudgetProgram.setComputeUnitPrice({ microLamports: 1 });
    expectOk(h.run([budget, start, swapIx(t.takerOutputAta, 500n), end, price], [t.taker]));
    expect(h.readOrder(o.order).remainingInputAmount).toBe(750n);
  });
});

describe("interleaved fills", () => {
  it("keeps the tip ledger reconciled across orders and outside transfers", () => {
    const h = withPrograms(createHarness());
    setHostFee(h, 250);
    const a = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const b = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n });
    const t = newTaker(h, 4000n);

    const expectReconciled = () => {
      const config = h.readConfig();
      expect(auditTipAccounting(config, [h.readOrder(a.order), h.readOrder(b.order)]).consistent).toBe(true);
      expect(config.pdaAuthorityPreviousLamportsBalance).toBe(h.store.lamports(h.pdaAuthority));
    };

    const fills = [
      { order: a, flash: false, input: 200n, tip: 40n },
      { order: b, flash: true, input: 300n, tip: 20n },
      { order: a, flash: true, input: 100n, tip: 101n },
      { order: b, flash: false, input: 700n, tip: 9n },
    ];

    for (const fill of fills) {
      // unattributed lamports land on the authority between fills
      h.store.credit(h.pdaAuthority, 7n);

      const params = takeParams(h, fill.order, t, { input: fill.input, minOutput: fill.input * 2n, tip: fill.tip });
      if (fill.flash) {
        const { start, end } = buildFlashTakeOrderIxs(params);
        expectOk(h.run([start, swapIx(t.takerOutputAta, fill.input * 2n), end], [t.taker]));
      } else {
        expectOk(h.run([buildTakeOrderIx(params)], [t.taker]));
      }
      expectReconciled();
    }

    expect(h.readConfig()).toMatchObject({ totalTipAmount: 170n, hostTipAmount: 6n, pdaAuthorityPreviousLamportsBalance: 198n });
    expect(h.readOrder(a.order).tipAmount).toBe(137n);
    expect(h.readOrder(b.order)).toMatchObject({ tipAmount: 27n, status: OrderStatus.Filled });

    // an outside debit below the snapshot fails the next fill even though its tip arrives
    h.store.debit(h.pdaAuthority, 1n);
    const take = buildTakeOrderIx(takeParams(h, a, t, { input: 100n, minOutput: 200n, tip: 1n }));
    expectFailure(h.run([take], [t.taker]), "InvalidTipTransferAmount", 0);
    expect(h.store.lamports(h.pdaAuthority)).toBe(197n);
    expect(h.readOrder(a.order).remainingInputAmount).toBe(700n);
    expect(h.readConfig().pdaAuthorityPreviousLamportsBalance).toBe(198n);
  });
});

describe("permissioned taking", () => {
  class FixedFeeRouter implements PermissionRouter {
    constructor(
      private readonly accepted: boolean,
      private readonly fees: bigint,
      private readonly paid: bigint,
    ) {}

    checkPermission(check: PermissionCheck): PermissionGrant {
      check.store.credit(check.pdaAuthority, this.paid);
      return { accepted: this.accepted, fees: this.fees };
    }
  }

  const take = (router: PermissionRouter) => {
    const h = createHarness({ permissionRouter: router });
    const o = openOrder(h, { inputAmount: 1000n, outputAmount: 2000n, permissionless: false });
    const t = newTaker(h, 2000n);
    const ix = buildTakeOrderIx({ ...takeParams(h, o, t, { input: 500n, minOutput: 1000n }), permissioned: true });
    return { h, o, result: h.run([ix], [t.taker]) };
  };

  it("credits the router's fee as the fill's tip", () => {
    const { h, o, result } = take(new FixedFeeRouter(true, 500n, 500n));
    expectOk(result);
    expect(h.readOrder(o.order).tipAmount).toBe(500n);
    expect(h.readConfig()).toMatchObject({ totalTipAmount: 500n, pdaAuthorityPreviousLamportsBalance: 500n });
  });

  it("fails when the router declines", () => {
    expectFailure(take(new FixedFeeRouter(false, 0n, 0n)).result, "PermissionNotGranted", 0);
  });

  it("fails when the fee never arrived", () => {
    const { h, result } = take(new FixedFeeRouter(true, 500n, 0n));
    expectFailure(result, "InvalidTipTransferAmount", 0);
    expect(h.store.lamports(h.pdaAuthority)).toBe(0n);
  });
});

describe("swap balance bracketing", () => {
  let h: Harness;
  let user: PublicKey;
  let inputTa: PublicKey;
  let outputTa: PublicKey;

  beforeEach(() => {
    h = withPrograms(createHarness());
    user = PublicKey.unique();
    inputTa = PublicKey.unique();
    outputTa = PublicKey.unique();
    h.store.credit(user, STARTING_LAMPORTS);
    putTokenAccount(h.store, { address: inputTa, mint: h.inputMint, owner: user, amount: 1000n });
    putTokenAccount(h.store, { address: outputTa, mint: h.outputMint, owner: user, amount: 0n });
  });

  const logIxs = () =>
    buildLogUserSwapBalancesIxs({
      maker: user,
      inputMint: h.inputMint,
      outputMint: h.outputMint,
      inputTa,
      outputTa,
      swapProgramId: swapProgram,
    });

  it("logs the balance movement around a single swap", () => {
    const { start, end } = logIxs();
    const events = expectOk(h.run([start, swapIx(outputTa, 250n), end], [user]));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      name: "UserSwapBalanceDiffs",
      userLamportsBefore: STARTING_LAMPORTS,
      userLamportsAfter: STARTING_LAMPORTS,
      inputTaBalanceBefore: 1000n,
      inputTaBalanceAfter: 1000n,
      outputTaBalanceBefore: 0n,
      outputTaBalanceAfter: 250n,
    });
  });

  it("rejects anything but the swap between the halves", () => {
    const { start, end } = logIxs();
    expectFailure(h.run([start, noopIx(), end], [user]), "FlashTxWithUnexpectedIxs", 0);
  });

  it("asserts the minimum output", () => {
    const tooMuch = buildAssertUserSwapBalancesIxs({ maker: user, inputTa, outputTa, maxInputAmountChange: 0n, minOutputAmountChange: 251n });
    expectFailure(h.run([tooMuch.start, swapIx(outputTa, 250n), tooMuch.end], [user]), "UserSwapOutputChangeTooLow", 2);

    const enough = buildAssertUserSwapBalancesIxs({ maker: user, inputTa, outputTa, maxInputAmountChange: 0n, minOutputAmountChange: 250n });
    expectOk(h.run([enough.start, noopIx(), swapIx(outputTa, 250n), enough.end], [user]));
  });

  it("rejects a repeated start", () => {
    const { start, end } = buildAssertUserSwapBalancesIxs({
      maker: user,
      inputTa,
      outputTa,
      maxInputAmountChange: 0n,
      minOutputAmountChange: 0n,
    });
    expectFailure(h.run([start, start, end], [user]), "FlashTxWithUnexpectedIxs", 0);
  });
});

describe("processor", () => {
  it("rejects instructions for unknown programs", () => {
    const h = createHarness();
    const ix = new TransactionInstruction({ programId: PublicKey.unique(), keys: [], data: Buffer.alloc(0) });
    expectFailure(h.run([ix], []), "UnsupportedInstruction", 0);
  });

  it("rethrows faults that are not settlement errors after restoring state", () => {
    const h = createHarness();
    const faulty = PublicKey.unique();
    h.processor.registerProgram(faulty, (_ix, ctx) => {
      ctx.store.credit(h.admin, 1n);
      throw new Error("program_crashed");
    });

    const ix = new TransactionInstruction({ programId: faulty, keys: [], data: Buffer.alloc(0) });
    expect(() => h.run([ix], [])).toThrow("program_crashed");
    expect(h.store.lamports(h.admin)).toBe(STARTING_LAMPORTS);
  });
});

import {
  ACCOUNT_SIZE,
  AccountLayout,
  AccountState,
  NATIVE_MINT,
  TOKEN_PROGRAM_ID,
  getAssociatedTokenAddressSync,
} from "@solana/spl-token";
import { PublicKey, type TransactionInstruction } from "@solana/web3.js";
import { expect } from "vitest";
import { AccountStore } from "../src/services/account_store.js";
import { tokenBalanceOrZero } from "../src/services/escrow_vault.js";
import {
  buildCreateOrderIx,
  buildCreateProgramAccountIx,
  buildInitializeGlobalConfigIx,
  buildInitializeVaultIx,
  buildUpdateGlobalConfigIx,
  buildUpdateOrderIx,
  type TakeOrderIxParams,
} from "../src/services/instruction_builder.js";
import { TransactionProcessor, type ProcessorOptions, type TransactionResult } from "../src/services/processor.js";
import { UpdateGlobalConfigMode, type GlobalConfigValue } from "../src/services/global_config.js";
import { decodeGlobalConfig, emptyGlobalConfig, type GlobalConfigRecord } from "../src/state/global_config.js";
import { decodeOrder, emptyOrder, type OrderRecord } from "../src/state/order.js";
import { SettlementError, type SettlementErrorName } from "../src/errors.js";
import { createOrder } from "../src/services/orders.js";
import type { SettlementEvent } from "../src/types/events.js";
import { derivePdaAuthority } from "../src/utils/pda.js";
import { PROGRAM_ID } from "../src/solana.js";

/**
 * Name of the SettlementError thrown by fn, or null when it returns.
 */
export function errorName(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (e) {
    return e instanceof SettlementError ? e.errorName : `unexpected:${String(e)}`;
  }
}

export function makeOrder(overrides: { input?: bigint; output?: bigint; now?: bigint } = {}): OrderRecord {
  const order = emptyOrder();
  createOrder(order, {
    globalConfig: PublicKey.unique(),
    maker: PublicKey.unique(),
    inputMint: PublicKey.unique(),
    inputMintProgramId: TOKEN_PROGRAM_ID,
    outputMint: PublicKey.unique(),
    outputMintProgramId: TOKEN_PROGRAM_ID,
    inputAmount: overrides.input ?? 1000n,
    outputAmount: overrides.output ?? 2000n,
    orderType: 0,
    inVaultBump: 255,
    now: overrides.now ?? 0n,
  });
  return order;
}

export function makeConfig(hostFeeBps = 0): GlobalConfigRecord {
  const config = emptyGlobalConfig();
  config.hostFeeBps = hostFeeBps;
  return config;
}

export const START_TIME = 1_700_000_000n;
export const ORDER_RENT = 3_000_000n;
export const STARTING_LAMPORTS = 1_000_000_000n;

export function putTokenAccount(
  store: AccountStore,
  p: { address: PublicKey; mint: PublicKey; owner: PublicKey; amount: bigint },
): void {
  const native = p.mint.equals(NATIVE_MINT);
  const data = Buffer.alloc(ACCOUNT_SIZE);
  AccountLayout.encode(
    {
      mint: p.mint,
      owner: p.owner,
      amount: p.amount,
      delegateOption: 0,
      delegate: PublicKey.default,
      state: AccountState.Initialized,
      isNativeOption: native ? 1 : 0,
      isNative: 0n,
      delegatedAmount: 0n,
      closeAuthorityOption: 0,
      closeAuthority: PublicKey.default,
    },
    data,
  );
  store.set(p.address, { owner: TOKEN_PROGRAM_ID, lamports: native ? p.amount : 0n, data });
}

/**
 * Raise a token account's balance as a mint would (lamports follow for WSOL).
 */
export function mintTokens(store: AccountStore, address: PublicKey, amount: bigint): void {
  const account = store.getRequired(address, "mint_to");
  const raw = AccountLayout.decode(account.data);
  putTokenAccount(store, { address, mint: raw.mint, owner: raw.owner, amount: raw.amount + amount });
}

export const tokenBalance = (store: AccountStore, address: PublicKey) => tokenBalanceOrZero(store, address);

export function expectOk(result: TransactionResult): SettlementEvent[] {
  if (!result.ok) throw new Error(`transaction failed at ${result.instructionIndex}: ${result.error.message}`);
  return result.events;
}

export function expectFailure(result: TransactionResult, name: SettlementErrorName, instructionIndex?: number): void {
  expect(result.ok).toBe(false);
  if (result.ok) return;
  expect(result.error.errorName).toBe(name);
  if (instructionIndex !== undefined) expect(result.instructionIndex).toBe(instructionIndex);
}

export type Harness = {
  store: AccountStore;
  processor: TransactionProcessor;
  admin: PublicKey;
  globalConfig: PublicKey;
  pdaAuthority: PublicKey;
  inputMint: PublicKey;
  outputMint: PublicKey;
  setTime: (t: bigint) => void;
  run: (instructions: TransactionInstruction[], signers: PublicKey[]) => TransactionResult;
  readOrder: (order: PublicKey) => OrderRecord;
  readConfig: () => GlobalConfigRecord;
  updateConfig: (mode: number, value: GlobalConfigValue) => TransactionResult;
};

export function createHarness(
  options: Omit<ProcessorOptions, "clock"> = {},
  mints: { input?: PublicKey; output?: PublicKey } = {},
): Harness {
  const store = new AccountStore();
  let time = START_TIME;
  const processor = new TransactionProcessor(store, { ...options, clock: () => time });

  const admin = PublicKey.unique();
  const globalConfig = PublicKey.unique();
  const inputMint = mints.input ?? PublicKey.unique();
  const outputMint = mints.output ?? PublicKey.unique();
  const [pdaAuthority] = derivePdaAuthority(PROGRAM_ID, globalConfig);
  store.credit(admin, STARTING_LAMPORTS);

  const run = (instructions: TransactionInstruction[], signers: PublicKey[]) =>
    processor.processTransaction({ instructions, signers });

  expectOk(
    run(
      [
        buildCreateProgramAccountIx({ payer: admin, account: globalConfig, kind: "global_config" }),
        buildInitializeGlobalConfigIx({ adminAuthority: admin, globalConfig }),
        buildInitializeVaultIx({ adminAuthority: admin, globalConfig, mint: inputMint }),
      ],
      [admin, globalConfig],
    ),
  );

  return {
    store,
    processor,
    admin,
    globalConfig,
    pdaAuthority,
    inputMint,
    outputMint,
    setTime: (t) => {
      time = t;
    },
    run,
    readOrder: (order) => decodeOrder(store.getRequired(order, "order").data),
    readConfig: () => decodeGlobalConfig(store.getRequired(globalConfig, "global_config").data),
    updateConfig: (mode, value) =>
      run([buildUpdateGlobalConfigIx({ adminAuthority: admin, globalConfig, mode, value })], [admin]),
  };
}

export type OpenedOrder = {
  maker: PublicKey;
  order: PublicKey;
  makerInputAta: PublicKey;
  makerOutputAta: PublicKey;
};

export function openOrder(
  h: Harness,
  p: { inputAmount: bigint; outputAmount: bigint; permissionless?: boolean },
): OpenedOrder {
  const maker = PublicKey.unique();
  const order = PublicKey.unique();
  h.store.credit(maker, STARTING_LAMPORTS);

  const makerInputAta = getAssociatedTokenAddressSync(h.inputMint, maker, true);
  putTokenAccount(h.store, { address: makerInputAta, mint: h.inputMint, owner: maker, amount: p.inputAmount });

  const makerOutputAta = getAssociatedTokenAddressSync(h.outputMint, maker, true);
  if (!h.outputMint.equals(NATIVE_MINT)) {
    putTokenAccount(h.store, { address: makerOutputAta, mint: h.outputMint, owner: maker, amount: 0n });
  }

  const instructions = [
    buildCreateProgramAccountIx({ payer: maker, account: order, kind: "order", lamports: ORDER_RENT }),
    buildCreateOrderIx({
      maker,
      globalConfig: h.globalConfig,
      order,
      inputMint: h.inputMint,
      outputMint: h.outputMint,
      makerAta: makerInputAta,
      inputAmount: p.inputAmount,
      outputAmount: p.outputAmount,
    }),
  ];
  if (p.permissionless ?? true) {
    instructions.push(
      buildUpdateOrderIx({ maker, globalConfig: h.globalConfig, order, mode: 0, value: Buffer.from([1]) }),
    );
  }

  expectOk(h.run(instructions, [maker, order]));
  return { maker, order, makerInputAta, makerOutputAta };
}

export type Taker = {
  taker: PublicKey;
  takerInputAta: PublicKey;
  takerOutputAta: PublicKey;
};

export function newTaker(h: Harness, outputBalance: bigint): Taker {
  const taker = PublicKey.unique();
  h.store.credit(taker, STARTING_LAMPORTS);

  const takerInputAta = getAssociatedTokenAddressSync(h.inputMint, taker, true);
  const takerOutputAta = getAssociatedTokenAddressSync(h.outputMint, taker, true);
  putTokenAccount(h.store, { address: takerInputAta, mint: h.inputMint, owner: taker, amount: 0n });
  putTokenAccount(h.store, { address: takerOutputAta, mint: h.outputMint, owner: taker, amount: outputBalance });

  return { taker, takerInputAta, takerOutputAta };
}

export function takeParams(
  h: Harness,
  o: OpenedOrder,
  t: Taker,
  amounts: { input: bigint; minOutput: bigint; tip?: bigint },
): TakeOrderIxParams {
  return {
    taker: t.taker,
    maker: o.maker,
    globalConfig: h.globalConfig,
    order: o.order,
    inputMint: h.inputMint,
    outputMint: h.outputMint,
    takerInputAta: t.takerInputAta,
    takerOutputAta: t.takerOutputAta,
    inputAmount: amounts.input,
    minOutputAmount: amounts.minOutput,
    tipAmountPermissionlessTaking: amounts.tip ?? 0n,
  };
}

export const setHostFee = (h: Harness, bps: number) =>
  expectOk(h.updateConfig(UpdateGlobalConfigMode.UpdateHostFeeBps, { kind: "u16", value: bps }));

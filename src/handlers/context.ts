import type { PublicKey, TransactionInstruction } from "@solana/web3.js";
import type { z } from "zod";
import type { Logger } from "../logger.js";
import type { AccountStore } from "../services/account_store.js";
import type { InstructionView } from "../services/flash_ixs.js";
import type { PermissionRouter } from "../services/permission_router.js";
import type { SettlementEvent } from "../types/events.js";
import { instructionAccounts, type InstructionName } from "../idl/coder.js";
import { ensure, fail } from "../errors.js";
import { decodeGlobalConfig, encodeGlobalConfig, type GlobalConfigRecord } from "../state/global_config.js";
import { decodeOrder, encodeOrder, type OrderRecord } from "../state/order.js";

export type HandlerContext = {
  store: AccountStore;
  programId: PublicKey;
  ix: TransactionInstruction;
  view: InstructionView;
  signers: readonly PublicKey[];
  now: bigint;
  permissionRouter: PermissionRouter | null;
  permissionRouterProgramId: PublicKey;
  log: Logger;
  emit: (event: SettlementEvent) => void;
};

export type Handler = {
  run: (ctx: HandlerContext, rawArgs: unknown) => void;
};

/**
 * Bind an args schema to a handler body; decoded args are validated before the body runs.
 */
export function defineHandler<S extends z.ZodTypeAny>(
  schema: S,
  handle: (ctx: HandlerContext, args: z.output<S>) => void,
): Handler {
  return {
    run(ctx, rawArgs) {
      const parsed = schema.safeParse(rawArgs);
      if (!parsed.success) fail("InvalidParameterType", parsed.error.issues[0]?.message ?? "invalid_args");
      handle(ctx, parsed.data);
    },
  };
}

export type ResolvedAccounts = Map<string, PublicKey | null>;

/**
 * Map the instruction's keys onto the IDL account names. An optional account
 * passed as the program id is absent. Declared signers must have signed.
 */
export function resolveAccounts(ctx: HandlerContext, name: InstructionName): ResolvedAccounts {
  const declared = instructionAccounts(name);
  ensure(ctx.ix.keys.length >= declared.length, "InvalidAccount", `not_enough_keys:${ctx.ix.keys.length}`);

  const out: ResolvedAccounts = new Map();
  declared.forEach((acc, i) => {
    const meta = ctx.ix.keys[i];
    if (!meta) fail("InvalidAccount", `missing_key:${acc.name}`);

    if (acc.optional && meta.pubkey.equals(ctx.programId)) {
      out.set(acc.name, null);
      return;
    }
    if (acc.signer) ensureSigner(ctx, meta.pubkey, acc.name);
    out.set(acc.name, meta.pubkey);
  });
  return out;
}

export function requiredKey(accounts: ResolvedAccounts, name: string): PublicKey {
  const key = accounts.get(name);
  if (!key) fail("InvalidAccount", `required:${name}`);
  return key;
}

export function optionalKey(accounts: ResolvedAccounts, name: string): PublicKey | null {
  return accounts.get(name) ?? null;
}

export function ensureSigner(ctx: HandlerContext, key: PublicKey, label: string): void {
  const meta = ctx.ix.keys.find((k) => k.pubkey.equals(key));
  ensure(
    meta !== undefined && meta.isSigner && ctx.signers.some((s) => s.equals(key)),
    "MissingSigner",
    `${label}:${key.toBase58()}`,
  );
}

export function ensureKey(actual: PublicKey, expected: PublicKey, label: string): void {
  ensure(actual.equals(expected), "InvalidAccount", `${label}:${actual.toBase58()}`);
}

// records

export function loadOrder(ctx: HandlerContext, address: PublicKey): OrderRecord {
  const account = ctx.store.getRequired(address, "order");
  ensure(account.owner.equals(ctx.programId), "InvalidAccount", "order_owner");
  return decodeOrder(account.data);
}

export function saveOrder(ctx: HandlerContext, address: PublicKey, order: OrderRecord): void {
  ctx.store.setData(address, encodeOrder(order));
}

export function loadGlobalConfig(ctx: HandlerContext, address: PublicKey): GlobalConfigRecord {
  const account = ctx.store.getRequired(address, "global_config");
  ensure(account.owner.equals(ctx.programId), "InvalidAccount", "global_config_owner");
  return decodeGlobalConfig(account.data);
}

export function saveGlobalConfig(ctx: HandlerContext, address: PublicKey, config: GlobalConfigRecord): void {
  ctx.store.setData(address, encodeGlobalConfig(config));
}

/**
 * Freshly allocated record owned by this program, all bytes zero.
 */
export function ensureZeroedAccount(ctx: HandlerContext, address: PublicKey, size: number, label: string): void {
  const account = ctx.store.getRequired(address, label);
  ensure(account.owner.equals(ctx.programId), "InvalidAccount", `${label}_owner`);
  ensure(account.data.length === size, "InvalidAccount", `${label}_size:${account.data.length}`);
  ensure(account.data.every((b) => b === 0), "AccountAlreadyInitialized", label);
}

export function emitOrderDisplay(ctx: HandlerContext, address: PublicKey, order: OrderRecord): void {
  ctx.emit({
    name: "OrderDisplay",
    order: address,
    status: order.status,
    initialInputAmount: order.initialInputAmount,
    expectedOutputAmount: order.expectedOutputAmount,
    remainingInputAmount: order.remainingInputAmount,
    filledOutputAmount: order.filledOutputAmount,
    numberOfFills: order.numberOfFills,
    tipAmount: order.tipAmount,
  });
}

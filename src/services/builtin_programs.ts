/**
 * Minimal emulation of the foreign programs settlement flows touch:
 * System (create account, transfer), Compute Budget (no-op), SPL Token and
 * Token-2022 (transfer, transfer-checked), Associated Token (create).
 */

import {
  ASSOCIATED_TOKEN_PROGRAM_ID,
  decodeInstruction,
  getAssociatedTokenAddressSync,
  isTransferCheckedInstruction,
  isTransferInstruction,
} from "@solana/spl-token";
import { SystemInstruction, type PublicKey, type TransactionInstruction } from "@solana/web3.js";
import type { AccountStore } from "./account_store.js";
import { ensure, fail } from "../errors.js";
import { createTokenAccount, readTokenAccount, transferLamports, transferTokens } from "./escrow_vault.js";

export type ProgramContext = {
  store: AccountStore;
  signers: readonly PublicKey[];
  /** Cross-program invocation; runs one stack level deeper. */
  invoke: (ix: TransactionInstruction) => void;
};

export type ProgramHandler = (ix: TransactionInstruction, ctx: ProgramContext) => void;

function ensureSigned(ix: TransactionInstruction, ctx: ProgramContext, key: PublicKey, label: string): void {
  const meta = ix.keys.find((k) => k.pubkey.equals(key));
  ensure(
    meta !== undefined && meta.isSigner && ctx.signers.some((s) => s.equals(key)),
    "MissingSigner",
    `${label}:${key.toBase58()}`,
  );
}

const reason = (e: unknown) => (e instanceof Error ? e.message || e.name : String(e));

export const systemProgram: ProgramHandler = (ix, ctx) => {
  let type: string;
  try {
    type = SystemInstruction.decodeInstructionType(ix);
  } catch (e) {
    fail("UnsupportedInstruction", `system:${reason(e)}`);
  }

  switch (type) {
    case "Create": {
      const p = SystemInstruction.decodeCreateAccount(ix);
      ensureSigned(ix, ctx, p.fromPubkey, "from");
      ensureSigned(ix, ctx, p.newAccountPubkey, "new_account");
      ctx.store.allocate(p.newAccountPubkey, p.programId, p.space);
      transferLamports(ctx.store, p.fromPubkey, p.newAccountPubkey, BigInt(p.lamports));
      return;
    }
    case "Transfer": {
      const p = SystemInstruction.decodeTransfer(ix);
      ensureSigned(ix, ctx, p.fromPubkey, "from");
      transferLamports(ctx.store, p.fromPubkey, p.toPubkey, BigInt(p.lamports));
      return;
    }
    default:
      fail("UnsupportedInstruction", `system:${type}`);
  }
};

export const computeBudgetProgram: ProgramHandler = () => {
  // limits and priority fees have no effect in-process
};

function decodeTokenInstruction(ix: TransactionInstruction): ReturnType<typeof decodeInstruction> {
  try {
    return decodeInstruction(ix, ix.programId);
  } catch (e) {
    fail("UnsupportedInstruction", `token:${reason(e)}`);
  }
}

export const tokenProgram: ProgramHandler = (ix, ctx) => {
  const decoded = decodeTokenInstruction(ix);

  if (isTransferInstruction(decoded)) {
    const { source, destination, owner } = decoded.keys;
    ensureSigned(ix, ctx, owner.pubkey, "owner");
    transferTokens(ctx.store, {
      source: source.pubkey,
      destination: destination.pubkey,
      authority: owner.pubkey,
      amount: decoded.data.amount,
    });
    return;
  }

  if (isTransferCheckedInstruction(decoded)) {
    const { source, mint, destination, owner } = decoded.keys;
    ensureSigned(ix, ctx, owner.pubkey, "owner");
    transferTokens(ctx.store, {
      source: source.pubkey,
      destination: destination.pubkey,
      authority: owner.pubkey,
      amount: decoded.data.amount,
      mint: mint.pubkey,
    });
    return;
  }

  fail("UnsupportedInstruction", `token:${decoded.data.instruction}`);
};

/**
 * keys: [payer, ata, owner, mint, system_program, token_program]; data [] create, [1] idempotent.
 */
export const associatedTokenProgram: ProgramHandler = (ix, ctx) => {
  ensure(ix.keys.length >= 6, "InvalidAccount", "ata_keys");
  const [payer, ata, owner, mint, , tokenProgramId] = ix.keys.map((k) => k.pubkey);
  if (!payer || !ata || !owner || !mint || !tokenProgramId) fail("InvalidAccount", "ata_keys");

  ensureSigned(ix, ctx, payer, "payer");
  const expected = getAssociatedTokenAddressSync(mint, owner, true, tokenProgramId, ASSOCIATED_TOKEN_PROGRAM_ID);
  ensure(ata.equals(expected), "InvalidAtaAddress", ata.toBase58());

  const idempotent = ix.data.length > 0 && ix.data[0] === 1;
  if (ctx.store.get(ata)?.data.length) {
    ensure(idempotent, "AccountAlreadyInitialized", ata.toBase58());
    const existing = readTokenAccount(ctx.store, ata, "ata");
    ensure(existing.owner.equals(owner) && existing.mint.equals(mint), "InvalidAtaAddress", "ata_mismatch");
    return;
  }

  createTokenAccount(ctx.store, { address: ata, mint, authority: owner, tokenProgram: tokenProgramId });
};

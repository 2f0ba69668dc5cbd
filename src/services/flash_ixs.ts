/**
 * Flash-fill pairing over the transaction's instruction list.
 *
 * A flash start must be followed by its end, and an end preceded by its
 * start, with no other instruction of this program in between. Both halves
 * carry identical accounts and args. Neither may run under CPI. Outside the
 * pair only compute-budget, token and associated-token instructions may run.
 */

import type { PublicKey, TransactionInstruction } from "@solana/web3.js";
import { ensure, fail } from "../errors.js";
import { FLASH_SURROUNDING_PROGRAM_IDS, TRANSACTION_LEVEL_STACK_HEIGHT } from "../solana.js";

export type InstructionView = {
  instructions: readonly TransactionInstruction[];
  currentIndex: number;
  stackHeight: number;
};

export type InstructionPair = {
  start: Buffer;
  end: Buffer;
};

export type PairedInstruction = {
  index: number;
  ix: TransactionInstruction;
};

const hasPrefix = (ix: TransactionInstruction, discriminator: Buffer) =>
  ix.data.length >= discriminator.length && ix.data.subarray(0, discriminator.length).equals(discriminator);

export function ensureTopLevelInvocation(view: InstructionView, programId: PublicKey): void {
  const current = view.instructions.at(view.currentIndex);
  ensure(current !== undefined && current.programId.equals(programId), "CPINotAllowed", "current_ix_not_this_program");
  ensure(view.stackHeight <= TRANSACTION_LEVEL_STACK_HEIGHT, "CPINotAllowed", `stack_height:${view.stackHeight}`);
}

/**
 * Every instruction in [from, to) must target an allow-listed program.
 */
function ensureSurroundingAllowed(
  instructions: readonly TransactionInstruction[],
  from: number,
  to: number,
  allowList: readonly PublicKey[],
): void {
  for (let i = from; i < to; i++) {
    const ix = instructions[i];
    if (ix === undefined) continue;
    ensure(
      allowList.some((p) => p.equals(ix.programId)),
      "FlashTxWithUnexpectedIxs",
      `index:${i} program:${ix.programId.toBase58()}`,
    );
  }
}

const isProgram = (ix: TransactionInstruction | undefined, programId: PublicKey) =>
  ix !== undefined && ix.programId.equals(programId);

/**
 * From a start instruction: the next instruction of this program must be the
 * end, and only allow-listed programs may run before the start or after the end.
 */
export function findPairedEnd(
  view: InstructionView,
  programId: PublicKey,
  pair: InstructionPair,
  allowList: readonly PublicKey[] = FLASH_SURROUNDING_PROGRAM_IDS,
): PairedInstruction {
  const { instructions, currentIndex } = view;
  ensureSurroundingAllowed(instructions, 0, currentIndex, allowList);

  let index = currentIndex + 1;
  while (index < instructions.length && !isProgram(instructions[index], programId)) index++;
  const ix = instructions.at(index);
  if (ix === undefined) fail("FlashIxsNotEnded");

  ensureSurroundingAllowed(instructions, index + 1, instructions.length, allowList);
  ensure(hasPrefix(ix, pair.end), "FlashTxWithUnexpectedIxs", `index:${index}`);
  return { index, ix };
}

/**
 * From an end instruction: the previous instruction of this program must be
 * the start, under the same allow-list for what surrounds the pair.
 */
export function findPairedStart(
  view: InstructionView,
  programId: PublicKey,
  pair: InstructionPair,
  allowList: readonly PublicKey[] = FLASH_SURROUNDING_PROGRAM_IDS,
): PairedInstruction {
  const { instructions, currentIndex } = view;
  ensureSurroundingAllowed(instructions, currentIndex + 1, instructions.length, allowList);

  let index = currentIndex - 1;
  while (index >= 0 && !isProgram(instructions[index], programId)) index--;
  const ix = instructions.at(index);
  if (index < 0 || ix === undefined) {
    ensureSurroundingAllowed(instructions, 0, currentIndex, allowList);
    fail("FlashIxsNotStarted");
  }
  ensureSurroundingAllowed(instructions, 0, index, allowList);

  ensure(hasPrefix(ix, pair.start), "FlashTxWithUnexpectedIxs", `index:${index}`);
  return { index, ix };
}

export function ensureSameAccounts(a: TransactionInstruction, b: TransactionInstruction): void {
  ensure(a.keys.length === b.keys.length, "FlashIxsAccountMismatch", `len:${a.keys.length}!=${b.keys.length}`);
  a.keys.forEach((meta, i) => {
    const other = b.keys[i];
    ensure(other !== undefined && meta.pubkey.equals(other.pubkey), "FlashIxsAccountMismatch", `index:${i}`);
  });
}

/**
 * Field-by-field comparison of decoded argument payloads.
 */
export function ensureSameArgs<T extends Record<string, bigint>>(a: T, b: T): void {
  for (const key of Object.keys(a)) {
    ensure(a[key] === b[key], "FlashIxsArgsMismatch", key);
  }
}

export function isPairDiscriminator(ix: TransactionInstruction, pair: InstructionPair): "start" | "end" | null {
  if (hasPrefix(ix, pair.start)) return "start";
  if (hasPrefix(ix, pair.end)) return "end";
  return null;
}

/**
 * Bracketing of a third-party swap between a start/end pair of this program.
 *
 * Strict sibling: start, exactly one swap-program instruction, end. Nothing else in between.
 * Ordering: one start before one end anywhere in the transaction, never repeated.
 */

import type { PublicKey } from "@solana/web3.js";
import { ensure, fail } from "../errors.js";
import {
  isPairDiscriminator,
  type InstructionPair,
  type InstructionView,
  type PairedInstruction,
} from "./flash_ixs.js";

export function findSiblingEnd(
  view: InstructionView,
  programId: PublicKey,
  swapProgramId: PublicKey,
  pair: InstructionPair,
): PairedInstruction {
  const { instructions, currentIndex } = view;
  let swaps = 0;

  for (let i = currentIndex + 1; i < instructions.length; i++) {
    const ix = instructions[i];
    if (ix === undefined) continue;

    if (ix.programId.equals(programId)) {
      ensure(isPairDiscriminator(ix, pair) === "end", "FlashTxWithUnexpectedIxs", `index:${i}`);
      ensure(swaps === 1, "FlashTxWithUnexpectedIxs", `swap_ixs:${swaps}`);
      return { index: i, ix };
    }

    ensure(ix.programId.equals(swapProgramId), "FlashTxWithUnexpectedIxs", `index:${i}`);
    swaps += 1;
    ensure(swaps === 1, "FlashTxWithUnexpectedIxs", `swap_ixs:${swaps}`);
  }

  fail("FlashIxsNotEnded");
}

export function findSiblingStart(
  view: InstructionView,
  programId: PublicKey,
  swapProgramId: PublicKey,
  pair: InstructionPair,
): PairedInstruction {
  const { instructions, currentIndex } = view;
  let swaps = 0;

  for (let i = currentIndex - 1; i >= 0; i--) {
    const ix = instructions[i];
    if (ix === undefined) continue;

    if (ix.programId.equals(programId)) {
      ensure(isPairDiscriminator(ix, pair) === "start", "FlashTxWithUnexpectedIxs", `index:${i}`);
      ensure(swaps === 1, "FlashTxWithUnexpectedIxs", `swap_ixs:${swaps}`);
      return { index: i, ix };
    }

    ensure(ix.programId.equals(swapProgramId), "FlashTxWithUnexpectedIxs", `index:${i}`);
    swaps += 1;
    ensure(swaps === 1, "FlashTxWithUnexpectedIxs", `swap_ixs:${swaps}`);
  }

  fail("FlashIxsNotStarted");
}

/**
 * Scan the whole remainder after a start: exactly one end, no second start.
 */
export function findOrderedEnd(view: InstructionView, programId: PublicKey, pair: InstructionPair): PairedInstruction {
  const { instructions, currentIndex } = view;
  let found: PairedInstruction | null = null;

  for (let i = currentIndex + 1; i < instructions.length; i++) {
    const ix = instructions[i];
    if (ix === undefined || !ix.programId.equals(programId)) continue;

    const kind = isPairDiscriminator(ix, pair);
    ensure(kind !== "start", "FlashTxWithUnexpectedIxs", `repeated_start:${i}`);
    if (kind === "end") {
      ensure(found === null, "FlashTxWithUnexpectedIxs", `repeated_end:${i}`);
      found = { index: i, ix };
    }
  }

  if (!found) fail("FlashIxsNotEnded");
  return found;
}

/**
 * Scan the whole prefix before an end: exactly one start, no earlier end.
 */
export function findOrderedStart(view: InstructionView, programId: PublicKey, pair: InstructionPair): PairedInstruction {
  const { instructions, currentIndex } = view;
  let found: PairedInstruction | null = null;

  for (let i = currentIndex - 1; i >= 0; i--) {
    const ix = instructions[i];
    if (ix === undefined || !ix.programId.equals(programId)) continue;

    const kind = isPairDiscriminator(ix, pair);
    ensure(kind !== "end", "FlashTxWithUnexpectedIxs", `repeated_end:${i}`);
    if (kind === "start") {
      ensure(found === null, "FlashTxWithUnexpectedIxs", `repeated_start:${i}`);
      found = { index: i, ix };
    }
  }

  if (!found) fail("FlashIxsNotStarted");
  return found;
}

export type SwapBalanceChange = {
  inputSpent: bigint;
  outputReceived: bigint;
};

/**
 * Enforce the assert-variant bounds on the swap's balance movement.
 */
export function ensureSwapBalanceChange(
  before: { input: bigint; output: bigint },
  after: { input: bigint; output: bigint },
  maxInputAmountChange: bigint,
  minOutputAmountChange: bigint,
): SwapBalanceChange {
  const inputSpent = before.input > after.input ? before.input - after.input : 0n;
  ensure(inputSpent <= maxInputAmountChange, "UserSwapInputChangeExceeded", `spent:${inputSpent} max:${maxInputAmountChange}`);

  const outputReceived = after.output > before.output ? after.output - before.output : 0n;
  ensure(
    after.output >= before.output && outputReceived >= minOutputAmountChange,
    "UserSwapOutputChangeTooLow",
    `received:${outputReceived} min:${minOutputAmountChange}`,
  );

  return { inputSpent, outputReceived };
}

import { ASSOCIATED_TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import { ComputeBudgetProgram, SystemProgram, type PublicKey, type TransactionInstruction } from "@solana/web3.js";
import { fail, isSettlementError, type SettlementError } from "../errors.js";
import { HANDLERS } from "../handlers/index.js";
import { decodeInstructionData } from "../idl/coder.js";
import { logger, type Logger } from "../logger.js";
import { PERMISSION_ROUTER_PROGRAM_ID, PROGRAM_ID, TRANSACTION_LEVEL_STACK_HEIGHT, now } from "../solana.js";
import type { SettlementEvent } from "../types/events.js";
import type { AccountStore } from "./account_store.js";
import {
  associatedTokenProgram,
  computeBudgetProgram,
  systemProgram,
  tokenProgram,
  type ProgramHandler,
} from "./builtin_programs.js";
import type { InstructionView } from "./flash_ixs.js";
import type { PermissionRouter } from "./permission_router.js";

export type SettlementTransaction = {
  instructions: readonly TransactionInstruction[];
  signers: readonly PublicKey[];
};

export type TransactionResult =
  | { ok: true; events: SettlementEvent[] }
  | { ok: false; error: SettlementError; instructionIndex: number };

export type ProcessorOptions = {
  programId?: PublicKey;
  permissionRouter?: PermissionRouter | null;
  permissionRouterProgramId?: PublicKey;
  clock?: () => bigint;
  logger?: Logger;
};

/**
 * Executes transactions against an AccountStore: instructions run in order,
 * and any failure restores the store to its state before the transaction.
 */
export class TransactionProcessor {
  readonly programId: PublicKey;
  private readonly programs = new Map<string, ProgramHandler>();
  private readonly permissionRouter: PermissionRouter | null;
  private readonly permissionRouterProgramId: PublicKey;
  private readonly clock: () => bigint;
  private readonly log: Logger;

  constructor(
    readonly store: AccountStore,
    opts: ProcessorOptions = {},
  ) {
    this.programId = opts.programId ?? PROGRAM_ID;
    this.permissionRouter = opts.permissionRouter ?? null;
    this.permissionRouterProgramId = opts.permissionRouterProgramId ?? PERMISSION_ROUTER_PROGRAM_ID;
    this.clock = opts.clock ?? (() => BigInt(now()));
    this.log = (opts.logger ?? logger).child({ module: "processor" });

    this.registerProgram(SystemProgram.programId, systemProgram);
    this.registerProgram(ComputeBudgetProgram.programId, computeBudgetProgram);
    this.registerProgram(TOKEN_PROGRAM_ID, tokenProgram);
    this.registerProgram(TOKEN_2022_PROGRAM_ID, tokenProgram);
    this.registerProgram(ASSOCIATED_TOKEN_PROGRAM_ID, associatedTokenProgram);
  }

  registerProgram(programId: PublicKey, handler: ProgramHandler): void {
    this.programs.set(programId.toBase58(), handler);
  }

  processTransaction(tx: SettlementTransaction): TransactionResult {
    const snapshot = this.store.snapshot();
    const events: SettlementEvent[] = [];
    let current = 0;

    try {
      for (const [index, ix] of tx.instructions.entries()) {
        current = index;
        const view: InstructionView = {
          instructions: tx.instructions,
          currentIndex: index,
          stackHeight: TRANSACTION_LEVEL_STACK_HEIGHT,
        };
        this.execute(ix, view, tx.signers, events);
      }
      return { ok: true, events };
    } catch (e) {
      this.store.restore(snapshot);
      if (!isSettlementError(e)) throw e;

      this.log.warn(
        { error: e.errorName, code: e.code, category: e.category, detail: e.detail, instructionIndex: current },
        "transaction_failed",
      );
      return { ok: false, error: e, instructionIndex: current };
    }
  }

  private execute(
    ix: TransactionInstruction,
    view: InstructionView,
    signers: readonly PublicKey[],
    events: SettlementEvent[],
  ): void {
    if (ix.programId.equals(this.programId)) {
      this.executeOwn(ix, view, signers, events);
      return;
    }

    const program = this.programs.get(ix.programId.toBase58());
    if (!program) fail("UnsupportedInstruction", `program:${ix.programId.toBase58()}`);

    program(ix, {
      store: this.store,
      signers,
      invoke: (inner) => this.execute(inner, { ...view, stackHeight: view.stackHeight + 1 }, signers, events),
    });
  }

  private executeOwn(
    ix: TransactionInstruction,
    view: InstructionView,
    signers: readonly PublicKey[],
    events: SettlementEvent[],
  ): void {
    const decoded = decodeInstructionData(ix.data);
    if (!decoded) fail("UnsupportedInstruction", "unknown_discriminator");

    this.log.debug({ ix: decoded.name, index: view.currentIndex, stackHeight: view.stackHeight }, "instruction");

    HANDLERS[decoded.name].run(
      {
        store: this.store,
        programId: this.programId,
        ix,
        view,
        signers,
        now: this.clock(),
        permissionRouter: this.permissionRouter,
        permissionRouterProgramId: this.permissionRouterProgramId,
        log: this.log.child({ ix: decoded.name }),
        emit: (event) => events.push(event),
      },
      decoded.data,
    );
  }
}

import { ComputeBudgetProgram, PublicKey } from "@solana/web3.js";
import {
  ASSOCIATED_TOKEN_PROGRAM_ID,
  NATIVE_MINT,
  TOKEN_2022_PROGRAM_ID,
  TOKEN_PROGRAM_ID,
} from "@solana/spl-token";
import { env } from "./config.js";

export const PROGRAM_ID = new PublicKey(env.LIMIT_ORDERS_PROGRAM_ID);

export const PERMISSION_ROUTER_PROGRAM_ID = new PublicKey(env.PERMISSION_ROUTER_PROGRAM_ID);

export const now = () => Math.floor(Date.now() / 1000);

/** Stack height of an instruction invoked directly by the transaction. */
export const TRANSACTION_LEVEL_STACK_HEIGHT = 1;

export const TOKEN_PROGRAM_IDS: readonly PublicKey[] = [TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID];

/** Programs allowed before a flash start and after its end. */
export const FLASH_SURROUNDING_PROGRAM_IDS: readonly PublicKey[] = [
  ComputeBudgetProgram.programId,
  TOKEN_PROGRAM_ID,
  TOKEN_2022_PROGRAM_ID,
  ASSOCIATED_TOKEN_PROGRAM_ID,
];

export const isTokenProgram = (programId: PublicKey) => TOKEN_PROGRAM_IDS.some((p) => p.equals(programId));

export const isNativeMint = (mint: PublicKey) => mint.equals(NATIVE_MINT);

import anchorPkg, { type Idl } from "@coral-xyz/anchor";
import type { IdlInstruction } from "@coral-xyz/anchor/dist/cjs/idl.js";
const { BorshCoder } = anchorPkg;
import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const idl: Idl = require("./limit_orders.json");

export const LIMIT_ORDERS_IDL = idl;
export const coder = new BorshCoder(LIMIT_ORDERS_IDL);

export const INSTRUCTION_NAMES = [
  "initialize_global_config",
  "initialize_vault",
  "create_order",
  "close_order_and_claim_tip",
  "take_order",
  "flash_take_order_start",
  "flash_take_order_end",
  "update_global_config",
  "update_global_config_admin",
  "withdraw_host_tip",
  "update_order",
  "log_user_swap_balances_start",
  "log_user_swap_balances_end",
  "assert_user_swap_balances_start",
  "assert_user_swap_balances_end",
] as const;

export type InstructionName = (typeof INSTRUCTION_NAMES)[number];

export const isInstructionName = (name: string): name is InstructionName =>
  INSTRUCTION_NAMES.some((n) => n === name);

/**
 * Account discriminators, sha256("account:<Name>")[0..8].
 */
export const DISCRIMINATORS = {
  Order: Buffer.from([134, 173, 223, 185, 77, 86, 28, 51]),
  GlobalConfig: Buffer.from([149, 8, 156, 202, 160, 252, 176, 217]),
  UserSwapBalancesState: Buffer.from([140, 228, 152, 62, 231, 27, 245, 198]),
};

export function idlInstruction(name: InstructionName): IdlInstruction {
  const ix = LIMIT_ORDERS_IDL.instructions.find((i) => i.name === name);
  if (!ix) throw new Error(`idl_missing_instruction:${name}`);
  return ix;
}

export function instructionDiscriminator(name: InstructionName): Buffer {
  return Buffer.from(idlInstruction(name).discriminator);
}

export type IdlAccountMeta = {
  name: string;
  writable: boolean;
  signer: boolean;
  optional: boolean;
};

/**
 * Flat, ordered account list of an instruction as declared in the IDL.
 */
export function instructionAccounts(name: InstructionName): IdlAccountMeta[] {
  return idlInstruction(name).accounts.map((item) => {
    if ("accounts" in item) throw new Error(`idl_composite_accounts_unsupported:${item.name}`);
    return {
      name: item.name,
      writable: item.writable ?? false,
      signer: item.signer ?? false,
      optional: item.optional ?? false,
    };
  });
}

export type DecodedInstruction = {
  name: InstructionName;
  data: unknown;
};

/**
 * Decode instruction data (discriminator + borsh args).
 * Returns null when the discriminator is unknown or the args do not parse.
 */
export function decodeInstructionData(data: Buffer): DecodedInstruction | null {
  try {
    const decoded = coder.instruction.decode(data);
    if (!decoded || !isInstructionName(decoded.name)) return null;
    return { name: decoded.name, data: decoded.data };
  } catch {
    return null;
  }
}

export function encodeInstructionData(name: InstructionName, args: Record<string, unknown>): Buffer {
  return coder.instruction.encode(name, args);
}

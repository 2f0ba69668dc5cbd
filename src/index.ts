export { env } from "./config.js";
export { logger, type Logger } from "./logger.js";
export { PROGRAM_ID, PERMISSION_ROUTER_PROGRAM_ID, TRANSACTION_LEVEL_STACK_HEIGHT } from "./solana.js";
export { SettlementError, isSettlementError, type ErrorCategory, type SettlementErrorName } from "./errors.js";

export {
  LIMIT_ORDERS_IDL,
  DISCRIMINATORS,
  decodeInstructionData,
  instructionDiscriminator,
  type InstructionName,
} from "./idl/coder.js";

export * from "./state/order.js";
export * from "./state/global_config.js";
export * from "./state/swap_balances.js";

export * from "./services/fill_engine.js";
export * from "./services/orders.js";
export * from "./services/tip_ledger.js";
export * from "./services/global_config.js";
export * from "./services/flash_ixs.js";
export * from "./services/swap_balance_ixs.js";
export * from "./services/escrow_vault.js";
export * from "./services/account_store.js";
export * from "./services/instruction_builder.js";
export * from "./services/processor.js";
export type { PermissionRouter, PermissionCheck, PermissionGrant } from "./services/permission_router.js";
export type { ProgramHandler, ProgramContext } from "./services/builtin_programs.js";
export type { SettlementEvent, OrderDisplayEvent, UserSwapBalanceDiffsEvent } from "./types/events.js";

export * from "./utils/pda.js";
export * from "./utils/math.js";

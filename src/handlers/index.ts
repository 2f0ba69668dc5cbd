import type { InstructionName } from "../idl/coder.js";
import type { Handler } from "./context.js";
import {
  initializeGlobalConfigHandler,
  initializeVaultHandler,
  updateGlobalConfigAdminHandler,
  updateGlobalConfigHandler,
  withdrawHostTipHandler,
} from "./admin.js";
import { flashTakeOrderEndHandler, flashTakeOrderStartHandler } from "./flash_take_order.js";
import { closeOrderAndClaimTipHandler, createOrderHandler, updateOrderHandler } from "./orders.js";
import {
  assertUserSwapBalancesEndHandler,
  assertUserSwapBalancesStartHandler,
  logUserSwapBalancesEndHandler,
  logUserSwapBalancesStartHandler,
} from "./swap_balances.js";
import { takeOrderHandler } from "./take_order.js";

export const HANDLERS: Record<InstructionName, Handler> = {
  initialize_global_config: initializeGlobalConfigHandler,
  initialize_vault: initializeVaultHandler,
  create_order: createOrderHandler,
  close_order_and_claim_tip: closeOrderAndClaimTipHandler,
  take_order: takeOrderHandler,
  flash_take_order_start: flashTakeOrderStartHandler,
  flash_take_order_end: flashTakeOrderEndHandler,
  update_global_config: updateGlobalConfigHandler,
  update_global_config_admin: updateGlobalConfigAdminHandler,
  withdraw_host_tip: withdrawHostTipHandler,
  update_order: updateOrderHandler,
  log_user_swap_balances_start: logUserSwapBalancesStartHandler,
  log_user_swap_balances_end: logUserSwapBalancesEndHandler,
  assert_user_swap_balances_start: assertUserSwapBalancesStartHandler,
  assert_user_swap_balances_end: assertUserSwapBalancesEndHandler,
};

export type { Handler, HandlerContext } from "./context.js";

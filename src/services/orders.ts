import { PublicKey } from "@solana/web3.js";
import type { GlobalConfigRecord } from "../state/global_config.js";
import { hasCounterparty, OrderStatus, OrderType, type OrderRecord } from "../state/order.js";
import { ensure, fail } from "../errors.js";
import { checkedAdd } from "../utils/math.js";
import { applyFill, computeFill, type TakeOrderEffects } from "./fill_engine.js";
import { releaseOrderTip } from "./tip_ledger.js";

export type CreateOrderParams = {
  globalConfig: PublicKey;
  maker: PublicKey;
  inputMint: PublicKey;
  inputMintProgramId: PublicKey;
  outputMint: PublicKey;
  outputMintProgramId: PublicKey;
  inputAmount: bigint;
  outputAmount: bigint;
  orderType: number;
  inVaultBump: number;
  now: bigint;
};

export function createOrder(order: OrderRecord, p: CreateOrderParams): void {
  ensure(p.orderType === OrderType.Vanilla, "OrderTypeInvalid", `order_type:${p.orderType}`);
  ensure(!p.inputMint.equals(p.outputMint), "OrderSameMint");
  ensure(p.inputAmount > 0n, "OrderInputAmountInvalid");
  ensure(p.outputAmount > 0n, "OrderOutputAmountInvalid");

  order.globalConfig = p.globalConfig;
  order.maker = p.maker;
  order.inputMint = p.inputMint;
  order.inputMintProgramId = p.inputMintProgramId;
  order.outputMint = p.outputMint;
  order.outputMintProgramId = p.outputMintProgramId;

  order.initialInputAmount = p.inputAmount;
  order.expectedOutputAmount = p.outputAmount;
  order.remainingInputAmount = p.inputAmount;
  order.filledOutputAmount = 0n;
  order.tipAmount = 0n;
  order.numberOfFills = 0n;

  order.orderType = p.orderType;
  order.status = OrderStatus.Active;
  order.inVaultBump = p.inVaultBump;
  order.flashIxLock = 0;
  order.permissionless = 0;
  order.lastUpdatedTimestamp = p.now;
  order.flashStartTakerOutputBalance = 0n;
  order.counterparty = PublicKey.default;
}

export const UpdateOrderMode = { UpdatePermissionless: 0, UpdateCounterparty: 1 } as const;

export function updateOrder(order: OrderRecord, mode: number, value: Buffer): void {
  switch (mode) {
    case UpdateOrderMode.UpdatePermissionless: {
      ensure(value.length === 1, "InvalidParameterType", `expected_1_byte:${value.length}`);
      const flag = value.readUInt8(0);
      ensure(flag === 0 || flag === 1, "InvalidFlag", `permissionless:${flag}`);
      order.permissionless = flag;
      return;
    }
    case UpdateOrderMode.UpdateCounterparty: {
      ensure(value.length === 32, "InvalidParameterType", `expected_32_bytes:${value.length}`);
      order.counterparty = new PublicKey(value);
      return;
    }
    default:
      fail("InvalidConfigOption", `update_order_mode:${mode}`);
  }
}

/**
 * Taker may fill when the order is permissionless or routed through the
 * permission router, and when it matches the order's counterparty (if any).
 */
export function canBeTakenBy(order: OrderRecord, taker: PublicKey, permissioned: boolean): void {
  ensure(order.permissionless === 1 || permissioned, "PermissionRequiredPermissionlessNotEnabled");
  ensure(
    !hasCounterparty(order) || order.counterparty.equals(taker),
    "CounterpartyDisallowed",
    `taker:${taker.toBase58()}`,
  );
}

export function takeOrder(
  globalConfig: GlobalConfigRecord,
  order: OrderRecord,
  inputAmount: bigint,
  outputAmount: bigint,
  tipAmount: bigint,
  now: bigint,
): TakeOrderEffects {
  ensure(order.flashIxLock === 0, "OrderWithinFlashOperation");

  const effects = computeFill(order, inputAmount, outputAmount);
  applyFill(globalConfig, order, effects, tipAmount, now);
  return effects;
}

export function flashWithdrawOrderInput(order: OrderRecord, inputAmount: bigint, outputAmount: bigint): TakeOrderEffects {
  const effects = computeFill(order, inputAmount, outputAmount);

  ensure(order.flashIxLock === 0, "OrderWithinFlashOperation");
  order.flashIxLock = 1;

  return effects;
}

export function flashPayOrderOutput(
  globalConfig: GlobalConfigRecord,
  order: OrderRecord,
  inputAmount: bigint,
  outputAmount: bigint,
  tipAmount: bigint,
  now: bigint,
): TakeOrderEffects {
  const effects = computeFill(order, inputAmount, outputAmount);

  ensure(order.flashIxLock === 1, "OrderNotWithinFlashOperation");
  applyFill(globalConfig, order, effects, tipAmount, now);
  order.flashIxLock = 0;

  return effects;
}

/**
 * Closing an active order cancels it. A filled order stays Filled, only
 * its storage and tip are released. Returns the maker tip to pay out.
 */
export function closeOrderAndClaimTip(globalConfig: GlobalConfigRecord, order: OrderRecord, now: bigint): bigint {
  ensure(
    order.status === OrderStatus.Active || order.status === OrderStatus.Filled,
    "OrderCanNotBeCanceled",
    `status:${order.status}`,
  );
  const earliest = checkedAdd(order.lastUpdatedTimestamp, globalConfig.orderCloseDelaySeconds);
  ensure(now >= earliest, "NotEnoughTimePassedSinceLastUpdate", `now:${now} earliest:${earliest}`);
  ensure(order.flashIxLock === 0, "OrderWithinFlashOperation");

  if (order.status === OrderStatus.Active) order.status = OrderStatus.Cancelled;

  return releaseOrderTip(globalConfig, order);
}

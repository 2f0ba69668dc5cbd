import type { GlobalConfigRecord } from "../state/global_config.js";
import { OrderStatus, type OrderRecord } from "../state/order.js";
import { ensure } from "../errors.js";
import { checkedAdd, checkedSub, maxBig, mulDivCeil } from "../utils/math.js";
import { accrueTip, type TipSplit } from "./tip_ledger.js";

export type TakeOrderEffects = {
  inputToSendToTaker: bigint;
  outputToSendToMaker: bigint;
};

/**
 * Smallest output that keeps the maker's price for this slice:
 * ceil(input * expected / initial).
 */
export function minimumOutputForInput(order: OrderRecord, inputAmount: bigint): bigint {
  return mulDivCeil(inputAmount, order.expectedOutputAmount, order.initialInputAmount);
}

export function computeFill(order: OrderRecord, inputAmount: bigint, desiredOutputAmount: bigint): TakeOrderEffects {
  ensure(inputAmount > 0n, "OrderInputAmountInvalid");
  ensure(order.status === OrderStatus.Active, "OrderNotActive");
  ensure(
    inputAmount <= order.remainingInputAmount,
    "OrderInputAmountTooLarge",
    `input:${inputAmount} remaining:${order.remainingInputAmount}`,
  );

  const minimumOutput = minimumOutputForInput(order, inputAmount);
  const outputAmount = maxBig(desiredOutputAmount, minimumOutput);
  ensure(
    outputAmount === desiredOutputAmount,
    "OrderOutputAmountInvalid",
    `desired:${desiredOutputAmount} minimum:${minimumOutput}`,
  );

  return { inputToSendToTaker: inputAmount, outputToSendToMaker: outputAmount };
}

export function applyFill(
  globalConfig: GlobalConfigRecord,
  order: OrderRecord,
  effects: TakeOrderEffects,
  tipAmount: bigint,
  now: bigint,
): TipSplit {
  order.remainingInputAmount = checkedSub(order.remainingInputAmount, effects.inputToSendToTaker);
  order.filledOutputAmount = checkedAdd(order.filledOutputAmount, effects.outputToSendToMaker);

  const split = accrueTip(globalConfig, order, tipAmount);

  order.numberOfFills = checkedAdd(order.numberOfFills, 1n);

  if (order.remainingInputAmount === 0n && order.filledOutputAmount >= order.expectedOutputAmount) {
    order.status = OrderStatus.Filled;
  }

  order.lastUpdatedTimestamp = now;
  return split;
}

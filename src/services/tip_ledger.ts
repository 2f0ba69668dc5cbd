/**
 * Global tip ledger.
 *
 * The custodial pda authority holds every tip in native lamports. Totals on
 * the global config are moved incrementally and reconciled against the
 * authority's observed balance whenever tips come in or go out:
 *
 *   total_tip_amount == host_tip_amount + sum(order.tip_amount of live orders)
 *   authority lamports >= total_tip_amount
 */

import type { GlobalConfigRecord } from "../state/global_config.js";
import type { OrderRecord } from "../state/order.js";
import { ensure } from "../errors.js";
import { bpsOfCeil, checkedAdd, checkedSub } from "../utils/math.js";

export type TipSplit = {
  hostTip: bigint;
  makerTip: bigint;
};

export function splitTip(globalConfig: GlobalConfigRecord, tipAmount: bigint): TipSplit {
  const hostTip = bpsOfCeil(tipAmount, globalConfig.hostFeeBps);
  const makerTip = checkedSub(tipAmount, hostTip);
  return { hostTip, makerTip };
}

/**
 * Credit a fill's tip: host share to the config, maker share to the order,
 * the whole amount to the running total.
 */
export function accrueTip(globalConfig: GlobalConfigRecord, order: OrderRecord, tipAmount: bigint): TipSplit {
  const split = splitTip(globalConfig, tipAmount);

  globalConfig.hostTipAmount = checkedAdd(globalConfig.hostTipAmount, split.hostTip);
  order.tipAmount = checkedAdd(order.tipAmount, split.makerTip);
  globalConfig.totalTipAmount = checkedAdd(globalConfig.totalTipAmount, tipAmount);

  return split;
}

/**
 * Check a tip actually landed on the authority, then remember the balance.
 */
export function reconcileAuthorityBalance(
  globalConfig: GlobalConfigRecord,
  authorityBalance: bigint,
  tipAmount: bigint,
): void {
  const previous = globalConfig.pdaAuthorityPreviousLamportsBalance;

  ensure(authorityBalance >= previous, "InvalidTipTransferAmount", `balance_decreased:${previous}->${authorityBalance}`);
  ensure(
    authorityBalance - previous >= tipAmount,
    "InvalidTipTransferAmount",
    `delta:${authorityBalance - previous} tip:${tipAmount}`,
  );
  ensure(
    authorityBalance >= globalConfig.totalTipAmount,
    "InvalidTipBalance",
    `balance:${authorityBalance} total:${globalConfig.totalTipAmount}`,
  );

  globalConfig.pdaAuthorityPreviousLamportsBalance = authorityBalance;
}

export function syncAuthorityBalance(globalConfig: GlobalConfigRecord, authorityBalance: bigint): void {
  globalConfig.pdaAuthorityPreviousLamportsBalance = authorityBalance;
}

/**
 * Drop the order's accrued maker tip from the total; returns the amount owed to the maker.
 */
export function releaseOrderTip(globalConfig: GlobalConfigRecord, order: OrderRecord): bigint {
  globalConfig.totalTipAmount = checkedSub(globalConfig.totalTipAmount, order.tipAmount);
  return order.tipAmount;
}

export function withdrawHostTip(globalConfig: GlobalConfigRecord, authorityBalance: bigint): bigint {
  const hostTip = globalConfig.hostTipAmount;
  ensure(authorityBalance >= hostTip, "InvalidHostTipBalance", `balance:${authorityBalance} host_tip:${hostTip}`);

  globalConfig.totalTipAmount = checkedSub(globalConfig.totalTipAmount, hostTip);
  globalConfig.hostTipAmount = 0n;

  return hostTip;
}

export type TipAudit = {
  expectedTotal: bigint;
  recordedTotal: bigint;
  consistent: boolean;
};

/**
 * Recompute host + sum(order tips) over the live orders. Read-only.
 */
export function auditTipAccounting(globalConfig: GlobalConfigRecord, liveOrders: readonly OrderRecord[]): TipAudit {
  const expectedTotal = liveOrders.reduce((acc, o) => acc + o.tipAmount, globalConfig.hostTipAmount);
  return {
    expectedTotal,
    recordedTotal: globalConfig.totalTipAmount,
    consistent: expectedTotal === globalConfig.totalTipAmount,
  };
}

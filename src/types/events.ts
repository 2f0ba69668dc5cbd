import type { PublicKey } from "@solana/web3.js";

export type OrderDisplayEvent = {
  name: "OrderDisplay";
  order: PublicKey;
  status: number;
  initialInputAmount: bigint;
  expectedOutputAmount: bigint;
  remainingInputAmount: bigint;
  filledOutputAmount: bigint;
  numberOfFills: bigint;
  tipAmount: bigint;
};

export type UserSwapBalanceDiffsEvent = {
  name: "UserSwapBalanceDiffs";
  maker: PublicKey;
  swapProgramId: PublicKey;
  userLamportsBefore: bigint;
  userLamportsAfter: bigint;
  inputTaBalanceBefore: bigint;
  inputTaBalanceAfter: bigint;
  outputTaBalanceBefore: bigint;
  outputTaBalanceAfter: bigint;
};

export type SettlementEvent = OrderDisplayEvent | UserSwapBalanceDiffsEvent;

import { fail } from "../errors.js";

export const U64_MAX = (1n << 64n) - 1n;
export const BPS_DENOMINATOR = 10_000n;

/**
 * Narrow a widened intermediate back into u64.
 */
export function toU64(value: bigint): bigint {
  if (value < 0n || value > U64_MAX) fail("MathOverflow", `u64_out_of_range:${value}`);
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return toU64(a + b);
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) fail("MathOverflow", `underflow:${a}-${b}`);
  return a - b;
}

/**
 * ceil(a / b) for non-negative a and positive b.
 */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b <= 0n) fail("MathOverflow", "division_by_zero");
  return (a + b - 1n) / b;
}

/**
 * ceil(amount * numerator / denominator), computed without intermediate
 * truncation and narrowed to u64.
 */
export function mulDivCeil(amount: bigint, numerator: bigint, denominator: bigint): bigint {
  return toU64(ceilDiv(amount * numerator, denominator));
}

/**
 * Basis-point share of an amount, rounded up.
 */
export function bpsOfCeil(amount: bigint, bps: number): bigint {
  return mulDivCeil(amount, BigInt(bps), BPS_DENOMINATOR);
}

export const minBig = (a: bigint, b: bigint) => (a < b ? a : b);
export const maxBig = (a: bigint, b: bigint) => (a > b ? a : b);

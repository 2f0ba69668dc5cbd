import { LIMIT_ORDERS_IDL } from "./idl/coder.js";

const STATE_ERRORS = [
  "OrderCanNotBeCanceled",
  "OrderNotActive",
  "OrderWithinFlashOperation",
  "OrderNotWithinFlashOperation",
  "OrderInputAmountInvalid",
  "OrderOutputAmountInvalid",
  "OrderInputAmountTooLarge",
  "NotEnoughTimePassedSinceLastUpdate",
  "OrderSameMint",
  "OrderTypeInvalid",
  "InvalidTipBalance",
  "InvalidTipTransferAmount",
  "InvalidHostTipBalance",
  "UserSwapInputChangeExceeded",
  "UserSwapOutputChangeTooLow",
  "InsufficientFunds",
  "NotEnoughBalanceForRent",
] as const;

const ARITHMETIC_ERRORS = ["MathOverflow", "IntegerOverflow", "OutOfRangeIntegralConversion"] as const;

const PROTOCOL_ERRORS = [
  "CPINotAllowed",
  "FlashTxWithUnexpectedIxs",
  "FlashIxsNotEnded",
  "FlashIxsNotStarted",
  "FlashIxsAccountMismatch",
  "FlashIxsArgsMismatch",
] as const;

const AUTHORIZATION_ERRORS = [
  "InvalidAdminAuthority",
  "InvalidPdaAuthority",
  "InvalidOrderOwner",
  "PermissionRequiredPermissionlessNotEnabled",
  "PermissionDoesNotMatchOrder",
  "PermissionNotGranted",
  "CounterpartyDisallowed",
  "MissingSigner",
] as const;

const KILL_SWITCH_ERRORS = [
  "EmergencyModeEnabled",
  "CreatingNewOrdersBlocked",
  "OrderTakingBlocked",
  "FlashTakeOrderBlocked",
] as const;

const VALIDATION_ERRORS = [
  "InvalidConfigOption",
  "InvalidFlag",
  "InvalidHostFee",
  "InvalidParameterType",
  "InvalidAtaAddress",
  "MakerOutputAtaRequired",
  "IntermediaryOutputTokenAccountRequired",
  "InvalidTokenAccount",
  "UninitializedTokenAccount",
  "InvalidTokenAccountOwner",
  "InvalidAccount",
  "InvalidTokenMint",
  "InvalidTokenAuthority",
  "AccountAlreadyInitialized",
  "UnsupportedInstruction",
] as const;

export type ErrorCategory = "state" | "arithmetic" | "protocol" | "authorization" | "kill_switch" | "validation";

export type SettlementErrorName =
  | (typeof STATE_ERRORS)[number]
  | (typeof ARITHMETIC_ERRORS)[number]
  | (typeof PROTOCOL_ERRORS)[number]
  | (typeof AUTHORIZATION_ERRORS)[number]
  | (typeof KILL_SWITCH_ERRORS)[number]
  | (typeof VALIDATION_ERRORS)[number];

const CATEGORIES = new Map<SettlementErrorName, ErrorCategory>([
  ...STATE_ERRORS.map((n) => [n, "state"] as const),
  ...ARITHMETIC_ERRORS.map((n) => [n, "arithmetic"] as const),
  ...PROTOCOL_ERRORS.map((n) => [n, "protocol"] as const),
  ...AUTHORIZATION_ERRORS.map((n) => [n, "authorization"] as const),
  ...KILL_SWITCH_ERRORS.map((n) => [n, "kill_switch"] as const),
  ...VALIDATION_ERRORS.map((n) => [n, "validation"] as const),
]);

function idlError(name: SettlementErrorName): { code: number; msg: string } {
  const entry = LIMIT_ORDERS_IDL.errors?.find((e) => e.name === name);
  if (!entry) throw new Error(`idl_missing_error:${name}`);
  return { code: entry.code, msg: entry.msg ?? name };
}

/**
 * Every rejected operation surfaces as a SettlementError. The code and
 * message come from the IDL error table (6000 + index).
 */
export class SettlementError extends Error {
  readonly code: number;
  readonly category: ErrorCategory;

  constructor(
    readonly errorName: SettlementErrorName,
    readonly detail?: string,
  ) {
    const entry = idlError(errorName);
    super(detail ? `${errorName}: ${entry.msg} (${detail})` : `${errorName}: ${entry.msg}`);
    this.name = "SettlementError";
    this.code = entry.code;
    this.category = CATEGORIES.get(errorName) ?? "state";
  }
}

export function fail(name: SettlementErrorName, detail?: string): never {
  throw new SettlementError(name, detail);
}

export function ensure(condition: boolean, name: SettlementErrorName, detail?: string): asserts condition {
  if (!condition) fail(name, detail);
}

export const isSettlementError = (e: unknown): e is SettlementError => e instanceof SettlementError;

/**
 * Exact-integer scaled arithmetic.
 *
 * bigint is the wide accumulator: a*b never overflows before the division,
 * so the only overflow is a result outside the unsigned 256-bit range.
 * Division truncates toward zero. Payouts depend on this floor: never round up.
 */

import { MAX_DECIMALS, MAX_UINT256 } from "./constants.js";
import { BondError } from "./errors.js";

function assertUint(value: bigint, op: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new BondError("Overflow", op, "operand outside uint256 range", {
      value: value.toString(),
    });
  }
}

/** floor(a * b / c) */
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  assertUint(a, "mulDiv");
  assertUint(b, "mulDiv");
  assertUint(c, "mulDiv");
  if (c === 0n) {
    throw new BondError("DivisionByZero", "mulDiv", "divisor is zero");
  }
  const result = (a * b) / c;
  if (result > MAX_UINT256) {
    throw new BondError("Overflow", "mulDiv", "result exceeds uint256", {
      a: a.toString(),
      b: b.toString(),
      c: c.toString(),
    });
  }
  return result;
}

/** a - b, failing instead of going negative. */
export function checkedSub(a: bigint, b: bigint, op = "checkedSub"): bigint {
  if (b > a) {
    throw new BondError("Overflow", op, "subtraction underflow", {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return a - b;
}

/** 10^decimals as bigint. */
export function pow10(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new BondError("InvalidConfiguration", "pow10", `decimals must be 0-${MAX_DECIMALS}`, {
      decimals,
    });
  }
  return 10n ** BigInt(decimals);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

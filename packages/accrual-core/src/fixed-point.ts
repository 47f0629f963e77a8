// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@solar-ledger/accrual-core/fixed-point`
 * Purpose: Scaled reward-per-unit arithmetic with truncating integer division (ALL_MATH_BIGINT).
 * Scope: Pure functions. Does not perform I/O or hold state.
 * Invariants:
 * - Operands are unsigned 256-bit integers; bigint holds the double-width product.
 * - Division truncates toward zero; the remainder ("dust") is dropped.
 * Side-effects: none
 * Links: packages/accrual-core/src/settlement.ts
 * @public
 */

/** Fixed-point scale of the reward-per-unit accumulator (10^18). */
export const SCALE = 10n ** 18n;

/** Largest value a uint256 slot can hold. */
export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * Throws RangeError unless value fits an unsigned 256-bit slot.
 */
export function assertUint256(value: bigint, label: string): void {
  if (value < 0n) {
    throw new RangeError(`${label} must be non-negative, got ${value}`);
  }
  if (value > MAX_UINT256) {
    throw new RangeError(`${label} exceeds uint256 range`);
  }
}

/**
 * Reward-per-unit increase for a deposit: (amount * SCALE) / unitCount.
 *
 * @param amount - Deposited currency in wei
 * @param unitCount - Units in circulation; must be > 0
 */
export function rewardPerUnitIncrease(amount: bigint, unitCount: bigint): bigint {
  assertUint256(amount, "amount");
  assertUint256(unitCount, "unitCount");
  if (unitCount === 0n) {
    throw new RangeError("unitCount must be greater than zero");
  }
  return (amount * SCALE) / unitCount;
}

/**
 * Reward earned by a balance over an accumulator delta: (balance * delta) / SCALE.
 */
export function earnedFor(balance: bigint, delta: bigint): bigint {
  assertUint256(balance, "balance");
  assertUint256(delta, "delta");
  return (balance * delta) / SCALE;
}

/**
 * Scaled reward actually backed by holders after a deposit: increase * unitCount.
 * At most amount * SCALE; the gap is truncation dust.
 */
export function reservedScaled(increase: bigint, unitCount: bigint): bigint {
  assertUint256(increase, "increase");
  assertUint256(unitCount, "unitCount");
  return increase * unitCount;
}

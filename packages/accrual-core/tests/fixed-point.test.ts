// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@solar-ledger/accrual-core/tests/fixed-point`
 * Purpose: Unit tests for scaled reward-per-unit arithmetic and truncation.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Validates ALL_MATH_BIGINT truncation and uint256 guards.
 * Side-effects: none
 * Links: packages/accrual-core/src/fixed-point.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  assertUint256,
  earnedFor,
  MAX_UINT256,
  reservedScaled,
  rewardPerUnitIncrease,
  SCALE,
} from "../src/fixed-point";

describe("rewardPerUnitIncrease", () => {
  it("divides evenly when the deposit is a multiple of the unit count", () => {
    expect(rewardPerUnitIncrease(10n ** 18n, 100n)).toBe(10n ** 34n);
  });

  it("truncates the remainder", () => {
    expect(rewardPerUnitIncrease(10n, 3n)).toBe(3333333333333333333n);
  });

  it("returns zero when the deposit is too small for the unit count", () => {
    expect(rewardPerUnitIncrease(1n, 10n ** 19n)).toBe(0n);
  });

  it("rejects a zero unit count", () => {
    expect(() => rewardPerUnitIncrease(5n, 0n)).toThrow(RangeError);
  });

  it("does not overflow for amounts near the top of uint256", () => {
    const amount = MAX_UINT256 / SCALE;
    expect(rewardPerUnitIncrease(amount, 1n)).toBe(amount * SCALE);
  });
});

describe("earnedFor", () => {
  it("scales back down and truncates", () => {
    expect(earnedFor(3n, 3333333333333333333n)).toBe(9n);
  });

  it("is zero for a zero balance", () => {
    expect(earnedFor(0n, 10n ** 34n)).toBe(0n);
  });

  it("returns the proportional share for an exact accumulator", () => {
    expect(earnedFor(30n, 10n ** 34n)).toBe(3n * 10n ** 17n);
  });
});

describe("reservedScaled", () => {
  it("records the truncated backing of a deposit", () => {
    expect(reservedScaled(3333333333333333333n, 3n)).toBe(9999999999999999999n);
  });
});

describe("assertUint256", () => {
  it("accepts zero and the maximum", () => {
    expect(() => assertUint256(0n, "x")).not.toThrow();
    expect(() => assertUint256(MAX_UINT256, "x")).not.toThrow();
  });

  it("rejects negatives", () => {
    expect(() => assertUint256(-1n, "amount")).toThrow(
      "amount must be non-negative, got -1"
    );
  });

  it("rejects values past the slot width", () => {
    expect(() => assertUint256(MAX_UINT256 + 1n, "amount")).toThrow(
      "amount exceeds uint256 range"
    );
  });
});

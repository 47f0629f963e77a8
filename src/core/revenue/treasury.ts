// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/treasury`
 * Purpose: O(1) dust computation over the treasury accumulators.
 * Scope: Pure arithmetic. Does not read storage.
 * Invariants:
 * - Investor liability is floor(rewardReservedScaled / SCALE) - totalRewardsClaimed; every holder's claimable is covered by it.
 * - Dust never includes sales balances or investor liability.
 * Side-effects: none
 * Links: features/revenue/services/sales.ts
 * @public
 */

import { SCALE } from "@solar-ledger/accrual-core";

import type { TreasuryTotals } from "./model";

/** Wei still owed to unit holders across all projects */
export function rewardLiability(totals: TreasuryTotals): bigint {
  return totals.rewardReservedScaled / SCALE - totals.totalRewardsClaimed;
}

/**
 * Held value attributable to nobody: truncation remainders plus direct receipts.
 */
export function computeDust(totals: TreasuryTotals): bigint {
  const dust =
    totals.heldValue - totals.totalSalesBalance - rewardLiability(totals);
  return dust > 0n ? dust : 0n;
}

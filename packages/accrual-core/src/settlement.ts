// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@solar-ledger/accrual-core/settlement`
 * Purpose: Per-holder checkpoint settlement against a reward-per-unit accumulator.
 * Scope: Pure functions over immutable positions. Does not read or write storage.
 * Invariants:
 * - SETTLE_BEFORE_MUTATE: callers settle with the balance held before any balance change.
 * - pending only grows here; claims reset it elsewhere.
 * - Settling twice against the same accumulator value earns nothing the second time.
 * Side-effects: none
 * Links: packages/accrual-core/src/fixed-point.ts
 * @public
 */

import { earnedFor } from "./fixed-point";

/** Per (project, holder) accrual state. */
export interface RewardPosition {
  /** Accumulator value observed at the last settlement */
  readonly checkpoint: bigint;
  /** Settled but unclaimed reward in wei */
  readonly pending: bigint;
  /** Lifetime claimed reward in wei (audit only) */
  readonly totalClaimed: bigint;
}

export const EMPTY_POSITION: RewardPosition = {
  checkpoint: 0n,
  pending: 0n,
  totalClaimed: 0n,
};

export interface SettlementResult {
  readonly position: RewardPosition;
  /** Reward credited by this settlement */
  readonly earned: bigint;
}

function unsettled(
  position: RewardPosition,
  balance: bigint,
  rewardPerUnitStored: bigint
): bigint {
  if (rewardPerUnitStored < position.checkpoint) {
    throw new RangeError(
      `Accumulator ${rewardPerUnitStored} is behind checkpoint ${position.checkpoint}`
    );
  }
  return earnedFor(balance, rewardPerUnitStored - position.checkpoint);
}

/**
 * Credit the reward earned since the last checkpoint and advance the checkpoint.
 */
export function settlePosition(
  position: RewardPosition,
  balance: bigint,
  rewardPerUnitStored: bigint
): SettlementResult {
  const earned = unsettled(position, balance, rewardPerUnitStored);
  return {
    earned,
    position: {
      ...position,
      checkpoint: rewardPerUnitStored,
      pending: position.pending + earned,
    },
  };
}

/**
 * What settlement would leave in pending, without producing a new position.
 */
export function previewClaimable(
  position: RewardPosition,
  balance: bigint,
  rewardPerUnitStored: bigint
): bigint {
  return position.pending + unsettled(position, balance, rewardPerUnitStored);
}

/**
 * Move all pending reward into totalClaimed. Returns the amount released.
 */
export function releasePending(position: RewardPosition): {
  readonly position: RewardPosition;
  readonly released: bigint;
} {
  return {
    released: position.pending,
    position: {
      ...position,
      pending: 0n,
      totalClaimed: position.totalClaimed + position.pending,
    },
  };
}

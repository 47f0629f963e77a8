// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@solar-ledger/accrual-core`
 * Purpose: Pure reward-per-unit accrual math shared by the ledger service and its tests.
 * Scope: Re-exports fixed-point helpers and settlement functions. Does not contain I/O or infrastructure code.
 * Invariants: No imports from src/. Pure domain logic only.
 * Side-effects: none
 * @public
 */

export {
  assertUint256,
  earnedFor,
  MAX_UINT256,
  reservedScaled,
  rewardPerUnitIncrease,
  SCALE,
} from "./fixed-point";
export type { RewardPosition, SettlementResult } from "./settlement";
export {
  EMPTY_POSITION,
  previewClaimable,
  releasePending,
  settlePosition,
} from "./settlement";

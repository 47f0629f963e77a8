// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/accrual`
 * Purpose: Revenue deposits, reward claims, and energy counters.
 * Scope: Drives the reward-per-unit accumulator and holder positions. Does not move units.
 * Invariants:
 * - Deposits are O(1): they raise rewardPerUnitStored and never iterate holders.
 * - A deposit whose increase truncates to zero is rejected, never absorbed.
 * - Claims zero pending before the payout is queued; claimMultiple queues exactly one payout.
 * - Energy counters never affect reward accounting.
 * Side-effects: none (store writes and queued payouts inside the caller's transaction)
 * Links: packages/accrual-core, ./unit-ledger.ts (settleHolder)
 * @internal
 */

import {
  previewClaimable,
  releasePending,
  reservedScaled,
  rewardPerUnitIncrease,
} from "@solar-ledger/accrual-core";
import type { Address } from "viem";

import {
  assertNonNegative,
  BatchSizeTooLargeError,
  NoFundsDepositedError,
  NoTokensMintedError,
  NothingToClaimError,
  type ProjectId,
  RewardIncreaseTooSmallError,
} from "@/core";
import type { RevenueLedgerStore } from "@/ports";

import {
  assertActive,
  assertCreatorOrAdmin,
  type LedgerReadContext,
  type LedgerWriteContext,
  requireProject,
} from "./context";
import { settleHolder } from "./unit-ledger";

export function depositRevenue(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  amountWei: bigint,
  energyDeltaKwh: bigint
): void {
  const project = requireProject(ctx.store, projectId);
  assertCreatorOrAdmin(ctx, project, caller, `deposit revenue to project ${projectId}`);
  if (amountWei <= 0n) {
    throw new NoFundsDepositedError(projectId);
  }
  assertNonNegative(energyDeltaKwh, "energyDeltaKwh");
  assertActive(project);
  if (project.minted === 0n) {
    throw new NoTokensMintedError(projectId);
  }

  const increase = rewardPerUnitIncrease(amountWei, project.minted);
  if (increase === 0n) {
    throw new RewardIncreaseTooSmallError(projectId, amountWei, project.minted);
  }

  const rewardPerUnitStored = project.rewardPerUnitStored + increase;
  ctx.store.saveProject({
    ...project,
    rewardPerUnitStored,
    totalRevenue: project.totalRevenue + amountWei,
    totalEnergyKwh: project.totalEnergyKwh + energyDeltaKwh,
  });

  const treasury = ctx.store.getTreasury();
  ctx.store.saveTreasury({
    ...treasury,
    heldValue: treasury.heldValue + amountWei,
    rewardReservedScaled:
      treasury.rewardReservedScaled + reservedScaled(increase, project.minted),
  });

  ctx.emit({
    type: "RevenueDeposited",
    projectId,
    depositor: caller,
    amountWei,
    energyDeltaKwh,
    rewardPerUnitStored,
  });
}

export function claimableAmount(
  store: RevenueLedgerStore,
  projectId: ProjectId,
  holder: Address
): bigint {
  const project = requireProject(store, projectId);
  return previewClaimable(
    store.getRewardPosition(projectId, holder),
    store.getBalance(holder, projectId),
    project.rewardPerUnitStored
  );
}

/**
 * Settle and zero one holder's pending reward. Returns the released amount (may be zero).
 */
function releaseFor(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  holder: Address
): bigint {
  const project = requireProject(ctx.store, projectId);
  const { position, released } = releasePending(
    settleHolder(ctx.store, project, holder)
  );
  if (released > 0n) {
    ctx.store.setRewardPosition(projectId, holder, position);
  }
  return released;
}

function payRewards(ctx: LedgerWriteContext, holder: Address, total: bigint): void {
  const treasury = ctx.store.getTreasury();
  ctx.store.saveTreasury({
    ...treasury,
    heldValue: treasury.heldValue - total,
    totalRewardsClaimed: treasury.totalRewardsClaimed + total,
  });
  ctx.pay(holder, total);
}

export function claim(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address
): bigint {
  const released = releaseFor(ctx, projectId, caller);
  if (released === 0n) {
    throw new NothingToClaimError(caller);
  }

  payRewards(ctx, caller, released);
  ctx.emit({ type: "RewardsClaimed", projectId, holder: caller, amountWei: released });
  return released;
}

export function assertClaimBatch(
  ctx: LedgerReadContext,
  projectIds: readonly ProjectId[]
): void {
  if (projectIds.length > ctx.maxClaimBatch) {
    throw new BatchSizeTooLargeError(projectIds.length, ctx.maxClaimBatch);
  }
}

export function claimMultiple(
  ctx: LedgerWriteContext,
  projectIds: readonly ProjectId[],
  caller: Address
): bigint {
  assertClaimBatch(ctx, projectIds);

  let total = 0n;
  const claimed: ProjectId[] = [];
  for (const projectId of projectIds) {
    const released = releaseFor(ctx, projectId, caller);
    if (released === 0n) continue;

    total += released;
    claimed.push(projectId);
    ctx.emit({ type: "RewardsClaimed", projectId, holder: caller, amountWei: released });
  }
  if (total === 0n) {
    throw new NothingToClaimError(caller);
  }

  payRewards(ctx, caller, total);
  ctx.emit({
    type: "BatchRewardsClaimed",
    holder: caller,
    projectIds: claimed,
    totalWei: total,
  });
  return total;
}

export function updateEnergy(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  deltaKwh: bigint
): void {
  const project = requireProject(ctx.store, projectId);
  assertCreatorOrAdmin(ctx, project, caller, `update energy of project ${projectId}`);
  assertActive(project);
  assertNonNegative(deltaKwh, "deltaKwh");

  const totalEnergyKwh = project.totalEnergyKwh + deltaKwh;
  ctx.store.saveProject({ ...project, totalEnergyKwh });
  ctx.emit({ type: "EnergyUpdated", projectId, deltaKwh, totalEnergyKwh });
}

export function setEnergy(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  valueKwh: bigint,
  reason: string
): void {
  const project = requireProject(ctx.store, projectId);
  assertCreatorOrAdmin(ctx, project, caller, `correct energy of project ${projectId}`);
  assertActive(project);
  assertNonNegative(valueKwh, "valueKwh");

  ctx.store.saveProject({ ...project, totalEnergyKwh: valueKwh });
  ctx.emit({
    type: "EnergyCorrected",
    projectId,
    previousKwh: project.totalEnergyKwh,
    totalEnergyKwh: valueKwh,
    reason,
  });
}

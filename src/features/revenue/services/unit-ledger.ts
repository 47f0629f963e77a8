// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/unit-ledger`
 * Purpose: Unit balances per (owner, project) with settlement-on-mutation, transfers, and operator approvals.
 * Scope: Balance primitive plus transfer/approval operations. Does not price or mint on its own; purchase lives in sales.ts.
 * Invariants:
 * - SETTLE_BEFORE_MUTATE: moveUnits settles every touched holder with pre-move balances; no other balance writer exists.
 * - Sum of balances per project equals project.minted.
 * - Self-transfer leaves balances unchanged; the second settlement earns zero.
 * - Transfers require the ledger not to be paused.
 * Side-effects: none (store writes inside the caller's transaction)
 * Links: packages/accrual-core/src/settlement.ts
 * @internal
 */

import { settlePosition } from "@solar-ledger/accrual-core";
import type { Address } from "viem";

import {
  ArrayLengthMismatchError,
  assertNonNegative,
  InsufficientBalanceError,
  InvalidOperatorError,
  InvalidRecipientError,
  isValidParty,
  type Project,
  type ProjectId,
  sameAddress,
  UnauthorizedError,
} from "@/core";
import type { RevenueLedgerStore, RewardPosition } from "@/ports";

import {
  assertNotPaused,
  type LedgerWriteContext,
  requireProject,
} from "./context";

/**
 * Credit reward earned since the holder's checkpoint. Returns the new position.
 */
export function settleHolder(
  store: RevenueLedgerStore,
  project: Project,
  holder: Address
): RewardPosition {
  const { position } = settlePosition(
    store.getRewardPosition(project.id, holder),
    store.getBalance(holder, project.id),
    project.rewardPerUnitStored
  );
  store.setRewardPosition(project.id, holder, position);
  return position;
}

/**
 * The balance-mutation primitive. `from: null` mints.
 */
export function moveUnits(
  store: RevenueLedgerStore,
  project: Project,
  from: Address | null,
  to: Address,
  amount: bigint
): void {
  if (from) {
    const balance = store.getBalance(from, project.id);
    if (balance < amount) {
      throw new InsufficientBalanceError(from, project.id, balance, amount);
    }
    settleHolder(store, project, from);
  }
  settleHolder(store, project, to);

  if (from) {
    store.setBalance(from, project.id, store.getBalance(from, project.id) - amount);
  }
  store.setBalance(to, project.id, store.getBalance(to, project.id) + amount);
  if (amount > 0n) {
    store.trackHolderProject(to, project.id);
  }
}

function assertMayMove(
  store: RevenueLedgerStore,
  operator: Address,
  from: Address,
  to: Address
): void {
  assertNotPaused(store);
  if (!isValidParty(to)) {
    throw new InvalidRecipientError(to);
  }
  if (
    !sameAddress(operator, from) &&
    !store.isApprovedForAll(from, operator)
  ) {
    throw new UnauthorizedError(operator, `move units held by ${from}`);
  }
}

export function transferUnits(
  ctx: LedgerWriteContext,
  operator: Address,
  from: Address,
  to: Address,
  projectId: ProjectId,
  amount: bigint
): void {
  assertMayMove(ctx.store, operator, from, to);
  assertNonNegative(amount, "amount");
  const project = requireProject(ctx.store, projectId);

  moveUnits(ctx.store, project, from, to, amount);
  ctx.emit({ type: "TransferSingle", operator, from, to, projectId, amount });
}

export function transferUnitsBatch(
  ctx: LedgerWriteContext,
  operator: Address,
  from: Address,
  to: Address,
  projectIds: readonly ProjectId[],
  amounts: readonly bigint[]
): void {
  assertMayMove(ctx.store, operator, from, to);
  if (projectIds.length !== amounts.length) {
    throw new ArrayLengthMismatchError(projectIds.length, amounts.length);
  }
  if (projectIds.length === 0) return;

  projectIds.forEach((projectId, index) => {
    const amount = amounts[index] ?? 0n;
    assertNonNegative(amount, `amounts[${index}]`);
    moveUnits(ctx.store, requireProject(ctx.store, projectId), from, to, amount);
  });

  ctx.emit({
    type: "TransferBatch",
    operator,
    from,
    to,
    projectIds: [...projectIds],
    amounts: [...amounts],
  });
}

export function setApprovalForAll(
  ctx: LedgerWriteContext,
  owner: Address,
  operator: Address,
  approved: boolean
): void {
  if (!isValidParty(operator) || sameAddress(owner, operator)) {
    throw new InvalidOperatorError(operator);
  }
  ctx.store.setApprovalForAll(owner, operator, approved);
  ctx.emit({ type: "ApprovalForAll", owner, operator, approved });
}

export function balanceOfBatch(
  store: RevenueLedgerStore,
  owners: readonly Address[],
  projectIds: readonly ProjectId[]
): bigint[] {
  if (owners.length !== projectIds.length) {
    throw new ArrayLengthMismatchError(owners.length, projectIds.length);
  }
  return owners.map((owner, index) => {
    const projectId = projectIds[index];
    return projectId === undefined ? 0n : store.getBalance(owner, projectId);
  });
}

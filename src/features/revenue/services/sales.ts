// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/sales`
 * Purpose: Unit purchases, creator sales withdrawals, direct receipts, and dust rescue.
 * Scope: Mints through the unit-ledger primitive and keeps treasury accumulators current. Does not distribute rewards.
 * Invariants:
 * - heldValue rises by the full payment and falls by every queued payout, so it tracks value actually held.
 * - totalSalesBalance equals the sum of project salesBalance.
 * - rescueDust never pays out sales balances or unclaimed investor rewards.
 * Side-effects: none (store writes and queued payouts inside the caller's transaction)
 * Links: core/revenue/treasury.ts, ./unit-ledger.ts (moveUnits)
 * @internal
 */

import { type Address, zeroAddress } from "viem";

import {
  computeDust,
  InsufficientSalesBalanceError,
  InvalidAmountError,
  InvalidRecipientError,
  isCreator,
  isValidParty,
  NoDustError,
  type ProjectId,
  quotePurchase,
  sameAddress,
  UnauthorizedError,
} from "@/core";

import {
  assertActive,
  assertNotPaused,
  type LedgerWriteContext,
  requireProject,
} from "./context";
import { moveUnits } from "./unit-ledger";

export interface PurchaseResult {
  costWei: bigint;
  refundWei: bigint;
}

export function purchase(
  ctx: LedgerWriteContext,
  buyer: Address,
  projectId: ProjectId,
  amount: bigint,
  paymentWei: bigint
): PurchaseResult {
  assertNotPaused(ctx.store);
  if (!isValidParty(buyer)) {
    throw new InvalidRecipientError(buyer);
  }
  const project = requireProject(ctx.store, projectId);
  assertActive(project);
  const costWei = quotePurchase(project, amount, paymentWei);
  const refundWei = paymentWei - costWei;

  moveUnits(ctx.store, project, null, buyer, amount);
  ctx.store.saveProject({
    ...project,
    minted: project.minted + amount,
    salesBalance: project.salesBalance + costWei,
  });

  const treasury = ctx.store.getTreasury();
  ctx.store.saveTreasury({
    ...treasury,
    heldValue: treasury.heldValue + paymentWei - refundWei,
    totalSalesBalance: treasury.totalSalesBalance + costWei,
  });
  if (refundWei > 0n) {
    ctx.pay(buyer, refundWei);
  }

  ctx.emit({
    type: "TransferSingle",
    operator: buyer,
    from: zeroAddress,
    to: buyer,
    projectId,
    amount,
  });
  ctx.emit({ type: "UnitsPurchased", projectId, buyer, amount, costWei, refundWei });
  return { costWei, refundWei };
}

export function withdrawSales(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  recipient: Address,
  amountWei: bigint
): void {
  const project = requireProject(ctx.store, projectId);
  if (!isCreator(project, caller)) {
    throw new UnauthorizedError(caller, `withdraw sales of project ${projectId}`);
  }
  if (!isValidParty(recipient)) {
    throw new InvalidRecipientError(recipient);
  }
  if (amountWei <= 0n) {
    throw new InvalidAmountError(
      `Withdrawal amount must be greater than zero, got ${amountWei}`
    );
  }
  if (amountWei > project.salesBalance) {
    throw new InsufficientSalesBalanceError(
      projectId,
      project.salesBalance,
      amountWei
    );
  }

  ctx.store.saveProject({
    ...project,
    salesBalance: project.salesBalance - amountWei,
  });
  const treasury = ctx.store.getTreasury();
  ctx.store.saveTreasury({
    ...treasury,
    heldValue: treasury.heldValue - amountWei,
    totalSalesBalance: treasury.totalSalesBalance - amountWei,
  });
  ctx.pay(recipient, amountWei);

  ctx.emit({ type: "SalesWithdrawn", projectId, recipient, amountWei });
}

/**
 * Value that arrived without a purchase or deposit. It is held but owed to nobody.
 */
export function receiveDirect(
  ctx: LedgerWriteContext,
  from: Address,
  amountWei: bigint
): void {
  if (amountWei <= 0n) {
    throw new InvalidAmountError(
      `Received amount must be greater than zero, got ${amountWei}`
    );
  }
  const treasury = ctx.store.getTreasury();
  ctx.store.saveTreasury({
    ...treasury,
    heldValue: treasury.heldValue + amountWei,
  });
  ctx.emit({ type: "ValueReceived", from, amountWei });
}

export function rescueDust(
  ctx: LedgerWriteContext,
  caller: Address,
  recipient: Address
): bigint {
  if (!sameAddress(caller, ctx.admin)) {
    throw new UnauthorizedError(caller, "rescue dust");
  }
  if (!isValidParty(recipient)) {
    throw new InvalidRecipientError(recipient);
  }

  const treasury = ctx.store.getTreasury();
  const dust = computeDust(treasury);
  if (dust === 0n) {
    throw new NoDustError();
  }

  ctx.store.saveTreasury({ ...treasury, heldValue: treasury.heldValue - dust });
  ctx.pay(recipient, dust);
  ctx.emit({ type: "DustRescued", recipient, amountWei: dust });
  return dust;
}

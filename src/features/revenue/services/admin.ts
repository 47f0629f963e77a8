// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/admin`
 * Purpose: Global pause gate.
 * Scope: Administrator-only pause/unpause. Pause blocks purchase and transfers only; the checks live beside those operations.
 * Invariants: Pausing a paused ledger or unpausing a running one fails.
 * Side-effects: none (store writes inside the caller's transaction)
 * @internal
 */

import type { Address } from "viem";

import {
  EnforcedPauseError,
  ExpectedPauseError,
  sameAddress,
  UnauthorizedError,
} from "@/core";

import type { LedgerWriteContext } from "./context";

export function pause(ctx: LedgerWriteContext, caller: Address): void {
  if (!sameAddress(caller, ctx.admin)) {
    throw new UnauthorizedError(caller, "pause the ledger");
  }
  if (ctx.store.isPaused()) {
    throw new EnforcedPauseError();
  }
  ctx.store.setPaused(true);
  ctx.emit({ type: "Paused", account: caller });
}

export function unpause(ctx: LedgerWriteContext, caller: Address): void {
  if (!sameAddress(caller, ctx.admin)) {
    throw new UnauthorizedError(caller, "unpause the ledger");
  }
  if (!ctx.store.isPaused()) {
    throw new ExpectedPauseError();
  }
  ctx.store.setPaused(false);
  ctx.emit({ type: "Unpaused", account: caller });
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/concurrency/exec-context`
 * Purpose: Per-operation execution context using AsyncLocalStorage.
 * Scope: Marks which ledger operation is in flight on the current async call chain. Does not hold state or dependencies.
 * Invariants:
 * - One context per operation; nested runs are visible to callers through getLedgerExecContext().
 * - Code reached from a payout (recipient hooks) inherits the context of the operation that paid.
 * - A context is visible only until its operation settles; work it deferred (timers, detached promises) sees none.
 * Side-effects: none (AsyncLocalStorage is per-call-chain isolation)
 * Links: features/revenue/revenue-ledger.ts
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface LedgerExecContext {
  /** Facade method name, e.g. "claim" */
  readonly operation: string;
  /** Correlation id for log lines */
  readonly opId: string;
}

interface ExecFrame {
  readonly context: LedgerExecContext;
  open: boolean;
}

const ledgerExecContextALS = new AsyncLocalStorage<ExecFrame>();

/**
 * Execute fn within a ledger execution context. The context closes when fn
 * settles, so callbacks fn deferred past that point no longer see it.
 */
export async function runWithLedgerExecContext<T>(
  context: LedgerExecContext,
  fn: () => T | Promise<T>
): Promise<T> {
  const frame: ExecFrame = { context, open: true };
  try {
    return await ledgerExecContextALS.run(frame, fn);
  } finally {
    frame.open = false;
  }
}

/**
 * Context of the operation still running on this call chain, or undefined.
 */
export function getLedgerExecContext(): LedgerExecContext | undefined {
  const frame = ledgerExecContextALS.getStore();
  return frame?.open ? frame.context : undefined;
}

export function hasLedgerExecContext(): boolean {
  return getLedgerExecContext() !== undefined;
}

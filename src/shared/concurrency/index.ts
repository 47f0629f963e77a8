// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/concurrency`
 * Purpose: Serialization and execution-context helpers.
 * Scope: Re-exports only. Does not contain logic.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  getLedgerExecContext,
  hasLedgerExecContext,
  type LedgerExecContext,
  runWithLedgerExecContext,
} from "./exec-context";
export { SerialLock } from "./serial-lock";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/public`
 * Purpose: Public API surface for the revenue feature - barrel export for stable feature boundaries.
 * Scope: Re-exports the ledger facade and its types; does not implement logic.
 * Invariants: Consumers import from this file, never from ./services.
 * Side-effects: none
 * @public
 */

export {
  RevenueLedger,
  type RevenueLedgerConfig,
  type RevenueLedgerDeps,
} from "./revenue-ledger";
export type { PurchaseResult } from "./services/sales";

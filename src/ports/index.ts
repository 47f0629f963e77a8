// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export type {
  LedgerEvent,
  LedgerEventSink,
  LedgerEventType,
} from "./ledger-events.port";
export {
  LedgerTransactionStatePortError,
  type Project,
  type ProjectId,
  type RevenueLedgerStore,
  type RewardPosition,
  type TreasuryTotals,
} from "./ledger-store.port";
export {
  isValueTransferFailedPortError,
  ValueTransferFailedPortError,
  type ValueTransferPort,
} from "./value-transfer.port";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Barrel of production adapters.
 * Scope: Re-exports adapter classes for the composition root. Does not instantiate anything.
 * Invariants: Named exports only
 * Side-effects: none
 * Links: src/bootstrap/container.ts
 * @public
 */

export { PinoLedgerEventSink } from "./events/pino-ledger-event-sink.adapter";
export {
  AccountBookValueTransfer,
  type ReceiveHook,
} from "./ledger/account-book-value-transfer.adapter";
export { InMemoryLedgerStore } from "./ledger/in-memory-ledger-store.adapter";
export { SystemClock } from "./time/system.adapter";

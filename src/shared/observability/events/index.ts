// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Valid event names as a const registry plus the base fields every event carries. Does not define payload schemas.
 * Invariants: All event names registered here; logEvent() enforces opId.
 * Side-effects: none
 * Links: ../logging/logEvent.ts
 * @public
 */

export const EVENT_NAMES = {
  // Ledger operations
  LEDGER_OP_COMPLETED: "ledger.op_completed",
  LEDGER_OP_REJECTED: "ledger.op_rejected",
  LEDGER_OP_FAILED: "ledger.op_failed",
  LEDGER_REENTRANT_CALL: "ledger.reentrant_call",

  // Committed domain events (one log line per LedgerEvent)
  LEDGER_EVENT: "ledger.event",

  // Adapter events
  ADAPTER_VALUE_TRANSFER_SENT: "adapter.value_transfer.sent",
  ADAPTER_VALUE_TRANSFER_REJECTED: "adapter.value_transfer.rejected",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Fields every structured event carries.
 * opId correlates the log lines of one ledger operation.
 */
export interface EventBase {
  opId: string;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/pino-ledger-event-sink`
 * Purpose: Publishes committed ledger events as structured log lines.
 * Scope: One info line per event under EVENT_NAMES.LEDGER_EVENT. Does not buffer or retry.
 * Invariants: bigint payload fields are logged as decimal strings; ledgerEvent carries the event type.
 * Side-effects: IO (logging)
 * Links: Implements LedgerEventSink
 * @public
 */

import type { LedgerEvent, LedgerEventSink } from "@/ports";
import { getLedgerExecContext } from "@/shared/concurrency";
import { EVENT_NAMES, type Logger, logEvent } from "@/shared/observability";

export class PinoLedgerEventSink implements LedgerEventSink {
  constructor(private readonly log: Logger) {}

  emit(event: LedgerEvent): void {
    const { type, ...payload } = event;
    logEvent(this.log, EVENT_NAMES.LEDGER_EVENT, {
      opId: getLedgerExecContext()?.opId ?? "external",
      ledgerEvent: type,
      ...payload,
    });
  }
}

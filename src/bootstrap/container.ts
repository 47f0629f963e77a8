// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root - wires adapters to ports and builds the RevenueLedger.
 * Scope: Environment-based adapter selection and singleton lifecycle. Does not contain business rules.
 * Invariants: All ports wired; single container instance per process unless reset.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: APP_ENV=test wires FakeValueTransferAdapter and RecordingLedgerEventSink; production wires the account book and pino sink.
 * Links: src/shared/env/server.ts
 * @public
 */

import {
  AccountBookValueTransfer,
  InMemoryLedgerStore,
  PinoLedgerEventSink,
  SystemClock,
} from "@/adapters/server";
import {
  FakeValueTransferAdapter,
  RecordingLedgerEventSink,
} from "@/adapters/test";
import { RevenueLedger } from "@/features/revenue/public";
import type {
  Clock,
  LedgerEventSink,
  RevenueLedgerStore,
  ValueTransferPort,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  clock: Clock;
  store: RevenueLedgerStore;
  transfers: ValueTransferPort;
  events: LedgerEventSink;
  ledger: RevenueLedger;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ bindings: { appEnv: env.APP_ENV } });

  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      admin: env.ADMIN_ADDRESS,
      maxClaimBatch: env.MAX_CLAIM_BATCH,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const transfers: ValueTransferPort = env.isTestMode
    ? new FakeValueTransferAdapter()
    : new AccountBookValueTransfer(log.child({ component: "ValueTransfer" }));

  const events: LedgerEventSink = env.isTestMode
    ? new RecordingLedgerEventSink()
    : new PinoLedgerEventSink(log.child({ component: "LedgerEvents" }));

  const clock = new SystemClock();
  const store = new InMemoryLedgerStore();
  const ledger = new RevenueLedger(
    { store, transfers, events, clock, log },
    { admin: env.ADMIN_ADDRESS, maxClaimBatch: env.MAX_CLAIM_BATCH }
  );

  return { log, clock, store, transfers, events, ledger };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory for the ledger process.
 * Scope: Builds configured root loggers. Does not bind operation context (logEvent and child loggers do that).
 * Invariants:
 * - JSON lines only; no worker transports.
 * - Top-level bigint fields of a log object are written as decimal strings.
 * - Never validates the full env, so it is safe at module scope.
 * Side-effects: none
 * Notes: Reads NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME directly. Silent under Vitest unless `enabled` is forced.
 * Links: ./redact.ts, ./logEvent.ts; used by bootstrap/container.ts
 * @public
 */

import type { DestinationStream, Logger } from "pino";
import pino from "pino";

import { toLogFields } from "./logEvent";
import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export interface LoggerOptions {
  /** Extra base fields; `app` and `service` always win */
  bindings?: Record<string, unknown>;
  /** Defaults to stdout */
  destination?: DestinationStream;
  /** Defaults to off under test tooling, on otherwise */
  enabled?: boolean;
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  // biome-ignore lint/style/noProcessEnv: logger bootstrap reads its own vars without full env validation
  const { VITEST, NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME } = process.env;
  const nodeEnv = NODE_ENV ?? "development";
  const underTest = VITEST === "true" || nodeEnv === "test";

  const destination =
    options.destination ??
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    });

  return pino(
    {
      level: PINO_LOG_LEVEL ?? "info",
      enabled: options.enabled ?? !underTest,
      base: {
        ...options.bindings,
        app: "solar-ledger",
        service: SERVICE_NAME ?? "solar-ledger",
      },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
      formatters: {
        log: toLogFields,
      },
    },
    destination
  );
}

/**
 * Silent logger with the real type, for tests.
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

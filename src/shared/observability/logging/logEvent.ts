// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logEvent`
 * Purpose: Type-safe event logger that enforces the event name registry and base fields.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants: opId MUST be present (throws under Vitest, logs an invariant line elsewhere); event name MUST be from the registry; bigint fields are logged as decimal strings.
 * Side-effects: IO (logging)
 * Links: ../events/index.ts
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

type LogLevel = "debug" | "info" | "warn" | "error";

/** JSON has no bigint; amounts are logged as decimal strings */
export function toLogFields(
  fields: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (typeof value === "bigint") {
      out[key] = value.toString();
    } else if (Array.isArray(value)) {
      out[key] = value.map((item) =>
        typeof item === "bigint" ? item.toString() : item
      );
    } else {
      out[key] = value;
    }
  }
  return out;
}

export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  options: { level?: LogLevel; message?: string } = {}
): void {
  if (!fields.opId) {
    // biome-ignore lint/style/noProcessEnv: Runtime test detection for strict validation
    if (process.env.VITEST === "true") {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without opId`
      );
    }
    logger.error(
      { event: eventName, missingField: "opId" },
      "inv_missing_opId_in_logEvent"
    );
    return;
  }

  const level = options.level ?? "info";
  logger[level](
    { event: eventName, ...toLogFields(fields) },
    options.message ?? eventName
  );
}

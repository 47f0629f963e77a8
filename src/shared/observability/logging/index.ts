// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging`
 * Purpose: Public API for structured logging.
 * Scope: Re-export logger factory, logEvent, and the Logger type. Does not implement logging transport.
 * Invariants: none
 * Side-effects: none
 * Links: ./logger.ts, ./logEvent.ts, ./redact.ts
 * @public
 */

export { logEvent, toLogFields } from "./logEvent";
export type { Logger, LoggerOptions } from "./logger";
export { makeLogger, makeNoopLogger } from "./logger";
export { REDACT_PATHS } from "./redact";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - event registry and logging.
 * Scope: Unified entry point. Does not implement logic.
 * Invariants: No imports from bootstrap, ports, or core.
 * Side-effects: none
 * Links: ./events, ./logging
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { Logger, LoggerOptions } from "./logging";
export {
  logEvent,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
  toLogFields,
} from "./logging";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Paths handed to pino's redact option. Does not implement redaction logic.
 * Invariants: Only known secret-bearing keys; addresses and amounts stay visible.
 * Side-effects: none
 * Links: ./logger.ts
 * @public
 */

export const REDACT_PATHS = [
  "password",
  "token",
  "secret",
  "apiKey",
  "privateKey",
  "mnemonic",
  "seed",
  "*.privateKey",
  "*.mnemonic",
];

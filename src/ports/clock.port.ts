// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for project creation timestamps.
 * Scope: Provides the current instant to feature services. Does not format or compare dates.
 * Invariants: Returns a fresh Date per call; callers never mutate it.
 * Side-effects: none (interface only)
 * Links: Implemented by SystemClock and tests/_fakes FakeClock
 * @public
 */

export interface Clock {
  now(): Date;
}

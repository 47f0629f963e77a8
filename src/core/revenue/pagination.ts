// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/pagination`
 * Purpose: Bounded offset/limit windows over ordered collections.
 * Scope: Pure function. Does not perform I/O.
 * Invariants: 1 <= limit <= max; offset past the end yields an empty page; hasMore = offset + count < total.
 * Side-effects: none
 * @public
 */

import { InvalidAmountError } from "./errors";
import type { Page } from "./model";

export function paginate<T>(
  items: readonly T[],
  offset: number,
  limit: number,
  maxLimit: number
): Page<T> {
  if (!Number.isInteger(limit) || limit < 1 || limit > maxLimit) {
    throw new InvalidAmountError(
      `Page limit must be between 1 and ${maxLimit}, got ${limit}`
    );
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidAmountError(
      `Page offset must be a non-negative integer, got ${offset}`
    );
  }

  const total = items.length;
  if (offset >= total) {
    return { items: [], total, hasMore: false };
  }

  const window = items.slice(offset, offset + limit);
  return {
    items: window,
    total,
    hasMore: offset + window.length < total,
  };
}

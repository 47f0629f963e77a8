// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/model`
 * Purpose: Domain entities for investment projects, unit positions, and paginated views.
 * Scope: Pure types and boundary constructors. Does not contain business logic or perform I/O.
 * Invariants:
 * - All currency and unit fields are bigint (ALL_MATH_BIGINT).
 * - minted <= totalSupply; 1 <= minPurchase <= totalSupply.
 * - rewardPerUnitStored is scaled by 10^18 and never decreases.
 * Side-effects: none
 * Links: Used by ports, features, and adapters
 * @public
 */

import type { Tagged } from "type-fest";
import type { Address } from "viem";

/** Branded project id: positive integer, assigned once, never reused. */
export type ProjectId = Tagged<bigint, "ProjectId">;

/** Validate and brand a raw id. Call at boundaries only. */
export function toProjectId(raw: bigint | number | string): ProjectId {
  let value: bigint;
  try {
    value = BigInt(raw);
  } catch {
    throw new RangeError(`Invalid ProjectId: ${String(raw)}`);
  }
  if (value < 1n) {
    throw new RangeError(`Invalid ProjectId (expected positive integer): ${value}`);
  }
  return value as ProjectId;
}

/**
 * Investment project
 * One fungible unit class per project.
 */
export interface Project {
  id: ProjectId;
  /** Current owner / administering party */
  creator: Address;
  name: string;
  totalSupply: bigint;
  minted: bigint;
  /** Minimum units per purchase call */
  minPurchase: bigint;
  /** Price per unit in wei */
  priceWei: bigint;
  /** Gate for purchases, deposits and energy updates */
  active: boolean;
  createdAt: Date;
  /** Informational energy counter; setEnergy may overwrite it */
  totalEnergyKwh: bigint;
  /** Lifetime deposited revenue in wei */
  totalRevenue: bigint;
  /** Cumulative reward per unit, scaled by 10^18 */
  rewardPerUnitStored: bigint;
  /** Wei owed to the creator from unit sales */
  salesBalance: bigint;
}

/** Creation parameters shared by createProject and createProjectFor */
export interface CreateProjectParams {
  name: string;
  totalSupply: bigint;
  priceWei: bigint;
  minPurchase: bigint;
}

/** Offset/limit window over an ordered collection */
export interface Page<T> {
  readonly items: readonly T[];
  /** Size of the whole collection */
  readonly total: number;
  readonly hasMore: boolean;
}

/** One row of a holder's portfolio */
export interface PortfolioEntry {
  readonly projectId: ProjectId;
  readonly balance: bigint;
  readonly claimable: bigint;
  readonly totalClaimed: bigint;
}

/** Treasury accumulators used for dust accounting */
export interface TreasuryTotals {
  /** All wei currently held by the ledger */
  heldValue: bigint;
  /** Sum of every project's salesBalance */
  totalSalesBalance: bigint;
  /** Sum over deposits of increase * minted (scaled by 10^18) */
  rewardReservedScaled: bigint;
  /** Sum of all claimed rewards */
  totalRewardsClaimed: bigint;
}

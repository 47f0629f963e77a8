// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/ledger-store`
 * Purpose: Transactional state store port for projects, unit balances, reward positions, and treasury totals.
 * Scope: Defines the storage contract used by revenue feature services. Does not implement persistence or business rules.
 * Invariants:
 * - TX_ALL_OR_NOTHING: writes between begin() and rollback() leave no trace; commit() makes them durable.
 * - Only one transaction is open at a time; the ledger serializes callers before begin().
 * - Address keys compare case-insensitively.
 * - Unknown (owner, project) pairs read as zero balance and EMPTY_POSITION.
 * - getProject returns null for ids never created (single existence predicate).
 * Side-effects: none (interface definition only)
 * Notes: Synchronous. All I/O happens in the value-transfer port, never mid-write.
 * Links: Implemented by InMemoryLedgerStore, used by features/revenue services
 * @public
 */

import type { RewardPosition } from "@solar-ledger/accrual-core";
import type { Address } from "viem";

import type { Project, ProjectId, TreasuryTotals } from "@/core";

// Re-export core types so adapters don't import from @/core directly
export type { Project, ProjectId, TreasuryTotals } from "@/core";
export type { RewardPosition } from "@solar-ledger/accrual-core";

/**
 * Port-level error thrown when transaction calls are out of order
 */
export class LedgerTransactionStatePortError extends Error {
  constructor(public readonly detail: string) {
    super(`Ledger store transaction misuse: ${detail}`);
    this.name = "LedgerTransactionStatePortError";
  }
}

export interface RevenueLedgerStore {
  /** Opens a write transaction. Throws if one is already open. */
  begin(): void;
  /** Makes every write since begin() durable. */
  commit(): void;
  /** Discards every write since begin(). */
  rollback(): void;

  /** Reserves the next project id (monotonic, starts at 1, rolled back with the transaction). */
  allocateProjectId(): ProjectId;
  getProject(id: ProjectId): Project | null;
  saveProject(project: Project): void;
  /** All project ids in creation order */
  listProjectIds(): readonly ProjectId[];

  getBalance(owner: Address, id: ProjectId): bigint;
  setBalance(owner: Address, id: ProjectId, balance: bigint): void;

  getRewardPosition(id: ProjectId, holder: Address): RewardPosition;
  setRewardPosition(id: ProjectId, holder: Address, position: RewardPosition): void;

  isApprovedForAll(owner: Address, operator: Address): boolean;
  setApprovalForAll(owner: Address, operator: Address, approved: boolean): void;

  /** Project ids currently owned by creator. Order is not guaranteed after removals. */
  getCreatorProjects(creator: Address): readonly ProjectId[];
  addCreatorProject(creator: Address, id: ProjectId): void;
  /** Swap-with-last removal. */
  removeCreatorProject(creator: Address, id: ProjectId): void;

  /** Project ids a holder has ever been credited units in, first-touch order */
  getHolderProjects(holder: Address): readonly ProjectId[];
  /** Idempotent append to the holder index */
  trackHolderProject(holder: Address, id: ProjectId): void;

  getTreasury(): TreasuryTotals;
  saveTreasury(totals: TreasuryTotals): void;

  isPaused(): boolean;
  setPaused(paused: boolean): void;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/in-memory-ledger-store`
 * Purpose: Journaled in-memory implementation of RevenueLedgerStore.
 * Scope: Holds all ledger state in Maps; records an undo entry per write so rollback() restores the pre-transaction state. Does not enforce business rules.
 * Invariants:
 * - TX_ALL_OR_NOTHING: every mutator journals its undo closures while a transaction is open.
 * - Writes outside a transaction are rejected.
 * - Stored projects are copied on write and on read; callers never alias internal state.
 * - Creator index is an index map + vector: O(1) append and swap-with-last removal.
 * Side-effects: none (process memory only)
 * Links: Implements RevenueLedgerStore port
 * @public
 */

import { EMPTY_POSITION } from "@solar-ledger/accrual-core";
import type { Address } from "viem";

import { toProjectId } from "@/core";

import {
  LedgerTransactionStatePortError,
  type Project,
  type ProjectId,
  type RevenueLedgerStore,
  type RewardPosition,
  type TreasuryTotals,
} from "@/ports";

type Undo = () => void;

const EMPTY_TREASURY: TreasuryTotals = {
  heldValue: 0n,
  totalSalesBalance: 0n,
  rewardReservedScaled: 0n,
  totalRewardsClaimed: 0n,
};

function addr(address: Address): string {
  return address.toLowerCase();
}

function pairKey(id: ProjectId, address: Address): string {
  return `${id}:${addr(address)}`;
}

export class InMemoryLedgerStore implements RevenueLedgerStore {
  private readonly projects = new Map<bigint, Project>();
  private readonly projectOrder: ProjectId[] = [];
  private nextProjectId = 1n;

  private readonly balances = new Map<string, bigint>();
  private readonly positions = new Map<string, RewardPosition>();
  private readonly approvals = new Map<string, boolean>();

  private readonly creatorLists = new Map<string, ProjectId[]>();
  private readonly creatorSlots = new Map<string, number>();
  private readonly holderLists = new Map<string, ProjectId[]>();
  private readonly holderSeen = new Set<string>();

  private treasury: TreasuryTotals = EMPTY_TREASURY;
  private paused = false;

  private journal: Undo[] | null = null;

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  begin(): void {
    if (this.journal) {
      throw new LedgerTransactionStatePortError("transaction already open");
    }
    this.journal = [];
  }

  commit(): void {
    if (!this.journal) {
      throw new LedgerTransactionStatePortError("commit without begin");
    }
    this.journal = null;
  }

  rollback(): void {
    const journal = this.journal;
    if (!journal) {
      throw new LedgerTransactionStatePortError("rollback without begin");
    }
    for (let i = journal.length - 1; i >= 0; i--) {
      journal[i]?.();
    }
    this.journal = null;
  }

  private record(undo: Undo): void {
    if (!this.journal) {
      throw new LedgerTransactionStatePortError("write outside transaction");
    }
    this.journal.push(undo);
  }

  private setEntry<K, V>(map: Map<K, V>, key: K, value: V): void {
    const had = map.has(key);
    const previous = map.get(key);
    this.record(() => {
      if (had && previous !== undefined) {
        map.set(key, previous);
      } else {
        map.delete(key);
      }
    });
    map.set(key, value);
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  allocateProjectId(): ProjectId {
    const id = toProjectId(this.nextProjectId);
    this.record(() => {
      this.nextProjectId = id;
    });
    this.nextProjectId = id + 1n;
    return id;
  }

  getProject(id: ProjectId): Project | null {
    const project = this.projects.get(id);
    return project ? { ...project } : null;
  }

  saveProject(project: Project): void {
    if (!this.projects.has(project.id)) {
      this.record(() => {
        this.projectOrder.pop();
      });
      this.projectOrder.push(project.id);
    }
    this.setEntry(this.projects, project.id, { ...project });
  }

  listProjectIds(): readonly ProjectId[] {
    return [...this.projectOrder];
  }

  // ---------------------------------------------------------------------------
  // Balances, positions, approvals
  // ---------------------------------------------------------------------------

  getBalance(owner: Address, id: ProjectId): bigint {
    return this.balances.get(pairKey(id, owner)) ?? 0n;
  }

  setBalance(owner: Address, id: ProjectId, balance: bigint): void {
    this.setEntry(this.balances, pairKey(id, owner), balance);
  }

  getRewardPosition(id: ProjectId, holder: Address): RewardPosition {
    return this.positions.get(pairKey(id, holder)) ?? EMPTY_POSITION;
  }

  setRewardPosition(
    id: ProjectId,
    holder: Address,
    position: RewardPosition
  ): void {
    this.setEntry(this.positions, pairKey(id, holder), position);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.approvals.get(`${addr(owner)}:${addr(operator)}`) ?? false;
  }

  setApprovalForAll(owner: Address, operator: Address, approved: boolean): void {
    this.setEntry(this.approvals, `${addr(owner)}:${addr(operator)}`, approved);
  }

  // ---------------------------------------------------------------------------
  // Indexes
  // ---------------------------------------------------------------------------

  getCreatorProjects(creator: Address): readonly ProjectId[] {
    return [...(this.creatorLists.get(addr(creator)) ?? [])];
  }

  addCreatorProject(creator: Address, id: ProjectId): void {
    const owner = addr(creator);
    const slotKey = `${owner}:${id}`;
    if (this.creatorSlots.has(slotKey)) return;

    let list = this.creatorLists.get(owner);
    if (!list) {
      list = [];
      this.setEntry(this.creatorLists, owner, list);
    }
    const target = list;
    this.record(() => {
      target.pop();
    });
    target.push(id);
    this.setEntry(this.creatorSlots, slotKey, target.length - 1);
  }

  removeCreatorProject(creator: Address, id: ProjectId): void {
    const owner = addr(creator);
    const slotKey = `${owner}:${id}`;
    const list = this.creatorLists.get(owner);
    const slot = this.creatorSlots.get(slotKey);
    if (!list || slot === undefined) return;

    const lastIndex = list.length - 1;
    const last = list[lastIndex];
    if (last === undefined) return;

    this.record(() => {
      list.push(last);
      list[slot] = id;
    });
    list[slot] = last;
    list.pop();

    this.setEntry(this.creatorSlots, `${owner}:${last}`, slot);
    const had = this.creatorSlots.get(slotKey);
    this.record(() => {
      if (had !== undefined) this.creatorSlots.set(slotKey, had);
    });
    this.creatorSlots.delete(slotKey);
  }

  getHolderProjects(holder: Address): readonly ProjectId[] {
    return [...(this.holderLists.get(addr(holder)) ?? [])];
  }

  trackHolderProject(holder: Address, id: ProjectId): void {
    const key = pairKey(id, holder);
    if (this.holderSeen.has(key)) return;

    const owner = addr(holder);
    let list = this.holderLists.get(owner);
    if (!list) {
      list = [];
      this.setEntry(this.holderLists, owner, list);
    }
    const target = list;
    this.record(() => {
      target.pop();
      this.holderSeen.delete(key);
    });
    target.push(id);
    this.holderSeen.add(key);
  }

  // ---------------------------------------------------------------------------
  // Treasury and pause flag
  // ---------------------------------------------------------------------------

  getTreasury(): TreasuryTotals {
    return { ...this.treasury };
  }

  saveTreasury(totals: TreasuryTotals): void {
    const previous = this.treasury;
    this.record(() => {
      this.treasury = previous;
    });
    this.treasury = { ...totals };
  }

  isPaused(): boolean {
    return this.paused;
  }

  setPaused(paused: boolean): void {
    const previous = this.paused;
    this.record(() => {
      this.paused = previous;
    });
    this.paused = paused;
  }
}

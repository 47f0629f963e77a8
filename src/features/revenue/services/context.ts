// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/context`
 * Purpose: Operation context handed to revenue services, plus the guards they share.
 * Scope: Context types and precondition helpers. Does not open transactions or perform payouts.
 * Invariants:
 * - Services never call the value-transfer port; they queue payouts with pay() and the ledger sends them after all writes.
 * - Services never reach the event sink; emit() buffers until commit.
 * - requireProject is the single existence predicate.
 * Side-effects: none
 * Links: ../revenue-ledger.ts
 * @internal
 */

import type { Address } from "viem";

import {
  EnforcedPauseError,
  isCreatorOrAdmin,
  type Project,
  type ProjectId,
  ProjectNotActiveError,
  ProjectNotFoundError,
  UnauthorizedError,
} from "@/core";
import type { Clock, LedgerEvent, RevenueLedgerStore } from "@/ports";

export interface LedgerReadContext {
  readonly store: RevenueLedgerStore;
  readonly maxClaimBatch: number;
}

export interface LedgerWriteContext extends LedgerReadContext {
  readonly admin: Address;
  readonly clock: Clock;
  /** Buffer an event for delivery after commit */
  emit(event: LedgerEvent): void;
  /** Queue an outbound transfer, sent after every write of the operation */
  pay(recipient: Address, amountWei: bigint): void;
}

export function requireProject(
  store: RevenueLedgerStore,
  projectId: ProjectId
): Project {
  const project = store.getProject(projectId);
  if (!project) {
    throw new ProjectNotFoundError(projectId);
  }
  return project;
}

export function assertNotPaused(store: RevenueLedgerStore): void {
  if (store.isPaused()) {
    throw new EnforcedPauseError();
  }
}

export function assertActive(project: Project): void {
  if (!project.active) {
    throw new ProjectNotActiveError(project.id);
  }
}

export function assertCreatorOrAdmin(
  ctx: LedgerWriteContext,
  project: Project,
  caller: Address,
  action: string
): void {
  if (!isCreatorOrAdmin(project, caller, ctx.admin)) {
    throw new UnauthorizedError(caller, action);
  }
}

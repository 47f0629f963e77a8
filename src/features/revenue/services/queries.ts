// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/queries`
 * Purpose: Bounded read views over projects, holdings, and the treasury.
 * Scope: Pure reads. Does not write or settle.
 * Invariants:
 * - List views are windowed by paginate(); limit 0 or above the view's bound fails, offset past the end is an empty page.
 * - getTotalClaimable counts a repeated project id once.
 * Side-effects: none
 * Links: core/revenue/pagination.ts
 * @internal
 */

import { previewClaimable } from "@solar-ledger/accrual-core";
import type { Address } from "viem";

import {
  computeDust,
  MAX_PORTFOLIO_PAGE,
  MAX_PROJECTS_PAGE,
  MAX_USER_PROJECTS_PAGE,
  type Page,
  type PortfolioEntry,
  type Project,
  type ProjectId,
  paginate,
} from "@/core";
import type { RevenueLedgerStore } from "@/ports";

import { assertClaimBatch } from "./accrual";
import { type LedgerReadContext, requireProject } from "./context";

export function getProject(
  store: RevenueLedgerStore,
  projectId: ProjectId
): Project {
  return requireProject(store, projectId);
}

export function projectExists(
  store: RevenueLedgerStore,
  projectId: ProjectId
): boolean {
  return store.getProject(projectId) !== null;
}

export function getUserProjects(
  store: RevenueLedgerStore,
  creator: Address
): readonly ProjectId[] {
  return store.getCreatorProjects(creator);
}

export function getUserProjectsPaginated(
  store: RevenueLedgerStore,
  creator: Address,
  offset: number,
  limit: number
): Page<ProjectId> {
  return paginate(
    store.getCreatorProjects(creator),
    offset,
    limit,
    MAX_USER_PROJECTS_PAGE
  );
}

export function listProjects(
  store: RevenueLedgerStore,
  offset: number,
  limit: number
): Page<Project> {
  const page = paginate(store.listProjectIds(), offset, limit, MAX_PROJECTS_PAGE);
  return {
    ...page,
    items: page.items.map((projectId) => requireProject(store, projectId)),
  };
}

export function getPortfolio(
  store: RevenueLedgerStore,
  holder: Address,
  offset: number,
  limit: number
): Page<PortfolioEntry> {
  const page = paginate(
    store.getHolderProjects(holder),
    offset,
    limit,
    MAX_PORTFOLIO_PAGE
  );
  return {
    ...page,
    items: page.items.map((projectId): PortfolioEntry => {
      const project = requireProject(store, projectId);
      const position = store.getRewardPosition(projectId, holder);
      const balance = store.getBalance(holder, projectId);
      return {
        projectId,
        balance,
        claimable: previewClaimable(position, balance, project.rewardPerUnitStored),
        totalClaimed: position.totalClaimed,
      };
    }),
  };
}

export function getTotalClaimable(
  ctx: LedgerReadContext,
  holder: Address,
  projectIds: readonly ProjectId[]
): bigint {
  assertClaimBatch(ctx, projectIds);

  let total = 0n;
  for (const projectId of new Set(projectIds)) {
    const project = requireProject(ctx.store, projectId);
    total += previewClaimable(
      ctx.store.getRewardPosition(projectId, holder),
      ctx.store.getBalance(holder, projectId),
      project.rewardPerUnitStored
    );
  }
  return total;
}

export function getSalesBalance(
  store: RevenueLedgerStore,
  projectId: ProjectId
): bigint {
  return requireProject(store, projectId).salesBalance;
}

export function getTotalClaimed(
  store: RevenueLedgerStore,
  projectId: ProjectId,
  holder: Address
): bigint {
  requireProject(store, projectId);
  return store.getRewardPosition(projectId, holder).totalClaimed;
}

export function getDustAmount(store: RevenueLedgerStore): bigint {
  return computeDust(store.getTreasury());
}

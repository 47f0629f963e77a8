// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/services/registry`
 * Purpose: Project lifecycle - creation, ownership transfer, activation, price correction.
 * Scope: Writes projects and the creator index. Does not touch balances or rewards.
 * Invariants:
 * - Ids are allocated by the store, start at 1, never reused.
 * - A project sits in exactly one creator list: its current creator's.
 * - priceWei changes only while minted == 0.
 * Side-effects: none (store writes inside the caller's transaction)
 * Links: core/revenue/rules.ts
 * @internal
 */

import type { Address } from "viem";

import {
  assertValidCreateParams,
  type CreateProjectParams,
  InvalidCreatorError,
  InvalidPriceError,
  isCreator,
  isValidParty,
  type Project,
  type ProjectId,
  PriceLockedError,
  sameAddress,
  UnauthorizedError,
} from "@/core";

import { type LedgerWriteContext, requireProject } from "./context";

function assertCreator(project: Project, caller: Address, action: string): void {
  if (!isCreator(project, caller)) {
    throw new UnauthorizedError(caller, action);
  }
}

function assertAdmin(ctx: LedgerWriteContext, caller: Address, action: string): void {
  if (!sameAddress(caller, ctx.admin)) {
    throw new UnauthorizedError(caller, action);
  }
}

export function createProject(
  ctx: LedgerWriteContext,
  creator: Address,
  params: CreateProjectParams
): ProjectId {
  if (!isValidParty(creator)) {
    throw new InvalidCreatorError(creator);
  }
  assertValidCreateParams(params);

  const project: Project = {
    id: ctx.store.allocateProjectId(),
    creator,
    name: params.name,
    totalSupply: params.totalSupply,
    minted: 0n,
    minPurchase: params.minPurchase,
    priceWei: params.priceWei,
    active: true,
    createdAt: ctx.clock.now(),
    totalEnergyKwh: 0n,
    totalRevenue: 0n,
    rewardPerUnitStored: 0n,
    salesBalance: 0n,
  };
  ctx.store.saveProject(project);
  ctx.store.addCreatorProject(creator, project.id);

  ctx.emit({
    type: "ProjectCreated",
    projectId: project.id,
    creator,
    name: project.name,
    totalSupply: project.totalSupply,
    priceWei: project.priceWei,
    minPurchase: project.minPurchase,
  });
  return project.id;
}

export function createProjectFor(
  ctx: LedgerWriteContext,
  caller: Address,
  creator: Address,
  params: CreateProjectParams
): ProjectId {
  assertAdmin(ctx, caller, "create projects for other accounts");
  return createProject(ctx, creator, params);
}

export function transferProjectOwnership(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  newCreator: Address
): void {
  const project = requireProject(ctx.store, projectId);
  assertCreator(project, caller, `transfer ownership of project ${projectId}`);
  if (!isValidParty(newCreator)) {
    throw new InvalidCreatorError(newCreator);
  }

  const previousCreator = project.creator;
  ctx.store.removeCreatorProject(previousCreator, projectId);
  ctx.store.addCreatorProject(newCreator, projectId);
  ctx.store.saveProject({ ...project, creator: newCreator });

  ctx.emit({
    type: "ProjectOwnershipTransferred",
    projectId,
    previousCreator,
    newCreator,
  });
}

export function setProjectStatus(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  active: boolean
): void {
  const project = requireProject(ctx.store, projectId);
  assertCreator(project, caller, `change status of project ${projectId}`);

  ctx.store.saveProject({ ...project, active });
  ctx.emit({ type: "ProjectStatusChanged", projectId, active });
}

export function updateProjectPrice(
  ctx: LedgerWriteContext,
  projectId: ProjectId,
  caller: Address,
  priceWei: bigint
): void {
  assertAdmin(ctx, caller, `update the price of project ${projectId}`);
  const project = requireProject(ctx.store, projectId);
  if (priceWei <= 0n) {
    throw new InvalidPriceError(priceWei);
  }
  if (project.minted > 0n) {
    throw new PriceLockedError(projectId, project.minted);
  }

  ctx.store.saveProject({ ...project, priceWei });
  ctx.emit({
    type: "ProjectPriceUpdated",
    projectId,
    previousPriceWei: project.priceWei,
    priceWei,
  });
}

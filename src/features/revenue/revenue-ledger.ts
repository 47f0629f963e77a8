// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/revenue-ledger`
 * Purpose: Facade over the revenue services - the only entry point that opens transactions and moves value.
 * Scope: Serializes operations, runs each mutation in one store transaction, sends queued payouts, then publishes buffered events. Business rules live in ./services.
 * Invariants:
 * - SERIAL: every public operation runs through one SerialLock; no caller observes a half-applied mutation.
 * - EFFECTS_BEFORE_INTERACTIONS: payouts are sent only after the service body has written all state.
 * - TX_ALL_OR_NOTHING: any error, including a rejected payout, rolls back every write of the operation.
 * - NO_REENTRY: a mutation started while another is in flight on the same call chain fails with ReentrantCallError; reads run inline.
 * - Work a payout hook defers past the end of its operation is an ordinary caller and queues on the lock.
 * - Events reach the sink only after commit, in emission order.
 * Side-effects: IO (value transfers, logging, event sink)
 * Links: ./services, @/shared/concurrency
 * @public
 */

import { randomUUID } from "node:crypto";

import type { Address } from "viem";

import {
  type CreateProjectParams,
  isRevenueLedgerError,
  MAX_CLAIM_BATCH,
  type Page,
  type PortfolioEntry,
  type Project,
  type ProjectId,
  ReentrantCallError,
  TransferFailedError,
} from "@/core";
import {
  type Clock,
  isValueTransferFailedPortError,
  type LedgerEvent,
  type LedgerEventSink,
  type RevenueLedgerStore,
  type ValueTransferPort,
} from "@/ports";
import {
  getLedgerExecContext,
  hasLedgerExecContext,
  runWithLedgerExecContext,
  SerialLock,
} from "@/shared/concurrency";
import { EVENT_NAMES, type Logger, logEvent } from "@/shared/observability";

import * as accrual from "./services/accrual";
import * as admin from "./services/admin";
import type { LedgerReadContext, LedgerWriteContext } from "./services/context";
import * as queries from "./services/queries";
import * as registry from "./services/registry";
import * as sales from "./services/sales";
import type { PurchaseResult } from "./services/sales";
import * as units from "./services/unit-ledger";

export interface RevenueLedgerDeps {
  store: RevenueLedgerStore;
  transfers: ValueTransferPort;
  events: LedgerEventSink;
  clock: Clock;
  log: Logger;
}

export interface RevenueLedgerConfig {
  /** Single ledger-wide administrator */
  admin: Address;
  /** Ceiling for claimMultiple/getTotalClaimable; capped at MAX_CLAIM_BATCH */
  maxClaimBatch?: number;
}

interface Payout {
  recipient: Address;
  amountWei: bigint;
}

export class RevenueLedger {
  private readonly lock = new SerialLock();
  private readonly log: Logger;
  private readonly readContext: LedgerReadContext;

  constructor(
    private readonly deps: RevenueLedgerDeps,
    private readonly config: RevenueLedgerConfig
  ) {
    this.log = deps.log.child({ component: "RevenueLedger" });
    this.readContext = {
      store: deps.store,
      maxClaimBatch: Math.min(
        config.maxClaimBatch ?? MAX_CLAIM_BATCH,
        MAX_CLAIM_BATCH
      ),
    };
  }

  get admin(): Address {
    return this.config.admin;
  }

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  createProject(caller: Address, params: CreateProjectParams): Promise<ProjectId> {
    return this.mutate("createProject", (ctx) =>
      registry.createProject(ctx, caller, params)
    );
  }

  createProjectFor(
    caller: Address,
    creator: Address,
    params: CreateProjectParams
  ): Promise<ProjectId> {
    return this.mutate("createProjectFor", (ctx) =>
      registry.createProjectFor(ctx, caller, creator, params)
    );
  }

  transferProjectOwnership(
    projectId: ProjectId,
    caller: Address,
    newCreator: Address
  ): Promise<void> {
    return this.mutate("transferProjectOwnership", (ctx) =>
      registry.transferProjectOwnership(ctx, projectId, caller, newCreator)
    );
  }

  setProjectStatus(
    projectId: ProjectId,
    caller: Address,
    active: boolean
  ): Promise<void> {
    return this.mutate("setProjectStatus", (ctx) =>
      registry.setProjectStatus(ctx, projectId, caller, active)
    );
  }

  updateProjectPrice(
    projectId: ProjectId,
    caller: Address,
    priceWei: bigint
  ): Promise<void> {
    return this.mutate("updateProjectPrice", (ctx) =>
      registry.updateProjectPrice(ctx, projectId, caller, priceWei)
    );
  }

  // ---------------------------------------------------------------------------
  // Units
  // ---------------------------------------------------------------------------

  transfer(
    operator: Address,
    from: Address,
    to: Address,
    projectId: ProjectId,
    amount: bigint
  ): Promise<void> {
    return this.mutate("transfer", (ctx) =>
      units.transferUnits(ctx, operator, from, to, projectId, amount)
    );
  }

  transferBatch(
    operator: Address,
    from: Address,
    to: Address,
    projectIds: readonly ProjectId[],
    amounts: readonly bigint[]
  ): Promise<void> {
    return this.mutate("transferBatch", (ctx) =>
      units.transferUnitsBatch(ctx, operator, from, to, projectIds, amounts)
    );
  }

  setApprovalForAll(
    owner: Address,
    operator: Address,
    approved: boolean
  ): Promise<void> {
    return this.mutate("setApprovalForAll", (ctx) =>
      units.setApprovalForAll(ctx, owner, operator, approved)
    );
  }

  // ---------------------------------------------------------------------------
  // Sales & treasury
  // ---------------------------------------------------------------------------

  purchase(
    buyer: Address,
    projectId: ProjectId,
    amount: bigint,
    paymentWei: bigint
  ): Promise<PurchaseResult> {
    return this.mutate("purchase", (ctx) =>
      sales.purchase(ctx, buyer, projectId, amount, paymentWei)
    );
  }

  withdrawSales(
    projectId: ProjectId,
    caller: Address,
    recipient: Address,
    amountWei: bigint
  ): Promise<void> {
    return this.mutate("withdrawSales", (ctx) =>
      sales.withdrawSales(ctx, projectId, caller, recipient, amountWei)
    );
  }

  receiveDirect(from: Address, amountWei: bigint): Promise<void> {
    return this.mutate("receiveDirect", (ctx) =>
      sales.receiveDirect(ctx, from, amountWei)
    );
  }

  rescueDust(caller: Address, recipient: Address): Promise<bigint> {
    return this.mutate("rescueDust", (ctx) =>
      sales.rescueDust(ctx, caller, recipient)
    );
  }

  // ---------------------------------------------------------------------------
  // Revenue accrual
  // ---------------------------------------------------------------------------

  depositRevenue(
    projectId: ProjectId,
    caller: Address,
    amountWei: bigint,
    energyDeltaKwh = 0n
  ): Promise<void> {
    return this.mutate("depositRevenue", (ctx) =>
      accrual.depositRevenue(ctx, projectId, caller, amountWei, energyDeltaKwh)
    );
  }

  claim(projectId: ProjectId, caller: Address): Promise<bigint> {
    return this.mutate("claim", (ctx) => accrual.claim(ctx, projectId, caller));
  }

  claimMultiple(
    projectIds: readonly ProjectId[],
    caller: Address
  ): Promise<bigint> {
    return this.mutate("claimMultiple", (ctx) =>
      accrual.claimMultiple(ctx, projectIds, caller)
    );
  }

  updateEnergy(
    projectId: ProjectId,
    caller: Address,
    deltaKwh: bigint
  ): Promise<void> {
    return this.mutate("updateEnergy", (ctx) =>
      accrual.updateEnergy(ctx, projectId, caller, deltaKwh)
    );
  }

  setEnergy(
    projectId: ProjectId,
    caller: Address,
    valueKwh: bigint,
    reason: string
  ): Promise<void> {
    return this.mutate("setEnergy", (ctx) =>
      accrual.setEnergy(ctx, projectId, caller, valueKwh, reason)
    );
  }

  // ---------------------------------------------------------------------------
  // Pause gate
  // ---------------------------------------------------------------------------

  pause(caller: Address): Promise<void> {
    return this.mutate("pause", (ctx) => admin.pause(ctx, caller));
  }

  unpause(caller: Address): Promise<void> {
    return this.mutate("unpause", (ctx) => admin.unpause(ctx, caller));
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getProject(projectId: ProjectId): Promise<Project> {
    return this.read(({ store }) => queries.getProject(store, projectId));
  }

  projectExists(projectId: ProjectId): Promise<boolean> {
    return this.read(({ store }) => queries.projectExists(store, projectId));
  }

  balanceOf(owner: Address, projectId: ProjectId): Promise<bigint> {
    return this.read(({ store }) => store.getBalance(owner, projectId));
  }

  balanceOfBatch(
    owners: readonly Address[],
    projectIds: readonly ProjectId[]
  ): Promise<bigint[]> {
    return this.read(({ store }) =>
      units.balanceOfBatch(store, owners, projectIds)
    );
  }

  isApprovedForAll(owner: Address, operator: Address): Promise<boolean> {
    return this.read(({ store }) => store.isApprovedForAll(owner, operator));
  }

  getClaimableAmount(projectId: ProjectId, holder: Address): Promise<bigint> {
    return this.read(({ store }) =>
      accrual.claimableAmount(store, projectId, holder)
    );
  }

  getTotalClaimable(
    holder: Address,
    projectIds: readonly ProjectId[]
  ): Promise<bigint> {
    return this.read((ctx) => queries.getTotalClaimable(ctx, holder, projectIds));
  }

  getUserProjects(creator: Address): Promise<readonly ProjectId[]> {
    return this.read(({ store }) => queries.getUserProjects(store, creator));
  }

  getUserProjectsPaginated(
    creator: Address,
    offset: number,
    limit: number
  ): Promise<Page<ProjectId>> {
    return this.read(({ store }) =>
      queries.getUserProjectsPaginated(store, creator, offset, limit)
    );
  }

  listProjects(offset: number, limit: number): Promise<Page<Project>> {
    return this.read(({ store }) => queries.listProjects(store, offset, limit));
  }

  getPortfolio(
    holder: Address,
    offset: number,
    limit: number
  ): Promise<Page<PortfolioEntry>> {
    return this.read(({ store }) =>
      queries.getPortfolio(store, holder, offset, limit)
    );
  }

  getSalesBalance(projectId: ProjectId): Promise<bigint> {
    return this.read(({ store }) => queries.getSalesBalance(store, projectId));
  }

  getTotalClaimed(projectId: ProjectId, holder: Address): Promise<bigint> {
    return this.read(({ store }) =>
      queries.getTotalClaimed(store, projectId, holder)
    );
  }

  isPaused(): Promise<boolean> {
    return this.read(({ store }) => store.isPaused());
  }

  getDustAmount(): Promise<bigint> {
    return this.read(({ store }) => queries.getDustAmount(store));
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  private async read<T>(body: (ctx: LedgerReadContext) => T): Promise<T> {
    // A payout hook of the running operation already holds the lock
    if (hasLedgerExecContext()) {
      return body(this.readContext);
    }
    return this.lock.run(async () => body(this.readContext));
  }

  private async mutate<T>(
    operation: string,
    body: (ctx: LedgerWriteContext) => T
  ): Promise<T> {
    const active = getLedgerExecContext();
    if (active) {
      logEvent(
        this.log,
        EVENT_NAMES.LEDGER_REENTRANT_CALL,
        { opId: active.opId, operation, activeOperation: active.operation },
        { level: "warn" }
      );
      throw new ReentrantCallError(operation, active.operation);
    }

    return this.lock.run(() =>
      runWithLedgerExecContext({ operation, opId: randomUUID() }, () =>
        this.execute(operation, body)
      )
    );
  }

  private async execute<T>(
    operation: string,
    body: (ctx: LedgerWriteContext) => T
  ): Promise<T> {
    const { store } = this.deps;
    const opId = getLedgerExecContext()?.opId ?? operation;
    const buffered: LedgerEvent[] = [];
    const payouts: Payout[] = [];
    const ctx: LedgerWriteContext = {
      ...this.readContext,
      admin: this.config.admin,
      clock: this.deps.clock,
      emit: (event) => {
        buffered.push(event);
      },
      pay: (recipient, amountWei) => {
        payouts.push({ recipient, amountWei });
      },
    };

    store.begin();
    const result = await this.applyOrRollback(opId, operation, () => {
      const value = body(ctx);
      return { value, payouts };
    });
    store.commit();

    for (const event of buffered) {
      this.deps.events.emit(event);
    }
    logEvent(this.log, EVENT_NAMES.LEDGER_OP_COMPLETED, {
      opId,
      operation,
      events: buffered.length,
      payouts: payouts.length,
    });
    return result;
  }

  /**
   * Run the service body, then send its payouts. Rolls back on any error.
   */
  private async applyOrRollback<T>(
    opId: string,
    operation: string,
    apply: () => { value: T; payouts: readonly Payout[] }
  ): Promise<T> {
    try {
      const { value, payouts } = apply();
      for (const payout of payouts) {
        await this.send(payout);
      }
      return value;
    } catch (error) {
      this.deps.store.rollback();
      this.logFailure(opId, operation, error);
      throw error;
    }
  }

  private async send({ recipient, amountWei }: Payout): Promise<void> {
    try {
      await this.deps.transfers.send(recipient, amountWei);
    } catch (error) {
      if (isValueTransferFailedPortError(error)) {
        throw new TransferFailedError(recipient, amountWei, { cause: error });
      }
      throw error;
    }
  }

  private logFailure(opId: string, operation: string, error: unknown): void {
    if (isRevenueLedgerError(error)) {
      logEvent(
        this.log,
        EVENT_NAMES.LEDGER_OP_REJECTED,
        { opId, operation, code: error.code, kind: error.kind },
        { level: "warn", message: error.message }
      );
      return;
    }
    logEvent(
      this.log,
      EVENT_NAMES.LEDGER_OP_FAILED,
      { opId, operation, err: error },
      { level: "error" }
    );
  }
}

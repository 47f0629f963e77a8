// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/ledger-events`
 * Purpose: Observable side-effect contract: typed events describing committed ledger changes.
 * Scope: Event payload types and sink interface. Does not persist or index events.
 * Invariants:
 * - Events are delivered only after the emitting operation commits; rolled-back operations emit nothing.
 * - Delivery order matches emission order within an operation.
 * Side-effects: none (interface definition only)
 * Links: Implemented by PinoLedgerEventSink and RecordingLedgerEventSink
 * @public
 */

import type { Address } from "viem";

import type { ProjectId } from "@/core";

export type LedgerEvent =
  | {
      type: "ProjectCreated";
      projectId: ProjectId;
      creator: Address;
      name: string;
      totalSupply: bigint;
      priceWei: bigint;
      minPurchase: bigint;
    }
  | {
      type: "ProjectOwnershipTransferred";
      projectId: ProjectId;
      previousCreator: Address;
      newCreator: Address;
    }
  | { type: "ProjectStatusChanged"; projectId: ProjectId; active: boolean }
  | {
      type: "ProjectPriceUpdated";
      projectId: ProjectId;
      previousPriceWei: bigint;
      priceWei: bigint;
    }
  | {
      type: "UnitsPurchased";
      projectId: ProjectId;
      buyer: Address;
      amount: bigint;
      costWei: bigint;
      refundWei: bigint;
    }
  | {
      type: "TransferSingle";
      operator: Address;
      from: Address;
      to: Address;
      projectId: ProjectId;
      amount: bigint;
    }
  | {
      type: "TransferBatch";
      operator: Address;
      from: Address;
      to: Address;
      projectIds: readonly ProjectId[];
      amounts: readonly bigint[];
    }
  | {
      type: "ApprovalForAll";
      owner: Address;
      operator: Address;
      approved: boolean;
    }
  | {
      type: "RevenueDeposited";
      projectId: ProjectId;
      depositor: Address;
      amountWei: bigint;
      energyDeltaKwh: bigint;
      rewardPerUnitStored: bigint;
    }
  | {
      type: "RewardsClaimed";
      projectId: ProjectId;
      holder: Address;
      amountWei: bigint;
    }
  | {
      type: "BatchRewardsClaimed";
      holder: Address;
      projectIds: readonly ProjectId[];
      totalWei: bigint;
    }
  | {
      type: "EnergyUpdated";
      projectId: ProjectId;
      deltaKwh: bigint;
      totalEnergyKwh: bigint;
    }
  | {
      type: "EnergyCorrected";
      projectId: ProjectId;
      previousKwh: bigint;
      totalEnergyKwh: bigint;
      reason: string;
    }
  | {
      type: "SalesWithdrawn";
      projectId: ProjectId;
      recipient: Address;
      amountWei: bigint;
    }
  | { type: "ValueReceived"; from: Address; amountWei: bigint }
  | { type: "DustRescued"; recipient: Address; amountWei: bigint }
  | { type: "Paused"; account: Address }
  | { type: "Unpaused"; account: Address };

export type LedgerEventType = LedgerEvent["type"];

export interface LedgerEventSink {
  emit(event: LedgerEvent): void;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/accrual`
 * Purpose: Revenue deposits, pro-rata accrual, and energy counters through the facade.
 * Scope: depositRevenue, getClaimableAmount, updateEnergy, setEnergy. Does not cover payouts (see claims.test.ts).
 * Invariants: Units transferred after a deposit do not carry that deposit's reward with them.
 * Side-effects: none (in-process fakes)
 * Links: src/features/revenue/services/accrual.ts
 */

import { parseEther } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

import {
  InvalidAmountError,
  NoFundsDepositedError,
  NoTokensMintedError,
  type ProjectId,
  ProjectNotActiveError,
  RewardIncreaseTooSmallError,
  UnauthorizedError,
} from "@/core";
import {
  buyUnits,
  createTestProject,
  makeTestLedger,
  TEST_ADMIN,
  TEST_ALICE,
  TEST_BOB,
  TEST_CAROL,
  TEST_CREATOR,
  type TestLedger,
} from "@tests/_fakes";

describe("revenue accrual", () => {
  let t: TestLedger;
  let id: ProjectId;

  beforeEach(async () => {
    t = makeTestLedger();
    id = await createTestProject(t);
  });

  describe("with 30/70 holdings", () => {
    beforeEach(async () => {
      await buyUnits(t, TEST_ALICE, id, 30n);
      await buyUnits(t, TEST_BOB, id, 70n);
      t.events.clear();
    });

    it("splits a deposit pro rata", async () => {
      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"));

      expect(await t.ledger.getClaimableAmount(id, TEST_ALICE)).toBe(parseEther("0.3"));
      expect(await t.ledger.getClaimableAmount(id, TEST_BOB)).toBe(parseEther("0.7"));
    });

    it("records the deposit on the project and emits RevenueDeposited", async () => {
      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"), 1200n);

      const project = await t.ledger.getProject(id);
      expect(project.totalRevenue).toBe(parseEther("1"));
      expect(project.totalEnergyKwh).toBe(1200n);
      expect(project.rewardPerUnitStored).toBe(10n ** 34n);
      expect(t.events.events).toEqual([
        {
          type: "RevenueDeposited",
          projectId: id,
          depositor: TEST_CREATOR,
          amountWei: parseEther("1"),
          energyDeltaKwh: 1200n,
          rewardPerUnitStored: 10n ** 34n,
        },
      ]);
    });

    it("keeps accrued reward with the holder across transfers", async () => {
      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"));
      await t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_CAROL, id, 10n);

      expect(await t.ledger.getClaimableAmount(id, TEST_ALICE)).toBe(parseEther("0.3"));
      expect(await t.ledger.getClaimableAmount(id, TEST_CAROL)).toBe(0n);

      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"));

      expect(await t.ledger.getClaimableAmount(id, TEST_ALICE)).toBe(parseEther("0.5"));
      expect(await t.ledger.getClaimableAmount(id, TEST_CAROL)).toBe(parseEther("0.1"));
      expect(await t.ledger.getClaimableAmount(id, TEST_BOB)).toBe(parseEther("1.4"));
    });

    it("accepts deposits from the admin", async () => {
      await t.ledger.depositRevenue(id, TEST_ADMIN, parseEther("0.5"));

      expect((await t.ledger.getProject(id)).totalRevenue).toBe(parseEther("0.5"));
    });

    it("rejects deposits from anyone else", async () => {
      await expect(
        t.ledger.depositRevenue(id, TEST_ALICE, parseEther("1"))
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it("rejects empty deposits and negative energy", async () => {
      await expect(
        t.ledger.depositRevenue(id, TEST_CREATOR, 0n)
      ).rejects.toBeInstanceOf(NoFundsDepositedError);
      await expect(
        t.ledger.depositRevenue(id, TEST_CREATOR, 1n, -1n)
      ).rejects.toBeInstanceOf(InvalidAmountError);
    });

    it("rejects deposits into inactive projects", async () => {
      await t.ledger.setProjectStatus(id, TEST_CREATOR, false);

      await expect(
        t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"))
      ).rejects.toBeInstanceOf(ProjectNotActiveError);
    });
  });

  it("rejects deposits before any unit is minted", async () => {
    await expect(
      t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"))
    ).rejects.toBeInstanceOf(NoTokensMintedError);
  });

  it("rejects deposits whose per-unit increase truncates to zero", async () => {
    const supply = 2n * 10n ** 18n;
    const big = await createTestProject(t, { totalSupply: supply, priceWei: 1n });
    await t.ledger.purchase(TEST_ALICE, big, supply, supply);

    await expect(
      t.ledger.depositRevenue(big, TEST_CREATOR, 1n)
    ).rejects.toBeInstanceOf(RewardIncreaseTooSmallError);
    expect((await t.ledger.getProject(big)).totalRevenue).toBe(0n);
  });

  it("leaves truncated remainders as dust", async () => {
    const small = await createTestProject(t, { totalSupply: 3n, priceWei: 1n });
    await t.ledger.purchase(TEST_ALICE, small, 1n, 1n);
    await t.ledger.purchase(TEST_BOB, small, 2n, 2n);

    await t.ledger.depositRevenue(small, TEST_CREATOR, 10n);

    expect(await t.ledger.getClaimableAmount(small, TEST_ALICE)).toBe(3n);
    expect(await t.ledger.getClaimableAmount(small, TEST_BOB)).toBe(6n);
    expect(await t.ledger.getDustAmount()).toBe(1n);
  });

  it("keeps the remainder as dust when one holder owns every unit", async () => {
    const small = await createTestProject(t, { totalSupply: 3n, priceWei: 1n });
    await t.ledger.purchase(TEST_ALICE, small, 3n, 3n);

    await t.ledger.depositRevenue(small, TEST_CREATOR, 10n);

    expect(await t.ledger.getClaimableAmount(small, TEST_ALICE)).toBe(9n);
    expect(await t.ledger.getDustAmount()).toBe(1n);
  });

  describe("energy", () => {
    it("accumulates reported energy", async () => {
      await t.ledger.updateEnergy(id, TEST_CREATOR, 500n);
      await t.ledger.updateEnergy(id, TEST_ADMIN, 250n);

      expect((await t.ledger.getProject(id)).totalEnergyKwh).toBe(750n);
      expect(t.events.ofType("EnergyUpdated")).toEqual([
        { type: "EnergyUpdated", projectId: id, deltaKwh: 500n, totalEnergyKwh: 500n },
        { type: "EnergyUpdated", projectId: id, deltaKwh: 250n, totalEnergyKwh: 750n },
      ]);
    });

    it("overwrites the counter with a reason", async () => {
      await t.ledger.updateEnergy(id, TEST_CREATOR, 500n);

      await t.ledger.setEnergy(id, TEST_CREATOR, 420n, "meter recalibration");

      expect((await t.ledger.getProject(id)).totalEnergyKwh).toBe(420n);
      expect(t.events.ofType("EnergyCorrected")).toEqual([
        {
          type: "EnergyCorrected",
          projectId: id,
          previousKwh: 500n,
          totalEnergyKwh: 420n,
          reason: "meter recalibration",
        },
      ]);
    });

    it("rejects negative values, outsiders, and inactive projects", async () => {
      await expect(
        t.ledger.updateEnergy(id, TEST_CREATOR, -1n)
      ).rejects.toBeInstanceOf(InvalidAmountError);
      await expect(
        t.ledger.setEnergy(id, TEST_CREATOR, -1n, "typo")
      ).rejects.toBeInstanceOf(InvalidAmountError);
      await expect(
        t.ledger.updateEnergy(id, TEST_ALICE, 1n)
      ).rejects.toBeInstanceOf(UnauthorizedError);

      await t.ledger.setProjectStatus(id, TEST_CREATOR, false);
      await expect(
        t.ledger.updateEnergy(id, TEST_CREATOR, 1n)
      ).rejects.toBeInstanceOf(ProjectNotActiveError);
    });

    it("never changes reward accounting", async () => {
      await buyUnits(t, TEST_ALICE, id, 10n);
      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"));

      await t.ledger.setEnergy(id, TEST_CREATOR, 0n, "reset");

      expect(await t.ledger.getClaimableAmount(id, TEST_ALICE)).toBe(parseEther("1"));
    });
  });
});

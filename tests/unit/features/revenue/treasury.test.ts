// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/treasury`
 * Purpose: Creator sales withdrawals, direct receipts, and dust rescue.
 * Scope: withdrawSales, receiveDirect, rescueDust, getDustAmount. Does not cover purchases.
 * Invariants: rescueDust never touches sales balances or unclaimed rewards.
 * Side-effects: none (in-process fakes)
 * Links: src/features/revenue/services/sales.ts, src/core/revenue/treasury.ts
 */

import { parseEther } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

import {
  InsufficientSalesBalanceError,
  InvalidAmountError,
  InvalidRecipientError,
  NoDustError,
  type ProjectId,
  UnauthorizedError,
} from "@/core";
import {
  buyUnits,
  createTestProject,
  makeTestLedger,
  TEST_ADMIN,
  TEST_ALICE,
  TEST_BOB,
  TEST_CREATOR,
  TEST_TREASURY,
  type TestLedger,
  ZERO_ADDRESS,
} from "@tests/_fakes";

describe("treasury", () => {
  let t: TestLedger;
  let id: ProjectId;

  beforeEach(async () => {
    t = makeTestLedger();
    id = await createTestProject(t);
    await buyUnits(t, TEST_ALICE, id, 10n);
    t.events.clear();
  });

  describe("withdrawSales", () => {
    it("pays the creator's chosen recipient", async () => {
      await t.ledger.withdrawSales(id, TEST_CREATOR, TEST_TREASURY, parseEther("0.04"));

      expect(await t.ledger.getSalesBalance(id)).toBe(parseEther("0.06"));
      expect(t.transfers.sends).toEqual([
        { recipient: TEST_TREASURY, amountWei: parseEther("0.04") },
      ]);
      expect(t.events.events).toEqual([
        {
          type: "SalesWithdrawn",
          projectId: id,
          recipient: TEST_TREASURY,
          amountWei: parseEther("0.04"),
        },
      ]);
    });

    it("allows withdrawing the full balance", async () => {
      await t.ledger.withdrawSales(id, TEST_CREATOR, TEST_CREATOR, parseEther("0.1"));

      expect(await t.ledger.getSalesBalance(id)).toBe(0n);
      expect(await t.ledger.getDustAmount()).toBe(0n);
    });

    it("rejects amounts above the sales balance", async () => {
      await expect(
        t.ledger.withdrawSales(id, TEST_CREATOR, TEST_CREATOR, parseEther("0.1") + 1n)
      ).rejects.toBeInstanceOf(InsufficientSalesBalanceError);
    });

    it("rejects non-creators, the zero recipient, and zero amounts", async () => {
      await expect(
        t.ledger.withdrawSales(id, TEST_ADMIN, TEST_ADMIN, 1n)
      ).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(
        t.ledger.withdrawSales(id, TEST_CREATOR, ZERO_ADDRESS, 1n)
      ).rejects.toBeInstanceOf(InvalidRecipientError);
      await expect(
        t.ledger.withdrawSales(id, TEST_CREATOR, TEST_CREATOR, 0n)
      ).rejects.toBeInstanceOf(InvalidAmountError);
    });

    it("restores the balance when the recipient rejects", async () => {
      t.transfers.setFailing(TEST_TREASURY);

      await expect(
        t.ledger.withdrawSales(id, TEST_CREATOR, TEST_TREASURY, parseEther("0.04"))
      ).rejects.toThrow(`Transfer of ${parseEther("0.04")} wei to ${TEST_TREASURY} failed`);
      expect(await t.ledger.getSalesBalance(id)).toBe(parseEther("0.1"));
    });

    it("follows ownership transfers", async () => {
      await t.ledger.transferProjectOwnership(id, TEST_CREATOR, TEST_BOB);

      await expect(
        t.ledger.withdrawSales(id, TEST_CREATOR, TEST_CREATOR, 1n)
      ).rejects.toBeInstanceOf(UnauthorizedError);
      await t.ledger.withdrawSales(id, TEST_BOB, TEST_BOB, 1n);
      expect(t.transfers.totalSentTo(TEST_BOB)).toBe(1n);
    });
  });

  describe("dust", () => {
    it("treats direct receipts as dust", async () => {
      await t.ledger.receiveDirect(TEST_BOB, 5n);

      expect(await t.ledger.getDustAmount()).toBe(5n);
      expect(t.events.events).toEqual([
        { type: "ValueReceived", from: TEST_BOB, amountWei: 5n },
      ]);
    });

    it("rejects empty direct receipts", async () => {
      await expect(t.ledger.receiveDirect(TEST_BOB, 0n)).rejects.toBeInstanceOf(
        InvalidAmountError
      );
    });

    it("rescues only the unattributed balance", async () => {
      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"));
      await t.ledger.receiveDirect(TEST_BOB, 7n);

      const rescued = await t.ledger.rescueDust(TEST_ADMIN, TEST_TREASURY);

      expect(rescued).toBe(7n);
      expect(t.transfers.sends).toEqual([{ recipient: TEST_TREASURY, amountWei: 7n }]);
      expect(await t.ledger.getDustAmount()).toBe(0n);
      expect(await t.ledger.getSalesBalance(id)).toBe(parseEther("0.1"));
      expect(await t.ledger.getClaimableAmount(id, TEST_ALICE)).toBe(parseEther("1"));
      expect(t.events.ofType("DustRescued")).toEqual([
        { type: "DustRescued", recipient: TEST_TREASURY, amountWei: 7n },
      ]);
    });

    it("collects rounding remainders without shorting holders", async () => {
      const small = await createTestProject(t, { totalSupply: 3n, priceWei: 1n });
      await t.ledger.purchase(TEST_ALICE, small, 1n, 1n);
      await t.ledger.purchase(TEST_BOB, small, 2n, 2n);
      await t.ledger.depositRevenue(small, TEST_CREATOR, 10n);

      await t.ledger.claim(small, TEST_ALICE);
      await t.ledger.claim(small, TEST_BOB);
      expect(await t.ledger.rescueDust(TEST_ADMIN, TEST_TREASURY)).toBe(1n);

      expect(t.transfers.totalSentTo(TEST_ALICE)).toBe(3n);
      expect(t.transfers.totalSentTo(TEST_BOB)).toBe(6n);
      expect(await t.ledger.getSalesBalance(small)).toBe(3n);
    });

    it("rejects rescue with no dust and from non-admins", async () => {
      await expect(
        t.ledger.rescueDust(TEST_ADMIN, TEST_TREASURY)
      ).rejects.toBeInstanceOf(NoDustError);

      await t.ledger.receiveDirect(TEST_BOB, 1n);
      await expect(
        t.ledger.rescueDust(TEST_CREATOR, TEST_CREATOR)
      ).rejects.toThrow(`${TEST_CREATOR} is not allowed to rescue dust`);
      await expect(
        t.ledger.rescueDust(TEST_ADMIN, ZERO_ADDRESS)
      ).rejects.toBeInstanceOf(InvalidRecipientError);
    });
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/unit-ledger`
 * Purpose: Multi-project unit transfers, approvals, and balance queries.
 * Scope: transfer, transferBatch, setApprovalForAll, balanceOfBatch. Does not cover reward settlement (see accrual.test.ts).
 * Invariants: A failing batch entry rolls back every earlier entry of the batch.
 * Side-effects: none (in-process fakes)
 * Links: src/features/revenue/services/unit-ledger.ts
 */

import { parseEther } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

import {
  ArrayLengthMismatchError,
  InsufficientBalanceError,
  InvalidAmountError,
  InvalidOperatorError,
  InvalidRecipientError,
  type ProjectId,
  ProjectNotFoundError,
  toProjectId,
  UnauthorizedError,
} from "@/core";
import {
  buyUnits,
  createTestProject,
  makeTestLedger,
  TEST_ALICE,
  TEST_BOB,
  TEST_CREATOR,
  TEST_OPERATOR,
  type TestLedger,
  ZERO_ADDRESS,
} from "@tests/_fakes";

describe("unit transfers", () => {
  let t: TestLedger;
  let a: ProjectId;
  let b: ProjectId;

  beforeEach(async () => {
    t = makeTestLedger();
    a = await createTestProject(t);
    b = await createTestProject(t, { name: "Carport West" });
    await buyUnits(t, TEST_ALICE, a, 10n);
    await buyUnits(t, TEST_ALICE, b, 4n);
    t.events.clear();
  });

  describe("transfer", () => {
    it("moves units and emits TransferSingle", async () => {
      await t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, a, 3n);

      expect(await t.ledger.balanceOf(TEST_ALICE, a)).toBe(7n);
      expect(await t.ledger.balanceOf(TEST_BOB, a)).toBe(3n);
      expect(t.events.events).toEqual([
        {
          type: "TransferSingle",
          operator: TEST_ALICE,
          from: TEST_ALICE,
          to: TEST_BOB,
          projectId: a,
          amount: 3n,
        },
      ]);
    });

    it("rejects transfers above the balance", async () => {
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, a, 11n)
      ).rejects.toThrow(`${TEST_ALICE} holds 10 units of project ${a}, requested 11`);
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, a, 11n)
      ).rejects.toBeInstanceOf(InsufficientBalanceError);
    });

    it("rejects the zero recipient, negative amounts, and unknown projects", async () => {
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, ZERO_ADDRESS, a, 1n)
      ).rejects.toBeInstanceOf(InvalidRecipientError);
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, a, -1n)
      ).rejects.toBeInstanceOf(InvalidAmountError);
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, toProjectId(9n), 1n)
      ).rejects.toBeInstanceOf(ProjectNotFoundError);
    });

    it("rejects a malformed recipient with a domain error", async () => {
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, "0xabc", a, 1n)
      ).rejects.toBeInstanceOf(InvalidRecipientError);
      expect(await t.ledger.balanceOf(TEST_ALICE, a)).toBe(10n);
    });

    it("allows zero-amount transfers without adding them to the portfolio", async () => {
      await t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, a, 0n);

      expect(t.events.types()).toEqual(["TransferSingle"]);
      expect((await t.ledger.getPortfolio(TEST_BOB, 0, 10)).total).toBe(0);
    });

    it("treats a self-transfer as a no-op on balances", async () => {
      await t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_ALICE, a, 4n);

      expect(await t.ledger.balanceOf(TEST_ALICE, a)).toBe(10n);
    });

    it("leaves the claimable amount unchanged on a self-transfer", async () => {
      await t.ledger.depositRevenue(a, TEST_CREATOR, parseEther("1"));
      expect(await t.ledger.getClaimableAmount(a, TEST_ALICE)).toBe(parseEther("1"));

      await t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_ALICE, a, 4n);

      expect(await t.ledger.getClaimableAmount(a, TEST_ALICE)).toBe(parseEther("1"));
      expect(await t.ledger.getTotalClaimed(a, TEST_ALICE)).toBe(0n);
    });
  });

  describe("operators", () => {
    it("rejects operators without approval", async () => {
      await expect(
        t.ledger.transfer(TEST_OPERATOR, TEST_ALICE, TEST_BOB, a, 1n)
      ).rejects.toThrow(
        `${TEST_OPERATOR} is not allowed to move units held by ${TEST_ALICE}`
      );
    });

    it("lets an approved operator move units until revoked", async () => {
      await t.ledger.setApprovalForAll(TEST_ALICE, TEST_OPERATOR, true);
      expect(await t.ledger.isApprovedForAll(TEST_ALICE, TEST_OPERATOR)).toBe(true);

      await t.ledger.transfer(TEST_OPERATOR, TEST_ALICE, TEST_BOB, a, 2n);
      expect(await t.ledger.balanceOf(TEST_BOB, a)).toBe(2n);

      await t.ledger.setApprovalForAll(TEST_ALICE, TEST_OPERATOR, false);
      await expect(
        t.ledger.transfer(TEST_OPERATOR, TEST_ALICE, TEST_BOB, a, 1n)
      ).rejects.toBeInstanceOf(UnauthorizedError);

      expect(t.events.ofType("ApprovalForAll")).toEqual([
        { type: "ApprovalForAll", owner: TEST_ALICE, operator: TEST_OPERATOR, approved: true },
        { type: "ApprovalForAll", owner: TEST_ALICE, operator: TEST_OPERATOR, approved: false },
      ]);
    });

    it("rejects self-approval and the zero operator", async () => {
      await expect(
        t.ledger.setApprovalForAll(TEST_ALICE, TEST_ALICE, true)
      ).rejects.toBeInstanceOf(InvalidOperatorError);
      await expect(
        t.ledger.setApprovalForAll(TEST_ALICE, ZERO_ADDRESS, true)
      ).rejects.toBeInstanceOf(InvalidOperatorError);
    });
  });

  describe("transferBatch", () => {
    it("moves every entry and emits one TransferBatch", async () => {
      await t.ledger.transferBatch(TEST_ALICE, TEST_ALICE, TEST_BOB, [a, b], [5n, 4n]);

      expect(
        await t.ledger.balanceOfBatch(
          [TEST_ALICE, TEST_ALICE, TEST_BOB, TEST_BOB],
          [a, b, a, b]
        )
      ).toEqual([5n, 0n, 5n, 4n]);
      expect(t.events.events).toEqual([
        {
          type: "TransferBatch",
          operator: TEST_ALICE,
          from: TEST_ALICE,
          to: TEST_BOB,
          projectIds: [a, b],
          amounts: [5n, 4n],
        },
      ]);
    });

    it("rolls back earlier entries when a later one fails", async () => {
      await expect(
        t.ledger.transferBatch(TEST_ALICE, TEST_ALICE, TEST_BOB, [a, b], [5n, 5n])
      ).rejects.toBeInstanceOf(InsufficientBalanceError);

      expect(await t.ledger.balanceOf(TEST_ALICE, a)).toBe(10n);
      expect(await t.ledger.balanceOf(TEST_BOB, a)).toBe(0n);
      expect(t.events.events).toEqual([]);
    });

    it("rejects mismatched arrays", async () => {
      await expect(
        t.ledger.transferBatch(TEST_ALICE, TEST_ALICE, TEST_BOB, [a, b], [1n])
      ).rejects.toThrow(new ArrayLengthMismatchError(2, 1).message);
    });

    it("treats an empty batch as a silent no-op", async () => {
      await t.ledger.transferBatch(TEST_ALICE, TEST_ALICE, TEST_BOB, [], []);

      expect(t.events.events).toEqual([]);
    });
  });

  it("rejects balanceOfBatch with mismatched arrays", async () => {
    await expect(
      t.ledger.balanceOfBatch([TEST_ALICE], [a, b])
    ).rejects.toBeInstanceOf(ArrayLengthMismatchError);
  });
});

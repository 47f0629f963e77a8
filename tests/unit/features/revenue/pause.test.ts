// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/revenue/pause`
 * Purpose: Ledger-wide pause gate.
 * Scope: pause/unpause authorization and which operations the gate blocks. Does not cover per-project activation.
 * Invariants: The gate blocks purchase, transfer, and transferBatch only.
 * Side-effects: none (in-process fakes)
 * Links: src/features/revenue/services/admin.ts
 */

import { parseEther } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

import {
  EnforcedPauseError,
  ExpectedPauseError,
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
  type TestLedger,
} from "@tests/_fakes";

describe("pause gate", () => {
  let t: TestLedger;
  let id: ProjectId;

  beforeEach(async () => {
    t = makeTestLedger();
    id = await createTestProject(t);
    await buyUnits(t, TEST_ALICE, id, 10n);
    t.events.clear();
  });

  it("is toggled by the admin", async () => {
    await t.ledger.pause(TEST_ADMIN);
    expect(await t.ledger.isPaused()).toBe(true);

    await t.ledger.unpause(TEST_ADMIN);
    expect(await t.ledger.isPaused()).toBe(false);
    expect(t.events.events).toEqual([
      { type: "Paused", account: TEST_ADMIN },
      { type: "Unpaused", account: TEST_ADMIN },
    ]);
  });

  it("rejects redundant toggles", async () => {
    await expect(t.ledger.unpause(TEST_ADMIN)).rejects.toBeInstanceOf(
      ExpectedPauseError
    );
    await t.ledger.pause(TEST_ADMIN);
    await expect(t.ledger.pause(TEST_ADMIN)).rejects.toBeInstanceOf(
      EnforcedPauseError
    );
  });

  it("rejects everyone but the admin", async () => {
    await expect(t.ledger.pause(TEST_CREATOR)).rejects.toBeInstanceOf(
      UnauthorizedError
    );
  });

  describe("while paused", () => {
    beforeEach(async () => {
      await t.ledger.pause(TEST_ADMIN);
    });

    it("blocks purchases and unit movements", async () => {
      const price = parseEther("0.01");
      await expect(
        t.ledger.purchase(TEST_BOB, id, 1n, price)
      ).rejects.toThrow("Ledger is paused");
      await expect(
        t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, id, 1n)
      ).rejects.toBeInstanceOf(EnforcedPauseError);
      await expect(
        t.ledger.transferBatch(TEST_ALICE, TEST_ALICE, TEST_BOB, [id], [1n])
      ).rejects.toBeInstanceOf(EnforcedPauseError);
    });

    it("still settles revenue and payouts", async () => {
      await t.ledger.depositRevenue(id, TEST_CREATOR, parseEther("1"));
      expect(await t.ledger.claim(id, TEST_ALICE)).toBe(parseEther("1"));
      await t.ledger.withdrawSales(id, TEST_CREATOR, TEST_CREATOR, parseEther("0.1"));
      expect(await t.ledger.getSalesBalance(id)).toBe(0n);
    });

    it("resumes movements after unpause", async () => {
      await t.ledger.unpause(TEST_ADMIN);

      await t.ledger.transfer(TEST_ALICE, TEST_ALICE, TEST_BOB, id, 1n);
      expect(await t.ledger.balanceOf(TEST_BOB, id)).toBe(1n);
    });
  });
});

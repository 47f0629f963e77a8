// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/account-book-value-transfer`
 * Purpose: Unit tests for the in-process account book payout adapter.
 * Scope: Crediting, receive hooks, and rejection mapping. Does not test ledger integration.
 * Invariants: A rejecting hook leaves the recipient uncredited.
 * Side-effects: none (unit tests only)
 * Links: src/adapters/server/ledger/account-book-value-transfer.adapter.ts
 */

import { describe, expect, it } from "vitest";

import { AccountBookValueTransfer } from "@/adapters/server";
import { ValueTransferFailedPortError } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";
import { TEST_ALICE, TEST_BOB } from "@tests/_fakes";

describe("AccountBookValueTransfer", () => {
  it("accumulates credits per recipient", async () => {
    const book = new AccountBookValueTransfer(makeNoopLogger());

    await book.send(TEST_ALICE, 5n);
    await book.send(TEST_ALICE, 7n);

    expect(book.creditedTo(TEST_ALICE)).toBe(12n);
    expect(book.creditedTo(TEST_BOB)).toBe(0n);
  });

  it("runs the receive hook with the amount before crediting", async () => {
    const book = new AccountBookValueTransfer(makeNoopLogger());
    const seen: bigint[] = [];
    book.onReceive(TEST_ALICE, (amount) => {
      seen.push(book.creditedTo(TEST_ALICE));
      seen.push(amount);
    });

    await book.send(TEST_ALICE, 3n);

    expect(seen).toEqual([0n, 3n]);
    expect(book.creditedTo(TEST_ALICE)).toBe(3n);
  });

  it("maps a throwing hook to a port error and credits nothing", async () => {
    const book = new AccountBookValueTransfer(makeNoopLogger());
    book.onReceive(TEST_BOB, async () => {
      throw new Error("no thanks");
    });

    const sent = book.send(TEST_BOB, 9n);

    await expect(sent).rejects.toBeInstanceOf(ValueTransferFailedPortError);
    await expect(sent).rejects.toThrow(
      `Transfer of 9 wei to ${TEST_BOB} rejected: no thanks`
    );
    expect(book.creditedTo(TEST_BOB)).toBe(0n);
  });

  it("matches hooks case-insensitively", async () => {
    const book = new AccountBookValueTransfer(makeNoopLogger());
    let calls = 0;
    book.onReceive("0x000000000000000000000000000000000000ABCD", () => {
      calls++;
    });

    await book.send("0x000000000000000000000000000000000000abcd", 1n);

    expect(calls).toBe(1);
  });
});

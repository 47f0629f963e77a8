// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/account-book-value-transfer`
 * Purpose: In-process settlement of outbound native value into an account book.
 * Scope: Credits recipients and runs their registered receive hooks. Does not debit the ledger (the ledger tracks its own held value).
 * Invariants:
 * - A recipient is credited only after its hook resolves.
 * - A throwing hook surfaces as ValueTransferFailedPortError and nothing is credited.
 * Side-effects: IO (logging)
 * Notes: Hooks model recipients that run code on receipt, including calls back into the ledger.
 * Links: Implements ValueTransferPort
 * @public
 */

import type { Address } from "viem";

import { ValueTransferFailedPortError, type ValueTransferPort } from "@/ports";
import { getLedgerExecContext } from "@/shared/concurrency";
import { EVENT_NAMES, type Logger, logEvent } from "@/shared/observability";

/** Code a recipient runs when value arrives; throw to reject. */
export type ReceiveHook = (amountWei: bigint) => void | Promise<void>;

export class AccountBookValueTransfer implements ValueTransferPort {
  private readonly credited = new Map<string, bigint>();
  private readonly hooks = new Map<string, ReceiveHook>();

  constructor(private readonly log: Logger) {}

  /** Install or replace the receive hook for an address */
  onReceive(recipient: Address, hook: ReceiveHook): void {
    this.hooks.set(recipient.toLowerCase(), hook);
  }

  /** Total value delivered to an address so far */
  creditedTo(recipient: Address): bigint {
    return this.credited.get(recipient.toLowerCase()) ?? 0n;
  }

  async send(recipient: Address, amountWei: bigint): Promise<void> {
    const key = recipient.toLowerCase();
    const opId = getLedgerExecContext()?.opId ?? "external";
    const hook = this.hooks.get(key);

    if (hook) {
      try {
        await hook(amountWei);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logEvent(
          this.log,
          EVENT_NAMES.ADAPTER_VALUE_TRANSFER_REJECTED,
          { opId, recipient, amountWei, reason },
          { level: "warn" }
        );
        throw new ValueTransferFailedPortError(recipient, amountWei, reason);
      }
    }

    this.credited.set(key, (this.credited.get(key) ?? 0n) + amountWei);
    logEvent(
      this.log,
      EVENT_NAMES.ADAPTER_VALUE_TRANSFER_SENT,
      { opId, recipient, amountWei },
      { level: "debug" }
    );
  }
}

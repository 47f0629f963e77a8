// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/value-transfer`
 * Purpose: Outbound native-currency transfer port (claims, refunds, sales withdrawals, dust rescue).
 * Scope: Defines the payout contract. Does not validate amounts or touch ledger state.
 * Invariants:
 * - send() resolves only once the recipient has accepted the value.
 * - A rejecting recipient surfaces as a rejected promise; the ledger rolls back the whole operation.
 * - Recipients may run arbitrary code on receipt, including calls back into the ledger.
 * Side-effects: none (interface definition only)
 * Links: Implemented by AccountBookValueTransfer and FakeValueTransferAdapter
 * @public
 */

import type { Address } from "viem";

/**
 * Port-level error thrown when a recipient rejects a transfer
 */
export class ValueTransferFailedPortError extends Error {
  constructor(
    public readonly recipient: Address,
    public readonly amountWei: bigint,
    reason: string
  ) {
    super(`Transfer of ${amountWei} wei to ${recipient} rejected: ${reason}`);
    this.name = "ValueTransferFailedPortError";
  }
}

/**
 * Type guard for ValueTransferFailedPortError
 */
export function isValueTransferFailedPortError(
  error: unknown
): error is ValueTransferFailedPortError {
  return (
    error instanceof Error && error.name === "ValueTransferFailedPortError"
  );
}

export interface ValueTransferPort {
  /**
   * Deliver amountWei of native currency to recipient
   *
   * @throws ValueTransferFailedPortError if the recipient rejects
   */
  send(recipient: Address, amountWei: bigint): Promise<void>;
}

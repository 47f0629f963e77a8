// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/errors`
 * Purpose: Domain errors for the revenue ledger, grouped by failure kind.
 * Scope: Pure error types with no infrastructure dependencies. Does not map to transport status codes.
 * Invariants:
 * - Every error has a readonly `code` discriminant and a readonly `kind` from LedgerErrorKind.
 * - Errors abort the whole operation; the ledger rolls back before rethrowing.
 * Side-effects: none (error definitions only)
 * Notes: Feature layer translates port-level errors (value transfer) into TransferFailedError.
 * Links: Used by feature services, handled by callers of RevenueLedger
 * @public
 */

export type LedgerErrorKind =
  | "validation"
  | "not_found"
  | "unauthorized"
  | "state_conflict"
  | "insufficient_resource"
  | "economic_degenerate"
  | "transfer_failure"
  | "concurrency";

/**
 * Base class for every revenue ledger domain error
 */
export abstract class RevenueLedgerError extends Error {
  abstract readonly code: string;
  abstract readonly kind: LedgerErrorKind;
}

// ============================================================================
// Validation
// ============================================================================

export class InvalidSupplyError extends RevenueLedgerError {
  public readonly code = "INVALID_SUPPLY" as const;
  public readonly kind = "validation" as const;
  constructor(public readonly totalSupply: bigint) {
    super(`Total supply must be greater than zero, got ${totalSupply}`);
    this.name = "InvalidSupplyError";
  }
}

export class InvalidPriceError extends RevenueLedgerError {
  public readonly code = "INVALID_PRICE" as const;
  public readonly kind = "validation" as const;
  constructor(public readonly priceWei: bigint) {
    super(`Price must be greater than zero, got ${priceWei}`);
    this.name = "InvalidPriceError";
  }
}

export class InvalidMinPurchaseError extends RevenueLedgerError {
  public readonly code = "INVALID_MIN_PURCHASE" as const;
  public readonly kind = "validation" as const;
  constructor(
    public readonly minPurchase: bigint,
    public readonly totalSupply: bigint
  ) {
    super(
      `Minimum purchase must be between 1 and ${totalSupply}, got ${minPurchase}`
    );
    this.name = "InvalidMinPurchaseError";
  }
}

export class InvalidNameError extends RevenueLedgerError {
  public readonly code = "INVALID_NAME" as const;
  public readonly kind = "validation" as const;
  constructor() {
    super("Project name must not be empty");
    this.name = "InvalidNameError";
  }
}

export class InvalidCreatorError extends RevenueLedgerError {
  public readonly code = "INVALID_CREATOR" as const;
  public readonly kind = "validation" as const;
  constructor(public readonly creator: string) {
    super(`Invalid creator address: ${creator}`);
    this.name = "InvalidCreatorError";
  }
}

export class InvalidRecipientError extends RevenueLedgerError {
  public readonly code = "INVALID_RECIPIENT" as const;
  public readonly kind = "validation" as const;
  constructor(public readonly recipient: string) {
    super(`Invalid recipient address: ${recipient}`);
    this.name = "InvalidRecipientError";
  }
}

export class InvalidOperatorError extends RevenueLedgerError {
  public readonly code = "INVALID_OPERATOR" as const;
  public readonly kind = "validation" as const;
  constructor(public readonly operator: string) {
    super(`Invalid operator address: ${operator}`);
    this.name = "InvalidOperatorError";
  }
}

export class InvalidAmountError extends RevenueLedgerError {
  public readonly code = "INVALID_AMOUNT" as const;
  public readonly kind = "validation" as const;
  constructor(message: string) {
    super(message);
    this.name = "InvalidAmountError";
  }
}

export class NoFundsDepositedError extends RevenueLedgerError {
  public readonly code = "NO_FUNDS_DEPOSITED" as const;
  public readonly kind = "validation" as const;
  constructor(public readonly projectId: bigint) {
    super(`Deposit for project ${projectId} carries no value`);
    this.name = "NoFundsDepositedError";
  }
}

export class BelowMinPurchaseError extends RevenueLedgerError {
  public readonly code = "BELOW_MIN_PURCHASE" as const;
  public readonly kind = "validation" as const;
  constructor(
    public readonly projectId: bigint,
    public readonly amount: bigint,
    public readonly minPurchase: bigint
  ) {
    super(
      `Purchase of ${amount} units in project ${projectId} is below the minimum of ${minPurchase}`
    );
    this.name = "BelowMinPurchaseError";
  }
}

export class ArrayLengthMismatchError extends RevenueLedgerError {
  public readonly code = "ARRAY_LENGTH_MISMATCH" as const;
  public readonly kind = "validation" as const;
  constructor(
    public readonly leftLength: number,
    public readonly rightLength: number
  ) {
    super(`Array lengths differ: ${leftLength} vs ${rightLength}`);
    this.name = "ArrayLengthMismatchError";
  }
}

// ============================================================================
// Not found / unauthorized
// ============================================================================

export class ProjectNotFoundError extends RevenueLedgerError {
  public readonly code = "PROJECT_NOT_FOUND" as const;
  public readonly kind = "not_found" as const;
  constructor(public readonly projectId: bigint) {
    super(`Project ${projectId} not found`);
    this.name = "ProjectNotFoundError";
  }
}

export class UnauthorizedError extends RevenueLedgerError {
  public readonly code = "UNAUTHORIZED" as const;
  public readonly kind = "unauthorized" as const;
  constructor(
    public readonly caller: string,
    public readonly action: string
  ) {
    super(`${caller} is not allowed to ${action}`);
    this.name = "UnauthorizedError";
  }
}

// ============================================================================
// State conflicts
// ============================================================================

export class ProjectNotActiveError extends RevenueLedgerError {
  public readonly code = "PROJECT_NOT_ACTIVE" as const;
  public readonly kind = "state_conflict" as const;
  constructor(public readonly projectId: bigint) {
    super(`Project ${projectId} is not active`);
    this.name = "ProjectNotActiveError";
  }
}

export class EnforcedPauseError extends RevenueLedgerError {
  public readonly code = "ENFORCED_PAUSE" as const;
  public readonly kind = "state_conflict" as const;
  constructor() {
    super("Ledger is paused");
    this.name = "EnforcedPauseError";
  }
}

export class ExpectedPauseError extends RevenueLedgerError {
  public readonly code = "EXPECTED_PAUSE" as const;
  public readonly kind = "state_conflict" as const;
  constructor() {
    super("Ledger is not paused");
    this.name = "ExpectedPauseError";
  }
}

export class NoTokensMintedError extends RevenueLedgerError {
  public readonly code = "NO_TOKENS_MINTED" as const;
  public readonly kind = "state_conflict" as const;
  constructor(public readonly projectId: bigint) {
    super(`Project ${projectId} has no units in circulation`);
    this.name = "NoTokensMintedError";
  }
}

export class PriceLockedError extends RevenueLedgerError {
  public readonly code = "PRICE_LOCKED" as const;
  public readonly kind = "state_conflict" as const;
  constructor(
    public readonly projectId: bigint,
    public readonly minted: bigint
  ) {
    super(
      `Price of project ${projectId} is locked after ${minted} units were minted`
    );
    this.name = "PriceLockedError";
  }
}

// ============================================================================
// Insufficient resource
// ============================================================================

export class InsufficientPaymentError extends RevenueLedgerError {
  public readonly code = "INSUFFICIENT_PAYMENT" as const;
  public readonly kind = "insufficient_resource" as const;
  constructor(
    public readonly required: bigint,
    public readonly provided: bigint
  ) {
    super(`Payment of ${provided} wei is below the required ${required} wei`);
    this.name = "InsufficientPaymentError";
  }
}

export class ExceedsSupplyError extends RevenueLedgerError {
  public readonly code = "EXCEEDS_SUPPLY" as const;
  public readonly kind = "insufficient_resource" as const;
  constructor(
    public readonly projectId: bigint,
    public readonly requested: bigint,
    public readonly remaining: bigint
  ) {
    super(
      `Project ${projectId} has ${remaining} units left, requested ${requested}`
    );
    this.name = "ExceedsSupplyError";
  }
}

export class InsufficientBalanceError extends RevenueLedgerError {
  public readonly code = "INSUFFICIENT_BALANCE" as const;
  public readonly kind = "insufficient_resource" as const;
  constructor(
    public readonly holder: string,
    public readonly projectId: bigint,
    public readonly balance: bigint,
    public readonly requested: bigint
  ) {
    super(
      `${holder} holds ${balance} units of project ${projectId}, requested ${requested}`
    );
    this.name = "InsufficientBalanceError";
  }
}

export class InsufficientSalesBalanceError extends RevenueLedgerError {
  public readonly code = "INSUFFICIENT_SALES_BALANCE" as const;
  public readonly kind = "insufficient_resource" as const;
  constructor(
    public readonly projectId: bigint,
    public readonly available: bigint,
    public readonly requested: bigint
  ) {
    super(
      `Project ${projectId} sales balance is ${available} wei, requested ${requested} wei`
    );
    this.name = "InsufficientSalesBalanceError";
  }
}

export class NothingToClaimError extends RevenueLedgerError {
  public readonly code = "NOTHING_TO_CLAIM" as const;
  public readonly kind = "insufficient_resource" as const;
  constructor(public readonly holder: string) {
    super(`${holder} has nothing to claim`);
    this.name = "NothingToClaimError";
  }
}

export class NoDustError extends RevenueLedgerError {
  public readonly code = "NO_DUST" as const;
  public readonly kind = "insufficient_resource" as const;
  constructor() {
    super("No unattributed balance to rescue");
    this.name = "NoDustError";
  }
}

// ============================================================================
// Economic degenerate
// ============================================================================

export class RewardIncreaseTooSmallError extends RevenueLedgerError {
  public readonly code = "REWARD_INCREASE_TOO_SMALL" as const;
  public readonly kind = "economic_degenerate" as const;
  constructor(
    public readonly projectId: bigint,
    public readonly amount: bigint,
    public readonly minted: bigint
  ) {
    super(
      `Deposit of ${amount} wei over ${minted} units rounds to zero reward per unit in project ${projectId}`
    );
    this.name = "RewardIncreaseTooSmallError";
  }
}

export class BatchSizeTooLargeError extends RevenueLedgerError {
  public readonly code = "BATCH_SIZE_TOO_LARGE" as const;
  public readonly kind = "economic_degenerate" as const;
  constructor(
    public readonly size: number,
    public readonly max: number
  ) {
    super(`Batch of ${size} exceeds the maximum of ${max}`);
    this.name = "BatchSizeTooLargeError";
  }
}

// ============================================================================
// Transfer failure / concurrency
// ============================================================================

export class TransferFailedError extends RevenueLedgerError {
  public readonly code = "TRANSFER_FAILED" as const;
  public readonly kind = "transfer_failure" as const;
  constructor(
    public readonly recipient: string,
    public readonly amount: bigint,
    options?: { cause?: unknown }
  ) {
    super(`Transfer of ${amount} wei to ${recipient} failed`, options);
    this.name = "TransferFailedError";
  }
}

export class ReentrantCallError extends RevenueLedgerError {
  public readonly code = "REENTRANT_CALL" as const;
  public readonly kind = "concurrency" as const;
  constructor(
    public readonly operation: string,
    public readonly activeOperation: string
  ) {
    super(
      `Re-entrant call to ${operation} while ${activeOperation} is in flight`
    );
    this.name = "ReentrantCallError";
  }
}

// ============================================================================
// Type guards
// ============================================================================

export type LedgerError =
  | InvalidSupplyError
  | InvalidPriceError
  | InvalidMinPurchaseError
  | InvalidNameError
  | InvalidCreatorError
  | InvalidRecipientError
  | InvalidOperatorError
  | InvalidAmountError
  | NoFundsDepositedError
  | BelowMinPurchaseError
  | ArrayLengthMismatchError
  | ProjectNotFoundError
  | UnauthorizedError
  | ProjectNotActiveError
  | EnforcedPauseError
  | ExpectedPauseError
  | NoTokensMintedError
  | PriceLockedError
  | InsufficientPaymentError
  | ExceedsSupplyError
  | InsufficientBalanceError
  | InsufficientSalesBalanceError
  | NothingToClaimError
  | NoDustError
  | RewardIncreaseTooSmallError
  | BatchSizeTooLargeError
  | TransferFailedError
  | ReentrantCallError;

export type LedgerErrorCode = LedgerError["code"];

/**
 * Type guard for any revenue ledger domain error
 */
export function isRevenueLedgerError(
  error: unknown
): error is RevenueLedgerError {
  return error instanceof RevenueLedgerError;
}

/**
 * Type guard narrowing to the error class carrying a given code
 */
export function hasLedgerErrorCode<C extends LedgerErrorCode>(
  error: unknown,
  code: C
): error is Extract<LedgerError, { code: C }> {
  return isRevenueLedgerError(error) && error.code === code;
}

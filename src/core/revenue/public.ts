// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/public`
 * Purpose: Public API for the revenue ledger domain.
 * Scope: Barrel export for revenue core domain. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported by ports, features, and adapters
 * @public
 */

// Errors
export {
  ArrayLengthMismatchError,
  BatchSizeTooLargeError,
  BelowMinPurchaseError,
  EnforcedPauseError,
  ExceedsSupplyError,
  ExpectedPauseError,
  hasLedgerErrorCode,
  InsufficientBalanceError,
  InsufficientPaymentError,
  InsufficientSalesBalanceError,
  InvalidAmountError,
  InvalidCreatorError,
  InvalidMinPurchaseError,
  InvalidNameError,
  InvalidOperatorError,
  InvalidPriceError,
  InvalidRecipientError,
  InvalidSupplyError,
  isRevenueLedgerError,
  type LedgerError,
  type LedgerErrorCode,
  type LedgerErrorKind,
  NoDustError,
  NoFundsDepositedError,
  NoTokensMintedError,
  NothingToClaimError,
  PriceLockedError,
  ProjectNotActiveError,
  ProjectNotFoundError,
  ReentrantCallError,
  RevenueLedgerError,
  RewardIncreaseTooSmallError,
  TransferFailedError,
  UnauthorizedError,
} from "./errors";
// Model types
export type {
  CreateProjectParams,
  Page,
  PortfolioEntry,
  Project,
  ProjectId,
  TreasuryTotals,
} from "./model";
export { toProjectId } from "./model";
// Pagination
export { paginate } from "./pagination";
// Rules
export {
  assertNonNegative,
  assertValidCreateParams,
  isCreator,
  isCreatorOrAdmin,
  isValidParty,
  MAX_CLAIM_BATCH,
  MAX_PORTFOLIO_PAGE,
  MAX_PROJECTS_PAGE,
  MAX_USER_PROJECTS_PAGE,
  quotePurchase,
  sameAddress,
} from "./rules";
// Treasury
export { computeDust, rewardLiability } from "./treasury";

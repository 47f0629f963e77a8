// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Links: Used by ports, features, and adapters via \@/core alias
 * @public
 */

export type {
  CreateProjectParams,
  LedgerError,
  LedgerErrorCode,
  LedgerErrorKind,
  Page,
  PortfolioEntry,
  Project,
  ProjectId,
  TreasuryTotals,
} from "./revenue/public";
export {
  ArrayLengthMismatchError,
  assertNonNegative,
  assertValidCreateParams,
  BatchSizeTooLargeError,
  BelowMinPurchaseError,
  computeDust,
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
  isCreator,
  isCreatorOrAdmin,
  isRevenueLedgerError,
  isValidParty,
  MAX_CLAIM_BATCH,
  MAX_PORTFOLIO_PAGE,
  MAX_PROJECTS_PAGE,
  MAX_USER_PROJECTS_PAGE,
  NoDustError,
  NoFundsDepositedError,
  NoTokensMintedError,
  NothingToClaimError,
  PriceLockedError,
  ProjectNotActiveError,
  ProjectNotFoundError,
  paginate,
  quotePurchase,
  sameAddress,
  ReentrantCallError,
  RevenueLedgerError,
  rewardLiability,
  RewardIncreaseTooSmallError,
  TransferFailedError,
  toProjectId,
  UnauthorizedError,
} from "./revenue/public";

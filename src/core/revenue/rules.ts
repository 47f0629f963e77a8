// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/rules`
 * Purpose: Business rules for project creation, roles, purchases, and batch bounds.
 * Scope: Pure validation functions and constants. Does not perform I/O or state mutations.
 * Invariants:
 * - totalSupply > 0; priceWei > 0; 1 <= minPurchase <= totalSupply.
 * - Malformed and zero addresses are never a valid party; address checks return false for them instead of throwing.
 * Side-effects: none (throws on validation failure)
 * Links: Used by feature services for validation
 * @public
 */

import { type Address, isAddress, isAddressEqual, zeroAddress } from "viem";

import {
  BelowMinPurchaseError,
  ExceedsSupplyError,
  InsufficientPaymentError,
  InvalidAmountError,
  InvalidMinPurchaseError,
  InvalidNameError,
  InvalidPriceError,
  InvalidSupplyError,
} from "./errors";
import type { CreateProjectParams, Project } from "./model";

/** Maximum project ids accepted by claimMultiple and getTotalClaimable */
export const MAX_CLAIM_BATCH = 100;

/** Maximum page size for per-creator project listings */
export const MAX_USER_PROJECTS_PAGE = 50;

/** Maximum page size for the global project listing */
export const MAX_PROJECTS_PAGE = 50;

/** Maximum page size for holder portfolio listings */
export const MAX_PORTFOLIO_PAGE = 100;

/**
 * Throws the first violated creation precondition.
 */
export function assertValidCreateParams(params: CreateProjectParams): void {
  if (params.name.trim().length === 0) {
    throw new InvalidNameError();
  }
  if (params.totalSupply <= 0n) {
    throw new InvalidSupplyError(params.totalSupply);
  }
  if (params.priceWei <= 0n) {
    throw new InvalidPriceError(params.priceWei);
  }
  if (params.minPurchase < 1n || params.minPurchase > params.totalSupply) {
    throw new InvalidMinPurchaseError(params.minPurchase, params.totalSupply);
  }
}

function isWellFormed(address: Address): boolean {
  return isAddress(address, { strict: false });
}

/**
 * Well-formed and not the zero address. Checksum casing is not enforced.
 */
export function isValidParty(address: Address): boolean {
  return isWellFormed(address) && !isAddressEqual(address, zeroAddress);
}

/** Case-insensitive equality; malformed input never matches */
export function sameAddress(a: Address, b: Address): boolean {
  return isWellFormed(a) && isWellFormed(b) && isAddressEqual(a, b);
}

export function isCreator(project: Project, caller: Address): boolean {
  return sameAddress(project.creator, caller);
}

/**
 * Capability check for revenue and energy operations.
 */
export function isCreatorOrAdmin(
  project: Project,
  caller: Address,
  admin: Address
): boolean {
  return isCreator(project, caller) || sameAddress(caller, admin);
}

/**
 * Validates a purchase against project bounds and returns its cost in wei.
 *
 * @throws BelowMinPurchaseError | ExceedsSupplyError | InsufficientPaymentError
 */
export function quotePurchase(
  project: Project,
  amount: bigint,
  paymentWei: bigint
): bigint {
  if (amount < project.minPurchase) {
    throw new BelowMinPurchaseError(project.id, amount, project.minPurchase);
  }
  const remaining = project.totalSupply - project.minted;
  if (amount > remaining) {
    throw new ExceedsSupplyError(project.id, amount, remaining);
  }
  const cost = amount * project.priceWei;
  if (paymentWei < cost) {
    throw new InsufficientPaymentError(cost, paymentWei);
  }
  return cost;
}

/**
 * Rejects negative quantities. Zero passes; callers that need a positive value check that themselves.
 */
export function assertNonNegative(value: bigint, label: string): void {
  if (value < 0n) {
    throw new InvalidAmountError(`${label} must be non-negative, got ${value}`);
  }
}

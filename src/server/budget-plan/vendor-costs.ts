// ABOUTME: Records vendor costs and vendor selections against a plan's categories.
// ABOUTME: Vendor identities are derived deterministically so repeated calls stay idempotent.
import { createHash } from "node:crypto";

import { debugLog } from "@/lib/debug-log";

import { roundAmount, sumActualCosts } from "./budget-math";
import { BudgetPlanNotFoundError, BudgetPlanValidationError } from "./budget-plan-errors";
import type {
  BudgetPlan,
  CategoryBreakdown,
  CategoryCostInfo,
  SelectedVendorInfo,
  VendorCostInput,
  VendorCostSummary,
  VendorSelectionInput,
} from "./budget-plan-types";

export const DEFAULT_PAYMENT_STATUS = "Not paid";

export function createUserVendorId(vendorName: string, categoryName: string) {
  const digest = createHash("md5").update(`${vendorName}_${categoryName}`).digest("hex");
  return `USER_VENDOR_${categoryName.toUpperCase()}_${digest.slice(0, 8)}`;
}

export function findCategory(plan: BudgetPlan, categoryName: string): CategoryBreakdown | null {
  const needle = categoryName.trim().toLowerCase();

  return (
    plan.budgetBreakdown.find((category) => category.categoryName.toLowerCase() === needle) ??
    null
  );
}

function upsertSelectedVendor(
  selectedVendors: SelectedVendorInfo[],
  vendor: SelectedVendorInfo,
): SelectedVendorInfo[] {
  const index = selectedVendors.findIndex(
    (entry) => entry.categoryName === vendor.categoryName && entry.vendorId === vendor.vendorId,
  );

  if (index === -1) {
    return [...selectedVendors, vendor];
  }

  const next = selectedVendors.slice();
  next[index] = vendor;
  return next;
}

export function attachVendorCost(
  plan: BudgetPlan,
  input: VendorCostInput,
  now: () => Date = () => new Date(),
): { plan: BudgetPlan; summary: VendorCostSummary } {
  const vendorName = input.vendorName.trim();
  const categoryName = input.categoryName.trim();

  if (!vendorName) {
    throw new BudgetPlanValidationError("Vendor name cannot be empty.");
  }

  if (!Number.isFinite(input.actualCost) || input.actualCost < 0) {
    throw new BudgetPlanValidationError(
      `Actual cost for category '${categoryName}' cannot be negative.`,
    );
  }

  const target = findCategory(plan, categoryName);

  if (!target) {
    throw new BudgetPlanNotFoundError(
      `Category '${categoryName}' not found in budget plan '${plan.referenceId}'.`,
    );
  }

  const actualCost = roundAmount(input.actualCost);
  const paymentStatus = input.paymentStatus?.trim() || DEFAULT_PAYMENT_STATUS;

  const budgetBreakdown = plan.budgetBreakdown.map((category) =>
    category === target ? { ...category, actualCost, paymentStatus } : { ...category },
  );

  const selectedVendorId = createUserVendorId(vendorName, categoryName);
  const selectedVendors = upsertSelectedVendor(plan.selectedVendors, {
    categoryName,
    vendorId: selectedVendorId,
    title: vendorName,
    city: null,
    rating: null,
    imageUrl: null,
  });

  const totalSpent = sumActualCosts(budgetBreakdown);
  const balance = roundAmount(plan.currentTotalBudget - totalSpent);

  debugLog(`Attached vendor '${vendorName}' to '${target.categoryName}' in ${plan.referenceId}`, {
    actualCost,
    totalSpent,
  });

  return {
    plan: {
      ...plan,
      budgetBreakdown,
      selectedVendors,
      totalSpent,
      balance,
      timestamp: now().toISOString(),
    },
    summary: {
      referenceId: plan.referenceId,
      categoryName: target.categoryName,
      vendorName,
      actualCost,
      estimatedAmount: target.estimatedAmount,
      totalSpent,
      balance,
      paymentStatus,
      selectedVendorId,
      vendorCollectionName: categoryName,
      selectedVendorsCount: selectedVendors.length,
    },
  };
}

export function selectVendor(
  plan: BudgetPlan,
  vendorCollection: string,
  input: VendorSelectionInput,
  {
    vendorCollections,
    now = () => new Date(),
  }: { vendorCollections: Iterable<string>; now?: () => Date },
): BudgetPlan {
  const collection = vendorCollection.trim();
  const allowed = new Set(vendorCollections);

  if (!allowed.has(collection)) {
    throw new BudgetPlanValidationError(
      `Invalid category '${collection}'. Supported vendor categories: ${Array.from(allowed).join(", ")}`,
    );
  }

  const vendorId = input.vendorId.trim();
  const title = input.vendorTitle.trim();

  if (!vendorId || !title) {
    throw new BudgetPlanValidationError("Vendor id and title are required.");
  }

  if (input.rating != null && !Number.isFinite(input.rating)) {
    throw new BudgetPlanValidationError("Vendor rating must be a number.");
  }

  return {
    ...plan,
    selectedVendors: upsertSelectedVendor(plan.selectedVendors, {
      categoryName: collection,
      vendorId,
      title,
      city: input.city?.trim() || null,
      rating: input.rating ?? null,
      imageUrl: input.imageUrl?.trim() || null,
    }),
    timestamp: now().toISOString(),
  };
}

export function describeCategoryCost(plan: BudgetPlan, categoryName: string): CategoryCostInfo {
  const category = findCategory(plan, categoryName);

  if (!category) {
    throw new BudgetPlanNotFoundError(
      `Category '${categoryName.trim()}' not found in budget plan '${plan.referenceId}'.`,
    );
  }

  return {
    categoryName: category.categoryName,
    estimatedAmount: category.estimatedAmount,
    actualCost: category.actualCost,
    percentage: category.percentage,
    paymentStatus: category.paymentStatus,
    hasActualCost: category.actualCost !== null,
  };
}

// ABOUTME: Applies batched category deletions, estimate changes, and budget resizes to a plan.
// ABOUTME: Rebalances unprotected categories so estimates keep summing to the total budget.
import { debugLog, warnLog } from "@/lib/debug-log";

import {
  AMOUNT_TOLERANCE,
  percentageOf,
  roundAmount,
  sumActualCosts,
  sumEstimates,
} from "./budget-math";
import { DEFAULT_VENDOR_COLLECTION_MAP, isPlaceholderCategory } from "./budget-plan-config";
import { BudgetPlanValidationError } from "./budget-plan-errors";
import type {
  BatchAdjustRequest,
  BatchAdjustResult,
  BudgetPlan,
  CategoryAdjustment,
  CategoryBreakdown,
  SelectedVendorInfo,
} from "./budget-plan-types";

export interface BatchAdjustOptions {
  autoAdjustOnMismatch?: boolean;
  vendorCollectionMap?: Readonly<Record<string, string>>;
  now?: () => Date;
}

interface PreparedAdjustment {
  categoryName: string;
  /** Null for cost-only updates, which never touch the estimate. */
  newEstimate: number | null;
  actualCost: number | null;
  paymentStatus: string | null;
}

function ensureFiniteAmount(value: unknown, context: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new BudgetPlanValidationError(`Invalid ${context}: expected a finite number`);
  }

  return value;
}

function prepareAdjustments(adjustments: CategoryAdjustment[]): PreparedAdjustment[] {
  const prepared: PreparedAdjustment[] = [];

  for (const adjustment of adjustments) {
    const categoryName = adjustment.categoryName.trim();

    if (!categoryName || isPlaceholderCategory(categoryName)) {
      debugLog(`Skipping placeholder adjustment '${adjustment.categoryName}'`);
      continue;
    }

    const newEstimate = ensureFiniteAmount(
      adjustment.newEstimate,
      `estimate for category '${categoryName}'`,
    );
    const actualCost =
      adjustment.actualCost == null
        ? null
        : ensureFiniteAmount(adjustment.actualCost, `actual cost for category '${categoryName}'`);
    const paymentStatus = adjustment.paymentStatus ?? null;

    if (newEstimate === 0 && actualCost === null && paymentStatus === null) {
      debugLog(`Skipping adjustment for '${categoryName}': nothing to change`);
      continue;
    }

    if (newEstimate < 0) {
      throw new BudgetPlanValidationError(
        `Estimate for category '${categoryName}' cannot be negative.`,
      );
    }

    if (actualCost !== null && actualCost < 0) {
      throw new BudgetPlanValidationError(
        `Actual cost for category '${categoryName}' cannot be negative.`,
      );
    }

    prepared.push({
      categoryName,
      newEstimate: newEstimate === 0 ? null : roundAmount(newEstimate),
      actualCost: actualCost === null ? null : roundAmount(actualCost),
      paymentStatus,
    });
  }

  return prepared;
}

function resolveDeletionNames(deletions: string[]): Set<string> {
  const names = new Set<string>();

  for (const raw of deletions) {
    const name = raw.trim();

    if (!name || isPlaceholderCategory(name)) {
      continue;
    }

    names.add(name);
  }

  return names;
}

function purgeSelectedVendors(
  selectedVendors: SelectedVendorInfo[],
  deletionNames: Iterable<string>,
  vendorCollectionMap: Readonly<Record<string, string>>,
): SelectedVendorInfo[] {
  const collections = new Set<string>();

  for (const categoryName of deletionNames) {
    const collection = vendorCollectionMap[categoryName];

    if (collection) {
      collections.add(collection);
    } else {
      warnLog(`No vendor collection mapped for deleted category '${categoryName}'`);
    }
  }

  if (collections.size === 0) {
    return selectedVendors;
  }

  return selectedVendors.filter((vendor) => !collections.has(vendor.categoryName));
}

function applyAdjustment(
  working: Map<string, CategoryBreakdown>,
  adjustment: PreparedAdjustment,
  addedNames: string[],
  adjustedNames: Set<string>,
) {
  const existing = working.get(adjustment.categoryName);

  if (existing) {
    if (adjustment.newEstimate !== null) {
      debugLog(
        `Updating '${adjustment.categoryName}' estimate from ${existing.estimatedAmount} to ${adjustment.newEstimate}`,
      );
      existing.estimatedAmount = adjustment.newEstimate;
      existing.isUserSet = true;
      adjustedNames.add(adjustment.categoryName);
    }

    if (adjustment.actualCost !== null) {
      existing.actualCost = adjustment.actualCost;
    }

    if (adjustment.paymentStatus !== null) {
      existing.paymentStatus = adjustment.paymentStatus;
    }

    return;
  }

  const isEstimateChange = adjustment.newEstimate !== null;

  working.set(adjustment.categoryName, {
    categoryName: adjustment.categoryName,
    percentage: 0,
    estimatedAmount: adjustment.newEstimate ?? 0,
    actualCost: adjustment.actualCost,
    paymentStatus: adjustment.paymentStatus,
    isUserSet: isEstimateChange,
  });
  addedNames.push(adjustment.categoryName);

  if (isEstimateChange) {
    adjustedNames.add(adjustment.categoryName);
  }
}

function scaleCategories(categories: CategoryBreakdown[], target: number, currentSum: number) {
  const factor = target / currentSum;

  for (const category of categories) {
    category.estimatedAmount = roundAmount(category.estimatedAmount * factor);
  }
}

function redistribute(
  categories: CategoryBreakdown[],
  adjustedNames: Set<string>,
  totalBudget: number,
  autoAdjustOnMismatch: boolean,
) {
  const protectedCategories = categories.filter(
    (category) => adjustedNames.has(category.categoryName) || category.isUserSet,
  );
  const redistributable = categories.filter(
    (category) => !adjustedNames.has(category.categoryName) && !category.isUserSet,
  );
  const protectedSum = roundAmount(sumEstimates(protectedCategories));

  if (redistributable.length === 0) {
    const difference = roundAmount(totalBudget - protectedSum);

    if (Math.abs(difference) <= AMOUNT_TOLERANCE) {
      return;
    }

    if (autoAdjustOnMismatch && protectedSum > 0) {
      debugLog(`Scaling user-set categories from ${protectedSum} to ${totalBudget}`);
      scaleCategories(protectedCategories, totalBudget, protectedSum);
      return;
    }

    warnLog(
      `All categories are user-set and sum to ${protectedSum} instead of ${totalBudget}; keeping user values`,
    );
    return;
  }

  const pool = roundAmount(totalBudget - protectedSum);

  if (pool <= 0) {
    warnLog(`No budget left for ${redistributable.length} unprotected categories; setting them to 0`);

    for (const category of redistributable) {
      category.estimatedAmount = 0;
    }

    return;
  }

  const currentSum = sumEstimates(redistributable);

  if (currentSum > 0) {
    scaleCategories(redistributable, pool, currentSum);
    return;
  }

  const share = roundAmount(pool / redistributable.length);

  for (const category of redistributable) {
    category.estimatedAmount = share;
  }
}

export function applyBatchAdjustments(
  plan: BudgetPlan,
  request: BatchAdjustRequest,
  {
    autoAdjustOnMismatch = false,
    vendorCollectionMap = DEFAULT_VENDOR_COLLECTION_MAP,
    now = () => new Date(),
  }: BatchAdjustOptions = {},
): BatchAdjustResult {
  const adjustments = prepareAdjustments(request.adjustments);
  const deletionNames = resolveDeletionNames(request.deletions);

  const requestedTotal = request.newTotalBudget ?? 0;
  const totalBudget =
    Number.isFinite(requestedTotal) && requestedTotal > 0
      ? roundAmount(requestedTotal)
      : plan.currentTotalBudget;

  const working = new Map<string, CategoryBreakdown>();

  for (const category of plan.budgetBreakdown) {
    working.set(category.categoryName, { ...category });
  }

  const deletedCategories: string[] = [];
  const missingDeletions: string[] = [];
  let deletedEstimatedAmount = 0;
  let deletedActualCost = 0;

  for (const name of deletionNames) {
    const category = working.get(name);

    if (!category) {
      warnLog(`Category '${name}' requested for deletion is not in plan ${plan.referenceId}`);
      missingDeletions.push(name);
      continue;
    }

    deletedEstimatedAmount = roundAmount(deletedEstimatedAmount + category.estimatedAmount);

    if (category.actualCost !== null && category.actualCost > 0) {
      deletedActualCost = roundAmount(deletedActualCost + category.actualCost);
    }

    working.delete(name);
    deletedCategories.push(name);
  }

  // Vendors go for every requested name, even one the breakdown no longer has.
  const selectedVendors = purgeSelectedVendors(
    plan.selectedVendors,
    deletionNames,
    vendorCollectionMap,
  );

  const addedNames: string[] = [];
  const adjustedNames = new Set<string>();

  for (const adjustment of adjustments) {
    if (deletionNames.has(adjustment.categoryName)) {
      warnLog(`Skipping adjustment for '${adjustment.categoryName}': marked for deletion`);
      continue;
    }

    applyAdjustment(working, adjustment, addedNames, adjustedNames);
  }

  const budgetBreakdown: CategoryBreakdown[] = [];

  for (const category of plan.budgetBreakdown) {
    const current = working.get(category.categoryName);

    if (current) {
      budgetBreakdown.push(current);
    }
  }

  for (const name of addedNames) {
    const current = working.get(name);

    if (current) {
      budgetBreakdown.push(current);
    }
  }

  if (budgetBreakdown.length > 0) {
    redistribute(budgetBreakdown, adjustedNames, totalBudget, autoAdjustOnMismatch);
  } else if (deletedActualCost > 0) {
    debugLog(`All categories removed from ${plan.referenceId}; releasing ${deletedActualCost} of recorded spend`);
  }

  for (const category of budgetBreakdown) {
    category.percentage = percentageOf(category.estimatedAmount, totalBudget);
  }

  const totalSpent = sumActualCosts(budgetBreakdown);
  const estimateTotal = roundAmount(sumEstimates(budgetBreakdown));
  const drift = roundAmount(estimateTotal - totalBudget);
  const estimateMismatch =
    budgetBreakdown.length > 0 && Math.abs(drift) > AMOUNT_TOLERANCE ? drift : null;

  if (estimateMismatch !== null) {
    warnLog(
      `Plan ${plan.referenceId} estimates total ${estimateTotal} against a budget of ${totalBudget}`,
    );
  }

  debugLog(`Batch adjustment computed for ${plan.referenceId}`, {
    totalBudget,
    estimateTotal,
    totalSpent,
    deletedEstimatedAmount,
  });

  return {
    plan: {
      ...plan,
      currentTotalBudget: totalBudget,
      budgetBreakdown,
      totalSpent,
      balance: roundAmount(totalBudget - totalSpent),
      selectedVendors,
      timestamp: now().toISOString(),
    },
    summary: {
      deletedCategories,
      missingDeletions,
      removedVendorCount: plan.selectedVendors.length - selectedVendors.length,
      estimateMismatch,
    },
  };
}

// ABOUTME: Splits a fresh wedding budget across the predefined categories.
// ABOUTME: Leftover budget lands in a synthetic unallocated category.
import { debugLog, warnLog } from "@/lib/debug-log";

import { percentageOf, roundAmount, sumActualCosts } from "./budget-math";
import {
  DEFAULT_INITIAL_CATEGORY_SHARES,
  REMAINING_BUDGET_CATEGORY_NAME,
} from "./budget-plan-config";
import type { BudgetPlan, CategoryBreakdown, InitialBudgetInput } from "./budget-plan-types";

const REMAINDER_THRESHOLD = 0.001;

export interface InitialAllocationOptions {
  categoryShares?: Readonly<Record<string, number>>;
  now?: () => Date;
}

function normalizeShare(categoryName: string, share: number) {
  if (share > 1) {
    warnLog(`Share for ${categoryName} looks like a percentage; using ${share / 100}`);
    return share / 100;
  }

  return share;
}

function effectiveBudget(totalBudget: number | null) {
  if (totalBudget === null || !Number.isFinite(totalBudget) || totalBudget <= 0) {
    return 0;
  }

  return totalBudget;
}

export function allocateInitialBreakdown(
  totalBudget: number,
  categoryShares: Readonly<Record<string, number>> = DEFAULT_INITIAL_CATEGORY_SHARES,
): CategoryBreakdown[] {
  if (totalBudget <= 0) {
    return [];
  }

  const breakdown: CategoryBreakdown[] = [];
  let allocated = 0;
  let shareTotal = 0;

  for (const [categoryName, rawShare] of Object.entries(categoryShares)) {
    const share = normalizeShare(categoryName, rawShare);
    const estimatedAmount = roundAmount(totalBudget * share);

    shareTotal += share;
    allocated += estimatedAmount;

    breakdown.push({
      categoryName,
      percentage: roundAmount(share * 100),
      estimatedAmount,
      actualCost: null,
      paymentStatus: null,
      isUserSet: false,
    });
  }

  if (shareTotal > 1 + REMAINDER_THRESHOLD) {
    warnLog(
      `Initial category shares sum to ${(shareTotal * 100).toFixed(2)}%, more than the full budget`,
    );
  }

  const remainder = roundAmount(totalBudget - allocated);

  if (remainder > REMAINDER_THRESHOLD) {
    breakdown.push({
      categoryName: REMAINING_BUDGET_CATEGORY_NAME,
      percentage: percentageOf(remainder, totalBudget),
      estimatedAmount: remainder,
      actualCost: null,
      paymentStatus: null,
      isUserSet: false,
    });
  }

  return breakdown;
}

export function createInitialBudgetPlan(
  input: InitialBudgetInput,
  { categoryShares = DEFAULT_INITIAL_CATEGORY_SHARES, now = () => new Date() }: InitialAllocationOptions = {},
): BudgetPlan {
  const referenceId = input.referenceId.trim();
  const totalBudget = effectiveBudget(input.totalBudget);

  if (totalBudget !== input.totalBudget) {
    debugLog(`Budget for ${referenceId} treated as 0`, { requested: input.totalBudget });
  }

  const budgetBreakdown = allocateInitialBreakdown(totalBudget, categoryShares);
  const totalSpent = sumActualCosts(budgetBreakdown);

  return {
    referenceId,
    totalBudgetInput: totalBudget,
    currentTotalBudget: totalBudget,
    guestCount: input.guestCount,
    location: input.location,
    weddingDates: input.weddingDates,
    noOfEvents: input.noOfEvents,
    budgetBreakdown,
    totalSpent,
    balance: roundAmount(totalBudget - totalSpent),
    selectedVendors: [],
    timestamp: now().toISOString(),
  };
}

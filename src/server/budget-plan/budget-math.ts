// ABOUTME: Rounding and aggregation helpers for budget amounts.
import type { CategoryBreakdown } from "./budget-plan-types";

export const AMOUNT_TOLERANCE = 0.01;

function normalizeNumber(value: number): number {
  return Object.is(value, -0) ? 0 : value;
}

export function roundAmount(value: number): number {
  return normalizeNumber(Math.round((value + Number.EPSILON) * 100) / 100);
}

export function sumEstimates(categories: CategoryBreakdown[]): number {
  return categories.reduce((total, category) => total + category.estimatedAmount, 0);
}

export function sumActualCosts(categories: CategoryBreakdown[]): number {
  let total = 0;

  for (const category of categories) {
    if (category.actualCost !== null) {
      total += category.actualCost;
    }
  }

  return roundAmount(total);
}

export function percentageOf(amount: number, total: number): number {
  if (total <= 0) {
    return 0;
  }

  return roundAmount((amount / total) * 100);
}

// ABOUTME: In-memory BudgetPlanStore used by service and handler tests.
// ABOUTME: Stores deep copies so tests can compare before and after states.
import type { BudgetPlan, BudgetPlanStore } from "@/server/budget-plan/budget-plan-types";

function clonePlan(plan: BudgetPlan): BudgetPlan {
  return {
    ...plan,
    budgetBreakdown: plan.budgetBreakdown.map((category) => ({ ...category })),
    selectedVendors: plan.selectedVendors.map((vendor) => ({ ...vendor })),
  };
}

export function createInMemoryPlanStore(initialPlans: BudgetPlan[] = []) {
  const plans = new Map<string, BudgetPlan>();
  const upserts: string[] = [];
  let nextUpsertError: Error | null = null;

  for (const plan of initialPlans) {
    plans.set(plan.referenceId, clonePlan(plan));
  }

  const store: BudgetPlanStore = {
    async find(referenceId) {
      const plan = plans.get(referenceId);
      return plan ? clonePlan(plan) : null;
    },
    async upsert(referenceId, plan) {
      if (nextUpsertError) {
        const error = nextUpsertError;
        nextUpsertError = null;
        throw error;
      }

      upserts.push(referenceId);
      plans.set(referenceId, clonePlan(plan));
    },
  };

  return {
    store,
    upserts,
    stored(referenceId: string) {
      const plan = plans.get(referenceId);
      return plan ? clonePlan(plan) : null;
    },
    failNextUpsert(error: Error) {
      nextUpsertError = error;
    },
  };
}

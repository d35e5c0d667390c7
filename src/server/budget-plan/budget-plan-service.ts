// ABOUTME: Provides server actions that load, reallocate, and persist wedding budget plans.
// ABOUTME: Each action is one read-modify-write cycle against the injected plan store.
import { debugLog } from "@/lib/debug-log";
import { ensurePlannerSheets } from "@/server/google/bootstrap";
import { createSheetsClient, readServiceAccount } from "@/server/google/clients";
import { createBudgetPlanRepository } from "@/server/google/repository/budget-plan-repository";

import { applyBatchAdjustments } from "./batch-adjust";
import { loadBudgetPlannerConfig, type BudgetPlannerConfig } from "./budget-plan-config";
import {
  BudgetPlanNotFoundError,
  BudgetPlanPersistenceError,
  BudgetPlanValidationError,
} from "./budget-plan-errors";
import type {
  BatchAdjustRequest,
  BatchAdjustResult,
  BudgetPlan,
  BudgetPlanStore,
  CategoryCostInfo,
  InitialBudgetInput,
  VendorCostInput,
  VendorCostSummary,
  VendorSelectionInput,
} from "./budget-plan-types";
import { createInitialBudgetPlan } from "./initial-allocation";
import { attachVendorCost, describeCategoryCost, selectVendor } from "./vendor-costs";

type Environment = Record<string, string | undefined>;

interface Dependencies {
  resolveStore?: () => Promise<BudgetPlanStore>;
  config?: BudgetPlannerConfig;
  now?: () => Date;
}

export async function createSheetsBudgetPlanStore(
  env: Environment = process.env,
): Promise<BudgetPlanStore> {
  const spreadsheetId = env.BUDGET_PLANNER_SPREADSHEET_ID?.trim();

  if (!spreadsheetId) {
    throw new Error("Missing BUDGET_PLANNER_SPREADSHEET_ID");
  }

  const sheets = createSheetsClient(readServiceAccount(env));
  const { createdSheets } = await ensurePlannerSheets({ sheets, spreadsheetId });

  if (createdSheets.length > 0) {
    debugLog("Created planner sheets", createdSheets);
  }

  return createBudgetPlanRepository({ sheets, spreadsheetId });
}

function memoizeStore(resolve: () => Promise<BudgetPlanStore>) {
  let pending: Promise<BudgetPlanStore> | null = null;

  return (): Promise<BudgetPlanStore> => {
    if (pending) {
      return pending;
    }

    const next = resolve().catch((error: unknown) => {
      pending = null;
      throw error;
    });

    pending = next;
    return next;
  };
}

function assertReferenceId(referenceId: string | null | undefined) {
  if (!referenceId || !referenceId.trim()) {
    throw new BudgetPlanValidationError("Missing referenceId");
  }

  return referenceId.trim();
}

export interface PlanScopedOptions {
  referenceId: string;
}

export interface BatchAdjustActionOptions extends PlanScopedOptions {
  request: BatchAdjustRequest;
}

export interface AddVendorOptions extends PlanScopedOptions, VendorCostInput {}

export interface SelectVendorOptions extends PlanScopedOptions {
  vendorCollection: string;
  selection: VendorSelectionInput;
}

export interface CategoryCostOptions extends PlanScopedOptions {
  categoryName: string;
}

export function createBudgetPlanActions(dependencies: Dependencies = {}) {
  const resolveStore = memoizeStore(
    dependencies.resolveStore ?? (() => createSheetsBudgetPlanStore()),
  );
  const config = dependencies.config ?? loadBudgetPlannerConfig();
  const now = dependencies.now ?? (() => new Date());

  async function loadPlan(referenceId: string): Promise<{ store: BudgetPlanStore; plan: BudgetPlan }> {
    const store = await resolveStore();
    const plan = await store.find(referenceId);

    if (!plan) {
      throw new BudgetPlanNotFoundError(`Budget plan with reference_id '${referenceId}' not found.`);
    }

    return { store, plan };
  }

  async function persist(store: BudgetPlanStore, plan: BudgetPlan) {
    try {
      await store.upsert(plan.referenceId, plan);
    } catch (error) {
      throw new BudgetPlanPersistenceError(
        `Failed to save budget plan '${plan.referenceId}'.`,
        error,
      );
    }
  }

  async function createInitialPlan(input: InitialBudgetInput): Promise<BudgetPlan> {
    const referenceId = assertReferenceId(input.referenceId);
    const plan = createInitialBudgetPlan(
      { ...input, referenceId },
      { categoryShares: config.initialCategoryShares, now },
    );
    const store = await resolveStore();

    await persist(store, plan);
    debugLog(`Initial budget plan saved for ${referenceId}`, {
      totalBudget: plan.currentTotalBudget,
      categories: plan.budgetBreakdown.length,
    });

    return plan;
  }

  async function getBudgetPlan({ referenceId }: PlanScopedOptions): Promise<BudgetPlan> {
    const { plan } = await loadPlan(assertReferenceId(referenceId));
    return plan;
  }

  async function batchAdjust({ referenceId, request }: BatchAdjustActionOptions): Promise<BatchAdjustResult> {
    const { store, plan } = await loadPlan(assertReferenceId(referenceId));
    const result = applyBatchAdjustments(plan, request, {
      autoAdjustOnMismatch: config.autoAdjustOnMismatch,
      vendorCollectionMap: config.vendorCollectionMap,
      now,
    });

    await persist(store, result.plan);

    return result;
  }

  async function addVendor({ referenceId, ...input }: AddVendorOptions): Promise<VendorCostSummary> {
    const { store, plan } = await loadPlan(assertReferenceId(referenceId));
    const result = attachVendorCost(plan, input, now);

    await persist(store, result.plan);

    return result.summary;
  }

  async function addSelectedVendor({
    referenceId,
    vendorCollection,
    selection,
  }: SelectVendorOptions): Promise<BudgetPlan> {
    const { store, plan } = await loadPlan(assertReferenceId(referenceId));
    const updated = selectVendor(plan, vendorCollection, selection, {
      vendorCollections: Object.values(config.vendorCollectionMap),
      now,
    });

    await persist(store, updated);

    return updated;
  }

  async function getCategoryCost({
    referenceId,
    categoryName,
  }: CategoryCostOptions): Promise<CategoryCostInfo> {
    const { plan } = await loadPlan(assertReferenceId(referenceId));
    return describeCategoryCost(plan, categoryName);
  }

  return {
    createInitialPlan,
    getBudgetPlan,
    batchAdjust,
    addVendor,
    addSelectedVendor,
    getCategoryCost,
  };
}

export type BudgetPlanActions = ReturnType<typeof createBudgetPlanActions>;

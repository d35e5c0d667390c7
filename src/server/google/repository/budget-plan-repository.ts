// ABOUTME: Loads and persists wedding budget plans across the plan, category, and vendor tabs.
// ABOUTME: Writes only one plan's rows and commits them by moving the plan row to a new revision.
import { randomUUID } from "node:crypto";

import { warnLog } from "@/lib/debug-log";
import type {
  BudgetPlan,
  BudgetPlanStore,
  CategoryBreakdown,
  SelectedVendorInfo,
} from "@/server/budget-plan/budget-plan-types";
import type { SheetsClient } from "@/server/google/clients";
import { executeWithRetry } from "@/server/google/retry";
import {
  BUDGET_CATEGORIES_SHEET_SCHEMA,
  BUDGET_PLANS_SHEET_SCHEMA,
  SELECTED_VENDORS_SHEET_SCHEMA,
  columnRange,
  referenceCell,
  rowRange,
  type SheetSchema,
} from "@/server/google/sheet-schemas";
import {
  ensureHeaderRow,
  formatOptional,
  isEmptyRow,
  normalizeRow,
  optionalNumber,
  optionalString,
  parseBoolean,
  requireInteger,
  requireNumber,
} from "./sheet-utils";

type PlanSummary = Omit<BudgetPlan, "budgetBreakdown" | "selectedVendors">;

interface IndexedRow {
  cells: string[];
  /** 1-based sheet row number. */
  rowIndex: number;
}

interface BudgetPlanRepositoryOptions {
  sheets: SheetsClient;
  spreadsheetId: string;
  createRevision?: () => string;
}

function parsePlanRow({ cells, rowIndex }: IndexedRow): PlanSummary {
  const [
    referenceId,
    ,
    totalBudgetInputRaw,
    currentTotalBudgetRaw,
    guestCountRaw,
    location,
    weddingDates,
    noOfEventsRaw,
    totalSpentRaw,
    balanceRaw,
    timestamp,
  ] = cells;

  return {
    referenceId: referenceId.trim(),
    totalBudgetInput: requireNumber(totalBudgetInputRaw, { field: "total_budget_input", rowIndex }),
    currentTotalBudget: requireNumber(currentTotalBudgetRaw, {
      field: "current_total_budget",
      rowIndex,
    }),
    guestCount: requireInteger(guestCountRaw, { field: "guest_count", rowIndex }),
    location: location.trim(),
    weddingDates: weddingDates.trim(),
    noOfEvents: requireInteger(noOfEventsRaw, { field: "no_of_events", rowIndex }),
    totalSpent: optionalNumber(totalSpentRaw, { field: "total_spent", rowIndex }) ?? 0,
    balance: requireNumber(balanceRaw, { field: "balance", rowIndex }),
    timestamp: timestamp.trim(),
  };
}

function parseCategoryRow({ cells, rowIndex }: IndexedRow): {
  position: number;
  category: CategoryBreakdown;
} {
  const [
    ,
    ,
    positionRaw,
    categoryName,
    percentageRaw,
    estimatedRaw,
    actualCostRaw,
    paymentStatus,
    isUserSetRaw,
  ] = cells;

  if (!categoryName.trim()) {
    throw new Error(`Invalid budget category row at index ${rowIndex}: missing category_name`);
  }

  return {
    position: requireInteger(positionRaw, { field: "position", rowIndex }),
    category: {
      categoryName: categoryName.trim(),
      percentage: optionalNumber(percentageRaw, { field: "percentage", rowIndex }) ?? 0,
      estimatedAmount: requireNumber(estimatedRaw, { field: "estimated_amount", rowIndex }),
      actualCost: optionalNumber(actualCostRaw, { field: "actual_cost", rowIndex }),
      paymentStatus: optionalString(paymentStatus),
      isUserSet: parseBoolean(isUserSetRaw),
    },
  };
}

function parseVendorRow({ cells, rowIndex }: IndexedRow): {
  position: number;
  vendor: SelectedVendorInfo;
} {
  const [, , positionRaw, categoryName, vendorId, title, city, ratingRaw, imageUrl] = cells;

  if (!vendorId.trim()) {
    throw new Error(`Invalid selected vendor row at index ${rowIndex}: missing vendor_id`);
  }

  return {
    position: requireInteger(positionRaw, { field: "position", rowIndex }),
    vendor: {
      categoryName: categoryName.trim(),
      vendorId: vendorId.trim(),
      title: title.trim(),
      city: optionalString(city),
      rating: optionalNumber(ratingRaw, { field: "rating", rowIndex }),
      imageUrl: optionalString(imageUrl),
    },
  };
}

function byPosition<T extends { position: number }>(left: T, right: T) {
  return left.position - right.position;
}

function toPlanRow(plan: BudgetPlan, revision: string): string[] {
  return [
    plan.referenceId,
    revision,
    String(plan.totalBudgetInput),
    String(plan.currentTotalBudget),
    String(plan.guestCount),
    plan.location,
    plan.weddingDates,
    String(plan.noOfEvents),
    String(plan.totalSpent),
    String(plan.balance),
    plan.timestamp,
  ];
}

function toCategoryRows(plan: BudgetPlan, revision: string): string[][] {
  return plan.budgetBreakdown.map((category, index) => [
    plan.referenceId,
    revision,
    String(index + 1),
    category.categoryName,
    String(category.percentage),
    String(category.estimatedAmount),
    formatOptional(category.actualCost),
    formatOptional(category.paymentStatus),
    category.isUserSet ? "true" : "false",
  ]);
}

function toVendorRows(plan: BudgetPlan, revision: string): string[][] {
  return plan.selectedVendors.map((vendor, index) => [
    plan.referenceId,
    revision,
    String(index + 1),
    vendor.categoryName,
    vendor.vendorId,
    vendor.title,
    formatOptional(vendor.city),
    formatOptional(vendor.rating),
    formatOptional(vendor.imageUrl),
  ]);
}

function revisionOf(row: IndexedRow) {
  return row.cells[1].trim();
}

function belongsTo(referenceId: string, revision?: string) {
  return (row: IndexedRow) =>
    row.cells[0].trim() === referenceId && (revision === undefined || revisionOf(row) === revision);
}

export function createBudgetPlanRepository({
  sheets,
  spreadsheetId,
  createRevision = randomUUID,
}: BudgetPlanRepositoryOptions): BudgetPlanStore {
  async function readRows(schema: SheetSchema): Promise<IndexedRow[]> {
    const response = await executeWithRetry(() =>
      sheets.spreadsheets.values.get({
        spreadsheetId,
        range: columnRange(schema),
      }),
    );

    const rows: unknown[][] = response.data.values ?? [];

    if (rows.length === 0) {
      throw new Error(`${schema.title} is missing its header row`);
    }

    const [headerRow, ...dataRows] = rows;

    ensureHeaderRow(headerRow, schema.headers, schema.title);

    const records: IndexedRow[] = [];

    for (let index = 0; index < dataRows.length; index += 1) {
      const cells = normalizeRow(
        Array.isArray(dataRows[index]) ? dataRows[index] : [],
        schema.headers.length,
      );

      // Released rows keep their cells but no reference_id.
      if (isEmptyRow(cells) || !cells[0].trim()) {
        continue;
      }

      records.push({ cells, rowIndex: index + 2 });
    }

    return records;
  }

  async function appendRows(schema: SheetSchema, rows: string[][]) {
    if (rows.length === 0) {
      return;
    }

    await executeWithRetry(
      () =>
        sheets.spreadsheets.values.append({
          spreadsheetId,
          range: columnRange(schema),
          valueInputOption: "RAW",
          insertDataOption: "INSERT_ROWS",
          requestBody: {
            values: rows,
          },
        }),
      { operation: "insert" },
    );
  }

  async function overwriteRow(schema: SheetSchema, rowIndex: number, row: string[]) {
    await executeWithRetry(
      () =>
        sheets.spreadsheets.values.update({
          spreadsheetId,
          range: rowRange(schema, rowIndex),
          valueInputOption: "RAW",
          requestBody: {
            values: [row],
          },
        }),
      { operation: "overwrite" },
    );
  }

  async function releaseRows(referenceId: string, ranges: string[]) {
    if (ranges.length === 0) {
      return;
    }

    try {
      await executeWithRetry(
        () =>
          sheets.spreadsheets.values.batchClear({
            spreadsheetId,
            requestBody: { ranges },
          }),
        { operation: "overwrite" },
      );
    } catch (error) {
      // The new revision is already committed; stale rows are ignored on load.
      warnLog(`Could not release ${ranges.length} superseded rows of plan ${referenceId}`, error);
    }
  }

  return {
    async find(referenceId: string): Promise<BudgetPlan | null> {
      const [planRows, categoryRows, vendorRows] = await Promise.all([
        readRows(BUDGET_PLANS_SHEET_SCHEMA),
        readRows(BUDGET_CATEGORIES_SHEET_SCHEMA),
        readRows(SELECTED_VENDORS_SHEET_SCHEMA),
      ]);

      const planRow = planRows.find(belongsTo(referenceId));

      if (!planRow) {
        return null;
      }

      const committed = belongsTo(referenceId, revisionOf(planRow));

      const budgetBreakdown = categoryRows
        .filter(committed)
        .map(parseCategoryRow)
        .sort(byPosition)
        .map((entry) => entry.category);

      const selectedVendors = vendorRows
        .filter(committed)
        .map(parseVendorRow)
        .sort(byPosition)
        .map((entry) => entry.vendor);

      return {
        ...parsePlanRow(planRow),
        budgetBreakdown,
        selectedVendors,
      };
    },

    async upsert(referenceId: string, plan: BudgetPlan): Promise<void> {
      if (plan.referenceId !== referenceId) {
        throw new Error(`Plan reference ${plan.referenceId} does not match ${referenceId}`);
      }

      const [planRows, categoryRows, vendorRows] = await Promise.all([
        readRows(BUDGET_PLANS_SHEET_SCHEMA),
        readRows(BUDGET_CATEGORIES_SHEET_SCHEMA),
        readRows(SELECTED_VENDORS_SHEET_SCHEMA),
      ]);

      const currentPlanRow = planRows.find(belongsTo(referenceId));
      const revision = createRevision();

      // Rows tagged with an uncommitted revision are invisible to find.
      await appendRows(BUDGET_CATEGORIES_SHEET_SCHEMA, toCategoryRows(plan, revision));
      await appendRows(SELECTED_VENDORS_SHEET_SCHEMA, toVendorRows(plan, revision));

      if (!currentPlanRow) {
        await appendRows(BUDGET_PLANS_SHEET_SCHEMA, [toPlanRow(plan, revision)]);
        return;
      }

      await overwriteRow(
        BUDGET_PLANS_SHEET_SCHEMA,
        currentPlanRow.rowIndex,
        toPlanRow(plan, revision),
      );

      const superseded = belongsTo(referenceId, revisionOf(currentPlanRow));

      await releaseRows(referenceId, [
        ...categoryRows
          .filter(superseded)
          .map((row) => referenceCell(BUDGET_CATEGORIES_SHEET_SCHEMA, row.rowIndex)),
        ...vendorRows
          .filter(superseded)
          .map((row) => referenceCell(SELECTED_VENDORS_SHEET_SCHEMA, row.rowIndex)),
      ]);
    },
  };
}

// ABOUTME: Lists the Google Sheets tabs and column headers backing budget plans.
// ABOUTME: Provides helpers for computing header ranges and column spans.
import type { sheets_v4 } from "googleapis";

export interface SheetSchema {
  title: string;
  headers: readonly string[];
  gridProperties?: sheets_v4.Schema$GridProperties;
  freezeHeader?: boolean;
}

const DEFAULT_GRID_ROWS = 1000;

export const REQUIRED_SHEETS: SheetSchema[] = [
  {
    title: "budget_plans",
    headers: [
      "reference_id",
      "revision",
      "total_budget_input",
      "current_total_budget",
      "guest_count",
      "location",
      "wedding_dates",
      "no_of_events",
      "total_spent",
      "balance",
      "timestamp",
    ],
    gridProperties: {
      rowCount: DEFAULT_GRID_ROWS,
      columnCount: 12,
      frozenRowCount: 1,
    },
    freezeHeader: true,
  },
  {
    title: "budget_categories",
    headers: [
      "reference_id",
      "revision",
      "position",
      "category_name",
      "percentage",
      "estimated_amount",
      "actual_cost",
      "payment_status",
      "is_user_set",
    ],
    gridProperties: {
      rowCount: DEFAULT_GRID_ROWS,
      columnCount: 10,
      frozenRowCount: 1,
    },
    freezeHeader: true,
  },
  {
    title: "selected_vendors",
    headers: [
      "reference_id",
      "revision",
      "position",
      "category_name",
      "vendor_id",
      "title",
      "city",
      "rating",
      "image_url",
    ],
    gridProperties: {
      rowCount: DEFAULT_GRID_ROWS,
      columnCount: 10,
      frozenRowCount: 1,
    },
    freezeHeader: true,
  },
];

REQUIRED_SHEETS.forEach((schema) => Object.freeze(schema.headers));

function requireSchema(title: string) {
  const schema = REQUIRED_SHEETS.find((item) => item.title === title);

  if (!schema) {
    throw new Error(`Sheet schema not defined for ${title}`);
  }

  return schema;
}

export const BUDGET_PLANS_SHEET_SCHEMA = requireSchema("budget_plans");
export const BUDGET_CATEGORIES_SHEET_SCHEMA = requireSchema("budget_categories");
export const SELECTED_VENDORS_SHEET_SCHEMA = requireSchema("selected_vendors");

export function columnIndexToLetter(index: number) {
  if (index <= 0) {
    throw new Error("Column index must be positive");
  }

  let result = "";
  let current = index;

  while (current > 0) {
    const remainder = (current - 1) % 26;
    result = String.fromCharCode(65 + remainder) + result;
    current = Math.floor((current - 1) / 26);
  }

  return result;
}

export function headerRange(schema: SheetSchema) {
  const lastColumn = columnIndexToLetter(schema.headers.length);
  return `${schema.title}!A1:${lastColumn}1`;
}

export function rowRange(schema: SheetSchema, rowNumber: number) {
  const lastColumn = columnIndexToLetter(schema.headers.length);
  return `${schema.title}!A${rowNumber}:${lastColumn}${rowNumber}`;
}

/** The reference_id cell of one row; clearing it releases the row. */
export function referenceCell(schema: SheetSchema, rowNumber: number) {
  return `${schema.title}!A${rowNumber}`;
}

export function columnRange(schema: SheetSchema) {
  const lastColumn = columnIndexToLetter(schema.headers.length);
  return `${schema.title}!A:${lastColumn}`;
}

export function sheetPropertiesFor(
  schema: SheetSchema,
): sheets_v4.Schema$SheetProperties {
  return {
    title: schema.title,
    sheetType: "GRID",
    gridProperties: {
      rowCount: DEFAULT_GRID_ROWS,
      columnCount: Math.max(
        schema.headers.length,
        schema.gridProperties?.columnCount ?? schema.headers.length,
      ),
      frozenRowCount: schema.freezeHeader ? 1 : 0,
      ...schema.gridProperties,
    },
  };
}

// ABOUTME: Ensures the planner spreadsheet has every required tab and header row.
// ABOUTME: Adds missing tabs in one batch update and rewrites drifted headers.
import type { SheetsClient } from "./clients";
import { executeWithRetry } from "./retry";
import { REQUIRED_SHEETS, headerRange, sheetPropertiesFor } from "./sheet-schemas";

interface EnsurePlannerSheetsParams {
  sheets: SheetsClient;
  spreadsheetId: string;
}

export interface EnsurePlannerSheetsResult {
  createdSheets: string[];
  rewrittenHeaders: string[];
}

function headersMatch(actual: unknown[] | undefined, expected: readonly string[]) {
  if (!actual || actual.length !== expected.length) {
    return false;
  }

  return expected.every((value, index) => actual[index] === value);
}

export async function ensurePlannerSheets({
  sheets,
  spreadsheetId,
}: EnsurePlannerSheetsParams): Promise<EnsurePlannerSheetsResult> {
  if (!spreadsheetId) {
    throw new Error("Missing spreadsheet identifier");
  }

  const metadata = await executeWithRetry(() =>
    sheets.spreadsheets.get({
      spreadsheetId,
      fields: "sheets(properties(title))",
    }),
  );

  const existingTitles = new Set(
    (metadata.data.sheets ?? [])
      .map((sheet) => sheet.properties?.title)
      .filter((title): title is string => Boolean(title)),
  );

  const missingSchemas = REQUIRED_SHEETS.filter((schema) => !existingTitles.has(schema.title));

  if (missingSchemas.length > 0) {
    await executeWithRetry(() =>
      sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: missingSchemas.map((schema) => ({
            addSheet: {
              properties: sheetPropertiesFor(schema),
            },
          })),
        },
      }),
      { operation: "insert" },
    );
  }

  const rewrittenHeaders: string[] = [];

  for (const schema of REQUIRED_SHEETS) {
    const response = await executeWithRetry(() =>
      sheets.spreadsheets.values.get({
        spreadsheetId,
        range: headerRange(schema),
      }),
    );

    const headerRow = response.data.values?.[0];

    if (headersMatch(headerRow, schema.headers)) {
      continue;
    }

    await executeWithRetry(() =>
      sheets.spreadsheets.values.update({
        spreadsheetId,
        range: headerRange(schema),
        valueInputOption: "RAW",
        requestBody: {
          values: [Array.from(schema.headers)],
        },
      }),
      { operation: "overwrite" },
    );

    rewrittenHeaders.push(schema.title);
  }

  return {
    createdSheets: missingSchemas.map((schema) => schema.title),
    rewrittenHeaders,
  };
}

import { afterEach, beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { ensurePlannerSheets } from "@/server/google/bootstrap";
import { createBudgetPlanRepository } from "@/server/google/repository/budget-plan-repository";
import {
  BUDGET_CATEGORIES_SHEET_SCHEMA,
  BUDGET_PLANS_SHEET_SCHEMA,
  SELECTED_VENDORS_SHEET_SCHEMA,
} from "@/server/google/sheet-schemas";
import { createInMemorySheets } from "../../../helpers/in-memory-sheets";
import { buildPlan, category, vendor } from "../../../helpers/plan-fixtures";

function sheetsError(message: string, code: number) {
  return Object.assign(new Error(message), { code });
}

async function setup() {
  const sheets = createInMemorySheets();
  await ensurePlannerSheets({ sheets: sheets.client, spreadsheetId: "sheet-1" });

  let revision = 0;
  const repository = createBudgetPlanRepository({
    sheets: sheets.client,
    spreadsheetId: "sheet-1",
    createRevision: () => {
      revision += 1;
      return `rev-${revision}`;
    },
  });

  return { sheets, repository };
}

describe("createBudgetPlanRepository", () => {
  beforeEach(() => {
    mock.method(console, "warn", () => {});
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("round-trips a plan across the three tabs", async () => {
    const { sheets, repository } = await setup();
    const plan = buildPlan({
      budgetBreakdown: [
        category("Venue", 60000.5, {
          percentage: 60,
          actualCost: 1200.75,
          paymentStatus: "Advance",
          isUserSet: true,
        }),
        category("Caterer", 39999.5, { percentage: 40 }),
      ],
      totalSpent: 1200.75,
      balance: 98799.25,
      selectedVendors: [
        vendor("venues", "v-1", { city: "Jaipur", rating: 4.8, imageUrl: "https://example.com/v.jpg" }),
      ],
    });

    await repository.upsert("plan-1", plan);

    assert.deepEqual(await repository.find("plan-1"), plan);
    assert.deepEqual(sheets.rows("budget_categories")[1], [
      "plan-1",
      "rev-1",
      "1",
      "Venue",
      "60",
      "60000.5",
      "1200.75",
      "Advance",
      "true",
    ]);
    assert.equal(sheets.rows("budget_plans")[1][1], "rev-1");
  });

  it("returns null for unknown plans", async () => {
    const { repository } = await setup();

    assert.equal(await repository.find("nope"), null);
  });

  it("replaces one plan's rows without disturbing another", async () => {
    const { sheets, repository } = await setup();
    const other = buildPlan({ referenceId: "plan-2", location: "Kochi" });

    await repository.upsert("plan-1", buildPlan());
    await repository.upsert("plan-2", other);
    await repository.upsert(
      "plan-1",
      buildPlan({ budgetBreakdown: [category("Venue", 100000, { percentage: 100 })] }),
    );

    assert.deepEqual(await repository.find("plan-2"), other);
    assert.deepEqual(
      (await repository.find("plan-1"))?.budgetBreakdown.map((entry) => entry.categoryName),
      ["Venue"],
    );
    assert.deepEqual(
      sheets.rows("budget_plans").slice(1).map((row) => row.slice(0, 2)),
      [
        ["plan-1", "rev-3"],
        ["plan-2", "rev-2"],
      ],
    );
    assert.equal(
      sheets.rows("budget_categories").filter((row) => row[0] === "plan-1").length,
      1,
    );
    assert.equal(
      sheets.calls.some((call) => call.method === "values.update" && call.range === "budget_plans!A2:K2"),
      true,
    );
  });

  it("keeps both plans when different plans are written at once", async () => {
    const { repository } = await setup();
    const first = buildPlan({ referenceId: "plan-a" });
    const second = buildPlan({ referenceId: "plan-b", location: "Mysuru" });

    await Promise.all([repository.upsert("plan-a", first), repository.upsert("plan-b", second)]);

    assert.deepEqual(await repository.find("plan-a"), first);
    assert.deepEqual(await repository.find("plan-b"), second);

    const firstEdit = buildPlan({ referenceId: "plan-a", budgetBreakdown: [category("DJ", 100000)] });
    const secondEdit = buildPlan({
      referenceId: "plan-b",
      location: "Mysuru",
      budgetBreakdown: [category("Decor", 100000)],
    });

    await Promise.all([
      repository.upsert("plan-a", firstEdit),
      repository.upsert("plan-b", secondEdit),
    ]);

    assert.deepEqual(await repository.find("plan-a"), firstEdit);
    assert.deepEqual(await repository.find("plan-b"), secondEdit);
  });

  it("leaves stored plans intact when a new plan's rows cannot be appended", async () => {
    const { sheets, repository } = await setup();
    const stored = buildPlan({ referenceId: "plan-b" });
    await repository.upsert("plan-b", stored);
    const appendsBefore = sheets.calls.filter((call) => call.method === "values.append").length;

    sheets.failNext("values.append", sheetsError("backend error", 503));

    await assert.rejects(repository.upsert("plan-a", buildPlan({ referenceId: "plan-a" })), /backend error/);
    assert.equal(await repository.find("plan-a"), null);
    assert.deepEqual(await repository.find("plan-b"), stored);
    assert.equal(
      sheets.calls.filter((call) => call.method === "values.append").length - appendsBefore,
      1,
    );
  });

  it("keeps the previous revision when the plan row update fails", async () => {
    const { sheets, repository } = await setup();
    const original = buildPlan();
    const other = buildPlan({ referenceId: "plan-2" });
    await repository.upsert("plan-1", original);
    await repository.upsert("plan-2", other);

    sheets.failNext("values.update", sheetsError("invalid range", 400));

    await assert.rejects(
      repository.upsert(
        "plan-1",
        buildPlan({ budgetBreakdown: [category("Venue", 100000)], balance: 1 }),
      ),
      /invalid range/,
    );
    assert.deepEqual(await repository.find("plan-1"), original);
    assert.deepEqual(await repository.find("plan-2"), other);
  });

  it("treats a failed release of superseded rows as non-fatal", async () => {
    const { sheets, repository } = await setup();
    const next = buildPlan({ budgetBreakdown: [category("Venue", 100000)] });
    await repository.upsert("plan-1", buildPlan());

    sheets.failNext("values.batchClear", sheetsError("invalid range", 400));
    await repository.upsert("plan-1", next);

    assert.deepEqual(await repository.find("plan-1"), next);
  });

  it("rejects plans stored under a different reference", async () => {
    const { repository } = await setup();

    await assert.rejects(
      repository.upsert("plan-9", buildPlan()),
      /Plan reference plan-1 does not match plan-9/,
    );
  });

  it("fails on a header that does not match the schema", async () => {
    const sheets = createInMemorySheets({
      budget_plans: [["id", "total"]],
      budget_categories: [Array.from(BUDGET_CATEGORIES_SHEET_SCHEMA.headers)],
      selected_vendors: [Array.from(SELECTED_VENDORS_SHEET_SCHEMA.headers)],
    });
    const repository = createBudgetPlanRepository({ sheets: sheets.client, spreadsheetId: "sheet-1" });

    await assert.rejects(
      repository.find("plan-1"),
      /budget_plans header does not match expected schema/,
    );
  });

  it("fails on non-numeric amounts", async () => {
    const sheets = createInMemorySheets({
      budget_plans: [
        Array.from(BUDGET_PLANS_SHEET_SCHEMA.headers),
        [
          "plan-1",
          "rev-1",
          "1000",
          "1000",
          "50",
          "Agra",
          "2026-02-02",
          "1",
          "0",
          "1000",
          "2026-01-01T00:00:00.000Z",
        ],
      ],
      budget_categories: [
        Array.from(BUDGET_CATEGORIES_SHEET_SCHEMA.headers),
        ["plan-1", "rev-1", "1", "Venue", "100", "lots", "", "", "false"],
      ],
      selected_vendors: [Array.from(SELECTED_VENDORS_SHEET_SCHEMA.headers)],
    });
    const repository = createBudgetPlanRepository({ sheets: sheets.client, spreadsheetId: "sheet-1" });

    await assert.rejects(
      repository.find("plan-1"),
      /Invalid row at index 2: estimated_amount must be a number/,
    );
  });
});

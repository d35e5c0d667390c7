import { afterEach, beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { GET as getPlanRoute } from "@/app/api/budget-planner/[referenceId]/route";
import { POST as addVendorRoute } from "@/app/api/budget-planner/[referenceId]/category/[categoryName]/add-vendor/route";
import {
  createBudgetPlannerHandler,
  extractPlannerSegments,
} from "@/app/api/budget-planner/budget-planner-handler";
import { loadBudgetPlannerConfig } from "@/server/budget-plan/budget-plan-config";
import { createBudgetPlanActions } from "@/server/budget-plan/budget-plan-service";
import { createInMemoryPlanStore } from "../../../helpers/in-memory-plan-store";
import { FIXED_NOW, buildPlan, fixedNow } from "../../../helpers/plan-fixtures";

const BASE_URL = "http://localhost/api/budget-planner";

function setup() {
  const memory = createInMemoryPlanStore([buildPlan()]);
  const actions = createBudgetPlanActions({
    resolveStore: async () => memory.store,
    config: loadBudgetPlannerConfig({}),
    now: fixedNow,
  });

  return { memory, handler: createBudgetPlannerHandler({ actions }) };
}

function postJson(path: string, body: unknown) {
  return new Request(`${BASE_URL}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("budget planner handler", () => {
  beforeEach(() => {
    mock.method(console, "warn", () => {});
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("creates an initial plan from snake_case fields", async () => {
    const { handler, memory } = setup();

    const response = await handler.createInitialPlan(
      postJson("/initial", {
        reference_id: "plan-5",
        total_budget: 40000,
        guest_count: 80,
        location: "Shimla",
        wedding_dates: "2026-05-01",
        no_of_events: 1,
      }),
    );

    assert.equal(response.status, 201);
    const payload = await response.json();
    assert.equal(payload.referenceId, "plan-5");
    assert.equal(payload.totalBudget, 40000);
    assert.equal(payload.spent, 0);
    assert.equal(payload.balance, 40000);
    assert.equal(payload.timestamp, FIXED_NOW.toISOString());
    assert.equal(payload.budgetBreakdown.length, 4);
    assert.equal(memory.stored("plan-5")?.guestCount, 80);
  });

  it("rejects malformed bodies", async () => {
    const { handler } = setup();

    const invalidJson = await handler.createInitialPlan(postJson("/initial", "{not json"));
    const missingGuests = await handler.createInitialPlan(
      postJson("/initial", {
        referenceId: "plan-5",
        totalBudget: 1000,
        location: "Shimla",
        weddingDates: "2026-05-01",
        noOfEvents: 1,
      }),
    );

    assert.equal(invalidJson.status, 400);
    assert.deepEqual(await invalidJson.json(), { error: "Invalid JSON body" });
    assert.equal(missingGuests.status, 400);
    assert.deepEqual(await missingGuests.json(), {
      error: "guestCount must be a positive integer",
    });
  });

  it("returns 404 for an unknown plan", async () => {
    const { handler } = setup();

    const response = await handler.getPlan(new Request(`${BASE_URL}/ghost`), {
      params: { referenceId: "ghost" },
    });

    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), {
      error: "Budget plan with reference_id 'ghost' not found.",
    });
  });

  it("applies a batch adjustment and returns the summary", async () => {
    const { handler } = setup();

    const response = await handler.batchAdjust(
      postJson("/plan-1/batch-adjust", {
        deletions: [{ category_name: "Makeup" }, "Florist"],
        adjustments: [{ category_name: "Venue", new_estimate: 40000 }],
      }),
      { params: { referenceId: "plan-1" } },
    );

    assert.equal(response.status, 200);
    const payload = await response.json();
    assert.deepEqual(
      payload.budgetBreakdown.map((entry: { estimatedAmount: number }) => entry.estimatedAmount),
      [40000, 30000, 30000],
    );
    assert.deepEqual(payload.summary, {
      deletedCategories: ["Makeup"],
      missingDeletions: ["Florist"],
      removedVendorCount: 0,
      estimateMismatch: null,
    });
  });

  it("maps validation errors to 400", async () => {
    const { handler, memory } = setup();

    const response = await handler.batchAdjust(
      postJson("/plan-1/batch-adjust", {
        adjustments: [{ categoryName: "Caterer", newEstimate: -200 }],
      }),
      { params: { referenceId: "plan-1" } },
    );

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      error: "Estimate for category 'Caterer' cannot be negative.",
    });
    assert.deepEqual(memory.upserts, []);
  });

  it("attaches a vendor cost to a category", async () => {
    const { handler } = setup();

    const response = await handler.addVendor(
      postJson("/plan-1/category/Venue/add-vendor", {
        vendor_name: "Royal Palace",
        actual_cost: 5000,
      }),
      { params: { referenceId: "plan-1", categoryName: "Venue" } },
    );

    assert.equal(response.status, 200);
    const payload = await response.json();
    assert.equal(payload.selectedVendorId, "USER_VENDOR_VENUE_9d241d18");
    assert.equal(payload.paymentStatus, "Not paid");
    assert.equal(payload.balance, 95000);
  });

  it("rejects vendor selections outside the known collections", async () => {
    const { handler } = setup();

    const response = await handler.selectVendor(
      postJson("/plan-1/category/florists/select-vendor", {
        vendorId: "f-1",
        vendorTitle: "Bloom",
      }),
      { params: { referenceId: "plan-1", categoryName: "florists" } },
    );

    assert.equal(response.status, 400);
  });

  it("selects a vendor from a known collection", async () => {
    const { handler } = setup();

    const response = await handler.selectVendor(
      postJson("/plan-1/category/djs/select-vendor", {
        vendor_id: "dj-2",
        vendor_title: "Beat Box",
        rating: 4.2,
      }),
      { params: { referenceId: "plan-1", categoryName: "djs" } },
    );

    assert.equal(response.status, 200);
    const payload = await response.json();
    assert.deepEqual(payload.selectedVendors, [
      {
        categoryName: "djs",
        vendorId: "dj-2",
        title: "Beat Box",
        city: null,
        rating: 4.2,
        imageUrl: null,
      },
    ]);
  });

  it("describes category costs", async () => {
    const { handler } = setup();

    const response = await handler.getCategoryCost(
      new Request(`${BASE_URL}/plan-1/category/photography/cost`),
      { params: { referenceId: "plan-1", categoryName: "photography" } },
    );

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      categoryName: "Photography",
      estimatedAmount: 25000,
      actualCost: null,
      percentage: 25,
      paymentStatus: null,
      hasActualCost: false,
    });
  });

  it("returns 500 for unexpected failures", async () => {
    const errorLog = mock.method(console, "error", () => {});
    const handler = createBudgetPlannerHandler({
      actions: createBudgetPlanActions({
        resolveStore: async () => {
          throw new Error("Missing BUDGET_PLANNER_SPREADSHEET_ID");
        },
        config: loadBudgetPlannerConfig({}),
      }),
    });

    const response = await handler.getPlan(new Request(`${BASE_URL}/plan-1`), {
      params: { referenceId: "plan-1" },
    });

    assert.equal(response.status, 500);
    assert.deepEqual(await response.json(), { error: "Missing BUDGET_PLANNER_SPREADSHEET_ID" });
    assert.equal(errorLog.mock.callCount(), 1);
  });
});

describe("extractPlannerSegments", () => {
  it("decodes segments after the planner prefix", () => {
    const request = new Request(`${BASE_URL}/plan%201/category/Bridal%20Wear/cost`);

    assert.deepEqual(extractPlannerSegments(request), [
      "plan 1",
      "category",
      "Bridal Wear",
      "cost",
    ]);
  });

  it("returns null for a malformed percent escape", () => {
    const request = new Request(`${BASE_URL}/%E0%A4%A/category/Venue/cost`);

    assert.equal(extractPlannerSegments(request), null);
  });
});

describe("planner routes", () => {
  it("rejects a malformed reference id with a bad request", async () => {
    const response = await getPlanRoute(new Request(`${BASE_URL}/%E0%A4%A`));

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { error: "Invalid path encoding" });
  });

  it("rejects a malformed category name with a bad request", async () => {
    const response = await addVendorRoute(
      postJson("/plan-1/category/%E0%A4%A/add-vendor", {
        vendorName: "Test Vendor",
        actualCost: 100,
      }),
    );

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { error: "Invalid path encoding" });
  });
});

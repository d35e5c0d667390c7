// ABOUTME: Parses untyped JSON bodies into budget planner inputs.
// ABOUTME: Accepts camelCase keys and the snake_case aliases older clients send.
import type {
  BatchAdjustRequest,
  BudgetPlan,
  CategoryAdjustment,
  InitialBudgetInput,
  VendorCostInput,
  VendorSelectionInput,
} from "@/server/budget-plan/budget-plan-types";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function pick(payload: Payload, camelKey: string, snakeKey: string): unknown {
  return payload[camelKey] !== undefined ? payload[camelKey] : payload[snakeKey];
}

function readString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function readFinite(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/** Undefined and null both read as absent; anything else must be the expected type. */
function readOptionalNumber(value: unknown): ParseResult<number | null> {
  if (value == null) {
    return { ok: true, value: null };
  }

  const parsed = readFinite(value);
  return parsed === null ? { ok: false, error: "expected number" } : { ok: true, value: parsed };
}

function readOptionalString(value: unknown): ParseResult<string | null> {
  if (value == null) {
    return { ok: true, value: null };
  }

  if (typeof value !== "string") {
    return { ok: false, error: "expected string" };
  }

  return { ok: true, value: value.trim() || null };
}

export function parseInitialBudgetPayload(value: unknown): ParseResult<InitialBudgetInput> {
  if (!isPayload(value)) {
    return { ok: false, error: "Missing budget setup payload" };
  }

  const referenceId = readString(pick(value, "referenceId", "reference_id"));
  const totalBudget = readOptionalNumber(pick(value, "totalBudget", "total_budget"));
  const guestCount = readFinite(pick(value, "guestCount", "guest_count"));
  const location = readString(value.location);
  const weddingDates = readString(pick(value, "weddingDates", "wedding_dates"));
  const noOfEvents = readFinite(pick(value, "noOfEvents", "no_of_events"));

  if (!referenceId) {
    return { ok: false, error: "Missing referenceId" };
  }

  if (!totalBudget.ok) {
    return { ok: false, error: "Invalid totalBudget" };
  }

  if (guestCount === null || !Number.isInteger(guestCount) || guestCount <= 0) {
    return { ok: false, error: "guestCount must be a positive integer" };
  }

  if (!location || !weddingDates) {
    return { ok: false, error: "Missing location or weddingDates" };
  }

  if (noOfEvents === null || !Number.isInteger(noOfEvents) || noOfEvents < 1) {
    return { ok: false, error: "noOfEvents must be at least 1" };
  }

  return {
    ok: true,
    value: {
      referenceId,
      totalBudget: totalBudget.value,
      guestCount,
      location,
      weddingDates,
      noOfEvents,
    },
  };
}

function parseAdjustment(item: unknown): CategoryAdjustment | null {
  if (!isPayload(item)) {
    return null;
  }

  const categoryName = readString(pick(item, "categoryName", "category_name"));
  const newEstimate = readFinite(pick(item, "newEstimate", "new_estimate") ?? 0);
  const actualCost = readOptionalNumber(pick(item, "actualCost", "actual_cost"));
  const paymentStatus = readOptionalString(pick(item, "paymentStatus", "payment_status"));

  if (!categoryName || newEstimate === null || !actualCost.ok || !paymentStatus.ok) {
    return null;
  }

  return {
    categoryName,
    newEstimate,
    actualCost: actualCost.value,
    paymentStatus: paymentStatus.value,
  };
}

function parseDeletion(item: unknown): string | null {
  if (typeof item === "string") {
    return readString(item);
  }

  if (isPayload(item)) {
    return readString(pick(item, "categoryName", "category_name"));
  }

  return null;
}

export function parseBatchAdjustPayload(value: unknown): ParseResult<BatchAdjustRequest> {
  if (!isPayload(value)) {
    return { ok: false, error: "Missing batch adjustment payload" };
  }

  const rawAdjustments = value.adjustments ?? [];
  const rawDeletions = value.deletions ?? [];

  if (!Array.isArray(rawAdjustments) || !Array.isArray(rawDeletions)) {
    return { ok: false, error: "adjustments and deletions must be arrays" };
  }

  const adjustments: CategoryAdjustment[] = [];

  for (const item of rawAdjustments) {
    const adjustment = parseAdjustment(item);

    if (!adjustment) {
      return { ok: false, error: "Invalid adjustment entry" };
    }

    adjustments.push(adjustment);
  }

  const deletions: string[] = [];

  for (const item of rawDeletions) {
    const name = parseDeletion(item);

    if (!name) {
      return { ok: false, error: "Invalid deletion entry" };
    }

    deletions.push(name);
  }

  const newTotalBudget = readOptionalNumber(pick(value, "newTotalBudget", "new_total_budget"));

  if (!newTotalBudget.ok) {
    return { ok: false, error: "Invalid newTotalBudget" };
  }

  return {
    ok: true,
    value: {
      adjustments,
      deletions,
      newTotalBudget: newTotalBudget.value,
    },
  };
}

export function parseAddVendorPayload(
  value: unknown,
  categoryName: string,
): ParseResult<VendorCostInput> {
  if (!isPayload(value)) {
    return { ok: false, error: "Missing vendor payload" };
  }

  const vendorName = pick(value, "vendorName", "vendor_name");
  const actualCost = readFinite(pick(value, "actualCost", "actual_cost"));
  const paymentStatus = readOptionalString(pick(value, "paymentStatus", "payment_status"));

  if (typeof vendorName !== "string") {
    return { ok: false, error: "Missing vendorName" };
  }

  if (actualCost === null) {
    return { ok: false, error: "actualCost must be a number" };
  }

  if (!paymentStatus.ok) {
    return { ok: false, error: "Invalid paymentStatus" };
  }

  return {
    ok: true,
    value: {
      categoryName,
      vendorName,
      actualCost,
      paymentStatus: paymentStatus.value,
    },
  };
}

export function parseSelectVendorPayload(value: unknown): ParseResult<VendorSelectionInput> {
  if (!isPayload(value)) {
    return { ok: false, error: "Missing vendor selection payload" };
  }

  const vendorId = readString(pick(value, "vendorId", "vendor_id"));
  const vendorTitle = readString(pick(value, "vendorTitle", "vendor_title"));
  const city = readOptionalString(value.city);
  const rating = readOptionalNumber(value.rating);
  const imageUrl = readOptionalString(pick(value, "imageUrl", "image_url"));

  if (!vendorId || !vendorTitle) {
    return { ok: false, error: "Missing vendorId or vendorTitle" };
  }

  if (!city.ok || !rating.ok || !imageUrl.ok) {
    return { ok: false, error: "Invalid vendor selection payload" };
  }

  return {
    ok: true,
    value: {
      vendorId,
      vendorTitle,
      city: city.value,
      rating: rating.value,
      imageUrl: imageUrl.value,
    },
  };
}

export function toPlanResponse(plan: BudgetPlan) {
  return {
    referenceId: plan.referenceId,
    timestamp: plan.timestamp,
    totalBudget: plan.currentTotalBudget,
    budgetBreakdown: plan.budgetBreakdown,
    spent: plan.totalSpent,
    balance: plan.balance,
    selectedVendors: plan.selectedVendors,
  };
}

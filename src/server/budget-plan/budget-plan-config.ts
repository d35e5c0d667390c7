// ABOUTME: Default allocation policy and vendor collection lookups for budget plans.
// ABOUTME: Reads the environment toggles that tune reallocation behaviour.

export const REMAINING_BUDGET_CATEGORY_NAME = "Other Expenses / Unallocated";

export const PLACEHOLDER_CATEGORY_NAMES: ReadonlySet<string> = new Set([
  "string",
  "example",
  "placeholder",
  "test",
]);

export const DEFAULT_INITIAL_CATEGORY_SHARES: Readonly<Record<string, number>> = {
  Venue: 0.25,
  Caterer: 0.25,
  Photography: 0.25,
  Makeup: 0.25,
};

export const DEFAULT_VENDOR_COLLECTION_MAP: Readonly<Record<string, string>> = {
  Venue: "venues",
  Caterer: "catering",
  Photography: "photographers",
  Makeup: "makeups",
  DJ: "djs",
  Decor: "decors",
  Mehendi: "mehendi",
  "Bridal Wear": "bridal_wear",
  "Wedding Invitations": "weddingInvitations",
  Honeymoon: "honeymoon",
  Car: "car",
  Astrology: "astro",
  Jewellery: "jewellery",
  "Wedding Planner": "wedding_planner",
};

export interface BudgetPlannerConfig {
  initialCategoryShares: Readonly<Record<string, number>>;
  vendorCollectionMap: Readonly<Record<string, string>>;
  autoAdjustOnMismatch: boolean;
}

type Environment = Record<string, string | undefined>;

function readFlag(value: string | undefined) {
  const normalized = (value ?? "").trim().toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes";
}

export function loadBudgetPlannerConfig(env: Environment = process.env): BudgetPlannerConfig {
  return {
    initialCategoryShares: DEFAULT_INITIAL_CATEGORY_SHARES,
    vendorCollectionMap: DEFAULT_VENDOR_COLLECTION_MAP,
    autoAdjustOnMismatch: readFlag(env.BUDGET_AUTO_ADJUST_ON_MISMATCH),
  };
}

export function isPlaceholderCategory(categoryName: string) {
  return PLACEHOLDER_CATEGORY_NAMES.has(categoryName.trim().toLowerCase());
}

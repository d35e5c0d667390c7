// ABOUTME: Declares the budget plan, category breakdown, and vendor selection records.
// ABOUTME: Shared by the allocation engine, the Sheets store, and API handlers.

export interface CategoryBreakdown {
  categoryName: string;
  percentage: number;
  estimatedAmount: number;
  actualCost: number | null;
  paymentStatus: string | null;
  isUserSet: boolean;
}

export interface SelectedVendorInfo {
  categoryName: string;
  vendorId: string;
  title: string;
  city: string | null;
  rating: number | null;
  imageUrl: string | null;
}

export interface BudgetPlan {
  referenceId: string;
  totalBudgetInput: number;
  currentTotalBudget: number;
  guestCount: number;
  location: string;
  weddingDates: string;
  noOfEvents: number;
  budgetBreakdown: CategoryBreakdown[];
  totalSpent: number;
  balance: number;
  selectedVendors: SelectedVendorInfo[];
  timestamp: string;
}

export interface InitialBudgetInput {
  referenceId: string;
  totalBudget: number | null;
  guestCount: number;
  location: string;
  weddingDates: string;
  noOfEvents: number;
}

export interface CategoryAdjustment {
  categoryName: string;
  newEstimate: number;
  actualCost?: number | null;
  paymentStatus?: string | null;
}

export interface BatchAdjustRequest {
  deletions: string[];
  adjustments: CategoryAdjustment[];
  newTotalBudget?: number | null;
}

export interface BatchAdjustSummary {
  deletedCategories: string[];
  missingDeletions: string[];
  removedVendorCount: number;
  /** Sum of estimates minus the total budget when it drifts past the tolerance. */
  estimateMismatch: number | null;
}

export interface BatchAdjustResult {
  plan: BudgetPlan;
  summary: BatchAdjustSummary;
}

export interface VendorCostInput {
  categoryName: string;
  vendorName: string;
  actualCost: number;
  paymentStatus?: string | null;
}

export interface VendorCostSummary {
  referenceId: string;
  categoryName: string;
  vendorName: string;
  actualCost: number;
  estimatedAmount: number;
  totalSpent: number;
  balance: number;
  paymentStatus: string;
  selectedVendorId: string;
  vendorCollectionName: string;
  selectedVendorsCount: number;
}

export interface VendorSelectionInput {
  vendorId: string;
  vendorTitle: string;
  city?: string | null;
  rating?: number | null;
  imageUrl?: string | null;
}

export interface CategoryCostInfo {
  categoryName: string;
  estimatedAmount: number;
  actualCost: number | null;
  percentage: number;
  paymentStatus: string | null;
  hasActualCost: boolean;
}

/** Persistence collaborator for plans keyed by reference id. */
export interface BudgetPlanStore {
  find(referenceId: string): Promise<BudgetPlan | null>;
  upsert(referenceId: string, plan: BudgetPlan): Promise<void>;
}

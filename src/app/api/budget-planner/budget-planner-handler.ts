// ABOUTME: Shared handler factory for the wedding budget planner API routes.
// ABOUTME: Injects planner actions so tests can drive each route without Sheets access.
import { NextResponse } from "next/server";

import {
  createBudgetPlanActions,
  type BudgetPlanActions,
} from "@/server/budget-plan/budget-plan-service";
import { BudgetPlanError } from "@/server/budget-plan/budget-plan-errors";

import {
  parseAddVendorPayload,
  parseBatchAdjustPayload,
  parseInitialBudgetPayload,
  parseSelectVendorPayload,
  toPlanResponse,
} from "./budget-planner-payloads";

type PlannerActions = Pick<
  BudgetPlanActions,
  | "createInitialPlan"
  | "getBudgetPlan"
  | "batchAdjust"
  | "addVendor"
  | "addSelectedVendor"
  | "getCategoryCost"
>;

export interface PlanRouteParams {
  referenceId: string;
}

export interface CategoryRouteParams extends PlanRouteParams {
  categoryName: string;
}

let defaultActions: PlannerActions | null = null;

function resolveDefaultActions(): PlannerActions {
  if (!defaultActions) {
    defaultActions = createBudgetPlanActions();
  }

  return defaultActions;
}

/** Reads path segments after `/budget-planner/`, decoded. Null when a segment is malformed. */
export function extractPlannerSegments(request: Request): string[] | null {
  const segments = new URL(request.url).pathname.split("/").filter(Boolean);
  const start = segments.indexOf("budget-planner");

  try {
    return segments.slice(start + 1).map((segment) => decodeURIComponent(segment));
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }

    throw error;
  }
}

export function invalidPathResponse() {
  return badRequest("Invalid path encoding");
}

async function readJson(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return { ok: false };
  }
}

function errorResponse(error: unknown) {
  if (error instanceof BudgetPlanError) {
    if (error.status >= 500) {
      console.error(error.message, error.cause);
    }

    return NextResponse.json({ error: error.message }, { status: error.status });
  }

  console.error("Unexpected budget planner failure", error);
  const message = error instanceof Error ? error.message : "Unknown error";

  return NextResponse.json({ error: message }, { status: 500 });
}

function badRequest(message: string) {
  return NextResponse.json({ error: message }, { status: 400 });
}

export function createBudgetPlannerHandler({
  actions,
}: {
  actions?: PlannerActions;
} = {}) {
  const resolveActions = () => actions ?? resolveDefaultActions();

  const createInitialPlan = async (request: Request) => {
    const json = await readJson(request);

    if (!json.ok) {
      return badRequest("Invalid JSON body");
    }

    const parsed = parseInitialBudgetPayload(json.body);

    if (!parsed.ok) {
      return badRequest(parsed.error);
    }

    try {
      const plan = await resolveActions().createInitialPlan(parsed.value);
      return NextResponse.json(toPlanResponse(plan), { status: 201 });
    } catch (error) {
      return errorResponse(error);
    }
  };

  const getPlan = async (_request: Request, { params }: { params: PlanRouteParams }) => {
    if (!params.referenceId) {
      return badRequest("Missing referenceId");
    }

    try {
      const plan = await resolveActions().getBudgetPlan({ referenceId: params.referenceId });
      return NextResponse.json(toPlanResponse(plan), { status: 200 });
    } catch (error) {
      return errorResponse(error);
    }
  };

  const batchAdjust = async (request: Request, { params }: { params: PlanRouteParams }) => {
    if (!params.referenceId) {
      return badRequest("Missing referenceId");
    }

    const json = await readJson(request);

    if (!json.ok) {
      return badRequest("Invalid JSON body");
    }

    const parsed = parseBatchAdjustPayload(json.body);

    if (!parsed.ok) {
      return badRequest(parsed.error);
    }

    try {
      const { plan, summary } = await resolveActions().batchAdjust({
        referenceId: params.referenceId,
        request: parsed.value,
      });

      return NextResponse.json({ ...toPlanResponse(plan), summary }, { status: 200 });
    } catch (error) {
      return errorResponse(error);
    }
  };

  const addVendor = async (request: Request, { params }: { params: CategoryRouteParams }) => {
    if (!params.referenceId || !params.categoryName) {
      return badRequest("Missing referenceId or categoryName");
    }

    const json = await readJson(request);

    if (!json.ok) {
      return badRequest("Invalid JSON body");
    }

    const parsed = parseAddVendorPayload(json.body, params.categoryName);

    if (!parsed.ok) {
      return badRequest(parsed.error);
    }

    try {
      const summary = await resolveActions().addVendor({
        referenceId: params.referenceId,
        ...parsed.value,
      });

      return NextResponse.json(summary, { status: 200 });
    } catch (error) {
      return errorResponse(error);
    }
  };

  // The category segment names a vendor collection here, e.g. "venues".
  const selectVendor = async (request: Request, { params }: { params: CategoryRouteParams }) => {
    if (!params.referenceId || !params.categoryName) {
      return badRequest("Missing referenceId or categoryName");
    }

    const json = await readJson(request);

    if (!json.ok) {
      return badRequest("Invalid JSON body");
    }

    const parsed = parseSelectVendorPayload(json.body);

    if (!parsed.ok) {
      return badRequest(parsed.error);
    }

    try {
      const plan = await resolveActions().addSelectedVendor({
        referenceId: params.referenceId,
        vendorCollection: params.categoryName,
        selection: parsed.value,
      });

      return NextResponse.json(toPlanResponse(plan), { status: 200 });
    } catch (error) {
      return errorResponse(error);
    }
  };

  const getCategoryCost = async (_request: Request, { params }: { params: CategoryRouteParams }) => {
    if (!params.referenceId || !params.categoryName) {
      return badRequest("Missing referenceId or categoryName");
    }

    try {
      const info = await resolveActions().getCategoryCost(params);
      return NextResponse.json(info, { status: 200 });
    } catch (error) {
      return errorResponse(error);
    }
  };

  return {
    createInitialPlan,
    getPlan,
    batchAdjust,
    addVendor,
    selectVendor,
    getCategoryCost,
  };
}

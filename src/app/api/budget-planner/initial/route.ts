// ABOUTME: Connects the initial budget setup route to the shared planner handler.
import { createBudgetPlannerHandler } from "../budget-planner-handler";

const handlers = createBudgetPlannerHandler();

export const POST = handlers.createInitialPlan;

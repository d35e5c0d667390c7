// ABOUTME: Typed failures raised by budget plan operations.
// ABOUTME: Each error carries the HTTP status handlers respond with.

export class BudgetPlanError extends Error {
  status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BudgetPlanError";
    this.status = status;
  }
}

export class BudgetPlanValidationError extends BudgetPlanError {
  constructor(message: string) {
    super(400, message);
    this.name = "BudgetPlanValidationError";
  }
}

export class BudgetPlanNotFoundError extends BudgetPlanError {
  constructor(message: string) {
    super(404, message);
    this.name = "BudgetPlanNotFoundError";
  }
}

export class BudgetPlanPersistenceError extends BudgetPlanError {
  constructor(message: string, cause: unknown) {
    super(500, message, { cause });
    this.name = "BudgetPlanPersistenceError";
  }
}

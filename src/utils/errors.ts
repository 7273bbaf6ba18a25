export interface ValidationIssue {
  path: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Caller-supplied data failed a local precondition. Blocks the write and is
 * shown to the submitting user.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public details: ValidationIssue[] = [],
  ) {
    super(400, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message);
  }
}

/** A write to the feedback store failed. Reads never raise this. */
export class StoreError extends AppError {
  constructor(
    message: string,
    public cause?: unknown,
  ) {
    super(500, message, false);
  }
}

export class AppError extends Error {
  public readonly status: number;
  public readonly code: string;

  constructor(message: string, status = 500, code = "INTERNAL_ERROR") {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** Bad query parameters or request bodies. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

/** A calendar period that cannot be resolved (bad date, month or year). */
export class InvalidPeriodError extends ValidationError {}

export class InvalidTimezoneError extends AppError {
  constructor(timeZone: string) {
    super(`Unknown IANA time zone '${timeZone}'`, 400, "INVALID_TIMEZONE");
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class NutrientLookupFailedError extends NotFoundError {
  constructor(foodName: string) {
    super(`No nutrition data found for '${foodName}'`);
  }
}

export class UpstreamServiceError extends AppError {
  constructor(service: string, cause: unknown) {
    super(`${service} request failed: ${describeError(cause)}`, 502, "UPSTREAM_ERROR");
  }
}

export class StorageUnavailableError extends AppError {
  constructor(cause: unknown) {
    super(`Storage unavailable: ${describeError(cause)}`, 500, "STORAGE_UNAVAILABLE");
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export type ServiceErrorCode =
  | "validation_error"
  | "not_found"
  | "store_unavailable"
  | "insight_generation_failed"
  | "internal_error";

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: ServiceErrorCode;
  cause?: unknown;
}

export class ServiceError extends Error {
  readonly statusCode: number;
  readonly code: ServiceErrorCode;

  constructor(name: string, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? "internal_error";
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super("ValidationError", message, { statusCode: 400, code: "validation_error" });
  }
}

export class NotFound extends ServiceError {
  constructor(message: string) {
    super("NotFound", message, { statusCode: 404, code: "not_found" });
  }
}

export class StoreUnavailable extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super("StoreUnavailable", message, { statusCode: 500, code: "store_unavailable", cause });
  }
}

export class InsightGenerationFailed extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super("InsightGenerationFailed", message, { statusCode: 500, code: "insight_generation_failed", cause });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

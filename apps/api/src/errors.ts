// ─── Errores tipados del core ───────────────────────────────────────
// Las rutas los traducen al envelope ApiResponse + status HTTP.

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 400) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends AppError {
  constructor(what: string) {
    super("not_found", `${what} not found`, 404);
  }
}

export class JobStateError extends AppError {
  readonly status: string;

  constructor(message: string, status: string) {
    super("invalid_job_state", message, 409);
    this.status = status;
  }
}

export class InsufficientCreditsError extends AppError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super("insufficient_credits", "Insufficient credits", 402);
    this.required = required;
    this.available = available;
  }
}

/** Falla del proveedor de generacion (red, timeout, respuesta invalida). */
export class ProviderError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider_failure", message, 502);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class StoreError extends AppError {
  constructor(operation: string, collection: string, detail: string) {
    super("store_failure", `${operation} on ${collection} failed: ${detail}`, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

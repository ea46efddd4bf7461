export type ApiErrorKind =
  | "no-token"
  | "cooldown"
  | "unauthorized"
  | "not-found"
  | "conflict"
  | "rate-limited"
  | "unavailable"
  | "network"
  | "invalid-response"
  | "http";

export class ApiError extends Error {
  constructor(
    readonly kind: ApiErrorKind,
    message: string,
    readonly status?: number,
    readonly body?: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

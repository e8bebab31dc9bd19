export class ParseError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly body?: string,
    public readonly retryable = false
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class AuthError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "AuthError";
  }
}

export type NormalizedError = {
  message: string;
  statusCode?: number;
  details?: unknown;
  retryable?: boolean;
  body?: string;
};

export const normalizeError = (err: unknown): NormalizedError => {
  if (err instanceof ApiError) {
    return {
      message: err.message,
      statusCode: err.statusCode,
      retryable: err.retryable,
      body: err.body
    };
  }

  if (err instanceof ParseError || err instanceof AuthError) {
    return {
      message: err.message,
      details: err.details
    };
  }

  return {
    message: err instanceof Error ? err.message : String(err)
  };
};

export const exitCodeFor = (err: unknown) => (err instanceof UsageError ? 2 : 1);

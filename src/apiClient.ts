import { config } from "./config.js";
import { ApiError } from "./errors.js";
import { logger } from "./logger.js";
import type { JsonObject } from "./model.js";

const JSON_API = "application/vnd.api+json";

export type ApiClientOptions = {
  baseUrl: string;
  token?: string;
  requestTimeoutMs?: number;
  retryMax?: number;
  retryBaseMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export type RequestOptions = {
  query?: Record<string, string>;
  body?: JsonObject;
  retryMax?: number;
};

export type ApiResponse = {
  status: number;
  body: string;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const SENSITIVE_KEY = /(?:^|[-_])(secret|token|password|passphrase|api[-_]?key|authorization)(?:$|[-_])/i;

export const redactSensitive = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  if (typeof value === "object" && value !== null) {
    const next: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (SENSITIVE_KEY.test(key)) {
        next[key] = "[REDACTED]";
      } else {
        next[key] = redactSensitive(item);
      }
    }
    return next;
  }

  return value;
};

export class ApiClient {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly requestTimeoutMs: number;
  private readonly retryMax: number;
  private readonly retryBaseMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token?.trim() || undefined;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.requestTimeoutMs;
    this.retryMax = options.retryMax ?? config.retryMax;
    this.retryBaseMs = options.retryBaseMs ?? config.retryBaseMs;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get(path: string, options?: RequestOptions) {
    return this.request("GET", path, options);
  }

  post(path: string, body: JsonObject, options?: Omit<RequestOptions, "body">) {
    return this.request("POST", path, { ...options, body });
  }

  patch(path: string, body: JsonObject, options?: Omit<RequestOptions, "body">) {
    return this.request("PATCH", path, { ...options, body });
  }

  delete(path: string, options?: Omit<RequestOptions, "body">) {
    return this.request("DELETE", path, options);
  }

  buildUrl(path: string, query?: Record<string, string>) {
    const url =
      path.startsWith("http://") || path.startsWith("https://")
        ? new URL(path)
        : new URL(path.startsWith("/") ? path : `/${path}`, `${this.baseUrl}/`);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
      }
    }

    return url.toString();
  }

  private async request(method: string, path: string, options?: RequestOptions): Promise<ApiResponse> {
    const retryMax = options?.retryMax ?? this.retryMax;
    const url = this.buildUrl(path, options?.query);

    let attempt = 0;
    while (true) {
      try {
        logger.debug({ method, url, attempt, body: redactSensitive(options?.body) }, "API request");
        const response = await this.doRequest(method, url, options?.body);

        if (response.ok) {
          return { status: response.statusCode, body: response.body };
        }

        const retryable = response.statusCode === 429 || response.statusCode >= 500;
        if (retryable && attempt < retryMax) {
          attempt += 1;
          logger.warn({ method, url, status: response.statusCode, attempt }, "Retrying API request");
          await this.sleep(this.backoffMs(attempt, response.retryAfterMs));
          continue;
        }

        throw new ApiError(
          `${method} ${path} failed with status ${response.statusCode}`,
          response.statusCode,
          response.body,
          retryable
        );
      } catch (err) {
        if (err instanceof ApiError) {
          throw err;
        }

        if (attempt < retryMax) {
          attempt += 1;
          logger.warn({ method, url, attempt, err }, "Retrying API request after transport failure");
          await this.sleep(this.backoffMs(attempt));
          continue;
        }

        throw new ApiError(
          `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
          undefined,
          undefined,
          true
        );
      }
    }
  }

  private backoffMs(attempt: number, retryAfterMs?: number) {
    if (retryAfterMs && retryAfterMs > 0) {
      return retryAfterMs;
    }
    const exp = this.retryBaseMs * Math.pow(2, attempt - 1);
    const jitter = Math.floor(Math.random() * 150);
    return exp + jitter;
  }

  private async doRequest(method: string, url: string, body?: JsonObject) {
    const headers: Record<string, string> = {
      Accept: JSON_API
    };

    if (body) {
      headers["Content-Type"] = JSON_API;
    }

    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal
      });
      text = await response.text();
    } finally {
      clearTimeout(timeout);
    }

    const retryAfterHeader = response.headers.get("retry-after");
    const retryAfterMs = retryAfterHeader ? Number(retryAfterHeader) * 1000 : undefined;

    return {
      ok: response.ok,
      statusCode: response.status,
      body: text,
      retryAfterMs
    };
  }
}

/**
 * @exposure/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization to ExposureApiError
 * - Zod validation of response bodies
 *
 * A custom fetch function can be injected for testing.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import type { ApiResponse, ExposureClientConfig } from "./types.js";
import { ExposureApiError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

interface RawResponse {
  readonly body: unknown;
  readonly status: number;
  readonly headers: Record<string, string>;
}

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON. Empty bodies parse as undefined; bodies
 * that are not JSON are kept as `{ raw }` so validation can report them.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of ["content-type", "x-request-id", "retry-after"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }
  return result;
}

// =============================================================================
// HTTP Client
// =============================================================================

export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(config: ExposureClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  /**
   * GET `path` and validate the body against `schema`.
   */
  async get<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<ApiResponse<T>> {
    const raw = await this.request("GET", path);
    return { data: this.validate(raw, schema, path), status: raw.status, headers: raw.headers };
  }

  /**
   * POST a JSON body. The response body is not interpreted.
   */
  async post(path: string, body: unknown): Promise<ApiResponse<unknown>> {
    const raw = await this.request("POST", path, body);
    return { data: raw.body, status: raw.status, headers: raw.headers };
  }

  private validate<T>(
    raw: RawResponse,
    schema: ZodType<T, ZodTypeDef, unknown>,
    path: string,
  ): T {
    const parsed = schema.safeParse(raw.body);
    if (!parsed.success) {
      throw new ExposureApiError(
        "INVALID_RESPONSE",
        `Malformed response from ${path}`,
        raw.status,
        parsed.error.issues,
      );
    }
    return parsed.data;
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), 10000);
  }

  /**
   * Core request method with retry logic.
   */
  private async request(method: string, path: string, body?: unknown): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    const requestId = generateRequestId();

    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        "Accept": "application/json",
        "X-Request-Id": requestId,
      },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxRetries) {
          this.logger.warn({ method, path, requestId, attempt, err: lastError }, "Request failed, retrying");
          await sleep(this.backoff(attempt));
          continue;
        }
        if (lastError instanceof ExposureApiError) {
          throw lastError;
        }
        throw new ExposureApiError("NETWORK_ERROR", lastError.message, 0);
      }

      const responseBody = await parseResponseBody(response);

      if (response.ok) {
        return { body: responseBody, status: response.status, headers: extractHeaders(response) };
      }

      // 4xx → no retry
      if (response.status < 500) {
        throw new ExposureApiError(
          "CLIENT_ERROR",
          `HTTP ${response.status} from ${method} ${path}`,
          response.status,
          responseBody,
        );
      }

      if (attempt < this.maxRetries) {
        this.logger.warn({ method, path, requestId, attempt, status: response.status }, "Server error, retrying");
        await sleep(this.backoff(attempt));
        continue;
      }

      throw new ExposureApiError(
        "SERVER_ERROR",
        `HTTP ${response.status} from ${method} ${path} after ${attempt + 1} attempts`,
        response.status,
        responseBody,
      );
    }

    // Unreachable: the last attempt always returns or throws
    throw new ExposureApiError("NETWORK_ERROR", lastError?.message ?? "Request failed after all retries", 0);
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ExposureApiError("TIMEOUT", `Request timed out after ${this.timeout}ms`, 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

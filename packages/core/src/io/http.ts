import { setTimeout as delay } from "node:timers/promises";
import { ProviderAcquisitionError } from "../errors.js";

export const DEFAULT_TIMEOUT_MS = 15000;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_USER_AGENT = "appsource";

export interface HttpClientOptions {
  timeoutMs?: number;
  /** Extra attempts after the first one, for network errors, 429 and 5xx. */
  retries?: number;
  /** Back-off unit; attempt `n` waits `n * retryDelayMs` before retrying. */
  retryDelayMs?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

function isRetryableStatus(status: number) {
  return status === 429 || status >= 500;
}

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retries = Math.max(0, options.retries ?? DEFAULT_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.headers = { "user-agent": options.userAgent ?? DEFAULT_USER_AGENT, ...(options.headers ?? {}) };
  }

  /**
   * Sends a request, retrying transient failures, and hands the final response
   * to `read`. The timeout covers the body read as well as the headers. A
   * retryable status that persists through every attempt is read as-is.
   */
  private async exchange<T>(url: string, init: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retries; attempt += 1) {
      if (attempt > 0 && this.retryDelayMs > 0) {
        await delay(this.retryDelayMs * attempt);
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        let response: Response;
        try {
          response = await fetch(url, {
            ...init,
            headers: { ...this.headers, ...(init.headers ?? {}) },
            signal: controller.signal
          });
        } catch (error) {
          lastError = error;
          continue;
        }

        if (isRetryableStatus(response.status) && attempt < this.retries) {
          // Drain the body so the connection can be reused.
          await response.arrayBuffer();
          continue;
        }

        try {
          return await read(response);
        } catch (error) {
          if (controller.signal.aborted) {
            throw new ProviderAcquisitionError("NETWORK_ERROR", `Timed out reading the response from ${url}`, {
              url,
              timeout_ms: this.timeoutMs
            });
          }
          throw error;
        }
      } finally {
        clearTimeout(timeout);
      }
    }

    const message = lastError instanceof Error ? lastError.message : `Unable to reach ${url}`;
    throw new ProviderAcquisitionError("NETWORK_ERROR", message, { url, attempts: this.retries + 1 });
  }

  /** The response once its headers arrive; reading the body is up to the caller and not timed. */
  request(url: string, init: RequestInit = {}): Promise<Response> {
    return this.exchange(url, init, async (response) => response);
  }

  /** Sends a request whose body is not needed and returns the status. */
  drain(url: string, init: RequestInit = {}): Promise<number> {
    return this.exchange(url, init, async (response) => {
      await response.arrayBuffer();
      return response.status;
    });
  }

  getJson(url: string, init: RequestInit = {}): Promise<JsonResponse> {
    const headers = { accept: "application/json", ...(init.headers ?? {}) };
    return this.exchange(url, { ...init, headers }, async (response) => {
      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new ProviderAcquisitionError("INVALID_RESPONSE", `${url} returned a non-JSON payload`, {
          url,
          status_code: response.status
        });
      }
      return { status: response.status, ok: response.ok, body };
    });
  }

  download(url: string, init: RequestInit = {}): Promise<Uint8Array> {
    return this.exchange(url, init, async (response) => {
      if (!response.ok) {
        await response.arrayBuffer();
        throw new ProviderAcquisitionError(
          response.status === 404 ? "DOCUMENT_NOT_FOUND" : "PROVIDER_ACQUISITION_FAILED",
          `Download of ${url} failed (${response.status})`,
          { url, status_code: response.status }
        );
      }
      return new Uint8Array(await response.arrayBuffer());
    });
  }
}

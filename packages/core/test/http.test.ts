import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderAcquisitionError } from "../src/errors.js";
import { HttpClient } from "../src/io/http.js";
import { jsonResponse } from "./fakes.js";

const DATA_URL = "https://example.com/data.json";

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    const next = responses.shift();
    if (next === undefined) {
      throw new Error("no more responses");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpClient", () => {
  it("retries server errors until a response succeeds", async () => {
    const fetchMock = stubFetch(jsonResponse({ error: "busy" }, 503), jsonResponse({ value: 1 }));
    const http = new HttpClient({ retries: 2, retryDelayMs: 0 });

    await expect(http.getJson(DATA_URL)).resolves.toEqual({ status: 200, ok: true, body: { value: 1 } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("returns a retryable status once the retries are used up", async () => {
    const fetchMock = stubFetch(jsonResponse({}, 429), jsonResponse({ message: "slow down" }, 429));
    const http = new HttpClient({ retries: 1, retryDelayMs: 0 });

    await expect(http.getJson(DATA_URL)).resolves.toEqual({ status: 429, ok: false, body: { message: "slow down" } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const fetchMock = stubFetch(jsonResponse({ message: "Not Found" }, 404));
    const http = new HttpClient({ retries: 3, retryDelayMs: 0 });

    await http.getJson(DATA_URL);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports network failures after the last attempt", async () => {
    stubFetch(new TypeError("fetch failed"), new TypeError("fetch failed"));
    const http = new HttpClient({ retries: 1, retryDelayMs: 0 });

    const error = await http.request(DATA_URL).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderAcquisitionError);
    expect(error).toMatchObject({ code: "NETWORK_ERROR", message: "fetch failed", details: { url: DATA_URL, attempts: 2 } });
  });

  it("aborts requests that exceed the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
          })
      )
    );
    const http = new HttpClient({ timeoutMs: 10, retries: 0 });

    await expect(http.request(DATA_URL)).rejects.toMatchObject({ code: "NETWORK_ERROR", message: "request aborted" });
  });

  it("keeps the timeout running while the body is read", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async (_url: string, init?: RequestInit) =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(controller) {
                init?.signal?.addEventListener("abort", () => controller.error(new Error("body aborted")));
              }
            }),
            { status: 200 }
          )
      )
    );
    const http = new HttpClient({ timeoutMs: 10, retries: 0 });

    await expect(http.getJson(DATA_URL)).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      message: `Timed out reading the response from ${DATA_URL}`
    });
    await expect(http.download(DATA_URL)).rejects.toMatchObject({ code: "NETWORK_ERROR" });
  });

  it("sends the user agent with every request", async () => {
    const fetchMock = stubFetch(jsonResponse([]));
    const http = new HttpClient({ userAgent: "appsource-test", retryDelayMs: 0 });

    await http.getJson(DATA_URL, { headers: { authorization: "Bearer test-secret" } });

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "user-agent": "appsource-test",
      accept: "application/json",
      authorization: "Bearer test-secret"
    });
  });

  it("rejects payloads that are not JSON", async () => {
    stubFetch(new Response("<html></html>", { status: 200 }));
    const http = new HttpClient({ retryDelayMs: 0 });

    await expect(http.getJson(DATA_URL)).rejects.toMatchObject({ code: "INVALID_RESPONSE" });
  });

  it("maps a missing download to DOCUMENT_NOT_FOUND", async () => {
    stubFetch(new Response("missing", { status: 404 }));
    const http = new HttpClient({ retryDelayMs: 0 });

    await expect(http.download("https://example.com/app.ipa")).rejects.toMatchObject({
      code: "DOCUMENT_NOT_FOUND",
      details: { url: "https://example.com/app.ipa", status_code: 404 }
    });
  });
});

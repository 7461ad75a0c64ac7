import { describe, expect, it } from "vitest";
import { DecodeError, TransportError } from "../../src/domain/common/errors";
import {
  createHttpOfficeFetcher,
  decodeUtf8,
} from "../../src/infrastructure/http/office-fetcher";
import { safeFetchBinary, type FetchLike } from "../../src/infrastructure/http/safe-fetch";

const NO_WAIT = { baseMs: 0, maxMs: 0, jitter: 0 };

function fetcherWith(fetchImpl: FetchLike, overrides: { maxRetries?: number; maxBytes?: number; timeoutMs?: number } = {}) {
  return createHttpOfficeFetcher({
    url: "https://hours.example.test/office",
    timeoutMs: overrides.timeoutMs ?? 1_000,
    maxBytes: overrides.maxBytes ?? 1_000_000,
    maxRetries: overrides.maxRetries ?? 2,
    backoff: NO_WAIT,
    fetchImpl,
  });
}

describe("createHttpOfficeFetcher", () => {
  it("returns the page text", async () => {
    let accept: string | null = null;
    const fetchImpl: FetchLike = async (_url, init) => {
      accept = new Headers(init?.headers).get("accept");
      return new Response("<h1>Lauds</h1>", { status: 200, headers: { "content-type": "text/html" } });
    };
    const text = await fetcherWith(fetchImpl)(new AbortController().signal);
    expect(text).toBe("<h1>Lauds</h1>");
    expect(accept).toBe("text/html");
  });

  it("surfaces network errors verbatim after retrying", async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls++;
      throw new TypeError("fetch failed");
    };
    const error = await fetcherWith(fetchImpl)(new AbortController().signal).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: "fetch failed", retryable: true });
    expect(calls).toBe(3);
  });

  it("retries server errors and recovers", async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls++;
      return calls === 1
        ? new Response("busy", { status: 503 })
        : new Response("<h1>Vespers</h1>", { status: 200 });
    };
    await expect(fetcherWith(fetchImpl)(new AbortController().signal)).resolves.toBe("<h1>Vespers</h1>");
    expect(calls).toBe(2);
  });

  it("does not retry client errors", async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls++;
      return new Response("missing", { status: 404 });
    };
    await expect(fetcherWith(fetchImpl)(new AbortController().signal)).rejects.toMatchObject({
      kind: "transport",
      statusCode: 404,
      retryable: false,
      message: "Request failed (404)",
    });
    expect(calls).toBe(1);
  });

  it("reports undecodable bytes as a decode failure without retrying", async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls++;
      return new Response(new Uint8Array([0xff, 0xfe, 0xfd]), { status: 200 });
    };
    const error = await fetcherWith(fetchImpl)(new AbortController().signal).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ kind: "decode", message: "Failed to load content" });
    expect(calls).toBe(1);
  });

  it("rejects oversized bodies", async () => {
    const fetchImpl: FetchLike = async () => new Response("x".repeat(64), { status: 200 });
    await expect(
      fetcherWith(fetchImpl, { maxBytes: 16 })(new AbortController().signal),
    ).rejects.toMatchObject({ message: "Response exceeded maxBytes (16)", retryable: false });
  });

  it("reports cancellation by the caller", async () => {
    const controller = new AbortController();
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        controller.abort();
      });
    await expect(fetcherWith(fetchImpl)(controller.signal)).rejects.toMatchObject({
      message: "Request cancelled",
      retryable: false,
    });
  });

  it("reports timeouts", async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    await expect(
      fetcherWith(fetchImpl, { timeoutMs: 10, maxRetries: 0 })(new AbortController().signal),
    ).rejects.toMatchObject({ message: "Request timed out after 10ms", retryable: true });
  });
});

describe("decodeUtf8", () => {
  it("decodes valid UTF-8", () => {
    expect(decodeUtf8(new TextEncoder().encode("Te Deum — ✝"))).toBe("Te Deum — ✝");
  });
});

describe("safeFetchBinary", () => {
  it("resolves with only the status and body bytes", async () => {
    const fetchImpl: FetchLike = async () =>
      new Response("ok", { status: 200, headers: { "content-type": "text/html" } });
    const result = await safeFetchBinary({
      url: "https://hours.example.test/office",
      timeoutMs: 1_000,
      maxBytes: 100,
      fetchImpl,
    });
    expect(Object.keys(result).sort()).toEqual(["bytes", "status"]);
    expect(result.status).toBe(200);
    expect(new TextDecoder().decode(result.bytes)).toBe("ok");
  });
});

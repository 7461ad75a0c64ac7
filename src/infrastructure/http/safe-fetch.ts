import { TransportError } from "../../domain/common/errors";

export type FetchLike = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

export type SafeFetchArgs = {
  url: string;
  timeoutMs: number;
  maxBytes: number;
  accept?: string;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
};

export type SafeFetchBinaryResult = {
  status: number;
  bytes: Uint8Array;
};

/**
 * GETs a URL with:
 * - timeout (AbortController)
 * - max response size (hard cap)
 * - caller cancellation through `signal`
 *
 * Every failure surfaces as a `TransportError`.
 */
export async function safeFetchBinary(
  args: SafeFetchArgs,
): Promise<SafeFetchBinaryResult> {
  const fetchImpl = args.fetchImpl ?? fetch;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, args.timeoutMs);
  const onCancel = () => controller.abort();
  args.signal?.addEventListener("abort", onCancel, { once: true });
  if (args.signal?.aborted) controller.abort();

  try {
    const res = await fetchImpl(args.url, {
      method: "GET",
      headers: args.accept ? { Accept: args.accept } : {},
      signal: controller.signal,
    });

    const reader = res.body?.getReader();
    if (!reader) {
      return { status: res.status, bytes: new Uint8Array() };
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > args.maxBytes) {
        await reader.cancel();
        throw new TransportError({
          retryable: false,
          message: `Response exceeded maxBytes (${args.maxBytes})`,
        });
      }
      chunks.push(value);
    }

    const out = new Uint8Array(total);
    let offset = 0;
    for (const c of chunks) {
      out.set(c, offset);
      offset += c.byteLength;
    }
    return { status: res.status, bytes: out };
  } catch (error) {
    if (error instanceof TransportError) throw error;
    if (args.signal?.aborted) {
      throw new TransportError({ message: "Request cancelled", retryable: false, cause: error });
    }
    if (timedOut) {
      throw new TransportError({
        message: `Request timed out after ${args.timeoutMs}ms`,
        retryable: true,
        cause: error,
      });
    }
    throw new TransportError({
      message: error instanceof Error ? error.message : String(error),
      retryable: true,
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
    args.signal?.removeEventListener("abort", onCancel);
  }
}

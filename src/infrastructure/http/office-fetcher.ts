import { DecodeError, TransportError } from "../../domain/common/errors";
import { DEFAULT_BACKOFF, type BackoffConfig } from "../retry/backoff";
import { withRetry } from "../retry/retry";
import { safeFetchBinary, type FetchLike } from "./safe-fetch";

/**
 * Retrieves the raw office page. Rejects with `TransportError` when nothing
 * could be retrieved and `DecodeError` when the body is not text.
 */
export type OfficeFetcher = (signal: AbortSignal) => Promise<string>;

export type HttpOfficeFetcherConfig = {
  url: string;
  timeoutMs: number;
  maxBytes: number;
  maxRetries: number;
  backoff?: BackoffConfig;
  fetchImpl?: FetchLike;
};

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new DecodeError(error);
  }
}

export function createHttpOfficeFetcher(config: HttpOfficeFetcherConfig): OfficeFetcher {
  return (signal) => {
    const run = async () => {
      const res = await safeFetchBinary({
        url: config.url,
        timeoutMs: config.timeoutMs,
        maxBytes: config.maxBytes,
        accept: "text/html",
        signal,
        fetchImpl: config.fetchImpl,
      });
      if (res.status < 200 || res.status >= 300) {
        throw new TransportError({
          statusCode: res.status,
          retryable: res.status === 429 || res.status >= 500,
          message: `Request failed (${res.status})`,
        });
      }
      return decodeUtf8(res.bytes);
    };

    return withRetry(run, {
      maxRetries: config.maxRetries,
      backoff: config.backoff ?? DEFAULT_BACKOFF,
    });
  };
}

import { retryWithExponentialBackoff } from "@bugster-installer/shared/async/retryOnFailure";
import { logWarning } from "@bugster-installer/shared/logger";
import { fetch, Response } from "undici";
import { maxNetworkAttempts } from "../../config";

export class HttpError extends Error {
  status: number;
  url: string;

  constructor(url: string, status: number, statusText: string) {
    super(`Request to ${url} failed with ${status}${statusText ? ` ${statusText}` : ""}`);

    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

// Network errors, timeouts, server errors and rate limiting; a 404 won't fix itself
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }

  if (error instanceof Error) {
    // undici reports connection failures as TypeError("fetch failed")
    return (
      error instanceof TypeError || error.name === "TimeoutError" || error.name === "AbortError"
    );
  }

  return false;
}

export type OnRetry = (nextAttemptNumber: number, maxAttempts: number, error: unknown) => void;

// The body is read inside the retried function so that the timeout and retries cover it too
export async function fetchWithRetry<Type>(
  url: string,
  {
    headers,
    onRetry,
    timeoutMs,
  }: {
    headers: Record<string, string>;
    onRetry?: OnRetry;
    timeoutMs: number;
  },
  read: (response: Response) => Promise<Type>
): Promise<Type> {
  return await retryWithExponentialBackoff(
    async () => {
      const response = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        // Release the connection before the next attempt
        await response.body?.cancel();

        throw new HttpError(url, response.status, response.statusText);
      }

      return await read(response);
    },
    (error, attemptNumber, maxAttempts) => {
      logWarning("FetchWithRetry:Failed", { attemptNumber, error, maxAttempts, url });

      if (attemptNumber < maxAttempts && isTransientError(error)) {
        onRetry?.(attemptNumber + 1, maxAttempts, error);
      }
    },
    maxNetworkAttempts,
    isTransientError
  );
}

import { timeoutAfter } from "./timeoutAfter";

type OnFail = (error: unknown, attemptNumber: number, maxAttempts: number) => void;
type ShouldRetry = (error: unknown) => boolean;

async function retry<T>(
  asyncFunction: (attemptNumber: number) => Promise<T>,
  backOffStrategy: (iteration: number) => number,
  onFail?: OnFail,
  maxAttempts: number = 5,
  shouldRetry: ShouldRetry = () => true
): Promise<T> {
  let currentAttempt = 0;
  while (true) {
    currentAttempt++;

    try {
      return await asyncFunction(currentAttempt);
    } catch (error) {
      onFail?.(error, currentAttempt, maxAttempts);

      if (currentAttempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      await timeoutAfter(backOffStrategy(currentAttempt));
    }
  }
}

export async function retryWithExponentialBackoff<T>(
  asyncFunction: (attemptNumber: number) => Promise<T>,
  onFail?: OnFail,
  maxTries?: number,
  shouldRetry?: ShouldRetry
): Promise<T> {
  const backoff = (iteration: number) => 2 ** iteration * 100 + jitter();

  return retry(asyncFunction, backoff, onFail, maxTries, shouldRetry);
}

// https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
function jitter(): number {
  return Math.random() * 100;
}

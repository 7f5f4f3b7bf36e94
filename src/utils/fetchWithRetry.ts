// Fetch with retries and exponential backoff.
// Non-ok responses are retried too; the last one is returned as-is once
// retries run out. An aborted signal stops retrying immediately.
export async function fetchWithRetry(
  apiCall: () => Promise<Response>,
  maxRetries = 5,
  initialBackoffMs = 1000,
  signal?: AbortSignal,
): Promise<Response> {
  let retries = 0;
  let backoffMs = initialBackoffMs;

  while (true) {
    signal?.throwIfAborted();
    try {
      const response = await apiCall();
      if (response.ok) {
        return response;
      }
      if (retries >= maxRetries || !isRetryable(response.status)) {
        return response;
      }
    } catch (error) {
      if (retries >= maxRetries || signal?.aborted) {
        throw error;
      }
    }
    const jitter = Math.random() * 0.3 + 0.85;
    const waitTime = Math.floor(backoffMs * jitter);
    await sleep(waitTime, signal);
    backoffMs *= 2;
    retries++;
  }
}

// 4xx other than 408/429 will not change on retry
function isRetryable(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

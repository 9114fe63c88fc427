export class ProviderRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderRequestError";
  }
}

/**
 * POSTs JSON with a hard timeout and returns the parsed body. Timeouts,
 * network failures, 408, 429 and 5xx come back as retryable
 * `ProviderRequestError`s; other non-2xx statuses as non-retryable ones.
 */
export async function postJson(
  url: string,
  body: unknown,
  options: { timeoutMs: number; headers?: Record<string, string>; label: string },
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new ProviderRequestError(
        `${options.label} timed out after ${options.timeoutMs}ms`,
        null,
        true,
        { cause: error },
      );
    }
    throw new ProviderRequestError(
      `${options.label} request failed: ${error instanceof Error ? error.message : String(error)}`,
      null,
      true,
      { cause: error },
    );
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => "");
    throw new ProviderRequestError(
      `${options.label} failed (${response.status}): ${detail.slice(0, 500)}`,
      response.status,
      isRetryableStatus(response.status),
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderRequestError(`${options.label} returned invalid JSON`, response.status, false, {
      cause: error,
    });
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

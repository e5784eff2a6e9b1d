/** A failed call to a model provider, classified as transient or not. */
export class ModelServiceError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ModelServiceError";
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;
}

export async function assertOk(response: Response, label: string): Promise<void> {
  if (response.ok) {
    return;
  }
  throw new ModelServiceError(
    `${label} failed (${response.status}): ${await response.text()}`,
    response.status,
    isTransientStatus(response.status),
  );
}

/** Timeouts, aborted requests and network failures are worth another attempt. */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof ModelServiceError) {
    return error.transient;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return true;
  }
  // undici reports connection failures as `TypeError: fetch failed`.
  return error instanceof TypeError && error.message === "fetch failed";
}

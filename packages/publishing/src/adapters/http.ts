const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "UND_ERR_CONNECT_TIMEOUT"]);

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function numericField(err: object, field: string): number | undefined {
  const value: unknown = Reflect.get(err, field);
  return typeof value === "number" ? value : undefined;
}

/**
 * Whether a thrown client error looks retryable: a 408/429/5xx status,
 * a dropped connection, or a timeout.
 */
export function isTransientFailure(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;

  const status = numericField(err, "statusCode") ?? numericField(err, "status");
  if (status !== undefined) return isTransientStatus(status);

  const code: unknown = Reflect.get(err, "code");
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;

  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) return true;

  const cause: unknown = Reflect.get(err, "cause");
  return cause !== undefined && cause !== err && isTransientFailure(cause);
}

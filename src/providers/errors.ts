/** Base error for the assistant core. */
export class AssistantError extends Error {
  readonly code: string;

  constructor(message: string, code = "UNKNOWN") {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Generic backend failure: network, auth, malformed response. */
export class LLMError extends AssistantError {
  constructor(message: string, code = "LLM_ERROR") {
    super(message, code);
  }
}

export class RateLimitError extends LLMError {
  readonly provider: string;
  /** Seconds the backend asked us to wait, when it said so. */
  readonly retryAfter?: number;

  constructor(provider: string, retryAfter?: number) {
    super(`Rate limit exceeded on ${provider}`, "RATE_LIMIT");
    this.provider = provider;
    this.retryAfter = retryAfter;
  }
}

export class ProviderNotAvailableError extends LLMError {
  constructor(provider: string) {
    super(`Provider '${provider}' is not available`, "PROVIDER_UNAVAILABLE");
  }
}

export interface ProviderFailure {
  provider: string;
  model: string;
  message: string;
  rateLimited: boolean;
}

export class AllProvidersFailedError extends LLMError {
  readonly errors: ProviderFailure[];

  constructor(errors: ProviderFailure[]) {
    const detail = errors.map((e) => `${e.provider}: ${e.message}`).join("; ");
    super(
      detail ? `All LLM providers failed (${detail})` : "All LLM providers failed",
      "ALL_PROVIDERS_FAILED",
    );
    this.errors = errors;
  }
}

/** A stream that had already produced output and then broke. */
export class StreamInterruptedError extends LLMError {
  readonly provider: string;
  readonly partial: string;

  constructor(provider: string, partial: string, cause: string) {
    super(`Stream from ${provider} interrupted: ${cause}`, "STREAM_INTERRUPTED");
    this.provider = provider;
    this.partial = partial;
  }
}

export class TimeoutError extends AssistantError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map anything thrown by a backend call onto the LLM error taxonomy. */
export function toLLMError(err: unknown, prefix: string): LLMError {
  if (err instanceof LLMError) return err;
  return new LLMError(`${prefix}: ${errorMessage(err)}`);
}

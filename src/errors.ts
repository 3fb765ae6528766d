/** Ranking input carried a missing or out-of-range field. Fails the whole ranking call. */
export class InvalidProviderError extends Error {
  readonly providerId: string;
  readonly field: string;

  constructor(providerId: string, field: string, detail: string) {
    super(`Invalid provider ${providerId}: ${field} ${detail}`);
    this.name = "InvalidProviderError";
    this.providerId = providerId;
    this.field = field;
  }
}

/** Settings required for an operation are absent. */
export class ConfigError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

/** An upstream API needed to complete the request failed. */
export class UpstreamError extends Error {
  readonly status: 502 | 503;

  constructor(status: 502 | 503, message: string) {
    super(message);
    this.name = "UpstreamError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

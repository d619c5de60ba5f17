/** Missing credentials, bad env values, missing font or content files. Fatal before any network call. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type UpstreamKind = 'image' | 'chat' | 'publish' | 'health' | 'composite';

/** A failed call to (or response from) an external API. */
export class UpstreamError extends Error {
  readonly kind: UpstreamKind;
  readonly status?: number;
  readonly body?: string;
  /** Server-requested wait from a `retry-after` header. */
  readonly retryAfterMs?: number;

  constructor(
    kind: UpstreamKind,
    message: string,
    opts?: { status?: number; body?: string; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'UpstreamError';
    this.kind = kind;
    this.status = opts?.status;
    this.body = opts?.body;
    this.retryAfterMs = opts?.retryAfterMs;
  }
}

/** Structured model output that does not match the expected schema. */
export class MalformedResponseError extends UpstreamError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super('chat', message);
    this.name = 'MalformedResponseError';
    this.raw = raw;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `message: body` for log lines and kill-switch reasons; body is clipped. */
export function describeUpstream(err: UpstreamError, maxBody = 300): string {
  if (!err.body) return err.message;
  const body = err.body.length > maxBody ? `${err.body.slice(0, maxBody)}…` : err.body;
  return `${err.message}: ${body}`;
}

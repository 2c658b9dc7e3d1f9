export class AuditLogError extends Error {
  public readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = "AuditLogError";
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing or unusable credential, raised before any request is sent. */
export class AuthError extends AuditLogError {
  constructor(message: string = "No API token available") {
    super(message, null);
    this.name = "AuthError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FetchError extends AuditLogError {
  public readonly status: number | null;
  public readonly body: string;
  public readonly timedOut: boolean;

  constructor(
    message: string,
    options: { status?: number | null; body?: string; timedOut?: boolean } = {},
  ) {
    super(message, options.status ?? null);
    this.name = "FetchError";
    this.status = options.status ?? null;
    this.body = options.body ?? "";
    this.timedOut = options.timedOut ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ParseError extends AuditLogError {
  public readonly url: string | null;

  constructor(message: string, url: string | null = null) {
    super(message, null);
    this.name = "ParseError";
    this.url = url;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class WriteError extends AuditLogError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, null);
    this.name = "WriteError";
    this.path = path;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Invalid flags, environment or query values. */
export class ConfigError extends AuditLogError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, null);
    this.name = "ConfigError";
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const STATUS_HINTS: Record<number, string> = {
  401: "token rejected, check that it is valid and not expired",
  403: "forbidden, the token may lack the read:audit_log scope or the rate limit is exhausted",
  404: "not found, check the enterprise or organization name",
};

export function errorFromStatus(
  status: number,
  statusText: string,
  body: string,
): FetchError {
  const detail = body.trim() || statusText;
  const hint = STATUS_HINTS[status];
  const message = hint
    ? `HTTP ${status}: ${hint} (${detail})`
    : `HTTP ${status}: ${detail}`;
  return new FetchError(message, { status, body });
}

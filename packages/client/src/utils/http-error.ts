export class HttpError extends Error {
  override name = "HttpError";
  status: number;
  url: string;
  body: string;
  retryAfterSeconds?: number;

  constructor(options: {
    message?: string;
    status: number;
    url: string;
    body: string;
    retryAfterSeconds?: number;
  }) {
    super(
      options.message ?? `HTTP ${options.status} error from ${options.url}`
    );
    this.status = options.status;
    this.url = options.url;
    this.body = options.body;
    if (options.retryAfterSeconds !== undefined) {
      this.retryAfterSeconds = options.retryAfterSeconds;
    }
  }
}

export function parseRetryAfterSeconds(
  headerValue: string | null,
  now: number = Date.now()
): number | undefined {
  if (!headerValue) {
    return undefined;
  }

  const numeric = Number.parseInt(headerValue, 10);
  if (!Number.isNaN(numeric)) {
    return numeric;
  }

  const timestamp = Date.parse(headerValue);
  if (Number.isNaN(timestamp)) {
    return undefined;
  }

  const seconds = Math.ceil((timestamp - now) / 1000);
  return Math.max(0, seconds);
}

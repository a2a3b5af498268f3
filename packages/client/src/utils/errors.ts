import type { ZodIssue } from "zod";
import { HttpError } from "./http-error.js";

/**
 * The request never produced a response (DNS failure, refused connection,
 * aborted socket).
 */
export class NetworkError extends Error {
  override name = "NetworkError";
  override cause?: unknown;
  url: string;

  constructor(options: { url: string; cause?: unknown }) {
    super(`Request to ${options.url} failed before a response was received`);
    this.url = options.url;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * A URI that cannot be parsed, alone or against the client's base URL.
 */
export class InvalidUriError extends Error {
  override name = "InvalidUriError";
  override cause?: unknown;
  uri: string;

  constructor(options: { uri: string; cause?: unknown }) {
    super(`Cannot build a request URL from ${options.uri}`);
    this.uri = options.uri;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * A 200 response whose body is not JSON, or lacks a key the library reads.
 */
export class MalformedResponseError extends Error {
  override name = "MalformedResponseError";
  override cause?: unknown;
  url?: string;
  path: string;
  issues: ZodIssue[];

  constructor(options: {
    message: string;
    path: string;
    url?: string;
    issues?: ZodIssue[];
    cause?: unknown;
  }) {
    super(options.message);
    this.path = options.path;
    this.issues = options.issues ?? [];
    if (options.url !== undefined) {
      this.url = options.url;
    }
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export type ReadError =
  | HttpError
  | NetworkError
  | InvalidUriError
  | MalformedResponseError;

export type ReadResult = { ok: true } | { ok: false; error: ReadError };

export function isReadError(error: unknown): error is ReadError {
  return (
    error instanceof HttpError ||
    error instanceof NetworkError ||
    error instanceof InvalidUriError ||
    error instanceof MalformedResponseError
  );
}

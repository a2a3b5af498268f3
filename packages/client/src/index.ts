// Client
export {
  ElsClient,
  createClient,
  type ElsClientOptions,
  type FetchFn,
  type FetchResponse,
  type JsonObject,
} from "./client/els-client.js";
export {
  DEFAULT_BASE_URL,
  DEFAULT_USER_AGENT,
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
  DEFAULT_PAGE_SIZE,
  loadConfigFromEnv,
  loadConfigFromFile,
  type ClientConfig,
  type ClientSettings,
} from "./client/config.js";
export { silentLogger, type Logger } from "./client/logger.js";

// Entities
export * from "./entities/index.js";

// Errors
export { HttpError, parseRetryAfterSeconds } from "./utils/http-error.js";
export {
  NetworkError,
  InvalidUriError,
  MalformedResponseError,
  isReadError,
  type ReadError,
  type ReadResult,
} from "./utils/errors.js";

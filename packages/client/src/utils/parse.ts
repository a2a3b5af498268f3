import type { z } from "zod";
import { MalformedResponseError } from "./errors.js";

/**
 * Validates the part of a response found at `path`, raising
 * MalformedResponseError instead of ZodError.
 */
export function parseResponsePart<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  context: { path: string; url?: string | undefined }
): z.infer<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const first = result.error.issues[0];
  const issuePath =
    first && first.path.length > 0 ? `.${first.path.join(".")}` : "";
  const errorOptions: ConstructorParameters<
    typeof MalformedResponseError
  >[0] = {
    message: `Unexpected response shape at ${context.path}${issuePath}: ${
      first?.message ?? "invalid value"
    }`,
    path: context.path,
    issues: result.error.issues,
    cause: result.error,
  };
  if (context.url !== undefined) {
    errorOptions.url = context.url;
  }
  throw new MalformedResponseError(errorOptions);
}

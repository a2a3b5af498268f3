import { readFile } from "node:fs/promises";
import { z } from "zod";

export const DEFAULT_BASE_URL = "https://api.elsevier.com/";
export const DEFAULT_USER_AGENT = "elsapi-client";
export const DEFAULT_MIN_REQUEST_INTERVAL_MS = 1000;
export const DEFAULT_PAGE_SIZE = 25;

// Scalar client settings; fetch and logger are injected separately.
export const clientSettingsSchema = z.object({
  instToken: z.string().default(""),
  baseUrl: z
    .string()
    .url("baseUrl must be an absolute URL")
    .default(DEFAULT_BASE_URL),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  minRequestIntervalMs: z
    .number()
    .min(0)
    .default(DEFAULT_MIN_REQUEST_INTERVAL_MS),
  pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
});

export type ClientSettings = z.infer<typeof clientSettingsSchema>;
export type ClientSettingsInput = z.input<typeof clientSettingsSchema>;

export interface ClientConfig {
  apiKey: string;
  instToken?: string | undefined;
  baseUrl?: string | undefined;
}

const envSchema = z.object({
  ELS_API_KEY: z
    .string({ required_error: "ELS_API_KEY is required" })
    .min(1, "ELS_API_KEY is required"),
  ELS_INST_TOKEN: z.string().optional(),
  ELS_BASE_URL: z.string().url().optional(),
});

const configFileSchema = z.object({
  apikey: z
    .string({ required_error: "apikey is required" })
    .min(1, "apikey is required"),
  insttoken: z.string().optional(),
});

export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): ClientConfig {
  const parsed = envSchema.parse(env);
  return {
    apiKey: parsed.ELS_API_KEY,
    instToken: parsed.ELS_INST_TOKEN,
    baseUrl: parsed.ELS_BASE_URL,
  };
}

/**
 * Reads a JSON file of the form `{ "apikey": "...", "insttoken": "..." }`.
 */
export async function loadConfigFromFile(path: string): Promise<ClientConfig> {
  const raw = await readFile(path, "utf8");
  const parsed = configFileSchema.parse(JSON.parse(raw));
  return {
    apiKey: parsed.apikey,
    instToken: parsed.insttoken,
  };
}

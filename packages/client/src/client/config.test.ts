import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfigFromEnv, loadConfigFromFile } from "./config.js";

describe("loadConfigFromEnv", () => {
  it("reads the API key, token and base URL", () => {
    const config = loadConfigFromEnv({
      ELS_API_KEY: "test-key",
      ELS_INST_TOKEN: "test-token",
      ELS_BASE_URL: "https://api.example.test/",
    });

    expect(config).toEqual({
      apiKey: "test-key",
      instToken: "test-token",
      baseUrl: "https://api.example.test/",
    });
  });

  it("leaves optional settings unset", () => {
    const config = loadConfigFromEnv({ ELS_API_KEY: "test-key" });

    expect(config.apiKey).toBe("test-key");
    expect(config.instToken).toBeUndefined();
    expect(config.baseUrl).toBeUndefined();
  });

  it("requires an API key", () => {
    expect(() => loadConfigFromEnv({})).toThrow(/ELS_API_KEY is required/);
    expect(() => loadConfigFromEnv({ ELS_API_KEY: "" })).toThrow(/ELS_API_KEY is required/);
  });

  it("rejects a base URL that is not a URL", () => {
    expect(() =>
      loadConfigFromEnv({ ELS_API_KEY: "test-key", ELS_BASE_URL: "not a url" })
    ).toThrow();
  });
});

describe("loadConfigFromFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "elsapi-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads apikey and insttoken from a JSON file", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ apikey: "test-key", insttoken: "test-token" }));

    await expect(loadConfigFromFile(path)).resolves.toEqual({
      apiKey: "test-key",
      instToken: "test-token",
    });
  });

  it("rejects a file without an apikey", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ insttoken: "test-token" }));

    await expect(loadConfigFromFile(path)).rejects.toThrow(/apikey is required/);
  });
});

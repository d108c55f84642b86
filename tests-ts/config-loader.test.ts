import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadDigestConfig, parseDigestConfig, resolveApiKey } from "@/lib/config-loader";
import { DEFAULT_DIGEST_CONFIG } from "@/lib/domain/models";

describe("digest config", () => {
  it("falls back to defaults for an empty mapping", () => {
    expect(parseDigestConfig({}, {})).toEqual(DEFAULT_DIGEST_CONFIG);
  });

  it("ships a config file matching the defaults", () => {
    expect(loadDigestConfig(path.join(process.cwd(), "config", "digest.yaml"), {})).toEqual(DEFAULT_DIGEST_CONFIG);
  });

  it("uses defaults when the config file does not exist", () => {
    expect(loadDigestConfig(path.join(process.cwd(), "config", "missing.yaml"), {})).toEqual(DEFAULT_DIGEST_CONFIG);
  });

  it("reads snake_case keys and trims the base url", () => {
    const config = parseDigestConfig({ min_story_count: 3, base_url: "https://llm.internal.test/", timeout_seconds: 30 }, {});
    expect(config.minStoryCount).toBe(3);
    expect(config.baseUrl).toBe("https://llm.internal.test");
    expect(config.timeoutSeconds).toBe(30);
  });

  it("lets the environment override model, endpoint and threshold", () => {
    const config = parseDigestConfig(
      { model: "mistral-small" },
      { MISTRAL_MODEL: "mistral-large-latest", MISTRAL_BASE_URL: "https://proxy.test", DIGEST_MIN_STORY_COUNT: "7" },
    );
    expect(config.model).toBe("mistral-large-latest");
    expect(config.baseUrl).toBe("https://proxy.test");
    expect(config.minStoryCount).toBe(7);
  });

  it("rejects invalid values", () => {
    expect(() => parseDigestConfig({ timeout_seconds: "soon" }, {})).toThrowError("timeout_seconds must be a number: soon");
    expect(() => parseDigestConfig({ min_story_count: 13 }, {})).toThrowError(/cannot exceed requested_story_count/);
  });

  it("resolves the credential from the environment", () => {
    expect(resolveApiKey({ MISTRAL_API_KEY: " test-key " })).toBe("test-key");
    expect(resolveApiKey({})).toBe("");
  });
});

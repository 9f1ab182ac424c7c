import { describe, it, expect, vi, afterEach } from "vitest";
import { parseConfig, resolveSuggestionConfig } from "../server/config";
import { createAuditServices } from "../server/services";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig({});
    expect(config).toMatchObject({
      OPENROUTER_MODEL: "mistralai/mistral-large",
      OPENROUTER_BASE_URL: "https://openrouter.ai/api/v1",
      LOCAL_AI_URL: "http://localhost:1234/v1",
      AI_PROVIDER: "auto",
      PORT: 5000,
      CRAWL_LIMIT: 10,
      TIMEOUT_MS: 30000,
      RANK_DELAY_MS: 2000,
      USER_AGENT: "site-seo-audit/1.0",
      OUTPUT_DIR: "results",
    });
    expect(config.SERPAPI_KEY).toBeUndefined();
    expect(config.OPENROUTER_API_KEY).toBeUndefined();
  });

  it("coerces numbers and trims keys", () => {
    const config = parseConfig({ PORT: "8080", CRAWL_LIMIT: "25", SERPAPI_KEY: " test-secret ", OPENROUTER_API_KEY: "   " });
    expect(config.PORT).toBe(8080);
    expect(config.CRAWL_LIMIT).toBe(25);
    expect(config.SERPAPI_KEY).toBe("test-secret");
    expect(config.OPENROUTER_API_KEY).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ PORT: "not-a-port" })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => parseConfig({ AI_PROVIDER: "cloud" })).toThrow(/^Invalid configuration: AI_PROVIDER: /);
  });
});

describe("resolveSuggestionConfig", () => {
  const shared = { temperature: 0.7, maxTokens: 200, timeoutMs: 30000 };

  it("disables suggestions when nothing is configured", () => {
    expect(resolveSuggestionConfig(parseConfig({}))).toEqual({ provider: "none", model: "", ...shared });
  });

  it("picks OpenRouter when a key is set", () => {
    expect(resolveSuggestionConfig(parseConfig({ OPENROUTER_API_KEY: "test-secret" }))).toEqual({
      provider: "openrouter",
      apiKey: "test-secret",
      baseURL: "https://openrouter.ai/api/v1",
      model: "mistralai/mistral-large",
      ...shared,
    });
  });

  it("uses the local endpoint only when selected", () => {
    expect(resolveSuggestionConfig(parseConfig({ AI_PROVIDER: "local", AI_TIMEOUT_MS: "5000" }))).toEqual({
      provider: "local",
      baseURL: "http://localhost:1234/v1",
      model: "local-model",
      temperature: 0.7,
      maxTokens: 200,
      timeoutMs: 5000,
    });
  });

  it("falls back to no provider when OpenRouter has no key", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(resolveSuggestionConfig(parseConfig({ AI_PROVIDER: "openrouter" })).provider).toBe("none");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("honours an explicit none", () => {
    expect(resolveSuggestionConfig(parseConfig({ AI_PROVIDER: "none", OPENROUTER_API_KEY: "test-secret" })).provider).toBe(
      "none"
    );
  });
});

describe("createAuditServices", () => {
  it("builds services from the environment", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const services = createAuditServices(parseConfig({ SERPAPI_KEY: "test-secret" }));

    expect(services.suggestions.available).toBe(false);
    expect(services.rankChecker.method).toBe("serpapi");
  });

  it("enables suggestions when a provider is configured", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const services = createAuditServices(parseConfig({ OPENROUTER_API_KEY: "test-secret" }));

    expect(services.suggestions.available).toBe(true);
    expect(services.suggestions.provider).toBe("openrouter");
    expect(services.rankChecker.method).toBe("scraping");
  });
});

import { z } from "zod";
import { DEFAULT_USER_AGENT } from "./audit/types";
import type { SuggestionConfig } from "./audit/suggestions";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const EnvSchema = z.object({
  SERPAPI_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: z.string().default("mistralai/mistral-large"),
  OPENROUTER_BASE_URL: z.string().url().default(OPENROUTER_BASE_URL),
  LOCAL_AI_URL: z.string().url().default("http://localhost:1234/v1"),
  LOCAL_AI_MODEL: z.string().default("local-model"),
  AI_PROVIDER: z.enum(["auto", "openrouter", "local", "none"]).default("auto"),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PORT: z.coerce.number().int().positive().default(5000),
  CRAWL_LIMIT: z.coerce.number().int().positive().default(10),
  TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RANK_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  OUTPUT_DIR: z.string().default("results"),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadLocalEnvFiles(): void {
  // Added in Node 20.12.
  if (typeof process.loadEnvFile !== "function") return;

  for (const envPath of [".env.local", ".env"]) {
    try {
      process.loadEnvFile(envPath);
    } catch (error) {
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code !== "ENOENT") {
        console.warn(`[config] Failed to load ${envPath}:`, error);
      }
    }
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

/**
 * Which model endpoint suggestions go to. "auto" picks OpenRouter when a key
 * is configured and disables suggestions otherwise; the local endpoint is
 * only used when selected explicitly.
 */
export function resolveSuggestionConfig(config: AppConfig): SuggestionConfig {
  const shared = { temperature: 0.7, maxTokens: 200, timeoutMs: config.AI_TIMEOUT_MS };
  const provider =
    config.AI_PROVIDER === "auto" ? (config.OPENROUTER_API_KEY ? "openrouter" : "none") : config.AI_PROVIDER;

  switch (provider) {
    case "openrouter":
      if (!config.OPENROUTER_API_KEY) {
        console.warn("[config] AI_PROVIDER=openrouter but OPENROUTER_API_KEY is not set; suggestions disabled.");
        return { provider: "none", model: "", ...shared };
      }
      return {
        provider,
        apiKey: config.OPENROUTER_API_KEY,
        baseURL: config.OPENROUTER_BASE_URL,
        model: config.OPENROUTER_MODEL,
        ...shared,
      };
    case "local":
      return { provider, baseURL: config.LOCAL_AI_URL, model: config.LOCAL_AI_MODEL, ...shared };
    case "none":
      return { provider, model: "", ...shared };
  }
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    loadLocalEnvFiles();
    cached = parseConfig(process.env);
  }
  return cached;
}

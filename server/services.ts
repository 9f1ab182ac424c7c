import type { AppConfig } from "./config";
import { resolveSuggestionConfig } from "./config";
import { SuggestionGenerator } from "./audit/suggestions";
import { RankChecker } from "./audit/rank-checker";
import type { SiteAuditServices } from "./audit";

export function createAuditServices(config: AppConfig): SiteAuditServices {
  const suggestionConfig = resolveSuggestionConfig(config);
  if (suggestionConfig.provider === "none") {
    console.warn("[services] No AI endpoint configured. Set OPENROUTER_API_KEY or AI_PROVIDER=local for AI suggestions.");
  } else {
    console.log(`[services] AI suggestions via ${suggestionConfig.provider} (${suggestionConfig.model}).`);
  }

  return {
    suggestions: new SuggestionGenerator(suggestionConfig),
    rankChecker: new RankChecker({
      serpApiKey: config.SERPAPI_KEY,
      userAgent: config.USER_AGENT,
      timeoutMs: config.TIMEOUT_MS,
      delayMs: config.RANK_DELAY_MS,
    }),
  };
}

import OpenAI from "openai";
import type { PageAttributes, PageSuggestions } from "@shared/audit-types";

export type SuggestionProvider = "openrouter" | "local" | "none";

export interface SuggestionConfig {
  provider: SuggestionProvider;
  apiKey?: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const AI_UNAVAILABLE_MESSAGE =
  "AI not available - set OPENROUTER_API_KEY or LOCAL_AI_URL to enable suggestions";

export const DISABLED_SUGGESTIONS: SuggestionConfig = {
  provider: "none",
  model: "",
  temperature: 0.7,
  maxTokens: 200,
  timeoutMs: 30000,
};

export class SuggestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SuggestionError";
  }
}

function firstH1(page: PageAttributes, fallback: string): string {
  return page.h1Tags?.[0] ?? fallback;
}

function titlePrompt(page: PageAttributes, keyword?: string): string {
  return `Generate an SEO-optimized title tag for this webpage:
- Current title: "${page.title || "No title"}"
- URL: ${page.url}
- Content length: ${page.wordCount ?? 0} words
- Target keyword: ${keyword || "not specified"}

Requirements:
- 50-60 characters long
- Include the target keyword if provided
- Compelling and click-worthy
- Accurately describe the content

Return only the suggested title, no explanations.`;
}

function metaDescriptionPrompt(page: PageAttributes, keyword?: string): string {
  return `Generate an SEO-optimized meta description for this webpage:
- Title: "${page.title || "No title"}"
- URL: ${page.url}
- Main heading: "${firstH1(page, "No H1")}"
- Target keyword: ${keyword || "not specified"}

Requirements:
- 150-160 characters long
- Include the target keyword naturally if provided
- End with a compelling call-to-action
- Accurately summarize the page content

Return only the suggested meta description, no explanations.`;
}

function contentPrompt(page: PageAttributes, contentType: string): string {
  const h2Tags = page.h2Tags ?? [];
  return `Analyze this webpage and suggest content improvements:
- Title: "${page.title || "No title"}"
- Current word count: ${page.wordCount ?? 0}
- H1: ${firstH1(page, "Missing")}
- H2 tags: ${h2Tags.length > 0 ? h2Tags.slice(0, 3).join(", ") : "None"}
- Content type: ${contentType}

Provide 3-5 specific suggestions to improve SEO and user engagement:
1. Content structure improvements
2. Additional topics to cover
3. SEO optimization tips

Keep suggestions actionable and specific.`;
}

function keywordsPrompt(page: PageAttributes, keyword: string | undefined, count: number): string {
  return `Generate a list of at least ${count} highly relevant SEO keywords for the following page:
- Title: "${page.title ?? ""}"
- Meta Description: "${page.metaDescription ?? ""}"
- Main Heading: "${firstH1(page, "")}"
- Target Keyword: ${keyword || "not specified"}

Return the keywords as a plain, comma-separated list, no explanations.`;
}

/**
 * Produces free-text improvement suggestions through an OpenAI-compatible
 * chat completions endpoint (OpenRouter or a local LM Studio server).
 */
export class SuggestionGenerator {
  private readonly client: OpenAI | null;

  constructor(private readonly config: SuggestionConfig) {
    this.client =
      config.provider === "none"
        ? null
        : new OpenAI({
            apiKey: config.apiKey || "local",
            baseURL: config.baseURL,
            timeout: config.timeoutMs,
            maxRetries: 0,
          });
  }

  get available(): boolean {
    return this.client !== null;
  }

  get provider(): SuggestionProvider {
    return this.config.provider;
  }

  private async complete(prompt: string): Promise<string> {
    if (!this.client) return AI_UNAVAILABLE_MESSAGE;

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SuggestionError(`AI request failed: ${message}`, { cause: error });
    }

    if (!content || !content.trim()) {
      throw new SuggestionError("AI returned an empty response");
    }
    return content.trim();
  }

  suggestTitle(page: PageAttributes, targetKeyword?: string): Promise<string> {
    return this.complete(titlePrompt(page, targetKeyword));
  }

  suggestMetaDescription(page: PageAttributes, targetKeyword?: string): Promise<string> {
    return this.complete(metaDescriptionPrompt(page, targetKeyword));
  }

  suggestContent(page: PageAttributes, contentType = "blog"): Promise<string> {
    return this.complete(contentPrompt(page, contentType));
  }

  async suggestKeywords(page: PageAttributes, targetKeyword?: string, count = 30): Promise<string[]> {
    if (!this.available) return [];
    const text = await this.complete(keywordsPrompt(page, targetKeyword, count));
    return text
      .split(",")
      .map((keyword) => keyword.trim())
      .filter(Boolean);
  }

  async suggestForPage(page: PageAttributes): Promise<PageSuggestions> {
    const title = await this.suggestTitle(page);
    const metaDescription = await this.suggestMetaDescription(page);
    const content = await this.suggestContent(page);
    return { url: page.url, title, metaDescription, content };
  }
}

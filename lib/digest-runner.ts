import {
  type Article,
  type ClientOutcome,
  DEFAULT_DIGEST_CONFIG,
  type DigestConfig,
  DIGEST_TITLE,
  MODE_DIRECT,
  MODE_TRANSLATED,
  type RepairedResult,
  type SummaryResult,
} from "@/lib/domain/models";
import { DigestError, errorMessage } from "@/lib/infra/errors";
import { type Logger, silentLogger } from "@/lib/infra/logger";
import { buildPrompt } from "@/lib/llm/prompt-builder";
import { type ChatCompletionClient, MistralClient } from "@/lib/llm/mistral-client";
import { renderDirect } from "@/lib/output/direct-renderer";
import { INSUFFICIENT_STORIES, validateAndRepair } from "@/lib/output/html-repair";
import { escapeHtml } from "@/lib/output/markup";
import { coerceArticles, uniqueSources } from "@/lib/process/normalize";

export const NO_ARTICLES_REASON = "No articles available.";
export const UNEXPECTED_REASON = "An unexpected error occurred while summarizing the news.";
export const TRUNCATION_WARNING = "The translation hit the length limit; the last story may be incomplete.";

export interface SummarizeOptions {
  config?: DigestConfig;
  apiKey?: string;
  client?: ChatCompletionClient;
  logger?: Logger;
}

export function describeOutcome(outcome: Exclude<ClientOutcome, { kind: "success" }>): DigestError {
  switch (outcome.kind) {
    case "missing_credential":
      return new DigestError(
        "missing_credential",
        "Translation service is not configured: the Mistral API key is missing.",
      );
    case "api_error": {
      const { status, body } = outcome;
      if (status === 401 || status === 403) {
        return new DigestError("api_failure", `The translation service rejected the API key (HTTP ${status}).`, {
          status,
          details: body,
        });
      }
      if (status === 429) {
        return new DigestError(
          "api_failure",
          "The translation service rate limit was reached (HTTP 429). Please try again later.",
          { status, details: body },
        );
      }
      if (status >= 500) {
        return new DigestError("api_failure", `The translation service is temporarily unavailable (HTTP ${status}).`, {
          status,
          details: body,
        });
      }
      return new DigestError("api_failure", `The translation service returned an error (HTTP ${status}).`, {
        status,
        details: body,
      });
    }
    case "network_error":
      if (outcome.errorKind === "timeout") {
        return new DigestError("network_failure", "The translation service did not respond in time.", {
          details: outcome.message,
        });
      }
      if (outcome.errorKind === "tls") {
        return new DigestError(
          "network_failure",
          "A secure connection to the translation service could not be established.",
          { details: outcome.message },
        );
      }
      return new DigestError("network_failure", "Could not connect to the translation service.", {
        details: outcome.message,
      });
    case "malformed_payload":
      return new DigestError("malformed_payload", "The translation service returned an unexpected response.", {
        details: outcome.reason,
      });
  }
}

export function describeUnusable(result: Extract<RepairedResult, { kind: "unusable" }>, minStoryCount: number): DigestError {
  if (result.reason === INSUFFICIENT_STORIES) {
    return new DigestError(
      "structural_defect",
      `The translation was incomplete (found ${result.storyCount ?? 0} stories, need at least ${minStoryCount}).`,
      { details: result },
    );
  }
  return new DigestError("structural_defect", "The translated summary could not be read.", { details: result });
}

async function summarizeArticles(
  articles: Article[],
  client: ChatCompletionClient,
  config: DigestConfig,
  logger: Logger,
): Promise<SummaryResult> {
  const payload = buildPrompt(articles, config);
  logger.info("Requesting translated summary", { articles: payload.articleCount, total: articles.length });

  const outcome = await client.call(payload);
  if (outcome.kind !== "success") {
    throw describeOutcome(outcome);
  }

  const repaired = validateAndRepair(outcome.rawText, {
    minStoryCount: config.minStoryCount,
    allowedUrls: payload.urls,
  });
  if (repaired.kind === "unusable") {
    throw describeUnusable(repaired, config.minStoryCount);
  }

  const warnings = [...repaired.warnings];
  if (outcome.truncated) {
    warnings.unshift(TRUNCATION_WARNING);
  }
  for (const warning of repaired.warnings) {
    logger.warn(warning);
  }
  logger.info("Translated summary accepted", { stories: repaired.storyCount, warnings: warnings.length });

  return {
    htmlContent: repaired.html,
    articleCount: repaired.storyCount,
    sources: uniqueSources(articles.slice(0, payload.articleCount)),
    mode: MODE_TRANSLATED,
    error: null,
    warnings,
  };
}

function renderFallback(articles: Article[], reason: string | null, config: DigestConfig, logger: Logger): SummaryResult {
  try {
    return renderDirect(articles, reason, config.maxDirectArticles);
  } catch (error) {
    logger.error("Direct digest rendering failed", { error: errorMessage(error) });
    return {
      htmlContent: `<h1>${DIGEST_TITLE}</h1>\n<p class="empty-notice">${escapeHtml(reason || NO_ARTICLES_REASON)}</p>`,
      articleCount: articles.length,
      sources: [],
      mode: MODE_DIRECT,
      error: reason,
      warnings: [],
    };
  }
}

/**
 * Runs one summarization attempt and always resolves to displayable HTML.
 * Failures are logged with full diagnostics and surface only as a short `error` reason.
 */
export async function summarizeNews(input: unknown, options: SummarizeOptions = {}): Promise<SummaryResult> {
  const logger = options.logger || silentLogger;
  const config = options.config || DEFAULT_DIGEST_CONFIG;

  let articles: Article[];
  try {
    articles = coerceArticles(input);
  } catch (error) {
    logger.warn("Could not read the article list", { error: errorMessage(error) });
    return renderFallback([], NO_ARTICLES_REASON, config, logger);
  }

  if (!articles.length) {
    logger.warn("No articles supplied; rendering empty digest");
    return renderFallback(articles, null, config, logger);
  }

  const client =
    options.client ||
    new MistralClient({
      apiKey: options.apiKey || "",
      model: config.model,
      baseUrl: config.baseUrl,
      timeoutSeconds: config.timeoutSeconds,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      logger,
    });

  try {
    return await summarizeArticles(articles, client, config, logger);
  } catch (error) {
    const failure =
      error instanceof DigestError ? error : new DigestError("unexpected_failure", UNEXPECTED_REASON, { cause: error });
    logger.error("Summarization failed; falling back to direct digest", {
      kind: failure.kind,
      reason: failure.message,
      status: failure.status,
      details: failure.details,
      stack: error instanceof Error ? error.stack : undefined,
    });
    return renderFallback(articles, failure.message, config, logger);
  }
}

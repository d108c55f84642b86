import {
  type Article,
  DEFAULT_DIGEST_CONFIG,
  type DigestConfig,
  DIGEST_TITLE,
  LINK_CLASS,
  type PromptPayload,
} from "@/lib/domain/models";
import { ArticleInputError } from "@/lib/infra/errors";
import { normalizeText } from "@/lib/process/normalize";

type PromptConfig = Pick<DigestConfig, "maxPromptArticles" | "excerptChars" | "requestedStoryCount">;

function systemPrompt(storyCount: number): string {
  return [
    "You are an expert news analyst and translator specializing in Greek domestic news.",
    "Translate and summarize the supplied Greek articles into English, keeping only facts from the articles.",
    "Prefer stories about Greek domestic affairs and skip duplicates reported by several sources.",
    "Respond with an HTML fragment only: no preamble, no explanations, no markdown code fences.",
    "The fragment must follow this layout exactly:",
    `- exactly one <h1>${DIGEST_TITLE}</h1> at the top;`,
    `- exactly ${storyCount} story blocks, each made of:`,
    "  <h2>N. Translated title</h2>",
    "  <p>A 2-3 sentence English summary.</p>",
    '  <p class="source">Source: source name</p>',
    `  <p><a href="ORIGINAL_URL" target="_blank" class="${LINK_CLASS}">Read Full Article</a></p>`,
    "ORIGINAL_URL must be copied character for character from the URL line of the article. Never shorten, translate, encode or invent URLs.",
  ].join("\n");
}

function articleBlock(article: Article, index: number, excerptChars: number): string {
  const content = normalizeText(article.content, excerptChars);
  return [
    `ARTICLE ${index}`,
    `Title (translate to English): ${article.title || "Unknown Title"}`,
    `Source: ${article.source || "Unknown Source"}`,
    `URL: ${article.url || "(no URL)"}`,
    `Content: ${content || "[No content available]"}`,
  ].join("\n");
}

export function buildPrompt(articles: readonly Article[], config: PromptConfig = DEFAULT_DIGEST_CONFIG): PromptPayload {
  if (!Array.isArray(articles)) {
    throw new ArticleInputError("Articles must be provided as a list");
  }

  const selected = articles.slice(0, Math.min(config.maxPromptArticles, articles.length));
  const blocks = selected.map((article, index) => articleBlock(article, index + 1, config.excerptChars));

  const user = [
    `Here are ${selected.length} Greek news articles to translate and summarize:`,
    "",
    blocks.join("\n\n"),
    "",
    `Select the ${config.requestedStoryCount} most important unique stories and format them as instructed.`,
  ].join("\n");

  return {
    messages: [
      { role: "system", content: systemPrompt(config.requestedStoryCount) },
      { role: "user", content: user },
    ],
    articleCount: selected.length,
    urls: selected.map((article) => article.url).filter(Boolean),
  };
}

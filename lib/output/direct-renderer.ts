import {
  type Article,
  DEFAULT_DIGEST_CONFIG,
  DIGEST_TITLE,
  LINK_CLASS,
  MODE_DIRECT,
  type SummaryResult,
} from "@/lib/domain/models";
import { uniqueSources } from "@/lib/process/normalize";
import { type MarkupNode, div, em, h1, h2, link, p, serialize } from "@/lib/output/markup";

const SENTENCE_SPLIT_RE = /(?<=[.!?])\s+/;
const SHORT_EXCERPT_CHARS = 50;
const SLICE_EXCERPT_CHARS = 200;

export const DIRECT_NOTICE = "Showing the original Greek articles; the automatic English translation is not available.";
export const EMPTY_NOTICE = "No news articles were available at this time.";

export function buildExcerpt(content: string): string {
  const normalized = String(content || "").replace(/\s+/g, " ").trim();
  if (!normalized) return "";

  const sentences = normalized
    .split(SENTENCE_SPLIT_RE)
    .map((sentence) => sentence.trim())
    .filter(Boolean);

  if (sentences.length) {
    let excerpt = sentences.slice(0, 2).join(" ");
    if (excerpt.length < SHORT_EXCERPT_CHARS && sentences.length > 2) {
      excerpt = sentences.slice(0, 3).join(" ");
    }
    if (excerpt.length <= SLICE_EXCERPT_CHARS * 2) {
      return excerpt;
    }
  }

  if (normalized.length <= SLICE_EXCERPT_CHARS) {
    return normalized;
  }
  return `${normalized.slice(0, SLICE_EXCERPT_CHARS).trimEnd()}...`;
}

function storyNodes(article: Article, index: number): MarkupNode {
  const children: MarkupNode[] = [h2(`${index}. ${article.title || "Untitled article"}`)];
  const excerpt = buildExcerpt(article.content);
  if (excerpt) {
    children.push(p([excerpt]));
  }
  children.push(p([`Source: ${article.source || "Unknown source"}`], { class: "source" }));
  if (article.url) {
    children.push(
      p([link(article.url, "Read original article at source", { target: "_blank", class: LINK_CLASS })]),
    );
  }
  return div(children, { class: "news-item" });
}

export function renderDirect(
  articles: readonly Article[],
  reason: string | null = null,
  maxArticles = DEFAULT_DIGEST_CONFIG.maxDirectArticles,
): SummaryResult {
  const list: readonly Article[] = Array.isArray(articles) ? articles : [];
  const nodes: MarkupNode[] = [h1(DIGEST_TITLE), p([em(DIRECT_NOTICE)], { class: "notice" })];

  if (reason) {
    nodes.push(div([`Translation unavailable: ${reason}`], { class: "fallback-warning", role: "alert" }));
  }

  const shown = list.slice(0, Math.max(0, maxArticles));
  if (!shown.length) {
    nodes.push(p([EMPTY_NOTICE], { class: "empty-notice" }));
  }
  shown.forEach((article, index) => {
    nodes.push(storyNodes(article, index + 1));
  });

  return {
    htmlContent: serialize(nodes),
    articleCount: list.length,
    sources: uniqueSources(list),
    mode: MODE_DIRECT,
    error: reason || null,
    warnings: [],
  };
}

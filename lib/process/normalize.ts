import type { Article } from "@/lib/domain/models";
import { ArticleInputError, isRecord } from "@/lib/infra/errors";

const MULTISPACE_RE = /\s+/g;

export function normalizeText(value: string, maxLen = 1200): string {
  const normalized = String(value || "").replace(MULTISPACE_RE, " ").trim();
  if (normalized.length <= maxLen) {
    return normalized;
  }
  return `${normalized.slice(0, maxLen).trimEnd()}...`;
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/**
 * Coerces upstream scraper output into articles. Records missing fields keep
 * empty strings; non-object entries are dropped. The url is kept verbatim since
 * rendered links must match it exactly.
 */
export function coerceArticles(input: unknown): Article[] {
  if (!Array.isArray(input)) {
    throw new ArticleInputError(`Expected an article list, got ${input === null ? "null" : typeof input}`);
  }

  const articles: Article[] = [];
  for (const row of input) {
    if (!isRecord(row)) continue;
    articles.push({
      title: stringField(row, "title").trim(),
      source: stringField(row, "source").trim(),
      url: stringField(row, "url"),
      content: stringField(row, "content"),
    });
  }
  return articles;
}

export function uniqueSources(articles: readonly Article[]): string[] {
  const labels = articles.map((article) => article.source.trim()).filter(Boolean);
  return Array.from(new Set(labels));
}

import { DIGEST_TITLE, MODE_TRANSLATED, type SummaryResult } from "@/lib/domain/models";
import { escapeHtml } from "@/lib/output/markup";

const DOCUMENT_STYLES = `
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 800px; margin: 0 auto; padding: 20px; }
    h1 { color: #1a5276; border-bottom: 2px solid #1a5276; padding-bottom: 10px; }
    h2 { color: #2874a6; margin-top: 20px; }
    .date, .notice { color: #666; font-style: italic; margin-bottom: 20px; }
    .source { color: #666; font-style: italic; font-size: 0.9em; }
    .article-link { color: #2874a6; font-weight: bold; }
    .fallback-warning { background: #fdf2e9; border-left: 4px solid #e67e22; padding: 10px 14px; margin: 16px 0; }
    .footer { margin-top: 30px; padding-top: 15px; border-top: 1px solid #ddd; font-size: 0.9em; color: #666; }`;

export interface DocumentOptions {
  date?: Date;
  locale?: string;
}

export function formatDigestDate(date: Date, locale = "en-US"): string {
  return new Intl.DateTimeFormat(locale, {
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
  }).format(date);
}

export function isFullDocument(html: string): boolean {
  const head = html.trimStart().slice(0, 20).toLowerCase();
  return head.startsWith("<!doctype html") || head.startsWith("<html");
}

export function renderDigestDocument(result: SummaryResult, options: DocumentOptions = {}): string {
  if (isFullDocument(result.htmlContent)) {
    return result.htmlContent;
  }

  const dateLine = formatDigestDate(options.date || new Date(), options.locale);
  const sourcesText = result.sources.length ? result.sources.join(", ") : "Greek news sources";
  const modeLine =
    result.mode === MODE_TRANSLATED
      ? "The content was translated and summarized using Mistral AI."
      : "The content is shown in its original language.";

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="UTF-8">',
    `  <title>${DIGEST_TITLE}</title>`,
    `  <style>${DOCUMENT_STYLES}\n  </style>`,
    "</head>",
    "<body>",
    `  <div class="date">${escapeHtml(dateLine)}</div>`,
    result.htmlContent,
    '  <div class="footer">',
    `    <p>This summary was generated from ${escapeHtml(sourcesText)}.</p>`,
    `    <p>${modeLine}</p>`,
    "  </div>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

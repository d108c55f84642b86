import { JSDOM, VirtualConsole } from "jsdom";
import { DEFAULT_DIGEST_CONFIG, DIGEST_TITLE, LINK_CLASS, type RepairedResult } from "@/lib/domain/models";
import { errorMessage } from "@/lib/infra/errors";
import { el, h1, serialize } from "@/lib/output/markup";

// Ordered; the first candidate present anywhere in the text decides where content starts.
export const PREAMBLE_CANDIDATES = ["<h1", "<div", "<p", "<h2"] as const;

export const INSUFFICIENT_STORIES = "insufficient story count";

const MARKUP_RE = /<\/?[a-zA-Z][^>]*>/;
const FENCE_OPEN_RE = /^```[a-zA-Z]*\s*\n?/;
const FENCE_CLOSE_RE = /\n?```\s*$/;

export interface RepairOptions {
  minStoryCount?: number;
  allowedUrls?: readonly string[];
  title?: string;
}

export interface NormalizedHtml {
  html: string;
  storyCount: number;
  warnings: string[];
}

export function hasMarkup(text: string): boolean {
  return MARKUP_RE.test(text);
}

export function wrapPlainText(raw: string, title = DIGEST_TITLE): string {
  return serialize([h1(title), el("pre", { class: "raw-summary" }, [raw])], "");
}

export function stripCodeFence(text: string): string {
  if (!text.includes("```")) return text;
  return text.trim().replace(FENCE_OPEN_RE, "").replace(FENCE_CLOSE_RE, "");
}

export function trimPreamble(text: string): string {
  const lower = text.toLowerCase();
  for (const candidate of PREAMBLE_CANDIDATES) {
    const index = lower.indexOf(candidate);
    if (index >= 0) {
      return index > 0 ? text.slice(index) : text;
    }
  }
  return text;
}

export function urlKey(raw: string): string {
  const value = raw.trim();
  try {
    const parsed = new URL(value);
    const pathname = parsed.pathname.replace(/\/$/, "");
    return `${parsed.protocol}//${parsed.host}${pathname}${parsed.search}`;
  } catch {
    return value.replace(/\/$/, "");
  }
}

function buildUrlIndex(urls: readonly string[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const url of urls) {
    if (!url) continue;
    const key = urlKey(url);
    if (!index.has(key)) index.set(key, url);
  }
  return index;
}

/**
 * Forces consistent link attributes, restores model-altered URLs to their originals,
 * and guarantees a top-level heading. Running it on its own output is a no-op.
 */
export function normalizeStructure(html: string, options: RepairOptions = {}): NormalizedHtml {
  const dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
  const document = dom.window.document;
  const warnings: string[] = [];

  // An explicit empty list means no link may survive.
  const restrict = options.allowedUrls !== undefined;
  const allowed = new Set((options.allowedUrls || []).filter(Boolean));
  const urlIndex = buildUrlIndex(options.allowedUrls || []);

  for (const anchor of Array.from(document.querySelectorAll("a[href]"))) {
    const href = anchor.getAttribute("href") || "";
    if (restrict && !allowed.has(href)) {
      const original = urlIndex.get(urlKey(href));
      if (original) {
        anchor.setAttribute("href", original);
      } else {
        warnings.push(`Removed link to unknown URL: ${href}`);
        anchor.replaceWith(...Array.from(anchor.childNodes));
        continue;
      }
    }
    anchor.setAttribute("target", "_blank");
    anchor.setAttribute("class", LINK_CLASS);
  }

  const root = document.body ?? document.documentElement;
  if (!document.querySelector("h1")) {
    const heading = document.createElement("h1");
    heading.textContent = options.title || DIGEST_TITLE;
    root.insertBefore(heading, root.firstChild);
  }

  return {
    html: root.innerHTML,
    storyCount: document.querySelectorAll("h2").length,
    warnings,
  };
}

export function validateAndRepair(rawText: string, options: RepairOptions = {}): RepairedResult {
  const minStoryCount = options.minStoryCount ?? DEFAULT_DIGEST_CONFIG.minStoryCount;
  try {
    const raw = String(rawText ?? "");
    const candidate = hasMarkup(raw) ? trimPreamble(stripCodeFence(raw)) : wrapPlainText(raw, options.title);
    const normalized = normalizeStructure(candidate, options);

    if (normalized.storyCount < minStoryCount) {
      return { kind: "unusable", reason: INSUFFICIENT_STORIES, storyCount: normalized.storyCount };
    }
    return {
      kind: "usable",
      html: normalized.html,
      storyCount: normalized.storyCount,
      warnings: normalized.warnings,
    };
  } catch (error) {
    return { kind: "unusable", reason: `unparseable output: ${errorMessage(error)}` };
  }
}

export const MODE_TRANSLATED = "translated";
export const MODE_DIRECT = "direct";

export type SummaryMode = typeof MODE_TRANSLATED | typeof MODE_DIRECT;

export interface Article {
  title: string;
  source: string;
  url: string;
  content: string;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface PromptPayload {
  messages: ChatMessage[];
  articleCount: number;
  urls: string[];
}

export interface SummaryResult {
  htmlContent: string;
  articleCount: number;
  sources: string[];
  mode: SummaryMode;
  error: string | null;
  warnings: string[];
}

export type NetworkErrorKind = "timeout" | "connection" | "tls";

export type ClientOutcome =
  | { kind: "success"; rawText: string; finishReason: string | null; truncated: boolean }
  | { kind: "api_error"; status: number; body: unknown }
  | { kind: "network_error"; errorKind: NetworkErrorKind; message: string }
  | { kind: "malformed_payload"; reason: string }
  | { kind: "missing_credential" };

export type RepairedResult =
  | { kind: "usable"; html: string; storyCount: number; warnings: string[] }
  | { kind: "unusable"; reason: string; storyCount?: number };

export interface DigestConfig {
  model: string;
  baseUrl: string;
  timeoutSeconds: number;
  temperature: number;
  maxTokens: number;
  maxPromptArticles: number;
  excerptChars: number;
  requestedStoryCount: number;
  minStoryCount: number;
  maxDirectArticles: number;
}

export const DEFAULT_DIGEST_CONFIG: DigestConfig = {
  model: "mistral-small",
  baseUrl: "https://api.mistral.ai",
  timeoutSeconds: 120,
  temperature: 0.2,
  maxTokens: 3072,
  maxPromptArticles: 20,
  excerptChars: 250,
  requestedStoryCount: 12,
  minStoryCount: 5,
  maxDirectArticles: 12,
};

export const DIGEST_TITLE = "Greek News Summary";
export const LINK_CLASS = "article-link";

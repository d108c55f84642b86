import {
  type ClientOutcome,
  DEFAULT_DIGEST_CONFIG,
  type NetworkErrorKind,
  type PromptPayload,
} from "@/lib/domain/models";
import { errorMessage, isRecord } from "@/lib/infra/errors";
import { type Logger, silentLogger } from "@/lib/infra/logger";

const TLS_CODE_RE = /^(ERR_TLS|ERR_SSL|CERT_|UNABLE_TO_|DEPTH_ZERO|SELF_SIGNED)/;

export interface MistralClientOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutSeconds?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

function causeCode(error: unknown): string {
  if (!(error instanceof Error)) return "";
  const cause: unknown = error.cause;
  if (isRecord(cause) && typeof cause.code === "string") {
    return cause.code;
  }
  return "";
}

export function classifyNetworkError(error: unknown): NetworkErrorKind {
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return "timeout";
  }
  const code = causeCode(error);
  if (code === "UND_ERR_CONNECT_TIMEOUT" || code === "UND_ERR_HEADERS_TIMEOUT" || code === "UND_ERR_BODY_TIMEOUT") {
    return "timeout";
  }
  if (TLS_CODE_RE.test(code)) {
    return "tls";
  }
  return "connection";
}

function parseBody(text: string): unknown {
  if (!text.trim()) return "";
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function readChoice(data: unknown): { content: string; finishReason: string | null } | null {
  if (!isRecord(data) || !Array.isArray(data.choices) || !data.choices.length) {
    return null;
  }
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message) || typeof choice.message.content !== "string") {
    return null;
  }
  return {
    content: choice.message.content,
    finishReason: typeof choice.finish_reason === "string" ? choice.finish_reason : null,
  };
}

export interface ChatCompletionClient {
  call(payload: PromptPayload): Promise<ClientOutcome>;
}

/**
 * Single-shot chat-completion client. Every outcome, including transport failures,
 * comes back as a `ClientOutcome`; nothing is retried.
 */
export class MistralClient implements ChatCompletionClient {
  readonly apiKey: string;

  readonly model: string;

  readonly baseUrl: string;

  readonly timeoutMs: number;

  readonly temperature: number;

  readonly maxTokens: number;

  private readonly logger: Logger;

  constructor(options: MistralClientOptions) {
    this.apiKey = String(options.apiKey || "").trim();
    this.model = options.model || DEFAULT_DIGEST_CONFIG.model;
    this.baseUrl = (options.baseUrl || DEFAULT_DIGEST_CONFIG.baseUrl).replace(/\/+$/, "");
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? DEFAULT_DIGEST_CONFIG.timeoutSeconds) * 1_000));
    this.temperature = options.temperature ?? DEFAULT_DIGEST_CONFIG.temperature;
    this.maxTokens = options.maxTokens ?? DEFAULT_DIGEST_CONFIG.maxTokens;
    this.logger = options.logger || silentLogger;
  }

  get endpoint(): string {
    return `${this.baseUrl}/v1/chat/completions`;
  }

  async call(payload: PromptPayload): Promise<ClientOutcome> {
    if (!this.apiKey) {
      this.logger.error("Mistral API key is not configured; skipping request");
      return { kind: "missing_credential" };
    }

    const body = {
      model: this.model,
      messages: payload.messages,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      response_format: { type: "text" },
    };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();

    let status = 0;
    let text = "";
    try {
      this.logger.debug("Sending request to Mistral", {
        endpoint: this.endpoint,
        model: this.model,
        articles: payload.articleCount,
      });
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const errorKind = classifyNetworkError(error);
      const message = errorKind === "timeout" ? `Request timed out after ${this.timeoutMs}ms` : errorMessage(error);
      this.logger.error("Mistral request failed", {
        errorKind,
        message,
        code: causeCode(error) || undefined,
        elapsedMs: Date.now() - startedAt,
      });
      return { kind: "network_error", errorKind, message };
    } finally {
      clearTimeout(timer);
    }

    if (status !== 200) {
      const errorBody = parseBody(text);
      this.logger.error("Mistral API returned an error", {
        status,
        body: typeof errorBody === "string" ? errorBody.slice(0, 2_000) : errorBody,
      });
      return { kind: "api_error", status, body: errorBody };
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      this.logger.error("Mistral response is not valid JSON", { body: text.slice(0, 2_000) });
      return { kind: "malformed_payload", reason: "response body is not valid JSON" };
    }

    const choice = readChoice(data);
    if (!choice) {
      this.logger.error("Mistral response lacks choices[0].message.content", { body: text.slice(0, 2_000) });
      return { kind: "malformed_payload", reason: "response has no choices[0].message.content" };
    }

    const truncated = choice.finishReason === "length";
    if (truncated) {
      this.logger.warn("Mistral output was cut off at the token limit", { maxTokens: this.maxTokens });
    }
    this.logger.info("Received response from Mistral", {
      elapsedMs: Date.now() - startedAt,
      finishReason: choice.finishReason,
      chars: choice.content.length,
    });

    return { kind: "success", rawText: choice.content, finishReason: choice.finishReason, truncated };
  }
}

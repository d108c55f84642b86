import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { DEFAULT_DIGEST_CONFIG, type DigestConfig } from "@/lib/domain/models";

const DEFAULT_CONFIG_DIR = path.join(process.cwd(), "config");

export function loadYaml(filePath: string): Record<string, unknown> {
  const raw = fs.readFileSync(filePath, "utf-8");
  const data: unknown = yaml.load(raw) || {};
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new Error(`YAML root must be a mapping: ${filePath}`);
  }
  return Object.fromEntries(Object.entries(data));
}

function readNumber(record: Record<string, unknown>, key: string, fallback: number, min: number, max: number): number {
  const raw = record[key];
  if (raw === undefined || raw === null || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number: ${String(raw)}`);
  }
  if (value < min || value > max) {
    throw new Error(`${key} out of range ${min}-${max}: ${value}`);
  }
  return value;
}

function readInt(record: Record<string, unknown>, key: string, fallback: number, min: number, max: number): number {
  return Math.trunc(readNumber(record, key, fallback, min, max));
}

function readString(record: Record<string, unknown>, key: string, fallback: string): string {
  const value = String(record[key] ?? "").trim();
  return value || fallback;
}

export function parseDigestConfig(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): DigestConfig {
  const merged: Record<string, unknown> = {
    ...raw,
    model: env.MISTRAL_MODEL || raw.model,
    base_url: env.MISTRAL_BASE_URL || raw.base_url,
    min_story_count: env.DIGEST_MIN_STORY_COUNT || raw.min_story_count,
  };
  const defaults = DEFAULT_DIGEST_CONFIG;

  const config: DigestConfig = {
    model: readString(merged, "model", defaults.model),
    baseUrl: readString(merged, "base_url", defaults.baseUrl).replace(/\/+$/, ""),
    timeoutSeconds: readNumber(merged, "timeout_seconds", defaults.timeoutSeconds, 1, 600),
    temperature: readNumber(merged, "temperature", defaults.temperature, 0, 2),
    maxTokens: readInt(merged, "max_tokens", defaults.maxTokens, 1, 32_768),
    maxPromptArticles: readInt(merged, "max_prompt_articles", defaults.maxPromptArticles, 1, 200),
    excerptChars: readInt(merged, "excerpt_chars", defaults.excerptChars, 1, 10_000),
    requestedStoryCount: readInt(merged, "requested_story_count", defaults.requestedStoryCount, 1, 100),
    minStoryCount: readInt(merged, "min_story_count", defaults.minStoryCount, 0, 100),
    maxDirectArticles: readInt(merged, "max_direct_articles", defaults.maxDirectArticles, 1, 100),
  };

  if (config.minStoryCount > config.requestedStoryCount) {
    throw new Error(
      `min_story_count (${config.minStoryCount}) cannot exceed requested_story_count (${config.requestedStoryCount})`,
    );
  }
  return config;
}

export function loadDigestConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): DigestConfig {
  const filePath = configPath || path.join(DEFAULT_CONFIG_DIR, "digest.yaml");
  const raw = fs.existsSync(filePath) ? loadYaml(filePath) : {};
  return parseDigestConfig(raw, env);
}

export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string {
  return String(env.MISTRAL_API_KEY || "").trim();
}

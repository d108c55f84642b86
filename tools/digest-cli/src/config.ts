import { loadDigestConfig, resolveApiKey } from "@/lib/config-loader";
import type { DigestConfig } from "@/lib/domain/models";
import { errorMessage } from "@/lib/infra/errors";
import { CliError } from "./errors";

export interface RuntimeOptionInput {
  config?: string;
  timeoutMs?: number;
  minStories?: number;
  json?: boolean;
}

export interface RuntimeContext {
  digest: DigestConfig;
  apiKey: string;
  json: boolean;
}

function normalizeString(value: unknown): string {
  return String(value ?? "").trim();
}

export function parseBoundedInt(label: string, value: unknown, min: number, max: number): number {
  const text = normalizeString(value);
  const parsed = Number.parseInt(text, 10);
  if (!Number.isFinite(parsed)) {
    throw new CliError(1, `${label} is not a valid integer: ${text}`);
  }
  if (parsed < min || parsed > max) {
    throw new CliError(1, `${label} out of range ${min}-${max}: ${parsed}`);
  }
  return parsed;
}

export function maskSecret(secret: string): string {
  if (!secret) return "(not set)";
  if (secret.length <= 8) return "****";
  return `${secret.slice(0, 4)}…${secret.slice(-2)}`;
}

export function resolveRuntimeContext(options: RuntimeOptionInput): RuntimeContext {
  const configPath = normalizeString(options.config || process.env.DIGEST_CONFIG) || undefined;

  let digest: DigestConfig;
  try {
    digest = loadDigestConfig(configPath);
  } catch (error) {
    throw new CliError(1, `Invalid digest configuration: ${errorMessage(error)}`, {
      path: configPath,
      hint: "Check config/digest.yaml or the MISTRAL_* / DIGEST_* environment variables",
    });
  }

  if (options.timeoutMs !== undefined) {
    digest = { ...digest, timeoutSeconds: parseBoundedInt("timeout-ms", options.timeoutMs, 1_000, 600_000) / 1_000 };
  }
  if (options.minStories !== undefined) {
    const minStoryCount = parseBoundedInt("min-stories", options.minStories, 0, digest.requestedStoryCount);
    digest = { ...digest, minStoryCount };
  }

  return {
    digest,
    apiKey: resolveApiKey(),
    json: Boolean(options.json),
  };
}

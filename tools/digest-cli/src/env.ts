import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";

function candidateEnvFiles(explicit?: string): string[] {
  const cwd = process.cwd();
  const candidates = [resolve(cwd, ".env"), resolve(cwd, "../.env"), resolve(__dirname, "../../../.env")];
  if (explicit) {
    candidates.unshift(resolve(cwd, explicit));
  }
  return Array.from(new Set(candidates));
}

/** Loads .env files without overriding variables already set in the shell. */
export function bootstrapEnvFromDotenv(explicit = process.env.DIGEST_ENV_FILE): string[] {
  const loaded: string[] = [];
  for (const filePath of candidateEnvFiles(explicit)) {
    if (!existsSync(filePath)) {
      continue;
    }
    loadDotenv({
      path: filePath,
      override: false,
    });
    loaded.push(filePath);
  }
  return loaded;
}

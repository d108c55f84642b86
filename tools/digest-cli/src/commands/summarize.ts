import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { summarizeNews } from "@/lib/digest-runner";
import { MODE_TRANSLATED, type SummaryResult } from "@/lib/domain/models";
import { errorMessage, isRecord } from "@/lib/infra/errors";
import { createConsoleLogger } from "@/lib/infra/logger";
import { renderDigestDocument } from "@/lib/output/document-writer";
import { type RuntimeOptionInput, resolveRuntimeContext } from "../config";
import { CliError } from "../errors";
import { type CommandResult, printInfoLine, printSuccessLine, printWarnLine } from "../output";

export interface SummarizeCommandOptions extends RuntimeOptionInput {
  input: string;
  out?: string;
  document?: boolean;
}

export async function readArticleFile(filePath: string): Promise<unknown> {
  const absolute = resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = await readFile(absolute, "utf-8");
  } catch (error) {
    throw new CliError(1, `Cannot read article file: ${errorMessage(error)}`, { path: absolute });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CliError(1, "Article file is not valid JSON", {
      path: absolute,
      hint: "Expected a JSON array of {title, source, url, content} objects",
    });
  }

  // Scraper dumps wrap the list as {"articles": [...]}
  if (isRecord(parsed) && Array.isArray(parsed.articles)) {
    return parsed.articles;
  }
  return parsed;
}

function statusLines(result: SummaryResult, outPath?: string): string[] {
  const lines =
    result.mode === MODE_TRANSLATED
      ? [printSuccessLine(`Translated digest with ${result.articleCount} stories`)]
      : [printWarnLine(`Direct digest of ${result.articleCount} original articles`)];
  lines.push(printInfoLine("Sources", result.sources.join(", ") || "-"));
  if (result.error) {
    lines.push(printWarnLine(`Reason: ${result.error}`));
  }
  for (const warning of result.warnings) {
    lines.push(printWarnLine(warning));
  }
  if (outPath) {
    lines.push(printInfoLine("Written to", outPath));
  }
  return lines;
}

export async function executeSummarizeCommand(options: SummarizeCommandOptions): Promise<CommandResult> {
  const runtime = resolveRuntimeContext(options);
  const input = await readArticleFile(options.input);

  const result = await summarizeNews(input, {
    config: runtime.digest,
    apiKey: runtime.apiKey,
    logger: createConsoleLogger("digest"),
  });

  const html = options.document ? renderDigestDocument(result) : result.htmlContent;
  let outPath: string | undefined;
  if (options.out) {
    outPath = resolve(process.cwd(), options.out);
    try {
      await writeFile(outPath, html, "utf-8");
    } catch (error) {
      throw new CliError(2, `Cannot write digest: ${errorMessage(error)}`, { path: outPath });
    }
  }

  return {
    payload: { ok: true, ...result, ...(options.document ? { htmlDocument: html } : {}), outPath },
    rawText: outPath ? undefined : html,
    lines: statusLines(result, outPath),
  };
}

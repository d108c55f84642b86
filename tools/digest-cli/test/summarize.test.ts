import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { executeSummarizeCommand, readArticleFile } from "../src/commands/summarize";
import { createTestServer, readJsonBody, sendJson, type TestServer } from "./http_server";

const ORIGINAL_ENV = { ...process.env };

const ARTICLES = Array.from({ length: 6 }, (_, index) => ({
  title: `Είδηση ${index + 1}`,
  source: index % 2 === 0 ? "Kathimerini" : "Naftemporiki",
  url: `https://www.example.gr/news/${index + 1}`,
  content: `Πρώτη πρόταση της είδησης ${index + 1} με αρκετό μήκος. Δεύτερη πρόταση της είδησης.`,
}));

function translatedHtml(count: number): string {
  const stories = ARTICLES.slice(0, count).map(
    (article, index) =>
      `<h2>${index + 1}. News ${index + 1}</h2><p>Summary.</p><p class="source">Source: ${article.source}</p>` +
      `<p><a href="${article.url}">Read Full Article</a></p>`,
  );
  return `<h1>Greek News Summary</h1>${stories.join("")}`;
}

let server: TestServer | null = null;
let workDir = "";

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "greek-digest-"));
  process.env.MISTRAL_API_KEY = "test-key";
  delete process.env.MISTRAL_MODEL;
  delete process.env.DIGEST_MIN_STORY_COUNT;
  delete process.env.DIGEST_CONFIG;
});

afterEach(async () => {
  process.env = { ...ORIGINAL_ENV };
  if (server) {
    await server.close();
    server = null;
  }
  await rm(workDir, { recursive: true, force: true });
});

async function writeArticles(content: unknown): Promise<string> {
  const filePath = join(workDir, "articles.json");
  await writeFile(filePath, JSON.stringify(content), "utf-8");
  return filePath;
}

describe("executeSummarizeCommand", () => {
  it("returns the translated digest from the chat completion endpoint", async () => {
    let requestBody: unknown = null;
    server = await createTestServer(async (req, res) => {
      expect(req.url).toBe("/v1/chat/completions");
      expect(req.headers.authorization).toBe("Bearer test-key");
      requestBody = await readJsonBody(req);
      sendJson(res, 200, {
        choices: [{ message: { role: "assistant", content: translatedHtml(5) }, finish_reason: "stop" }],
      });
    });
    process.env.MISTRAL_BASE_URL = server.baseUrl;

    const result = await executeSummarizeCommand({ input: await writeArticles(ARTICLES), json: true });

    expect(result.payload).toMatchObject({
      ok: true,
      mode: "translated",
      articleCount: 5,
      error: null,
      sources: ["Kathimerini", "Naftemporiki"],
    });
    expect(requestBody).toMatchObject({ model: "mistral-small", max_tokens: 3072 });
    expect(result.rawText).toContain('<a href="https://www.example.gr/news/1" target="_blank" class="article-link">');
  });

  it("falls back to the direct digest on a rate limit", async () => {
    let requests = 0;
    server = await createTestServer((_req, res) => {
      requests += 1;
      sendJson(res, 429, { message: "Requests rate limit exceeded" });
    });
    process.env.MISTRAL_BASE_URL = server.baseUrl;

    const result = await executeSummarizeCommand({ input: await writeArticles({ articles: ARTICLES }) });

    expect(result.payload).toMatchObject({ mode: "direct", articleCount: 6 });
    expect(result.rawText).toContain("rate limit");
    expect(result.rawText).toContain("<h2>1. Είδηση 1</h2>");
    expect(requests).toBe(1);
  });

  it("writes a standalone document when asked", async () => {
    delete process.env.MISTRAL_API_KEY;
    const outPath = join(workDir, "digest.html");

    const result = await executeSummarizeCommand({
      input: await writeArticles(ARTICLES),
      out: outPath,
      document: true,
    });

    const written = await readFile(outPath, "utf-8");
    expect(written.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(written).toContain("Translation unavailable: Translation service is not configured");
    expect(result.rawText).toBeUndefined();
    expect(result.payload).toMatchObject({ mode: "direct", outPath });
  });

  it("rejects a missing input file with exit code 1", async () => {
    await expect(executeSummarizeCommand({ input: join(workDir, "missing.json") })).rejects.toMatchObject({
      code: 1,
    });
  });

  it("rejects an input file that is not JSON", async () => {
    const filePath = join(workDir, "broken.json");
    await writeFile(filePath, "{not json", "utf-8");
    await expect(readArticleFile(filePath)).rejects.toMatchObject({
      code: 1,
      message: "Article file is not valid JSON",
    });
  });
});

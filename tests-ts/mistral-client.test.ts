import { afterEach, describe, expect, it } from "vitest";
import { MistralClient, classifyNetworkError } from "@/lib/llm/mistral-client";
import { buildPrompt } from "@/lib/llm/prompt-builder";
import { completionBody, sampleArticles } from "./fixtures";

const originalFetch = globalThis.fetch;

interface CapturedRequest {
  url: string;
  init?: RequestInit;
}

function stubFetch(respond: (request: CapturedRequest) => Promise<Response> | Response): CapturedRequest[] {
  const calls: CapturedRequest[] = [];
  globalThis.fetch = (async (input: RequestInfo | URL, init?: RequestInit) => {
    const request = { url: String(input instanceof URL ? input.toString() : input), init };
    calls.push(request);
    return respond(request);
  }) as typeof fetch;
  return calls;
}

function client(apiKey = "test-key", timeoutSeconds?: number): MistralClient {
  return new MistralClient({ apiKey, timeoutSeconds });
}

const payload = buildPrompt(sampleArticles(3));

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("MistralClient", () => {
  it("short-circuits without a network call when the key is missing", async () => {
    const calls = stubFetch(() => new Response(completionBody("<h1>x</h1>")));
    await expect(client("  ").call(payload)).resolves.toEqual({ kind: "missing_credential" });
    expect(calls).toHaveLength(0);
  });

  it("posts the chat completion request with a bearer token", async () => {
    const calls = stubFetch(() => new Response(completionBody("<h1>Greek News Summary</h1>")));
    const outcome = await client().call(payload);

    expect(outcome).toEqual({
      kind: "success",
      rawText: "<h1>Greek News Summary</h1>",
      finishReason: "stop",
      truncated: false,
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://api.mistral.ai/v1/chat/completions");
    expect(calls[0].init?.method).toBe("POST");
    expect(new Headers(calls[0].init?.headers).get("authorization")).toBe("Bearer test-key");

    const body = JSON.parse(String(calls[0].init?.body));
    expect(body).toMatchObject({
      model: "mistral-small",
      temperature: 0.2,
      max_tokens: 3072,
      response_format: { type: "text" },
    });
    expect(body.messages).toEqual(payload.messages);
  });

  it("flags length-truncated completions without failing", async () => {
    stubFetch(() => new Response(completionBody("<h1>partial", "length")));
    await expect(client().call(payload)).resolves.toMatchObject({
      kind: "success",
      finishReason: "length",
      truncated: true,
    });
  });

  it("keeps the structured error body of a non-200 response", async () => {
    const calls = stubFetch(
      () => new Response(JSON.stringify({ message: "Requests rate limit exceeded" }), { status: 429 }),
    );
    await expect(client().call(payload)).resolves.toEqual({
      kind: "api_error",
      status: 429,
      body: { message: "Requests rate limit exceeded" },
    });
    expect(calls).toHaveLength(1);
  });

  it("keeps raw text when the error body is not JSON", async () => {
    stubFetch(() => new Response("upstream down", { status: 502 }));
    await expect(client().call(payload)).resolves.toEqual({ kind: "api_error", status: 502, body: "upstream down" });
  });

  it("reports a 200 response without choices as malformed", async () => {
    stubFetch(() => new Response(JSON.stringify({ id: "cmpl-test", choices: [] })));
    await expect(client().call(payload)).resolves.toMatchObject({ kind: "malformed_payload" });
  });

  it("reports a non-JSON 200 response as malformed", async () => {
    stubFetch(() => new Response("<html>gateway</html>"));
    await expect(client().call(payload)).resolves.toEqual({
      kind: "malformed_payload",
      reason: "response body is not valid JSON",
    });
  });

  it("classifies connection failures as network errors", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } });
    });
    await expect(client().call(payload)).resolves.toEqual({
      kind: "network_error",
      errorKind: "connection",
      message: "fetch failed",
    });
  });

  it("gives up after the configured timeout", async () => {
    stubFetch(
      ({ init }) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener(
            "abort",
            () => reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" })),
            { once: true },
          );
        }),
    );

    const startedAt = Date.now();
    await expect(client("test-key", 1).call(payload)).resolves.toEqual({
      kind: "network_error",
      errorKind: "timeout",
      message: "Request timed out after 1000ms",
    });
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });
});

describe("classifyNetworkError", () => {
  it("recognises TLS failures from the error cause", () => {
    expect(classifyNetworkError(new TypeError("fetch failed", { cause: { code: "CERT_HAS_EXPIRED" } }))).toBe("tls");
  });

  it("recognises undici timeouts", () => {
    expect(classifyNetworkError(new TypeError("fetch failed", { cause: { code: "UND_ERR_CONNECT_TIMEOUT" } }))).toBe(
      "timeout",
    );
  });
});

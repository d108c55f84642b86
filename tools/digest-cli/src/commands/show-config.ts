import { type RuntimeOptionInput, maskSecret, resolveRuntimeContext } from "../config";
import { type CommandResult, printInfoLine, printWarnLine } from "../output";

export async function executeShowConfigCommand(options: RuntimeOptionInput): Promise<CommandResult> {
  const runtime = resolveRuntimeContext(options);
  const { digest } = runtime;

  const lines = [
    printInfoLine("Model", digest.model),
    printInfoLine("Endpoint", `${digest.baseUrl}/v1/chat/completions`),
    printInfoLine("Timeout (s)", String(digest.timeoutSeconds)),
    printInfoLine("Prompt articles", String(digest.maxPromptArticles)),
    printInfoLine("Stories requested / required", `${digest.requestedStoryCount} / ${digest.minStoryCount}`),
    printInfoLine("API key", maskSecret(runtime.apiKey)),
  ];
  if (!runtime.apiKey) {
    lines.push(printWarnLine("MISTRAL_API_KEY is not set; every run will use the direct digest"));
  }

  return {
    payload: { ok: true, ...digest, apiKey: maskSecret(runtime.apiKey) },
    lines,
  };
}

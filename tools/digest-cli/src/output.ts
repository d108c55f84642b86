import pc from "picocolors";

export interface CommandResult {
  payload: unknown;
  lines?: string[];
  rawText?: string;
}

export function printCommandResult(result: CommandResult, jsonMode: boolean): void {
  if (jsonMode) {
    process.stdout.write(`${JSON.stringify(result.payload, null, 2)}\n`);
    return;
  }
  if (typeof result.rawText === "string") {
    if (result.rawText.length === 0) {
      return;
    }
    process.stdout.write(result.rawText.endsWith("\n") ? result.rawText : `${result.rawText}\n`);
  }
  // Status lines share stderr with the logs when stdout carries the HTML.
  const stream = typeof result.rawText === "string" ? process.stderr : process.stdout;
  for (const line of result.lines || []) {
    stream.write(`${line}\n`);
  }
}

export function printSuccessLine(text: string): string {
  return `${pc.green("✔")} ${text}`;
}

export function printWarnLine(text: string): string {
  return `${pc.yellow("!")} ${text}`;
}

export function printInfoLine(label: string, value: string): string {
  return `${pc.dim(`${label}:`)} ${value}`;
}

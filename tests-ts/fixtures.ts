import type { Article } from "@/lib/domain/models";

const SOURCES = ["Kathimerini", "in.gr", "Protothema"];

export function sampleArticles(count: number): Article[] {
  return Array.from({ length: count }, (_, index) => ({
    title: `Τίτλος άρθρου ${index + 1}`,
    source: SOURCES[index % SOURCES.length],
    url: `https://www.example.gr/ειδήσεις/άρθρο-${index + 1}/`,
    content: `Η κυβέρνηση ανακοίνωσε νέα μέτρα για το θέμα ${index + 1}. Η αντιπολίτευση αντέδρασε έντονα. Η συζήτηση συνεχίζεται.`,
  }));
}

export function storyBlocks(urls: string[]): string {
  return urls
    .map((url, index) =>
      [
        `<h2>${index + 1}. Story ${index + 1}</h2>`,
        `<p>Summary of story ${index + 1}.</p>`,
        '<p class="source">Source: Kathimerini</p>',
        `<p><a href="${url}">Read Full Article</a></p>`,
      ].join("\n"),
    )
    .join("\n");
}

export function modelOutput(urls: string[]): string {
  return `<h1>Greek News Summary</h1>\n${storyBlocks(urls)}`;
}

export function completionBody(content: string, finishReason = "stop"): string {
  return JSON.stringify({
    id: "cmpl-test",
    object: "chat.completion",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: finishReason }],
  });
}

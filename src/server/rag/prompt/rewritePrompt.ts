import type { Turn } from "../types.ts";

export const REWRITE_PROMPT_SUFFIX = "Standalone question:";

function oneLine(input: string): string {
  return String(input || "")
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

export function formatHistoryLine(turn: Pick<Turn, "role" | "content">): string {
  return `${turn.role === "user" ? "User" : "Assistant"}: ${oneLine(turn.content)}`;
}

export function buildRewritePrompt(history: readonly Turn[], utterance: string): string {
  const lines = history.map(formatHistoryLine);

  return (
    `Rewrite the follow-up question so it can be understood without the conversation.\n` +
    `- Resolve pronouns and elliptical references using the conversation.\n` +
    `- Keep the meaning and language of the follow-up question.\n` +
    `- Do NOT answer the question.\n` +
    `- Output only the standalone question on a single line.\n` +
    `\n` +
    `Conversation:\n` +
    (lines.length ? lines.join("\n") : "(empty)") +
    `\n\n` +
    `Follow-up question: ${oneLine(utterance)}\n` +
    `\n` +
    REWRITE_PROMPT_SUFFIX
  );
}

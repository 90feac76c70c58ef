import type { RetrievedChunk, Turn } from "../types.ts";
import { formatHistoryLine } from "./rewritePrompt.ts";

export const NOT_FOUND_ANSWER = "I could not find this in the provided documents.";

export interface AnswerPromptInput {
  question: string;
  chunks: readonly Pick<RetrievedChunk, "chunkId" | "documentId" | "text">[];
  history: readonly Turn[];
  degraded?: boolean;
  /** Most recent turns to include. */
  historyTurns: number;
  /** Character budget for the history block; older turns drop first. */
  historyMaxChars: number;
}

function oneLine(input: string): string {
  return String(input || "")
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

function sourceTag(chunk: Pick<RetrievedChunk, "chunkId" | "documentId">): string {
  // Keep the citation format strict and machine-parseable.
  // Example: [source: handbook chunk:handbook:1a2b3c4d:0]
  return `[source: ${oneLine(chunk.documentId)} chunk:${oneLine(chunk.chunkId)}]`;
}

/** Newest turns that fit both limits, returned oldest first. */
export function selectHistoryWindow(history: readonly Turn[], maxTurns: number, maxChars: number): string[] {
  const turns = Math.max(0, Math.floor(maxTurns));
  if (turns === 0) { return []; }

  const out: string[] = [];
  let used = 0;
  for (const turn of history.slice(-turns).reverse()) {
    const line = formatHistoryLine(turn);
    if (used + line.length > maxChars) { break; }
    used += line.length;
    out.push(line);
  }
  return out.reverse();
}

export function buildAnswerPrompt(input: AnswerPromptInput): string {
  const question = oneLine(input.question);

  const contextLines = input.chunks.map((c, i) => `${i + 1}) ${sourceTag(c)} ${oneLine(c.text)}`);
  const historyLines = selectHistoryWindow(input.history, input.historyTurns, input.historyMaxChars);

  return (
    `Answer ONLY using the provided context snippets from the uploaded documents.\n` +
    `Do not use outside knowledge. Do not guess.\n` +
    `If the context does not contain enough information to answer, reply exactly: "${NOT_FOUND_ANSWER}"\n` +
    `\n` +
    `Citation format (STRICT): [source: <documentId> chunk:<chunkId>]\n` +
    `- Use ONLY chunk ids that appear in the provided context.\n` +
    `- Every sentence that states a fact from the context must include at least one citation.\n` +
    `\n` +
    (input.degraded ? `Note: the retrieved context is a weak match for the question. Prefer the not-found reply over guessing.\n\n` : "") +
    `Context:\n` +
    contextLines.join("\n") +
    `\n\n` +
    `Conversation so far:\n` +
    (historyLines.length ? historyLines.join("\n") : "(none)") +
    `\n\n` +
    `Question: ${question}\n` +
    `\n` +
    `Answer:`
  );
}

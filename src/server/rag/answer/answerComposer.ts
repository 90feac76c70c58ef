import type { RagConfig } from "../config.ts";
import type { ConversationStore } from "../conversation/sessionStore.ts";
import { RagError, toRagError } from "../errors.ts";
import { debugRag, logRagError } from "../log.ts";
import { NOT_FOUND_ANSWER, buildAnswerPrompt } from "../prompt/buildPrompt.ts";
import type { RetrieveFilters, Retriever } from "../retrieve/retriever.ts";
import { rewriteQuery } from "../rewrite/rewriteQuery.ts";
import { callService } from "../service/callService.ts";
import type { Generator } from "../types.ts";

export interface AnswerSource {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  score: number;
  excerpt: string;
}

export interface AnswerResult {
  sessionId: string;
  answer: string;
  sources: AnswerSource[];
  rewrittenQuery: string;
  /** False when nothing was retrieved or the model gave the not-found reply. */
  grounded: boolean;
  degraded: boolean;
}

export interface AnswerOptions {
  k?: number;
  filters?: RetrieveFilters;
  signal?: AbortSignal;
}

export type AnswerComposerConfig = Pick<
  RagConfig,
  "rewriteExchanges" | "historyTurns" | "historyMaxChars" | "serviceTimeoutMs"
>;

export interface AnswerComposerDeps {
  sessions: ConversationStore;
  retriever: Retriever;
  generator: Generator;
  config: AnswerComposerConfig;
}

export interface AnswerComposer {
  answer(sessionId: string, utterance: string, opts?: AnswerOptions): Promise<AnswerResult>;
}

function excerpt(text: string, maxChars = 240): string {
  const s = String(text ?? "");
  return s.length <= maxChars ? s : s.slice(0, maxChars);
}

export function createAnswerComposer(deps: AnswerComposerDeps): AnswerComposer {
  const { config } = deps;

  return {
    async answer(sessionId, utteranceRaw, opts): Promise<AnswerResult> {
      const utterance = String(utteranceRaw ?? "").trim();
      if (!utterance) { throw new RagError("invalid_input", "question is required"); }

      // Unknown or deleted sessions fail here, before any service call.
      const history = await deps.sessions.getHistory(sessionId);
      const k = deps.retriever.resolveK(opts?.k);

      const rewrite = await rewriteQuery({
        generator: deps.generator,
        history,
        utterance,
        maxExchanges: config.rewriteExchanges,
        timeoutMs: config.serviceTimeoutMs,
        ...(opts?.signal ? { signal: opts.signal } : {}),
      });

      const retrieval = await deps.retriever.retrieve(
        rewrite.query,
        k,
        opts?.filters,
        opts?.signal ? { signal: opts.signal } : undefined,
      );

      let answer = NOT_FOUND_ANSWER;
      if (retrieval.items.length > 0) {
        const prompt = buildAnswerPrompt({
          question: utterance,
          chunks: retrieval.items,
          history,
          degraded: retrieval.degraded,
          historyTurns: config.historyTurns,
          historyMaxChars: config.historyMaxChars,
        });

        try {
          const generated = await callService((signal) => deps.generator.generate(prompt, { signal }), {
            timeoutMs: config.serviceTimeoutMs,
            retries: 1,
            label: "answer generation",
            ...(opts?.signal ? { signal: opts.signal } : {}),
          });
          answer = generated.trim() || NOT_FOUND_ANSWER;
        } catch (error: unknown) {
          const cause = toRagError(error);
          if (cause.kind === "aborted") { throw cause; }
          logRagError("rag.answer", `generation failed for session ${sessionId}: ${cause.kind}: ${cause.message}`);
          throw new RagError("generation_failed", `Answer generation failed: ${cause.message}`, { cause });
        }
      }

      const retrievedChunkIds = retrieval.items.map((i) => i.chunkId);
      await deps.sessions.appendTurns(sessionId, [
        { role: "user", content: utterance },
        { role: "assistant", content: answer, retrievedChunkIds },
      ]);

      const grounded = retrieval.items.length > 0 && answer !== NOT_FOUND_ANSWER;
      debugRag("rag.answer", "answered", {
        sessionId,
        rewrittenQuery: rewrite.query,
        sources: retrievedChunkIds.length,
        grounded,
        degraded: retrieval.degraded,
      });

      return {
        sessionId,
        answer,
        sources: retrieval.items.map((i) => ({
          chunkId: i.chunkId,
          documentId: i.documentId,
          sequenceIndex: i.sequenceIndex,
          score: i.score,
          excerpt: excerpt(i.text),
        })),
        rewrittenQuery: rewrite.query,
        grounded,
        degraded: retrieval.degraded,
      };
    },
  };
}

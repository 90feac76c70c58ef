import { RagError } from "../errors.ts";
import { postOllamaJson } from "../service/ollamaHttp.ts";
import type { GenerateOptions, Generator } from "../types.ts";

export interface OllamaGeneratorOptions {
  baseUrl: string;
  model: string;
  temperature?: number;
}

export function createOllamaGenerator({ baseUrl, model, temperature = 0 }: OllamaGeneratorOptions): Generator {
  const configuredModel = String(model || "").trim();
  if (!configuredModel) { throw new RagError("invalid_config", "OLLAMA_CHAT_MODEL is empty"); }

  return {
    async generate(prompt: string, opts?: GenerateOptions): Promise<string> {
      const preparedPrompt = String(prompt ?? "").trim();
      if (!preparedPrompt) { throw new RagError("invalid_input", "generate requires a non-empty prompt"); }

      const json = await postOllamaJson(
        baseUrl,
        "/api/generate",
        {
          model: configuredModel,
          prompt: preparedPrompt,
          stream: false,
          options: { temperature },
        },
        opts?.signal,
        `Ollama generate (model "${configuredModel}")`,
      );

      const responseText =
        json && typeof json === "object"
          ? (json as { response?: unknown }).response
          : undefined;

      if (typeof responseText !== "string") {
        throw new RagError(
          "service_unavailable",
          `Ollama /api/generate did not return a text response for model "${configuredModel}"`,
        );
      }

      const doneReason = (json as { done_reason?: unknown }).done_reason;
      if (doneReason === "content_filter") {
        throw new RagError("content_filtered", `Generation for model "${configuredModel}" was filtered`);
      }

      return responseText.trim();
    },
  };
}

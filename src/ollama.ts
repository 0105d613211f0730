import { z } from "zod";
import { AnswerGenerationError, EmbeddingServiceError, errorMessage, type RagError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 60_000;

export interface OllamaOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const embeddingResponse = z.object({
  embedding: z.array(z.number())
});

const generateResponse = z.object({
  response: z.string()
});

type FailureFactory = (message: string, cause?: unknown) => RagError;

export class OllamaClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async postJson<T>(
    endpoint: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T>,
    fail: FailureFactory
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw fail(`Ollama request ${endpoint} timed out after ${this.timeoutMs}ms`, error);
      }
      throw fail(`Ollama request ${endpoint} failed: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      let payload: string;
      try {
        payload = await response.text();
      } catch (error) {
        throw fail(`Ollama request failed (${response.status}) ${endpoint}: ${errorMessage(error)}`, error);
      }
      throw fail(`Ollama request failed (${response.status}) ${endpoint}: ${payload}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw fail(`Ollama ${endpoint} returned invalid JSON`, error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw fail(`Ollama ${endpoint} response has unexpected shape`, parsed.error);
    }
    return parsed.data;
  }

  async embed(model: string, input: string): Promise<number[]> {
    const data = await this.postJson(
      "/api/embeddings",
      { model, prompt: input },
      embeddingResponse,
      (message, cause) => new EmbeddingServiceError(message, { operation: "embed", target: model, cause })
    );
    if (data.embedding.length === 0) {
      throw new EmbeddingServiceError("Ollama returned an empty embedding", { operation: "embed", target: model });
    }
    return data.embedding;
  }

  async generate(model: string, prompt: string): Promise<string> {
    const data = await this.postJson(
      "/api/generate",
      { model, prompt, stream: false },
      generateResponse,
      (message, cause) => new AnswerGenerationError(message, { operation: "generate", target: model, cause })
    );
    return data.response.trim();
  }
}

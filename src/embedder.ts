import { EmbeddingServiceError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { OllamaClient } from "./ollama.js";
import { normalize } from "./vector.js";

/** The embedding capability shared by the retriever and the vector store. */
export interface EmbeddingFunction {
  readonly model: string;
  readonly dimension: number;
  embedOne(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export type EmbeddingSpace = Pick<EmbeddingFunction, "model" | "dimension">;

export interface OllamaEmbedderOptions {
  model: string;
  expectedDimension?: number;
  logger?: Logger;
}

const SELF_CHECK_TEXT = "test";

export class OllamaEmbedder implements EmbeddingFunction {
  private constructor(
    private readonly client: OllamaClient,
    readonly model: string,
    readonly dimension: number,
    private readonly logger: Logger
  ) {}

  /** Embeds a probe text so an unreachable backend fails here rather than mid-build. */
  static async create(client: OllamaClient, options: OllamaEmbedderOptions): Promise<OllamaEmbedder> {
    const logger = options.logger ?? silentLogger;
    logger.info(`Using Ollama embedding model: ${options.model}`);

    let probe: number[];
    try {
      probe = await client.embed(options.model, SELF_CHECK_TEXT);
    } catch (error) {
      logger.error("Ollama is not running or the embedding model is missing", { model: options.model });
      throw error;
    }

    if (options.expectedDimension !== undefined && probe.length !== options.expectedDimension) {
      throw new EmbeddingServiceError(
        `Model ${options.model} produces ${probe.length}-dimensional vectors, expected ${options.expectedDimension}`,
        { operation: "createEmbedder", target: options.model }
      );
    }

    logger.info("Ollama embeddings ready", { dimension: probe.length });
    return new OllamaEmbedder(client, options.model, probe.length, logger);
  }

  async embedOne(text: string): Promise<number[]> {
    const vector = await this.client.embed(this.model, text);
    if (vector.length !== this.dimension) {
      throw new EmbeddingServiceError(
        `Embedding dimension changed from ${this.dimension} to ${vector.length}`,
        { operation: "embed", target: this.model }
      );
    }
    return normalize(vector);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    this.logger.info(`Generating embeddings for ${texts.length} documents (Ollama)...`);
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embedOne(text));
    }
    return vectors;
  }
}

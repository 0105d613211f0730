import type { EmbeddingFunction } from "./embedder.js";
import { EmptyInputError, NotInitializedError, VectorIndexError, errorMessage } from "./errors.js";
import { collectionLocks, type KeyedLock } from "./lock.js";
import { silentLogger, type Logger } from "./logger.js";
import { INSERT_BATCH_SIZE, batches, collectionName, type Collection, type VectorStore } from "./store.js";
import type { Chunk, RetrievalResult, VectorRecord } from "./types.js";
import { distanceToSimilarity } from "./vector.js";

export const DEFAULT_TOP_K = 5;

export interface RetrieverOptions {
  store: VectorStore;
  embedder: EmbeddingFunction;
  topK?: number;
  logger?: Logger;
  locks?: KeyedLock;
}

export interface BuildOptions {
  /** Drop whatever the collection holds and index from scratch. */
  rebuild?: boolean;
}

export interface BuildResult {
  collectionName: string;
  cached: boolean;
  recordCount: number;
}

export interface RetrieverStats {
  collectionName: string | null;
  documents: number;
  records: number;
}

export function formatContext(results: RetrievalResult[]): string {
  return results
    .map(({ chunk, score }, i) => `--- Document ${i + 1} (Score: ${score.toFixed(3)}) ---\n${chunk.content}`)
    .join("\n\n");
}

export class Retriever {
  private readonly store: VectorStore;
  private readonly embedder: EmbeddingFunction;
  private readonly topK: number;
  private readonly logger: Logger;
  private readonly locks: KeyedLock;

  private collection: Collection | null = null;
  private documents: Chunk[] = [];

  constructor(options: RetrieverOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.logger = options.logger ?? silentLogger;
    this.locks = options.locks ?? collectionLocks;
  }

  get collectionName(): string | null {
    return this.collection?.name ?? null;
  }

  async attach(repoName: string): Promise<Collection> {
    const name = collectionName(repoName);
    this.collection = await this.store.createOrGet(name, this.embedder);
    this.logger.debug(`Collection ready: ${name}`);
    return this.collection;
  }

  /** True when the repository's collection holds a finished build. A missing collection is not created. */
  async isPopulated(repoName: string): Promise<boolean> {
    if (!(await this.store.list()).includes(collectionName(repoName))) {
      return false;
    }
    const collection = await this.attach(repoName);
    return this.isComplete(collection);
  }

  async buildIndex(documents: Chunk[], repoName: string, options: BuildOptions = {}): Promise<BuildResult> {
    const name = collectionName(repoName);
    if (documents.length === 0) {
      throw new EmptyInputError("No documents provided for indexing", { operation: "buildIndex", target: name });
    }

    return this.locks.run(name, async () => {
      if (options.rebuild) {
        this.logger.info(`Deleting old index ${name} before rebuild`);
        await this.discard(name);
      }

      let collection = await this.attach(repoName);
      const existing = await collection.count();

      if (existing > 0 && (await this.isComplete(collection))) {
        this.logger.info(`Collection '${name}' already has ${existing} documents`);
        this.documents = documents;
        return { collectionName: name, cached: true, recordCount: existing };
      }

      if (existing > 0) {
        this.logger.warn(`Collection '${name}' holds ${existing} records from an unfinished build; starting over`);
        await this.discard(name);
        collection = await this.attach(repoName);
        const remaining = await collection.count();
        if (remaining > 0) {
          throw new VectorIndexError(`Could not clear unfinished collection ${name} (${remaining} records left)`, {
            operation: "buildIndex",
            target: name
          });
        }
      }

      this.logger.info(`Building index with ${documents.length} documents...`);
      this.documents = documents;
      await collection.writeState("building", 0);

      const vectors = await this.embedder.embedMany(documents.map((doc) => doc.content));
      if (vectors.length !== documents.length) {
        throw new VectorIndexError(
          `Embedding count mismatch: expected ${documents.length} embeddings, received ${vectors.length}`,
          { operation: "buildIndex", target: name }
        );
      }

      const records: VectorRecord[] = documents.map((doc, index) => ({
        id: `doc_${index}`,
        text: doc.content,
        vector: vectors[index] ?? [],
        metadata: { filePath: doc.filePath, language: doc.language, chunkId: doc.chunkId }
      }));

      for (const batch of batches(records, INSERT_BATCH_SIZE)) {
        await collection.add(batch);
      }

      await collection.writeState("complete", records.length);
      this.logger.info("Index built successfully", { collection: name, records: records.length });
      return { collectionName: name, cached: false, recordCount: records.length };
    });
  }

  async retrieve(query: string, topK?: number): Promise<RetrievalResult[]> {
    const collection = this.requireCollection("retrieve");
    const k = topK ?? this.topK;

    const queryVector = await this.embedder.embedOne(query);
    const limit = Math.min(k, await collection.count());
    const matches = await collection.query(queryVector, limit);

    return matches.map((match) => ({
      chunk: {
        content: match.text,
        filePath: match.metadata.filePath,
        language: match.metadata.language,
        chunkId: match.metadata.chunkId
      },
      score: distanceToSimilarity(match.distance)
    }));
  }

  async getContextForQuery(query: string, topK?: number): Promise<string> {
    return formatContext(await this.retrieve(query, topK));
  }

  /** Best-effort removal; failures are logged and reported as false. */
  async deleteCollection(repoName: string): Promise<boolean> {
    return this.discard(collectionName(repoName));
  }

  async getStats(): Promise<RetrieverStats> {
    return {
      collectionName: this.collectionName,
      documents: this.documents.length,
      records: this.collection ? await this.collection.count() : 0
    };
  }

  private requireCollection(operation: string): Collection {
    if (!this.collection) {
      throw new NotInitializedError("Collection not initialized. Build or attach an index first.", { operation });
    }
    return this.collection;
  }

  private async isComplete(collection: Collection): Promise<boolean> {
    const [count, state] = await Promise.all([collection.count(), collection.readState()]);
    // Collections without build state predate completion tracking and are trusted as built.
    return count > 0 && (state === "complete" || state === null);
  }

  private async discard(name: string): Promise<boolean> {
    if (this.collection?.name === name) {
      this.collection = null;
      this.documents = [];
    }
    try {
      return await this.store.delete(name);
    } catch (error) {
      this.logger.warn(`Could not delete collection ${name}: ${errorMessage(error)}`);
      return false;
    }
  }
}

import type { EmbeddingSpace } from "./embedder.js";
import { VectorIndexError } from "./errors.js";
import type { QueryMatch, VectorRecord } from "./types.js";

export const INSERT_BATCH_SIZE = 500;
export const MAX_COLLECTION_NAME_LENGTH = 63;

export type BuildState = "empty" | "building" | "complete";

export interface CollectionManifest {
  version: 1;
  collection: string;
  embeddingModel: string;
  dimension: number;
  state: BuildState;
  recordCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface Collection {
  readonly name: string;
  readonly space: EmbeddingSpace;
  count(): Promise<number>;
  add(records: VectorRecord[]): Promise<void>;
  query(vector: number[], k: number): Promise<QueryMatch[]>;
  /** null when the collection carries no build state (data written by an older or foreign tool). */
  readState(): Promise<BuildState | null>;
  writeState(state: BuildState, recordCount?: number): Promise<void>;
}

export interface VectorStore {
  createOrGet(name: string, space: EmbeddingSpace): Promise<Collection>;
  delete(name: string): Promise<boolean>;
  list(): Promise<string[]>;
}

export function collectionName(repoName: string): string {
  const raw = `repo_${repoName}`.replace(/[-.]/g, "_");
  const filtered = raw.replace(/[^A-Za-z0-9_.-]/g, "");
  return filtered.slice(0, MAX_COLLECTION_NAME_LENGTH).toLowerCase();
}

export function* batches<T>(items: T[], size: number = INSERT_BATCH_SIZE): Generator<T[]> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size);
  }
}

export function newManifest(name: string, space: EmbeddingSpace): CollectionManifest {
  const now = new Date().toISOString();
  return {
    version: 1,
    collection: name,
    embeddingModel: space.model,
    dimension: space.dimension,
    state: "empty",
    recordCount: 0,
    createdAt: now,
    updatedAt: now
  };
}

export function assertSameSpace(manifest: CollectionManifest, space: EmbeddingSpace): void {
  if (manifest.embeddingModel !== space.model || manifest.dimension !== space.dimension) {
    throw new VectorIndexError(
      `Collection ${manifest.collection} was built with ${manifest.embeddingModel} (${manifest.dimension}d), ` +
        `not ${space.model} (${space.dimension}d). Rebuild the index to switch models.`,
      { operation: "createOrGet", target: manifest.collection }
    );
  }
}

export function validateRecords(name: string, space: EmbeddingSpace, records: VectorRecord[], existingIds: ReadonlySet<string>): void {
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.id) || existingIds.has(record.id)) {
      throw new VectorIndexError(`Duplicate record id ${record.id} in collection ${name}`, {
        operation: "add",
        target: name
      });
    }
    seen.add(record.id);
    if (record.vector.length !== space.dimension) {
      throw new VectorIndexError(
        `Record ${record.id} has ${record.vector.length} dimensions, collection ${name} expects ${space.dimension}`,
        { operation: "add", target: name }
      );
    }
  }
}

export function assertQueryDimension(name: string, space: EmbeddingSpace, vector: number[]): void {
  if (vector.length !== space.dimension) {
    throw new VectorIndexError(
      `Query vector has ${vector.length} dimensions, collection ${name} expects ${space.dimension}`,
      { operation: "query", target: name }
    );
  }
}

import type { EmbeddingSpace } from "./embedder.js";
import {
  assertQueryDimension,
  assertSameSpace,
  newManifest,
  validateRecords,
  type BuildState,
  type Collection,
  type CollectionManifest,
  type VectorStore
} from "./store.js";
import type { QueryMatch, VectorRecord } from "./types.js";
import { euclideanDistance } from "./vector.js";

interface MemoryEntry {
  manifest: CollectionManifest;
  records: VectorRecord[];
}

class MemoryCollection implements Collection {
  constructor(
    readonly name: string,
    readonly space: EmbeddingSpace,
    private readonly entry: MemoryEntry
  ) {}

  async count(): Promise<number> {
    return this.entry.records.length;
  }

  async add(records: VectorRecord[]): Promise<void> {
    validateRecords(this.name, this.space, records, new Set(this.entry.records.map((record) => record.id)));
    this.entry.records.push(...records.map((record) => ({ ...record, vector: [...record.vector] })));
  }

  async query(vector: number[], k: number): Promise<QueryMatch[]> {
    assertQueryDimension(this.name, this.space, vector);
    const limit = Math.min(k, this.entry.records.length);
    if (limit <= 0) {
      return [];
    }

    return this.entry.records
      .map((record) => ({
        text: record.text,
        metadata: { ...record.metadata },
        distance: euclideanDistance(vector, record.vector)
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);
  }

  async readState(): Promise<BuildState | null> {
    return this.entry.manifest.state;
  }

  async writeState(state: BuildState, recordCount?: number): Promise<void> {
    this.entry.manifest = {
      ...this.entry.manifest,
      state,
      recordCount: recordCount ?? this.entry.records.length,
      updatedAt: new Date().toISOString()
    };
  }
}

/** In-process store with the same contract as the on-disk one. Contents live as long as the instance. */
export class MemoryVectorStore implements VectorStore {
  private readonly entries = new Map<string, MemoryEntry>();

  async createOrGet(name: string, space: EmbeddingSpace): Promise<Collection> {
    let entry = this.entries.get(name);
    if (entry) {
      assertSameSpace(entry.manifest, space);
    } else {
      entry = { manifest: newManifest(name, space), records: [] };
      this.entries.set(name, entry);
    }
    return new MemoryCollection(name, space, entry);
  }

  async delete(name: string): Promise<boolean> {
    return this.entries.delete(name);
  }

  async list(): Promise<string[]> {
    return [...this.entries.keys()].sort();
  }
}

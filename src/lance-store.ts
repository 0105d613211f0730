import { access, mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import * as lancedb from "@lancedb/lancedb";
import { z } from "zod";
import type { EmbeddingSpace } from "./embedder.js";
import { VectorIndexError, errorMessage } from "./errors.js";
import {
  INSERT_BATCH_SIZE,
  assertQueryDimension,
  assertSameSpace,
  batches,
  newManifest,
  validateRecords,
  type BuildState,
  type Collection,
  type CollectionManifest,
  type VectorStore
} from "./store.js";
import type { QueryMatch, RecordMetadata, VectorRecord } from "./types.js";

const MANIFEST_SUFFIX = ".manifest.json";

const manifestSchema = z.object({
  version: z.literal(1),
  collection: z.string(),
  embeddingModel: z.string(),
  dimension: z.number().int().positive(),
  state: z.enum(["empty", "building", "complete"]),
  recordCount: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string()
});

function getManifestPath(storageDir: string, name: string): string {
  return path.join(storageDir, `${name}${MANIFEST_SUFFIX}`);
}

function toStringSafe(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toNumberSafe(value: unknown): number {
  if (typeof value === "bigint") {
    return Number(value);
  }
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function toMetadata(row: Record<string, unknown>): RecordMetadata {
  return {
    filePath: toStringSafe(row.file_path),
    language: toStringSafe(row.language),
    chunkId: toNumberSafe(row.chunk_id)
  };
}

// LanceDB's l2 metric reports squared distance; callers get plain Euclidean distance.
export function toEuclidean(distance: unknown): number {
  const squared = toNumberSafe(distance);
  return Math.sqrt(Math.max(0, squared));
}

export function toRow(record: VectorRecord): Record<string, unknown> {
  return {
    id: record.id,
    text: record.text,
    vector: [...record.vector],
    file_path: record.metadata.filePath,
    language: record.metadata.language,
    chunk_id: record.metadata.chunkId
  };
}

export function toMatch(row: Record<string, unknown>): QueryMatch {
  return {
    text: toStringSafe(row.text),
    metadata: toMetadata(row),
    distance: toEuclidean(row._distance)
  };
}

export async function loadManifest(storageDir: string, name: string): Promise<CollectionManifest | null> {
  const manifestPath = getManifestPath(storageDir, name);
  let content: string;
  try {
    content = await readFile(manifestPath, "utf8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === "ENOENT") {
      return null;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new VectorIndexError(`Manifest ${manifestPath} is not valid JSON`, {
      operation: "loadManifest",
      target: name,
      cause: error
    });
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new VectorIndexError(`Manifest ${manifestPath} is malformed`, {
      operation: "loadManifest",
      target: name,
      cause: parsed.error
    });
  }
  return parsed.data;
}

export async function saveManifest(storageDir: string, manifest: CollectionManifest): Promise<string> {
  await mkdir(storageDir, { recursive: true });
  const manifestPath = getManifestPath(storageDir, manifest.collection);
  await writeFile(manifestPath, JSON.stringify(manifest, null, 2), "utf8");
  return manifestPath;
}

async function withConnection<T>(storageDir: string, fn: (conn: lancedb.Connection) => Promise<T>): Promise<T> {
  await mkdir(storageDir, { recursive: true });
  const connection = await lancedb.connect(storageDir);
  try {
    return await fn(connection);
  } finally {
    connection.close();
  }
}

async function openTable(connection: lancedb.Connection, name: string): Promise<lancedb.Table | null> {
  const names = await connection.tableNames();
  if (!names.includes(name)) {
    return null;
  }
  return connection.openTable(name);
}

async function readIds(table: lancedb.Table): Promise<Set<string>> {
  const rows = (await table.query().select(["id"]).toArray()) as Record<string, unknown>[];
  return new Set(rows.map((row) => toStringSafe(row.id)));
}

class LanceCollection implements Collection {
  constructor(
    private readonly storageDir: string,
    readonly name: string,
    readonly space: EmbeddingSpace
  ) {}

  private async run<T>(operation: string, fn: (conn: lancedb.Connection) => Promise<T>): Promise<T> {
    try {
      return await withConnection(this.storageDir, fn);
    } catch (error) {
      if (error instanceof VectorIndexError) {
        throw error;
      }
      throw new VectorIndexError(`LanceDB ${operation} on ${this.name} failed: ${errorMessage(error)}`, {
        operation,
        target: this.name,
        cause: error
      });
    }
  }

  async count(): Promise<number> {
    return this.run("count", async (connection) => {
      const table = await openTable(connection, this.name);
      if (!table) {
        return 0;
      }
      try {
        return await table.countRows();
      } finally {
        table.close();
      }
    });
  }

  async add(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await this.run("add", async (connection) => {
      let table = await openTable(connection, this.name);
      try {
        validateRecords(this.name, this.space, records, table ? await readIds(table) : new Set());
        for (const batch of batches(records, INSERT_BATCH_SIZE)) {
          const rows = batch.map((record) => toRow(record));
          if (table) {
            await table.add(rows);
          } else {
            // The first write creates the table and fixes its vector schema.
            table = await connection.createTable(this.name, rows, { mode: "create" });
          }
        }
      } finally {
        table?.close();
      }
    });
  }

  async query(vector: number[], k: number): Promise<QueryMatch[]> {
    assertQueryDimension(this.name, this.space, vector);

    return this.run("query", async (connection) => {
      const table = await openTable(connection, this.name);
      if (!table) {
        return [];
      }

      try {
        const limit = Math.min(k, await table.countRows());
        if (limit <= 0) {
          return [];
        }
        const rows = (await table.vectorSearch(vector).distanceType("l2").limit(limit).toArray()) as Array<
          Record<string, unknown>
        >;
        return rows.map((row) => toMatch(row));
      } finally {
        table.close();
      }
    });
  }

  async readState(): Promise<BuildState | null> {
    const manifest = await loadManifest(this.storageDir, this.name);
    return manifest?.state ?? null;
  }

  async writeState(state: BuildState, recordCount?: number): Promise<void> {
    const manifest = (await loadManifest(this.storageDir, this.name)) ?? newManifest(this.name, this.space);
    await saveManifest(this.storageDir, {
      ...manifest,
      state,
      recordCount: recordCount ?? (await this.count()),
      updatedAt: new Date().toISOString()
    });
  }
}

/** One LanceDB database under `storageDir`, one table plus one manifest per collection. */
export class LanceVectorStore implements VectorStore {
  constructor(private readonly storageDir: string) {}

  async createOrGet(name: string, space: EmbeddingSpace): Promise<Collection> {
    const manifest = await loadManifest(this.storageDir, name);
    if (manifest) {
      assertSameSpace(manifest, space);
    } else {
      const tableExists = await withConnection(this.storageDir, async (connection) =>
        (await connection.tableNames()).includes(name)
      );
      // A table without a manifest predates build tracking; leave its state unset.
      if (!tableExists) {
        await saveManifest(this.storageDir, newManifest(name, space));
      }
    }
    return new LanceCollection(this.storageDir, name, space);
  }

  async delete(name: string): Promise<boolean> {
    const dropped = await withConnection(this.storageDir, async (connection) => {
      const names = await connection.tableNames();
      if (!names.includes(name)) {
        return false;
      }
      await connection.dropTable(name);
      return true;
    });

    const manifestPath = getManifestPath(this.storageDir, name);
    const hadManifest = await access(manifestPath).then(
      () => true,
      () => false
    );
    await rm(manifestPath, { force: true });
    return dropped || hadManifest;
  }

  async list(): Promise<string[]> {
    const tables = await withConnection(this.storageDir, (connection) => connection.tableNames());
    const manifests = (await readdir(this.storageDir))
      .filter((entry) => entry.endsWith(MANIFEST_SUFFIX))
      .map((entry) => entry.slice(0, -MANIFEST_SUFFIX.length));
    return [...new Set([...tables, ...manifests])].sort();
  }
}

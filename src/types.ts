export interface Chunk {
  readonly content: string;
  readonly filePath: string;
  readonly language: string;
  readonly chunkId: number;
}

export interface ScannedFile {
  absPath: string;
  relPath: string;
  content: string;
  size: number;
}

export interface RecordMetadata {
  filePath: string;
  language: string;
  chunkId: number;
}

export interface VectorRecord {
  id: string;
  text: string;
  vector: number[];
  metadata: RecordMetadata;
}

export interface QueryMatch {
  text: string;
  metadata: RecordMetadata;
  distance: number;
}

export interface RetrievalResult {
  chunk: Chunk;
  score: number;
}

export interface RepositoryMetadata {
  path: string;
  name: string;
  branch?: string;
  commit?: string;
  remoteUrl?: string;
}

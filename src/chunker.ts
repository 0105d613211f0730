import { getEncoding, type Tiktoken } from "js-tiktoken";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "./config.js";
import { ConfigError, ScanError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { detectLanguage } from "./scanner.js";
import type { Chunk, ScannedFile } from "./types.js";

export interface ChunkOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  logger?: Logger;
}

export interface TokenWindow {
  start: number;
  end: number;
}

let sharedEncoding: Tiktoken | null = null;

// cl100k_base matches the tokenizer family of the downstream models, so sizes are in model tokens.
function encoding(): Tiktoken {
  if (!sharedEncoding) {
    sharedEncoding = getEncoding("cl100k_base");
  }
  return sharedEncoding;
}

export function encodeTokens(text: string): number[] {
  // Special-token markers inside source files are plain text here.
  return encoding().encode(text, [], []);
}

export function decodeTokens(tokens: number[]): string {
  return encoding().decode(tokens);
}

export function planWindows(tokenCount: number, chunkSize: number, overlap: number): TokenWindow[] {
  if (tokenCount <= 0) {
    return [];
  }
  if (tokenCount <= chunkSize) {
    return [{ start: 0, end: tokenCount }];
  }

  const windows: TokenWindow[] = [];
  let start = 0;
  while (start < tokenCount) {
    const end = Math.min(start + chunkSize, tokenCount);
    windows.push({ start, end });

    start = start + chunkSize - overlap;
    // A tail that already sits inside the last window's overlap is not chunked again.
    if (start >= tokenCount - overlap) {
      break;
    }
  }
  return windows;
}

export class TokenChunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly logger: Logger;

  constructor(options: ChunkOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`, {
        operation: "createChunker"
      });
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`, {
        operation: "createChunker"
      });
    }
    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
    this.logger = options.logger ?? silentLogger;
  }

  countTokens(text: string): number {
    return encodeTokens(text).length;
  }

  chunkText(content: string, filePath: string, language: string): Chunk[] {
    if (content.length === 0) {
      return [];
    }

    const tokens = encodeTokens(content);
    if (tokens.length <= this.chunkSize) {
      return [{ content, filePath, language, chunkId: 0 }];
    }

    return planWindows(tokens.length, this.chunkSize, this.chunkOverlap).map((window, chunkId) => ({
      content: decodeTokens(tokens.slice(window.start, window.end)),
      filePath,
      language,
      chunkId
    }));
  }

  chunkFiles(files: ScannedFile[]): Chunk[] {
    const documents: Chunk[] = [];

    for (const file of files) {
      if (file.content.length === 0) {
        continue;
      }
      try {
        documents.push(...this.chunkText(file.content, file.relPath, detectLanguage(file.relPath)));
      } catch (error) {
        const scanError = new ScanError(`Failed to chunk ${file.relPath}: ${errorMessage(error)}`, {
          operation: "chunkFiles",
          target: file.relPath,
          cause: error
        });
        this.logger.error(scanError.message);
      }
    }

    this.logger.info(`Created ${documents.length} document chunks from ${files.length} files`);
    return documents;
  }
}

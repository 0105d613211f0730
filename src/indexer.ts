import { TokenChunker } from "./chunker.js";
import type { RagConfig } from "./config.js";
import { EmptyInputError } from "./errors.js";
import { cloneOrUpdate, getRepositoryMetadata } from "./git.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Retriever } from "./retriever.js";
import { scanRepository } from "./scanner.js";
import { collectionName } from "./store.js";
import type { Chunk, RepositoryMetadata } from "./types.js";

export interface IndexOptions {
  source: string;
  retriever: Retriever;
  config: RagConfig;
  /** Re-clone the repository instead of pulling. */
  fresh?: boolean;
  /** Drop the existing index and embed everything again. */
  rebuild?: boolean;
  /** When false, skip the cached-index shortcut and go through a full build call. */
  useCache?: boolean;
  logger?: Logger;
}

export interface IndexStats {
  repository: RepositoryMetadata;
  collectionName: string;
  filesScanned: number;
  chunksIndexed: number;
  cached: boolean;
}

export async function parseRepository(repoRoot: string, config: RagConfig, logger: Logger = silentLogger): Promise<{
  filesScanned: number;
  documents: Chunk[];
}> {
  const files = await scanRepository(repoRoot, {
    maxFileSizeBytes: config.maxFileSizeBytes,
    supportedExtensions: config.supportedExtensions,
    ignoredDirs: config.ignoredDirs,
    logger
  });
  logger.info(`Parsing ${files.length} files...`);

  const chunker = new TokenChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap, logger });
  return { filesScanned: files.length, documents: chunker.chunkFiles(files) };
}

export async function indexRepository(options: IndexOptions): Promise<IndexStats> {
  const logger = options.logger ?? silentLogger;
  const repoPath = await cloneOrUpdate(options.source, {
    repositoriesDir: options.config.repositoriesDir,
    forceFresh: options.fresh,
    token: options.config.githubToken,
    logger
  });
  const repository = await getRepositoryMetadata(repoPath, logger);
  const name = collectionName(repository.name);

  if (options.useCache !== false && !options.rebuild && (await options.retriever.isPopulated(repository.name))) {
    const { records } = await options.retriever.getStats();
    logger.info(`Loaded ${records} documents from cache`, { collection: name });
    return { repository, collectionName: name, filesScanned: 0, chunksIndexed: records, cached: true };
  }

  const { filesScanned, documents } = await parseRepository(repoPath, options.config, logger);
  if (documents.length === 0) {
    throw new EmptyInputError(`No processable files found in ${repository.name}`, {
      operation: "indexRepository",
      target: repository.name
    });
  }

  const result = await options.retriever.buildIndex(documents, repository.name, { rebuild: options.rebuild });
  return {
    repository,
    collectionName: result.collectionName,
    filesScanned,
    chunksIndexed: result.recordCount,
    cached: result.cached
  };
}

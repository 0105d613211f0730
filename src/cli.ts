#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { OllamaAnswerGenerator, askRepository } from "./answer.js";
import { loadConfig, type RagConfig } from "./config.js";
import { OllamaEmbedder } from "./embedder.js";
import { NotInitializedError, errorMessage } from "./errors.js";
import { resolveRepositoryName } from "./git.js";
import { indexRepository } from "./indexer.js";
import { LanceVectorStore } from "./lance-store.js";
import { createLogger, type Logger } from "./logger.js";
import { OllamaClient } from "./ollama.js";
import { Retriever } from "./retriever.js";
import { collectionName } from "./store.js";

interface RepoOption {
  repo: string;
}

interface IndexCommandOptions extends RepoOption {
  fresh: boolean;
  rebuild: boolean;
  cache: boolean;
}

interface QueryCommandOptions extends RepoOption {
  query: string;
  topK?: number;
}

interface AskCommandOptions extends QueryCommandOptions {
  showSources: boolean;
}

interface Services {
  config: RagConfig;
  logger: Logger;
  client: OllamaClient;
  store: LanceVectorStore;
  retriever: Retriever;
}

const program = new Command();

function parseInteger(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive integer`);
  }
  return parsed;
}

function baseServices(): { config: RagConfig; logger: Logger; store: LanceVectorStore } {
  const config = loadConfig();
  return { config, logger: createLogger(config.logLevel), store: new LanceVectorStore(config.storageDir) };
}

async function createServices(): Promise<Services> {
  const { config, logger, store } = baseServices();
  const client = new OllamaClient({ baseUrl: config.ollamaUrl, timeoutMs: config.requestTimeoutMs });
  const embedder = await OllamaEmbedder.create(client, {
    model: config.embeddingModel,
    expectedDimension: config.embeddingDimension,
    logger
  });
  const retriever = new Retriever({ store, embedder, topK: config.topK, logger });
  return { config, logger, client, store, retriever };
}

async function attachExisting(retriever: Retriever, repo: string): Promise<string> {
  const name = await resolveRepositoryName(repo);
  if (!(await retriever.isPopulated(name))) {
    throw new NotInitializedError(`Index not found for ${name}. Run 'code-qa index --repo ${repo}' first.`, {
      operation: "attach",
      target: collectionName(name)
    });
  }
  return name;
}

program
  .name("code-qa")
  .description("Index a code repository into a local vector store and ask questions about it")
  .version("0.1.0");

program
  .command("index")
  .description("Clone (or open) a repository and build its vector index")
  .requiredOption("--repo <url|path>", "GitHub URL, owner/repo, or local directory")
  .option("--fresh", "delete the local clone and clone again", false)
  .option("--rebuild", "delete the existing index and embed everything again", false)
  .option("--no-cache", "do not short-circuit on an existing index")
  .action(async (options: IndexCommandOptions) => {
    const { config, logger, retriever } = await createServices();
    const stats = await indexRepository({
      source: options.repo,
      retriever,
      config,
      fresh: options.fresh,
      rebuild: options.rebuild,
      useCache: options.cache,
      logger
    });

    const { repository } = stats;
    console.log(`Repository: ${repository.name} (branch ${repository.branch ?? "N/A"}, commit ${repository.commit ?? "N/A"})`);
    console.log(`Collection: ${stats.collectionName}`);
    if (stats.cached) {
      console.log(`Loaded ${stats.chunksIndexed} documents from cache`);
    } else {
      console.log(`Files: ${stats.filesScanned}, chunks: ${stats.chunksIndexed}`);
    }
  });

program
  .command("search")
  .description("Debug retrieval: show the closest code chunks for a query")
  .requiredOption("--repo <url|path>", "repository the index was built from")
  .requiredOption("--query <text>", "search query")
  .option("--top-k <count>", "how many chunks to retrieve", (v) => parseInteger(v, "--top-k"))
  .action(async (options: QueryCommandOptions) => {
    const { retriever } = await createServices();
    await attachExisting(retriever, options.repo);
    const results = await retriever.retrieve(options.query, options.topK);

    if (results.length === 0) {
      console.log("No results.");
      return;
    }

    for (const { chunk, score } of results) {
      const preview = chunk.content.replace(/\s+/g, " ").slice(0, 180);
      console.log(`${score.toFixed(4)}  ${chunk.filePath}#${chunk.chunkId} (${chunk.language})\n${preview}\n`);
    }
  });

program
  .command("ask")
  .description("Answer a question about the repository from retrieved context")
  .requiredOption("--repo <url|path>", "repository the index was built from")
  .requiredOption("--query <text>", "question to answer")
  .option("--top-k <count>", "how many chunks to retrieve", (v) => parseInteger(v, "--top-k"))
  .option("--show-sources", "print retrieved chunk metadata", false)
  .action(async (options: AskCommandOptions) => {
    const { config, logger, client, retriever } = await createServices();
    await attachExisting(retriever, options.repo);
    const generator = new OllamaAnswerGenerator(client, config.answerModel, logger);
    const result = await askRepository({ retriever, generator, query: options.query, topK: options.topK });

    console.log(result.answer);

    if (options.showSources) {
      console.log("\nSources:");
      for (const item of result.results) {
        console.log(`- ${item.chunk.filePath}#${item.chunk.chunkId} (score=${item.score.toFixed(4)})`);
      }
    }
  });

program
  .command("stats")
  .description("Show the indexed record count for a repository")
  .requiredOption("--repo <url|path>", "repository the index was built from")
  .action(async (options: RepoOption) => {
    const { retriever } = await createServices();
    await attachExisting(retriever, options.repo);
    const stats = await retriever.getStats();
    console.log(`Collection: ${stats.collectionName ?? "-"}`);
    console.log(`Documents: ${stats.records}`);
  });

program
  .command("clear")
  .description("Delete the index of a repository")
  .requiredOption("--repo <url|path>", "repository the index was built from")
  .action(async (options: RepoOption) => {
    const { store } = baseServices();
    const name = collectionName(await resolveRepositoryName(options.repo));
    const removed = await store.delete(name);
    console.log(removed ? `Index cleared: ${name}` : `No index found: ${name}`);
  });

program
  .command("collections")
  .description("List indexed collections")
  .action(async () => {
    const { store } = baseServices();
    const names = await store.list();
    console.log(names.length > 0 ? names.join("\n") : "No collections.");
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});

import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export const DEFAULT_SUPPORTED_EXTENSIONS = [
  ".py", ".js", ".jsx", ".ts", ".tsx", ".java", ".cpp", ".c", ".h",
  ".cs", ".go", ".rs", ".php", ".rb", ".swift", ".kt", ".scala",
  ".md", ".txt", ".json", ".yaml", ".yml", ".xml", ".html", ".css",
  ".sh", ".bash", ".sql", ".r", ".m", ".dart", ".vue", ".svelte"
];

export const DEFAULT_IGNORED_DIRS = [
  ".git", "node_modules", "__pycache__", ".venv", "venv",
  "env", "dist", "build", ".next", ".nuxt", "target",
  "bin", "obj", "vendor", "bower_components", ".idea",
  ".vscode", "__MACOSX", ".DS_Store"
];

export interface RagConfig {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  embeddingModel: string;
  embeddingDimension: number;
  ollamaUrl: string;
  requestTimeoutMs: number;
  answerModel: string;
  dataDir: string;
  storageDir: string;
  repositoriesDir: string;
  maxFileSizeBytes: number;
  supportedExtensions: string[];
  ignoredDirs: string[];
  githubToken?: string;
  logLevel: LogLevel;
}

const MEGABYTE = 1024 * 1024;

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
  );

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP),
  TOP_K_RESULTS: z.coerce.number().int().positive().default(5),
  EMBEDDING_MODEL: z.string().trim().min(1).default("nomic-embed-text"),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
  OLLAMA_BASE_URL: z.string().trim().url().default("http://localhost:11434"),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ANSWER_MODEL: z.string().trim().min(1).default("llama3.1"),
  CODE_QA_DATA_DIR: z.string().trim().min(1).default("data"),
  MAX_FILE_SIZE_MB: z.coerce.number().positive().default(5),
  SUPPORTED_EXTENSIONS: commaList.optional(),
  IGNORED_DIRS: commaList.optional(),
  GITHUB_TOKEN: optionalText,
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<RagConfig> = {}
): RagConfig {
  // Blank variables count as unset so that defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigError(`Invalid configuration: ${keys}`, { operation: "loadConfig", cause: parsed.error });
  }

  const values = parsed.data;
  const dataDir = path.resolve(values.CODE_QA_DATA_DIR);
  const config: RagConfig = {
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    topK: values.TOP_K_RESULTS,
    embeddingModel: values.EMBEDDING_MODEL,
    embeddingDimension: values.EMBEDDING_DIMENSION,
    ollamaUrl: values.OLLAMA_BASE_URL,
    requestTimeoutMs: values.OLLAMA_TIMEOUT_MS,
    answerModel: values.ANSWER_MODEL,
    dataDir,
    storageDir: path.join(dataDir, "vectors"),
    repositoriesDir: path.join(dataDir, "repositories"),
    maxFileSizeBytes: Math.floor(values.MAX_FILE_SIZE_MB * MEGABYTE),
    supportedExtensions: (values.SUPPORTED_EXTENSIONS ?? DEFAULT_SUPPORTED_EXTENSIONS).map(normalizeExtension),
    ignoredDirs: values.IGNORED_DIRS ?? DEFAULT_IGNORED_DIRS,
    githubToken: values.GITHUB_TOKEN,
    logLevel: values.LOG_LEVEL,
    ...overrides
  };

  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigError(
      `Invalid configuration: CHUNK_OVERLAP (${config.chunkOverlap}) must be smaller than CHUNK_SIZE (${config.chunkSize})`,
      { operation: "loadConfig" }
    );
  }

  return config;
}

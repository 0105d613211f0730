import { open, readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_IGNORED_DIRS, DEFAULT_SUPPORTED_EXTENSIONS } from "./config.js";
import { ScanError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScannedFile } from "./types.js";

const SNIFF_BYTES = 1024;

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".java": "java",
  ".cpp": "cpp",
  ".c": "c",
  ".h": "c",
  ".cs": "csharp",
  ".go": "go",
  ".rs": "rust",
  ".php": "php",
  ".rb": "ruby",
  ".swift": "swift",
  ".kt": "kotlin",
  ".scala": "scala",
  ".md": "markdown",
  ".txt": "text",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".xml": "xml",
  ".html": "html",
  ".css": "css",
  ".sh": "bash",
  ".sql": "sql",
  ".r": "r",
  ".dart": "dart",
  ".vue": "vue",
  ".svelte": "svelte"
};

export interface ScanOptions {
  maxFileSizeBytes: number;
  supportedExtensions?: string[];
  ignoredDirs?: string[];
  logger?: Logger;
}

function toPosixPath(input: string): string {
  return input.split(path.sep).join(path.posix.sep);
}

async function readFirstBytes(filePath: string, bytes: number): Promise<Buffer> {
  const file = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(bytes);
    const { bytesRead } = await file.read(buffer, 0, bytes, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await file.close();
  }
}

export function isUtf8Text(sample: Uint8Array): boolean {
  // stream mode tolerates a multi-byte character cut off at the end of the sample
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    decoder.decode(sample, { stream: true });
    return true;
  } catch {
    return false;
  }
}

export function detectLanguage(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return LANGUAGE_BY_EXTENSION[ext] ?? "text";
}

export function shouldIgnoreDirectory(name: string, ignored: ReadonlySet<string>): boolean {
  return ignored.has(name) || name.startsWith(".");
}

export async function scanRepository(repoRoot: string, options: ScanOptions): Promise<ScannedFile[]> {
  const logger = options.logger ?? silentLogger;
  const ignored = new Set(options.ignoredDirs ?? DEFAULT_IGNORED_DIRS);
  const extensions = new Set((options.supportedExtensions ?? DEFAULT_SUPPORTED_EXTENSIONS).map((ext) => ext.toLowerCase()));

  const files: ScannedFile[] = [];

  async function processFile(absPath: string, relPath: string): Promise<void> {
    const stats = await stat(absPath);
    if (stats.size > options.maxFileSizeBytes) {
      logger.warn(`Skipping large file: ${relPath} (${(stats.size / (1024 * 1024)).toFixed(2)}MB)`);
      return;
    }

    const sample = await readFirstBytes(absPath, SNIFF_BYTES);
    if (!isUtf8Text(sample)) {
      return;
    }

    files.push({
      absPath,
      relPath,
      content: await readFile(absPath, "utf8"),
      size: stats.size
    });
  }

  async function walk(currentDir: string): Promise<void> {
    const entries = await readdir(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const absPath = path.join(currentDir, entry.name);

      if (entry.isDirectory()) {
        if (shouldIgnoreDirectory(entry.name, ignored)) {
          continue;
        }
        await walk(absPath);
        continue;
      }

      if (!entry.isFile() || !extensions.has(path.extname(entry.name).toLowerCase())) {
        continue;
      }

      const relPath = toPosixPath(path.relative(repoRoot, absPath));
      try {
        await processFile(absPath, relPath);
      } catch (error) {
        const scanError = new ScanError(`Error reading file ${relPath}: ${errorMessage(error)}`, {
          operation: "scanRepository",
          target: relPath,
          cause: error
        });
        logger.error(scanError.message);
      }
    }
  }

  await walk(repoRoot);
  files.sort((a, b) => a.relPath.localeCompare(b.relPath));
  logger.info(`Found ${files.length} processable files in repository`);
  return files;
}

import { execFile } from "node:child_process";
import { stat, rm } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { NameResolutionError, SourceError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RepositoryMetadata } from "./types.js";

const execFileAsync = promisify(execFile);

const GITHUB_PATTERNS = [/github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/, /^([\w.-]+)\/([\w.-]+?)(?:\.git)?$/];

export interface RepositoryName {
  owner: string;
  repo: string;
  fullName: string;
}

export interface CloneOptions {
  repositoriesDir: string;
  forceFresh?: boolean;
  token?: string;
  logger?: Logger;
}

async function runGit(args: string[], cwd?: string): Promise<string> {
  const { stdout } = await execFileAsync("git", cwd ? ["-C", cwd, ...args] : args, {
    maxBuffer: 20 * 1024 * 1024
  });
  return stdout.trim();
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export function parseRepositoryUrl(input: string): RepositoryName {
  const trimmed = input.trim();
  for (const pattern of GITHUB_PATTERNS) {
    const match = pattern.exec(trimmed);
    const owner = match?.[1];
    const repo = match?.[2];
    if (owner && repo) {
      return { owner, repo, fullName: `${owner}/${repo}` };
    }
  }
  throw new NameResolutionError(`Invalid GitHub URL: ${input}`, { operation: "parseRepositoryUrl", target: input });
}

export function resolveCloneUrl(input: string, token?: string): string {
  const { fullName } = parseRepositoryUrl(input);
  const credentials = token ? `${encodeURIComponent(token)}@` : "";
  return `https://${credentials}github.com/${fullName}.git`;
}

export async function resolveRepositoryName(input: string): Promise<string> {
  if (await isDirectory(input)) {
    return path.basename(path.resolve(input));
  }
  return parseRepositoryUrl(input).repo;
}

/** Returns a local checkout for `input`: an existing directory as is, otherwise a shallow clone kept up to date. */
export async function cloneOrUpdate(input: string, options: CloneOptions): Promise<string> {
  const logger = options.logger ?? silentLogger;

  if (await isDirectory(input)) {
    return path.resolve(input);
  }

  const { repo } = parseRepositoryUrl(input);
  const localPath = path.join(options.repositoriesDir, repo);

  if (options.forceFresh && (await isDirectory(localPath))) {
    logger.info(`Removing existing repository at ${localPath}`);
    await rm(localPath, { recursive: true, force: true });
  }

  if (await isDirectory(path.join(localPath, ".git"))) {
    logger.info(`Repository already exists at ${localPath}`);
    try {
      await runGit(["pull"], localPath);
      logger.info("Repository updated successfully");
    } catch (error) {
      logger.warn(`Could not update repository: ${errorMessage(error)}`);
    }
    return localPath;
  }

  logger.info(`Cloning repository from ${input}...`);
  try {
    await runGit(["clone", "--depth", "1", resolveCloneUrl(input, options.token), localPath]);
  } catch (error) {
    // The clone URL may carry a token, so it stays out of the message.
    throw new SourceError(`Failed to clone repository ${parseRepositoryUrl(input).fullName}`, {
      operation: "cloneOrUpdate",
      target: input,
      cause: error
    });
  }
  logger.info(`Repository cloned successfully to ${localPath}`);
  return localPath;
}

export async function getRepositoryMetadata(repoPath: string, logger: Logger = silentLogger): Promise<RepositoryMetadata> {
  const name = path.basename(path.resolve(repoPath));
  try {
    const [branch, commit] = await Promise.all([
      runGit(["rev-parse", "--abbrev-ref", "HEAD"], repoPath),
      runGit(["rev-parse", "--short=7", "HEAD"], repoPath)
    ]);
    const remoteUrl = await runGit(["remote", "get-url", "origin"], repoPath).catch(() => undefined);
    return { path: repoPath, name, branch, commit, remoteUrl };
  } catch (error) {
    logger.error(`Error getting repository info: ${errorMessage(error)}`);
    return { path: repoPath, name };
  }
}

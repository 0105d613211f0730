export interface ErrorContext {
  operation: string;
  target?: string;
  cause?: unknown;
}

export class RagError extends Error {
  readonly operation: string;
  readonly target?: string;

  constructor(message: string, context: ErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.operation = context.operation;
    this.target = context.target;
  }
}

/** A single file could not be read or chunked. Logged and skipped by callers. */
export class ScanError extends RagError {}

/** The embedding backend failed, timed out or returned something unusable. */
export class EmbeddingServiceError extends RagError {}

export class EmptyInputError extends RagError {}

export class NotInitializedError extends RagError {}

/** A repository identifier could not be parsed into owner/name. */
export class NameResolutionError extends RagError {}

export class VectorIndexError extends RagError {}

export class SourceError extends RagError {}

export class AnswerGenerationError extends RagError {}

export class ConfigError extends RagError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

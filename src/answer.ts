import { silentLogger, type Logger } from "./logger.js";
import type { OllamaClient } from "./ollama.js";
import { formatContext, type Retriever } from "./retriever.js";
import type { RetrievalResult } from "./types.js";

export const NO_RESULTS_ANSWER = "I couldn't find relevant information in the repository to answer your question.";

export interface AnswerGenerator {
  generateAnswer(query: string, context: string): Promise<string>;
}

export interface AskOptions {
  retriever: Retriever;
  generator: AnswerGenerator;
  query: string;
  topK?: number;
}

export interface AskResult {
  answer: string;
  results: RetrievalResult[];
}

export function buildAnswerPrompt(query: string, context: string): string {
  return `
You are an expert code assistant analyzing a source code repository.
Based on the provided code context, answer the user's question accurately and concisely.

Instructions:
- Use ONLY the information from the provided context
- If the context doesn't contain relevant information, say so clearly
- Reference specific files when mentioning code
- Provide code snippets in markdown when relevant

Code Context:
${context}

User Question:
${query}

Answer:
`.trim();
}

export function appendReferencedFiles(answer: string, results: RetrievalResult[]): string {
  const files = [...new Set(results.map((result) => result.chunk.filePath))].sort();
  if (files.length === 0) {
    return answer;
  }
  return `${answer}\n\n---\nReferenced Files:\n${files.map((file) => `- ${file}`).join("\n")}`;
}

export class OllamaAnswerGenerator implements AnswerGenerator {
  constructor(
    private readonly client: OllamaClient,
    private readonly model: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async generateAnswer(query: string, context: string): Promise<string> {
    this.logger.info(`Generating answer with ${this.model}...`);
    const answer = await this.client.generate(this.model, buildAnswerPrompt(query, context));
    this.logger.info("Answer generated successfully");
    return answer;
  }
}

export async function askRepository(options: AskOptions): Promise<AskResult> {
  const results = await options.retriever.retrieve(options.query, options.topK);
  if (results.length === 0) {
    return { answer: NO_RESULTS_ANSWER, results };
  }

  const answer = await options.generator.generateAnswer(options.query, formatContext(results));
  return { answer: appendReferencedFiles(answer, results), results };
}

import type { EmbeddingFunction } from "./embedder.js";
import { normalize } from "./vector.js";

/** Deterministic bag-of-words embedder for tests: shared words mean nearby vectors. */
export class HashingEmbedder implements EmbeddingFunction {
  readonly model = "test-hashing";
  embedManyCalls = 0;
  embedOneCalls = 0;

  constructor(readonly dimension: number = 256) {}

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let hash = 2166136261;
      for (let i = 0; i < word.length; i += 1) {
        hash ^= word.charCodeAt(i);
        hash = Math.imul(hash, 16777619) >>> 0;
      }
      const slot = hash % this.dimension;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return normalize(vector);
  }

  async embedOne(text: string): Promise<number[]> {
    this.embedOneCalls += 1;
    return this.vectorFor(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    this.embedManyCalls += 1;
    return texts.map((text) => this.vectorFor(text));
  }
}

export interface RecordedRequest {
  url: string;
  body: unknown;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export function fakeFetch(handler: (request: RecordedRequest) => Response | Promise<Response>): {
  fetch: typeof fetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const impl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const body: unknown = JSON.parse(String(init?.body ?? "null"));
    const request = { url, body };
    requests.push(request);
    return handler(request);
  };
  return { fetch: impl, requests };
}

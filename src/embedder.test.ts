import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { OllamaEmbedder } from "./embedder.js";
import { AnswerGenerationError, EmbeddingServiceError } from "./errors.js";
import { OllamaClient } from "./ollama.js";
import { fakeFetch, jsonResponse, type RecordedRequest } from "./testing.js";

const BASE_URL = "http://ollama.test/";

function promptOf(request: RecordedRequest): string {
  const body = request.body;
  if (body && typeof body === "object" && "prompt" in body && typeof body.prompt === "string") {
    return body.prompt;
  }
  return "";
}

describe("OllamaEmbedder", () => {
  it("runs a self-check call and learns the dimension", async () => {
    const stub = fakeFetch(() => jsonResponse({ embedding: [3, 4] }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    const embedder = await OllamaEmbedder.create(client, { model: "nomic-embed-text" });

    assert.equal(embedder.dimension, 2);
    assert.equal(embedder.model, "nomic-embed-text");
    assert.deepEqual(stub.requests, [
      { url: "http://ollama.test/api/embeddings", body: { model: "nomic-embed-text", prompt: "test" } }
    ]);
  });

  it("returns unit-length vectors", async () => {
    const stub = fakeFetch(() => jsonResponse({ embedding: [3, 4] }));
    const embedder = await OllamaEmbedder.create(new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch }), {
      model: "m"
    });

    const [x, y] = await embedder.embedOne("anything");
    assert.ok(Math.abs((x ?? 0) - 0.6) < 1e-9);
    assert.ok(Math.abs((y ?? 0) - 0.8) < 1e-9);
  });

  it("embeds many texts one call each, preserving order", async () => {
    const vectors: Record<string, number[]> = { test: [1, 1], one: [1, 0], two: [0, 1] };
    const stub = fakeFetch((request) => jsonResponse({ embedding: vectors[promptOf(request)] ?? [] }));
    const embedder = await OllamaEmbedder.create(new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch }), {
      model: "m"
    });

    const result = await embedder.embedMany(["two", "one", "two"]);
    assert.deepEqual(result, [
      [0, 1],
      [1, 0],
      [0, 1]
    ]);
    assert.deepEqual(stub.requests.map(promptOf), ["test", "two", "one", "two"]);
  });

  it("fails creation when the backend is unreachable", async () => {
    const stub = fakeFetch(() => {
      throw new TypeError("fetch failed");
    });
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    await assert.rejects(OllamaEmbedder.create(client, { model: "m" }), {
      name: "EmbeddingServiceError",
      message: "Ollama request /api/embeddings failed: fetch failed"
    });
  });

  it("fails creation when the dimension differs from the configured one", async () => {
    const stub = fakeFetch(() => jsonResponse({ embedding: [1, 2, 3] }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    await assert.rejects(
      OllamaEmbedder.create(client, { model: "m", expectedDimension: 768 }),
      EmbeddingServiceError
    );
  });

  it("fails when a later vector changes dimension", async () => {
    let calls = 0;
    const stub = fakeFetch(() => {
      calls += 1;
      return jsonResponse({ embedding: calls === 1 ? [1, 0] : [1, 0, 0] });
    });
    const embedder = await OllamaEmbedder.create(new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch }), {
      model: "m"
    });

    await assert.rejects(embedder.embedOne("text"), EmbeddingServiceError);
  });
});

describe("OllamaClient", () => {
  it("turns a non-success status into an EmbeddingServiceError", async () => {
    const stub = fakeFetch(() => new Response("model not found", { status: 404 }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    await assert.rejects(client.embed("missing", "text"), (error: unknown) => {
      assert.ok(error instanceof EmbeddingServiceError);
      assert.equal(error.message, "Ollama request failed (404) /api/embeddings: model not found");
      assert.equal(error.operation, "embed");
      assert.equal(error.target, "missing");
      return true;
    });
  });

  it("keeps the typed error when an error body cannot be read", async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("socket hang up"));
      }
    });
    const stub = fakeFetch(() => new Response(body, { status: 500 }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    await assert.rejects(client.embed("m", "text"), (error: unknown) => {
      assert.ok(error instanceof EmbeddingServiceError);
      assert.equal(error.message, "Ollama request failed (500) /api/embeddings: socket hang up");
      return true;
    });
  });

  it("reports timeouts", async () => {
    const stub = fakeFetch(() => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      throw timeout;
    });
    const client = new OllamaClient({ baseUrl: BASE_URL, timeoutMs: 1500, fetch: stub.fetch });

    await assert.rejects(client.embed("m", "text"), {
      name: "EmbeddingServiceError",
      message: "Ollama request /api/embeddings timed out after 1500ms"
    });
  });

  it("rejects responses without an embedding", async () => {
    const stub = fakeFetch(() => jsonResponse({ embeddings: [[1, 2]] }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    await assert.rejects(client.embed("m", "text"), EmbeddingServiceError);
  });

  it("generates text without streaming", async () => {
    const stub = fakeFetch(() => jsonResponse({ response: "  The answer.\n" }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    assert.equal(await client.generate("llama3.1", "question"), "The answer.");
    assert.deepEqual(stub.requests[0], {
      url: "http://ollama.test/api/generate",
      body: { model: "llama3.1", prompt: "question", stream: false }
    });
  });

  it("turns generation failures into an AnswerGenerationError", async () => {
    const stub = fakeFetch(() => new Response("overloaded", { status: 503 }));
    const client = new OllamaClient({ baseUrl: BASE_URL, fetch: stub.fetch });

    await assert.rejects(client.generate("llama3.1", "question"), AnswerGenerationError);
  });
});

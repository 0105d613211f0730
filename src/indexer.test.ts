import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { loadConfig } from "./config.js";
import { EmptyInputError } from "./errors.js";
import { indexRepository } from "./indexer.js";
import { KeyedLock } from "./lock.js";
import { MemoryVectorStore } from "./memory-store.js";
import { Retriever } from "./retriever.js";
import { collectionName } from "./store.js";
import { HashingEmbedder } from "./testing.js";

describe("indexRepository", () => {
  let workspace = "";
  let repoRoot = "";
  let emptyRoot = "";

  before(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), "code-qa-index-"));
    repoRoot = path.join(workspace, "demo-service");
    emptyRoot = path.join(workspace, "empty-service");
    await mkdir(path.join(repoRoot, "src"), { recursive: true });
    await mkdir(emptyRoot);
    await writeFile(path.join(repoRoot, "src", "auth.py"), "def login(user):\n    return issue_token(user)\n");
    await writeFile(path.join(repoRoot, "README.md"), "# Demo service\n");
    await writeFile(path.join(emptyRoot, "logo.png"), "binary-ish");
  });

  after(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  function setup() {
    const config = loadConfig({ CODE_QA_DATA_DIR: path.join(workspace, "data") });
    const embedder = new HashingEmbedder();
    const retriever = new Retriever({ store: new MemoryVectorStore(), embedder, locks: new KeyedLock() });
    return { config, embedder, retriever };
  }

  it("indexes a local directory and reuses the index on the next run", async () => {
    const { config, embedder, retriever } = setup();

    const first = await indexRepository({ source: repoRoot, retriever, config });
    assert.equal(first.repository.name, "demo-service");
    assert.equal(first.collectionName, collectionName("demo-service"));
    assert.equal(first.filesScanned, 2);
    assert.equal(first.chunksIndexed, 2);
    assert.equal(first.cached, false);

    const second = await indexRepository({ source: repoRoot, retriever, config });
    assert.equal(second.cached, true);
    assert.equal(second.chunksIndexed, 2);
    assert.equal(second.filesScanned, 0);
    assert.equal(embedder.embedManyCalls, 1);

    const [top] = await retriever.retrieve("login issue token", 1);
    assert.equal(top?.chunk.filePath, "src/auth.py");
  });

  it("re-embeds everything when asked to rebuild", async () => {
    const { config, embedder, retriever } = setup();
    await indexRepository({ source: repoRoot, retriever, config });

    const rebuilt = await indexRepository({ source: repoRoot, retriever, config, rebuild: true });
    assert.equal(rebuilt.cached, false);
    assert.equal(rebuilt.chunksIndexed, 2);
    assert.equal(embedder.embedManyCalls, 2);
  });

  it("scans again without the cache shortcut but keeps a finished index", async () => {
    const { config, embedder, retriever } = setup();
    await indexRepository({ source: repoRoot, retriever, config });

    const again = await indexRepository({ source: repoRoot, retriever, config, useCache: false });
    assert.equal(again.filesScanned, 2);
    assert.equal(again.cached, true);
    assert.equal(embedder.embedManyCalls, 1);
  });

  it("fails when the repository has nothing to index", async () => {
    const { config, retriever } = setup();
    await assert.rejects(indexRepository({ source: emptyRoot, retriever, config }), EmptyInputError);
  });
});

import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { referenceScript } from "../testing/fixtures";
import { TableEmbedder } from "../testing/fakes";
import { corpusFingerprint, indexingText } from "./corpus";
import { EmbeddingService, buildIndex, type Embedder } from "./embed";
import { loadIndex } from "./store";

const docs = [referenceScript({ id: "one" }), referenceScript({ id: "two", hook: "Other hook here" })];
const now = () => new Date("2026-03-01T12:00:00.000Z");

describe("EmbeddingService", () => {
  it("embeds with its configured model", async () => {
    const createEmbeddings = vi.fn(async (_model: string, input: string[]) => input.map(() => [1, 2]));
    const service = new EmbeddingService({ createEmbeddings }, "text-embedding-3-small");

    await expect(service.embed(["a"])).resolves.toEqual([[1, 2]]);
    expect(createEmbeddings).toHaveBeenCalledWith("text-embedding-3-small", ["a"]);
  });
});

describe("buildIndex", () => {
  it("embeds each document's indexing text in order", async () => {
    const embedder = new TableEmbedder({
      [indexingText(docs[0])]: [1, 0],
      [indexingText(docs[1])]: [0, 1],
    });
    const index = await buildIndex(embedder, docs, { now });

    expect(embedder.calls).toEqual([[indexingText(docs[0]), indexingText(docs[1])]]);
    expect(index.toFile()).toEqual({
      version: 1,
      embedding_model: "table-embedder",
      metric: "l2",
      dimensions: 2,
      fingerprint: corpusFingerprint(docs),
      built_at: "2026-03-01T12:00:00.000Z",
      entries: [
        { id: "one", vector: [1, 0], document: docs[0] },
        { id: "two", vector: [0, 1], document: docs[1] },
      ],
    });
  });

  it("rejects duplicate ids before calling the embedder", async () => {
    const embedder = new TableEmbedder({}, [1]);
    await expect(buildIndex(embedder, [docs[0], docs[0]])).rejects.toThrow(
      "duplicate document id: one",
    );
    expect(embedder.calls).toEqual([]);
  });

  it("rejects an embedder that drops vectors", async () => {
    const embedder: Embedder = { model: "short", embed: async () => [[1]] };
    await expect(buildIndex(embedder, docs)).rejects.toThrow("embedder returned 1 vectors for 2 documents");
  });

  it("persists when given a path", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "reel-build-"));
    try {
      const file = path.join(dir, "index.json");
      const index = await buildIndex(new TableEmbedder({}, [0.5, 0.5]), docs, {
        metric: "cosine",
        path: file,
        now,
      });
      expect((await loadIndex(file)).toFile()).toEqual(index.toFile());
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

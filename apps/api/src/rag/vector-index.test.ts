import { describe, expect, it } from "vitest";
import { referenceScript } from "../testing/fixtures";
import { VectorIndex, similarity } from "./vector-index";

const a = referenceScript({ id: "a", sector: "fitness" });
const b = referenceScript({ id: "b", sector: "finance" });
const c = referenceScript({ id: "c", sector: "fitness" });

function makeIndex(metric: "l2" | "cosine" = "l2") {
  return new VectorIndex({
    embeddingModel: "test-model",
    metric,
    fingerprint: "f1",
    builtAt: "2026-01-01T00:00:00.000Z",
    entries: [
      { id: "a", vector: [0, 0], document: a },
      { id: "b", vector: [3, 4], document: b },
      { id: "c", vector: [0, 0], document: c },
    ],
  });
}

describe("similarity", () => {
  it("maps euclidean distance to 1 / (1 + d)", () => {
    expect(similarity("l2", [0, 0], [3, 4])).toBeCloseTo(1 / 6);
    expect(similarity("l2", [1, 1], [1, 1])).toBe(1);
  });

  it("computes cosine similarity", () => {
    expect(similarity("cosine", [1, 0], [2, 0])).toBeCloseTo(1);
    expect(similarity("cosine", [1, 0], [0, 1])).toBe(0);
    expect(similarity("cosine", [0, 0], [1, 1])).toBe(0);
  });
});

describe("VectorIndex", () => {
  it("orders by score and keeps insertion order on ties", () => {
    const hits = makeIndex().search([0, 0], { topK: 3 });
    expect(hits.map((h) => h.document.id)).toEqual(["a", "c", "b"]);
    expect(hits.map((h) => h.score)).toEqual([1, 1, 1 / 6]);
  });

  it("returns nothing for a non-positive topK", () => {
    expect(makeIndex().search([0, 0], { topK: 0 })).toEqual([]);
    expect(makeIndex().search([0, 0], { topK: -2 })).toEqual([]);
  });

  it("returns every match when topK exceeds them", () => {
    const hits = makeIndex().search([3, 4], {
      topK: 10,
      filter: (doc) => doc.sector === "fitness",
    });
    expect(hits.map((h) => h.document.id)).toEqual(["a", "c"]);
  });

  it("rejects a query of the wrong width", () => {
    expect(() => makeIndex().search([1, 2, 3], { topK: 1 })).toThrow(
      "query has 3 dimensions, index has 2",
    );
  });

  it("rejects duplicate ids", () => {
    expect(
      () =>
        new VectorIndex({
          embeddingModel: "m",
          metric: "l2",
          fingerprint: "f",
          builtAt: "2026-01-01T00:00:00.000Z",
          entries: [
            { id: "a", vector: [1], document: a },
            { id: "a", vector: [2], document: a },
          ],
        }),
    ).toThrow("duplicate document id: a");
  });

  it("rejects vectors of mixed width", () => {
    expect(
      () =>
        new VectorIndex({
          embeddingModel: "m",
          metric: "l2",
          fingerprint: "f",
          builtAt: "2026-01-01T00:00:00.000Z",
          entries: [
            { id: "a", vector: [1, 2], document: a },
            { id: "b", vector: [1], document: b },
          ],
        }),
    ).toThrow("document b has 1 dimensions, expected 2");
  });

  it("rebuilds an equal index from its file form", () => {
    const index = makeIndex("cosine");
    const copy = VectorIndex.fromFile(index.toFile());
    expect(copy.toFile()).toEqual(index.toFile());
    expect(copy.dimensions).toBe(2);
    expect(copy.size).toBe(3);
  });

  it("does not share vectors with its caller", () => {
    const vector = [1, 1];
    const index = new VectorIndex({
      embeddingModel: "m",
      metric: "l2",
      fingerprint: "f",
      builtAt: "2026-01-01T00:00:00.000Z",
      entries: [{ id: "a", vector, document: a }],
    });
    vector[0] = 100;
    expect(index.search([1, 1], { topK: 1 })[0].score).toBe(1);
  });
});

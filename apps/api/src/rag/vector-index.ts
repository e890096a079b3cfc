import type {
  ReferenceScript,
  SimilarityMetric,
  VectorIndexEntry,
  VectorIndexFile,
} from "@reelgen/schemas";

export type SearchHit = {
  document: ReferenceScript;
  score: number;
};

type StoredEntry = Readonly<{
  id: string;
  vector: readonly number[];
  document: ReferenceScript;
}>;

export type SearchOptions = {
  topK: number;
  filter?: (doc: ReferenceScript) => boolean;
};

function l2Distance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** Higher is more similar for both metrics. L2 distance d maps to 1 / (1 + d). */
export function similarity(
  metric: SimilarityMetric,
  a: readonly number[],
  b: readonly number[],
): number {
  return metric === "cosine" ? cosine(a, b) : 1 / (1 + l2Distance(a, b));
}

/**
 * Exact (brute force) nearest-neighbour index over a small corpus.
 * Instances never change after construction; a rebuild produces a new one.
 */
export class VectorIndex {
  readonly embeddingModel: string;
  readonly metric: SimilarityMetric;
  readonly dimensions: number;
  readonly fingerprint: string;
  readonly builtAt: string;
  private readonly entries: readonly StoredEntry[];

  constructor(init: {
    embeddingModel: string;
    metric: SimilarityMetric;
    fingerprint: string;
    builtAt: string;
    entries: VectorIndexEntry[];
  }) {
    if (init.entries.length === 0) throw new Error("vector index needs at least one document");
    const dimensions = init.entries[0].vector.length;
    const seen = new Set<string>();
    for (const entry of init.entries) {
      if (entry.id !== entry.document.id)
        throw new Error(`entry ${entry.id} holds document ${entry.document.id}`);
      if (seen.has(entry.id)) throw new Error(`duplicate document id: ${entry.id}`);
      seen.add(entry.id);
      if (entry.vector.length !== dimensions || dimensions === 0)
        throw new Error(
          `document ${entry.id} has ${entry.vector.length} dimensions, expected ${dimensions}`,
        );
      if (!entry.vector.every(Number.isFinite))
        throw new Error(`document ${entry.id} has a non-finite vector component`);
    }
    this.embeddingModel = init.embeddingModel;
    this.metric = init.metric;
    this.dimensions = dimensions;
    this.fingerprint = init.fingerprint;
    this.builtAt = init.builtAt;
    this.entries = Object.freeze(
      init.entries.map((e) =>
        Object.freeze({ id: e.id, vector: Object.freeze([...e.vector]), document: e.document }),
      ),
    );
  }

  static fromFile(file: VectorIndexFile): VectorIndex {
    const index = new VectorIndex({
      embeddingModel: file.embedding_model,
      metric: file.metric,
      fingerprint: file.fingerprint,
      builtAt: file.built_at,
      entries: file.entries,
    });
    if (index.dimensions !== file.dimensions)
      throw new Error(`index file declares ${file.dimensions} dimensions, vectors have ${index.dimensions}`);
    return index;
  }

  get size(): number {
    return this.entries.length;
  }

  get documents(): ReferenceScript[] {
    return this.entries.map((e) => e.document);
  }

  /**
   * Scores every document that passes `filter` and returns the best `topK`,
   * highest score first. Equal scores keep insertion order.
   */
  search(query: readonly number[], opts: SearchOptions): SearchHit[] {
    if (opts.topK <= 0) return [];
    if (query.length !== this.dimensions)
      throw new Error(`query has ${query.length} dimensions, index has ${this.dimensions}`);
    const hits: Array<SearchHit & { position: number }> = [];
    this.entries.forEach((entry, position) => {
      if (opts.filter && !opts.filter(entry.document)) return;
      hits.push({ document: entry.document, score: similarity(this.metric, query, entry.vector), position });
    });
    hits.sort((a, b) => b.score - a.score || a.position - b.position);
    return hits.slice(0, opts.topK).map(({ document, score }) => ({ document, score }));
  }

  toFile(): VectorIndexFile {
    return {
      version: 1,
      embedding_model: this.embeddingModel,
      metric: this.metric,
      dimensions: this.dimensions,
      fingerprint: this.fingerprint,
      built_at: this.builtAt,
      entries: this.entries.map((e) => ({ id: e.id, vector: [...e.vector], document: e.document })),
    };
  }
}

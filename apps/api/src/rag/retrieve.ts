import type { Logger } from "pino";
import { IndexNotFoundError } from "@reelgen/shared";
import type {
  BrandProfile,
  ReferenceScript,
  RetrievedExample,
  ScriptRequest,
  SimilarityMetric,
} from "@reelgen/schemas";
import { corpusFingerprint } from "./corpus";
import { buildIndex, type Embedder } from "./embed";
import { loadIndex } from "./store";
import type { VectorIndex } from "./vector-index";

export type RetrievalFilters = Partial<
  Pick<ReferenceScript, "sector" | "hook_type" | "emotion" | "performance_level">
>;

export type RetrievalOptions = {
  embedder: Embedder;
  documents: readonly ReferenceScript[];
  /** Persisted index location; without it the index lives in memory only. */
  indexPath?: string;
  topK: number;
  metric?: SimilarityMetric;
  logger: Logger;
};

export type IndexStats = {
  documents: number;
  built_at: string;
  embedding_model: string;
  metric: SimilarityMetric;
};

const FILTER_KEYS = ["sector", "hook_type", "emotion", "performance_level"] as const;

function matches(doc: ReferenceScript, filters: RetrievalFilters): boolean {
  return FILTER_KEYS.every((key) => filters[key] === undefined || doc[key] === filters[key]);
}

export function generationQuery(brand: BrandProfile, request: ScriptRequest): string {
  return `Generate ${request.hook_type} hook for ${brand.sector} sector targeting ${request.emotion} emotion`;
}

export class RetrievalService {
  private index: VectorIndex;
  private rebuilding?: Promise<VectorIndex>;

  private constructor(
    private readonly opts: RetrievalOptions,
    index: VectorIndex,
  ) {
    this.index = index;
  }

  /**
   * Loads the persisted index, or builds and saves a fresh one when the file is
   * missing, unreadable, or was built from other documents or another model.
   */
  static async open(opts: RetrievalOptions): Promise<RetrievalService> {
    const log = opts.logger;
    const metric = opts.metric ?? "l2";
    if (opts.indexPath) {
      try {
        const index = await loadIndex(opts.indexPath);
        const stale =
          index.fingerprint !== corpusFingerprint(opts.documents) ||
          index.embeddingModel !== opts.embedder.model ||
          index.metric !== metric;
        if (!stale) {
          log.info({ path: opts.indexPath, documents: index.size }, "rag.index.loaded");
          return new RetrievalService(opts, index);
        }
        log.info(
          { path: opts.indexPath, fingerprint: index.fingerprint, model: index.embeddingModel },
          "rag.index.stale",
        );
      } catch (err) {
        if (!(err instanceof IndexNotFoundError)) throw err;
        log.info({ path: err.path, reason: err.reason }, "rag.index.not_found");
      }
    }
    const index = await buildIndex(opts.embedder, opts.documents, {
      metric,
      path: opts.indexPath,
    });
    log.info({ path: opts.indexPath, documents: index.size }, "rag.index.built");
    return new RetrievalService(opts, index);
  }

  get stats(): IndexStats {
    return {
      documents: this.index.size,
      built_at: this.index.builtAt,
      embedding_model: this.index.embeddingModel,
      metric: this.index.metric,
    };
  }

  get defaultTopK(): number {
    return this.opts.topK;
  }

  /** Top `topK` documents equal to every given filter value, most similar first. */
  async retrieve(
    queryText: string,
    filters: RetrievalFilters = {},
    topK: number = this.opts.topK,
  ): Promise<RetrievedExample[]> {
    if (topK <= 0) return [];
    const index = this.index;
    const filter = (doc: ReferenceScript) => matches(doc, filters);
    if (!index.documents.some(filter)) return [];

    const [query] = await this.opts.embedder.embed([queryText]);
    if (!query) throw new Error("embedder returned no vector for the query");
    return index
      .search(query, { topK, filter })
      .map((hit) => ({ ...hit.document, similarity_score: hit.score }));
  }

  retrieveForGeneration(brand: BrandProfile, request: ScriptRequest): Promise<RetrievedExample[]> {
    return this.retrieve(generationQuery(brand, request), {
      sector: brand.sector,
      performance_level: "high",
    });
  }

  /** Builds a new index from the built-in documents and swaps it in. Concurrent calls share one build. */
  rebuild(): Promise<VectorIndex> {
    if (!this.rebuilding) {
      this.rebuilding = buildIndex(this.opts.embedder, this.opts.documents, {
        metric: this.opts.metric ?? "l2",
        path: this.opts.indexPath,
      })
        .then((index) => {
          this.index = index;
          this.opts.logger.info({ documents: index.size }, "rag.index.rebuilt");
          return index;
        })
        .finally(() => {
          this.rebuilding = undefined;
        });
    }
    return this.rebuilding;
  }
}

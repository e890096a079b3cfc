import type { OpenAIClient } from "@reelgen/openai-client";
import type { ReferenceScript, SimilarityMetric } from "@reelgen/schemas";
import { corpusFingerprint, indexingText } from "./corpus";
import { saveIndex } from "./store";
import { VectorIndex } from "./vector-index";

/** Anything that turns texts into vectors of a fixed width, one per input, in order. */
export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export class EmbeddingService implements Embedder {
  constructor(
    private readonly client: Pick<OpenAIClient, "createEmbeddings">,
    readonly model: string,
  ) {}

  embed(texts: string[]): Promise<number[][]> {
    return this.client.createEmbeddings(this.model, texts);
  }
}

export type BuildIndexOptions = {
  metric?: SimilarityMetric;
  /** Where to persist the result. Omit to keep the index in memory only. */
  path?: string;
  now?: () => Date;
};

export async function buildIndex(
  embedder: Embedder,
  documents: readonly ReferenceScript[],
  opts: BuildIndexOptions = {},
): Promise<VectorIndex> {
  const ids = new Set<string>();
  for (const doc of documents) {
    if (ids.has(doc.id)) throw new Error(`duplicate document id: ${doc.id}`);
    ids.add(doc.id);
  }

  const vectors = await embedder.embed(documents.map(indexingText));
  if (vectors.length !== documents.length)
    throw new Error(`embedder returned ${vectors.length} vectors for ${documents.length} documents`);

  const index = new VectorIndex({
    embeddingModel: embedder.model,
    metric: opts.metric ?? "l2",
    fingerprint: corpusFingerprint(documents),
    builtAt: (opts.now ?? (() => new Date()))().toISOString(),
    entries: documents.map((document, i) => ({ id: document.id, vector: vectors[i], document })),
  });
  if (opts.path) await saveIndex(index, opts.path);
  return index;
}

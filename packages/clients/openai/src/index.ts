import { ExternalServiceError, compileSchema } from "@reelgen/shared";

export type FetchFn = typeof fetch;

export type OpenAIClientOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
};

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" | "text" };
};

export type ChatUsage = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

export type ChatResult = {
  /** Text of the first choice; null when the model returned no content. */
  content: string | null;
  finishReason: string | null;
  model: string;
  usage?: ChatUsage;
};

type EmbeddingResponse = {
  data: Array<{ index: number; embedding: number[] }>;
};

type RawChatCompletion = {
  model?: string;
  choices: Array<{ message: { content?: unknown }; finish_reason?: unknown }>;
  usage?: ChatUsage;
};

const SERVICE = "openai";
const DEFAULT_BASE_URL = "https://api.openai.com/v1";
/** The embeddings endpoint accepts arrays; larger corpora are sent in slices of this size. */
export const MAX_EMBEDDING_BATCH = 50;

const isEmbeddingResponse = compileSchema<EmbeddingResponse>({
  type: "object",
  properties: {
    data: {
      type: "array",
      items: {
        type: "object",
        properties: {
          index: { type: "integer", minimum: 0 },
          embedding: { type: "array", items: { type: "number" }, minItems: 1 },
        },
        required: ["index", "embedding"],
      },
    },
  },
  required: ["data"],
});

const isChatCompletion = compileSchema<RawChatCompletion>({
  type: "object",
  properties: {
    model: { type: "string" },
    choices: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        properties: {
          message: { type: "object", properties: { content: {} } },
          finish_reason: {},
        },
        required: ["message"],
      },
    },
    usage: {
      type: "object",
      properties: {
        prompt_tokens: { type: "integer" },
        completion_tokens: { type: "integer" },
        total_tokens: { type: "integer" },
      },
    },
  },
  required: ["choices"],
});

export class OpenAIClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(opts: OpenAIClientOptions) {
    if (!opts.apiKey) throw new Error("Missing OPENAI_API_KEY");
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl || DEFAULT_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = typeof opts.timeoutMs === "number" ? opts.timeoutMs : 30000;
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /** One vector per input, in input order. No retries at this layer. */
  async createEmbeddings(model: string, input: string[]): Promise<number[][]> {
    if (input.length === 0) return [];
    const vectors: number[][] = [];
    for (let i = 0; i < input.length; i += MAX_EMBEDDING_BATCH) {
      const batch = input.slice(i, i + MAX_EMBEDDING_BATCH);
      const data = await this.post("/embeddings", { model, input: batch });
      if (!isEmbeddingResponse(data))
        throw new ExternalServiceError(SERVICE, "openai embeddings response had an unexpected shape", {
          retryable: true,
          category: "upstream",
        });
      if (data.data.length !== batch.length)
        throw new ExternalServiceError(
          SERVICE,
          `openai returned ${data.data.length} embeddings for ${batch.length} inputs`,
          { retryable: true, category: "upstream" },
        );
      const ordered = [...data.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) vectors.push(item.embedding);
    }
    return vectors;
  }

  async createChatCompletion(req: ChatCompletionRequest): Promise<ChatResult> {
    const data = await this.post("/chat/completions", req);
    if (!isChatCompletion(data))
      throw new ExternalServiceError(SERVICE, "openai chat response had an unexpected shape", {
        retryable: true,
        category: "upstream",
      });
    const first = data.choices[0];
    const content = first.message.content;
    return {
      content: typeof content === "string" ? content : null,
      finishReason: typeof first.finish_reason === "string" ? first.finish_reason : null,
      model: data.model || req.model,
      usage: data.usage,
    };
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), this.timeoutMs);
    try {
      let res: Response;
      try {
        res = await this.fetchFn(`${this.baseUrl}${path}`, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(body),
          signal: ac.signal,
        });
      } catch (err) {
        throw ExternalServiceError.fromNetworkError(SERVICE, err);
      }
      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw ExternalServiceError.fromStatus(SERVICE, res.status, text);
      }
      try {
        return await res.json();
      } catch (err) {
        throw new ExternalServiceError(SERVICE, "openai returned a body that is not JSON", {
          status: res.status,
          retryable: true,
          category: "upstream",
          cause: err,
        });
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

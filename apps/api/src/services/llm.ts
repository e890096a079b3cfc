import type { Logger } from "pino";
import type { OpenAIClient } from "@reelgen/openai-client";
import {
  MalformedResponseError,
  categorizeError,
  compileSchema,
  formatSchemaErrors,
  retryWithBackoff,
  type RetryHooks,
  type RetryPolicy,
} from "@reelgen/shared";
import {
  generatedScriptSchema,
  type BrandProfile,
  type GeneratedScript,
  type RetrievedExample,
  type ScriptRequest,
} from "@reelgen/schemas";
import { DEFAULT_PROMPT_LIMITS, buildPrompt, type PromptLimits, type PromptTemplates } from "./prompt";

const isGeneratedScript = compileSchema<GeneratedScript>(generatedScriptSchema);

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/** Turns the model's message into a script. Tolerates a surrounding ```json fence. */
export function parseScriptResponse(content: string | null): GeneratedScript {
  if (content === null || !content.trim())
    throw new MalformedResponseError("LLM returned an empty message");
  const trimmed = content.trim();
  const unfenced = FENCE.exec(trimmed)?.[1] ?? trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced);
  } catch {
    throw new MalformedResponseError("LLM returned content that is not JSON", content);
  }
  if (!isGeneratedScript(parsed)) {
    const issues = formatSchemaErrors(isGeneratedScript.errors);
    throw new MalformedResponseError(
      `LLM JSON does not match the script shape: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}`,
      content,
    );
  }
  return {
    hook: parsed.hook.trim(),
    body: parsed.body.trim(),
    cta: parsed.cta.trim(),
    caption: parsed.caption.trim(),
    hashtags: parsed.hashtags.map((tag) => tag.trim()),
  };
}

export type LlmServiceOptions = {
  client: Pick<OpenAIClient, "createChatCompletion">;
  templates: PromptTemplates;
  model: string;
  temperature: number;
  maxTokens: number;
  retry: RetryPolicy;
  logger: Logger;
  limits?: PromptLimits;
  retryHooks?: RetryHooks;
};

export type GenerateContext = {
  requestId?: string;
  /** Request-scoped logger, already carrying the request id. */
  logger?: Logger;
};

export class LlmService {
  constructor(private readonly opts: LlmServiceOptions) {}

  get model(): string {
    return this.opts.model;
  }

  buildPrompt(
    brand: BrandProfile,
    request: ScriptRequest,
    examples: readonly RetrievedExample[],
  ): string {
    return buildPrompt(
      this.opts.templates.instruction,
      brand,
      request,
      examples,
      this.opts.limits ?? DEFAULT_PROMPT_LIMITS,
    );
  }

  /**
   * One chat completion in JSON mode, parsed into a script. Transient failures
   * and unparseable answers are retried per the configured policy.
   */
  async generate(prompt: string, ctx: GenerateContext = {}): Promise<GeneratedScript> {
    const log = ctx.logger ?? this.opts.logger.child({ request_id: ctx.requestId });
    const hooks = this.opts.retryHooks ?? {};
    try {
      return await retryWithBackoff(
        async (attempt) => {
          const result = await this.opts.client.createChatCompletion({
            model: this.opts.model,
            messages: [
              { role: "system", content: this.opts.templates.system },
              { role: "user", content: prompt },
            ],
            temperature: this.opts.temperature,
            max_tokens: this.opts.maxTokens,
            response_format: { type: "json_object" },
          });
          log.debug(
            { attempt, finish_reason: result.finishReason, usage: result.usage },
            "llm.generate.response",
          );
          return parseScriptResponse(result.content);
        },
        this.opts.retry,
        {
          ...hooks,
          onRetry: (event) => {
            log.warn(
              {
                attempt: event.attempt,
                max_attempts: event.maxAttempts,
                delay_ms: event.delayMs,
                category: categorizeError(event.error),
                err: event.error,
              },
              "llm.generate.retry",
            );
            hooks.onRetry?.(event);
          },
        },
      );
    } catch (err) {
      log.error({ category: categorizeError(err), err }, "llm.generate.failed");
      throw err;
    }
  }
}

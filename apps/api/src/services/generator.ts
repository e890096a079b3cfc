import type { Logger } from "pino";
import {
  ExternalServiceError,
  categorizeError,
  retryWithBackoff,
  type RetryHooks,
  type RetryPolicy,
} from "@reelgen/shared";
import type {
  BrandProfile,
  GeneratedScript,
  RetrievedExample,
  ScriptRequest,
  ValidationResult,
} from "@reelgen/schemas";
import type { RetrievalService } from "../rag/retrieve";
import { validateScript } from "../validation/checks";
import { DEFAULT_RULES, rulesForBrand, type ValidationRules } from "../validation/rules";
import type { LlmService } from "./llm";

export type ExampleSource = Pick<RetrievalService, "retrieveForGeneration">;
export type ScriptWriter = Pick<LlmService, "buildPrompt" | "generate" | "model">;

export type ScriptGeneratorOptions = {
  retrieval: ExampleSource;
  writer: ScriptWriter;
  logger: Logger;
  /** Total generate-and-validate rounds per request, first included. */
  maxAttempts: number;
  /** Applied to the query embedding call during retrieval. */
  retry: RetryPolicy;
  retryHooks?: RetryHooks;
  baseRules?: ValidationRules;
};

export type GenerationOutcome = {
  script: GeneratedScript;
  validation: ValidationResult;
  attempts: number;
  examples: RetrievedExample[];
  model: string;
};

export type GenerationContext = {
  requestId?: string;
  logger?: Logger;
};

export class ScriptGenerator {
  constructor(private readonly opts: ScriptGeneratorOptions) {}

  private async examplesFor(
    brand: BrandProfile,
    request: ScriptRequest,
    log: Logger,
  ): Promise<RetrievedExample[]> {
    try {
      return await retryWithBackoff(
        () => this.opts.retrieval.retrieveForGeneration(brand, request),
        this.opts.retry,
        {
          ...this.opts.retryHooks,
          onRetry: (event) =>
            log.warn(
              { attempt: event.attempt, category: categorizeError(event.error), err: event.error },
              "rag.retrieve.retry",
            ),
        },
      );
    } catch (err) {
      if (!(err instanceof ExternalServiceError)) throw err;
      log.warn({ category: err.category, err }, "rag.retrieve.failed_without_examples");
      return [];
    }
  }

  /**
   * Retrieves examples, then asks the writer for a script until one passes
   * validation or the attempt budget runs out. An exhausted budget returns the
   * last script with its failing validation rather than throwing.
   */
  async generate(
    brand: BrandProfile,
    request: ScriptRequest,
    ctx: GenerationContext = {},
  ): Promise<GenerationOutcome> {
    const log = (ctx.logger ?? this.opts.logger).child({ request_id: ctx.requestId });
    const maxAttempts = Math.max(1, Math.floor(this.opts.maxAttempts));

    const examples = await this.examplesFor(brand, request, log);
    log.info({ examples: examples.map((e) => e.id) }, "generator.examples");

    const prompt = this.opts.writer.buildPrompt(brand, request, examples);
    const rules = rulesForBrand(brand, this.opts.baseRules ?? DEFAULT_RULES);

    for (let attempt = 1; ; attempt++) {
      const script = await this.opts.writer.generate(prompt, { requestId: ctx.requestId, logger: log });
      const validation = validateScript(script, rules);
      if (validation.is_valid || attempt >= maxAttempts) {
        log.info(
          { attempts: attempt, is_valid: validation.is_valid, errors: validation.errors.length },
          "generator.done",
        );
        return { script, validation, attempts: attempt, examples, model: this.opts.writer.model };
      }
      log.info({ attempt, errors: validation.errors }, "generator.script.invalid");
    }
  }
}

import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { BrandProfile, RetrievedExample, ScriptRequest } from "@reelgen/schemas";

export type PromptTemplates = Readonly<{ system: string; instruction: string }>;

export type PromptLimits = Readonly<{
  maxFieldChars: number;
  maxListItems: number;
  /** `do_not_use` is checked in full after generation, so it gets its own bound. */
  maxBannedWords: number;
  maxExamples: number;
}>;

export const DEFAULT_PROMPT_LIMITS: PromptLimits = Object.freeze({
  maxFieldChars: 500,
  maxListItems: 10,
  maxBannedWords: 50,
  maxExamples: 5,
});

export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

const PLACEHOLDER = /\{(brand_profile|script_request|reference_examples)\}/g;
const REQUIRED_PLACEHOLDERS = ["{brand_profile}", "{script_request}", "{reference_examples}"];

export const NO_EXAMPLES = "No reference examples available.";

export function loadPromptTemplates(dir: string = DEFAULT_PROMPTS_DIR): PromptTemplates {
  const system = readFileSync(path.join(dir, "system.txt"), "utf8").trim();
  const instructionPath = path.join(dir, "instruction.txt");
  const instruction = readFileSync(instructionPath, "utf8");
  const missing = REQUIRED_PLACEHOLDERS.filter((p) => !instruction.includes(p));
  if (missing.length) throw new Error(`${instructionPath}: missing ${missing.join(", ")}`);
  if (!system) throw new Error(`${path.join(dir, "system.txt")}: empty system prompt`);
  return Object.freeze({ system, instruction });
}

/** Cuts to `max` code points, so a surrogate pair is never split. */
export function clampText(text: string, max: number): string {
  const chars = [...text];
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : text;
}

function clampValue(value: unknown, limits: PromptLimits, maxItems = limits.maxListItems): unknown {
  if (typeof value === "string") return clampText(value, limits.maxFieldChars);
  if (Array.isArray(value))
    return value.slice(0, maxItems).map((item: unknown) => clampValue(item, limits));
  if (value && typeof value === "object")
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        clampValue(v, limits, k === "do_not_use" ? limits.maxBannedWords : limits.maxListItems),
      ]),
    );
  return value;
}

function formatExample(example: RetrievedExample, n: number, limits: PromptLimits): string {
  const text = (s: string) => clampText(s, limits.maxFieldChars);
  const hashtags = example.hashtags.slice(0, limits.maxListItems).map(text).join(" ");
  return [
    "",
    `Example ${n} (Similarity: ${example.similarity_score.toFixed(2)}):`,
    `Sector: ${example.sector}`,
    `Hook Type: ${example.hook_type}`,
    `Engagement Rate: ${example.engagement_rate}%`,
    `Hook: ${text(example.hook)}`,
    `Body: ${text(example.body)}`,
    `CTA: ${text(example.cta)}`,
    `Caption: ${text(example.caption)}`,
    `Hashtags: ${hashtags}`,
    "---",
    "",
  ].join("\n");
}

export function formatExamples(
  examples: readonly RetrievedExample[],
  limits: PromptLimits = DEFAULT_PROMPT_LIMITS,
): string {
  const shown = examples.slice(0, limits.maxExamples);
  if (shown.length === 0) return NO_EXAMPLES;
  return shown.map((ex, i) => formatExample(ex, i + 1, limits)).join("");
}

/**
 * Fills the instruction template in one pass, so placeholder text inside the
 * brand or request values is left as written.
 */
export function buildPrompt(
  instruction: string,
  brand: BrandProfile,
  request: ScriptRequest,
  examples: readonly RetrievedExample[],
  limits: PromptLimits = DEFAULT_PROMPT_LIMITS,
): string {
  const values = {
    brand_profile: JSON.stringify(clampValue(brand, limits), null, 2),
    script_request: JSON.stringify(clampValue(request, limits), null, 2),
    reference_examples: formatExamples(examples, limits),
  };
  return instruction.replace(PLACEHOLDER, (match: string, key: string) => {
    if (key === "brand_profile") return values.brand_profile;
    if (key === "script_request") return values.script_request;
    if (key === "reference_examples") return values.reference_examples;
    return match;
  });
}

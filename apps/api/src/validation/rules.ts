import type { BrandProfile } from "@reelgen/schemas";
import { deepFreeze } from "@reelgen/shared";
import voiceKeywords from "../../data/brand_voice_keywords.json";

export type Range = Readonly<{ min: number; max: number }>;

export type WordLimitedField = "hook" | "body" | "cta";

export type ValidationRules = Readonly<{
  /** Whitespace-separated word counts, inclusive. */
  wordLimits: Readonly<Record<WordLimitedField, Range>>;
  /** Caption length in characters, inclusive. */
  captionLength: Range;
  hashtagCount: Range;
  ctaActionWords: readonly string[];
  ctaUrgencyWords: readonly string[];
  /** Brand voice adjective to words that signal it. */
  voiceKeywords: Readonly<Record<string, readonly string[]>>;
  bannedWords: readonly string[];
  brandVoice: readonly string[];
}>;

export const DEFAULT_RULES: ValidationRules = deepFreeze({
  wordLimits: {
    hook: { min: 3, max: 15 },
    body: { min: 20, max: 150 },
    cta: { min: 3, max: 15 },
  },
  captionLength: { min: 50, max: 200 },
  hashtagCount: { min: 3, max: 10 },
  ctaActionWords: ["download", "try", "start", "join", "get", "shop", "learn", "discover", "click"],
  ctaUrgencyWords: ["now", "today", "limited", "free", "save"],
  voiceKeywords,
  bannedWords: [],
  brandVoice: [],
});

export function rulesForBrand(
  brand: Pick<BrandProfile, "do_not_use" | "brand_voice">,
  base: ValidationRules = DEFAULT_RULES,
): ValidationRules {
  return Object.freeze({
    ...base,
    bannedWords: Object.freeze([...brand.do_not_use]),
    brandVoice: Object.freeze([...brand.brand_voice]),
  });
}

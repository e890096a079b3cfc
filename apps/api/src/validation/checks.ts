import type { GeneratedScript, ValidationResult } from "@reelgen/schemas";
import type { Range, ValidationRules, WordLimitedField } from "./rules";

const WORD_FIELDS: readonly WordLimitedField[] = ["hook", "body", "cta"];

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function rangeError(label: string, count: number, unit: string, range: Range): string | undefined {
  if (count < range.min) return `${label} too short: ${count} ${unit} (minimum: ${range.min})`;
  if (count > range.max) return `${label} too long: ${count} ${unit} (maximum: ${range.max})`;
  return undefined;
}

function checkWordCounts(script: GeneratedScript, rules: ValidationRules): string[] {
  return WORD_FIELDS.flatMap((field) => {
    const error = rangeError(
      capitalize(field),
      countWords(script[field]),
      "words",
      rules.wordLimits[field],
    );
    return error ? [error] : [];
  });
}

function checkCaption(script: GeneratedScript, rules: ValidationRules): string[] {
  const error = rangeError("Caption", [...script.caption].length, "characters", rules.captionLength);
  return error ? [error] : [];
}

function checkBannedWords(script: GeneratedScript, rules: ValidationRules): string[] {
  if (rules.bannedWords.length === 0) return [];
  const text = `${script.hook} ${script.body} ${script.cta} ${script.caption}`.toLowerCase();
  const found = rules.bannedWords.filter((word) => text.includes(word.toLowerCase()));
  return found.length ? [`Script contains banned words: ${found.join(", ")}`] : [];
}

function checkHashtags(script: GeneratedScript, rules: ValidationRules): string[] {
  const { min, max } = rules.hashtagCount;
  const count = script.hashtags.length;
  const errors: string[] = [];
  if (count < min) errors.push(`Too few hashtags: ${count} (minimum: ${min})`);
  else if (count > max) errors.push(`Too many hashtags: ${count} (maximum: ${max})`);

  for (const tag of script.hashtags) {
    if (!tag.startsWith("#")) errors.push(`Invalid hashtag format: ${tag} (must start with #)`);
    else if (/\s/.test(tag)) errors.push(`Invalid hashtag: ${tag} (cannot contain spaces)`);
  }
  return errors;
}

function checkCta(script: GeneratedScript, rules: ValidationRules): string[] {
  const cta = script.cta.toLowerCase();
  const warnings: string[] = [];
  if (!rules.ctaActionWords.some((w) => cta.includes(w)))
    warnings.push("CTA might be more effective with an action verb");
  if (!rules.ctaUrgencyWords.some((w) => cta.includes(w)))
    warnings.push("CTA could benefit from urgency language");
  return warnings;
}

function checkBrandVoice(script: GeneratedScript, rules: ValidationRules): string[] {
  if (rules.brandVoice.length === 0) return [];
  const text = `${script.hook} ${script.body} ${script.cta}`.toLowerCase();
  const hits = rules.brandVoice.some((voice) => {
    const keywords = Object.entries(rules.voiceKeywords).find(([k]) => k === voice.toLowerCase());
    return keywords ? keywords[1].some((kw) => text.includes(kw)) : false;
  });
  return hits ? [] : [`Script may not align with brand voice: ${rules.brandVoice.join(", ")}`];
}

/**
 * Runs every check and collects all findings. Errors block the script;
 * warnings are advisory. Pure: the same input always yields the same result.
 */
export function validateScript(script: GeneratedScript, rules: ValidationRules): ValidationResult {
  const errors = [
    ...checkWordCounts(script, rules),
    ...checkCaption(script, rules),
    ...checkBannedWords(script, rules),
    ...checkHashtags(script, rules),
  ];
  const warnings = [...checkCta(script, rules), ...checkBrandVoice(script, rules)];
  return { is_valid: errors.length === 0, errors, warnings };
}

export const SECTORS = [
  "fitness",
  "finance",
  "fashion",
  "beauty",
  "productivity",
  "pets",
  "education",
  "wellness",
  "technology",
  "food",
  "travel",
  "real_estate",
] as const;

export const HOOK_TYPES = [
  "question",
  "bold_claim",
  "relatable",
  "shocking",
  "curiosity",
  "statistic",
  "story",
] as const;

export const GOALS = ["awareness", "conversion", "engagement"] as const;

export const CTA_STYLES = ["direct", "soft", "question"] as const;

export const PERFORMANCE_LEVELS = ["high", "medium", "low"] as const;

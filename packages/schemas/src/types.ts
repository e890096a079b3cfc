import type { CTA_STYLES, GOALS, HOOK_TYPES, PERFORMANCE_LEVELS, SECTORS } from "./catalog";

export type Sector = (typeof SECTORS)[number];
export type HookType = (typeof HOOK_TYPES)[number];
export type Goal = (typeof GOALS)[number];
export type CtaStyle = (typeof CTA_STYLES)[number];
export type PerformanceLevel = (typeof PERFORMANCE_LEVELS)[number];

export type TargetAudience = {
  age_range: string;
  gender: string;
  location: string;
  pain_points: string[];
};

export type BrandProfile = {
  brand_name: string;
  sector: Sector;
  target_audience: TargetAudience;
  brand_voice: string[];
  offer: string;
  platform: string;
  cta_style: CtaStyle;
  do_not_use: string[];
};

export type ScriptRequest = {
  goal: Goal;
  hook_type: HookType;
  emotion: string;
  /** Seconds, 15-60 inclusive. */
  script_length: number;
  language: string;
  cta: string;
};

export type GeneratedScript = {
  hook: string;
  body: string;
  cta: string;
  caption: string;
  hashtags: string[];
};

export type ReferenceScript = GeneratedScript & {
  id: string;
  sector: string;
  hook_type: string;
  emotion: string;
  performance_level: PerformanceLevel;
  engagement_rate: number;
};

export type RetrievedExample = ReferenceScript & { similarity_score: number };

export type ValidationResult = {
  is_valid: boolean;
  errors: string[];
  warnings: string[];
};

export type SimilarityMetric = "l2" | "cosine";

export type VectorIndexEntry = {
  id: string;
  vector: number[];
  document: ReferenceScript;
};

export type VectorIndexFile = {
  version: 1;
  embedding_model: string;
  metric: SimilarityMetric;
  dimensions: number;
  fingerprint: string;
  built_at: string;
  entries: VectorIndexEntry[];
};

export type GenerationMetadata = {
  brand: string;
  sector: Sector;
  goal: Goal;
  hook_type: HookType;
  script_length: number;
  generation_attempts: number;
  examples_used: string[];
  model: string;
  request_id?: string;
};

export type GenerateReelResponse = {
  script: GeneratedScript;
  validation: ValidationResult;
  metadata: GenerationMetadata;
};

import type { BrandProfile, GeneratedScript, ReferenceScript, ScriptRequest } from "@reelgen/schemas";

export const brandInput = {
  brand_name: "TestBrand",
  sector: "fitness",
  target_audience: {
    age_range: "25-40",
    gender: "all",
    location: "urban",
    pain_points: ["no time", "expensive gyms"],
  },
  brand_voice: ["energetic", "motivational"],
  offer: "30-day home workout plan",
  cta_style: "direct",
  do_not_use: ["lazy", "fat"],
};

export const requestInput = {
  goal: "conversion",
  hook_type: "question",
  emotion: "motivation",
  script_length: 30,
  cta: "Download the app",
};

export const brand: BrandProfile = {
  ...brandInput,
  sector: "fitness",
  cta_style: "direct",
  platform: "instagram",
};

export const request: ScriptRequest = {
  ...requestInput,
  goal: "conversion",
  hook_type: "question",
  language: "english",
};

export const validScript: GeneratedScript = {
  hook: "Ready to transform your fitness journey?",
  body:
    "With TestBrand's AI-powered workout plans, you can achieve your goals at home. " +
    "No expensive gym memberships needed. Our smart algorithms create personalized routines just for you.",
  cta: "Download the app now and start your transformation!",
  caption: "Your fitness journey starts at home. Fifteen minutes a day is all it takes.",
  hashtags: ["#FitnessGoals", "#HomeWorkout", "#TestBrand"],
};

/** Same as validScript except the hook is a single word. */
export const shortHookScript: GeneratedScript = { ...validScript, hook: "Go!" };

export function referenceScript(overrides: Partial<ReferenceScript> & { id: string }): ReferenceScript {
  return {
    sector: "fitness",
    hook_type: "question",
    emotion: "motivation",
    performance_level: "high",
    engagement_rate: 5,
    ...validScript,
    ...overrides,
  };
}

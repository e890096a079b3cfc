import { describe, expect, it } from "vitest";
import { CTA_STYLES, GOALS, HOOK_TYPES, PERFORMANCE_LEVELS, SECTORS } from "./catalog";
import {
  brandProfileSchema,
  referenceScriptSchema,
  scriptRequestSchema,
} from "./index";

describe("catalogs match the JSON schemas", () => {
  it("sectors", () => {
    expect(brandProfileSchema.properties.sector.enum).toEqual([...SECTORS]);
  });

  it("cta styles", () => {
    expect(brandProfileSchema.properties.cta_style.enum).toEqual([...CTA_STYLES]);
  });

  it("hook types", () => {
    expect(scriptRequestSchema.properties.hook_type.enum).toEqual([...HOOK_TYPES]);
  });

  it("goals", () => {
    expect(scriptRequestSchema.properties.goal.enum).toEqual([...GOALS]);
  });

  it("performance levels", () => {
    expect(referenceScriptSchema.properties.performance_level.enum).toEqual([
      ...PERFORMANCE_LEVELS,
    ]);
  });

  it("script length is bounded to 15-60 seconds", () => {
    expect(scriptRequestSchema.properties.script_length.minimum).toBe(15);
    expect(scriptRequestSchema.properties.script_length.maximum).toBe(60);
  });
});

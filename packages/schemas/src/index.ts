export * from "./types";
export * from "./catalog";
export { default as brandProfileSchema } from "../schemas/brand_profile.schema.json";
export { default as scriptRequestSchema } from "../schemas/script_request.schema.json";
export { default as generatedScriptSchema } from "../schemas/generated_script.schema.json";
export { default as referenceScriptSchema } from "../schemas/reference_script.schema.json";
export { default as vectorIndexSchema } from "../schemas/vector_index.schema.json";

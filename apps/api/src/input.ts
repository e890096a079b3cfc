import {
  ValidationInputError,
  compileSchema,
  deepFreeze,
  formatSchemaErrors,
  type FieldIssue,
  type ValidateFunction,
} from "@reelgen/shared";
import {
  brandProfileSchema,
  scriptRequestSchema,
  type BrandProfile,
  type ScriptRequest,
} from "@reelgen/schemas";

const validateBrand = compileSchema<BrandProfile>(brandProfileSchema);
const validateScriptRequest = compileSchema<ScriptRequest>(scriptRequestSchema);

type Checked<T> = { value?: T; issues: FieldIssue[] };

function check<T>(validator: ValidateFunction<T>, input: unknown, path: string): Checked<T> {
  if (input === undefined || input === null)
    return { issues: [{ path, message: "is required" }] };
  // Ajv fills defaults in place; work on a copy so the caller's object is untouched.
  const copy: unknown = structuredClone(input);
  if (!validator(copy)) return { issues: formatSchemaErrors(validator.errors, path) };
  return { value: deepFreeze(copy), issues: [] };
}

function unwrap<T>(checked: Checked<T>, message: string): T {
  if (checked.value === undefined) throw new ValidationInputError(message, checked.issues);
  return checked.value;
}

export function parseBrandProfile(input: unknown): BrandProfile {
  return unwrap(check(validateBrand, input, "brand_profile"), "Invalid brand_profile");
}

/** Fails with ValidationInputError when script_length is outside 15-60 seconds. */
export function parseScriptRequest(input: unknown): ScriptRequest {
  return unwrap(check(validateScriptRequest, input, "script_request"), "Invalid script_request");
}

function field(body: unknown, ...keys: string[]): unknown {
  if (!body || typeof body !== "object") return undefined;
  const entries = Object.entries(body);
  for (const key of keys) {
    const hit = entries.find(([k]) => k === key);
    if (hit) return hit[1];
  }
  return undefined;
}

/** Parses a `/generate-reel` body, reporting problems in both halves at once. */
export function parseGenerateReelBody(body: unknown): {
  brand: BrandProfile;
  request: ScriptRequest;
} {
  const brand = check(validateBrand, field(body, "brand_profile", "brandProfile"), "brand_profile");
  const request = check(
    validateScriptRequest,
    field(body, "script_request", "scriptRequest"),
    "script_request",
  );
  if (brand.value === undefined || request.value === undefined)
    throw new ValidationInputError("Invalid generate-reel request", [
      ...brand.issues,
      ...request.issues,
    ]);
  return { brand: brand.value, request: request.value };
}

import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, ValidateFunction } from "ajv";
import type { FieldIssue } from "./errors";

export type { ErrorObject, ValidateFunction } from "ajv";

const ajv = new Ajv2020({ allErrors: true, strict: true, useDefaults: true });
addFormats(ajv);

function stripMetaSchema(schema: object): Record<string, unknown> {
  // $id is dropped so the same file can be compiled by several modules without
  // Ajv complaining about a duplicate registration.
  return Object.fromEntries(
    Object.entries(schema).filter(([key]) => key !== "$schema" && key !== "$id"),
  );
}

export function compileSchema<T>(schema: object): ValidateFunction<T> {
  return ajv.compile<T>(stripMetaSchema(schema));
}

function issuePath(err: ErrorObject, prefix: string): string {
  const pointer = err.instancePath.replace(/^\//, "").split("/").filter(Boolean);
  if (err.keyword === "required" && typeof err.params.missingProperty === "string")
    pointer.push(err.params.missingProperty);
  if (
    err.keyword === "additionalProperties" &&
    typeof err.params.additionalProperty === "string"
  )
    pointer.push(err.params.additionalProperty);
  const joined = pointer.join(".");
  if (!prefix) return joined || "(root)";
  return joined ? `${prefix}.${joined}` : prefix;
}

/** Flattens Ajv errors into `{ path, message }` pairs, e.g. `script_request.script_length`. */
export function formatSchemaErrors(
  errors: readonly ErrorObject[] | null | undefined,
  prefix = "",
): FieldIssue[] {
  if (!errors) return [];
  return errors.map((err) => {
    let message = err.message ?? "is invalid";
    if (err.keyword === "enum" && Array.isArray(err.params.allowedValues))
      message = `${message}: ${err.params.allowedValues.join(", ")}`;
    return { path: issuePath(err, prefix), message };
  });
}

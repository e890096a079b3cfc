import { createHash } from "crypto";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { compileSchema, deepFreeze, formatSchemaErrors } from "@reelgen/shared";
import { referenceScriptSchema, type ReferenceScript } from "@reelgen/schemas";

export const DEFAULT_CORPUS_PATH = fileURLToPath(
  new URL("../../data/reference_scripts.json", import.meta.url),
);

const isReferenceScript = compileSchema<ReferenceScript>(referenceScriptSchema);

/** Reads the built-in reference scripts. Throws on a malformed entry or a repeated id. */
export function loadReferenceScripts(path: string = DEFAULT_CORPUS_PATH): ReferenceScript[] {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!Array.isArray(parsed)) throw new Error(`${path}: expected an array of reference scripts`);
  const seen = new Set<string>();
  return parsed.map((item: unknown, i) => {
    if (!isReferenceScript(item)) {
      const issues = formatSchemaErrors(isReferenceScript.errors, `[${i}]`);
      throw new Error(
        `${path}: ${issues.map((issue) => `${issue.path} ${issue.message}`).join("; ")}`,
      );
    }
    if (seen.has(item.id)) throw new Error(`${path}: duplicate reference id ${item.id}`);
    seen.add(item.id);
    return deepFreeze(item);
  });
}

export function indexingText(doc: Pick<ReferenceScript, "hook" | "body" | "cta">): string {
  return `Hook: ${doc.hook} Body: ${doc.body} CTA: ${doc.cta}`;
}

/** Changes whenever any field of any document changes, metadata included. */
export function corpusFingerprint(docs: readonly ReferenceScript[]): string {
  const hash = createHash("sha256");
  for (const doc of docs) {
    // Documents are flat, so sorting the top-level keys gives a stable encoding.
    hash.update(`${JSON.stringify(doc, Object.keys(doc).sort())}\n${indexingText(doc)}\n`);
  }
  return hash.digest("hex").slice(0, 16);
}

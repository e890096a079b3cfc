import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { IndexNotFoundError, compileSchema, deepFreeze } from "@reelgen/shared";
import {
  referenceScriptSchema,
  vectorIndexSchema,
  type ReferenceScript,
  type VectorIndexFile,
} from "@reelgen/schemas";
import { VectorIndex } from "./vector-index";

const isIndexFile = compileSchema<VectorIndexFile>(vectorIndexSchema);
const isReferenceScript = compileSchema<ReferenceScript>(referenceScriptSchema);

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string")
    return err.code;
  return undefined;
}

/** Writes the index next to its final location first, then renames it into place. */
export async function saveIndex(index: VectorIndex, file: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmp, JSON.stringify(index.toFile()), "utf8");
    await rename(tmp, file);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

export async function loadIndex(file: string): Promise<VectorIndex> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (err) {
    throw new IndexNotFoundError(file, errorCode(err) === "ENOENT" ? "missing" : "unreadable", err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new IndexNotFoundError(file, "invalid", err);
  }
  if (!isIndexFile(parsed)) throw new IndexNotFoundError(file, "invalid", isIndexFile.errors);
  for (const entry of parsed.entries) {
    if (!isReferenceScript(entry.document))
      throw new IndexNotFoundError(file, "invalid", isReferenceScript.errors);
    deepFreeze(entry.document);
  }

  try {
    return VectorIndex.fromFile(parsed);
  } catch (err) {
    throw new IndexNotFoundError(file, "invalid", err);
  }
}

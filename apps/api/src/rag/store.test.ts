import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IndexNotFoundError } from "@reelgen/shared";
import { referenceScript } from "../testing/fixtures";
import { loadIndex, saveIndex } from "./store";
import { VectorIndex } from "./vector-index";

const index = new VectorIndex({
  embeddingModel: "test-model",
  metric: "l2",
  fingerprint: "abc123",
  builtAt: "2026-01-01T00:00:00.000Z",
  entries: [
    { id: "one", vector: [0.1, 0.2], document: referenceScript({ id: "one" }) },
    { id: "two", vector: [0.3, 0.4], document: referenceScript({ id: "two" }) },
  ],
});

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "reel-index-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function loadError(file: string): Promise<IndexNotFoundError> {
  const err = await loadIndex(file).catch((e: unknown) => e);
  if (!(err instanceof IndexNotFoundError)) throw new Error("expected IndexNotFoundError");
  return err;
}

describe("saveIndex / loadIndex", () => {
  it("round-trips through a file in a new directory", async () => {
    const file = path.join(dir, "nested", "index.json");
    await saveIndex(index, file);

    const loaded = await loadIndex(file);
    expect(loaded.toFile()).toEqual(index.toFile());
    expect(await readdir(path.dirname(file))).toEqual(["index.json"]);
  });

  it("reports a missing file", async () => {
    const file = path.join(dir, "absent.json");
    const err = await loadError(file);
    expect(err.reason).toBe("missing");
    expect(err.message).toBe(`Vector index missing at ${file}`);
  });

  it("reports a directory in place of the file as unreadable", async () => {
    expect((await loadError(dir)).reason).toBe("unreadable");
  });

  it("reports a file that is not JSON", async () => {
    const file = path.join(dir, "index.json");
    await writeFile(file, "{not json", "utf8");
    expect((await loadError(file)).reason).toBe("invalid");
  });

  it("reports a file of the wrong shape", async () => {
    const file = path.join(dir, "index.json");
    await writeFile(file, JSON.stringify({ ...index.toFile(), version: 2 }), "utf8");
    expect((await loadError(file)).reason).toBe("invalid");
  });

  it("reports a stored document of the wrong shape", async () => {
    const file = path.join(dir, "index.json");
    const data = index.toFile();
    await writeFile(
      file,
      JSON.stringify({
        ...data,
        entries: [{ ...data.entries[0], document: { id: "one" } }],
      }),
      "utf8",
    );
    expect((await loadError(file)).reason).toBe("invalid");
  });

  it("reports vectors that disagree with the declared width", async () => {
    const file = path.join(dir, "index.json");
    await writeFile(file, JSON.stringify({ ...index.toFile(), dimensions: 3 }), "utf8");
    expect((await loadError(file)).reason).toBe("invalid");
  });
});

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { loadIndexIfPresent, saveIndex } from "../indexStore.js";
import type { StoredIndex } from "../types.js";

describe("indexStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "storyteller-index-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const index: StoredIndex = {
    version: 1,
    embeddingModel: "test-model",
    knowledgeSource: "builtin",
    embeddingDimension: 2,
    chunks: [{ id: "p-0", source: "test", text: "A fox spirit.", embedding: [0.5, 0.25] }]
  };

  async function writeRaw(value: unknown): Promise<string> {
    const filePath = path.join(dir, "index.json");
    await fs.writeFile(filePath, JSON.stringify(value), "utf-8");
    return filePath;
  }

  it("should write the index into a nested directory and read it back", async () => {
    const filePath = path.join(dir, "nested", "index.json");
    await saveIndex(filePath, index);

    await expect(loadIndexIfPresent(filePath)).resolves.toEqual(index);
  });

  it("should report a missing index as undefined", async () => {
    await expect(loadIndexIfPresent(path.join(dir, "missing.json"))).resolves.toBeUndefined();
  });

  it("should reject an unknown index version", async () => {
    const filePath = await writeRaw({ ...index, version: 2 });

    await expect(loadIndexIfPresent(filePath)).rejects.toThrow("Unsupported index version");
  });

  it("should reject chunks whose dimension differs from the index", async () => {
    const filePath = await writeRaw({
      ...index,
      chunks: [
        ...index.chunks,
        { id: "p-1", source: "test", text: "A city of gold.", embedding: [1, 0, 0] }
      ]
    });

    await expect(loadIndexIfPresent(filePath)).rejects.toThrow(
      `Index is invalid: ${filePath} (chunk 1 has dimension 3, expected 2)\nRe-run: storyteller ingest`
    );
  });

  it("should reject an index without a declared dimension", async () => {
    const { embeddingDimension: _dropped, ...rest } = index;
    const filePath = await writeRaw(rest);

    await expect(loadIndexIfPresent(filePath)).rejects.toThrow("missing embeddingDimension");
  });

  it("should reject an index without a knowledge source", async () => {
    const { knowledgeSource: _dropped, ...rest } = index;
    const filePath = await writeRaw(rest);

    await expect(loadIndexIfPresent(filePath)).rejects.toThrow("missing knowledgeSource");
  });

  it("should reject a malformed chunk", async () => {
    const filePath = await writeRaw({ ...index, chunks: [{ id: "p-0", text: "No source.", embedding: [1, 0] }] });

    await expect(loadIndexIfPresent(filePath)).rejects.toThrow("chunk 0 is malformed");
  });
});

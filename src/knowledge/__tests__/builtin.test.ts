import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { loadBuiltinKnowledge, toBuiltinPassages } from "../builtin.js";

describe("loadBuiltinKnowledge", () => {
  it("should load the bundled folklore passages", async () => {
    const passages = await loadBuiltinKnowledge();

    expect(passages.map((p) => p.id)).toEqual([
      "builtin-0",
      "builtin-1",
      "builtin-2",
      "builtin-3",
      "builtin-4",
      "builtin-5"
    ]);
    expect(passages.every((p) => p.source === "builtin")).toBe(true);
    expect(passages[0]?.text).toContain("kitsune");
  });

  it("should reject a malformed knowledge file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "storyteller-knowledge-"));
    const filePath = path.join(dir, "knowledge.json");
    await fs.writeFile(filePath, JSON.stringify({ passages: ["ok", 7] }), "utf-8");
    try {
      await expect(loadBuiltinKnowledge(filePath)).rejects.toThrow("Knowledge file is malformed");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("toBuiltinPassages", () => {
  it("should trim texts and drop blank ones", () => {
    expect(toBuiltinPassages(["  A fox.  ", " ", "A tree."])).toEqual([
      { id: "builtin-0", source: "builtin", text: "A fox." },
      { id: "builtin-1", source: "builtin", text: "A tree." }
    ]);
  });
});

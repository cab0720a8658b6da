import crypto from "node:crypto";

import { DirectoryLoader } from "@langchain/classic/document_loaders/fs/directory";
import { TextLoader } from "@langchain/classic/document_loaders/fs/text";
import type { Document } from "@langchain/core/documents";
import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

import type { Passage } from "../retrieval/types.js";

type AnyMetadata = Record<string, unknown>;

export async function loadSourceDirectory(sourceDir: string): Promise<Document<AnyMetadata>[]> {
  const loader = new DirectoryLoader(sourceDir, {
    ".md": (p: string) => new TextLoader(p),
    ".txt": (p: string) => new TextLoader(p)
  });

  return loader.load();
}

/** Loads lore files from a directory and splits them into passages. */
export async function loadDirectoryKnowledge(sourceDir: string): Promise<Passage[]> {
  const docs = await loadSourceDirectory(sourceDir);

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: 1000,
    chunkOverlap: 150
  });
  const splits = await splitter.splitDocuments(docs);

  return splits
    .filter((d) => d.pageContent.trim().length > 0)
    .map((d) => {
      const source = String(d.metadata.source ?? "");
      const text = d.pageContent;
      const id = crypto.createHash("sha256").update(`${source}\n${text}`).digest("hex");
      return { id, source, text };
    });
}

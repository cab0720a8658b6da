export type Passage = {
  id: string;
  source: string;
  text: string;
};

export type StoredChunk = Passage & {
  embedding: number[];
};

export type StoredIndex = {
  version: 1;
  embeddingModel: string;
  /** "builtin", or the absolute path of the lore directory. */
  knowledgeSource: string;
  embeddingDimension: number;
  chunks: StoredChunk[];
};

export type ScoredPassage = {
  passage: Passage;
  score: number;
};

/** Best match first; never longer than the requested width. */
export type RetrievalResult = ScoredPassage[];

export interface PassageRetriever {
  retrieve(query: string, k: number): Promise<RetrievalResult>;
}

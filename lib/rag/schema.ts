// lib/rag/schema.ts

export type ChunkMeta = {
  title: string; // the only filterable field
  text: string;
};

export type DocumentChunk = {
  key: string;
  title: string;
  text: string;
  chunkIndex: number;
};

export type VectorIndexEntry = {
  key: string;
  vector: number[]; // length must equal the configured embedding dimensions
  metadata: ChunkMeta;
};

/** One neighbour from the index; lists are ordered by ascending distance. */
export type RetrievalMatch = {
  key: string;
  distance: number;
  metadata: ChunkMeta;
};

export type SourceDocument = {
  title: string;
  text: string;
};

export type Source = {
  title: string;
  distance: number;
  relevance_score: number;
};

export type AnswerMetadata = {
  question_length: number;
  sources_found: number;
  processing_successful: boolean;
  timestamp: string;
  request_id: string;
};

export type AnswerResponse = {
  answer: string;
  sources: Source[];
  metadata: AnswerMetadata;
};

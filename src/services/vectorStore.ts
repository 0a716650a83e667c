import type { SearchHit, StoredDocument } from "../types";

/**
 * Backing nearest-neighbour index for one collection. Implementations own the
 * on-disk layout; the document store only hands them vectors.
 */
export interface VectorIndex {
  readonly kind: string;
  /** Opens or creates the collection. */
  open(): Promise<void>;
  /** Writes every record or none of them. */
  upsert(records: StoredDocument[]): Promise<void>;
  /** Returns the subset of `ids` already stored. */
  existingIds(ids: string[]): Promise<string[]>;
  query(input: { embedding: number[]; topK: number }): Promise<SearchHit[]>;
  count(): Promise<number>;
  deleteCollection(): Promise<void>;
  close(): Promise<void>;
}

export type VectorIndexOptions = {
  persistDir: string;
  collectionName: string;
  /** Model id of the embedding provider, pinned to the collection on creation. */
  embeddingModel: string;
};

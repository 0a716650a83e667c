export type MetadataValue = string | number | boolean;

export type DocumentMetadata = Record<string, MetadataValue>;

export type StoredDocument = {
  id: string;
  text: string;
  metadata: DocumentMetadata;
  embedding: number[];
};

export type SearchHit = {
  id: string;
  document: string;
  /** Cosine distance, lower is more similar. */
  distance: number;
  metadata: DocumentMetadata;
};

export type StoreStats = {
  collectionName: string;
  documentCount: number;
  persistDir: string;
};

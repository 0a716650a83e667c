import {
  DuplicateIdError,
  EmbeddingError,
  IndexQueryError,
  IndexWriteError,
  InvalidArgumentError,
  RetrievalError,
  StorageError,
  StorageInitError,
  getErrorMessage,
} from "../errors";
import type { DocumentMetadata, SearchHit, StoreStats, StoredDocument } from "../types";
import { assertEmbeddings, type EmbeddingProvider } from "./embeddings";
import { LocalVectorIndex } from "./localVectorStore";
import type { VectorIndex } from "./vectorStore";

export const DEFAULT_COLLECTION = "documents";
export const DEFAULT_SOURCE = "unknown";
export const NO_DOCUMENTS_FOUND = "No documents found matching the query.";
export const MAX_CONTENT_CHARS = 500;
export const MAX_SOURCE_CHARS = 100;

export type DocumentStoreOptions = {
  persistDir: string;
  collectionName?: string;
  embeddings: EmbeddingProvider;
  /** Defaults to a {@link LocalVectorIndex} under `persistDir`. */
  index?: VectorIndex;
};

type ErrorFactory = new (message: string, cause?: unknown) => RetrievalError;

/** Errors of any other class are rewrapped, so each operation reports its own kind of failure. */
async function guard<T>(op: () => Promise<T>, wrap: ErrorFactory, message: string): Promise<T> {
  try {
    return await op();
  } catch (error) {
    if (error instanceof wrap) throw error;
    throw new wrap(`${message}: ${getErrorMessage(error)}`, error);
  }
}

// Counts code points so an astral character is never split
function clip(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : text;
}

function compareHits(a: SearchHit, b: SearchHit): number {
  return a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Renders hits as the context block injected into prompts. Each excerpt is cut
 * at {@link MAX_CONTENT_CHARS} and each source at {@link MAX_SOURCE_CHARS}.
 */
export function formatContext(hits: SearchHit[]): string {
  if (hits.length === 0) {
    return NO_DOCUMENTS_FOUND;
  }

  let formatted = "Retrieved Documents:\n";
  formatted += "-".repeat(50) + "\n";
  hits.forEach((hit, i) => {
    const source = hit.metadata.source ?? DEFAULT_SOURCE;
    formatted += `\n[Document ${i + 1}]\n`;
    formatted += `Content: ${clip(hit.document, MAX_CONTENT_CHARS)}\n`;
    formatted += `Source: ${clip(String(source), MAX_SOURCE_CHARS)}\n`;
  });
  return formatted;
}

/**
 * Owns one collection: embeds documents and queries with a single provider and
 * delegates storage and nearest-neighbour search to a {@link VectorIndex}.
 */
export class DocumentStore {
  private constructor(
    readonly persistDir: string,
    readonly collectionName: string,
    private readonly embeddings: EmbeddingProvider,
    private readonly index: VectorIndex
  ) {}

  /** Opens the collection, creating it on first use. */
  static async initialize(options: DocumentStoreOptions): Promise<DocumentStore> {
    const collectionName = options.collectionName ?? DEFAULT_COLLECTION;
    const index =
      options.index ??
      new LocalVectorIndex({
        persistDir: options.persistDir,
        collectionName,
        embeddingModel: options.embeddings.model,
      });

    await guard(() => index.open(), StorageInitError, `Unable to initialize store at ${options.persistDir}`);
    return new DocumentStore(options.persistDir, collectionName, options.embeddings, index);
  }

  get backend(): string {
    return this.index.kind;
  }

  get embeddingModel(): string {
    return this.embeddings.model;
  }

  /**
   * Embeds and stores a batch. Nothing is written unless every document was
   * embedded; ids already in the collection are rejected, never overwritten.
   * Without `ids`, documents get `doc_<n>` from a sequence that continues
   * across calls.
   */
  async add(documents: string[], ids?: string[], metadata?: DocumentMetadata[]): Promise<void> {
    if (documents.length === 0) {
      throw new InvalidArgumentError("At least one document is required");
    }
    if (ids && ids.length !== documents.length) {
      throw new InvalidArgumentError(`Expected ${documents.length} ids, got ${ids.length}`);
    }
    if (metadata && metadata.length !== documents.length) {
      throw new InvalidArgumentError(`Expected ${documents.length} metadata entries, got ${metadata.length}`);
    }

    let resolvedIds: string[];
    if (ids) {
      const repeated = ids.filter((id, i) => ids.indexOf(id) !== i);
      if (repeated.length > 0) {
        throw new DuplicateIdError(Array.from(new Set(repeated)));
      }
      const existing = await this.lookupForWrite(ids);
      if (existing.length > 0) {
        throw new DuplicateIdError(existing);
      }
      resolvedIds = ids;
    } else {
      resolvedIds = await this.generateIds(documents.length);
    }

    const vectors = await this.embedAll(documents);
    const records: StoredDocument[] = documents.map((text, i) => ({
      id: resolvedIds[i],
      text,
      metadata: metadata ? { ...metadata[i] } : { source: DEFAULT_SOURCE },
      embedding: vectors[i],
    }));

    await guard(() => this.index.upsert(records), IndexWriteError, "Unable to write documents");
    console.log(`Added ${records.length} documents to collection ${this.collectionName}`);
  }

  /** Nearest neighbours of `query`, closest first. An empty collection yields `[]`. */
  async search(query: string, nResults = 3): Promise<SearchHit[]> {
    if (query.trim().length === 0) {
      throw new InvalidArgumentError("Query must not be empty");
    }
    if (!Number.isInteger(nResults) || nResults < 1) {
      throw new InvalidArgumentError(`nResults must be a positive integer, got ${nResults}`);
    }

    const total = await guard(() => this.index.count(), IndexQueryError, "Unable to count documents");
    if (total === 0) {
      return [];
    }

    const [embedding] = await this.embedAll([query]);
    const hits = await guard(
      () => this.index.query({ embedding, topK: Math.min(nResults, total) }),
      IndexQueryError,
      "Similarity search failed"
    );
    return [...hits].sort(compareHits).slice(0, nResults);
  }

  async searchFormatted(query: string, nResults = 3): Promise<string> {
    return formatContext(await this.search(query, nResults));
  }

  /** Ids from `ids` that are already stored. */
  async findExistingIds(ids: string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    return guard(() => this.index.existingIds(ids), IndexQueryError, "Unable to look up ids");
  }

  async deleteCollection(): Promise<void> {
    await guard(() => this.index.deleteCollection(), StorageError, `Unable to delete ${this.collectionName}`);
    console.log(`Deleted collection: ${this.collectionName}`);
  }

  async stats(): Promise<StoreStats> {
    const documentCount = await guard(() => this.index.count(), StorageError, "Unable to count documents");
    return {
      collectionName: this.collectionName,
      documentCount,
      persistDir: this.persistDir,
    };
  }

  async close(): Promise<void> {
    await this.index.close();
  }

  private async embedAll(texts: string[]): Promise<number[][]> {
    const vectors = await guard(
      () => this.embeddings.embedMany(texts),
      EmbeddingError,
      `Embedding with ${this.embeddings.model} failed`
    );
    return assertEmbeddings(texts.length, vectors);
  }

  private async lookupForWrite(ids: string[]): Promise<string[]> {
    try {
      return await this.index.existingIds(ids);
    } catch (error) {
      if (error instanceof IndexWriteError) throw error;
      throw new IndexWriteError(`Unable to check existing ids: ${getErrorMessage(error)}`, error);
    }
  }

  private async generateIds(count: number): Promise<string[]> {
    const ids: string[] = [];
    let next = await guard(() => this.index.count(), IndexWriteError, "Unable to count documents");
    while (ids.length < count) {
      const window = Array.from({ length: count - ids.length }, (_, i) => `doc_${next + i}`);
      next += window.length;
      const taken = new Set(await this.lookupForWrite(window));
      ids.push(...window.filter((id) => !taken.has(id)));
    }
    return ids;
  }
}

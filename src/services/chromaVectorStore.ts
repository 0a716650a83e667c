import { ChromaClient, type Collection, type IEmbeddingFunction } from "chromadb";
import {
  IndexQueryError,
  IndexWriteError,
  StorageError,
  StorageInitError,
  getErrorMessage,
} from "../errors";
import type { SearchHit, StoredDocument } from "../types";
import { toDocumentMetadata } from "../utils/metadata";
import type { EmbeddingProvider } from "./embeddings";
import type { VectorIndex, VectorIndexOptions } from "./vectorStore";

export type ChromaIndexOptions = VectorIndexOptions & {
  url: string;
  embeddings: EmbeddingProvider;
};

const MISSING_COLLECTION = /does not exist|not found/i;

export class ChromaVectorIndex implements VectorIndex {
  readonly kind = "chroma";
  private client: ChromaClient;
  private collection: Collection | null = null;
  private readonly embeddingFunction: IEmbeddingFunction;

  constructor(private readonly options: ChromaIndexOptions) {
    this.client = new ChromaClient({ path: options.url });
    this.embeddingFunction = {
      generate: (texts: string[]) => options.embeddings.embedMany(texts),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.heartbeat();
      return true;
    } catch (error) {
      console.error("ChromaDB health check failed:", getErrorMessage(error));
      return false;
    }
  }

  private async getCollection(): Promise<Collection> {
    if (this.collection) {
      return this.collection;
    }

    const name = this.options.collectionName;
    let collection: Collection;
    try {
      collection = await this.client.getCollection({ name, embeddingFunction: this.embeddingFunction });
    } catch {
      // First use of this name
      collection = await this.client.createCollection({
        name,
        metadata: {
          "hnsw:space": "cosine",
          embedding_model: this.options.embeddingModel,
          created_at: new Date().toISOString(),
        },
        embeddingFunction: this.embeddingFunction,
      });
    }

    const pinned = collection.metadata?.embedding_model;
    if (pinned !== undefined && pinned !== this.options.embeddingModel) {
      throw new StorageInitError(
        `Collection ${name} was built with embedding model ${String(pinned)}, not ${this.options.embeddingModel}`
      );
    }
    this.collection = collection;
    return collection;
  }

  async open(): Promise<void> {
    try {
      await this.getCollection();
    } catch (error) {
      if (error instanceof StorageInitError) throw error;
      throw new StorageInitError(
        `Unable to open Chroma collection ${this.options.collectionName} at ${this.options.url}: ${getErrorMessage(error)}`,
        error
      );
    }
  }

  async upsert(records: StoredDocument[]): Promise<void> {
    if (records.length === 0) return;
    try {
      const collection = await this.getCollection();
      await collection.upsert({
        ids: records.map((r) => r.id),
        embeddings: records.map((r) => r.embedding),
        documents: records.map((r) => r.text),
        metadatas: records.map((r) => r.metadata),
      });
    } catch (error) {
      throw new IndexWriteError(`Chroma upsert failed: ${getErrorMessage(error)}`, error);
    }
  }

  async existingIds(ids: string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    try {
      const collection = await this.getCollection();
      const found = await collection.get({ ids });
      return found.ids;
    } catch (error) {
      throw new IndexQueryError(`Chroma lookup failed: ${getErrorMessage(error)}`, error);
    }
  }

  async query(input: { embedding: number[]; topK: number }): Promise<SearchHit[]> {
    let results: Awaited<ReturnType<Collection["query"]>>;
    try {
      const collection = await this.getCollection();
      results = await collection.query({
        queryEmbeddings: [input.embedding],
        nResults: input.topK,
      });
    } catch (error) {
      throw new IndexQueryError(`Chroma query failed: ${getErrorMessage(error)}`, error);
    }

    const ids = results.ids[0] ?? [];
    const documents = results.documents?.[0] ?? [];
    const metadatas = results.metadatas?.[0] ?? [];
    const distances = results.distances?.[0] ?? [];

    return ids.map((id, i) => {
      const distance = distances[i];
      if (typeof distance !== "number" || !Number.isFinite(distance)) {
        throw new IndexQueryError(`Chroma returned no distance for ${id}`);
      }
      return {
        id,
        document: documents[i] ?? "",
        distance,
        metadata: toDocumentMetadata(metadatas[i]),
      };
    });
  }

  async count(): Promise<number> {
    try {
      const collection = await this.getCollection();
      return await collection.count();
    } catch (error) {
      throw new StorageError(`Chroma count failed: ${getErrorMessage(error)}`, error);
    }
  }

  // Deleting a collection that is already gone is not an error
  async deleteCollection(): Promise<void> {
    this.collection = null;
    try {
      await this.client.deleteCollection({ name: this.options.collectionName });
    } catch (error) {
      if (MISSING_COLLECTION.test(getErrorMessage(error))) return;
      throw new StorageError(`Unable to delete Chroma collection ${this.options.collectionName}: ${getErrorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    this.collection = null;
  }
}

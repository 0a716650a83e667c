import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  IndexQueryError,
  IndexWriteError,
  StorageError,
  StorageInitError,
  getErrorMessage,
} from "../errors";
import type { SearchHit, StoredDocument } from "../types";
import { DocumentMetadataSchema } from "../utils/metadata";
import type { VectorIndex, VectorIndexOptions } from "./vectorStore";

const CollectionFileSchema = z.object({
  name: z.string(),
  metric: z.literal("cosine"),
  embeddingModel: z.string(),
  dimension: z.number().int().positive().nullable(),
  records: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      metadata: DocumentMetadataSchema,
      embedding: z.array(z.number()),
    })
  ),
});

type CollectionFile = z.infer<typeof CollectionFileSchema>;

// fs errors may come from another realm, so match on the code alone
function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * File-backed cosine index: one `<collection>.json` per collection under the
 * store directory. Every write replaces the file through a rename, so a failed
 * upsert leaves the previous contents in place.
 */
export class LocalVectorIndex implements VectorIndex {
  readonly kind = "local";
  private readonly filePath: string;

  constructor(private readonly options: VectorIndexOptions) {
    this.filePath = path.join(options.persistDir, `${options.collectionName}.json`);
  }

  async open(): Promise<void> {
    const dir = this.options.persistDir;
    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.access(dir, fs.constants.W_OK);
    } catch (error) {
      throw new StorageInitError(`Storage location ${dir} is not writable: ${getErrorMessage(error)}`, error);
    }

    let existing: CollectionFile | null;
    try {
      existing = await this.load();
    } catch (error) {
      throw new StorageInitError(`Unable to open collection ${this.options.collectionName}: ${getErrorMessage(error)}`, error);
    }

    if (existing && existing.embeddingModel !== this.options.embeddingModel) {
      throw new StorageInitError(
        `Collection ${this.options.collectionName} was built with embedding model ${existing.embeddingModel}, not ${this.options.embeddingModel}`
      );
    }
    if (!existing) {
      try {
        await this.save(this.emptyCollection());
      } catch (error) {
        throw new StorageInitError(`Unable to create collection ${this.options.collectionName}: ${getErrorMessage(error)}`, error);
      }
    }
  }

  async upsert(records: StoredDocument[]): Promise<void> {
    if (records.length === 0) return;

    let collection: CollectionFile;
    try {
      collection = (await this.load()) ?? this.emptyCollection();
    } catch (error) {
      throw new IndexWriteError(`Unable to read collection before write: ${getErrorMessage(error)}`, error);
    }

    const dimension = collection.dimension ?? records[0].embedding.length;
    const mismatched = records.find((r) => r.embedding.length !== dimension);
    if (mismatched) {
      throw new IndexWriteError(
        `Embedding dimension mismatch for ${mismatched.id}: expected ${dimension}, got ${mismatched.embedding.length}`
      );
    }

    // Replace if id exists
    const byId = new Map(collection.records.map((r) => [r.id, r]));
    for (const r of records) {
      byId.set(r.id, { id: r.id, text: r.text, metadata: { ...r.metadata }, embedding: r.embedding.slice() });
    }

    try {
      await this.save({ ...collection, dimension, records: Array.from(byId.values()) });
    } catch (error) {
      throw new IndexWriteError(`Unable to write collection ${this.options.collectionName}: ${getErrorMessage(error)}`, error);
    }
  }

  async existingIds(ids: string[]): Promise<string[]> {
    const collection = await this.load();
    if (!collection) return [];
    const stored = new Set(collection.records.map((r) => r.id));
    return ids.filter((id) => stored.has(id));
  }

  async query({ embedding, topK }: { embedding: number[]; topK: number }): Promise<SearchHit[]> {
    const collection = await this.load();
    if (!collection || collection.records.length === 0) return [];

    if (collection.dimension !== null && collection.dimension !== embedding.length) {
      throw new IndexQueryError(
        `Query vector has dimension ${embedding.length}, collection ${collection.name} uses ${collection.dimension}`
      );
    }

    const scored = collection.records.map((r) => ({
      id: r.id,
      document: r.text,
      distance: cosineDistance(r.embedding, embedding),
      metadata: r.metadata,
    }));
    scored.sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return scored.slice(0, topK);
  }

  async count(): Promise<number> {
    const collection = await this.load();
    return collection?.records.length ?? 0;
  }

  async deleteCollection(): Promise<void> {
    try {
      await fs.promises.rm(this.filePath, { force: true });
    } catch (error) {
      throw new StorageError(`Unable to delete collection ${this.options.collectionName}: ${getErrorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    // Nothing is held open between operations.
  }

  private emptyCollection(): CollectionFile {
    return {
      name: this.options.collectionName,
      metric: "cosine",
      embeddingModel: this.options.embeddingModel,
      dimension: null,
      records: [],
    };
  }

  private async load(): Promise<CollectionFile | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StorageError(`Unable to read ${this.filePath}: ${getErrorMessage(error)}`, error);
    }

    try {
      return CollectionFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new StorageError(`Collection file ${this.filePath} is corrupt: ${getErrorMessage(error)}`, error);
    }
  }

  private async save(collection: CollectionFile): Promise<void> {
    await fs.promises.mkdir(this.options.persistDir, { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.writeFile(tmpPath, JSON.stringify(collection), "utf8");
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }
}

/** 1 - cosine similarity; a zero vector is treated as orthogonal to everything. */
export function cosineDistance(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  const d = Math.sqrt(na) * Math.sqrt(nb) || 1;
  return Math.max(0, 1 - dot / d);
}

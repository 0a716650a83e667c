import { StorageInitError } from "../errors";
import { ChromaVectorIndex } from "./chromaVectorStore";
import type { EmbeddingProvider } from "./embeddings";
import { LocalVectorIndex } from "./localVectorStore";
import type { VectorIndex } from "./vectorStore";

export type VectorBackend = "local" | "chroma" | "auto";

export type ResolveIndexOptions = {
  backend: VectorBackend;
  chromaUrl?: string;
  persistDir: string;
  collectionName: string;
  embeddings: EmbeddingProvider;
};

/**
 * Picks the index once, at start-up. `auto` prefers Chroma when it answers a
 * heartbeat and falls back to the local file index otherwise. The choice is
 * fixed for the life of the process.
 */
export async function resolveVectorIndex(options: ResolveIndexOptions): Promise<VectorIndex> {
  const base = {
    persistDir: options.persistDir,
    collectionName: options.collectionName,
    embeddingModel: options.embeddings.model,
  };
  const local = () => new LocalVectorIndex(base);

  if (options.backend === "local") {
    return local();
  }

  if (!options.chromaUrl) {
    if (options.backend === "chroma") {
      throw new StorageInitError("CHROMA_URL is required for the chroma backend");
    }
    console.log("CHROMA_URL not set - using local storage");
    return local();
  }

  const chroma = new ChromaVectorIndex({ ...base, url: options.chromaUrl, embeddings: options.embeddings });
  if (options.backend === "chroma") {
    return chroma;
  }

  console.log("Testing ChromaDB connection...");
  if (await chroma.healthCheck()) {
    console.log("ChromaDB is available - using persistent storage");
    return chroma;
  }
  console.log("ChromaDB not available - falling back to local storage");
  return local();
}

import dotenv from "dotenv";
import { loadConfig } from "../config";
import { resolveVectorIndex } from "../services/adaptiveVectorStore";
import { DocumentStore } from "../services/documentStore";
import { createEmbeddingProvider } from "../services/embeddings";
import { loadSampleDocuments } from "../services/sampleDocuments";
import { getErrorMessage } from "../errors";

dotenv.config();

async function main(): Promise<void> {
  console.log("Loading sample documents...");
  const config = loadConfig();
  const embeddings = createEmbeddingProvider(config.embedding, config.ollamaUrl);
  const index = await resolveVectorIndex({
    backend: config.vectorBackend,
    chromaUrl: config.chromaUrl,
    persistDir: config.persistDir,
    collectionName: config.collectionName,
    embeddings,
  });
  const store = await DocumentStore.initialize({
    persistDir: config.persistDir,
    collectionName: config.collectionName,
    embeddings,
    index,
  });

  try {
    const added = await loadSampleDocuments(store);
    const stats = await store.stats();
    console.log(`Added ${added} sample documents; collection ${stats.collectionName} holds ${stats.documentCount}`);
  } finally {
    await store.close();
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error) => {
    console.error("Sample document loading failed:", getErrorMessage(error));
    process.exit(1);
  });
}

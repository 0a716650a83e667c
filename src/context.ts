import type { AppConfig } from "./config";
import { resolveVectorIndex } from "./services/adaptiveVectorStore";
import { DocumentStore } from "./services/documentStore";
import { createEmbeddingProvider, type EmbeddingProvider } from "./services/embeddings";
import { OllamaClient, type LlmClient } from "./services/llm";
import { RagAgent } from "./services/ragAgent";
import { loadSampleDocuments } from "./services/sampleDocuments";
import type { VectorIndex } from "./services/vectorStore";
import { RWLock } from "./utils/rwlock";

export type AppContext = {
  config: AppConfig;
  store: DocumentStore;
  agent: RagAgent;
  llm: LlmClient;
  /** Writers (add, delete) take it exclusively; searches share it. */
  lock: RWLock;
};

/** Overrides for the pieces that talk to external services. */
export type AppDependencies = {
  embeddings?: EmbeddingProvider;
  index?: VectorIndex;
  llm?: LlmClient;
};

export async function createAppContext(config: AppConfig, deps: AppDependencies = {}): Promise<AppContext> {
  const embeddings = deps.embeddings ?? createEmbeddingProvider(config.embedding, config.ollamaUrl);
  const index =
    deps.index ??
    (await resolveVectorIndex({
      backend: config.vectorBackend,
      chromaUrl: config.chromaUrl,
      persistDir: config.persistDir,
      collectionName: config.collectionName,
      embeddings,
    }));

  const store = await DocumentStore.initialize({
    persistDir: config.persistDir,
    collectionName: config.collectionName,
    embeddings,
    index,
  });
  console.log(`Vector store ready (${store.backend}, ${store.embeddingModel})`);

  try {
    if (config.loadSampleDocuments && (await store.stats()).documentCount === 0) {
      const added = await loadSampleDocuments(store);
      console.log(`Loaded ${added} sample documents`);
    }
  } catch (error) {
    await store.close();
    throw error;
  }

  const llm =
    deps.llm ??
    new OllamaClient({
      baseUrl: config.ollamaUrl,
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
      timeoutMs: config.llm.timeoutMs,
    });

  return { config, store, agent: new RagAgent(store, llm), llm, lock: new RWLock() };
}

export async function closeAppContext(context: AppContext): Promise<void> {
  await context.lock.withWrite(() => context.store.close());
}

/** Lets routes be mounted before the context finishes initializing. */
export class AppContextHolder {
  private context: AppContext | null = null;

  get current(): AppContext | null {
    return this.context;
  }

  attach(context: AppContext): void {
    this.context = context;
  }

  detach(): AppContext | null {
    const context = this.context;
    this.context = null;
    return context;
  }
}

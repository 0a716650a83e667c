import { z } from "zod";
import type { VectorBackend } from "./services/adaptiveVectorStore";
import type { EmbeddingSettings } from "./services/embeddings";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    PERSIST_DIR: z.string().min(1).default("./vector_store"),
    COLLECTION_NAME: z
      .string()
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]{1,61}[A-Za-z0-9]$/, "must be 3-63 letters, digits, '.', '_' or '-'")
      .default("documents"),
    VECTOR_BACKEND: z.enum(["local", "chroma", "auto"]).default("local"),
    CHROMA_URL: z.string().url().optional(),
    EMBEDDING_PROVIDER: z.enum(["ollama", "hashing"]).default("ollama"),
    EMBEDDING_MODEL: z.string().min(1).default("all-minilm"),
    EMBEDDING_DIM: z.coerce.number().int().positive().default(256),
    OLLAMA_URL: z.string().url().default("http://localhost:11434"),
    LLM_MODEL: z.string().min(1).default("mistral"),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
    LOAD_SAMPLE_DOCUMENTS: booleanFlag,
  })
  .refine((env) => env.VECTOR_BACKEND !== "chroma" || env.CHROMA_URL !== undefined, {
    message: "CHROMA_URL is required when VECTOR_BACKEND is chroma",
    path: ["CHROMA_URL"],
  });

export type AppConfig = {
  port: number;
  persistDir: string;
  collectionName: string;
  vectorBackend: VectorBackend;
  chromaUrl?: string;
  embedding: EmbeddingSettings;
  ollamaUrl: string;
  llm: {
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  loadSampleDocuments: boolean;
};

// Empty strings in .env files mean "unset"
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    persistDir: e.PERSIST_DIR,
    collectionName: e.COLLECTION_NAME,
    vectorBackend: e.VECTOR_BACKEND,
    chromaUrl: e.CHROMA_URL,
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dim: e.EMBEDDING_DIM,
    },
    ollamaUrl: e.OLLAMA_URL,
    llm: {
      model: e.LLM_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    loadSampleDocuments: e.LOAD_SAMPLE_DOCUMENTS,
  };
}

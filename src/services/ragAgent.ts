import { LlmError } from "../errors";
import type { SearchHit } from "../types";
import { formatContext, type DocumentStore } from "./documentStore";
import type { LlmClient } from "./llm";

export const UNREACHABLE_MODEL_MESSAGE = "Error: Unable to connect to Ollama server. Make sure it's running.";

export type Retrieval = {
  hits: SearchHit[];
  context: string;
};

export type AgentResponse = {
  query: string;
  response: string;
  retrievedDocuments: string[];
  contextUsed: boolean;
  model: string;
};

export function buildPrompt(query: string, context: string): string {
  return `You are a helpful AI assistant. Use the provided context to answer the user's question accurately and concisely.

Context Information:
${context}

User Question: ${query}

Please provide a clear and informative answer based on the context provided. If the context doesn't contain relevant information, say so and provide your best response based on your knowledge.`;
}

/**
 * Prompt assembly on top of the document store. Retrieval and generation are
 * separate steps so callers can hold a store lock only around retrieval.
 */
export class RagAgent {
  constructor(
    private readonly store: DocumentStore,
    private readonly llm: LlmClient
  ) {}

  get model(): string {
    return this.llm.model;
  }

  async retrieve(query: string, nResults = 3): Promise<Retrieval> {
    const hits = await this.store.search(query, nResults);
    return { hits, context: formatContext(hits) };
  }

  /** Without a retrieval the query goes to the model as-is. */
  async answer(query: string, retrieval: Retrieval | null): Promise<AgentResponse> {
    const prompt = retrieval ? buildPrompt(query, retrieval.context) : query;
    const response = await this.callModel(prompt);
    return {
      query,
      response,
      retrievedDocuments: retrieval ? retrieval.hits.map((h) => h.document) : [],
      contextUsed: retrieval !== null,
      model: this.llm.model,
    };
  }

  async getResponse(query: string, useContext = true, nResults = 3): Promise<AgentResponse> {
    const retrieval = useContext ? await this.retrieve(query, nResults) : null;
    return this.answer(query, retrieval);
  }

  // Model failures become the answer text; the retrieved documents are still returned.
  private async callModel(prompt: string): Promise<string> {
    try {
      return await this.llm.generate(prompt);
    } catch (error) {
      if (!(error instanceof LlmError)) throw error;
      console.error("LLM call failed:", error.message);
      return error.unreachable ? UNREACHABLE_MODEL_MESSAGE : `Error calling Ollama: ${error.message}`;
    }
  }
}

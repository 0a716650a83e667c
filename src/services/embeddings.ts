import fetch, { type Response } from "node-fetch";
import { z } from "zod";
import { EmbeddingError, getErrorMessage } from "../errors";

/**
 * Turns text into fixed-length vectors. Documents and queries of one
 * collection must go through the same provider, so `model` is pinned to the
 * collection when it is created.
 */
export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

const OllamaEmbedResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

export type OllamaEmbeddingOptions = {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
};

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly ollamaModel: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: OllamaEmbeddingOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = `ollama/${options.model}`;
    this.ollamaModel = options.model;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.ollamaModel, input: texts }),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new EmbeddingError(
        `Unable to reach embedding provider at ${this.baseUrl}: ${getErrorMessage(error)}`,
        error
      );
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new EmbeddingError(`Embedding request failed: ${response.status} ${detail}`.trim());
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingError("Embedding response is not valid JSON", error);
    }
    const parsed = OllamaEmbedResponse.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError("Embedding response missing embeddings");
    }
    return assertEmbeddings(texts.length, parsed.data.embeddings);
  }
}

/**
 * Offline provider: bag-of-words token hashing (FNV-1a) into `dim` buckets,
 * L2-normalized. Not semantic, but texts sharing words land close together.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;

  constructor(private readonly dim = 256) {
    if (!Number.isInteger(dim) || dim < 1) {
      throw new RangeError(`Embedding dimension must be a positive integer, got ${dim}`);
    }
    this.model = `hashing-${dim}`;
  }

  async embed(text: string): Promise<number[]> {
    return hashEmbed(text, this.dim);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((t) => hashEmbed(t, this.dim));
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

function fnv1a(token: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
  }
  return h;
}

function hashEmbed(text: string, dim: number): number[] {
  const v = new Array<number>(dim).fill(0);
  for (const token of tokenize(text)) {
    v[fnv1a(token) % dim] += 1;
  }
  const norm = Math.sqrt(v.reduce((a, b) => a + b * b, 0)) || 1;
  return v.map((x) => x / norm);
}

/**
 * Checks a provider answer: one vector per input, all of the same non-zero
 * length, finite values only.
 */
export function assertEmbeddings(expected: number, vectors: number[][]): number[][] {
  if (vectors.length !== expected) {
    throw new EmbeddingError(`Embedding provider returned ${vectors.length} vectors for ${expected} inputs`);
  }
  const dim = vectors[0]?.length ?? 0;
  for (const vector of vectors) {
    if (vector.length === 0 || vector.length !== dim) {
      throw new EmbeddingError("Embedding provider returned vectors of inconsistent dimension");
    }
    if (!vector.every(Number.isFinite)) {
      throw new EmbeddingError("Embedding provider returned non-finite values");
    }
  }
  return vectors;
}

export type EmbeddingSettings = {
  provider: "ollama" | "hashing";
  model: string;
  dim: number;
};

export function createEmbeddingProvider(settings: EmbeddingSettings, ollamaUrl: string): EmbeddingProvider {
  if (settings.provider === "hashing") {
    return new HashingEmbeddingProvider(settings.dim);
  }
  return new OllamaEmbeddingProvider({ baseUrl: ollamaUrl, model: settings.model });
}

import { createHash } from "crypto";
import type OpenAI from "openai";
import type { AssistantConfig } from "../config.js";
import { tokenize } from "./text.js";

// ── Embedding providers ──────────────────────────────────

export interface EmbeddingProvider {
  /** Length of every vector `embed` returns. */
  readonly dimension: number;
  /** Deterministic for identical input within a process lifetime. */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/** Max characters sent to an embedding model */
const MAX_EMBED_CHARS = 2000;

/**
 * Local feature-hashing embedder: each content token lands in one signed
 * bucket, then the vector is L2-normalized. No network, so it is the default
 * offline and the one tests use.
 */
export class HashingEmbedder implements EmbeddingProvider {
  private readonly buckets = new Map<string, [number, number]>();

  constructor(readonly dimension = 512) {}

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text.slice(0, MAX_EMBED_CHARS))) {
      const [index, sign] = this.bucketOf(token);
      vector[index] = (vector[index] ?? 0) + sign;
    }
    return l2Normalize(vector);
  }

  private bucketOf(token: string): [number, number] {
    const cached = this.buckets.get(token);
    if (cached) return cached;
    const digest = createHash("sha1").update(token).digest();
    const bucket: [number, number] = [
      digest.readUInt32BE(0) % this.dimension,
      (digest[4] ?? 0) & 1 ? 1 : -1,
    ];
    this.buckets.set(token, bucket);
    return bucket;
  }
}

/** Embeddings endpoint of the OpenAI-compatible API. */
export class OpenAIEmbedder implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    readonly dimension: number,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: text.slice(0, MAX_EMBED_CHARS).replace(/\n/g, " "),
        dimensions: this.dimension,
      },
      { signal },
    );
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error("Embedding endpoint returned no vector");
    }
    return embedding;
  }
}

export function createEmbedder(
  config: Pick<
    AssistantConfig,
    "embeddingBackend" | "embeddingModel" | "embeddingDimension"
  >,
  client?: OpenAI,
): EmbeddingProvider {
  if (config.embeddingBackend === "openai" && client) {
    return new OpenAIEmbedder(
      client,
      config.embeddingModel,
      config.embeddingDimension,
    );
  }
  return new HashingEmbedder(config.embeddingDimension);
}

// ── Vector math ──────────────────────────────────────────

export function l2Normalize(vector: number[]): number[] {
  let norm = 0;
  for (const v of vector) norm += v * v;
  if (norm === 0) return vector;
  const scale = 1 / Math.sqrt(norm);
  return vector.map((v) => v * scale);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

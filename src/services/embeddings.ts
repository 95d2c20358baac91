// src/services/embeddings.ts
// What: Embedding service contract and its OpenAI implementation.
// How: OpenAIEmbedder calls embeddings.create with the configured model and validates the dimensionality
//      against the pgvector column size (1536 by default).

import type OpenAI from 'openai';

export interface Embedder {
  embedText(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly expectedDims = 1536,
  ) {}

  async embedText(text: string): Promise<number[]> {
    const res = await this.client.embeddings.create({ model: this.model, input: text });
    const vec = res.data[0]?.embedding;
    if (!vec || vec.length !== this.expectedDims) {
      throw new Error(`Unexpected embedding size; expected ${this.expectedDims}, got ${vec?.length ?? 'unknown'}`);
    }
    return vec;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const res = await this.client.embeddings.create({ model: this.model, input: texts });
    // The API may return items out of order; index carries the input position
    const vectors = [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    if (vectors.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, got ${vectors.length}`);
    }
    for (const v of vectors) {
      if (v.length !== this.expectedDims) {
        throw new Error(`Unexpected embedding size; expected ${this.expectedDims}, got ${v.length}`);
      }
    }
    return vectors;
  }
}

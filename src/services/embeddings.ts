/**
 * Embedding Service
 * Generates embeddings with the OpenAI embeddings API
 */

import OpenAI from 'openai';
import { env } from '../env.js';
import { AppError } from '../utils/errors.js';

export interface Embedder {
  embedText(text: string): Promise<number[]>;
  embedTexts(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  model?: string;
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;
  private batchSize: number;

  constructor(options: OpenAIEmbedderOptions = {}) {
    const apiKey = options.apiKey ?? env.OPENAI_API_KEY;
    if (!apiKey) {
      throw AppError.configuration('OPENAI_API_KEY is not configured');
    }
    this.client = new OpenAI({ apiKey });
    this.model = options.model ?? env.EMBEDDING_MODEL;
    this.batchSize = options.batchSize ?? 100;
  }

  async embedText(text: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([text]);
    if (!embedding) {
      throw AppError.invalidResponse('Embeddings API returned no vector');
    }
    return embedding;
  }

  /**
   * Embeds texts in batches, preserving input order.
   */
  async embedTexts(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        encoding_format: 'float',
      });

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      embeddings.push(...ordered.map((d) => d.embedding));
    }

    return embeddings;
  }
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

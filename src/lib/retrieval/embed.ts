/**
 * Embedding Generation
 *
 * Uses OpenAI text-embedding-3-small for generating vector embeddings.
 * Dimensions: 1536 (matches kb_chunks.embedding column)
 */

import type OpenAI from "openai";
import { getClient, isLLMConfigured } from "@/lib/llm/client";

export const EMBEDDING_MODEL = "text-embedding-3-small";
export const EMBEDDING_DIMENSIONS = 1536;

/**
 * Generate embedding for a single text
 */
export async function embedText(text: string, client?: OpenAI): Promise<number[]> {
  const [embedding] = await embedTexts([text], client);
  if (!embedding) {
    throw new Error("Cannot embed empty text");
  }
  return embedding;
}

/**
 * Generate embeddings for multiple texts (batch).
 * Blank inputs are rejected rather than silently skipped.
 */
export async function embedTexts(texts: string[], client: OpenAI = getClient()): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }

  const inputs = texts.map((t) => t.trim());
  if (inputs.some((t) => t.length === 0)) {
    throw new Error("Cannot embed empty text");
  }

  const response = await client.embeddings.create({
    model: EMBEDDING_MODEL,
    input: inputs,
    dimensions: EMBEDDING_DIMENSIONS,
  });

  return response.data
    .slice()
    .sort((a, b) => a.index - b.index)
    .map((d) => d.embedding);
}

/**
 * Format embedding for PostgreSQL vector type
 * PostgreSQL pgvector expects format: [0.1, 0.2, ...]
 */
export function formatEmbeddingForPg(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

/**
 * Check if OpenAI is configured
 */
export function isEmbeddingConfigured(): boolean {
  return isLLMConfigured();
}

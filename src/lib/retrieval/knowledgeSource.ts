/**
 * Knowledge Source
 *
 * Vector search over category-scoped knowledge-base chunks using pgvector.
 * The retriever only depends on the KnowledgeSource contract.
 */

import type OpenAI from "openai";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { getSupabase } from "@/lib/db";
import { embedText, formatEmbeddingForPg } from "./embed";
import type { Category } from "@/lib/tickets/taxonomy";

export interface KnowledgeSource {
  /** Ordered snippets, most relevant first */
  search(query: string, category: Category): Promise<string[]>;
}

const MatchRowsSchema = z.array(
  z.object({
    content: z.string(),
    similarity: z.number(),
  })
);

export type SupabaseKnowledgeOptions = {
  limit?: number;
  minSimilarity?: number;
  /** OpenAI client used for query embeddings */
  client?: OpenAI;
  /** Database client; defaults to the env-configured one */
  supabase?: Pick<SupabaseClient, "rpc">;
};

/**
 * Knowledge source backed by the `match_kb_chunks` RPC
 */
export function createSupabaseKnowledgeSource(
  options: SupabaseKnowledgeOptions = {}
): KnowledgeSource {
  const { limit = 3, minSimilarity = 0.3, client, supabase } = options;

  return {
    async search(query, category) {
      const queryEmbedding = await embedText(query, client);

      const { data, error } = await (supabase ?? getSupabase()).rpc("match_kb_chunks", {
        query_embedding: formatEmbeddingForPg(queryEmbedding),
        match_category: category,
        match_threshold: minSimilarity,
        match_count: limit,
      });

      if (error) {
        throw new Error(`Semantic search failed: ${error.message}`);
      }

      const rows = MatchRowsSchema.safeParse(data ?? []);
      if (!rows.success) {
        throw new Error("Semantic search returned unexpected rows");
      }

      return rows.data
        .sort((a, b) => b.similarity - a.similarity)
        .map((r) => r.content.trim())
        .filter((content) => content.length > 0);
    },
  };
}

/**
 * Stand-in used when no vector store is configured; every search fails so the
 * retriever degrades to its built-in snippets.
 */
export function createUnavailableKnowledgeSource(reason: string): KnowledgeSource {
  return {
    async search() {
      throw new Error(reason);
    },
  };
}

/**
 * Knowledge base ingestion (category-aware)
 *
 * Reads small text/markdown docs from ./rag_corpus/<Category>/*, embeds them
 * and inserts the chunks into kb_chunks.
 *
 * Usage: npx tsx scripts/ingest-kb.ts [corpusDir] [--replace]
 */

import "dotenv/config";
import { getSupabase, isSupabaseConfigured } from "../src/lib/db";
import { buildChunkRows, loadCorpus } from "../src/lib/kb/ingest";
import { embedTexts, isEmbeddingConfigured } from "../src/lib/retrieval/embed";

async function main() {
  if (!isEmbeddingConfigured() || !isSupabaseConfigured()) {
    console.error("Error: OPENAI_API_KEY, SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set");
    process.exit(1);
  }

  const args = process.argv.slice(2);
  const replace = args.includes("--replace");
  const corpusDir = args.find((a) => !a.startsWith("--")) ?? "rag_corpus";

  const docs = await loadCorpus(corpusDir);
  console.log(`Loaded ${docs.length} docs from ${corpusDir}`);

  const rows = await buildChunkRows(docs, (texts) => embedTexts(texts));
  const supabase = getSupabase();

  if (replace) {
    const categories = [...new Set(rows.map((r) => r.category))];
    const { error } = await supabase.from("kb_chunks").delete().in("category", categories);
    if (error) throw new Error(`Failed to clear kb_chunks: ${error.message}`);
  }

  const { error } = await supabase.from("kb_chunks").insert(rows);
  if (error) throw new Error(`Failed to insert chunks: ${error.message}`);

  const perCategory = new Map<string, number>();
  for (const row of rows) {
    perCategory.set(row.category, (perCategory.get(row.category) ?? 0) + 1);
  }
  for (const [category, count] of perCategory) {
    console.log(`[${category}] ${count} chunks`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

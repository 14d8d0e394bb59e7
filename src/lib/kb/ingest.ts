/**
 * Knowledge Base Ingestion
 *
 * Reads `<corpus>/<Category>/**\/*.{md,txt}`, chunks each document and embeds
 * the chunks in batches. Folders that are not a known category are skipped.
 */

import { readdir, readFile } from "node:fs/promises";
import { extname, join, relative } from "node:path";
import { chunkText, type ChunkOptions } from "@/lib/retrieval/chunk";
import { formatEmbeddingForPg } from "@/lib/retrieval/embed";
import { CATEGORIES, isCategory, type Category } from "@/lib/tickets/taxonomy";

const DOC_EXTENSIONS = new Set([".md", ".txt"]);

export type CorpusDoc = {
  category: Category;
  /** Path relative to the corpus root */
  path: string;
  text: string;
};

export type ChunkRow = {
  category: Category;
  source_path: string;
  chunk_index: number;
  content: string;
  embedding: string;
};

export const INGEST_CONFIG = {
  /** Chunks per embedding request */
  embeddingBatchSize: 20,
};

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(full)));
    } else if (entry.isFile() && DOC_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      files.push(full);
    }
  }

  return files.sort();
}

/**
 * Load every category folder under the corpus root
 */
export async function loadCorpus(root: string): Promise<CorpusDoc[]> {
  const entries = await readdir(root, { withFileTypes: true });
  const docs: CorpusDoc[] = [];

  for (const category of CATEGORIES) {
    const folder = entries.find((e) => e.isDirectory() && e.name === category);
    if (!folder) {
      console.log(`[${category}] no docs, skipping.`);
      continue;
    }

    for (const file of await listFiles(join(root, folder.name))) {
      const text = await readFile(file, "utf-8");
      if (text.trim().length === 0) continue;
      docs.push({ category, path: relative(root, file), text });
    }
  }

  const unknown = entries
    .filter((e) => e.isDirectory() && !isCategory(e.name))
    .map((e) => e.name);
  if (unknown.length > 0) {
    console.warn(`Skipping folders that are not categories: ${unknown.join(", ")}`);
  }

  return docs;
}

/**
 * Chunk and embed documents into rows for the kb_chunks table
 */
export async function buildChunkRows(
  docs: CorpusDoc[],
  embed: (texts: string[]) => Promise<number[][]>,
  options: ChunkOptions = {}
): Promise<ChunkRow[]> {
  const pending: Array<Omit<ChunkRow, "embedding">> = [];

  for (const doc of docs) {
    chunkText(doc.text, options).forEach((content, index) => {
      pending.push({
        category: doc.category,
        source_path: doc.path,
        chunk_index: index,
        content,
      });
    });
  }

  const rows: ChunkRow[] = [];
  for (let i = 0; i < pending.length; i += INGEST_CONFIG.embeddingBatchSize) {
    const batch = pending.slice(i, i + INGEST_CONFIG.embeddingBatchSize);
    const embeddings = await embed(batch.map((row) => row.content));

    if (embeddings.length !== batch.length) {
      throw new Error(`Expected ${batch.length} embeddings, got ${embeddings.length}`);
    }

    batch.forEach((row, j) => {
      rows.push({ ...row, embedding: formatEmbeddingForPg(embeddings[j]) });
    });
  }

  return rows;
}

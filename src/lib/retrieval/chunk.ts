/**
 * Text Chunking
 *
 * Splits knowledge-base documents into chunks suitable for embedding.
 * Paragraphs are packed together up to the size limit; a paragraph that is
 * larger than the limit is split on word boundaries with overlap.
 */

export const CHUNK_CONFIG = {
  /** Target chunk size in characters */
  maxChunkSize: 1000,
  /** Overlap between pieces of an oversized paragraph */
  overlap: 150,
};

export type ChunkOptions = Partial<typeof CHUNK_CONFIG>;

/**
 * Split text into ordered chunks
 */
export function chunkText(text: string, options: ChunkOptions = {}): string[] {
  const { maxChunkSize, overlap } = { ...CHUNK_CONFIG, ...options };

  const paragraphs = text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const chunks: string[] = [];
  let current = "";

  const flush = () => {
    if (current.length > 0) {
      chunks.push(current);
      current = "";
    }
  };

  for (const paragraph of paragraphs) {
    if (paragraph.length > maxChunkSize) {
      flush();
      chunks.push(...splitLongParagraph(paragraph, maxChunkSize, overlap));
      continue;
    }

    const candidate = current ? `${current}\n\n${paragraph}` : paragraph;
    if (candidate.length > maxChunkSize) {
      flush();
      current = paragraph;
    } else {
      current = candidate;
    }
  }
  flush();

  return chunks;
}

function splitLongParagraph(paragraph: string, maxChunkSize: number, overlap: number): string[] {
  const pieces: string[] = [];
  let start = 0;

  while (start < paragraph.length) {
    let end = Math.min(start + maxChunkSize, paragraph.length);

    if (end < paragraph.length) {
      const wordBreak = paragraph.lastIndexOf(" ", end);
      if (wordBreak > start + maxChunkSize / 2) {
        end = wordBreak;
      }
    }

    pieces.push(paragraph.slice(start, end).trim());

    if (end >= paragraph.length) {
      break;
    }
    start = Math.max(end - overlap, start + 1);
  }

  return pieces;
}

/**
 * Transcript chunker: recursive character splitting with overlap.
 * Prefers paragraph, then line, then word boundaries before a hard cut.
 */
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import type { Chunk } from '../../shared/types.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from '../../shared/constants.js';

export interface ChunkOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

export async function chunkTranscript(text: string, options: ChunkOptions = {}): Promise<Chunk[]> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!text.trim()) return [];

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap,
    lengthFunction: (s: string) => s.length,
  });

  const parts = await splitter.splitText(text);
  return parts.map((part, index) => ({ index, text: part }));
}

/**
 * Text embedding via the Google Generative AI embedding service.
 * One instance serves both chunk indexing and query embedding, so the
 * vectors always come from the same model.
 */
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { Chunk } from '../../shared/types.js';
import type { AppConfig } from './config.js';

export type Embedder = EmbeddingsInterface;

export function createEmbedder(config: Pick<AppConfig, 'googleApiKey' | 'embeddingModel'>): Embedder {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: config.googleApiKey,
    model: config.embeddingModel,
    maxRetries: 0,
  });
}

/** Embed every chunk; one vector per chunk, in chunk order */
export async function embedChunks(embedder: Embedder, chunks: Chunk[]): Promise<number[][]> {
  if (chunks.length === 0) return [];

  const vectors = await embedder.embedDocuments(chunks.map(c => c.text));
  if (vectors.length !== chunks.length) {
    throw new Error(`Mismatch: ${vectors.length} embedding vectors for ${chunks.length} chunks`);
  }
  return vectors;
}

/** Compute the embedding for a single query string */
export async function embedQuery(embedder: Embedder, text: string): Promise<number[]> {
  return embedder.embedQuery(text);
}

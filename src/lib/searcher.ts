/**
 * In-memory vector index over transcript chunks.
 *
 * BruteForceSearcher: exact cosine similarity against every stored vector,
 * kept in one contiguous Float32Array with per-row norms.
 */
import type { Chunk, SearchResult } from '../../shared/types.js';

export interface Searcher {
  init(chunks: Chunk[], vectors: number[][]): void;
  search(queryVec: ArrayLike<number>, topK: number): SearchResult[];
  readonly size: number;
  readonly dim: number;
}

export class BruteForceSearcher implements Searcher {
  private embeddings = new Float32Array(0);
  private norms = new Float32Array(0);
  private chunks: Chunk[] = [];
  private _dim = 0;

  /** Replace the index contents. Every vector must share one dimension. */
  init(chunks: Chunk[], vectors: number[][]): void {
    if (vectors.length !== chunks.length) {
      throw new Error(
        `Mismatch: ${vectors.length} embedding vectors but ${chunks.length} chunks`
      );
    }

    const dim = vectors[0]?.length ?? 0;
    if (chunks.length > 0 && dim === 0) {
      throw new Error('Embedding vectors must not be empty');
    }

    const embeddings = new Float32Array(vectors.length * dim);
    const norms = new Float32Array(vectors.length);
    for (let i = 0; i < vectors.length; i++) {
      const vec = vectors[i];
      if (vec.length !== dim) {
        throw new Error(
          `Dimension mismatch: vector ${i} has ${vec.length} dims, expected ${dim}`
        );
      }
      embeddings.set(vec, i * dim);
      let sq = 0;
      for (let j = 0; j < dim; j++) sq += vec[j] * vec[j];
      norms[i] = Math.sqrt(sq);
    }

    this.embeddings = embeddings;
    this.norms = norms;
    this.chunks = chunks;
    this._dim = dim;
  }

  get size(): number { return this.chunks.length; }
  get dim(): number { return this._dim; }

  search(queryVec: ArrayLike<number>, topK: number): SearchResult[] {
    const { embeddings, norms, chunks, _dim: dim } = this;
    const numVectors = chunks.length;
    if (numVectors === 0) throw new Error('Index is empty');
    if (queryVec.length !== dim) {
      throw new Error(`Dimension mismatch: query has ${queryVec.length} dims, index has ${dim}`);
    }

    let qsq = 0;
    for (let j = 0; j < dim; j++) qsq += queryVec[j] * queryVec[j];
    const qNorm = Math.sqrt(qsq);

    const scores = new Float32Array(numVectors);
    for (let i = 0; i < numVectors; i++) {
      let dot = 0;
      const offset = i * dim;
      for (let j = 0; j < dim; j++) {
        dot += queryVec[j] * embeddings[offset + j];
      }
      const denom = qNorm * norms[i];
      scores[i] = denom === 0 ? 0 : dot / denom;
    }

    // Stable order on ties: earlier chunk first
    const k = Math.max(0, Math.min(topK, numVectors));
    const indices = Array.from({ length: numVectors }, (_, i) => i);
    indices.sort((a, b) => scores[b] - scores[a] || a - b);

    const results: SearchResult[] = [];
    for (let rank = 0; rank < k; rank++) {
      const idx = indices[rank];
      results.push({
        rank: rank + 1,
        score: scores[idx],
        chunk: chunks[idx],
      });
    }

    return results;
  }
}

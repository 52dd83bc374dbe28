/**
 * Transcript pipeline.
 * Index time: chunk -> embed -> BruteForceSearcher (rag mode only).
 * Question time: embed query -> top-k search -> stuff into prompt -> chat model.
 */
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { AnswerMode, Chunk, SearchResult, Transcript } from '../../shared/types.js';
import { chunkTranscript } from './chunker.js';
import { embedChunks, embedQuery, type Embedder } from './embedder.js';
import { BruteForceSearcher, type Searcher } from './searcher.js';
import { generateAnswer } from './llm.js';

export interface PipelineOptions {
  mode: AnswerMode;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
}

export interface BuiltIndex {
  /** null in full-transcript mode, which needs no index */
  index: Searcher | null;
  chunks: Chunk[];
}

export interface LatencyBreakdown {
  retrieveMs: number;
  composeMs: number;
  totalMs: number;
}

export interface AnswerResult {
  answer: string;
  /** Retrieved chunks the answer was conditioned on (empty in full mode) */
  sources: SearchResult[];
  latency: LatencyBreakdown;
}

const round = (ms: number) => Math.round(ms * 100) / 100;

export class TranscriptPipeline {
  constructor(
    private readonly embedder: Embedder,
    private readonly model: BaseChatModel,
    private readonly options: PipelineOptions,
  ) {}

  get mode(): AnswerMode { return this.options.mode; }

  /** Build a fresh index for one transcript. Throws if any step fails. */
  async buildIndex(transcript: Transcript): Promise<BuiltIndex> {
    if (this.options.mode === 'full') {
      return { index: null, chunks: [] };
    }

    const chunks = await chunkTranscript(transcript.text, {
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
    });
    if (chunks.length === 0) {
      throw new Error('Transcript is empty');
    }

    const vectors = await embedChunks(this.embedder, chunks);
    const index = new BruteForceSearcher();
    index.init(chunks, vectors);

    console.log(`Indexed ${chunks.length} chunks for ${transcript.videoId} (dim=${index.dim})`);
    return { index, chunks };
  }

  /** Top-k chunks for a question, most similar first */
  async retrieve(index: Searcher, question: string, topK = this.options.topK): Promise<SearchResult[]> {
    const queryVec = await embedQuery(this.embedder, question);
    return index.search(queryVec, topK);
  }

  /** Answer one question. Throws on embedding or model failure. */
  async answer(transcript: Transcript, index: Searcher | null, question: string): Promise<AnswerResult> {
    const t0 = performance.now();

    let context: string;
    let sources: SearchResult[] = [];
    if (this.options.mode === 'full') {
      context = transcript.text;
    } else {
      if (!index) throw new Error('No vector index for this transcript');
      sources = await this.retrieve(index, question);
      context = sources.map(r => r.chunk.text).join('\n\n');
    }
    const retrieveMs = performance.now() - t0;

    const t1 = performance.now();
    const answer = await generateAnswer(this.model, this.options.mode, { context, question });
    const composeMs = performance.now() - t1;

    return {
      answer,
      sources,
      latency: {
        retrieveMs: round(retrieveMs),
        composeMs: round(composeMs),
        totalMs: round(performance.now() - t0),
      },
    };
  }
}

/**
 * Transcript session: owns the per-session state and its lifecycle.
 *
 * States: EMPTY → FETCHING → INDEXING → READY → ANSWERING → READY
 *         a failed load or clear() → EMPTY
 *
 * One session object per interactive user. Operations are chained so they
 * run strictly in submission order; nothing interleaves.
 */
import type { AnswerMode, Outcome, SessionError, Transcript } from '../../shared/types.js';
import { succeed } from '../../shared/types.js';
import { LONG_TRANSCRIPT_CHARS } from '../../shared/constants.js';
import type { AppConfig } from './config.js';
import { fetchTranscript, previewTranscript, youtubeCaptionSource, type CaptionSource } from './transcript.js';
import { TranscriptPipeline, type AnswerResult, type BuiltIndex } from './pipeline.js';
import type { Searcher } from './searcher.js';
import { createEmbedder } from './embedder.js';
import { createChatModel, ANSWER_HINT } from './llm.js';

// ── Types ────────────────────────────────────────────────────────────

export type SessionState = 'EMPTY' | 'FETCHING' | 'INDEXING' | 'READY' | 'ANSWERING';

export type StatusLevel = 'loading' | 'ready' | 'error';

export interface StatusUpdate {
  message: string;
  level: StatusLevel;
}

export interface SessionEvents {
  /** Session state changed */
  'state-change': SessionState;
  /** Progress text for the "working" indicator */
  'status': StatusUpdate;
  /** An operation failed */
  'error': SessionError;
}

type EventKey = keyof SessionEvents;
type Handler<K extends EventKey> = (payload: SessionEvents[K]) => void;

export interface LoadSummary {
  videoId: string;
  label: string;
  transcriptLength: number;
  snippetCount: number;
  chunkCount: number;
  preview: string;
  /** Very long transcripts answer slower and may hit model token limits */
  longTranscript: boolean;
}

export interface SessionDeps {
  source: CaptionSource;
  pipeline: TranscriptPipeline;
  captionLang?: string;
}

const NOT_READY_MESSAGE = 'Please fetch a video transcript first to start asking questions.';
const INDEX_HINT = 'Check your API key and fetch the video again.';

const describe = (err: unknown) => (err instanceof Error ? err.message : String(err));

// ── Session ──────────────────────────────────────────────────────────

export class TranscriptSession {
  private _state: SessionState = 'EMPTY';
  private _transcript: Transcript | null = null;
  private _index: Searcher | null = null;
  private _chunkCount = 0;
  private _label = '';

  // Tail of the operation chain; every public operation waits on it
  private queue: Promise<unknown> = Promise.resolve();

  private listeners: { [K in EventKey]: Set<Handler<K>> } = {
    'state-change': new Set(),
    'status': new Set(),
    'error': new Set(),
  };

  constructor(private readonly deps: SessionDeps) {}

  // ── Public API ───────────────────────────────────────────────────

  /** Fetch and index a video. Replaces whatever the session held before. */
  load(input: string): Promise<Outcome<LoadSummary>> {
    return this.enqueue(() => this.runLoad(input));
  }

  /** Answer a question about the loaded video */
  ask(question: string): Promise<Outcome<AnswerResult>> {
    return this.enqueue(() => this.runAsk(question));
  }

  /** Drop transcript, index and label; questions are refused until the next load */
  clear(): Promise<void> {
    return this.enqueue(async () => {
      this.reset();
      this.emit('status', { message: 'Session cleared', level: 'ready' });
    });
  }

  get state(): SessionState { return this._state; }
  get label(): string { return this._label; }
  get transcript(): Transcript | null { return this._transcript; }
  get chunkCount(): number { return this._chunkCount; }
  get mode(): AnswerMode { return this.deps.pipeline.mode; }

  get isReady(): boolean {
    return this._transcript !== null && (this.deps.pipeline.mode === 'full' || this._index !== null);
  }

  // ── Event system ─────────────────────────────────────────────────

  on<K extends EventKey>(event: K, handler: Handler<K>): void {
    this.listeners[event].add(handler);
  }

  off<K extends EventKey>(event: K, handler: Handler<K>): void {
    this.listeners[event].delete(handler);
  }

  private emit<K extends EventKey>(event: K, payload: SessionEvents[K]): void {
    for (const h of this.listeners[event]) {
      try { h(payload); } catch (e) { console.error('Session event handler error:', e); }
    }
  }

  // ── State transitions ────────────────────────────────────────────

  private setState(next: SessionState): void {
    if (this._state === next) return;
    this._state = next;
    this.emit('state-change', next);
  }

  private reset(): void {
    this._transcript = null;
    this._index = null;
    this._chunkCount = 0;
    this._label = '';
    this.setState('EMPTY');
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private failWith<T>(error: SessionError): Outcome<T> {
    this.emit('error', error);
    this.emit('status', { message: error.message, level: 'error' });
    return { ok: false, error };
  }

  // ── Operations ───────────────────────────────────────────────────

  private async runLoad(input: string): Promise<Outcome<LoadSummary>> {
    this.reset();

    this.setState('FETCHING');
    this.emit('status', { message: 'Fetching transcript...', level: 'loading' });
    const fetched = await fetchTranscript(this.deps.source, input, this.deps.captionLang);
    if (!fetched.ok) {
      this.setState('EMPTY');
      return this.failWith(fetched.error);
    }
    const transcript = fetched.value;

    let built: BuiltIndex;
    try {
      if (this.deps.pipeline.mode === 'rag') {
        this.setState('INDEXING');
        this.emit('status', { message: 'Processing transcript...', level: 'loading' });
      }
      built = await this.deps.pipeline.buildIndex(transcript);
    } catch (err) {
      console.warn('Index build failed:', err);
      this.setState('EMPTY');
      return this.failWith({
        kind: 'ModelInvocationFailed',
        message: `Error during processing: ${describe(err)}`,
        hint: INDEX_HINT,
      });
    }

    // Commit only after every step succeeded: the index always matches the transcript
    this._transcript = transcript;
    this._index = built.index;
    this._chunkCount = built.chunks.length;
    this._label = `Video ID: ${transcript.videoId}`;
    this.setState('READY');
    this.emit('status', { message: `Ready to answer questions about: ${this._label}`, level: 'ready' });

    return succeed({
      videoId: transcript.videoId,
      label: this._label,
      transcriptLength: transcript.text.length,
      snippetCount: transcript.snippetCount,
      chunkCount: built.chunks.length,
      preview: previewTranscript(transcript.text),
      longTranscript: transcript.text.length > LONG_TRANSCRIPT_CHARS,
    });
  }

  private async runAsk(question: string): Promise<Outcome<AnswerResult>> {
    const trimmed = question.trim();
    if (!trimmed) {
      return this.failWith({ kind: 'EmptyQuestion', message: 'Please enter a question.' });
    }

    const transcript = this._transcript;
    if (!transcript || !this.isReady) {
      return this.failWith({ kind: 'NotReady', message: NOT_READY_MESSAGE });
    }

    this.setState('ANSWERING');
    this.emit('status', { message: 'Thinking...', level: 'loading' });
    try {
      const result = await this.deps.pipeline.answer(transcript, this._index, trimmed);
      this.setState('READY');
      this.emit('status', { message: `Ready to answer questions about: ${this._label}`, level: 'ready' });
      return succeed(result);
    } catch (err) {
      console.warn('Answer generation failed:', err);
      this.setState('READY');
      return this.failWith({
        kind: 'ModelInvocationFailed',
        message: `Error generating response: ${describe(err)}`,
        hint: ANSWER_HINT,
      });
    }
  }
}

/** Wire a session to the real captions, embedding and chat services */
export function createSession(config: AppConfig): TranscriptSession {
  const pipeline = new TranscriptPipeline(
    createEmbedder(config),
    createChatModel(config),
    {
      mode: config.answerMode,
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      topK: config.topK,
    },
  );
  return new TranscriptSession({
    source: youtubeCaptionSource,
    pipeline,
    ...(config.captionLang ? { captionLang: config.captionLang } : {}),
  });
}


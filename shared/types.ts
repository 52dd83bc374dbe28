/** One caption line as returned by the captions service, in service order */
export interface TranscriptSnippet {
  text: string;
  offset: number;
  duration: number;
}

/** Concatenated caption text for one video */
export interface Transcript {
  videoId: string;
  text: string;
  snippetCount: number;
}

/** A bounded, overlapping span of a transcript */
export interface Chunk {
  index: number;
  text: string;
}

/** A single search result returned by the vector index */
export interface SearchResult {
  rank: number;
  score: number;         // cosine similarity (higher = better)
  chunk: Chunk;
}

/** Whether questions are answered from retrieved chunks or the whole transcript */
export type AnswerMode = 'rag' | 'full';

export type SessionErrorKind =
  | 'CaptionsUnavailable'
  | 'CaptionsNotFound'
  | 'FetchFailed'
  | 'ModelInvocationFailed'
  | 'NotReady'
  | 'EmptyQuestion';

export interface SessionError {
  kind: SessionErrorKind;
  message: string;
  hint?: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: SessionError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: SessionErrorKind, message: string, hint?: string): Outcome<T> {
  return { ok: false, error: hint === undefined ? { kind, message } : { kind, message, hint } };
}

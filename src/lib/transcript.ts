/**
 * Transcript fetching: one attempt against the captions service, failures
 * classified into the kinds the session reports to the user.
 */
import {
  fetchTranscript as fetchCaptions,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
} from 'youtube-transcript-plus';
import type { Outcome, Transcript, TranscriptSnippet } from '../../shared/types.js';
import { succeed, fail } from '../../shared/types.js';
import { PREVIEW_CHARS } from '../../shared/constants.js';
import { extractVideoId } from './videoId.js';

export type CaptionsErrorKind = 'disabled' | 'not-found' | 'failed';

export class CaptionsError extends Error {
  constructor(readonly kind: CaptionsErrorKind, message: string) {
    super(message);
    this.name = 'CaptionsError';
  }
}

/** Anything that can list a video's caption snippets in playback order */
export interface CaptionSource {
  list(videoId: string, lang?: string): Promise<TranscriptSnippet[]>;
}

export const FETCH_HINT = 'Make sure the URL is correct and the video has captions enabled.';
const NO_CAPTIONS_MESSAGE = 'No transcript found for this video. The video may not have captions.';

/** Map a captions-library error onto our three failure kinds */
export function classifyCaptionError(err: unknown): CaptionsError {
  if (err instanceof CaptionsError) return err;
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof YoutubeTranscriptDisabledError) {
    return new CaptionsError('disabled', message);
  }
  if (err instanceof YoutubeTranscriptNotAvailableError || err instanceof YoutubeTranscriptNotAvailableLanguageError) {
    return new CaptionsError('not-found', message);
  }
  return new CaptionsError('failed', message);
}

/** Captions source backed by youtube-transcript-plus */
export const youtubeCaptionSource: CaptionSource = {
  async list(videoId, lang) {
    try {
      const lines = await fetchCaptions(videoId, lang ? { lang } : {});
      return lines.map(line => ({ text: line.text, offset: line.offset, duration: line.duration }));
    } catch (err) {
      throw classifyCaptionError(err);
    }
  },
};

/**
 * Fetch the transcript for a URL or bare id.
 * No retry: the first failure is returned to the caller as a tagged outcome.
 */
export async function fetchTranscript(
  source: CaptionSource,
  input: string,
  lang?: string,
): Promise<Outcome<Transcript>> {
  const videoId = extractVideoId(input);
  if (!videoId) {
    return fail('FetchFailed', 'Error during processing: no video identifier in input', FETCH_HINT);
  }

  try {
    const snippets = await source.list(videoId, lang);
    const text = snippets.map(s => s.text).join(' ');
    // An empty list and whitespace-only snippets both count as no captions
    if (!text.trim()) {
      return fail('CaptionsNotFound', NO_CAPTIONS_MESSAGE);
    }
    return succeed({
      videoId,
      text,
      snippetCount: snippets.length,
    });
  } catch (err) {
    const classified = classifyCaptionError(err);
    switch (classified.kind) {
      case 'disabled':
        return fail('CaptionsUnavailable', 'Transcripts are disabled for this video.');
      case 'not-found':
        return fail('CaptionsNotFound', NO_CAPTIONS_MESSAGE);
      case 'failed':
        return fail('FetchFailed', `Error during processing: ${classified.message}`, FETCH_HINT);
    }
  }
}

/** First `limit` characters of the transcript, with an ellipsis when cut */
export function previewTranscript(text: string, limit = PREVIEW_CHARS): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

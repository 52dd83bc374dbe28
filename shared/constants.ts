export const DEFAULT_CHAT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-004';
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_TOP_K = 4;
export const PREVIEW_CHARS = 2000;
export const LONG_TRANSCRIPT_CHARS = 50_000;

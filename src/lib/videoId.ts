/**
 * Pull a video identifier out of a watch URL, a short link, or a bare id.
 * Checked in that order: `v=` query parameter, `youtu.be/` path, trimmed input.
 */
export function extractVideoId(input: string): string {
  const raw = input.trim();

  if (raw.includes('v=')) {
    return raw.split('v=')[1].split('&')[0];
  }
  if (raw.includes('youtu.be/')) {
    return raw.split('youtu.be/')[1].split('?')[0];
  }
  return raw;
}

import { describe, it, expect } from 'vitest';
import { chunkTranscript } from '../src/lib/chunker.js';

/** 600 distinct five-letter words separated by single spaces */
function wordText(count = 600): string {
  return Array.from({ length: count }, (_, i) => `w${String(i).padStart(4, '0')}`).join(' ');
}

describe('chunkTranscript', () => {
  it('returns one chunk equal to text shorter than the chunk size', async () => {
    const text = 'a short caption about bread';
    expect(await chunkTranscript(text)).toEqual([{ index: 0, text }]);
  });

  it('returns no chunks for blank text', async () => {
    expect(await chunkTranscript('   ')).toEqual([]);
  });

  it('keeps every chunk within the configured size', async () => {
    const chunks = await chunkTranscript(wordText(), { chunkSize: 1000, chunkOverlap: 200 });
    expect(chunks.length).toBeGreaterThan(1);
    for (const c of chunks) expect(c.text.length).toBeLessThanOrEqual(1000);
    expect(chunks.map(c => c.index)).toEqual(chunks.map((_, i) => i));
  });

  it('covers the text in order with bounded overlap between neighbours', async () => {
    const text = wordText();
    const chunks = await chunkTranscript(text, { chunkSize: 1000, chunkOverlap: 200 });

    const spans = chunks.map(c => {
      const start = text.indexOf(c.text);
      expect(start).toBeGreaterThanOrEqual(0);
      return { start, end: start + c.text.length };
    });

    expect(spans[0].start).toBe(0);
    expect(spans[spans.length - 1].end).toBe(text.length);
    for (let i = 1; i < spans.length; i++) {
      const overlap = spans[i - 1].end - spans[i].start;
      expect(overlap).toBeGreaterThan(0);
      expect(overlap).toBeLessThanOrEqual(200);
    }

    // Stitching the chunks back together, dropping each overlap, gives the text
    let rebuilt = chunks[0].text;
    for (let i = 1; i < chunks.length; i++) {
      rebuilt += chunks[i].text.slice(spans[i - 1].end - spans[i].start);
    }
    expect(rebuilt).toBe(text);
  });

  it('is deterministic', async () => {
    const text = wordText();
    const a = await chunkTranscript(text, { chunkSize: 300, chunkOverlap: 50 });
    const b = await chunkTranscript(text, { chunkSize: 300, chunkOverlap: 50 });
    expect(a).toEqual(b);
  });

  it('splits on a paragraph break before a word boundary', async () => {
    const text = `${'a'.repeat(600)}\n\n${'b'.repeat(600)}`;
    const chunks = await chunkTranscript(text, { chunkSize: 1000, chunkOverlap: 200 });
    expect(chunks.map(c => c.text)).toEqual(['a'.repeat(600), 'b'.repeat(600)]);
  });

  it('falls back to a hard cut when there is no whitespace', async () => {
    const chunks = await chunkTranscript('x'.repeat(2500), { chunkSize: 1000, chunkOverlap: 200 });
    expect(chunks.map(c => c.text.length)).toEqual([1000, 1000, 900]);
  });
});

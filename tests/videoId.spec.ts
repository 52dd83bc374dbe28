import { describe, it, expect } from 'vitest';
import { extractVideoId } from '../src/lib/videoId.js';

describe('extractVideoId', () => {
  it('reads the v= query parameter and stops at the next &', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=ABC123&t=5')).toBe('ABC123');
  });

  it('reads a watch URL with v= as the only parameter', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=ABC123')).toBe('ABC123');
  });

  it('finds v= when it is not the first parameter', () => {
    expect(extractVideoId('https://m.youtube.com/watch?feature=share&v=XYZ789')).toBe('XYZ789');
  });

  it('reads the short-link path and stops at ?', () => {
    expect(extractVideoId('https://youtu.be/ABC123?t=5')).toBe('ABC123');
    expect(extractVideoId('https://youtu.be/ABC123')).toBe('ABC123');
  });

  it('treats anything else as a bare id, trimmed', () => {
    expect(extractVideoId('ABC123')).toBe('ABC123');
    expect(extractVideoId('  ABC123 \n')).toBe('ABC123');
  });

  it('prefers v= over the short-link form', () => {
    expect(extractVideoId('https://youtu.be/SHORT?v=LONG')).toBe('LONG');
  });

  it('returns an empty id for blank input', () => {
    expect(extractVideoId('   ')).toBe('');
  });
});

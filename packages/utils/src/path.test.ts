import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { getExtension, siblingPath } from './path.js';

describe('getExtension', () => {
  it('returns the lowercased extension without the dot', () => {
    expect(getExtension('/tv/Show.S01E01.MKV')).toBe('mkv');
  });

  it('returns an empty string when there is none', () => {
    expect(getExtension('/tv/README')).toBe('');
  });
});

describe('siblingPath', () => {
  it('keeps the stem and swaps the extension', () => {
    expect(siblingPath('/tv/Show.S01E01.mkv', '.eng', 'ass')).toBe(join('/tv', 'Show.S01E01.eng.ass'));
  });
});

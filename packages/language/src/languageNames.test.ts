import { describe, it, expect } from 'vitest';
import { languageCodeForName, loadLanguageTable } from './languageNames.js';

describe('languageCodeForName', () => {
  it('maps English names to three-letter codes', () => {
    expect(languageCodeForName('English')).toBe('eng');
    expect(languageCodeForName('French')).toBe('fra');
    expect(languageCodeForName('Japanese')).toBe('jpn');
  });

  it('ignores case and surrounding whitespace', () => {
    expect(languageCodeForName('  spanish ')).toBe('spa');
  });

  it('returns null for unknown names', () => {
    expect(languageCodeForName('Klingon')).toBeNull();
    expect(languageCodeForName('')).toBeNull();
  });

  it('loads the table once', () => {
    expect(loadLanguageTable()).toBe(loadLanguageTable());
  });
});

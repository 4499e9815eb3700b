import { describe, it, expect, vi } from 'vitest';
import { LookupError } from '@streamplan/core';
import { resolveSearchLanguage } from './resolver.js';
import type { LanguageLookupService } from './types.js';

function fakeService(
  source: string,
  lookup: (term: string) => Promise<string | null>,
  configured = true
): LanguageLookupService {
  return {
    source,
    isConfigured: () => configured,
    lookupOriginalLanguage: vi.fn(lookup),
  };
}

describe('resolveSearchLanguage', () => {
  it('falls back to the configured string when no source yields data', async () => {
    const radarr = fakeService('radarr', async () => 'French');
    const sonarr = fakeService('sonarr', async () => null);

    const resolution = await resolveSearchLanguage({
      term: '/media/show.mkv',
      fallback: 'spa',
      sources: [
        { enabled: false, service: radarr },
        { enabled: true, service: sonarr },
      ],
    });

    expect(resolution.searchString).toBe('spa');
    expect(resolution.source).toBe('configured');
    expect(resolution.attempts).toEqual([
      { source: 'radarr', outcome: 'disabled' },
      { source: 'sonarr', outcome: 'no-match' },
    ]);
    expect(radarr.lookupOriginalLanguage).not.toHaveBeenCalled();
    expect(sonarr.lookupOriginalLanguage).toHaveBeenCalledWith('/media/show.mkv');
  });

  it('uses the first source that reports a known language', async () => {
    const radarr = fakeService('radarr', async () => 'Japanese');
    const sonarr = fakeService('sonarr', async () => 'French');

    const resolution = await resolveSearchLanguage({
      term: '/media/movie.mkv',
      fallback: 'eng',
      sources: [
        { enabled: true, service: radarr },
        { enabled: true, service: sonarr },
      ],
    });

    expect(resolution.searchString).toBe('jpn');
    expect(resolution.source).toBe('radarr');
    expect(resolution.attempts).toHaveLength(1);
    expect(sonarr.lookupOriginalLanguage).not.toHaveBeenCalled();
  });

  it('records failures and moves on to the next source', async () => {
    const radarr = fakeService('radarr', async () => {
      throw new LookupError('radarr', 'HTTP 500');
    });
    const sonarr = fakeService('sonarr', async () => 'French');

    const resolution = await resolveSearchLanguage({
      term: '/media/movie.mkv',
      fallback: 'eng',
      sources: [
        { enabled: true, service: radarr },
        { enabled: true, service: sonarr },
      ],
    });

    expect(resolution.searchString).toBe('fra');
    expect(resolution.source).toBe('sonarr');
    expect(resolution.attempts[0]).toEqual({
      source: 'radarr',
      outcome: 'failed',
      error: 'radarr lookup failed: HTTP 500',
    });
  });

  it('skips sources without a URL or API key', async () => {
    const radarr = fakeService('radarr', async () => 'French', false);

    const resolution = await resolveSearchLanguage({
      term: '/media/movie.mkv',
      fallback: 'eng',
      sources: [{ enabled: true, service: radarr }],
    });

    expect(resolution.searchString).toBe('eng');
    expect(resolution.attempts).toEqual([{ source: 'radarr', outcome: 'unconfigured' }]);
    expect(radarr.lookupOriginalLanguage).not.toHaveBeenCalled();
  });

  it('falls back when the reported language has no code', async () => {
    const sonarr = fakeService('sonarr', async () => 'Klingon');

    const resolution = await resolveSearchLanguage({
      term: '/media/show.mkv',
      fallback: 'eng',
      sources: [{ enabled: true, service: sonarr }],
    });

    expect(resolution.searchString).toBe('eng');
    expect(resolution.attempts).toEqual([
      { source: 'sonarr', outcome: 'unknown-language', languageName: 'Klingon' },
    ]);
  });

  it('accepts a custom name-to-code mapping', async () => {
    const sonarr = fakeService('sonarr', async () => 'Klingon');

    const resolution = await resolveSearchLanguage({
      term: '/media/show.mkv',
      fallback: 'eng',
      sources: [{ enabled: true, service: sonarr }],
      codeForName: (name) => (name === 'Klingon' ? 'tlh' : null),
    });

    expect(resolution.searchString).toBe('tlh');
    expect(resolution.source).toBe('sonarr');
  });

  it('records an unreadable language table as a failed attempt', async () => {
    const radarr = fakeService('radarr', async () => 'French');

    const resolution = await resolveSearchLanguage({
      term: '/media/movie.mkv',
      fallback: 'eng',
      sources: [{ enabled: true, service: radarr }],
      codeForName: () => {
        throw new Error('languages.json is missing');
      },
    });

    expect(resolution).toEqual({
      searchString: 'eng',
      source: 'configured',
      attempts: [
        { source: 'radarr', outcome: 'failed', languageName: 'French', error: 'languages.json is missing' },
      ],
    });
  });
});

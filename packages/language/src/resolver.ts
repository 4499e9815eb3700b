/**
 * Search Language Resolver
 * 
 * Picks the language code the reorder policy searches for: the original
 * language reported by the first lookup source that yields one, otherwise
 * the configured search string. Lookup failures are recorded as attempts
 * and never propagate.
 */

import { errorMessage } from '@streamplan/core';
import { languageCodeForName } from './languageNames.js';
import type { LanguageResolution, LanguageSource, LookupAttempt } from './types.js';

export interface ResolveSearchLanguageOptions {
  /** Term passed to the lookup services, usually the file path */
  term: string;
  /** Configured search string, used when no source yields a code */
  fallback: string;
  /** Sources in priority order */
  sources: readonly LanguageSource[];
  codeForName?: (name: string) => string | null;
}

async function attemptLookup(
  { enabled, service }: LanguageSource,
  term: string,
  codeForName: (name: string) => string | null
): Promise<LookupAttempt> {
  const source = service.source;
  if (!enabled) return { source, outcome: 'disabled' };
  if (!service.isConfigured()) return { source, outcome: 'unconfigured' };

  let languageName: string | null;
  try {
    languageName = await service.lookupOriginalLanguage(term);
  } catch (error) {
    return { source, outcome: 'failed', error: errorMessage(error) };
  }

  if (!languageName) return { source, outcome: 'no-match' };

  let code: string | null;
  try {
    code = codeForName(languageName);
  } catch (error) {
    return { source, outcome: 'failed', languageName, error: errorMessage(error) };
  }
  if (!code) return { source, outcome: 'unknown-language', languageName };

  return { source, outcome: 'resolved', languageName, code };
}

export async function resolveSearchLanguage(
  options: ResolveSearchLanguageOptions
): Promise<LanguageResolution> {
  const codeForName = options.codeForName ?? languageCodeForName;
  const attempts: LookupAttempt[] = [];

  for (const source of options.sources) {
    const attempt = await attemptLookup(source, options.term, codeForName);
    attempts.push(attempt);
    if (attempt.outcome === 'resolved' && attempt.code) {
      return { searchString: attempt.code, source: attempt.source, attempts };
    }
  }

  return { searchString: options.fallback, source: 'configured', attempts };
}

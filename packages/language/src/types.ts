/**
 * Language Lookup Types
 */

/**
 * An external catalogue that knows the original language of the movie or
 * series a file belongs to.
 */
export interface LanguageLookupService {
  readonly source: string;
  /** URL and credentials are present */
  isConfigured(): boolean;
  /**
   * Original language name (e.g. `French`) for the media matching `term`,
   * or null when the catalogue has no match. Transport and protocol
   * failures reject with a LookupError.
   */
  lookupOriginalLanguage(term: string): Promise<string | null>;
}

export interface LanguageSource {
  enabled: boolean;
  service: LanguageLookupService;
}

export type LookupOutcome =
  | 'disabled'
  | 'unconfigured'
  | 'no-match'
  | 'unknown-language'
  | 'failed'
  | 'resolved';

export interface LookupAttempt {
  source: string;
  outcome: LookupOutcome;
  languageName?: string;
  code?: string;
  error?: string;
}

export interface LanguageResolution {
  searchString: string;
  /** Lookup source that produced the code, or `configured` */
  source: string;
  attempts: LookupAttempt[];
}

/**
 * @streamplan/language
 * 
 * Resolves the language the reorder plugin searches for, optionally from
 * the original language Radarr or Sonarr report for the file.
 */

export { resolveSearchLanguage, type ResolveSearchLanguageOptions } from './resolver.js';

export { languageCodeForName, loadLanguageTable } from './languageNames.js';

export {
  RadarrLookupService,
  SonarrLookupService,
  type ArrLookupConfig,
} from './services/arrLookup.js';

export type {
  LanguageLookupService,
  LanguageSource,
  LanguageResolution,
  LookupAttempt,
  LookupOutcome,
} from './types.js';

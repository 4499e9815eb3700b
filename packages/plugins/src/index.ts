/**
 * @streamplan/plugins
 * 
 * Host-facing runners for the stream plugins. Each runner takes the data
 * object of one host stage and returns it updated.
 */

export { codecConversionPlugin } from './codecConversion.js';

export {
  subtitleExtractionPlugin,
  extractionMarker,
  UNTAGGED_EXTRACTION_MARKER,
  readExtractionMarker,
  EXTRACTION_MARKER_SECTION,
} from './subtitleExtraction.js';

export {
  languageReorderPlugin,
  languageReorderSettingsSchema,
  resolveReorderLanguage,
  parseReorderSettings,
  type LanguageReorderPluginSettings,
  type LanguageReorderPluginConfig,
} from './languageReorder.js';

export { DirectoryInfo, DIRECTORY_INFO_FILE } from './directoryInfo.js';

export { DEFAULT_FFMPEG_PATH } from './runner.js';

export type {
  LibraryFileTestData,
  WorkerProcessData,
  PostprocessorTaskResultsData,
  LookupServices,
  RunnerContext,
  StreamPlugin,
} from './types.js';

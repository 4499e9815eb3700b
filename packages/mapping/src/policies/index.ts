export {
  CodecConversionPolicy,
  codecConversionConfigSchema,
  KNOWN_SOURCE_CODECS,
  OTHER_CODECS,
  type CodecConversionBucket,
  type CodecConversionConfig,
  type CodecConversionSettings,
} from './codecConversion.js';

export {
  SubtitleExtractionPolicy,
  subtitleExtractionConfigSchema,
  subtitleTag,
  buildExtractionArgs,
  EXTRACTABLE_SUBTITLE_CODECS,
  EXTRACTED_FILE_EXTENSION,
  type SubtitleExtraction,
  type SubtitleExtractionBucket,
  type SubtitleExtractionConfig,
  type SubtitleExtractionOptions,
  type SubtitleExtractionPlan,
  type SubtitleExtractionSettings,
} from './subtitleExtraction.js';

export {
  LanguageReorderPolicy,
  languageReorderConfigSchema,
  matchesSearchString,
  streamsToBeReordered,
  type LanguageReorderBucket,
  type LanguageReorderConfig,
  type LanguageReorderPlan,
  type LanguageReorderSettings,
} from './languageReorder.js';

/**
 * @streamplan/mapping
 * 
 * Stream-mapping decision engine.
 * 
 * Given a stream inventory and a policy, decides whether the file needs
 * work and which ffmpeg mapping/encoding arguments perform it.
 * Nothing here logs, spawns processes or touches the filesystem.
 */

// Plan builder
export { buildMappingPlan, buildFfmpegArgs } from './planBuilder.js';

// Bitrate
export { selectBitrate, clampChannels, MAX_ENCODED_CHANNELS, BITRATE_BY_CHANNELS } from './bitrate.js';

// Settings
export { parsePolicyConfig } from './config.js';

// Language filter
export { parseLanguageFilter } from './languageFilter.js';

// Fragments
export {
  GENERIC_OPTIONS,
  DEFAULT_MAX_MUXING_QUEUE_SIZE,
  defaultAdvancedOptions,
  copyFragment,
  mapFragment,
} from './fragments.js';

// Policies
export * from './policies/index.js';

// Types
export type {
  StreamFragment,
  StreamClassification,
  BucketContents,
  BucketView,
  PlanAssembly,
  PlanVerdict,
  CommandOptions,
  CommandFiles,
  MappingPolicy,
  MappingPlan,
} from './types.js';

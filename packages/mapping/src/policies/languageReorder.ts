/**
 * Language Reorder Policy
 * 
 * Moves streams of interest (audio by default) whose language or title
 * carries the search string ahead of the others and marks the first of
 * them as the default stream. Streams of other types keep their place
 * relative to the first match.
 */

import { CODEC_TYPES, TYPE_LETTERS } from '@streamplan/core';
import type { Stream, StreamTags } from '@streamplan/media';
import { z } from 'zod';
import { parsePolicyConfig } from '../config.js';
import { DEFAULT_MAIN_OPTIONS, defaultAdvancedOptions, mapFragment } from '../fragments.js';
import type {
  BucketView,
  CommandOptions,
  MappingPlan,
  MappingPolicy,
  PlanAssembly,
  PlanVerdict,
  StreamClassification,
} from '../types.js';

export const languageReorderConfigSchema = z.object({
  searchString: z.string().default('eng'),
  streamType: z.enum(CODEC_TYPES).default('audio'),
});

export type LanguageReorderSettings = z.input<typeof languageReorderConfigSchema>;
export type LanguageReorderConfig = z.output<typeof languageReorderConfigSchema>;

/**
 * - `pre`: other stream types seen before the first match
 * - `matched`: streams of interest carrying the search string
 * - `unmatched`: remaining streams of interest
 * - `post`: other stream types seen after the first match
 */
export type LanguageReorderBucket = 'pre' | 'matched' | 'unmatched' | 'post';

export type LanguageReorderPlan = MappingPlan<LanguageReorderBucket>;

/**
 * Whether a stream's `language` or `title` tag contains the search string.
 * Streams with neither tag never match.
 */
export function matchesSearchString(tags: Readonly<StreamTags>, searchString: string): boolean {
  const { language, title } = tags;
  if (language === undefined && title === undefined) return false;

  const needle = searchString.toLowerCase();
  if ((language ?? '').toLowerCase().includes(needle)) return true;
  return (title ?? '').toLowerCase().includes(needle);
}

/**
 * True when putting matched streams first changes any stream's position
 */
export function streamsToBeReordered(matched: readonly Stream[], unmatched: readonly Stream[]): boolean {
  if (matched.length === 0 || unmatched.length === 0) return false;

  return [...matched, ...unmatched].some((stream, position) => stream.index !== position);
}

export class LanguageReorderPolicy implements MappingPolicy<LanguageReorderBucket> {
  readonly name = 'language-reorder';
  readonly streamTypes = CODEC_TYPES;
  readonly bucketOrder = ['pre', 'matched', 'unmatched', 'post'] as const;
  readonly passthroughBucket = 'pre';
  readonly writesPrimaryOutput = true;
  readonly config: Readonly<LanguageReorderConfig>;

  constructor(settings: LanguageReorderSettings = {}) {
    this.config = Object.freeze(parsePolicyConfig(languageReorderConfigSchema, settings, this.name));
  }

  private get typeLetter(): string {
    return TYPE_LETTERS[this.config.streamType];
  }

  classify(
    stream: Stream,
    position: number,
    buckets: BucketView<LanguageReorderBucket>
  ): StreamClassification<LanguageReorderBucket> {
    const mapping = mapFragment(stream.codecType, position);

    if (stream.codecType !== this.config.streamType) {
      const bucket = buckets.size('matched') > 0 ? 'post' : 'pre';
      return { needsProcessing: true, bucket, mapping, encoding: [] };
    }

    if (!matchesSearchString(stream.tags, this.config.searchString)) {
      return { needsProcessing: true, bucket: 'unmatched', mapping, encoding: [] };
    }

    if (buckets.size('matched') === 0) {
      // First match becomes output stream 0 of its type
      mapping.push(`-disposition:${this.typeLetter}:0`, 'default');
    }
    return { needsProcessing: true, bucket: 'matched', mapping, encoding: [] };
  }

  assemblePlan(assembly: PlanAssembly<LanguageReorderBucket, never>): PlanVerdict {
    const { buckets } = assembly;
    return {
      needsProcessing: streamsToBeReordered(buckets.get('matched').streams, buckets.get('unmatched').streams),
      leadingMapping: ['-c', 'copy', `-disposition:${this.typeLetter}`, '-default'],
    };
  }

  commandOptions(): CommandOptions {
    return {
      mainOptions: [...DEFAULT_MAIN_OPTIONS],
      advancedOptions: defaultAdvancedOptions(),
    };
  }
}

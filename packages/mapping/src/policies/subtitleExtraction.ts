/**
 * Subtitle Extraction Policy
 * 
 * Finds ASS/SSA subtitle streams to extract into standalone files. The
 * primary output keeps every stream as a copy; extraction targets are
 * returned as side products for the host to name the files.
 */

import type { Stream } from '@streamplan/media';
import { siblingPath } from '@streamplan/utils';
import { z } from 'zod';
import { parsePolicyConfig } from '../config.js';
import { DEFAULT_MAIN_OPTIONS, copyFragment, defaultAdvancedOptions, mapFragment } from '../fragments.js';
import { parseLanguageFilter } from '../languageFilter.js';
import type {
  CommandOptions,
  MappingPlan,
  MappingPolicy,
  PlanAssembly,
  PlanVerdict,
  StreamClassification,
} from '../types.js';

export const EXTRACTABLE_SUBTITLE_CODECS: readonly string[] = ['ass', 'ssa'];

export const EXTRACTED_FILE_EXTENSION = 'ass';

export const subtitleExtractionConfigSchema = z.object({
  languagesToExtract: z.string().default(''),
  includeTitleInOutputFileName: z.boolean().default(true),
});

export type SubtitleExtractionSettings = z.input<typeof subtitleExtractionConfigSchema>;
export type SubtitleExtractionConfig = z.output<typeof subtitleExtractionConfigSchema>;

export interface SubtitleExtractionOptions {
  /** Marker recorded by a previous successful extraction of this file */
  priorMarker?: string | null;
}

export interface SubtitleExtraction {
  position: number;
  /** File name suffix, e.g. `.eng.Signs` */
  tag: string;
  mapping: string[];
}

export type SubtitleExtractionBucket = 'streams';

export type SubtitleExtractionPlan = MappingPlan<SubtitleExtractionBucket, SubtitleExtraction>;

/**
 * File name suffix for an extracted stream
 */
export function subtitleTag(stream: Stream, position: number, includeTitle: boolean): string {
  const language = (stream.tags.language ?? '').toLowerCase();
  const title = stream.tags.title ?? '';

  let tag = '';
  if (language) tag += `.${language}`;
  if (title && includeTitle) tag += `.${title}`;
  if (!tag) tag = `.${position}`;

  return tag.replace(/[\s/\\]/g, '-');
}

export class SubtitleExtractionPolicy implements MappingPolicy<SubtitleExtractionBucket, SubtitleExtraction> {
  readonly name = 'subtitle-extraction';
  readonly streamTypes = ['subtitle'] as const;
  readonly bucketOrder = ['streams'] as const;
  readonly passthroughBucket = 'streams';
  readonly writesPrimaryOutput = false;
  readonly config: Readonly<SubtitleExtractionConfig>;
  readonly languages: readonly string[];
  readonly alreadyExtracted: boolean;

  constructor(settings: SubtitleExtractionSettings = {}, options: SubtitleExtractionOptions = {}) {
    this.config = Object.freeze(parsePolicyConfig(subtitleExtractionConfigSchema, settings, this.name));
    this.languages = Object.freeze(parseLanguageFilter(this.config.languagesToExtract));
    this.alreadyExtracted = Boolean(options.priorMarker);
  }

  testStreamNeedsProcessing(stream: Stream): boolean {
    if (!EXTRACTABLE_SUBTITLE_CODECS.includes(stream.codecName)) return false;
    if (this.languages.length === 0) return true;

    const language = (stream.tags.language ?? '').toLowerCase();
    return this.languages.includes(language);
  }

  classify(stream: Stream, position: number): StreamClassification<SubtitleExtractionBucket, SubtitleExtraction> {
    const copy = copyFragment('subtitle', position);
    if (!this.testStreamNeedsProcessing(stream)) {
      return { ...copy, needsProcessing: false, bucket: 'streams' };
    }

    return {
      ...copy,
      needsProcessing: true,
      bucket: 'streams',
      sideProduct: {
        position,
        tag: subtitleTag(stream, position, this.config.includeTitleInOutputFileName),
        mapping: mapFragment('subtitle', position),
      },
    };
  }

  assemblePlan(assembly: PlanAssembly<SubtitleExtractionBucket, SubtitleExtraction>): PlanVerdict {
    return { needsProcessing: !this.alreadyExtracted && assembly.anyStreamNeedsProcessing };
  }

  commandOptions(): CommandOptions {
    return {
      mainOptions: [...DEFAULT_MAIN_OPTIONS],
      advancedOptions: defaultAdvancedOptions(),
    };
  }
}

/**
 * Per-stream outputs appended after the base arguments:
 * `-map 0:s:<n> -y <dir>/<name><tag>.ass`
 */
export function buildExtractionArgs(plan: SubtitleExtractionPlan, originalFilePath: string): string[] {
  const args: string[] = [];
  for (const extraction of plan.sideProducts) {
    args.push(...extraction.mapping);
    args.push('-y', siblingPath(originalFilePath, extraction.tag, EXTRACTED_FILE_EXTENSION));
  }
  return args;
}


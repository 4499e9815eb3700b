/**
 * Codec Conversion Policy
 * 
 * Re-encodes audio streams that are not already in the target codec.
 * Encoding arguments are either derived from the channel count or taken
 * verbatim from the user's custom options.
 */

import { streamSpecifier } from '@streamplan/core';
import type { Stream } from '@streamplan/media';
import { splitTokens } from '@streamplan/utils';
import { z } from 'zod';
import { clampChannels, selectBitrate } from '../bitrate.js';
import { parsePolicyConfig } from '../config.js';
import { DEFAULT_MAIN_OPTIONS, copyFragment, defaultAdvancedOptions, mapFragment } from '../fragments.js';
import type {
  CommandOptions,
  MappingPolicy,
  PlanAssembly,
  PlanVerdict,
  StreamClassification,
} from '../types.js';

/** Codecs the selection list can name individually; `other` covers the rest */
export const KNOWN_SOURCE_CODECS = [
  'dts',
  'dca',
  'truehd',
  'eac3',
  'mp3',
  'mp2',
  'aac',
  'opus',
  'flac',
  'vorbis',
  'pcm_s16le',
] as const;

export const OTHER_CODECS = 'other';

const lowercaseList = z.array(z.string()).transform((codecs) =>
  codecs.map((codec) => codec.trim().toLowerCase()).filter((codec) => codec.length > 0)
);

export const codecConversionConfigSchema = z.object({
  targetCodec: z.string().trim().min(1).default('ac3').transform((codec) => codec.toLowerCase()),
  encoder: z.string().trim().min(1).default('ac3'),
  codecSelectionMode: z.enum(['all', 'selected']).default('all'),
  selectedCodecs: lowercaseList.default(['dts', 'dca', 'truehd', 'mp3', 'mp2', 'aac']),
  advanced: z.boolean().default(false),
  mainOptions: z.string().default(''),
  advancedOptions: z.string().default(''),
  customOptions: z.string().default(''),
  maxMuxingQueueSize: z.number().int().min(1024).max(10240).default(2048),
});

export type CodecConversionSettings = z.input<typeof codecConversionConfigSchema>;
export type CodecConversionConfig = z.output<typeof codecConversionConfigSchema>;

export type CodecConversionBucket = 'streams';

export class CodecConversionPolicy implements MappingPolicy<CodecConversionBucket> {
  readonly name = 'codec-conversion';
  readonly streamTypes = ['audio'] as const;
  readonly bucketOrder = ['streams'] as const;
  readonly passthroughBucket = 'streams';
  readonly writesPrimaryOutput = true;
  readonly config: Readonly<CodecConversionConfig>;

  constructor(settings: CodecConversionSettings = {}) {
    this.config = Object.freeze(parsePolicyConfig(codecConversionConfigSchema, settings, this.name));
  }

  /**
   * Whether the stream's codec is one the user asked to convert
   */
  isSelectedCodec(codecName: string): boolean {
    const { codecSelectionMode, selectedCodecs } = this.config;
    if (codecSelectionMode === 'all') return true;

    if (selectedCodecs.includes(codecName)) return true;

    const knownCodecs: readonly string[] = KNOWN_SOURCE_CODECS;
    const isKnown = knownCodecs.includes(codecName);
    return !isKnown && selectedCodecs.includes(OTHER_CODECS);
  }

  testStreamNeedsProcessing(stream: Stream): boolean {
    if (stream.codecName === this.config.targetCodec) return false;
    return this.isSelectedCodec(stream.codecName);
  }

  encodingFor(stream: Stream, position: number): string[] {
    const spec = streamSpecifier('audio', position);
    const encoding = [`-c${spec}`, this.config.encoder];

    if (this.config.advanced) {
      encoding.push(...splitTokens(this.config.customOptions));
      return encoding;
    }

    if (stream.channels !== undefined) {
      encoding.push(
        `-ac${spec}`, String(clampChannels(stream.channels)),
        `-b${spec}`, `${selectBitrate(stream.channels)}k`
      );
    }
    return encoding;
  }

  classify(stream: Stream, position: number): StreamClassification<CodecConversionBucket> {
    if (!this.testStreamNeedsProcessing(stream)) {
      return { ...copyFragment('audio', position), needsProcessing: false, bucket: 'streams' };
    }

    return {
      needsProcessing: true,
      bucket: 'streams',
      mapping: mapFragment('audio', position),
      encoding: this.encodingFor(stream, position),
    };
  }

  assemblePlan(assembly: PlanAssembly<CodecConversionBucket, never>): PlanVerdict {
    return { needsProcessing: assembly.anyStreamNeedsProcessing };
  }

  commandOptions(): CommandOptions {
    const mainOptions = [...DEFAULT_MAIN_OPTIONS];
    const advancedOptions = defaultAdvancedOptions(this.config.maxMuxingQueueSize);
    if (!this.config.advanced) {
      return { mainOptions, advancedOptions };
    }

    // Custom option strings replace the defaults only when they hold something
    const customMain = splitTokens(this.config.mainOptions);
    const customAdvanced = splitTokens(this.config.advancedOptions);
    return {
      mainOptions: customMain.length > 0 ? customMain : mainOptions,
      advancedOptions: customAdvanced.length > 0 ? customAdvanced : advancedOptions,
    };
  }
}

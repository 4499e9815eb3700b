/**
 * Mapping Types
 */

import type { CodecType } from '@streamplan/core';
import type { Stream } from '@streamplan/media';

/**
 * Arguments contributed by one stream
 */
export interface StreamFragment {
  mapping: string[];
  encoding: string[];
}

export interface StreamClassification<TBucket extends string, TSide = never> extends StreamFragment {
  needsProcessing: boolean;
  bucket: TBucket;
  sideProduct?: TSide;
}

export interface BucketContents {
  readonly streams: readonly Stream[];
  readonly mapping: readonly string[];
  readonly encoding: readonly string[];
}

/**
 * Read-only view of what one run has accumulated so far
 */
export interface BucketView<TBucket extends string> {
  size(bucket: TBucket): number;
  get(bucket: TBucket): BucketContents;
}

export interface PlanAssembly<TBucket extends string, TSide> {
  buckets: BucketView<TBucket>;
  anyStreamNeedsProcessing: boolean;
  sideProducts: readonly TSide[];
}

export interface PlanVerdict {
  needsProcessing: boolean;
  /** Tokens placed ahead of every bucket's mapping */
  leadingMapping?: string[];
}

export interface CommandOptions {
  mainOptions: string[];
  advancedOptions: string[];
}

/**
 * A per-plugin decision policy. Implementations hold configuration only;
 * everything that changes during a run lives in the builder's accumulator.
 */
export interface MappingPolicy<TBucket extends string = string, TSide = never> {
  readonly name: string;
  /** Codec types routed through `classify`; other streams are copied */
  readonly streamTypes: readonly CodecType[];
  /** Concatenation order of the buckets in the final argument list */
  readonly bucketOrder: readonly TBucket[];
  /** Bucket receiving copy fragments for streams the policy does not handle */
  readonly passthroughBucket: TBucket;
  /** False when the command only writes side outputs (extracted files) */
  readonly writesPrimaryOutput: boolean;

  classify(stream: Stream, position: number, buckets: BucketView<TBucket>): StreamClassification<TBucket, TSide>;
  assemblePlan(assembly: PlanAssembly<TBucket, TSide>): PlanVerdict;
  commandOptions(): CommandOptions;
}

export interface MappingPlan<TBucket extends string = string, TSide = never> {
  readonly policy: string;
  readonly needsProcessing: boolean;
  readonly streamMapping: readonly string[];
  readonly streamEncoding: readonly string[];
  readonly sideProducts: readonly TSide[];
  readonly buckets: ReadonlyMap<TBucket, readonly Stream[]>;
  readonly mainOptions: readonly string[];
  readonly advancedOptions: readonly string[];
  readonly writesPrimaryOutput: boolean;
}

export interface CommandFiles {
  inputFile?: string;
  outputFile?: string;
}

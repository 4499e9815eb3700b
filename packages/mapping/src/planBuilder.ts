/**
 * Mapping Plan Builder
 * 
 * Drives a policy over a stream inventory in probe order and assembles the
 * ordered ffmpeg mapping/encoding arguments. Every call works on a fresh
 * accumulator, so one policy instance can never leak state between files.
 */

import { CODEC_TYPES, PreconditionError, type CodecType } from '@streamplan/core';
import type { Stream, StreamInventory } from '@streamplan/media';
import { GENERIC_OPTIONS, copyFragment } from './fragments.js';
import type {
  BucketContents,
  BucketView,
  CommandFiles,
  MappingPlan,
  MappingPolicy,
  StreamFragment,
} from './types.js';

interface MutableBucket {
  streams: Stream[];
  mapping: string[];
  encoding: string[];
}

class BucketAccumulator<TBucket extends string> implements BucketView<TBucket> {
  private buckets = new Map<TBucket, MutableBucket>();

  constructor(order: readonly TBucket[]) {
    for (const name of order) {
      this.buckets.set(name, { streams: [], mapping: [], encoding: [] });
    }
  }

  size(bucket: TBucket): number {
    return this.get(bucket).streams.length;
  }

  get(bucket: TBucket): BucketContents {
    const contents = this.buckets.get(bucket);
    if (!contents) {
      throw new PreconditionError('known bucket', `Unknown mapping bucket "${bucket}"`);
    }
    return contents;
  }

  append(bucket: TBucket, stream: Stream, fragment: StreamFragment): void {
    const contents = this.buckets.get(bucket);
    if (!contents) {
      throw new PreconditionError('known bucket', `Unknown mapping bucket "${bucket}"`);
    }
    contents.streams.push(stream);
    contents.mapping.push(...fragment.mapping);
    contents.encoding.push(...fragment.encoding);
  }
}

/**
 * Read-only view over the finished buckets. A plain Map would still accept
 * `set` and `delete` after `Object.freeze`.
 */
class BucketTable<TBucket extends string> implements ReadonlyMap<TBucket, readonly Stream[]> {
  private readonly table: Map<TBucket, readonly Stream[]>;

  constructor(entries: Iterable<readonly [TBucket, readonly Stream[]]>) {
    this.table = new Map(entries);
  }

  get size(): number {
    return this.table.size;
  }

  get(bucket: TBucket): readonly Stream[] | undefined {
    return this.table.get(bucket);
  }

  has(bucket: TBucket): boolean {
    return this.table.has(bucket);
  }

  forEach(
    callback: (streams: readonly Stream[], bucket: TBucket, table: ReadonlyMap<TBucket, readonly Stream[]>) => void
  ): void {
    for (const [bucket, streams] of this.table) {
      callback(streams, bucket, this);
    }
  }

  entries() {
    return this.table.entries();
  }

  keys() {
    return this.table.keys();
  }

  values() {
    return this.table.values();
  }

  [Symbol.iterator]() {
    return this.table[Symbol.iterator]();
  }
}

/**
 * Classify every stream and build the plan
 */
export function buildMappingPlan<TBucket extends string, TSide>(
  inventory: StreamInventory,
  policy: MappingPolicy<TBucket, TSide>
): MappingPlan<TBucket, TSide> {
  const accumulator = new BucketAccumulator<TBucket>(policy.bucketOrder);
  const positions = new Map<CodecType, number>(CODEC_TYPES.map((type) => [type, 0]));
  const sideProducts: TSide[] = [];
  let anyStreamNeedsProcessing = false;

  for (const stream of inventory) {
    const position = positions.get(stream.codecType) ?? 0;
    positions.set(stream.codecType, position + 1);

    if (!policy.streamTypes.includes(stream.codecType)) {
      accumulator.append(policy.passthroughBucket, stream, copyFragment(stream.codecType, position));
      continue;
    }

    const classification = policy.classify(stream, position, accumulator);
    if (classification.needsProcessing) {
      anyStreamNeedsProcessing = true;
    }
    if (classification.sideProduct !== undefined) {
      sideProducts.push(classification.sideProduct);
    }
    accumulator.append(classification.bucket, stream, classification);
  }

  const verdict = policy.assemblePlan({
    buckets: accumulator,
    anyStreamNeedsProcessing,
    sideProducts,
  });

  const streamMapping = [...(verdict.leadingMapping ?? [])];
  const streamEncoding: string[] = [];
  const buckets: [TBucket, readonly Stream[]][] = [];
  for (const name of policy.bucketOrder) {
    const contents = accumulator.get(name);
    streamMapping.push(...contents.mapping);
    streamEncoding.push(...contents.encoding);
    buckets.push([name, Object.freeze([...contents.streams])]);
  }

  const { mainOptions, advancedOptions } = policy.commandOptions();

  return Object.freeze({
    policy: policy.name,
    needsProcessing: verdict.needsProcessing,
    streamMapping: Object.freeze(streamMapping),
    streamEncoding: Object.freeze(streamEncoding),
    sideProducts: Object.freeze(sideProducts),
    buckets: Object.freeze(new BucketTable(buckets)),
    mainOptions: Object.freeze([...mainOptions]),
    advancedOptions: Object.freeze([...advancedOptions]),
    writesPrimaryOutput: policy.writesPrimaryOutput,
  });
}

/**
 * Full ffmpeg argument list (without the binary name) for a plan
 */
export function buildFfmpegArgs<TBucket extends string, TSide>(
  plan: MappingPlan<TBucket, TSide>,
  files: CommandFiles
): string[] {
  if (!files.inputFile) {
    throw new PreconditionError('input file', 'Input file has not been set');
  }

  const args: string[] = [...GENERIC_OPTIONS, '-i', files.inputFile];
  args.push(...plan.mainOptions);
  args.push(...plan.advancedOptions);

  if (!plan.writesPrimaryOutput) {
    return args;
  }

  if (!files.outputFile) {
    throw new PreconditionError('output file', 'Output file has not been set');
  }

  args.push(...plan.streamMapping);
  args.push(...plan.streamEncoding);
  args.push('-y', files.outputFile);
  return args;
}

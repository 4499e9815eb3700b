/**
 * Stream Inventory
 * 
 * Turns a probe document into the read-only stream list the mapping
 * layer classifies. Per-type indexes are assigned here, in probe order.
 */

import { CODEC_TYPES, ProbeDocumentError, isCodecType, type CodecType } from '@streamplan/core';
import { probeDocumentSchema, probeStreamSchema } from './probeDocument.js';
import type { Stream, StreamInventory } from './types.js';

export function createStreamInventory(document: unknown): StreamInventory {
  const parsed = probeDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ProbeDocumentError(
      'expected an object with a "streams" array',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const counters = new Map<CodecType, number>(CODEC_TYPES.map((type) => [type, 0]));
  const streams: Stream[] = [];

  parsed.data.streams.forEach((raw, position) => {
    const entry = probeStreamSchema.safeParse(raw);
    if (!entry.success) return;

    const codecType = entry.data.codec_type.toLowerCase();
    if (!isCodecType(codecType)) return;

    const index = counters.get(codecType) ?? 0;
    counters.set(codecType, index + 1);

    const stream: Stream = {
      index,
      probeIndex: entry.data.index ?? position,
      codecType,
      codecName: entry.data.codec_name.toLowerCase(),
      tags: Object.freeze({ ...entry.data.tags }),
      ...(entry.data.channels !== undefined ? { channels: entry.data.channels } : {}),
    };
    streams.push(Object.freeze(stream));
  });

  return Object.freeze(streams);
}

/**
 * Streams of one codec type, in per-type order
 */
export function streamsOfType(inventory: StreamInventory, codecType: CodecType): Stream[] {
  return inventory.filter((stream) => stream.codecType === codecType);
}

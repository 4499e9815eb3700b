/**
 * Probe Document Schema
 * 
 * Lenient zod schema for the `-show_streams` JSON ffprobe prints.
 * Malformed fields degrade to "unknown" instead of rejecting the stream.
 */

import { z } from 'zod';

const channelsSchema = z.coerce.number().int().positive().optional().catch(undefined);

const tagsSchema = z
  .record(z.unknown())
  .catch({})
  .transform((tags) => {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(tags)) {
      if (typeof value === 'string') {
        normalized[key.toLowerCase()] = value;
      }
    }
    return normalized;
  });

export const probeStreamSchema = z.object({
  index: z.number().int().nonnegative().optional().catch(undefined),
  codec_type: z.string().catch(''),
  codec_name: z.string().catch(''),
  channels: channelsSchema,
  tags: tagsSchema.optional(),
}).passthrough();

export type ProbeStream = z.infer<typeof probeStreamSchema>;

export const probeDocumentSchema = z.object({
  streams: z.array(z.unknown()),
  format: z.record(z.unknown()).optional(),
}).passthrough();

/**
 * ffprobe output as printed by
 * `ffprobe -print_format json -show_format -show_streams`
 */
export type ProbeDocument = z.infer<typeof probeDocumentSchema>;

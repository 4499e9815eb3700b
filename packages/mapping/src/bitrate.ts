/**
 * Bitrate Selection
 * 
 * Target bitrate for re-encoded audio, chosen from the source channel count.
 */

import { isPositiveInteger } from '@streamplan/utils';

/** Highest channel count the encoder takes; larger layouts are downmixed */
export const MAX_ENCODED_CHANNELS = 6;

export const BITRATE_BY_CHANNELS = {
  stereo: '224',
  quad: '448',
  surround: '640',
} as const;

export function clampChannels(channels: number): number {
  return Math.min(channels, MAX_ENCODED_CHANNELS);
}

/**
 * Bitrate in kbps, as the string ffmpeg takes before the `k` suffix.
 * Unknown channel counts get the highest rate.
 */
export function selectBitrate(channels?: number): string {
  if (!isPositiveInteger(channels)) {
    return BITRATE_BY_CHANNELS.surround;
  }

  const clamped = clampChannels(channels);
  if (clamped <= 2) return BITRATE_BY_CHANNELS.stereo;
  if (clamped <= 4) return BITRATE_BY_CHANNELS.quad;
  return BITRATE_BY_CHANNELS.surround;
}

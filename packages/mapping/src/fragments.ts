/**
 * Argument fragments shared by the policies
 */

import { streamSelector, streamSpecifier, type CodecType } from '@streamplan/core';
import type { StreamFragment } from './types.js';

export const GENERIC_OPTIONS: readonly string[] = ['-hide_banner', '-loglevel', 'info'];

export const DEFAULT_MAIN_OPTIONS: readonly string[] = [];

export const DEFAULT_MAX_MUXING_QUEUE_SIZE = 4096;

export function defaultAdvancedOptions(maxMuxingQueueSize: number = DEFAULT_MAX_MUXING_QUEUE_SIZE): string[] {
  return ['-strict', '-2', '-max_muxing_queue_size', String(maxMuxingQueueSize)];
}

export function mapFragment(codecType: CodecType, position: number): string[] {
  return ['-map', streamSelector(codecType, position)];
}

/**
 * Map the stream and copy it untouched
 */
export function copyFragment(codecType: CodecType, position: number): StreamFragment {
  return {
    mapping: mapFragment(codecType, position),
    encoding: [`-c${streamSpecifier(codecType, position)}`, 'copy'],
  };
}

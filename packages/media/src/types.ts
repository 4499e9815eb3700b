/**
 * Media Types
 */

import type { CodecType } from '@streamplan/core';

export interface StreamTags {
  language?: string;
  title?: string;
  [key: string]: string | undefined;
}

/**
 * One stream of a probed file, normalised for classification
 */
export interface Stream {
  /** Position among streams of the same codec type (the `1` in `0:a:1`) */
  readonly index: number;
  /** Position in the probe document */
  readonly probeIndex: number;
  readonly codecType: CodecType;
  /** Lowercased; empty when the probe did not report one */
  readonly codecName: string;
  readonly channels?: number;
  readonly tags: Readonly<StreamTags>;
}

export type StreamInventory = readonly Stream[];

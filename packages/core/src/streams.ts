/**
 * Stream Vocabulary
 * 
 * Codec types and the single-letter specifiers ffmpeg uses in
 * per-type stream selectors (`0:a:1`, `-c:s:0`).
 */

export const CODEC_TYPES = ['video', 'audio', 'subtitle', 'data', 'attachment'] as const;

export type CodecType = (typeof CODEC_TYPES)[number];

export const TYPE_LETTERS: Readonly<Record<CodecType, string>> = {
  video: 'v',
  audio: 'a',
  subtitle: 's',
  data: 'd',
  attachment: 't',
};

export function isCodecType(value: string): value is CodecType {
  const codecTypes: readonly string[] = CODEC_TYPES;
  return codecTypes.includes(value);
}

/**
 * Stream selector for input 0, e.g. `0:a:2`
 */
export function streamSelector(codecType: CodecType, position: number): string {
  return `0:${TYPE_LETTERS[codecType]}:${position}`;
}

/**
 * Per-stream option suffix, e.g. `:a:2` for `-c:a:2`
 */
export function streamSpecifier(codecType: CodecType, position: number): string {
  return `:${TYPE_LETTERS[codecType]}:${position}`;
}

import { describe, it, expect, vi } from 'vitest';
import { CommandExecutionError, ProbeDocumentError } from '@streamplan/core';
import type { CommandResult } from '@streamplan/utils';
import { FFProbe, type CommandRunner } from './ffprobe.js';

function result(overrides: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...overrides };
}

describe('FFProbe', () => {
  it('runs ffprobe with JSON output and parses the document', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(
      result({ stdout: JSON.stringify({ streams: [{ index: 0, codec_type: 'audio', codec_name: 'aac' }] }) })
    );
    const probe = new FFProbe('/opt/ffprobe', run);

    const document = await probe.probe('/media/movie.mkv');

    expect(document.streams).toEqual([{ index: 0, codec_type: 'audio', codec_name: 'aac' }]);
    expect(run).toHaveBeenCalledWith(
      '/opt/ffprobe',
      ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', '-show_error', '/media/movie.mkv'],
      { timeout: 60000 }
    );
  });

  it('raises a command error on a non-zero exit', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(result({ exitCode: 1, stderr: 'No such file' }));

    await expect(new FFProbe('ffprobe', run).probe('/missing.mkv')).rejects.toBeInstanceOf(CommandExecutionError);
  });

  it('raises a probe document error on unparseable output', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(result({ stdout: 'garbage' }));

    await expect(new FFProbe('ffprobe', run).probe('/movie.mkv')).rejects.toBeInstanceOf(ProbeDocumentError);
  });

  it('raises a probe document error when the output has no stream list', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(result({ stdout: '{"error":{"code":-2}}' }));

    await expect(new FFProbe('ffprobe', run).probe('/movie.mkv')).rejects.toThrow(
      'Invalid probe document: ffprobe output has no "streams" array'
    );
  });
});

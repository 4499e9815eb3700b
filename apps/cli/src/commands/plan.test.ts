import { describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '@streamplan/utils';
import { loadConfig } from '../config/index.js';
import { runPlan } from './plan.js';

const config = loadConfig({ NODE_ENV: 'test' });
const logger = createSilentLogger();

const movieProbe = {
  streams: [
    { index: 0, codec_type: 'video', codec_name: 'h264' },
    { index: 1, codec_type: 'audio', codec_name: 'aac', channels: 2, tags: { language: 'eng' } },
    { index: 2, codec_type: 'audio', codec_name: 'aac', channels: 2, tags: { language: 'ger' } },
  ],
};

describe('runPlan', () => {
  it('prints the codec conversion command for the probed file', async () => {
    const probe = vi.fn(async () => movieProbe);

    const result = await runPlan('codec', '/media/Movie.mkv', {}, { config, logger, probe });

    expect(probe).toHaveBeenCalledWith('/media/Movie.mkv');
    expect(result.needsProcessing).toBe(true);
    expect(result.command).toEqual([
      'ffmpeg',
      '-hide_banner', '-loglevel', 'info',
      '-i', '/media/Movie.mkv',
      '-strict', '-2', '-max_muxing_queue_size', '2048',
      '-map', '0:v:0', '-map', '0:a:0', '-map', '0:a:1',
      '-c:v:0', 'copy',
      '-c:a:0', 'ac3', '-ac:a:0', '2', '-b:a:0', '224k',
      '-c:a:1', 'ac3', '-ac:a:1', '2', '-b:a:1', '224k',
      '-y', '/media/Movie.streamplan.mkv',
    ]);
  });

  it('uses the target codec as encoder unless one is given', async () => {
    const result = await runPlan(
      'codec',
      '/media/Movie.mkv',
      { targetCodec: 'eac3', output: '/out/Movie.mkv' },
      { config, logger, probe: async () => movieProbe }
    );

    expect(result.command.slice(result.command.indexOf('-c:a:0'), result.command.indexOf('-c:a:0') + 2)).toEqual([
      '-c:a:0',
      'eac3',
    ]);
    expect(result.command.slice(-2)).toEqual(['-y', '/out/Movie.mkv']);
  });

  it('reorders by the search language when lookups are not configured', async () => {
    const result = await runPlan(
      'reorder',
      '/media/Movie.mkv',
      { search: 'ger' },
      { config, logger, probe: async () => movieProbe }
    );

    expect(result.needsProcessing).toBe(true);
    expect(result.command.slice(10)).toEqual([
      '-c', 'copy', '-disposition:a', '-default',
      '-map', '0:v:0',
      '-map', '0:a:1', '-disposition:a:0', 'default',
      '-map', '0:a:0',
      '-y', '/media/Movie.streamplan.mkv',
    ]);
  });

  it('reports nothing to do for files without extractable subtitles', async () => {
    const result = await runPlan(
      'subtitles',
      '/nonexistent-streamplan-library/Movie.mkv',
      {},
      { config, logger, probe: async () => movieProbe }
    );

    expect(result).toEqual({
      plugin: 'subtitles',
      file: '/nonexistent-streamplan-library/Movie.mkv',
      needsProcessing: false,
      command: [],
    });
  });

  it('propagates probe failures', async () => {
    const probe = async (): Promise<unknown> => {
      throw new Error('ffprobe not found');
    };

    await expect(runPlan('codec', '/media/Movie.mkv', {}, { config, logger, probe })).rejects.toThrow(
      'ffprobe not found'
    );
  });
});

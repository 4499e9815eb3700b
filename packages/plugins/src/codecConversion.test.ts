import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '@streamplan/utils';
import { codecConversionPlugin } from './codecConversion.js';

const logger = createSilentLogger();

const dtsProbe = {
  streams: [
    { index: 0, codec_type: 'video', codec_name: 'h264' },
    { index: 1, codec_type: 'audio', codec_name: 'dts', channels: 6, tags: { language: 'eng' } },
  ],
};

const ac3Probe = {
  streams: [
    { index: 0, codec_type: 'video', codec_name: 'h264' },
    { index: 1, codec_type: 'audio', codec_name: 'ac3', channels: 6 },
  ],
};

describe('codecConversionPlugin', () => {
  describe('onLibraryFileTest', () => {
    it('queues files with audio outside the target codec', async () => {
      const result = await codecConversionPlugin.onLibraryFileTest(
        { path: '/library/Movie.mkv', probe: dtsProbe },
        { logger }
      );

      expect(result.addFileToPendingTasks).toBe(true);
    });

    it('leaves files already in the target codec alone', async () => {
      const data = { path: '/library/Movie.mkv', probe: ac3Probe };

      expect(await codecConversionPlugin.onLibraryFileTest(data, { logger })).toBe(data);
    });

    it('skips files without a usable probe document', async () => {
      const missing = { path: '/library/Movie.mkv' };
      const invalid = { path: '/library/Movie.mkv', probe: { format: {} } };

      expect(await codecConversionPlugin.onLibraryFileTest(missing, { logger })).toBe(missing);
      expect(await codecConversionPlugin.onLibraryFileTest(invalid, { logger })).toBe(invalid);
    });
  });

  describe('onWorkerProcess', () => {
    it('builds the ffmpeg command', async () => {
      const result = await codecConversionPlugin.onWorkerProcess(
        {
          fileIn: '/cache/in.mkv',
          fileOut: '/cache/out.mkv',
          probe: dtsProbe,
          execCommand: [],
          repeat: true,
        },
        { logger, ffmpegPath: '/usr/bin/ffmpeg' }
      );

      expect(result.repeat).toBe(false);
      expect(result.execCommand).toEqual([
        '/usr/bin/ffmpeg',
        '-hide_banner', '-loglevel', 'info',
        '-i', '/cache/in.mkv',
        '-strict', '-2', '-max_muxing_queue_size', '2048',
        '-map', '0:v:0', '-map', '0:a:0',
        '-c:v:0', 'copy', '-c:a:0', 'ac3', '-ac:a:0', '6', '-b:a:0', '640k',
        '-y', '/cache/out.mkv',
      ]);
    });

    it('honours the selected codec list', async () => {
      const result = await codecConversionPlugin.onWorkerProcess(
        {
          fileIn: '/cache/in.mkv',
          fileOut: '/cache/out.mkv',
          probe: dtsProbe,
          settings: { codecSelectionMode: 'selected', selectedCodecs: ['aac'] },
          execCommand: [],
          repeat: false,
        },
        { logger }
      );

      expect(result.execCommand).toEqual([]);
    });

    it('clears any queued command when there is nothing to do', async () => {
      const result = await codecConversionPlugin.onWorkerProcess(
        {
          fileIn: '/cache/in.mkv',
          fileOut: '/cache/out.mkv',
          probe: { streams: 'not a list' },
          execCommand: ['ffmpeg', '-version'],
          repeat: true,
        },
        { logger }
      );

      expect(result.execCommand).toEqual([]);
      expect(result.repeat).toBe(false);
    });
  });
});

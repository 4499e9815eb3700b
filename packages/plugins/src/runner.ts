/**
 * Helpers shared by the plugin runners
 */

import { ProbeDocumentError } from '@streamplan/core';
import { createStreamInventory, type StreamInventory } from '@streamplan/media';
import { createLogger, type Logger } from '@streamplan/utils';
import type { RunnerContext, WorkerProcessData } from './types.js';

export const DEFAULT_FFMPEG_PATH = 'ffmpeg';

export function runnerLogger(pluginId: string, context: RunnerContext): Logger {
  return (context.logger ?? createLogger()).child({ plugin: pluginId });
}

/**
 * Inventory for a probe document, or null when the file should be skipped
 */
export function inventoryFromProbe(probe: unknown, logger: Logger): StreamInventory | null {
  if (probe === undefined || probe === null) {
    logger.debug('No probe document available, skipping file');
    return null;
  }

  try {
    return createStreamInventory(probe);
  } catch (error) {
    if (error instanceof ProbeDocumentError) {
      logger.warn({ error: error.message, details: error.details }, 'Unusable probe document, skipping file');
      return null;
    }
    throw error;
  }
}

/**
 * Worker data with no command queued
 */
export function idleWorker<TSettings>(data: WorkerProcessData<TSettings>): WorkerProcessData<TSettings> {
  return { ...data, execCommand: [], repeat: false };
}

export function ffmpegCommand(args: readonly string[], context: RunnerContext): string[] {
  return [context.ffmpegPath ?? DEFAULT_FFMPEG_PATH, ...args];
}

/**
 * Codec Conversion Plugin
 * 
 * Re-encodes audio streams into the target codec (AC3 by default).
 */

import {
  CodecConversionPolicy,
  buildFfmpegArgs,
  buildMappingPlan,
  type CodecConversionSettings,
} from '@streamplan/mapping';
import { ffmpegCommand, idleWorker, inventoryFromProbe, runnerLogger } from './runner.js';
import type { LibraryFileTestData, RunnerContext, StreamPlugin, WorkerProcessData } from './types.js';

const PLUGIN_ID = 'codec-conversion';

async function onLibraryFileTest(
  data: LibraryFileTestData<CodecConversionSettings>,
  context: RunnerContext = {}
): Promise<LibraryFileTestData<CodecConversionSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  const inventory = inventoryFromProbe(data.probe, logger);
  if (!inventory) return data;

  const plan = buildMappingPlan(inventory, new CodecConversionPolicy(data.settings));
  if (!plan.needsProcessing) {
    logger.debug({ path: data.path }, 'File does not contain streams that require processing');
    return data;
  }

  logger.debug({ path: data.path }, 'File should be added to task list, found streams that require processing');
  return { ...data, addFileToPendingTasks: true };
}

async function onWorkerProcess(
  data: WorkerProcessData<CodecConversionSettings>,
  context: RunnerContext = {}
): Promise<WorkerProcessData<CodecConversionSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  const idle = idleWorker(data);

  const inventory = inventoryFromProbe(data.probe, logger);
  if (!inventory) return idle;

  const plan = buildMappingPlan(inventory, new CodecConversionPolicy(data.settings));
  if (!plan.needsProcessing) return idle;

  const args = buildFfmpegArgs(plan, { inputFile: data.fileIn, outputFile: data.fileOut });
  logger.debug({ args }, 'Built ffmpeg arguments');

  return { ...idle, execCommand: ffmpegCommand(args, context) };
}

export const codecConversionPlugin: StreamPlugin<CodecConversionSettings> = {
  id: PLUGIN_ID,
  description: 'Convert audio streams to a target codec',
  onLibraryFileTest,
  onWorkerProcess,
};

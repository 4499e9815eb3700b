/**
 * Subtitle Extraction Plugin
 * 
 * Extracts ASS/SSA subtitle streams into files next to the original and
 * records the extracted languages in the directory info sidecar, so the
 * file is not picked up again.
 */

import { basename, dirname } from 'node:path';
import type { StreamInventory } from '@streamplan/media';
import {
  SubtitleExtractionPolicy,
  buildExtractionArgs,
  buildFfmpegArgs,
  buildMappingPlan,
  parseLanguageFilter,
  parsePolicyConfig,
  subtitleExtractionConfigSchema,
  type SubtitleExtractionPlan,
  type SubtitleExtractionSettings,
} from '@streamplan/mapping';
import type { Logger } from '@streamplan/utils';
import { DirectoryInfo } from './directoryInfo.js';
import { ffmpegCommand, idleWorker, inventoryFromProbe, runnerLogger } from './runner.js';
import type {
  LibraryFileTestData,
  PostprocessorTaskResultsData,
  RunnerContext,
  StreamPlugin,
  WorkerProcessData,
} from './types.js';

const PLUGIN_ID = 'subtitle-extraction';

/** Directory info section holding extraction markers */
export const EXTRACTION_MARKER_SECTION = 'subtitle-extraction';

/** Marker for an extraction whose subtitle streams carry no matching language tag */
export const UNTAGGED_EXTRACTION_MARKER = 'und';

export async function readExtractionMarker(filePath: string, logger?: Logger): Promise<string | null> {
  const info = await DirectoryInfo.load(dirname(filePath), logger);
  return info.get(EXTRACTION_MARKER_SECTION, basename(filePath));
}

/**
 * Space-separated languages of the file's subtitle streams, limited to the
 * configured languages when any are set. Never empty, since an empty marker
 * reads as "not extracted".
 */
export function extractionMarker(inventory: StreamInventory, languagesToExtract: string): string {
  const filter = parseLanguageFilter(languagesToExtract);
  const languages: string[] = [];

  for (const stream of inventory) {
    if (stream.codecType !== 'subtitle') continue;
    const language = stream.tags.language;
    if (!language) continue;
    if (filter.length > 0 && !filter.includes(language.toLowerCase())) continue;
    languages.push(language);
  }

  return languages.length > 0 ? languages.join(' ') : UNTAGGED_EXTRACTION_MARKER;
}

async function planFor(
  inventory: StreamInventory,
  filePath: string,
  settings: SubtitleExtractionSettings | undefined,
  logger: Logger
): Promise<SubtitleExtractionPlan> {
  const priorMarker = await readExtractionMarker(filePath, logger);
  if (priorMarker) {
    logger.debug({ path: filePath, marker: priorMarker }, 'Subtitle streams were extracted by an earlier run');
  }
  return buildMappingPlan(inventory, new SubtitleExtractionPolicy(settings, { priorMarker }));
}

async function onLibraryFileTest(
  data: LibraryFileTestData<SubtitleExtractionSettings>,
  context: RunnerContext = {}
): Promise<LibraryFileTestData<SubtitleExtractionSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  const inventory = inventoryFromProbe(data.probe, logger);
  if (!inventory) return data;

  const plan = await planFor(inventory, data.path, data.settings, logger);
  if (!plan.needsProcessing) {
    logger.debug({ path: data.path }, 'File has no subtitle streams left to extract');
    return data;
  }

  logger.debug({ path: data.path }, 'File should be added to task list, subtitles have not been extracted');
  return { ...data, addFileToPendingTasks: true };
}

async function onWorkerProcess(
  data: WorkerProcessData<SubtitleExtractionSettings>,
  context: RunnerContext = {}
): Promise<WorkerProcessData<SubtitleExtractionSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  const idle = idleWorker(data);

  const inventory = inventoryFromProbe(data.probe, logger);
  if (!inventory) return idle;

  const originalFilePath = data.originalFilePath ?? data.fileIn;
  const plan = await planFor(inventory, originalFilePath, data.settings, logger);
  if (!plan.needsProcessing) return idle;

  const args = [
    ...buildFfmpegArgs(plan, { inputFile: data.fileIn }),
    ...buildExtractionArgs(plan, originalFilePath),
  ];
  logger.debug({ args, extracted: plan.sideProducts.length }, 'Built ffmpeg arguments');

  return { ...idle, execCommand: ffmpegCommand(args, context) };
}

async function onPostprocessorTaskResults(
  data: PostprocessorTaskResultsData<SubtitleExtractionSettings>,
  context: RunnerContext = {}
): Promise<PostprocessorTaskResultsData<SubtitleExtractionSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  if (!data.taskProcessingSuccess) return data;

  const config = parsePolicyConfig(subtitleExtractionConfigSchema, data.settings ?? {}, PLUGIN_ID);
  const inventory = inventoryFromProbe(data.probe, logger) ?? [];
  const marker = extractionMarker(inventory, config.languagesToExtract);

  for (const destinationFile of data.destinationFiles) {
    await DirectoryInfo.update(
      dirname(destinationFile),
      (info) => info.set(EXTRACTION_MARKER_SECTION, basename(destinationFile), marker),
      logger
    );
    logger.info({ file: destinationFile, marker }, 'Recorded subtitle extraction in directory info');
  }

  return data;
}

export const subtitleExtractionPlugin: StreamPlugin<SubtitleExtractionSettings> = {
  id: PLUGIN_ID,
  description: 'Extract ASS/SSA subtitle streams to files',
  onLibraryFileTest,
  onWorkerProcess,
  onPostprocessorTaskResults,
};

/**
 * Language Reorder Plugin
 * 
 * Moves the audio streams in the file's original language (from Radarr
 * or Sonarr when enabled, otherwise the configured search string) ahead
 * of the others.
 */

import {
  resolveSearchLanguage,
  RadarrLookupService,
  SonarrLookupService,
  type LanguageResolution,
  type LanguageSource,
} from '@streamplan/language';
import {
  LanguageReorderPolicy,
  buildFfmpegArgs,
  buildMappingPlan,
  languageReorderConfigSchema,
  parsePolicyConfig,
  type LanguageReorderPlan,
} from '@streamplan/mapping';
import type { StreamInventory } from '@streamplan/media';
import type { Logger } from '@streamplan/utils';
import { z } from 'zod';
import { ffmpegCommand, idleWorker, inventoryFromProbe, runnerLogger } from './runner.js';
import type { LibraryFileTestData, RunnerContext, StreamPlugin, WorkerProcessData } from './types.js';

const PLUGIN_ID = 'language-reorder';

export const languageReorderSettingsSchema = languageReorderConfigSchema.extend({
  useRadarr: z.boolean().default(false),
  radarrUrl: z.string().default('http://localhost:7878'),
  radarrApiKey: z.string().default(''),
  useSonarr: z.boolean().default(false),
  sonarrUrl: z.string().default('http://localhost:8989'),
  sonarrApiKey: z.string().default(''),
  lookupTimeoutMs: z.number().int().positive().default(10000),
});

export type LanguageReorderPluginSettings = z.input<typeof languageReorderSettingsSchema>;
export type LanguageReorderPluginConfig = z.output<typeof languageReorderSettingsSchema>;

function lookupSources(config: LanguageReorderPluginConfig, context: RunnerContext): LanguageSource[] {
  const radarr = context.lookupServices?.radarr ?? new RadarrLookupService({
    url: config.radarrUrl,
    apiKey: config.radarrApiKey,
    timeoutMs: config.lookupTimeoutMs,
  });
  const sonarr = context.lookupServices?.sonarr ?? new SonarrLookupService({
    url: config.sonarrUrl,
    apiKey: config.sonarrApiKey,
    timeoutMs: config.lookupTimeoutMs,
  });

  return [
    { enabled: config.useRadarr, service: radarr },
    { enabled: config.useSonarr, service: sonarr },
  ];
}

export function parseReorderSettings(settings: LanguageReorderPluginSettings = {}): LanguageReorderPluginConfig {
  return parsePolicyConfig(languageReorderSettingsSchema, settings, PLUGIN_ID);
}

export async function resolveReorderLanguage(
  filePath: string,
  config: LanguageReorderPluginConfig,
  context: RunnerContext,
  logger: Logger
): Promise<LanguageResolution> {
  const resolution = await resolveSearchLanguage({
    term: filePath,
    fallback: config.searchString,
    sources: lookupSources(config, context),
  });

  for (const attempt of resolution.attempts) {
    if (attempt.outcome === 'failed') {
      logger.warn({ source: attempt.source, error: attempt.error }, 'Original language lookup failed');
    }
  }
  logger.debug(
    { path: filePath, searchString: resolution.searchString, source: resolution.source, attempts: resolution.attempts },
    'Resolved search language'
  );
  return resolution;
}

async function planFor(
  inventory: StreamInventory,
  filePath: string,
  settings: LanguageReorderPluginSettings | undefined,
  context: RunnerContext,
  logger: Logger
): Promise<LanguageReorderPlan> {
  const config = parseReorderSettings(settings);
  const resolution = await resolveReorderLanguage(filePath, config, context, logger);
  const policy = new LanguageReorderPolicy({
    searchString: resolution.searchString,
    streamType: config.streamType,
  });
  return buildMappingPlan(inventory, policy);
}

async function onLibraryFileTest(
  data: LibraryFileTestData<LanguageReorderPluginSettings>,
  context: RunnerContext = {}
): Promise<LibraryFileTestData<LanguageReorderPluginSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  const inventory = inventoryFromProbe(data.probe, logger);
  if (!inventory) return data;

  const plan = await planFor(inventory, data.path, data.settings, context, logger);
  if (!plan.needsProcessing) {
    logger.debug({ path: data.path }, 'File does not contain streams that require reordering');
    return data;
  }

  logger.debug({ path: data.path }, 'File should be added to task list, found streams to reorder');
  return { ...data, addFileToPendingTasks: true };
}

async function onWorkerProcess(
  data: WorkerProcessData<LanguageReorderPluginSettings>,
  context: RunnerContext = {}
): Promise<WorkerProcessData<LanguageReorderPluginSettings>> {
  const logger = runnerLogger(PLUGIN_ID, context);
  const idle = idleWorker(data);

  const inventory = inventoryFromProbe(data.probe, logger);
  if (!inventory) return idle;

  const plan = await planFor(inventory, data.originalFilePath ?? data.fileIn, data.settings, context, logger);
  if (!plan.needsProcessing) return idle;

  const args = buildFfmpegArgs(plan, { inputFile: data.fileIn, outputFile: data.fileOut });
  logger.debug({ args }, 'Built ffmpeg arguments');

  return { ...idle, execCommand: ffmpegCommand(args, context) };
}

export const languageReorderPlugin: StreamPlugin<LanguageReorderPluginSettings> = {
  id: PLUGIN_ID,
  description: 'Move audio streams in the original language first',
  onLibraryFileTest,
  onWorkerProcess,
};

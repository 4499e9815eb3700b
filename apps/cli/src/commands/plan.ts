/**
 * Plan Command
 * 
 * Probes a file and prints the ffmpeg command a plugin would queue for it.
 * Nothing is executed.
 */

import ora from 'ora';
import chalk from 'chalk';
import { errorMessage } from '@streamplan/core';
import type { CodecConversionSettings, SubtitleExtractionSettings } from '@streamplan/mapping';
import { FFProbe } from '@streamplan/media';
import {
  codecConversionPlugin,
  languageReorderPlugin,
  subtitleExtractionPlugin,
  type LanguageReorderPluginSettings,
  type RunnerContext,
  type WorkerProcessData,
} from '@streamplan/plugins';
import { getExtension, siblingPath, type Logger } from '@streamplan/utils';
import type { CliConfig } from '../config/index.js';
import { formatCommand, printError, printHeader, printJson, printKeyValue, printSuccess } from '../lib/output.js';

export type PluginName = 'codec' | 'subtitles' | 'reorder';

export interface PlanOptions {
  targetCodec?: string;
  encoder?: string;
  languages?: string;
  search?: string;
  /** False with `--no-lookup` */
  lookup?: boolean;
  output?: string;
  json?: boolean;
}

export interface PlanDependencies {
  config: CliConfig;
  logger: Logger;
  /** ffprobe JSON for a file; defaults to running ffprobe */
  probe?: (file: string) => Promise<unknown>;
}

export interface PlanResult {
  plugin: PluginName;
  file: string;
  needsProcessing: boolean;
  command: string[];
}

function defaultOutputPath(file: string): string {
  return siblingPath(file, '.streamplan', getExtension(file) || 'mkv');
}

function codecSettings(options: PlanOptions): CodecConversionSettings {
  const encoder = options.encoder ?? options.targetCodec;
  return {
    ...(options.targetCodec ? { targetCodec: options.targetCodec } : {}),
    ...(encoder ? { encoder } : {}),
  };
}

function subtitleSettings(options: PlanOptions): SubtitleExtractionSettings {
  return options.languages !== undefined ? { languagesToExtract: options.languages } : {};
}

function reorderSettings(options: PlanOptions, config: CliConfig): LanguageReorderPluginSettings {
  const lookup = options.lookup ?? true;
  return {
    ...(options.search ? { searchString: options.search } : {}),
    useRadarr: lookup && Boolean(config.radarr.apiKey),
    radarrUrl: config.radarr.url,
    radarrApiKey: config.radarr.apiKey ?? '',
    useSonarr: lookup && Boolean(config.sonarr.apiKey),
    sonarrUrl: config.sonarr.url,
    sonarrApiKey: config.sonarr.apiKey ?? '',
    lookupTimeoutMs: config.lookupTimeoutMs,
  };
}

type BaseWorkerData = Omit<WorkerProcessData<unknown>, 'settings'>;

async function workerCommand(
  plugin: PluginName,
  base: BaseWorkerData,
  options: PlanOptions,
  config: CliConfig,
  context: RunnerContext
): Promise<string[]> {
  switch (plugin) {
    case 'codec': {
      const result = await codecConversionPlugin.onWorkerProcess({ ...base, settings: codecSettings(options) }, context);
      return result.execCommand;
    }
    case 'subtitles': {
      const result = await subtitleExtractionPlugin.onWorkerProcess({ ...base, settings: subtitleSettings(options) }, context);
      return result.execCommand;
    }
    case 'reorder': {
      const result = await languageReorderPlugin.onWorkerProcess(
        { ...base, settings: reorderSettings(options, config) },
        context
      );
      return result.execCommand;
    }
  }
}

/**
 * Run the plugin's worker stage against a probed file
 */
export async function runPlan(
  plugin: PluginName,
  file: string,
  options: PlanOptions,
  deps: PlanDependencies
): Promise<PlanResult> {
  const probe = deps.probe ?? ((path: string) => new FFProbe(deps.config.mediaTools.ffprobe).probe(path));
  const document = await probe(file);

  const base: BaseWorkerData = {
    fileIn: file,
    fileOut: options.output ?? defaultOutputPath(file),
    originalFilePath: file,
    probe: document,
    execCommand: [],
    repeat: false,
  };
  const context: RunnerContext = { logger: deps.logger, ffmpegPath: deps.config.mediaTools.ffmpeg };

  const command = await workerCommand(plugin, base, options, deps.config, context);
  return { plugin, file, needsProcessing: command.length > 0, command };
}

export async function planCommand(
  plugin: PluginName,
  file: string,
  options: PlanOptions,
  deps: PlanDependencies
): Promise<void> {
  const spinner = ora(`Probing ${file}...`).start();

  let result: PlanResult;
  try {
    result = await runPlan(plugin, file, options, deps);
    spinner.stop();
  } catch (error) {
    spinner.fail('Planning failed');
    printError(errorMessage(error));
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    printJson(result);
    return;
  }

  printHeader('Stream Plan');
  printKeyValue('File', result.file);
  printKeyValue('Plugin', result.plugin);
  console.log();

  if (!result.needsProcessing) {
    printSuccess('No processing needed');
    return;
  }

  console.log(chalk.bold('Command:'));
  console.log(`  ${formatCommand(result.command)}`);
}

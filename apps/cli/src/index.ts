#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Prints the ffmpeg command a stream plugin would queue for a file.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@streamplan/core';
import { createLogger } from '@streamplan/utils';
import { loadConfig, loadEnvFile, type CliConfig } from './config/index.js';
import { planCommand, type PlanOptions, type PluginName } from './commands/plan.js';
import { printError } from './lib/output.js';

interface GlobalOptions {
  json?: boolean;
  debug?: boolean;
}

loadEnvFile();

function readConfig(): CliConfig {
  try {
    return loadConfig();
  } catch (error) {
    printError(`Invalid environment configuration: ${errorMessage(error)}`);
    process.exit(1);
  }
}

const config = readConfig();

const program = new Command();

program
  .name('streamplan')
  .description('Plan ffmpeg stream mapping for media files')
  .version('0.1.0')
  .option('--json', 'Output in JSON format')
  .option('--debug', 'Enable debug output');

function action(plugin: PluginName) {
  return async (file: string, options: PlanOptions): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    const logger = createLogger(
      { app: 'cli' },
      { level: globals.debug ? 'debug' : config.logLevel, pretty: config.nodeEnv === 'development' }
    );
    await planCommand(plugin, file, { ...options, json: options.json ?? globals.json }, { config, logger });
  };
}

function outputOption(): Option {
  return new Option('-o, --output <file>', 'Output file (default: <name>.streamplan.<ext> next to the input)');
}

program
  .command('codec <file>')
  .description('Convert audio streams to a target codec')
  .option('-t, --target-codec <codec>', 'Target audio codec (default: ac3)')
  .option('-e, --encoder <encoder>', 'ffmpeg encoder (default: the target codec)')
  .addOption(outputOption())
  .action(action('codec'));

program
  .command('subtitles <file>')
  .description('Extract ASS/SSA subtitle streams to files')
  .option('-l, --languages <list>', 'Comma-separated languages to extract (default: all)')
  .action(action('subtitles'));

program
  .command('reorder <file>')
  .description('Move audio streams in the original language first')
  .option('-s, --search <code>', 'Language to move first when no lookup yields one (default: eng)')
  .option('--no-lookup', 'Skip Radarr and Sonarr lookups')
  .addOption(outputOption())
  .action(action('reorder'));

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('streamplan --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();

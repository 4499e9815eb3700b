/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Extracts stream metadata in JSON format.
 */

import { CommandExecutionError, ProbeDocumentError } from '@streamplan/core';
import { executeCommand, type CommandOptions, type CommandResult } from '@streamplan/utils';
import { probeDocumentSchema, type ProbeDocument } from '../probeDocument.js';

const PROBE_TIMEOUT_MS = 60000;

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export class FFProbe {
  private ffprobePath: string;
  private run: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', run: CommandRunner = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.run = run;
  }

  /**
   * Probe a media file and return its format and stream metadata
   */
  async probe(filePath: string): Promise<ProbeDocument> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_error',
      filePath,
    ];

    const result = await this.run(this.ffprobePath, args, { timeout: PROBE_TIMEOUT_MS });

    if (result.timedOut) {
      throw new CommandExecutionError(this.ffprobePath, result.exitCode, `timed out probing ${filePath}`);
    }
    if (result.exitCode !== 0) {
      throw new CommandExecutionError(this.ffprobePath, result.exitCode, result.stderr);
    }

    let output: unknown;
    try {
      output = JSON.parse(result.stdout);
    } catch {
      throw new ProbeDocumentError(`unparseable ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const document = probeDocumentSchema.safeParse(output);
    if (!document.success) {
      throw new ProbeDocumentError('ffprobe output has no "streams" array');
    }
    return document.data;
  }
}

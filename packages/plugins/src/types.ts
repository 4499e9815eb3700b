/**
 * Plugin Runner Types
 * 
 * Data objects exchanged with the host at each stage of a file's life:
 * library scan, worker processing and post-processing.
 */

import type { LanguageLookupService } from '@streamplan/language';
import type { Logger } from '@streamplan/utils';

export interface LibraryFileTestData<TSettings> {
  /** Absolute path of the file being tested */
  path: string;
  /** ffprobe JSON document for the file */
  probe?: unknown;
  settings?: TSettings;
  addFileToPendingTasks?: boolean;
}

export interface WorkerProcessData<TSettings> {
  /** Source file of this processing step */
  fileIn: string;
  /** Destination of this processing step */
  fileOut: string;
  /** Library path of the file, before any cache copies */
  originalFilePath?: string;
  probe?: unknown;
  settings?: TSettings;
  /** Command the host should run; empty when nothing is to be done */
  execCommand: string[];
  repeat: boolean;
}

export interface PostprocessorTaskResultsData<TSettings> {
  taskProcessingSuccess: boolean;
  /** Files the host wrote when moving the task's output into place */
  destinationFiles: string[];
  probe?: unknown;
  settings?: TSettings;
}

export interface LookupServices {
  radarr?: LanguageLookupService;
  sonarr?: LanguageLookupService;
}

export interface RunnerContext {
  logger?: Logger;
  /** ffmpeg binary placed at the head of `execCommand` */
  ffmpegPath?: string;
  /** Replaces the lookup services built from the reorder settings */
  lookupServices?: LookupServices;
}

export interface StreamPlugin<TSettings> {
  readonly id: string;
  readonly description: string;
  onLibraryFileTest(
    data: LibraryFileTestData<TSettings>,
    context?: RunnerContext
  ): Promise<LibraryFileTestData<TSettings>>;
  onWorkerProcess(
    data: WorkerProcessData<TSettings>,
    context?: RunnerContext
  ): Promise<WorkerProcessData<TSettings>>;
  onPostprocessorTaskResults?(
    data: PostprocessorTaskResultsData<TSettings>,
    context?: RunnerContext
  ): Promise<PostprocessorTaskResultsData<TSettings>>;
}

/**
 * Directory Info
 * 
 * Per-directory JSON sidecar (`.streamplan`) recording values against
 * file names, grouped in sections:
 * 
 *   { "subtitle-extraction": { "Movie.mkv": "eng jpn" } }
 * 
 * A missing, unreadable or corrupt sidecar loads as empty. Writes through
 * `update` are serialised per sidecar and re-read it first, so concurrent
 * runs in one directory keep each other's values.
 */

import { join } from 'node:path';
import { errorMessage } from '@streamplan/core';
import { safeReadFile, safeWriteFile, type Logger } from '@streamplan/utils';
import { z } from 'zod';

export const DIRECTORY_INFO_FILE = '.streamplan';

const sidecarSchema = z.record(z.record(z.string()));

type Sections = Map<string, Map<string, string>>;

const pendingUpdates = new Map<string, Promise<void>>();

export class DirectoryInfo {
  readonly filePath: string;
  private sections: Sections;

  private constructor(directory: string, sections: Sections) {
    this.filePath = join(directory, DIRECTORY_INFO_FILE);
    this.sections = sections;
  }

  static async load(directory: string, logger?: Logger): Promise<DirectoryInfo> {
    const filePath = join(directory, DIRECTORY_INFO_FILE);
    const sections: Sections = new Map();

    let content: string | null;
    try {
      content = await safeReadFile(filePath);
    } catch (error) {
      logger?.warn({ file: filePath, error: errorMessage(error) }, 'Cannot read directory info, treating as empty');
      return new DirectoryInfo(directory, sections);
    }
    if (content === null) {
      return new DirectoryInfo(directory, sections);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger?.warn({ file: filePath, error: errorMessage(error) }, 'Corrupt directory info, treating as empty');
      return new DirectoryInfo(directory, sections);
    }

    const result = sidecarSchema.safeParse(parsed);
    if (!result.success) {
      logger?.warn({ file: filePath }, 'Unexpected directory info layout, treating as empty');
      return new DirectoryInfo(directory, sections);
    }

    for (const [section, values] of Object.entries(result.data)) {
      sections.set(section, new Map(Object.entries(values)));
    }
    return new DirectoryInfo(directory, sections);
  }

  /**
   * Load the current sidecar, apply `change` and save it, after any update
   * already queued for the same directory
   */
  static async update(
    directory: string,
    change: (info: DirectoryInfo) => void,
    logger?: Logger
  ): Promise<void> {
    const filePath = join(directory, DIRECTORY_INFO_FILE);
    const apply = async (): Promise<void> => {
      const info = await DirectoryInfo.load(directory, logger);
      change(info);
      await info.save();
    };

    // A failed earlier update was already reported to its own caller
    const previous = pendingUpdates.get(filePath) ?? Promise.resolve();
    const current = previous.then(apply, apply);
    pendingUpdates.set(filePath, current);
    try {
      await current;
    } finally {
      if (pendingUpdates.get(filePath) === current) {
        pendingUpdates.delete(filePath);
      }
    }
  }

  get(section: string, fileName: string): string | null {
    return this.sections.get(section)?.get(fileName) ?? null;
  }

  set(section: string, fileName: string, value: string): void {
    let values = this.sections.get(section);
    if (!values) {
      values = new Map();
      this.sections.set(section, values);
    }
    values.set(fileName, value);
  }

  async save(): Promise<void> {
    const document: Record<string, Record<string, string>> = {};
    for (const [section, values] of this.sections) {
      document[section] = Object.fromEntries(values);
    }
    await safeWriteFile(this.filePath, `${JSON.stringify(document, null, 2)}\n`);
  }
}

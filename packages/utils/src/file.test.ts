import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { safeReadFile, safeWriteFile } from './file.js';

describe('file operations', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'streamplan-file-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('returns null for a missing file', async () => {
    expect(await safeReadFile(join(directory, 'missing.json'))).toBeNull();
  });

  it('creates parent directories and leaves no temporary file behind', async () => {
    const filePath = join(directory, 'nested', 'info.json');

    await safeWriteFile(filePath, '{"ok":true}');

    expect(await safeReadFile(filePath)).toBe('{"ok":true}');
    expect(await readdir(join(directory, 'nested'))).toEqual(['info.json']);
  });

  it('replaces existing content', async () => {
    const filePath = join(directory, 'info.json');

    await safeWriteFile(filePath, 'first');
    await safeWriteFile(filePath, 'second');

    expect(await safeReadFile(filePath)).toBe('second');
  });
});

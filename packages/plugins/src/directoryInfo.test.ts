import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DIRECTORY_INFO_FILE, DirectoryInfo } from './directoryInfo.js';

describe('DirectoryInfo', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'streamplan-info-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('loads as empty when no sidecar exists', async () => {
    const info = await DirectoryInfo.load(directory);

    expect(info.get('subtitle-extraction', 'Movie.mkv')).toBeNull();
  });

  it('loads a corrupt sidecar as empty', async () => {
    await writeFile(join(directory, DIRECTORY_INFO_FILE), '{"subtitle-extraction": ', 'utf8');

    const info = await DirectoryInfo.load(directory);

    expect(info.get('subtitle-extraction', 'Movie.mkv')).toBeNull();
  });

  it('loads a sidecar with an unexpected layout as empty', async () => {
    await writeFile(join(directory, DIRECTORY_INFO_FILE), '{"subtitle-extraction": ["Movie.mkv"]}', 'utf8');

    const info = await DirectoryInfo.load(directory);

    expect(info.get('subtitle-extraction', 'Movie.mkv')).toBeNull();
  });

  it('saves values and keeps other sections', async () => {
    await writeFile(
      join(directory, DIRECTORY_INFO_FILE),
      JSON.stringify({ other: { 'Show.mkv': 'done' } }),
      'utf8'
    );

    const info = await DirectoryInfo.load(directory);
    info.set('subtitle-extraction', 'Movie.mkv', 'eng jpn');
    await info.save();

    const saved: unknown = JSON.parse(await readFile(join(directory, DIRECTORY_INFO_FILE), 'utf8'));
    expect(saved).toEqual({
      other: { 'Show.mkv': 'done' },
      'subtitle-extraction': { 'Movie.mkv': 'eng jpn' },
    });

    const reloaded = await DirectoryInfo.load(directory);
    expect(reloaded.get('subtitle-extraction', 'Movie.mkv')).toBe('eng jpn');
    expect(reloaded.get('other', 'Show.mkv')).toBe('done');
  });

  it('applies concurrent updates one after another', async () => {
    await Promise.all(
      ['A.mkv', 'B.mkv', 'C.mkv'].map((fileName) =>
        DirectoryInfo.update(directory, (info) => info.set('subtitle-extraction', fileName, 'eng'))
      )
    );

    const info = await DirectoryInfo.load(directory);
    expect(info.get('subtitle-extraction', 'A.mkv')).toBe('eng');
    expect(info.get('subtitle-extraction', 'B.mkv')).toBe('eng');
    expect(info.get('subtitle-extraction', 'C.mkv')).toBe('eng');
  });

  it('keeps queueing updates after one fails', async () => {
    const failing = DirectoryInfo.update(directory, () => {
      throw new Error('update failed');
    });
    const following = DirectoryInfo.update(directory, (info) => info.set('subtitle-extraction', 'Movie.mkv', 'eng'));

    await expect(failing).rejects.toThrow('update failed');
    await following;

    const info = await DirectoryInfo.load(directory);
    expect(info.get('subtitle-extraction', 'Movie.mkv')).toBe('eng');
  });
});

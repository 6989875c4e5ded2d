import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { silentLogger } from '../src/logger.js';
import {
  applyTitlePolicy,
  cleanupPlayerScripts,
  formatDuration,
  formatFileSize,
  readRequestList,
  resolveOutputPath,
  sanitizeFileName,
  truncateTitle,
} from '../src/utils.js';
import { makeTempDir } from './helpers.js';

describe('sanitizeFileName', () => {
  it('replaces reserved characters and collapses whitespace', () => {
    expect(sanitizeFileName('AC/DC: Back in Black?')).toBe('AC DC Back in Black');
  });

  it('strips leading and trailing dots', () => {
    expect(sanitizeFileName('...hidden.')).toBe('hidden');
  });

  it('caps the length', () => {
    expect(sanitizeFileName('x'.repeat(150))).toHaveLength(100);
  });
});

describe('resolveOutputPath', () => {
  it('builds a sanitised path with the extension', () => {
    expect(resolveOutputPath('a/b', '/srv/out')).toBe(path.resolve('/srv/out', 'a b.mp3'));
    expect(resolveOutputPath('???', '/srv/out', 'm4a')).toBe(path.resolve('/srv/out', 'audio.m4a'));
  });
});

describe('applyTitlePolicy', () => {
  it('keeps titles verbatim by default', () => {
    expect(applyTitlePolicy('Test Artist - Song', 'Test Artist', 'verbatim')).toBe('Test Artist - Song');
  });

  it('strips a leading uploader name and one separator', () => {
    expect(applyTitlePolicy('Test Artist - Song', 'Test Artist', 'strip-uploader')).toBe('Song');
    expect(applyTitlePolicy('Test Artist | Live', 'Test Artist', 'strip-uploader')).toBe('Live');
    expect(applyTitlePolicy('Song by Test Artist', 'Test Artist', 'strip-uploader')).toBe('Song by Test Artist');
  });

  it('never returns an empty title', () => {
    expect(applyTitlePolicy('Test Artist', 'Test Artist', 'strip-uploader')).toBe('Test Artist');
  });
});

describe('formatting helpers', () => {
  it('formats durations', () => {
    expect(formatDuration(225)).toBe('3:45');
    expect(formatDuration(3725)).toBe('1:02:05');
    expect(formatDuration(0)).toBe('--:--');
  });

  it('formats file sizes', () => {
    expect(formatFileSize(0)).toBe('0 B');
    expect(formatFileSize(500)).toBe('500 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5 MB');
  });

  it('truncates long titles', () => {
    const truncated = truncateTitle('a'.repeat(50));
    expect(truncated).toBe(`${'a'.repeat(39)}...`);
    expect(truncateTitle('short')).toBe('short');
  });
});

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('reads request lists without blanks or comments', async () => {
    const listPath = path.join(dir, 'requests.txt');
    await fs.writeFile(listPath, 'song one\n\n# comment\n  https://youtu.be/abc  \r\n');

    expect(await readRequestList(listPath)).toEqual(['song one', 'https://youtu.be/abc']);
    expect(await readRequestList(path.join(dir, 'missing.txt'))).toEqual([]);
  });

  it('removes leftover player scripts only', async () => {
    await fs.writeFile(path.join(dir, '1700000000-player-script.js'), '');
    await fs.writeFile(path.join(dir, 'keep.js'), '');

    await cleanupPlayerScripts(silentLogger(), dir);

    expect(await fs.readdir(dir)).toEqual(['keep.js']);
  });
});

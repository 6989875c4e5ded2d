import path from 'node:path';
import process from 'node:process';
import { promises as dns } from 'node:dns';
import fs from 'fs-extra';
import type { TitlePolicy } from './config.js';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';

const MAX_FILE_NAME_LENGTH = 100;
const TITLE_SEPARATORS = ['-', '–', '|', ':', '•'];

/**
 * Sanitizes possible file names so they are safe to write to the filesystem.
 */
export const sanitizeFileName = (value: string): string =>
  value
    .replace(/[\\/:*?"<>|]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_FILE_NAME_LENGTH)
    .replace(/[.\s]+$/u, '')
    .replace(/^[.\s]+/u, '');

/**
 * Returns an absolute file path for a given base name.
 */
export const resolveOutputPath = (baseName: string, baseDir: string, extension = 'mp3'): string =>
  path.resolve(baseDir, `${sanitizeFileName(baseName) || 'audio'}.${extension}`);

/**
 * Reads request lines from a list file, skipping blanks and `#` comments.
 */
export const readRequestList = async (filePath: string): Promise<string[]> => {
  const exists = await fs.pathExists(filePath);
  if (!exists) {
    return [];
  }
  const raw = await fs.readFile(filePath, 'utf-8');
  return raw
    .split(/\r?\n/)
    .map((line: string) => line.trim())
    .filter((line: string) => line.length > 0 && !line.startsWith('#'));
};

/**
 * Removes a leading uploader name (and one separator after it) when the
 * policy asks for it. Titles are otherwise kept exactly as published.
 */
export const applyTitlePolicy = (title: string, uploader: string | undefined, policy: TitlePolicy): string => {
  if (policy === 'verbatim' || !uploader || !title.startsWith(uploader)) {
    return title;
  }
  let cleaned = title.slice(uploader.length).trim();
  const separator = TITLE_SEPARATORS.find((candidate) => cleaned.startsWith(candidate));
  if (separator) {
    cleaned = cleaned.slice(separator.length).trim();
  }
  return cleaned.length > 0 ? cleaned : title;
};

/**
 * Truncates long titles so progress bars and buttons stay readable.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

export const formatDuration = (totalSeconds: number): string => {
  if (!Number.isFinite(totalSeconds) || totalSeconds <= 0) {
    return '--:--';
  }
  const seconds = Math.floor(totalSeconds % 60);
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 3600);
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(seconds)}` : `${minutes}:${pad(seconds)}`;
};

export const formatFileSize = (sizeBytes: number): string => {
  if (sizeBytes <= 0) {
    return '0 B';
  }
  const units = ['B', 'KB', 'MB', 'GB'];
  const exponent = Math.min(units.length - 1, Math.floor(Math.log(sizeBytes) / Math.log(1024)));
  const scaled = Math.round((sizeBytes / 1024 ** exponent) * 100) / 100;
  return `${scaled} ${units[exponent]}`;
};

/**
 * Quickly probes DNS to help surface connectivity issues before requests run.
 */
export const verifyInternet = async (): Promise<void> => {
  await dns.lookup('youtube.com');
};

/**
 * Removes temporary player script files that ytdl-core may leave behind.
 */
export const cleanupPlayerScripts = async (logger: Logger, cwd: string = process.cwd()): Promise<void> => {
  try {
    const entries = await fs.readdir(cwd);
    const targets = entries.filter((name) => /player-script\.js$/u.test(name));
    await Promise.all(
      targets.map(async (name) => {
        const filePath = path.resolve(cwd, name);
        try {
          await fs.remove(filePath);
        } catch (error) {
          logger.warn({ filePath }, 'player script cleanup failed: %s', describeError(error));
        }
      }),
    );
  } catch (error) {
    logger.warn('player script scan failed: %s', describeError(error));
  }
};

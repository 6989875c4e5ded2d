import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';
import ytdl from '@distube/ytdl-core';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';
import type { YtDlpRunner } from './ytdlp.js';

export interface TransferRequest {
  readonly url: string;
  /** File to write inside the task's workspace. */
  readonly destination: string;
  /** Fraction of the transfer done, between 0 and 1. */
  readonly onProgress: (fraction: number) => void;
  readonly signal: AbortSignal;
}

/**
 * Pulls the best audio-only stream of a video into a local file.
 */
export interface MediaFetcher {
  fetch(request: TransferRequest): Promise<string>;
}

export interface FetcherOptions {
  readonly runner: YtDlpRunner;
  readonly cookiesFile?: string;
  readonly logger: Logger;
}

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.youtube.com/',
  Origin: 'https://www.youtube.com',
};

/**
 * Streams the highest quality audio-only format via ytdl-core.
 */
const fetchWithCore = async ({ url, destination, onProgress, signal }: TransferRequest): Promise<string> => {
  const stream = ytdl(url, {
    quality: 'highestaudio',
    filter: 'audioonly',
    highWaterMark: 1 << 25,
    dlChunkSize: 1 << 20,
    requestOptions: { headers: REQUEST_HEADERS },
  });

  stream.on('progress', (_chunkLength: number, downloaded: number, total: number) => {
    onProgress(total > 0 ? downloaded / total : 0);
  });

  await pipeline(stream, fs.createWriteStream(destination), { signal });
  return destination;
};

/**
 * Runs yt-dlp when ytdl-core cannot decode signatures or is refused.
 */
const fetchWithYtDlp = async (
  { url, destination, onProgress, signal }: TransferRequest,
  runner: YtDlpRunner,
  cookiesFile?: string,
): Promise<string> => {
  const args = [
    url,
    '-f',
    'bestaudio/best',
    '-o',
    destination,
    '--no-playlist',
    '--no-part',
    '--force-overwrites',
    '--newline',
    '--no-warnings',
    '--ignore-config',
  ];
  if (cookiesFile) {
    args.push('--cookies', cookiesFile);
  }

  await runner.download(args, onProgress, signal);
  return destination;
};

/**
 * True when a ytdl-core failure looks like a player or signature break that yt-dlp can get past.
 */
export const shouldFallback = (error: unknown): boolean => {
  const message = describeError(error);
  return (
    /Status code: 403/i.test(message) ||
    /Could not parse/i.test(message) ||
    /decipher/i.test(message) ||
    /Sign in to confirm/i.test(message) ||
    /No playable formats/i.test(message)
  );
};

export const createMediaFetcher = ({ runner, cookiesFile, logger }: FetcherOptions): MediaFetcher => ({
  async fetch(request) {
    try {
      return await fetchWithCore(request);
    } catch (error) {
      if (request.signal.aborted || !shouldFallback(error)) {
        throw error;
      }
      logger.info({ url: request.url }, 'ytdl-core refused, falling back to yt-dlp: %s', describeError(error));
      await fs.remove(request.destination);
      return fetchWithYtDlp(request, runner, cookiesFile);
    }
  },
});

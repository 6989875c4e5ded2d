import path from 'node:path';
import process from 'node:process';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_STRATEGIES = ['ytdl-core', 'yt-dlp:web', 'yt-dlp:mweb', 'yt-dlp:android', 'yt-dlp:ios'] as const;

export const STRATEGY_NAME = /^(ytdl-core|yt-dlp(:[a-z_]+)?)$/u;

export type TitlePolicy = 'verbatim' | 'strip-uploader';
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface AudioProfile {
  readonly bitrateKbps: number;
  readonly format: 'mp3';
}

export interface AppConfig {
  readonly workspaceRoot: string;
  readonly downloadsDir: string;
  readonly journalDir: string;
  readonly maxArtifactBytes: number;
  readonly audio: AudioProfile;
  readonly search: {
    readonly pageSize: number;
    readonly maxPages: number;
    readonly sessionTtlMs: number;
  };
  readonly strategies: readonly string[];
  readonly timeouts: {
    readonly strategyMs: number;
    readonly transferMs: number;
    readonly transcodeMs: number;
  };
  readonly progress: {
    readonly minIntervalMs: number;
    readonly minStep: number;
  };
  readonly rateLimitMs: number;
  /** 0 leaves acquisitions unbounded. */
  readonly maxActiveAcquisitions: number;
  readonly batchConcurrency: number;
  readonly titlePolicy: TitlePolicy;
  readonly cookiesFile?: string;
  readonly ytDlpPath: string;
  readonly ffmpegPath?: string;
  readonly logLevel: LogLevel;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const integer = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  TEMP_DIR: text('temp_downloads'),
  DOWNLOADS_DIR: text('downloads'),
  JOURNAL_DIR: text('.'),
  MAX_FILE_SIZE_MB: integer(45, 1),
  AUDIO_BITRATE: integer(192, 32),
  SEARCH_PAGE_SIZE: integer(8, 1),
  SEARCH_MAX_PAGES: integer(3, 1),
  SESSION_TTL_SECONDS: integer(1800, 1),
  EXTRACTION_STRATEGIES: text(DEFAULT_STRATEGIES.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    )
    .pipe(z.array(z.string().regex(STRATEGY_NAME, 'unknown extraction strategy')).min(1)),
  STRATEGY_TIMEOUT_SECONDS: integer(20, 1),
  DOWNLOAD_TIMEOUT_SECONDS: integer(120, 1),
  TRANSCODE_TIMEOUT_SECONDS: integer(90, 1),
  PROGRESS_INTERVAL_MS: integer(1500),
  PROGRESS_MIN_STEP: integer(5, 1),
  RATE_LIMIT_SECONDS: integer(0),
  MAX_ACTIVE_ACQUISITIONS: integer(0),
  DOWNLOAD_CONCURRENCY: integer(3, 1),
  TITLE_POLICY: z.preprocess(blankToUndefined, z.enum(['verbatim', 'strip-uploader']).default('verbatim')),
  COOKIES_FILE: optionalText,
  YTDLP_PATH: text('yt-dlp'),
  FFMPEG_PATH: optionalText,
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  ),
});

/**
 * Reads the runtime configuration from environment variables. Relative paths
 * are resolved against `cwd`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;

  return {
    workspaceRoot: path.resolve(cwd, values.TEMP_DIR),
    downloadsDir: path.resolve(cwd, values.DOWNLOADS_DIR),
    journalDir: path.resolve(cwd, values.JOURNAL_DIR),
    maxArtifactBytes: values.MAX_FILE_SIZE_MB * 1024 * 1024,
    audio: { bitrateKbps: values.AUDIO_BITRATE, format: 'mp3' },
    search: {
      pageSize: values.SEARCH_PAGE_SIZE,
      maxPages: values.SEARCH_MAX_PAGES,
      sessionTtlMs: values.SESSION_TTL_SECONDS * 1000,
    },
    strategies: values.EXTRACTION_STRATEGIES,
    timeouts: {
      strategyMs: values.STRATEGY_TIMEOUT_SECONDS * 1000,
      transferMs: values.DOWNLOAD_TIMEOUT_SECONDS * 1000,
      transcodeMs: values.TRANSCODE_TIMEOUT_SECONDS * 1000,
    },
    progress: {
      minIntervalMs: values.PROGRESS_INTERVAL_MS,
      minStep: values.PROGRESS_MIN_STEP,
    },
    rateLimitMs: values.RATE_LIMIT_SECONDS * 1000,
    maxActiveAcquisitions: values.MAX_ACTIVE_ACQUISITIONS,
    batchConcurrency: values.DOWNLOAD_CONCURRENCY,
    titlePolicy: values.TITLE_POLICY,
    cookiesFile: values.COOKIES_FILE ? path.resolve(cwd, values.COOKIES_FILE) : undefined,
    ytDlpPath: values.YTDLP_PATH,
    ffmpegPath: values.FFMPEG_PATH,
    logLevel: values.LOG_LEVEL,
  };
};

export const maxSearchResults = (config: Pick<AppConfig, 'search'>): number =>
  config.search.pageSize * config.search.maxPages;

import ytdl from '@distube/ytdl-core';
import { z } from 'zod';
import { canonicalVideoUrl } from './locator.js';
import { searchVideos } from './search.js';
import type { CandidateItem, MediaLocator } from './types.js';
import type { YtDlpRunner } from './ytdlp.js';

export interface StrategyContext {
  readonly limit: number;
  readonly signal: AbortSignal;
}

/**
 * One way of asking the platform about a locator. Strategies are tried in a
 * fixed order by the resolver and never share state with each other.
 */
export interface ExtractionStrategy {
  readonly name: string;
  resolve(locator: MediaLocator, context: StrategyContext): Promise<CandidateItem[]>;
}

export interface StrategyDependencies {
  readonly runner: YtDlpRunner;
  readonly cookiesFile?: string;
}

export class MalformedResponseError extends Error {
  constructor(strategy: string, detail: string) {
    super(`Malformed response from ${strategy}: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

const fallbackThumbnail = (videoId: string): string => `https://i.ytimg.com/vi/${videoId}/hqdefault.jpg`;

interface SizedImage {
  readonly url: string;
  readonly width?: number | null;
}

const largestImage = (images: readonly SizedImage[] | null | undefined): string | undefined =>
  images && images.length > 0
    ? images.reduce((best, image) => ((image.width ?? 0) > (best.width ?? 0) ? image : best)).url
    : undefined;

/**
 * In-process strategy: ytdl-core for links, yt-search for phrases.
 */
export const createCoreStrategy = (): ExtractionStrategy => ({
  name: 'ytdl-core',
  async resolve(locator, { limit }) {
    if (locator.kind === 'search') {
      return searchVideos(locator.query, limit);
    }
    const info = await ytdl.getBasicInfo(locator.url);
    const details = info.videoDetails;
    const duration = Number.parseInt(details.lengthSeconds, 10);
    return [
      {
        id: details.videoId,
        title: details.title,
        uploader: details.author?.name,
        durationSeconds: Number.isNaN(duration) ? 0 : duration,
        thumbnailUrl: largestImage(details.thumbnails) ?? fallbackThumbnail(details.videoId),
        sourceUrl: locator.url,
      },
    ];
  },
});

const ProbeEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
  thumbnails: z.array(z.object({ url: z.string(), width: z.number().nullish() })).nullish(),
});

type ProbeEntry = z.infer<typeof ProbeEntrySchema>;

/**
 * Builds the yt-dlp arguments for a metadata-only probe with the given client
 * persona (`web`, `android`, ...). Phrases become `ytsearchN:` queries.
 */
export const buildProbeArgs = (
  locator: MediaLocator,
  limit: number,
  client?: string,
  cookiesFile?: string,
): string[] => {
  const args =
    locator.kind === 'search'
      ? [`ytsearch${limit}:${locator.query}`, '--flat-playlist']
      : [locator.url, '--no-playlist'];

  args.push('--dump-json', '--no-warnings', '--ignore-config');
  if (client) {
    args.push('--extractor-args', `youtube:player_client=${client}`);
  }
  if (cookiesFile) {
    args.push('--cookies', cookiesFile);
  }
  return args;
};

const toCandidate = (entry: ProbeEntry): CandidateItem => ({
  id: entry.id,
  title: entry.title ?? '',
  uploader: entry.uploader ?? entry.channel ?? undefined,
  durationSeconds: Math.round(entry.duration ?? 0),
  thumbnailUrl: entry.thumbnail ?? largestImage(entry.thumbnails) ?? fallbackThumbnail(entry.id),
  sourceUrl: canonicalVideoUrl(entry.id),
});

/**
 * Parses yt-dlp `--dump-json` output: one JSON document per line.
 */
export const parseProbeOutput = (strategy: string, stdout: string): CandidateItem[] =>
  stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, index) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        throw new MalformedResponseError(strategy, `line ${index + 1} is not JSON`);
      }
      const parsed = ProbeEntrySchema.safeParse(raw);
      if (!parsed.success) {
        throw new MalformedResponseError(strategy, parsed.error.issues[0]?.message ?? 'unexpected shape');
      }
      return toCandidate(parsed.data);
    });

/**
 * yt-dlp strategy pinned to one client persona.
 */
export const createYtDlpStrategy = (
  runner: YtDlpRunner,
  client: string | undefined,
  cookiesFile?: string,
): ExtractionStrategy => {
  const name = client ? `yt-dlp:${client}` : 'yt-dlp';
  return {
    name,
    async resolve(locator, { limit, signal }) {
      const stdout = await runner.capture(buildProbeArgs(locator, limit, client, cookiesFile), signal);
      return parseProbeOutput(name, stdout);
    },
  };
};

/**
 * Turns configured strategy names into strategies, preserving their order.
 */
export const buildStrategies = (names: readonly string[], deps: StrategyDependencies): ExtractionStrategy[] =>
  names.map((name) => {
    if (name === 'ytdl-core') {
      return createCoreStrategy();
    }
    const [, client] = name.split(':');
    return createYtDlpStrategy(deps.runner, client, deps.cookiesFile);
  });

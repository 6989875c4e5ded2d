import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_STRATEGIES, loadConfig, maxSearchResults } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const cwd = path.resolve('/srv/relay');

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({}, cwd);

    expect(config).toMatchObject({
      workspaceRoot: path.join(cwd, 'temp_downloads'),
      downloadsDir: path.join(cwd, 'downloads'),
      journalDir: cwd,
      maxArtifactBytes: 45 * 1024 * 1024,
      audio: { bitrateKbps: 192, format: 'mp3' },
      search: { pageSize: 8, maxPages: 3, sessionTtlMs: 1_800_000 },
      strategies: [...DEFAULT_STRATEGIES],
      timeouts: { strategyMs: 20_000, transferMs: 120_000, transcodeMs: 90_000 },
      progress: { minIntervalMs: 1_500, minStep: 5 },
      rateLimitMs: 0,
      maxActiveAcquisitions: 0,
      batchConcurrency: 3,
      titlePolicy: 'verbatim',
      ytDlpPath: 'yt-dlp',
      logLevel: 'info',
    });
    expect(config.cookiesFile).toBeUndefined();
    expect(config.ffmpegPath).toBeUndefined();
    expect(maxSearchResults(config)).toBe(24);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ AUDIO_BITRATE: '', COOKIES_FILE: '  ' }, cwd);

    expect(config.audio.bitrateKbps).toBe(192);
    expect(config.cookiesFile).toBeUndefined();
  });

  it('reads overrides', () => {
    const config = loadConfig(
      {
        EXTRACTION_STRATEGIES: 'yt-dlp:ios, ytdl-core',
        RATE_LIMIT_SECONDS: '2',
        COOKIES_FILE: 'cookies.txt',
        TITLE_POLICY: 'strip-uploader',
        MAX_FILE_SIZE_MB: '10',
        LOG_LEVEL: 'debug',
      },
      cwd,
    );

    expect(config.strategies).toEqual(['yt-dlp:ios', 'ytdl-core']);
    expect(config.rateLimitMs).toBe(2_000);
    expect(config.cookiesFile).toBe(path.join(cwd, 'cookies.txt'));
    expect(config.titlePolicy).toBe('strip-uploader');
    expect(config.maxArtifactBytes).toBe(10 * 1024 * 1024);
    expect(config.logLevel).toBe('debug');
  });

  it.each([
    { EXTRACTION_STRATEGIES: 'curl' },
    { MAX_FILE_SIZE_MB: 'abc' },
    { SEARCH_PAGE_SIZE: '0' },
    { TITLE_POLICY: 'loud' },
  ])('rejects %o', (env) => {
    expect(() => loadConfig(env, cwd)).toThrow(ConfigError);
  });
});

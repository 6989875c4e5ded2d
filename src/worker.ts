import fs from 'fs-extra';
import type { Codec } from './codec.js';
import type { AudioProfile, TitlePolicy } from './config.js';
import type { MediaFetcher } from './download.js';
import {
  FilesystemError,
  OversizeArtifactError,
  SourceUnavailableError,
  TranscodeError,
  TranscodeTimeoutError,
  TransferError,
  TransferTimeoutError,
  describeError,
  inStage,
} from './errors.js';
import type { Logger } from './logger.js';
import { MAX_REPORTED_PERCENT } from './progress.js';
import type { CandidateSource } from './resolver.js';
import { detectImageType, type ThumbnailFetcher } from './thumbnail.js';
import { withTimeout } from './timeout.js';
import type { AcquisitionTarget, AudioArtifact, CandidateItem, ProgressSink } from './types.js';
import { applyTitlePolicy, sanitizeFileName } from './utils.js';
import type { Workspace } from './workspace.js';

export interface WorkerOptions {
  readonly audio: AudioProfile;
  readonly maxArtifactBytes: number;
  readonly transferTimeoutMs: number;
  readonly transcodeTimeoutMs: number;
  readonly titlePolicy: TitlePolicy;
}

export interface WorkerDependencies {
  readonly source: CandidateSource;
  readonly fetcher: MediaFetcher;
  readonly codec: Codec;
  readonly fetchThumbnail: ThumbnailFetcher;
  readonly logger: Logger;
}

export interface AcquireRequest {
  readonly target: AcquisitionTarget;
  readonly workspace: Workspace;
  readonly onProgress: ProgressSink;
  readonly signal?: AbortSignal;
}

export interface AcquisitionWorker {
  acquire(request: AcquireRequest): Promise<AudioArtifact>;
}

/**
 * Fetches, transcodes and tags one media item inside a workspace it does not
 * own. Every step can fail on its own; nothing is retried.
 */
export const createAcquisitionWorker = (options: WorkerOptions, deps: WorkerDependencies): AcquisitionWorker => {
  const probe = async (target: AcquisitionTarget, signal?: AbortSignal): Promise<CandidateItem> => {
    if (target.kind === 'candidate') {
      return target.item;
    }
    const [item] = await deps.source.resolve(target.locator, signal);
    if (!item) {
      throw new SourceUnavailableError();
    }
    return item;
  };

  /**
   * Rejects items whose duration alone guarantees an oversize artifact, before
   * any bytes are transferred.
   */
  const assertEstimatedSize = (item: CandidateItem): void => {
    const estimated = Math.round((item.durationSeconds * options.audio.bitrateKbps * 1000) / 8);
    if (estimated > options.maxArtifactBytes) {
      throw new OversizeArtifactError(estimated, options.maxArtifactBytes);
    }
  };

  /**
   * Downloads the thumbnail and makes sure it is a JPEG the MP3 container can
   * carry. Cover art is optional: failures and timeouts are logged and the
   * artifact ships without it. Fetch and conversion share one transcode-sized
   * time limit.
   */
  const prepareCover = async (
    item: CandidateItem,
    workspace: Workspace,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<string | undefined> => {
    const { thumbnailUrl } = item;
    if (!thumbnailUrl) {
      return undefined;
    }
    const timeoutMs = options.transcodeTimeoutMs;
    try {
      return await withTimeout(
        timeoutMs,
        async (stageSignal) => {
          const raw = await deps.fetchThumbnail(thumbnailUrl, workspace.file('thumbnail'), stageSignal);
          const type = await detectImageType(raw);
          const cover = workspace.file('cover.jpg');
          if (type === 'jpg') {
            await fs.move(raw, cover, { overwrite: true });
            return cover;
          }
          // ffmpeg picks the image demuxer from the extension
          const source = workspace.file(`thumbnail.${type === 'unknown' ? 'img' : type}`);
          await fs.move(raw, source, { overwrite: true });
          await deps.codec.convertImage(source, cover, stageSignal);
          return cover;
        },
        () => new Error(`Cover art timed out after ${timeoutMs} ms`),
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      log.warn({ thumbnailUrl }, 'cover art skipped: %s', describeError(error));
      return undefined;
    }
  };

  const measure = async (filePath: string): Promise<number> => {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error) {
      throw new FilesystemError(`Could not stat ${filePath}: ${describeError(error)}`, error);
    }
  };

  const acquire = async ({ target, workspace, onProgress, signal }: AcquireRequest): Promise<AudioArtifact> => {
    const item = await probe(target, signal);
    const log = deps.logger.child({ videoId: item.id });
    assertEstimatedSize(item);

    const source = await inStage(
      () =>
        withTimeout(
          options.transferTimeoutMs,
          (stageSignal) =>
            deps.fetcher.fetch({
              url: item.sourceUrl,
              destination: workspace.file('source.media'),
              onProgress: (fraction) => onProgress(Math.min(MAX_REPORTED_PERCENT, fraction * 100)),
              signal: stageSignal,
            }),
          () => new TransferTimeoutError(options.transferTimeoutMs),
          signal,
        ),
      (cause) => new TransferError(cause),
    );
    log.debug('transfer finished');

    // sanitised titles never start with a dot, so the final name cannot collide
    const encoded = workspace.file(`.encoded.${options.audio.format}`);
    await inStage(
      () =>
        withTimeout(
          options.transcodeTimeoutMs,
          (stageSignal) => deps.codec.transcode(source, encoded, options.audio, stageSignal),
          () => new TranscodeTimeoutError(options.transcodeTimeoutMs),
          signal,
        ),
      (cause) => new TranscodeError(cause),
    );

    const title = applyTitlePolicy(item.title, item.uploader, options.titlePolicy);
    const cover = await prepareCover(item, workspace, log, signal);
    const output = workspace.file(`${sanitizeFileName(title) || item.id}.${options.audio.format}`);
    await inStage(
      () =>
        withTimeout(
          options.transcodeTimeoutMs,
          (stageSignal) => deps.codec.embed(encoded, cover, { title, artist: item.uploader }, output, stageSignal),
          () => new TranscodeTimeoutError(options.transcodeTimeoutMs),
          signal,
        ),
      (cause) => new TranscodeError(cause),
    );

    const sizeBytes = await measure(output);
    if (sizeBytes > options.maxArtifactBytes) {
      throw new OversizeArtifactError(sizeBytes, options.maxArtifactBytes);
    }

    return {
      filePath: output,
      sizeBytes,
      title,
      performer: item.uploader,
      durationSeconds: item.durationSeconds,
      thumbnailPath: cover,
    };
  };

  return { acquire };
};

import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import type { Codec } from '../src/codec.js';
import type { MediaFetcher, TransferRequest } from '../src/download.js';
import type { Journal } from '../src/journal.js';
import type { CandidateSource } from '../src/resolver.js';
import type {
  AudioDelivery,
  CandidateItem,
  ErrorNotice,
  MediaLocator,
  Messenger,
  ProgressUpdate,
  SessionPage,
} from '../src/types.js';
import type { Workspace } from '../src/workspace.js';

export const makeTempDir = (prefix = 'audio-relay-test-'): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const workspaceAt = (dir: string): Workspace => ({
  dir,
  file: (name) => path.join(dir, name),
});

export const candidate = (id: string, overrides: Partial<CandidateItem> = {}): CandidateItem => ({
  id,
  title: `Song ${id}`,
  uploader: 'Test Artist',
  durationSeconds: 60,
  sourceUrl: `https://www.youtube.com/watch?v=${id}`,
  ...overrides,
});

export const createDeferred = (): { promise: Promise<void>; release: () => void } => {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
};

/**
 * Resolves URL locators to a candidate named after the video id and search
 * phrases to a fixed list.
 */
export class StubSource implements CandidateSource {
  readonly calls: MediaLocator[] = [];

  constructor(private readonly searchResults: CandidateItem[] = []) {}

  async resolve(locator: MediaLocator): Promise<CandidateItem[]> {
    this.calls.push(locator);
    return locator.kind === 'url' ? [candidate(locator.videoId)] : this.searchResults;
  }
}

export interface FakeFetcherOptions {
  readonly fractions?: number[];
  readonly fail?: (request: TransferRequest) => Error | undefined;
}

/** Writes `media:<url>` to the destination after replaying progress fractions. */
export const fakeFetcher = ({ fractions = [], fail }: FakeFetcherOptions = {}): MediaFetcher => ({
  async fetch(request) {
    for (const fraction of fractions) {
      request.onProgress(fraction);
    }
    const error = fail?.(request);
    if (error) {
      throw error;
    }
    await fs.writeFile(request.destination, `media:${request.url}`);
    return request.destination;
  },
});

export interface FakeCodecOptions {
  /** Transcoding fails for sources whose content contains this marker. */
  readonly failTranscodeFor?: string;
}

/**
 * File-backed stand-in for ffmpeg: every step writes a readable trace of its
 * inputs so tests can assert on artifact contents.
 */
export const fakeCodec = ({ failTranscodeFor }: FakeCodecOptions = {}): Codec => ({
  async transcode(input, output) {
    const content = await fs.readFile(input, 'utf-8');
    if (failTranscodeFor && content.includes(failTranscodeFor)) {
      throw new Error('ffmpeg exited with code 1');
    }
    await fs.writeFile(output, `mp3:${content}`);
  },
  async convertImage(input, output) {
    await fs.copy(input, output);
  },
  async embed(audio, cover, tags, output) {
    const content = await fs.readFile(audio, 'utf-8');
    await fs.writeFile(output, `${content}|title=${tags.title}|cover=${cover ? 'yes' : 'no'}`);
  },
});

export interface RecordedAudio {
  readonly ownerId: string;
  readonly delivery: AudioDelivery;
  readonly fileExisted: boolean;
}

/** Records every outbound message plus a single ordered event log. */
export class RecordingMessenger implements Messenger {
  readonly progress: Array<{ ownerId: string; update: ProgressUpdate }> = [];
  readonly pages: Array<{ ownerId: string; page: SessionPage }> = [];
  readonly audio: RecordedAudio[] = [];
  readonly errors: Array<{ ownerId: string; notice: ErrorNotice }> = [];
  readonly events: string[] = [];
  failAudio = false;

  async sendProgress(ownerId: string, update: ProgressUpdate): Promise<void> {
    this.progress.push({ ownerId, update });
    this.events.push(`progress:${update.requestId}:${update.percent}`);
  }

  async sendSearchResults(ownerId: string, page: SessionPage): Promise<void> {
    this.pages.push({ ownerId, page });
    this.events.push(`page:${ownerId}:${page.page}`);
  }

  async sendAudio(ownerId: string, delivery: AudioDelivery): Promise<void> {
    if (this.failAudio) {
      throw new Error('upload rejected');
    }
    const fileExisted = await fs.pathExists(delivery.artifact.filePath);
    this.audio.push({ ownerId, delivery, fileExisted });
    this.events.push(`audio:${delivery.requestId}`);
  }

  async sendError(ownerId: string, notice: ErrorNotice): Promise<void> {
    this.errors.push({ ownerId, notice });
    this.events.push(`error:${notice.requestId ?? ownerId}`);
  }
}

export class RecordingJournal implements Journal {
  readonly deliveredEntries: Array<{ ownerId: string; title: string; sizeBytes: number }> = [];
  readonly failedEntries: Array<{ ownerId: string; subject: string; reason: string }> = [];

  async delivered(ownerId: string, title: string, sizeBytes: number): Promise<void> {
    this.deliveredEntries.push({ ownerId, title, sizeBytes });
  }

  async failed(ownerId: string, subject: string, reason: string): Promise<void> {
    this.failedEntries.push({ ownerId, subject, reason });
  }
}

import path from 'node:path';
import cliProgress from 'cli-progress';
import fs from 'fs-extra';
import type { Messenger, SessionPage } from './types.js';
import { formatDuration, formatFileSize, resolveOutputPath, truncateTitle } from './utils.js';

type ProgressBar = ReturnType<cliProgress.MultiBar['create']>;

export type LinePrinter = (line: string) => void;

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EEXIST';

export interface ConsoleMessenger extends Messenger {
  /** The page most recently shown to `ownerId`, used to resolve n/p and numbers. */
  listingFor(ownerId: string): SessionPage | undefined;
  savedPathFor(requestId: string): string | undefined;
  stop(): void;
}

/**
 * Terminal rendition of the messaging transport: one progress bar per
 * request, numbered result listings, and artifacts copied into a downloads
 * folder instead of being uploaded.
 */
export const createConsoleMessenger = (
  downloadsDir: string,
  print: LinePrinter = (line) => console.log(line),
): ConsoleMessenger => {
  const bars = new Map<string, ProgressBar>();
  const listings = new Map<string, SessionPage>();
  const saved = new Map<string, string>();
  const multiBar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {title}',
    },
    cliProgress.Presets.shades_grey,
  );

  const finishBar = (requestId: string, finalValue?: number): void => {
    const bar = bars.get(requestId);
    if (!bar) {
      return;
    }
    if (finalValue !== undefined) {
      bar.update(finalValue);
    }
    bar.stop();
    multiBar.remove(bar);
    bars.delete(requestId);
  };

  /**
   * Claims the first free `name.mp3`, `name (2).mp3`, ... by creating it
   * exclusively, so concurrent deliveries of one title never share a path.
   */
  const reservePath = async (title: string): Promise<string> => {
    const first = resolveOutputPath(title, downloadsDir);
    const { dir, name, ext } = path.parse(first);
    for (let copy = 1; ; copy += 1) {
      const candidate = copy === 1 ? first : path.join(dir, `${name} (${copy})${ext}`);
      try {
        await fs.writeFile(candidate, '', { flag: 'wx' });
        return candidate;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }
  };

  return {
    async sendProgress(_ownerId, update) {
      const title = truncateTitle(update.title);
      const bar = bars.get(update.requestId);
      if (bar) {
        bar.update(update.percent, { title });
        return;
      }
      bars.set(update.requestId, multiBar.create(100, update.percent, { title }));
    },

    async sendSearchResults(ownerId, page) {
      listings.set(ownerId, page);
      print(`Results for "${page.query}" (page ${page.page + 1}/${page.totalPages}, ${page.totalItems} found)`);
      page.items.forEach((item, position) => {
        const uploader = item.uploader ? ` - ${item.uploader}` : '';
        print(`  ${page.offset + position + 1}. ${item.title} [${formatDuration(item.durationSeconds)}]${uploader}`);
      });
    },

    async sendAudio(_ownerId, { requestId, artifact }) {
      finishBar(requestId, 100);
      await fs.ensureDir(downloadsDir);
      const destination = await reservePath(artifact.title);
      try {
        await fs.copy(artifact.filePath, destination, { overwrite: true });
      } catch (error) {
        await fs.remove(destination);
        throw error;
      }
      saved.set(requestId, destination);
      print(`Saved "${artifact.title}" (${formatFileSize(artifact.sizeBytes)}) to ${destination}`);
    },

    async sendError(_ownerId, notice) {
      if (notice.requestId) {
        finishBar(notice.requestId);
      }
      print(`Error: ${notice.text}`);
    },

    listingFor: (ownerId) => listings.get(ownerId),

    savedPathFor: (requestId) => saved.get(requestId),

    stop: () => {
      multiBar.stop();
    },
  };
};

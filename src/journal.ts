import path from 'node:path';
import fs from 'fs-extra';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';

export const ERRORS_LOG = 'errors.log';
export const DOWNLOADED_LOG = 'downloaded.log';

export interface Journal {
  delivered(ownerId: string, title: string, sizeBytes: number): Promise<void>;
  failed(ownerId: string, subject: string, reason: string): Promise<void>;
}

/**
 * Appends one line per delivered artifact to downloaded.log and one per
 * failed request to errors.log, so an operator can review activity later.
 */
export const createFileJournal = (dir: string, logger: Logger): Journal => {
  const append = async (fileName: string, line: string): Promise<void> => {
    const timestamp = new Date().toISOString();
    try {
      await fs.ensureDir(dir);
      await fs.appendFile(path.join(dir, fileName), `[${timestamp}] ${line}\n`);
    } catch (error) {
      logger.warn({ fileName }, 'journal write failed: %s', describeError(error));
    }
  };

  return {
    delivered: (ownerId, title, sizeBytes) => append(DOWNLOADED_LOG, `[OWNER: ${ownerId}] ${title} (${sizeBytes} bytes)`),
    failed: (ownerId, subject, reason) => append(ERRORS_LOG, `[OWNER: ${ownerId}] ${subject} :: ${reason}`),
  };
};

import ytDlpWrapModule from 'yt-dlp-wrap';

/**
 * Narrow view of the yt-dlp binary that strategies and the transfer fallback
 * depend on, so both can be exercised without spawning a process.
 */
export interface YtDlpRunner {
  /** Runs yt-dlp to completion and returns its stdout. */
  capture(args: string[], signal: AbortSignal): Promise<string>;
  /** Runs a download, reporting progress as a fraction between 0 and 1. */
  download(args: string[], onProgress: (fraction: number) => void, signal: AbortSignal): Promise<void>;
}

const parsePercent = (raw: unknown): number => {
  if (!raw || typeof raw !== 'object' || !('percent' in raw)) {
    return Number.NaN;
  }
  const { percent } = raw;
  if (typeof percent === 'number') {
    return percent;
  }
  if (typeof percent === 'string') {
    return Number.parseFloat(percent.replace('%', ''));
  }
  return Number.NaN;
};

/**
 * Wraps a yt-dlp binary that is already installed (on PATH or at `binaryPath`).
 */
export const createYtDlpRunner = (binaryPath: string): YtDlpRunner => {
  const YTDlpWrap = ytDlpWrapModule.default;
  const ytDlp = new YTDlpWrap(binaryPath);

  return {
    capture: (args, signal) => ytDlp.execPromise(args, undefined, signal),

    download: (args, onProgress, signal) =>
      new Promise<void>((resolve, reject) => {
        const runner = ytDlp.exec(args, undefined, signal);

        runner.on('progress', (raw: unknown) => {
          const numeric = parsePercent(raw);
          if (!Number.isNaN(numeric)) {
            onProgress(Math.min(1, Math.max(0, numeric / 100)));
          }
        });
        runner.once('error', (error: unknown) => {
          reject(error instanceof Error ? error : new Error(String(error)));
        });
        runner.once('close', (code: unknown) => {
          if (signal.aborted) {
            reject(signal.reason instanceof Error ? signal.reason : new Error('yt-dlp aborted'));
            return;
          }
          if (typeof code !== 'number' || code !== 0) {
            reject(new Error(`yt-dlp exited with code ${String(code)}`));
            return;
          }
          resolve();
        });
      }),
  };
};

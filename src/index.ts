#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline';
import pLimit from 'p-limit';
import { createApplication, type Application } from './app.js';
import { loadConfig } from './config.js';
import { type ConsoleMessenger, createConsoleMessenger } from './console-messenger.js';
import { describeError } from './errors.js';
import { isYoutubeUrl } from './locator.js';
import { createLogger, type Logger } from './logger.js';
import type { DeliveryOutcome } from './types.js';
import { cleanupPlayerScripts, readRequestList, verifyInternet } from './utils.js';
import { sweepStaleWorkspaces } from './workspace.js';

const DEFAULT_REQUESTS_FILE = 'requests.txt';
const STALE_WORKSPACE_MS = 60 * 60 * 1000;
const CONSOLE_OWNER = 'console';

interface CliOptions {
  readonly mode: 'direct' | 'batch' | 'interactive';
  readonly url?: string;
  readonly requestsFile?: string;
  readonly concurrency?: number;
}

interface BatchResult {
  readonly id: number;
  readonly request: string;
  readonly status: 'completed' | 'failed';
  readonly reason?: string;
  readonly filePath?: string;
}

const parseConcurrency = (value: string | undefined): number | undefined => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
};

/**
 * Parses incoming CLI arguments and resolves the effective execution mode.
 */
const parseArgs = (argv: string[]): CliOptions => {
  let url: string | undefined;
  let requestsFile: string | undefined;
  let concurrency: number | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
      case '--file':
      case '-f': {
        const next = argv[i + 1];
        requestsFile = path.resolve(process.cwd(), next ?? DEFAULT_REQUESTS_FILE);
        if (next) {
          i += 1;
        }
        break;
      }
      case '--url': {
        url = argv[i + 1];
        i += 1;
        break;
      }
      case '--concurrency':
      case '-c': {
        concurrency = parseConcurrency(argv[i + 1]) ?? concurrency;
        i += 1;
        break;
      }
      default: {
        if (arg.startsWith('--concurrency=')) {
          concurrency = parseConcurrency(arg.split('=')[1]) ?? concurrency;
        } else if (!url && isYoutubeUrl(arg)) {
          url = arg;
        }
        break;
      }
    }
  }

  if (url) {
    return { mode: 'direct', url, concurrency };
  }
  if (requestsFile) {
    return { mode: 'batch', requestsFile, concurrency };
  }
  return { mode: 'interactive', concurrency };
};

const printHelp = (): void => {
  console.log('\naudio-relay: fetch YouTube audio as tagged MP3 files\n');
  console.log('Usage:');
  console.log('  audio-relay                        # Interactive: search, page and pick');
  console.log('  audio-relay <YouTube URL>          # Fetch one video');
  console.log('  audio-relay --url <URL>            # Same, via flag');
  console.log('  audio-relay --file requests.txt    # One request per line, first result wins');
  console.log('\nOptions:');
  console.log('  -f, --file <path>        Path to a request list file');
  console.log('  -c, --concurrency <n>    Maximum parallel batch requests (default DOWNLOAD_CONCURRENCY or 3)');
  console.log('      --concurrency=n      Alternative concurrency syntax');
  console.log('  -h, --help               Show this help message');
  console.log('\nInteractive commands: any text or URL starts a request, n/p change page,');
  console.log('a number downloads that result, q quits.');
};

const printSummary = (results: BatchResult[]): void => {
  const completed = results.filter((result) => result.status === 'completed').length;

  console.log('\nDownload summary');
  console.table(
    results.map((result) => ({
      ID: result.id,
      Request: result.request,
      Status: result.status,
      Reason: result.reason ?? '',
      File: result.filePath ?? '',
    })),
  );
  console.log(
    `Totals => processed: ${results.length}, completed: ${completed}, failed: ${results.length - completed}`,
  );
};

const toBatchResult = (
  id: number,
  request: string,
  outcome: DeliveryOutcome,
  messenger: ConsoleMessenger,
): BatchResult => {
  switch (outcome.status) {
    case 'delivered':
      return { id, request, status: 'completed', filePath: messenger.savedPathFor(outcome.requestId) };
    case 'failed':
      return { id, request, status: 'failed', reason: outcome.message };
    case 'listed':
      return { id, request, status: 'failed', reason: 'No result was selected' };
  }
};

/**
 * Handles one request and, when it lists search results, takes the first one.
 */
const requestFirst = async (app: Application, ownerId: string, text: string): Promise<DeliveryOutcome> => {
  const outcome = await app.coordinator.handle({ kind: 'text', ownerId, text });
  if (outcome.status !== 'listed') {
    return outcome;
  }
  return app.coordinator.handle({ kind: 'select', ownerId, generation: outcome.generation, index: 0 });
};

/**
 * Runs every line of the request list as its own owner. Search lines take the
 * first result.
 */
const runBatch = async (
  app: Application,
  messenger: ConsoleMessenger,
  requestsFile: string,
  concurrency: number,
): Promise<boolean> => {
  const requests = await readRequestList(requestsFile);
  if (requests.length === 0) {
    console.error(`No requests found in ${requestsFile}. Add titles or URLs and try again.`);
    return false;
  }

  const limit = pLimit(concurrency);
  const results = await Promise.all(
    requests.map((request, index) =>
      limit(async () => {
        const outcome = await requestFirst(app, `line-${index + 1}`, request);
        return toBatchResult(index + 1, request, outcome, messenger);
      }),
    ),
  );

  messenger.stop();
  printSummary(results);
  return results.every((result) => result.status === 'completed');
};

/**
 * Reads commands until `q` or end of input. Acquisitions run in the
 * background so the prompt stays responsive.
 */
const runInteractive = async (app: Application, messenger: ConsoleMessenger, logger: Logger): Promise<void> => {
  const rl = createInterface({ input: stdin, output: stdout });
  rl.on('SIGINT', () => rl.close());
  const pending = new Set<Promise<void>>();

  const dispatch = (work: Promise<DeliveryOutcome>): void => {
    const tracked = work.then((outcome) => {
      if (outcome.status === 'listed') {
        console.log('Type a number to download it, n/p to change page.');
      }
      logger.debug({ outcome }, 'request finished');
    });
    pending.add(tracked);
    void tracked.finally(() => pending.delete(tracked));
  };

  console.log('Type a song name or a YouTube link. n/p change page, a number downloads, q quits.');
  rl.setPrompt('> ');
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();
    if (line === 'q' || line === 'quit') {
      break;
    }
    const listing = messenger.listingFor(CONSOLE_OWNER);
    if ((line === 'n' || line === 'p') && listing) {
      dispatch(
        app.coordinator.handle({
          kind: 'page',
          ownerId: CONSOLE_OWNER,
          generation: listing.generation,
          page: listing.page + (line === 'n' ? 1 : -1),
        }),
      );
    } else if (/^\d+$/u.test(line) && listing) {
      dispatch(
        app.coordinator.handle({
          kind: 'select',
          ownerId: CONSOLE_OWNER,
          generation: listing.generation,
          index: Number.parseInt(line, 10) - 1,
        }),
      );
    } else if (line.length > 0) {
      dispatch(app.coordinator.handle({ kind: 'text', ownerId: CONSOLE_OWNER, text: line }));
    }
    rl.prompt();
  }

  rl.close();
  await app.close();
  await Promise.all(pending);
  messenger.stop();
};

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  try {
    await verifyInternet();
  } catch (error) {
    logger.warn('connectivity check failed: %s', describeError(error));
  }

  const swept = await sweepStaleWorkspaces(config.workspaceRoot, STALE_WORKSPACE_MS, logger);
  if (swept > 0) {
    logger.info({ swept }, 'removed stale workspaces');
  }

  const messenger = createConsoleMessenger(config.downloadsDir);
  const app = createApplication(config, messenger, logger);

  const onSignal = (): void => {
    logger.warn('interrupted, aborting in-flight requests');
    app.close().then(
      () => process.exit(130),
      (error: unknown) => {
        logger.error('shutdown failed: %s', describeError(error));
        process.exit(1);
      },
    );
  };

  try {
    switch (options.mode) {
      case 'direct': {
        process.once('SIGINT', onSignal);
        const outcome = await requestFirst(app, CONSOLE_OWNER, options.url ?? '');
        messenger.stop();
        if (outcome.status !== 'delivered') {
          process.exitCode = 1;
        }
        break;
      }
      case 'batch': {
        process.once('SIGINT', onSignal);
        const ok = await runBatch(
          app,
          messenger,
          options.requestsFile ?? DEFAULT_REQUESTS_FILE,
          options.concurrency ?? config.batchConcurrency,
        );
        if (!ok) {
          process.exitCode = 1;
        }
        break;
      }
      case 'interactive':
        await runInteractive(app, messenger, logger);
        console.log('\nGoodbye!');
        break;
    }
  } finally {
    await app.close();
    await cleanupPlayerScripts(logger);
  }
};

main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});

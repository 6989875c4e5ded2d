export type FailureKind =
  | 'classification'
  | 'source-unavailable'
  | 'session-expired'
  | 'invalid-selection'
  | 'rate-limited'
  | 'transfer-timeout'
  | 'transfer-failed'
  | 'transcode-timeout'
  | 'transcode-failed'
  | 'oversize'
  | 'filesystem'
  | 'delivery-failed'
  | 'cancelled'
  | 'internal';

/**
 * Fixed user-facing text for every failure kind. Internal diagnostics never
 * reach the requester; they stay in the log.
 */
export const USER_MESSAGES: Readonly<Record<FailureKind, string>> = {
  classification: '❌ Nothing to search. Send a YouTube video link or a song name.',
  'source-unavailable': '❌ This song is not available right now. Try another link or search result.',
  'session-expired': '❌ This search has expired. Please search again.',
  'invalid-selection': '❌ Invalid selection. Please search again.',
  'rate-limited': '⏰ You are sending requests too quickly, please wait a moment.',
  'transfer-timeout': '❌ The download took too long. Please try again later.',
  'transfer-failed': '❌ The song could not be downloaded. Please check the link and try again.',
  'transcode-timeout': '❌ Converting to MP3 took too long. Please try again later.',
  'transcode-failed': '❌ The song could not be converted to MP3. Please try again.',
  oversize: '❌ The file is too large to send.',
  filesystem: '❌ Something went wrong on our side. Please try again later.',
  'delivery-failed': '❌ The file could not be sent. Please try again.',
  cancelled: '❌ The request was cancelled.',
  internal: '❌ Something went wrong. Please try again later.',
};

export class PipelineError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }

  get userMessage(): string {
    return USER_MESSAGES[this.kind];
  }
}

export class ClassificationError extends PipelineError {
  constructor(message = 'Nothing to search') {
    super('classification', message);
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(readonly attempted: readonly string[] = []) {
    super('source-unavailable', `Source unavailable after ${attempted.length} extraction strategies`);
  }
}

export class SessionExpiredError extends PipelineError {
  constructor(ownerId: string, generation: number) {
    super('session-expired', `Search session ${generation} for ${ownerId} is no longer live`);
  }
}

export class InvalidSelectionError extends PipelineError {
  constructor(message: string) {
    super('invalid-selection', message);
  }
}

export class RateLimitedError extends PipelineError {
  constructor(readonly retryAfterMs: number) {
    super('rate-limited', `Rate limited, retry in ${retryAfterMs}ms`);
  }
}

export class TransferTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super('transfer-timeout', `Transfer exceeded ${timeoutMs}ms`);
  }
}

export class TransferError extends PipelineError {
  constructor(cause: unknown) {
    super('transfer-failed', `Transfer failed: ${describeError(cause)}`, { cause });
  }
}

export class TranscodeTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super('transcode-timeout', `Transcode exceeded ${timeoutMs}ms`);
  }
}

export class TranscodeError extends PipelineError {
  constructor(cause: unknown) {
    super('transcode-failed', `Transcode failed: ${describeError(cause)}`, { cause });
  }
}

export class OversizeArtifactError extends PipelineError {
  constructor(
    readonly sizeBytes: number,
    readonly limitBytes: number,
  ) {
    super('oversize', `Artifact of ${sizeBytes} bytes exceeds the ${limitBytes} byte ceiling`);
  }
}

export class FilesystemError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('filesystem', message, { cause });
  }
}

export class DeliveryError extends PipelineError {
  constructor(cause: unknown) {
    super('delivery-failed', `Delivery failed: ${describeError(cause)}`, { cause });
  }
}

export class CancelledError extends PipelineError {
  constructor(message = 'Request cancelled') {
    super('cancelled', message);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toPipelineError = (error: unknown): PipelineError =>
  error instanceof PipelineError
    ? error
    : new PipelineError('internal', describeError(error), { cause: error });

/**
 * Runs one pipeline stage and wraps anything that is not already a
 * PipelineError into the stage's own error type.
 */
export const inStage = async <T>(
  work: () => Promise<T>,
  wrap: (cause: unknown) => PipelineError,
): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    throw error instanceof PipelineError ? error : wrap(error);
  }
};

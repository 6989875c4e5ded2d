import type { FailureKind } from './errors.js';

export interface DirectUrlLocator {
  readonly kind: 'url';
  /** Canonical single-video watch URL. */
  readonly url: string;
  readonly videoId: string;
}

export interface SearchLocator {
  readonly kind: 'search';
  readonly query: string;
}

export type MediaLocator = DirectUrlLocator | SearchLocator;

export interface CandidateItem {
  readonly id: string;
  readonly title: string;
  readonly uploader?: string;
  readonly durationSeconds: number;
  readonly thumbnailUrl?: string;
  readonly sourceUrl: string;
}

export interface SearchSession {
  readonly ownerId: string;
  readonly query: string;
  readonly items: readonly CandidateItem[];
  readonly createdAt: number;
  readonly generation: number;
  currentPage: number;
}

export interface SessionPage {
  readonly ownerId: string;
  readonly query: string;
  readonly generation: number;
  readonly page: number;
  readonly totalPages: number;
  /** Absolute index of the first item on this page. */
  readonly offset: number;
  readonly totalItems: number;
  readonly items: readonly CandidateItem[];
}

export type AcquisitionTarget =
  | { readonly kind: 'candidate'; readonly item: CandidateItem }
  | { readonly kind: 'url'; readonly locator: DirectUrlLocator };

export type TaskOutcome = 'pending' | 'succeeded' | 'failed';

export interface AcquisitionTask {
  readonly requestId: string;
  readonly ownerId: string;
  readonly target: AcquisitionTarget;
  readonly startedAt: number;
  progressPercent: number;
  outcome: TaskOutcome;
}

export interface AudioArtifact {
  readonly filePath: string;
  readonly sizeBytes: number;
  readonly title: string;
  readonly performer?: string;
  readonly durationSeconds: number;
  readonly thumbnailPath?: string;
}

export type ProgressSink = (percent: number) => void;

export type InboundEvent =
  | { readonly kind: 'text'; readonly ownerId: string; readonly text: string }
  | { readonly kind: 'page'; readonly ownerId: string; readonly generation: number; readonly page: number }
  | { readonly kind: 'select'; readonly ownerId: string; readonly generation: number; readonly index: number };

export type DeliveryOutcome =
  | {
      readonly status: 'delivered';
      readonly requestId: string;
      readonly title: string;
      readonly sizeBytes: number;
    }
  | {
      readonly status: 'listed';
      readonly generation: number;
      readonly page: number;
      readonly totalItems: number;
    }
  | {
      readonly status: 'failed';
      readonly kind: FailureKind;
      readonly message: string;
    };

export interface ProgressUpdate {
  readonly requestId: string;
  readonly title: string;
  readonly percent: number;
}

export interface AudioDelivery {
  readonly requestId: string;
  readonly artifact: AudioArtifact;
}

export interface ErrorNotice {
  readonly text: string;
  readonly requestId?: string;
}

/**
 * Outbound side of the messaging transport. Implementations render progress,
 * result pages and errors, and transmit the finished artifact.
 */
export interface Messenger {
  sendProgress(ownerId: string, update: ProgressUpdate): Promise<void>;
  sendSearchResults(ownerId: string, page: SessionPage): Promise<void>;
  sendAudio(ownerId: string, delivery: AudioDelivery): Promise<void>;
  sendError(ownerId: string, notice: ErrorNotice): Promise<void>;
}

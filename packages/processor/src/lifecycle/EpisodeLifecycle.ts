import {
  type EpisodeRecord,
  type EpisodeStatus,
  InvalidTransitionError
} from '@podstrip/shared';

export interface ServeContext {
  record: EpisodeRecord | null;
  /** whether the processed audio of a `processed` record is still on disk */
  artifactExists: boolean;
  slotBusy: boolean;
}

export type ServeDecision =
  | { kind: 'serve-cached'; processedFile: string }
  | { kind: 'process'; reason: 'new' | 'artifact-missing' }
  | { kind: 'busy'; reason: 'processing' | 'slot-busy' }
  | { kind: 'redirect-original'; url: string }
  | { kind: 'not-found' };

/**
 * What to do with an audio request. A failed episode is never retried from
 * here; only an explicit reset brings it back.
 */
export function decideServe({ record, artifactExists, slotBusy }: ServeContext): ServeDecision {
  if (!record) {
    return slotBusy ? { kind: 'busy', reason: 'slot-busy' } : { kind: 'process', reason: 'new' };
  }

  switch (record.status) {
    case 'processed':
      if (artifactExists) {
        return { kind: 'serve-cached', processedFile: record.processedFile };
      }
      return slotBusy ? { kind: 'busy', reason: 'slot-busy' } : { kind: 'process', reason: 'artifact-missing' };
    case 'failed':
      return record.originalUrl ? { kind: 'redirect-original', url: record.originalUrl } : { kind: 'not-found' };
    case 'processing':
      return { kind: 'busy', reason: 'processing' };
  }
}

export type LifecycleEvent =
  | { type: 'start'; originalUrl: string; title: string; at: Date }
  | {
      type: 'succeed';
      at: Date;
      processedFile: string;
      originalDuration: number;
      newDuration: number;
      adsRemoved: number;
    }
  | { type: 'fail'; at: Date; errorMessage: string }
  | { type: 'reset' };

export function statusOf(record: EpisodeRecord | null): EpisodeStatus {
  return record ? record.status : 'none';
}

/**
 * Applies a lifecycle event. `null` stands for status `none`.
 */
export function transition(record: EpisodeRecord | null, event: LifecycleEvent): EpisodeRecord | null {
  const from = statusOf(record);

  switch (event.type) {
    case 'start':
      if (from === 'none' || from === 'processed') {
        return { status: 'processing', originalUrl: event.originalUrl, title: event.title, startedAt: event.at };
      }
      break;
    case 'succeed':
      if (record?.status === 'processing') {
        return {
          status: 'processed',
          originalUrl: record.originalUrl,
          title: record.title,
          processedAt: event.at,
          processedFile: event.processedFile,
          originalDuration: event.originalDuration,
          newDuration: event.newDuration,
          adsRemoved: event.adsRemoved
        };
      }
      break;
    case 'fail':
      if (record?.status === 'processing') {
        return {
          status: 'failed',
          originalUrl: record.originalUrl,
          title: record.title,
          failedAt: event.at,
          errorMessage: event.errorMessage
        };
      }
      break;
    case 'reset':
      if (from !== 'processing') {
        return null;
      }
      break;
  }

  throw new InvalidTransitionError(from, event.type);
}

/** A `processing` record whose run has outlived the maximum job duration. */
export function isAbandoned(record: EpisodeRecord, now: Date, maxJobDurationMs: number): boolean {
  return record.status === 'processing' && now.getTime() - record.startedAt.getTime() > maxJobDurationMs;
}

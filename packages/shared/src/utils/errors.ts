import type { JobIdentity, PipelineStage } from '../types/jobs';

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type PodstripErrorCode =
  | 'ACQUIRE_BUSY'
  | 'ACQUIRE_TIMEOUT'
  | 'DOWNSTREAM_FAILURE'
  | 'INVALID_TRANSITION'
  | 'CONFIG_INVALID';

export class PodstripError extends Error {
  constructor(message: string, public code: PodstripErrorCode, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'PodstripError';
  }
}

export class SlotBusyError extends PodstripError {
  constructor(public job: JobIdentity) {
    super(`Processing slot busy, cannot start ${job.podcastSlug}:${job.episodeId}`, 'ACQUIRE_BUSY');
    this.name = 'SlotBusyError';
  }
}

export class SlotTimeoutError extends PodstripError {
  constructor(public job: JobIdentity, public timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for processing slot for ${job.podcastSlug}:${job.episodeId}`, 'ACQUIRE_TIMEOUT', { timeoutMs });
    this.name = 'SlotTimeoutError';
  }
}

export class DownstreamFailureError extends PodstripError {
  constructor(public stage: PipelineStage, cause: unknown) {
    super(`${stage} failed: ${formatError(cause)}`, 'DOWNSTREAM_FAILURE', { stage });
    this.name = 'DownstreamFailureError';
  }
}

export class InvalidTransitionError extends PodstripError {
  constructor(public from: string, public event: string) {
    super(`Invalid episode transition: ${event} from ${from}`, 'INVALID_TRANSITION', { from, event });
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigError extends PodstripError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

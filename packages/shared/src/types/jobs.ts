export interface JobIdentity {
  podcastSlug: string;
  episodeId: string;
}

/**
 * Capability handed out by a successful slot acquire. Only the holder of
 * the current ticket can release the slot.
 */
export interface LeaseTicket {
  readonly id: string;
  readonly job: JobIdentity;
  readonly acquiredAt: number;
}

export type AcquireResult =
  | { granted: true; ticket: LeaseTicket }
  | { granted: false; reason: 'busy' | 'timeout' };

export type PipelineStage = 'download' | 'transcribe' | 'analyze' | 'detect' | 'cut';

import {
  type AcquireResult,
  type JobIdentity,
  type LeaseTicket,
  SlotBusyError,
  SlotTimeoutError,
  formatError,
  jobKey
} from '@podstrip/shared';
import { ProcessingLease } from './ProcessingLease';
import type { ActiveJob, JobStatusSource } from './types';

export const DEFAULT_MAX_JOB_DURATION_MS = 30 * 60 * 1000;
export const DEFAULT_STATUS_POLL_INTERVAL_MS = 1000;

export interface ProcessingSchedulerOptions {
  maxJobDurationMs?: number;
  now?: () => number;
  statusSource?: JobStatusSource;
  /** how often a waiting acquire re-reads the status source while another worker holds the slot */
  statusPollIntervalMs?: number;
}

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Single-flight gate for episode processing. At most one job holds the slot
 * per process; the optional status source extends that to every worker
 * sharing it.
 */
export class ProcessingScheduler {
  private lease: ProcessingLease;
  private maxJobDurationMs: number;
  private now: () => number;
  private statusSource?: JobStatusSource;
  private statusPollIntervalMs: number;
  private statusQueue: Promise<void> = Promise.resolve();
  private publishedTicketId: string | null = null;

  constructor(options: ProcessingSchedulerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxJobDurationMs = options.maxJobDurationMs ?? DEFAULT_MAX_JOB_DURATION_MS;
    this.statusSource = options.statusSource;
    this.statusPollIntervalMs = options.statusPollIntervalMs ?? DEFAULT_STATUS_POLL_INTERVAL_MS;
    this.lease = new ProcessingLease(this.now);
  }

  async acquire(job: JobIdentity, timeoutMs: number = 0): Promise<AcquireResult> {
    const refused: AcquireResult = { granted: false, reason: timeoutMs > 0 ? 'timeout' : 'busy' };
    let remainingMs = timeoutMs;

    this.clearIfStale();
    let foreignJob = await this.reconcile();
    while (foreignJob) {
      if (remainingMs <= 0) {
        console.log(`⏳ Slot held by another worker (${jobKey(foreignJob)}), refusing ${jobKey(job)}`);
        return refused;
      }
      const waitMs = Math.min(this.statusPollIntervalMs, remainingMs);
      await delay(waitMs);
      remainingMs -= waitMs;
      this.clearIfStale();
      foreignJob = await this.reconcile();
    }

    const ticket = await this.lease.acquire(job, remainingMs);
    if (!ticket) {
      return refused;
    }

    this.publish(ticket);
    return { granted: true, ticket };
  }

  /** Releasing a ticket that no longer owns the slot does nothing. */
  release(ticket: LeaseTicket): void {
    if (!this.lease.isCurrent(ticket)) {
      return;
    }

    this.unpublish(ticket);
    // A waiter handed the slot here publishes itself once its acquire resumes
    this.lease.release(ticket);
  }

  async currentHolder(): Promise<JobIdentity | null> {
    this.clearIfStale();
    return this.lease.holder;
  }

  async isBusy(): Promise<boolean> {
    this.clearIfStale();
    const foreignJob = await this.reconcile();
    return foreignJob !== null || this.lease.holder !== null;
  }

  isProcessing(job: JobIdentity): boolean {
    this.clearIfStale();
    const holder = this.lease.holder;
    return holder !== null && jobKey(holder) === jobKey(job);
  }

  isCurrent(ticket: LeaseTicket): boolean {
    return this.lease.isCurrent(ticket);
  }

  get heldSince(): number | null {
    return this.lease.acquiredAt;
  }

  async runExclusive<T>(job: JobIdentity, fn: (ticket: LeaseTicket) => Promise<T>, timeoutMs: number = 0): Promise<T> {
    const result = await this.acquire(job, timeoutMs);
    if (!result.granted) {
      throw result.reason === 'timeout' ? new SlotTimeoutError(job, timeoutMs) : new SlotBusyError(job);
    }

    try {
      return await fn(result.ticket);
    } finally {
      this.release(result.ticket);
    }
  }

  /** Waits for every queued status write to settle. */
  async flush(): Promise<void> {
    await this.statusQueue;
  }

  private clearIfStale(): void {
    if (!this.lease.isStale(this.maxJobDurationMs)) {
      return;
    }

    const stale = this.lease.current;
    if (!stale) return;

    const heldFor = Math.round((this.now() - stale.acquiredAt) / 1000);
    console.warn(`⚠️  Clearing stale processing lease for ${jobKey(stale.job)} (held ${heldFor}s)`);
    this.unpublish(stale);
    this.lease.forceClear();
  }

  /**
   * Compares the local lease with the shared status. Returns the job another
   * worker is running, if any.
   */
  private async reconcile(): Promise<JobIdentity | null> {
    if (!this.statusSource) {
      return null;
    }

    const snapshot = this.lease.current;
    let active: ActiveJob | null;
    try {
      await this.statusQueue;
      active = await this.statusSource.getCurrentJob();
    } catch (error) {
      console.warn(`Status source read failed, keeping local lease state: ${formatError(error)}`);
      return null;
    }

    if (active === null) {
      // Only a lease already announced to the source can be contradicted by it
      if (snapshot && this.publishedTicketId === snapshot.id && this.lease.current === snapshot) {
        console.warn(`⚠️  Status source reports no active job; releasing local lease for ${jobKey(snapshot.job)}`);
        this.publishedTicketId = null;
        this.lease.forceClear();
      }
      return null;
    }

    const local = this.lease.current;
    if (local && local.id === active.ticketId) {
      return null;
    }
    if (!local) {
      return { podcastSlug: active.podcastSlug, episodeId: active.episodeId };
    }
    return null;
  }

  private publish(ticket: LeaseTicket): void {
    const source = this.statusSource;
    if (!source) return;

    this.enqueue(async () => {
      await source.markStarted(ticket);
      if (this.lease.isCurrent(ticket)) {
        this.publishedTicketId = ticket.id;
      }
    });
  }

  private unpublish(ticket: LeaseTicket): void {
    if (this.publishedTicketId === ticket.id) {
      this.publishedTicketId = null;
    }

    const source = this.statusSource;
    if (!source) return;

    this.enqueue(() => source.markFinished(ticket));
  }

  private enqueue(operation: () => Promise<void>): void {
    this.statusQueue = this.statusQueue.then(operation).catch(error => {
      console.warn(`Status source write failed: ${formatError(error)}`);
    });
  }
}

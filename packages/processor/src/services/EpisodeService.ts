import {
  type EpisodeRecord,
  type JobIdentity,
  type LeaseTicket,
  formatError,
  jobKey
} from '@podstrip/shared';
import { decideServe, isAbandoned, transition } from '../lifecycle/EpisodeLifecycle';
import type { ProcessingScheduler } from '../jobs/ProcessingScheduler';
import type { EpisodeWorker } from '../jobs/workers/EpisodeWorker';
import type { EpisodeArtifactStore, EpisodeRepository } from '../jobs/types';
import type { EpisodeLookup } from './FeedService';

export type ServeOutcome =
  | { type: 'file'; path: string }
  | { type: 'redirect'; url: string }
  | { type: 'unavailable'; retryAfterSeconds: number }
  | { type: 'not-found' };

export type ReprocessOutcome =
  | { status: 'started' }
  | { status: 'reset' }
  | { status: 'busy' }
  | { status: 'not-found' };

export interface EpisodeFeedLookup {
  hasFeed(slug: string): boolean;
  findEpisode(slug: string, episodeId: string): Promise<EpisodeLookup | null>;
}

export interface EpisodeServiceOptions {
  acquireTimeoutMs?: number;
  retryAfterSeconds?: number;
  maxJobDurationMs?: number;
  now?: () => Date;
}

interface EpisodeSource {
  audioUrl: string;
  title: string;
  podcastName: string;
}

/**
 * Serves episode audio just in time: answers from the stored result when it
 * can and otherwise runs the pipeline inside the request that won the
 * processing slot.
 */
export class EpisodeService {
  private acquireTimeoutMs: number;
  private retryAfterSeconds: number;
  private maxJobDurationMs: number;
  private now: () => Date;
  private background = new Set<Promise<void>>();

  constructor(
    private repository: EpisodeRepository,
    private storage: EpisodeArtifactStore & { deleteEpisodeFiles(podcastSlug: string, episodeId: string): Promise<number> },
    private feeds: EpisodeFeedLookup,
    private scheduler: ProcessingScheduler,
    private worker: EpisodeWorker,
    options: EpisodeServiceOptions = {}
  ) {
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 0;
    this.retryAfterSeconds = options.retryAfterSeconds ?? 30;
    this.maxJobDurationMs = options.maxJobDurationMs ?? 30 * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  async serveEpisode(podcastSlug: string, episodeId: string): Promise<ServeOutcome> {
    if (!this.feeds.hasFeed(podcastSlug)) {
      return { type: 'not-found' };
    }

    const job: JobIdentity = { podcastSlug, episodeId };
    const record = this.repository.loadEpisodeRecord(podcastSlug, episodeId);
    // With a wait configured, a busy slot is left to acquire to wait out
    const decision = decideServe({
      record,
      artifactExists: await this.hasArtifact(podcastSlug, record),
      slotBusy: this.acquireTimeoutMs > 0 ? false : await this.scheduler.isBusy()
    });

    switch (decision.kind) {
      case 'serve-cached':
        return { type: 'file', path: this.storage.resolveProcessedFile(podcastSlug, decision.processedFile) };
      case 'redirect-original':
        console.log(`↪️  [${jobKey(job)}] Previously failed, redirecting to original`);
        return { type: 'redirect', url: decision.url };
      case 'not-found':
        return { type: 'not-found' };
      case 'busy':
        return this.unavailable();
      case 'process':
        break;
    }

    let source: EpisodeSource | null;
    try {
      source = await this.resolveSource(job, record);
    } catch (error) {
      console.error(`❌ [${jobKey(job)}] Episode lookup failed: ${formatError(error)}`);
      return record ? { type: 'redirect', url: record.originalUrl } : this.unavailable();
    }
    if (!source) {
      return { type: 'not-found' };
    }

    const acquired = await this.scheduler.acquire(job, this.acquireTimeoutMs);
    if (!acquired.granted) {
      console.log(`⏳ [${jobKey(job)}] Processing slot ${acquired.reason}, asking client to retry`);
      return this.unavailable();
    }

    // Another request may have finished this episode while we waited
    const current = this.repository.loadEpisodeRecord(podcastSlug, episodeId);
    if (current?.status === 'processed' && await this.hasArtifact(podcastSlug, current)) {
      this.scheduler.release(acquired.ticket);
      return { type: 'file', path: this.storage.resolveProcessedFile(podcastSlug, current.processedFile) };
    }
    if (current?.status === 'failed') {
      this.scheduler.release(acquired.ticket);
      return { type: 'redirect', url: current.originalUrl };
    }
    if (current?.status === 'processing') {
      this.scheduler.release(acquired.ticket);
      return this.unavailable();
    }

    return this.runPipeline(acquired.ticket, current, source);
  }

  /**
   * Clears a finished or failed episode so it is processed again, and starts
   * that run now when the slot is free.
   */
  async reprocessEpisode(podcastSlug: string, episodeId: string): Promise<ReprocessOutcome> {
    if (!this.feeds.hasFeed(podcastSlug)) {
      return { status: 'not-found' };
    }

    const job: JobIdentity = { podcastSlug, episodeId };
    const record = this.repository.loadEpisodeRecord(podcastSlug, episodeId);
    if (record?.status === 'processing' || this.scheduler.isProcessing(job)) {
      return { status: 'busy' };
    }

    const source = await this.resolveSource(job, record);
    if (!source) {
      return { status: 'not-found' };
    }

    this.repository.saveEpisodeRecord(podcastSlug, episodeId, transition(record, { type: 'reset' }));
    await this.storage.deleteEpisodeFiles(podcastSlug, episodeId);
    console.log(`🔄 [${jobKey(job)}] Reset for reprocessing`);

    const acquired = await this.scheduler.acquire(job, 0);
    if (!acquired.granted) {
      return { status: 'reset' };
    }

    const run = this.runPipeline(acquired.ticket, null, source).then(() => undefined);
    const tracked: Promise<void> = run
      .catch(error => {
        console.error(`❌ [${jobKey(job)}] Reprocessing failed: ${formatError(error)}`);
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
    return { status: 'started' };
  }

  /** Marks `processing` records older than the max job duration as failed. */
  recoverAbandoned(): number {
    const now = this.now();
    let recovered = 0;

    for (const { podcastSlug, episodeId, record } of this.repository.listProcessingEpisodes()) {
      const job = { podcastSlug, episodeId };
      if (!isAbandoned(record, now, this.maxJobDurationMs) || this.scheduler.isProcessing(job)) {
        continue;
      }

      const failed = transition(record, { type: 'fail', at: now, errorMessage: 'Processing abandoned' });
      this.repository.saveEpisodeRecord(podcastSlug, episodeId, failed);
      console.warn(`⚠️  [${jobKey(job)}] Marked abandoned processing run as failed`);
      recovered++;
    }

    return recovered;
  }

  /** Waits for reprocessing runs started in the background. */
  async drain(): Promise<void> {
    await Promise.all([...this.background]);
  }

  private async runPipeline(ticket: LeaseTicket, previous: EpisodeRecord | null, source: EpisodeSource): Promise<ServeOutcome> {
    const { job } = ticket;
    const { podcastSlug, episodeId } = job;
    const startedAt = this.now();

    try {
      const processing = transition(previous, {
        type: 'start',
        originalUrl: source.audioUrl,
        title: source.title,
        at: startedAt
      });
      if (!processing) {
        return this.unavailable();
      }
      this.repository.saveEpisodeRecord(podcastSlug, episodeId, processing);

      try {
        const result = await this.worker.process({
          job,
          ticket,
          audioUrl: source.audioUrl,
          episodeTitle: source.title,
          podcastName: source.podcastName
        });

        const finishedAt = this.now();
        if (this.isSuperseded(ticket)) {
          console.warn(`⚠️  [${jobKey(job)}] Run finished after losing its lease; newer run owns the record`);
          return { type: 'file', path: this.storage.resolveProcessedFile(podcastSlug, result.processedFile) };
        }

        const processed = transition(processing, {
          type: 'succeed',
          at: finishedAt,
          processedFile: result.processedFile,
          originalDuration: result.originalDuration,
          newDuration: result.newDuration,
          adsRemoved: result.ads.length
        });
        this.repository.saveEpisodeRecord(podcastSlug, episodeId, processed);
        this.repository.recordHistory({
          podcastSlug,
          episodeId,
          title: source.title,
          status: 'completed',
          startedAt,
          finishedAt,
          durationSeconds: (finishedAt.getTime() - startedAt.getTime()) / 1000,
          adsDetected: result.ads.length,
          originalDuration: result.originalDuration,
          newDuration: result.newDuration
        });

        console.log(`✅ [${jobKey(job)}] Episode processed: "${source.title}"`);
        return { type: 'file', path: this.storage.resolveProcessedFile(podcastSlug, result.processedFile) };
      } catch (error) {
        const finishedAt = this.now();
        const errorMessage = formatError(error);
        console.error(`❌ [${jobKey(job)}] Processing failed: ${errorMessage}`);

        if (!this.isSuperseded(ticket)) {
          this.repository.saveEpisodeRecord(
            podcastSlug,
            episodeId,
            transition(processing, { type: 'fail', at: finishedAt, errorMessage })
          );
          this.repository.recordHistory({
            podcastSlug,
            episodeId,
            title: source.title,
            status: 'failed',
            startedAt,
            finishedAt,
            durationSeconds: (finishedAt.getTime() - startedAt.getTime()) / 1000,
            adsDetected: 0,
            errorMessage
          });
        }

        return { type: 'redirect', url: source.audioUrl };
      }
    } finally {
      this.scheduler.release(ticket);
    }
  }

  /** True when the ticket lost the slot and a newer run of the same episode holds it. */
  private isSuperseded(ticket: LeaseTicket): boolean {
    return !this.scheduler.isCurrent(ticket) && this.scheduler.isProcessing(ticket.job);
  }

  private async resolveSource(job: JobIdentity, record: EpisodeRecord | null): Promise<EpisodeSource | null> {
    const lookup = await this.feeds.findEpisode(job.podcastSlug, job.episodeId);
    if (lookup) {
      return { audioUrl: lookup.episode.audioUrl, title: lookup.episode.title, podcastName: lookup.podcastName };
    }
    // The episode may have dropped out of the feed since it was first processed
    if (record) {
      return { audioUrl: record.originalUrl, title: record.title, podcastName: job.podcastSlug };
    }
    return null;
  }

  private async hasArtifact(podcastSlug: string, record: EpisodeRecord | null): Promise<boolean> {
    return record?.status === 'processed' ? this.storage.artifactExists(podcastSlug, record.processedFile) : false;
  }

  private unavailable(): ServeOutcome {
    return { type: 'unavailable', retryAfterSeconds: this.retryAfterSeconds };
  }
}

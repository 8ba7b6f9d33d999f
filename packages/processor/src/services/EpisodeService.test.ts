import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { EpisodeService } from './EpisodeService';
import { Database } from '../database/Database';
import { StorageManager } from '../storage/StorageManager';
import { ProcessingScheduler } from '../jobs/ProcessingScheduler';
import { EpisodeWorker } from '../jobs/workers/EpisodeWorker';
import {
  FakeAdDetector,
  FakeAudioEditor,
  FakeTranscriber,
  StaticFeedLookup,
  feedEpisode,
  waitFor
} from '../testing/fakes';

const MAX_JOB_MS = 60_000;

describe('EpisodeService', () => {
  let dataDir: string;
  let clock: number;
  let database: Database;
  let storage: StorageManager;
  let audio: FakeAudioEditor;
  let scheduler: ProcessingScheduler;
  let worker: EpisodeWorker;
  let service: EpisodeService;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'episodes-'));
    clock = Date.parse('2024-05-01T10:00:00.000Z');
    database = new Database({ path: ':memory:' });
    storage = new StorageManager({ dataDir });
    audio = new FakeAudioEditor(storage.getTempDirectory());
    scheduler = new ProcessingScheduler({ maxJobDurationMs: MAX_JOB_MS, now: () => clock });
    worker = new EpisodeWorker({
      audio,
      transcriber: new FakeTranscriber(),
      adDetector: new FakeAdDetector(),
      storage
    });
    const feeds = new StaticFeedLookup({ show: [feedEpisode('ep1'), feedEpisode('ep2')] });
    service = new EpisodeService(database, storage, feeds, scheduler, worker, {
      retryAfterSeconds: 30,
      maxJobDurationMs: MAX_JOB_MS,
      now: () => new Date(clock)
    });

    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await service.drain();
    database.close();
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  const processedPath = () => join(dataDir, 'podcasts', 'show', 'episodes', 'ep1.mp3');

  describe('serveEpisode', () => {
    it('processes a new episode inside the request', async () => {
      const outcome = await service.serveEpisode('show', 'ep1');

      expect(outcome).toEqual({ type: 'file', path: processedPath() });
      expect(database.loadEpisodeRecord('show', 'ep1')).toMatchObject({
        status: 'processed',
        originalUrl: 'https://cdn.example.com/ep1.mp3',
        processedFile: 'episodes/ep1.mp3',
        originalDuration: 3600,
        newDuration: 3540,
        adsRemoved: 1
      });
      expect(database.getHistory({ page: 1, limit: 10 }).entries.map(entry => entry.status)).toEqual(['completed']);
      expect(await scheduler.isBusy()).toBe(false);
    });

    it('serves the stored result without processing again', async () => {
      await service.serveEpisode('show', 'ep1');
      const outcome = await service.serveEpisode('show', 'ep1');

      expect(outcome).toEqual({ type: 'file', path: processedPath() });
      expect(audio.downloads).toHaveLength(1);
    });

    it('processes again when the stored audio has gone missing', async () => {
      await service.serveEpisode('show', 'ep1');
      await unlink(processedPath());

      expect(await service.serveEpisode('show', 'ep1')).toEqual({ type: 'file', path: processedPath() });
      expect(audio.downloads).toHaveLength(2);
    });

    it('redirects to the original audio when processing fails, and keeps redirecting', async () => {
      audio.failDownload = new Error('HTTP 404');

      expect(await service.serveEpisode('show', 'ep1')).toEqual({ type: 'redirect', url: 'https://cdn.example.com/ep1.mp3' });
      expect(database.loadEpisodeRecord('show', 'ep1')).toMatchObject({ status: 'failed', errorMessage: 'download failed: HTTP 404' });
      expect(database.getHistoryStats()).toMatchObject({ totalRuns: 1, failed: 1 });

      audio.failDownload = null;
      expect(await service.serveEpisode('show', 'ep1')).toEqual({ type: 'redirect', url: 'https://cdn.example.com/ep1.mp3' });
      expect(audio.downloads).toHaveLength(1);
    });

    it('asks clients to retry while another episode holds the slot', async () => {
      const openGate = audio.gateNextDownload();
      const running = service.serveEpisode('show', 'ep1');
      await waitFor(() => audio.downloads.length === 1);

      expect(await service.serveEpisode('show', 'ep2')).toEqual({ type: 'unavailable', retryAfterSeconds: 30 });
      expect(await service.serveEpisode('show', 'ep1')).toEqual({ type: 'unavailable', retryAfterSeconds: 30 });

      openGate();
      expect((await running).type).toBe('file');
      expect((await service.serveEpisode('show', 'ep2')).type).toBe('file');
    });

    it('waits for the slot when an acquire timeout is configured', async () => {
      const waiting = new EpisodeService(database, storage, new StaticFeedLookup({ show: [feedEpisode('ep1'), feedEpisode('ep2')] }), scheduler, worker, {
        acquireTimeoutMs: 5_000,
        maxJobDurationMs: MAX_JOB_MS,
        now: () => new Date(clock)
      });
      const openGate = audio.gateNextDownload();
      const running = waiting.serveEpisode('show', 'ep1');
      await waitFor(() => audio.downloads.length === 1);

      const queued = waiting.serveEpisode('show', 'ep2');
      openGate();

      expect((await running).type).toBe('file');
      expect(await queued).toEqual({ type: 'file', path: join(dataDir, 'podcasts', 'show', 'episodes', 'ep2.mp3') });
      expect(audio.downloads).toHaveLength(2);
    });

    it('answers not-found for unknown feeds and episodes', async () => {
      expect(await service.serveEpisode('nope', 'ep1')).toEqual({ type: 'not-found' });
      expect(await service.serveEpisode('show', 'missing')).toEqual({ type: 'not-found' });
      expect(audio.downloads).toEqual([]);
    });
  });

  describe('reprocessEpisode', () => {
    it('resets a processed episode and runs it again in the background', async () => {
      await service.serveEpisode('show', 'ep1');

      expect(await service.reprocessEpisode('show', 'ep1')).toEqual({ status: 'started' });
      await service.drain();

      expect(audio.downloads).toHaveLength(2);
      expect(database.loadEpisodeRecord('show', 'ep1')?.status).toBe('processed');
      expect(database.getHistoryStats().completed).toBe(2);
    });

    it('only resets when the slot is taken by another episode', async () => {
      audio.failDownload = new Error('HTTP 500');
      await service.serveEpisode('show', 'ep2');
      audio.failDownload = null;

      const openGate = audio.gateNextDownload();
      const running = service.serveEpisode('show', 'ep1');
      await waitFor(() => audio.downloads.length === 2);

      expect(await service.reprocessEpisode('show', 'ep2')).toEqual({ status: 'reset' });
      expect(database.loadEpisodeRecord('show', 'ep2')).toBeNull();

      expect(await service.reprocessEpisode('show', 'ep1')).toEqual({ status: 'busy' });

      openGate();
      await running;
    });

    it('answers not-found for an unknown episode', async () => {
      expect(await service.reprocessEpisode('show', 'missing')).toEqual({ status: 'not-found' });
      expect(await service.reprocessEpisode('nope', 'ep1')).toEqual({ status: 'not-found' });
    });
  });

  describe('recoverAbandoned', () => {
    it('fails processing records that outlived the maximum job duration', () => {
      database.saveEpisodeRecord('show', 'ep1', {
        status: 'processing',
        originalUrl: 'https://cdn.example.com/ep1.mp3',
        title: 'Episode ep1',
        startedAt: new Date(clock - MAX_JOB_MS - 1)
      });
      database.saveEpisodeRecord('show', 'ep2', {
        status: 'processing',
        originalUrl: 'https://cdn.example.com/ep2.mp3',
        title: 'Episode ep2',
        startedAt: new Date(clock - 1_000)
      });

      expect(service.recoverAbandoned()).toBe(1);
      expect(database.loadEpisodeRecord('show', 'ep1')).toMatchObject({ status: 'failed', errorMessage: 'Processing abandoned' });
      expect(database.loadEpisodeRecord('show', 'ep2')?.status).toBe('processing');
    });
  });

  it('recovers a record whose lease went stale without anything clearing it', async () => {
    const openGate = audio.gateNextDownload();
    const running = service.serveEpisode('show', 'ep1');
    await waitFor(() => audio.downloads.length === 1);

    clock += MAX_JOB_MS + 1;
    expect(service.recoverAbandoned()).toBe(1);
    expect(database.loadEpisodeRecord('show', 'ep1')?.status).toBe('failed');

    openGate();
    await running;
  });

    it('does not let a run that lost its lease overwrite the newer run', async () => {
    const openFirst = audio.gateNextDownload();
    const first = service.serveEpisode('show', 'ep1');
    await waitFor(() => audio.downloads.length === 1);

    // The first run outlives the maximum duration and is written off
    clock += MAX_JOB_MS + 1;
    expect(await scheduler.isBusy()).toBe(false);
    expect(service.recoverAbandoned()).toBe(1);

    const openSecond = audio.gateNextDownload();
    expect(await service.reprocessEpisode('show', 'ep1')).toEqual({ status: 'started' });
    await waitFor(() => audio.downloads.length === 2);

    openFirst();
    expect((await first).type).toBe('file');
    expect(database.loadEpisodeRecord('show', 'ep1')?.status).toBe('processing');
    expect(database.getHistoryStats().totalRuns).toBe(0);
    expect(scheduler.isProcessing({ podcastSlug: 'show', episodeId: 'ep1' })).toBe(true);

    openSecond();
    await service.drain();
    expect(database.loadEpisodeRecord('show', 'ep1')?.status).toBe('processed');
    expect(database.getHistoryStats()).toMatchObject({ totalRuns: 1, completed: 1 });
    expect(await scheduler.isBusy()).toBe(false);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { type LeaseTicket, SlotBusyError, SlotTimeoutError } from '@podstrip/shared';
import { ProcessingScheduler } from './ProcessingScheduler';
import type { ActiveJob, JobStatusSource } from './types';

const episode = (episodeId: string) => ({ podcastSlug: 'show', episodeId });

/** Shared status held in memory, standing in for the status file. */
class MemoryStatusSource implements JobStatusSource {
  current: ActiveJob | null = null;
  failReads = false;

  async getCurrentJob(): Promise<ActiveJob | null> {
    if (this.failReads) throw new Error('status unavailable');
    return this.current;
  }

  async markStarted(ticket: LeaseTicket): Promise<void> {
    this.current = { ...ticket.job, ticketId: ticket.id, startedAt: ticket.acquiredAt };
  }

  async markFinished(ticket: LeaseTicket): Promise<void> {
    if (!this.current || this.current.ticketId === ticket.id) {
      this.current = null;
    }
  }
}

/** Lets pending acquire calls reach the point where they wait on a timer. */
async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

async function grantedTicket(scheduler: ProcessingScheduler, episodeId: string): Promise<LeaseTicket> {
  const result = await scheduler.acquire(episode(episodeId));
  if (!result.granted) throw new Error(`expected ${episodeId} to be granted`);
  return result.ticket;
}

describe('ProcessingScheduler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('refuses a second job while one is running', async () => {
    const scheduler = new ProcessingScheduler();
    await grantedTicket(scheduler, 'ep1');

    expect(await scheduler.acquire(episode('ep2'))).toEqual({ granted: false, reason: 'busy' });
    expect(await scheduler.isBusy()).toBe(true);
    expect(await scheduler.currentHolder()).toEqual(episode('ep1'));
    expect(scheduler.isProcessing(episode('ep1'))).toBe(true);
    expect(scheduler.isProcessing(episode('ep2'))).toBe(false);
  });

  it('frees the slot on release and ignores a repeated release', async () => {
    const scheduler = new ProcessingScheduler();
    const first = await grantedTicket(scheduler, 'ep1');

    scheduler.release(first);
    const second = await grantedTicket(scheduler, 'ep2');
    scheduler.release(first);

    expect(scheduler.isCurrent(second)).toBe(true);
    expect(await scheduler.currentHolder()).toEqual(episode('ep2'));
  });

  it('reports timeout when waiting runs out', async () => {
    vi.useFakeTimers();
    const scheduler = new ProcessingScheduler();
    await grantedTicket(scheduler, 'ep1');

    const waiting = scheduler.acquire(episode('ep2'), 2_000);
    await settle();
    await vi.advanceTimersByTimeAsync(2_000);

    expect(await waiting).toEqual({ granted: false, reason: 'timeout' });
  });

  it('lets a waiter in when the holder releases', async () => {
    const scheduler = new ProcessingScheduler();
    const first = await grantedTicket(scheduler, 'ep1');

    const waiting = scheduler.acquire(episode('ep2'), 5_000);
    await settle();
    scheduler.release(first);
    const result = await waiting;

    expect(result.granted).toBe(true);
    expect(await scheduler.currentHolder()).toEqual(episode('ep2'));
  });

  describe('stale leases', () => {
    it('clears a lease older than the maximum job duration', async () => {
      let clock = 0;
      const scheduler = new ProcessingScheduler({ maxJobDurationMs: 60_000, now: () => clock });
      const stale = await grantedTicket(scheduler, 'ep1');

      clock = 60_001;
      expect(await scheduler.isBusy()).toBe(false);
      expect(await scheduler.currentHolder()).toBeNull();

      const fresh = await grantedTicket(scheduler, 'ep2');
      scheduler.release(stale);
      expect(scheduler.isCurrent(fresh)).toBe(true);
      expect(scheduler.isCurrent(stale)).toBe(false);
    });

    it('does not report a stale holder as processing', async () => {
      let clock = 0;
      const scheduler = new ProcessingScheduler({ maxJobDurationMs: 60_000, now: () => clock });
      const stale = await grantedTicket(scheduler, 'ep1');

      clock = 60_001;
      expect(scheduler.isProcessing(episode('ep1'))).toBe(false);
      expect(scheduler.isCurrent(stale)).toBe(false);
    });

    it('keeps a lease at exactly the maximum duration', async () => {
      let clock = 0;
      const scheduler = new ProcessingScheduler({ maxJobDurationMs: 60_000, now: () => clock });
      await grantedTicket(scheduler, 'ep1');

      clock = 60_000;
      expect(await scheduler.currentHolder()).toEqual(episode('ep1'));
    });
  });

  describe('runExclusive', () => {
    it('releases after the callback settles', async () => {
      const scheduler = new ProcessingScheduler();
      const value = await scheduler.runExclusive(episode('ep1'), async ticket => ticket.job.episodeId);

      expect(value).toBe('ep1');
      expect(await scheduler.isBusy()).toBe(false);
    });

    it('releases when the callback throws', async () => {
      const scheduler = new ProcessingScheduler();
      await expect(
        scheduler.runExclusive(episode('ep1'), async () => {
          throw new Error('ffmpeg exited with code 1');
        })
      ).rejects.toThrow('ffmpeg exited with code 1');

      expect(await scheduler.isBusy()).toBe(false);
    });

    it('throws SlotBusyError or SlotTimeoutError when the slot is taken', async () => {
      vi.useFakeTimers();
      const scheduler = new ProcessingScheduler();
      await grantedTicket(scheduler, 'ep1');

      await expect(scheduler.runExclusive(episode('ep2'), async () => 1)).rejects.toBeInstanceOf(SlotBusyError);

      const timed = scheduler.runExclusive(episode('ep2'), async () => 1, 500);
      const assertion = expect(timed).rejects.toBeInstanceOf(SlotTimeoutError);
      await settle();
      await vi.advanceTimersByTimeAsync(500);
      await assertion;
    });
  });

  describe('with a shared status source', () => {
    it('publishes the holder and clears it on release', async () => {
      const source = new MemoryStatusSource();
      const scheduler = new ProcessingScheduler({ statusSource: source });

      const ticket = await grantedTicket(scheduler, 'ep1');
      await scheduler.flush();
      expect(source.current?.ticketId).toBe(ticket.id);

      scheduler.release(ticket);
      await scheduler.flush();
      expect(source.current).toBeNull();
    });

    it('refuses work while another worker holds the slot', async () => {
      const source = new MemoryStatusSource();
      const workerA = new ProcessingScheduler({ statusSource: source });
      const workerB = new ProcessingScheduler({ statusSource: source });

      const ticket = await grantedTicket(workerA, 'ep1');
      await workerA.flush();

      expect(await workerB.acquire(episode('ep2'))).toEqual({ granted: false, reason: 'busy' });
      expect(await workerB.isBusy()).toBe(true);

      workerA.release(ticket);
      await workerA.flush();
      expect((await workerB.acquire(episode('ep2'))).granted).toBe(true);
    });

    it('waits for another worker to finish when given a timeout', async () => {
      const source = new MemoryStatusSource();
      const workerA = new ProcessingScheduler({ statusSource: source });
      const workerB = new ProcessingScheduler({ statusSource: source, statusPollIntervalMs: 10 });
      const ticket = await grantedTicket(workerA, 'ep1');
      await workerA.flush();

      setTimeout(() => workerA.release(ticket), 50);
      const result = await workerB.acquire(episode('ep2'), 500);

      expect(result.granted).toBe(true);
      expect(await workerB.currentHolder()).toEqual(episode('ep2'));
    });

    it('times out when the other worker keeps the slot', async () => {
      const source = new MemoryStatusSource();
      const workerA = new ProcessingScheduler({ statusSource: source });
      const workerB = new ProcessingScheduler({ statusSource: source, statusPollIntervalMs: 10 });
      await grantedTicket(workerA, 'ep1');
      await workerA.flush();

      expect(await workerB.acquire(episode('ep2'), 40)).toEqual({ granted: false, reason: 'timeout' });
      expect(await workerB.currentHolder()).toBeNull();
    });

    it('drops a published local lease the source no longer reports', async () => {
      const source = new MemoryStatusSource();
      const scheduler = new ProcessingScheduler({ statusSource: source });
      const ticket = await grantedTicket(scheduler, 'ep1');
      await scheduler.flush();

      source.current = null;

      expect(await scheduler.isBusy()).toBe(false);
      expect(await scheduler.currentHolder()).toBeNull();
      expect(scheduler.isCurrent(ticket)).toBe(false);
    });

    it('keeps local state when the source cannot be read', async () => {
      const source = new MemoryStatusSource();
      const scheduler = new ProcessingScheduler({ statusSource: source });
      await grantedTicket(scheduler, 'ep1');
      await scheduler.flush();

      source.failReads = true;
      expect(await scheduler.isBusy()).toBe(true);
      expect((await scheduler.acquire(episode('ep2'))).granted).toBe(false);
    });
  });
});

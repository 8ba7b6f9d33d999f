import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { hostname, tmpdir } from 'os';
import { join } from 'path';
import type { LeaseTicket } from '@podstrip/shared';
import { FileStatusSource } from './FileStatusSource';

const ticket = (id: string, episodeId: string, acquiredAt = 1_000): LeaseTicket => ({
  id,
  job: { podcastSlug: 'show', episodeId },
  acquiredAt
});

describe('FileStatusSource', () => {
  let dataDir: string;
  let clock: number;
  let source: FileStatusSource;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'status-source-'));
    clock = 2_000;
    source = new FileStatusSource({ dataDir, maxJobDurationMs: 60_000, now: () => clock });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('reads no job before anything is written', async () => {
    expect(await source.getCurrentJob()).toBeNull();
  });

  it('records the running job with this process as owner', async () => {
    await source.markStarted(ticket('t1', 'ep1'));

    expect(await source.getCurrentJob()).toEqual({
      podcastSlug: 'show',
      episodeId: 'ep1',
      ticketId: 't1',
      startedAt: 1_000,
      pid: process.pid,
      hostname: hostname()
    });
  });

  it('only clears the job for the ticket that started it', async () => {
    await source.markStarted(ticket('t2', 'ep2'));

    await source.markFinished(ticket('t1', 'ep1'));
    expect((await source.getCurrentJob())?.ticketId).toBe('t2');

    await source.markFinished(ticket('t2', 'ep2'));
    expect(await source.getCurrentJob()).toBeNull();

    const stored: unknown = JSON.parse(await readFile(source.path, 'utf-8'));
    expect(stored).toEqual({ currentJob: null, updatedAt: new Date(2_000).toISOString() });
  });

  it('treats a job past the maximum duration as finished', async () => {
    await source.markStarted(ticket('t1', 'ep1'));

    clock = 1_000 + 60_001;
    expect(await source.getCurrentJob()).toBeNull();
  });

  it('treats a job left by a dead process on this host as finished', async () => {
    await writeFile(source.path, JSON.stringify({
      currentJob: {
        podcastSlug: 'show',
        episodeId: 'ep1',
        ticketId: 't1',
        startedAt: 1_000,
        pid: 99_999_999,
        hostname: hostname()
      },
      updatedAt: new Date(1_000).toISOString()
    }));

    expect(await source.getCurrentJob()).toBeNull();
  });

  it('ignores a malformed status file', async () => {
    await writeFile(source.path, '{"currentJob": 12');
    expect(await source.getCurrentJob()).toBeNull();

    await writeFile(source.path, JSON.stringify({ currentJob: { podcastSlug: 'show' }, updatedAt: 'x' }));
    expect(await source.getCurrentJob()).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

import { promises as fs } from 'fs';
import { hostname } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { type LeaseTicket, formatError } from '@podstrip/shared';
import type { ActiveJob, JobStatusSource } from './types';

const ActiveJobSchema = z.object({
  podcastSlug: z.string(),
  episodeId: z.string(),
  ticketId: z.string(),
  startedAt: z.number(),
  pid: z.number().int().optional(),
  hostname: z.string().optional()
});

const StatusFileSchema = z.object({
  currentJob: ActiveJobSchema.nullable(),
  updatedAt: z.string()
});

type StatusFile = z.infer<typeof StatusFileSchema>;

export interface FileStatusSourceOptions {
  dataDir: string;
  maxJobDurationMs: number;
  now?: () => number;
}

/**
 * Shares the running job between worker processes through `status.json`
 * in the data directory. Entries past the max job duration, or left by a
 * dead process on this host, read as no job.
 */
export class FileStatusSource implements JobStatusSource {
  private filePath: string;
  private maxJobDurationMs: number;
  private now: () => number;

  constructor(options: FileStatusSourceOptions) {
    this.filePath = join(options.dataDir, 'status.json');
    this.maxJobDurationMs = options.maxJobDurationMs;
    this.now = options.now ?? Date.now;
  }

  get path(): string {
    return this.filePath;
  }

  async getCurrentJob(): Promise<ActiveJob | null> {
    const status = await this.read();
    const job = status?.currentJob;
    if (!job) {
      return null;
    }

    if (this.now() - job.startedAt > this.maxJobDurationMs) {
      return null;
    }
    if (job.pid !== undefined && job.hostname === hostname() && !isProcessAlive(job.pid)) {
      return null;
    }
    return job;
  }

  async markStarted(ticket: LeaseTicket): Promise<void> {
    await this.write({
      currentJob: {
        podcastSlug: ticket.job.podcastSlug,
        episodeId: ticket.job.episodeId,
        ticketId: ticket.id,
        startedAt: ticket.acquiredAt,
        pid: process.pid,
        hostname: hostname()
      },
      updatedAt: new Date(this.now()).toISOString()
    });
  }

  async markFinished(ticket: LeaseTicket): Promise<void> {
    const status = await this.read();
    if (status?.currentJob && status.currentJob.ticketId !== ticket.id) {
      return;
    }

    await this.write({ currentJob: null, updatedAt: new Date(this.now()).toISOString() });
  }

  private async read(): Promise<StatusFile | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      const parsed = StatusFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`Ignoring malformed status file ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    } catch (error) {
      console.warn(`Ignoring unreadable status file ${this.filePath}: ${formatError(error)}`);
    }
    return null;
  }

  private async write(status: StatusFile): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.mkdir(join(this.filePath, '..'), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(status, null, 2));
    await fs.rename(tempPath, this.filePath);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

import { randomUUID } from 'crypto';
import type { JobIdentity, LeaseTicket } from '@podstrip/shared';

interface Waiter {
  job: JobIdentity;
  grant: (ticket: LeaseTicket) => void;
}

/**
 * One processing slot. The slot is taken exactly when a ticket is
 * recorded, so holder identity and acquisition time can never drift apart
 * from the lock itself.
 *
 * Handing the slot to a waiter happens synchronously inside `release` /
 * `forceClear`: the waiter's ticket is installed before control returns.
 */
export class ProcessingLease {
  private ticket: LeaseTicket | null = null;
  private waiters: Waiter[] = [];

  constructor(private now: () => number = Date.now) {}

  get current(): LeaseTicket | null {
    return this.ticket;
  }

  get holder(): JobIdentity | null {
    return this.ticket?.job ?? null;
  }

  get acquiredAt(): number | null {
    return this.ticket?.acquiredAt ?? null;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  isCurrent(ticket: LeaseTicket): boolean {
    return this.ticket !== null && this.ticket.id === ticket.id;
  }

  isStale(maxDurationMs: number): boolean {
    if (!this.ticket) return false;
    return this.now() - this.ticket.acquiredAt > maxDurationMs;
  }

  tryAcquire(job: JobIdentity): LeaseTicket | null {
    if (this.ticket) return null;
    this.ticket = this.issue(job);
    return this.ticket;
  }

  acquire(job: JobIdentity, timeoutMs: number): Promise<LeaseTicket | null> {
    const immediate = this.tryAcquire(job);
    if (immediate || timeoutMs <= 0) {
      return Promise.resolve(immediate);
    }

    return new Promise(resolve => {
      const waiter: Waiter = {
        job,
        grant: ticket => {
          clearTimeout(timer);
          resolve(ticket);
        }
      };

      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        resolve(null);
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  /**
   * Frees the slot if `ticket` still owns it. A stale or repeated release
   * returns false and changes nothing.
   */
  release(ticket: LeaseTicket): boolean {
    if (!this.isCurrent(ticket)) return false;
    this.handOff();
    return true;
  }

  /** Drops the current holder regardless of ownership. Returns the dropped ticket. */
  forceClear(): LeaseTicket | null {
    const dropped = this.ticket;
    if (dropped) {
      this.handOff();
    }
    return dropped;
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.ticket = null;
      return;
    }

    this.ticket = this.issue(next.job);
    next.grant(this.ticket);
  }

  private issue(job: JobIdentity): LeaseTicket {
    return Object.freeze({
      id: randomUUID(),
      job: { podcastSlug: job.podcastSlug, episodeId: job.episodeId },
      acquiredAt: this.now()
    });
  }
}

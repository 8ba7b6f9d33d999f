import { describe, it, expect } from 'vitest';
import { type EpisodeRecord, InvalidTransitionError } from '@podstrip/shared';
import { decideServe, isAbandoned, statusOf, transition } from './EpisodeLifecycle';

const at = new Date('2024-05-01T10:00:00Z');

const processing: EpisodeRecord = {
  status: 'processing',
  originalUrl: 'https://cdn.example.com/ep1.mp3',
  title: 'Episode 1',
  startedAt: at
};

const processed: EpisodeRecord = {
  status: 'processed',
  originalUrl: 'https://cdn.example.com/ep1.mp3',
  title: 'Episode 1',
  processedAt: at,
  processedFile: 'episodes/ep1.mp3',
  originalDuration: 3600,
  newDuration: 3480,
  adsRemoved: 2
};

const failed: EpisodeRecord = {
  status: 'failed',
  originalUrl: 'https://cdn.example.com/ep1.mp3',
  title: 'Episode 1',
  failedAt: at,
  errorMessage: 'download failed: HTTP 404'
};

describe('decideServe', () => {
  it.each([
    ['new episode, idle slot', null, false, false, { kind: 'process', reason: 'new' }],
    ['new episode, busy slot', null, false, true, { kind: 'busy', reason: 'slot-busy' }],
    ['processed with audio', processed, true, true, { kind: 'serve-cached', processedFile: 'episodes/ep1.mp3' }],
    ['processed, audio gone, idle', processed, false, false, { kind: 'process', reason: 'artifact-missing' }],
    ['processed, audio gone, busy', processed, false, true, { kind: 'busy', reason: 'slot-busy' }],
    ['failed, idle slot', failed, false, false, { kind: 'redirect-original', url: 'https://cdn.example.com/ep1.mp3' }],
    ['failed, busy slot', failed, false, true, { kind: 'redirect-original', url: 'https://cdn.example.com/ep1.mp3' }],
    ['processing, idle slot', processing, false, false, { kind: 'busy', reason: 'processing' }],
    ['processing, busy slot', processing, false, true, { kind: 'busy', reason: 'processing' }]
  ] as const)('%s', (_name, record, artifactExists, slotBusy, expected) => {
    expect(decideServe({ record, artifactExists, slotBusy })).toEqual(expected);
  });

  it('answers not-found for a failed record without a source url', () => {
    expect(decideServe({ record: { ...failed, originalUrl: '' }, artifactExists: false, slotBusy: false }))
      .toEqual({ kind: 'not-found' });
  });
});

describe('transition', () => {
  const start = { type: 'start', originalUrl: 'https://cdn.example.com/ep1.mp3', title: 'Episode 1', at } as const;

  it('starts a new or previously processed episode', () => {
    expect(transition(null, start)).toEqual(processing);
    expect(transition(processed, start)).toEqual(processing);
  });

  it('completes a running episode', () => {
    expect(transition(processing, {
      type: 'succeed',
      at,
      processedFile: 'episodes/ep1.mp3',
      originalDuration: 3600,
      newDuration: 3480,
      adsRemoved: 2
    })).toEqual(processed);
  });

  it('fails a running episode', () => {
    expect(transition(processing, { type: 'fail', at, errorMessage: 'download failed: HTTP 404' })).toEqual(failed);
  });

  it('resets anything but a running episode to none', () => {
    expect(transition(processed, { type: 'reset' })).toBeNull();
    expect(transition(failed, { type: 'reset' })).toBeNull();
    expect(transition(null, { type: 'reset' })).toBeNull();
  });

  it('rejects transitions the lifecycle does not allow', () => {
    expect(() => transition(processing, start)).toThrow(InvalidTransitionError);
    expect(() => transition(failed, start)).toThrow('Invalid episode transition: start from failed');
    expect(() => transition(null, { type: 'fail', at, errorMessage: 'x' })).toThrow(InvalidTransitionError);
    expect(() => transition(processing, { type: 'reset' })).toThrow('Invalid episode transition: reset from processing');
  });

  it('names the status of a missing record none', () => {
    expect(statusOf(null)).toBe('none');
    expect(statusOf(failed)).toBe('failed');
  });
});

describe('isAbandoned', () => {
  it('flags processing records older than the maximum duration', () => {
    const later = new Date(at.getTime() + 60_001);
    expect(isAbandoned(processing, later, 60_000)).toBe(true);
    expect(isAbandoned(processing, new Date(at.getTime() + 60_000), 60_000)).toBe(false);
    expect(isAbandoned(processed, later, 60_000)).toBe(false);
  });
});

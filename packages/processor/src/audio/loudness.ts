import {
  type AudioSegmentSignal,
  type LoudnessFrame,
  SignalType,
  createSignal
} from '@podstrip/shared';
import { SILENCE_FLOOR_LUFS, type VolumeAnalyzerOptions } from './types';

export interface FrameWindow {
  start: number;
  duration: number;
}

/** Fixed windows covering `[0, totalDuration)`; a final fragment under 1s is dropped. */
export function planFrames(totalDuration: number, frameDuration: number): FrameWindow[] {
  if (!(frameDuration > 0) || !Number.isFinite(totalDuration)) {
    return [];
  }

  const windows: FrameWindow[] = [];
  for (let index = 0; index * frameDuration < totalDuration; index++) {
    const start = index * frameDuration;
    const duration = Math.min(frameDuration, totalDuration - start);
    if (duration < 1) break;
    windows.push({ start, duration });
  }
  return windows;
}

/**
 * Median loudness over non-silent frames: the upper middle element for an
 * even count. `null` when every frame is at or below the silence floor.
 */
export function computeBaseline(frames: LoudnessFrame[]): number | null {
  const values = frames
    .map(frame => frame.loudnessLufs)
    .filter(value => value > SILENCE_FLOOR_LUFS)
    .sort((a, b) => a - b);

  if (values.length === 0) {
    return null;
  }
  return values[Math.floor(values.length / 2)];
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

interface OpenRun {
  start: number;
  direction: 'increase' | 'decrease';
  deviations: number[];
}

/**
 * Walks frames in order and reports runs whose loudness stays more than
 * `thresholdDb` from the baseline for at least `minAnomalyDuration`.
 * A run ends where the first in-threshold frame starts.
 */
export function findAnomalies(
  frames: LoudnessFrame[],
  baseline: number,
  options: Pick<VolumeAnalyzerOptions, 'thresholdDb' | 'minAnomalyDuration'>
): AudioSegmentSignal[] {
  const anomalies: AudioSegmentSignal[] = [];
  let run: OpenRun | null = null;

  const close = (current: OpenRun, end: number): void => {
    if (end - current.start < options.minAnomalyDuration) {
      return;
    }

    const meanDeviation = current.deviations.reduce((sum, value) => sum + value, 0) / current.deviations.length;
    const confidence = Math.min(0.5 + meanDeviation / 10, 0.95);
    const signalType = current.direction === 'increase' ? SignalType.VolumeIncrease : SignalType.VolumeDecrease;

    anomalies.push(createSignal(current.start, end, signalType, confidence, {
      deviationDb: round1(meanDeviation),
      baselineLufs: round1(baseline),
      direction: current.direction
    }));
  };

  for (const frame of frames) {
    const deviation = frame.loudnessLufs - baseline;

    if (Math.abs(deviation) > options.thresholdDb) {
      if (!run) {
        run = { start: frame.start, direction: deviation > 0 ? 'increase' : 'decrease', deviations: [] };
      }
      run.deviations.push(Math.abs(deviation));
    } else if (run) {
      close(run, frame.start);
      run = null;
    }
  }

  if (run && frames.length > 0) {
    close(run, frames[frames.length - 1].end);
  }

  return anomalies;
}

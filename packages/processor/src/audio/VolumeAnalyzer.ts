import { promises as fs } from 'fs';
import {
  type AudioAnalysisResult,
  type LoudnessFrame,
  emptyAnalysisResult,
  formatError
} from '@podstrip/shared';
import { computeBaseline, findAnomalies, planFrames } from './loudness';
import {
  DEFAULT_VOLUME_OPTIONS,
  FALLBACK_MEASUREMENT,
  SILENCE_FLOOR_LUFS,
  type LoudnessMeter,
  type VolumeAnalyzerOptions
} from './types';
import type { VolumeAnalysis } from '../jobs/types';

/**
 * Finds stretches mastered noticeably louder or quieter than the episode's
 * median loudness. Inserted ads are often louder and more compressed than
 * host content.
 *
 * Never throws: a missing file, a clip shorter than one frame or a failed
 * measurement all come back as a result without signals.
 */
export class VolumeAnalyzer implements VolumeAnalysis {
  private options: VolumeAnalyzerOptions;

  constructor(private meter: LoudnessMeter, options: Partial<VolumeAnalyzerOptions> = {}) {
    this.options = { ...DEFAULT_VOLUME_OPTIONS, ...options };
  }

  async analyze(audioPath: string): Promise<AudioAnalysisResult> {
    const startTime = Date.now();
    const result = emptyAnalysisResult();
    const finish = (): AudioAnalysisResult => {
      result.analysisTimeSeconds = (Date.now() - startTime) / 1000;
      return result;
    };

    try {
      await fs.access(audioPath);
    } catch {
      console.error(`Audio file not found for volume analysis: ${audioPath}`);
      result.errors.push(`Audio file not found: ${audioPath}`);
      return finish();
    }

    let duration: number;
    try {
      duration = await this.meter.getDuration(audioPath);
    } catch (error) {
      result.errors.push(`Duration probe failed: ${formatError(error)}`);
      return finish();
    }

    if (duration < this.options.frameDuration) {
      console.warn(`Audio too short for volume analysis: ${duration}s`);
      return finish();
    }

    console.log(`📈 Analyzing volume for ${duration.toFixed(1)}s audio (${(duration / 60).toFixed(1)} min)`);

    const frames = await this.measureFrames(audioPath, duration, result.errors);
    const baseline = computeBaseline(frames);
    if (baseline === null) {
      console.warn('No valid loudness measurements');
      return finish();
    }

    result.loudnessBaseline = baseline;
    result.signals = findAnomalies(frames, baseline, this.options);
    console.log(`📊 Loudness baseline ${baseline.toFixed(1)} LUFS, ${result.signals.length} volume anomalies`);
    return finish();
  }

  private async measureFrames(audioPath: string, duration: number, errors: string[]): Promise<LoudnessFrame[]> {
    const frames: LoudnessFrame[] = [];
    let failures = 0;

    for (const window of planFrames(duration, this.options.frameDuration)) {
      let measurement = FALLBACK_MEASUREMENT;
      try {
        measurement = await this.meter.measureLoudness(audioPath, window.start, window.duration);
      } catch (error) {
        failures++;
        if (failures === 1) {
          console.warn(`Loudness measurement failed at ${window.start.toFixed(1)}s: ${formatError(error)}`);
        }
      }

      frames.push({
        start: window.start,
        end: window.start + window.duration,
        // digital silence measures as -inf
        loudnessLufs: Number.isFinite(measurement.loudnessLufs) ? measurement.loudnessLufs : SILENCE_FLOOR_LUFS,
        peakDbfs: Number.isFinite(measurement.peakDbfs) ? measurement.peakDbfs : SILENCE_FLOOR_LUFS
      });
    }

    if (failures > 0) {
      errors.push(`${failures} of ${frames.length} loudness measurements failed`);
    }
    return frames;
  }
}

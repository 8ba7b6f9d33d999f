export interface LoudnessMeasurement {
  loudnessLufs: number;
  peakDbfs: number;
}

/**
 * Measures integrated loudness over part of a file. Implemented over ffmpeg
 * in production and by fakes in tests.
 */
export interface LoudnessMeter {
  getDuration(audioPath: string): Promise<number>;
  measureLoudness(audioPath: string, start: number, duration: number): Promise<LoudnessMeasurement>;
}

export interface VolumeAnalyzerOptions {
  /** seconds per measured window */
  frameDuration: number;
  thresholdDb: number;
  /** shortest run, in seconds, reported as a signal */
  minAnomalyDuration: number;
}

export const DEFAULT_VOLUME_OPTIONS: VolumeAnalyzerOptions = {
  frameDuration: 5,
  thresholdDb: 3,
  minAnomalyDuration: 15
};

/** Loudness at or below this is silence and never counts toward the baseline. */
export const SILENCE_FLOOR_LUFS = -70;

export const FALLBACK_MEASUREMENT: LoudnessMeasurement = {
  loudnessLufs: -24,
  peakDbfs: -1
};

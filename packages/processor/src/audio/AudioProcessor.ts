import { promises as fs } from 'fs';
import { join } from 'path';
import { type AdRange, formatError } from '@podstrip/shared';
import { FFmpegWrapper } from './FFmpegWrapper';
import type { AudioEditor } from '../jobs/types';
import type { LoudnessMeasurement, LoudnessMeter } from './types';

export interface AudioProcessingOptions {
  tempDirectory: string;
  ffmpegPath?: string;
  timeoutMs?: number;
}

export interface KeepSegment {
  start: number;
  duration: number;
}

/**
 * Audio stretches left after cutting `ads` out of `[0, totalDuration)`.
 * Overlapping ads are merged and segments under a second dropped.
 */
export function buildKeepSegments(ads: AdRange[], totalDuration: number): KeepSegment[] {
  const sortedAds = [...ads].sort((a, b) => a.start - b.start);
  const segments: KeepSegment[] = [];
  let currentTime = 0;

  for (const ad of sortedAds) {
    if (ad.start > currentTime) {
      segments.push({ start: currentTime, duration: ad.start - currentTime });
    }
    currentTime = Math.max(currentTime, ad.end);
  }

  if (currentTime < totalDuration) {
    segments.push({ start: currentTime, duration: totalDuration - currentTime });
  }

  return segments.filter(segment => segment.duration >= 1);
}

export function parseDuration(output: string): number {
  const match = output.match(/Duration: (\d{2}):(\d{2}):(\d{2}(?:\.\d+)?)/);
  if (!match) {
    throw new Error('Could not parse duration from FFmpeg output');
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseFloat(match[3]);
  return hours * 3600 + minutes * 60 + seconds;
}

/** Reads `input_i` and `input_tp` from the JSON block the loudnorm filter prints last. */
export function parseLoudnormOutput(output: string): LoudnessMeasurement {
  const start = output.lastIndexOf('{');
  const end = output.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new Error('No loudnorm JSON in FFmpeg output');
  }

  const parsed: unknown = JSON.parse(output.slice(start, end + 1));
  if (typeof parsed !== 'object' || parsed === null || !('input_i' in parsed) || !('input_tp' in parsed)) {
    throw new Error('loudnorm output missing input_i/input_tp');
  }

  return {
    loudnessLufs: parseLevel(parsed.input_i),
    peakDbfs: parseLevel(parsed.input_tp)
  };
}

function parseLevel(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '-inf') return -Infinity;
    if (trimmed === 'inf') return Infinity;
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new Error(`Unparseable loudness value: ${String(value)}`);
}

export class AudioProcessor implements AudioEditor, LoudnessMeter {
  private ffmpeg: FFmpegWrapper;
  private tempDirectory: string;

  constructor(options: AudioProcessingOptions) {
    this.tempDirectory = options.tempDirectory;
    this.ffmpeg = new FFmpegWrapper(options.ffmpegPath, options.timeoutMs);
  }

  async isAvailable(): Promise<boolean> {
    return this.ffmpeg.checkFFmpegAvailable();
  }

  async downloadAudio(url: string, key: string): Promise<string> {
    const outputPath = join(this.tempDirectory, `${key}_original.mp3`);
    await fs.mkdir(this.tempDirectory, { recursive: true });

    const args = [
      '-i', url,
      '-acodec', 'libmp3lame',
      '-ab', '128k',
      '-ar', '44100',
      '-ac', '2',
      '-f', 'mp3',
      '-y',
      outputPath
    ];

    try {
      await this.ffmpeg.run(args, `Downloading audio from ${url}`);
      return outputPath;
    } catch (error) {
      await this.cleanup(outputPath);
      throw new Error(`Failed to download audio: ${formatError(error)}`);
    }
  }

  async removeAds(inputPath: string, ads: AdRange[]): Promise<string> {
    const outputPath = inputPath.replace(/(_original)?\.mp3$/, '_processed.mp3');

    if (ads.length === 0) {
      await fs.copyFile(inputPath, outputPath);
      return outputPath;
    }

    const segments = buildKeepSegments(ads, await this.getDuration(inputPath));
    if (segments.length === 0) {
      throw new Error('No valid segments found after ad removal');
    }

    const segmentFiles: string[] = [];
    try {
      for (let i = 0; i < segments.length; i++) {
        const segment = segments[i];
        const segmentFile = join(this.tempDirectory, `segment_${i}_${Date.now()}.mp3`);
        await this.extractSegment(inputPath, segmentFile, segment.start, segment.duration);
        segmentFiles.push(segmentFile);
      }

      await this.concatenateSegments(segmentFiles, outputPath);
      return outputPath;
    } finally {
      await Promise.all(segmentFiles.map(file => this.cleanup(file)));
    }
  }

  async getDuration(filePath: string): Promise<number> {
    const output = await this.ffmpeg.run(['-i', filePath, '-f', 'null', '-']);
    return parseDuration(output);
  }

  async measureLoudness(audioPath: string, start: number, duration: number): Promise<LoudnessMeasurement> {
    const output = await this.ffmpeg.run([
      '-ss', start.toString(),
      '-t', duration.toString(),
      '-i', audioPath,
      '-af', 'loudnorm=print_format=json',
      '-f', 'null',
      '-'
    ]);
    return parseLoudnormOutput(output);
  }

  private async extractSegment(inputPath: string, outputPath: string, startTime: number, duration: number): Promise<void> {
    await this.ffmpeg.run(
      ['-i', inputPath, '-ss', startTime.toString(), '-t', duration.toString(), '-acodec', 'copy', '-y', outputPath],
      `Extracting segment from ${startTime}s for ${duration}s`
    );
  }

  private async concatenateSegments(segmentFiles: string[], outputPath: string): Promise<void> {
    const concatFile = join(this.tempDirectory, `concat_${Date.now()}.txt`);
    const concatContent = segmentFiles.map(file => `file '${file.replace(/'/g, "'\\''")}'`).join('\n');

    await fs.writeFile(concatFile, concatContent, 'utf8');

    try {
      await this.ffmpeg.run(
        ['-f', 'concat', '-safe', '0', '-i', concatFile, '-c', 'copy', '-y', outputPath],
        `Concatenating ${segmentFiles.length} segments`
      );
    } finally {
      await this.cleanup(concatFile);
    }
  }

  async cleanup(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        console.warn(`Failed to cleanup file ${filePath}: ${formatError(error)}`);
      }
    }
  }
}

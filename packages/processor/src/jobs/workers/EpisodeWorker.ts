import {
  type AdDetectionResult,
  type AdRange,
  type AudioAnalysisResult,
  type AudioSegmentSignal,
  type PipelineStage,
  type TranscriptSegment,
  DownstreamFailureError,
  emptyAnalysisResult,
  formatError,
  formatMinutes,
  formatTime,
  jobKey,
  parseTranscript,
  segmentsToText
} from '@podstrip/shared';
import type {
  AdDetector,
  AudioEditor,
  EpisodeArtifactStore,
  EpisodeJobData,
  EpisodeJobResult,
  Transcriber,
  VolumeAnalysis
} from '../types';

export interface EpisodeWorkerDependencies {
  audio: AudioEditor;
  transcriber: Transcriber;
  adDetector: AdDetector;
  storage: EpisodeArtifactStore;
  volumeAnalyzer?: VolumeAnalysis;
}

/**
 * Runs the processing pipeline for one episode: download, transcribe,
 * analyze loudness, detect ads, cut. The caller must hold the processing
 * slot for the whole run.
 */
export class EpisodeWorker {
  constructor(private deps: EpisodeWorkerDependencies) {}

  async process(data: EpisodeJobData): Promise<EpisodeJobResult> {
    const { job, audioUrl, episodeTitle, podcastName } = data;
    const { podcastSlug, episodeId } = job;
    const prefix = `[${jobKey(job)}]`;
    const startTime = Date.now();
    const tempFiles: string[] = [];

    console.log(`🔧 ${prefix} Processing "${episodeTitle}"`);

    try {
      console.log(`⬇️  ${prefix} Stage 1/5: Downloading audio from ${audioUrl}`);
      const audioPath = await this.stage('download', () => this.deps.audio.downloadAudio(audioUrl, `${podcastSlug}-${episodeId}`));
      tempFiles.push(audioPath);

      console.log(`🎤 ${prefix} Stage 2/5: Transcribing`);
      const segments = await this.stage('transcribe', () => this.loadOrTranscribe(data, audioPath));
      console.log(`✅ ${prefix} Transcript ready: ${segments.length} segments`);

      console.log(`📈 ${prefix} Stage 3/5: Analyzing loudness`);
      const analysis = await this.analyze(data, audioPath);

      console.log(`🎯 ${prefix} Stage 4/5: Detecting ads`);
      const ads = await this.detect(data, segments, analysis.signals, podcastName, episodeTitle);

      if (ads.length > 0) {
        console.log(`📍 ${prefix} Detected ad segments:`);
        ads.forEach((ad, index) => {
          console.log(`   • Ad ${index + 1}: ${formatTime(ad.start)} - ${formatTime(ad.end)} (${ad.reason})`);
        });
      } else {
        console.log(`🎉 ${prefix} No ads detected in this episode`);
      }

      console.log(`✂️  ${prefix} Stage 5/5: Removing ${ads.length} ad segments`);
      const { processedFile, originalDuration, newDuration } = await this.stage('cut', async () => {
        const originalDuration = await this.deps.audio.getDuration(audioPath);
        const processedPath = await this.deps.audio.removeAds(audioPath, ads);
        if (processedPath !== audioPath) {
          tempFiles.push(processedPath);
        }
        const newDuration = await this.deps.audio.getDuration(processedPath);
        const processedFile = await this.deps.storage.storeEpisodeAudio(podcastSlug, episodeId, processedPath);
        return { processedFile, originalDuration, newDuration };
      });

      const totalTime = (Date.now() - startTime) / 1000;
      console.log(`🏁 ${prefix} Completed in ${totalTime.toFixed(1)}s: ${formatTime(originalDuration)} -> ${formatTime(newDuration)} (saved ${formatMinutes(originalDuration - newDuration)})`);

      return { processedFile, originalDuration, newDuration, ads, signals: analysis.signals };
    } finally {
      for (const file of tempFiles) {
        await this.deps.audio.cleanup(file);
      }
    }
  }

  private async stage<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof DownstreamFailureError) {
        throw error;
      }
      throw new DownstreamFailureError(stage, error);
    }
  }

  private async loadOrTranscribe(data: EpisodeJobData, audioPath: string): Promise<TranscriptSegment[]> {
    const { podcastSlug, episodeId } = data.job;
    const stored = await this.deps.storage.loadTranscript(podcastSlug, episodeId);
    if (stored) {
      const segments = parseTranscript(stored);
      if (segments.length > 0) {
        console.log(`♻️  [${podcastSlug}:${episodeId}] Reusing stored transcript`);
        return segments;
      }
    }

    const segments = await this.deps.transcriber.transcribe(audioPath);
    await this.deps.storage.saveTranscript(podcastSlug, episodeId, segmentsToText(segments));
    return segments;
  }

  /** Loudness analysis is advisory; any failure yields no signals. */
  private async analyze(data: EpisodeJobData, audioPath: string): Promise<AudioAnalysisResult> {
    const analyzer = this.deps.volumeAnalyzer;
    if (!analyzer) {
      return emptyAnalysisResult();
    }

    const { podcastSlug, episodeId } = data.job;
    try {
      const result = await analyzer.analyze(audioPath);
      console.log(`📊 [${podcastSlug}:${episodeId}] ${result.signals.length} volume signals`);
      await this.deps.storage.saveAnalysis(podcastSlug, episodeId, result);
      return result;
    } catch (error) {
      console.warn(`[${podcastSlug}:${episodeId}] Volume analysis failed: ${formatError(error)}`);
      return { ...emptyAnalysisResult(), errors: [formatError(error)] };
    }
  }

  private async detect(
    data: EpisodeJobData,
    segments: TranscriptSegment[],
    signals: AudioSegmentSignal[],
    podcastName: string,
    episodeTitle: string
  ): Promise<AdRange[]> {
    const { podcastSlug, episodeId } = data.job;
    let result: AdDetectionResult;
    try {
      result = await this.deps.adDetector.detectAds(segments, podcastName, episodeTitle, signals);
    } catch (error) {
      result = { ads: [], error: formatError(error) };
    }
    if (result.error) {
      console.warn(`[${podcastSlug}:${episodeId}] Ad detection error, continuing with ${result.ads.length} ads: ${result.error}`);
    }

    try {
      await this.deps.storage.saveAdDetection(podcastSlug, episodeId, result);
    } catch (error) {
      console.warn(`[${podcastSlug}:${episodeId}] Failed to save ad detection: ${formatError(error)}`);
    }
    return result.ads;
  }
}

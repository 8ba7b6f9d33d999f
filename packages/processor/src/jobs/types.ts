import type {
  AdDetectionResult,
  AdRange,
  AudioAnalysisResult,
  AudioSegmentSignal,
  EpisodeRecord,
  JobIdentity,
  LeaseTicket,
  ProcessingHistoryEntry,
  TranscriptSegment
} from '@podstrip/shared';

export interface ActiveJob extends JobIdentity {
  ticketId: string;
  startedAt: number;
  pid?: number;
  hostname?: string;
}

/**
 * The cross-worker view of which job is running. Every worker reads the
 * same source; the scheduler trusts it over its own lease when they disagree.
 */
export interface JobStatusSource {
  getCurrentJob(): Promise<ActiveJob | null>;
  markStarted(ticket: LeaseTicket): Promise<void>;
  /** Clears the current job only if it still belongs to this ticket. */
  markFinished(ticket: LeaseTicket): Promise<void>;
}

export interface EpisodeRepository {
  loadEpisodeRecord(podcastSlug: string, episodeId: string): EpisodeRecord | null;
  saveEpisodeRecord(podcastSlug: string, episodeId: string, record: EpisodeRecord | null): void;
  recordHistory(entry: Omit<ProcessingHistoryEntry, 'id'>): number;
  listProcessingEpisodes(): Array<{ podcastSlug: string; episodeId: string; record: EpisodeRecord }>;
}

export interface AudioEditor {
  downloadAudio(url: string, key: string): Promise<string>;
  removeAds(inputPath: string, ads: AdRange[]): Promise<string>;
  getDuration(filePath: string): Promise<number>;
  cleanup(filePath: string): Promise<void>;
}

export interface Transcriber {
  transcribe(audioPath: string): Promise<TranscriptSegment[]>;
}

export interface AdDetector {
  detectAds(
    segments: TranscriptSegment[],
    podcastName: string,
    episodeTitle: string,
    signals?: AudioSegmentSignal[]
  ): Promise<AdDetectionResult>;
}

export interface VolumeAnalysis {
  analyze(audioPath: string): Promise<AudioAnalysisResult>;
}

export interface EpisodeArtifactStore {
  loadTranscript(podcastSlug: string, episodeId: string): Promise<string | null>;
  saveTranscript(podcastSlug: string, episodeId: string, transcript: string): Promise<void>;
  saveAdDetection(podcastSlug: string, episodeId: string, result: AdDetectionResult): Promise<void>;
  saveAnalysis(podcastSlug: string, episodeId: string, result: AudioAnalysisResult): Promise<void>;
  storeEpisodeAudio(podcastSlug: string, episodeId: string, sourcePath: string): Promise<string>;
  resolveProcessedFile(podcastSlug: string, processedFile: string): string;
  artifactExists(podcastSlug: string, processedFile: string): Promise<boolean>;
}

export interface EpisodeJobData {
  job: JobIdentity;
  ticket: LeaseTicket;
  audioUrl: string;
  episodeTitle: string;
  podcastName: string;
}

export interface EpisodeJobResult {
  processedFile: string;
  originalDuration: number;
  newDuration: number;
  ads: AdRange[];
  signals: AudioSegmentSignal[];
}

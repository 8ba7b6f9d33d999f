export type EpisodeStatus = 'none' | 'processing' | 'processed' | 'failed';

interface EpisodeRecordBase {
  originalUrl: string;
  title: string;
}

export interface ProcessingEpisodeRecord extends EpisodeRecordBase {
  status: 'processing';
  startedAt: Date;
}

export interface ProcessedEpisodeRecord extends EpisodeRecordBase {
  status: 'processed';
  processedAt: Date;
  /** path of the edited audio, relative to the podcast's storage directory */
  processedFile: string;
  originalDuration: number;
  newDuration: number;
  adsRemoved: number;
}

export interface FailedEpisodeRecord extends EpisodeRecordBase {
  status: 'failed';
  failedAt: Date;
  errorMessage: string;
}

/**
 * Persisted per-episode state. A missing record means status `none`.
 */
export type EpisodeRecord =
  | ProcessingEpisodeRecord
  | ProcessedEpisodeRecord
  | FailedEpisodeRecord;

export interface StoredFeed {
  slug: string;
  sourceUrl: string;
  title?: string;
  lastCheckedAt?: Date;
  createdAt: Date;
}

export interface StoredEpisode {
  podcastSlug: string;
  episodeId: string;
  record: EpisodeRecord;
  updatedAt: Date;
}

export interface ProcessingHistoryEntry {
  id: number;
  podcastSlug: string;
  episodeId: string;
  title: string;
  status: 'completed' | 'failed';
  startedAt: Date;
  finishedAt: Date;
  durationSeconds: number;
  adsDetected: number;
  originalDuration?: number;
  newDuration?: number;
  errorMessage?: string;
}

import type { EpisodeStatus, ProcessingHistoryEntry } from './database';
import type { JobIdentity } from './jobs';

export interface FeedSummary {
  slug: string;
  title?: string;
  sourceUrl: string;
  feedUrl: string;
  episodeCount: number;
  processedCount: number;
  lastCheckedAt?: string;
}

export interface EpisodeSummary {
  episodeId: string;
  title: string;
  status: EpisodeStatus;
  originalUrl: string;
  audioUrl: string;
  processedAt?: string;
  originalDuration?: number;
  newDuration?: number;
  adsRemoved?: number;
  errorMessage?: string;
}

export interface SystemStatus {
  currentJob: JobIdentity | null;
  busy: boolean;
  feeds: number;
  uptimeSeconds: number;
}

export interface HistoryQuery {
  page: number;
  limit: number;
  status?: 'completed' | 'failed';
  podcastSlug?: string;
}

export interface HistoryPage {
  entries: ProcessingHistoryEntry[];
  page: number;
  limit: number;
  total: number;
}

export interface HistoryStats {
  totalRuns: number;
  completed: number;
  failed: number;
  totalAdsRemoved: number;
  totalTimeSavedSeconds: number;
  averageDurationSeconds: number;
}

import BetterSqlite3 from 'better-sqlite3';
import { join, dirname } from 'path';
import { mkdirSync, readFileSync } from 'fs';
import type {
  EpisodeRecord,
  HistoryPage,
  HistoryQuery,
  HistoryStats,
  ProcessingHistoryEntry,
  StoredEpisode,
  StoredFeed
} from '@podstrip/shared';
import type { EpisodeRepository } from '../jobs/types';

export interface DatabaseConfig {
  path: string;
}

interface FeedRow {
  slug: string;
  source_url: string;
  title: string | null;
  last_checked_at: string | null;
  created_at: string;
}

interface EpisodeRow {
  podcast_slug: string;
  episode_id: string;
  status: string;
  original_url: string;
  title: string;
  started_at: string | null;
  processed_at: string | null;
  processed_file: string | null;
  original_duration: number | null;
  new_duration: number | null;
  ads_removed: number | null;
  failed_at: string | null;
  error_message: string | null;
  updated_at: string;
}

interface HistoryRow {
  id: number;
  podcast_slug: string;
  episode_id: string;
  title: string;
  status: string;
  started_at: string;
  finished_at: string;
  duration_seconds: number;
  ads_detected: number;
  original_duration: number | null;
  new_duration: number | null;
  error_message: string | null;
}

interface CountRow {
  count: number;
}

interface StatsRow {
  total_runs: number;
  completed: number | null;
  failed: number | null;
  total_ads: number | null;
  time_saved: number | null;
  average_duration: number | null;
}

type EpisodeParams = [
  string, string, string, string, string,
  string | null, string | null, string | null, number | null, number | null, number | null,
  string | null, string | null, string
];

export class Database implements EpisodeRepository {
  private db: BetterSqlite3.Database;

  constructor(config: DatabaseConfig) {
    if (config.path !== ':memory:') {
      mkdirSync(dirname(config.path), { recursive: true });
    }

    this.db = new BetterSqlite3(config.path);
    this.db.pragma('journal_mode = WAL');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    try {
      this.db.exec(schema);
    } catch (error) {
      console.error('Error creating tables:', error);
      throw error;
    }
  }

  // ========== FEEDS ==========

  upsertFeed(slug: string, sourceUrl: string, title?: string): void {
    this.db.prepare<[string, string, string | null]>(`
      INSERT INTO feeds (slug, source_url, title)
      VALUES (?, ?, ?)
      ON CONFLICT(slug) DO UPDATE SET
        source_url = excluded.source_url,
        title = COALESCE(excluded.title, feeds.title)
    `).run(slug, sourceUrl, title ?? null);
  }

  markFeedChecked(slug: string, checkedAt: Date = new Date()): void {
    this.db.prepare<[string, string]>('UPDATE feeds SET last_checked_at = ? WHERE slug = ?')
      .run(checkedAt.toISOString(), slug);
  }

  getFeed(slug: string): StoredFeed | null {
    const row = this.db.prepare<[string], FeedRow>('SELECT * FROM feeds WHERE slug = ?').get(slug);
    return row ? this.mapFeed(row) : null;
  }

  getAllFeeds(): StoredFeed[] {
    return this.db.prepare<[], FeedRow>('SELECT * FROM feeds ORDER BY slug').all().map(row => this.mapFeed(row));
  }

  // ========== EPISODES ==========

  loadEpisodeRecord(podcastSlug: string, episodeId: string): EpisodeRecord | null {
    const row = this.db
      .prepare<[string, string], EpisodeRow>('SELECT * FROM episodes WHERE podcast_slug = ? AND episode_id = ?')
      .get(podcastSlug, episodeId);
    return row ? this.mapRecord(row) : null;
  }

  /** Writes the record in one statement; `null` removes it. */
  saveEpisodeRecord(podcastSlug: string, episodeId: string, record: EpisodeRecord | null): void {
    if (!record) {
      this.db.prepare<[string, string]>('DELETE FROM episodes WHERE podcast_slug = ? AND episode_id = ?')
        .run(podcastSlug, episodeId);
      return;
    }

    this.db.prepare<EpisodeParams>(`
      INSERT OR REPLACE INTO episodes (
        podcast_slug, episode_id, status, original_url, title,
        started_at, processed_at, processed_file, original_duration, new_duration, ads_removed,
        failed_at, error_message, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(...this.episodeParams(podcastSlug, episodeId, record));
  }

  listEpisodes(podcastSlug: string): StoredEpisode[] {
    return this.mapEpisodes(
      this.db.prepare<[string], EpisodeRow>('SELECT * FROM episodes WHERE podcast_slug = ? ORDER BY updated_at DESC')
        .all(podcastSlug)
    );
  }

  listProcessingEpisodes(): Array<{ podcastSlug: string; episodeId: string; record: EpisodeRecord }> {
    return this.mapEpisodes(
      this.db.prepare<[], EpisodeRow>("SELECT * FROM episodes WHERE status = 'processing'").all()
    );
  }

  getEpisodeCounts(podcastSlug: string): { total: number; processed: number } {
    const total = this.db.prepare<[string], CountRow>('SELECT COUNT(*) as count FROM episodes WHERE podcast_slug = ?')
      .get(podcastSlug);
    const processed = this.db
      .prepare<[string], CountRow>("SELECT COUNT(*) as count FROM episodes WHERE podcast_slug = ? AND status = 'processed'")
      .get(podcastSlug);
    return { total: total?.count ?? 0, processed: processed?.count ?? 0 };
  }

  // ========== HISTORY ==========

  recordHistory(entry: Omit<ProcessingHistoryEntry, 'id'>): number {
    const result = this.db.prepare<[
      string, string, string, string, string, string, number, number, number | null, number | null, string | null
    ]>(`
      INSERT INTO processing_history (
        podcast_slug, episode_id, title, status, started_at, finished_at,
        duration_seconds, ads_detected, original_duration, new_duration, error_message
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.podcastSlug,
      entry.episodeId,
      entry.title,
      entry.status,
      entry.startedAt.toISOString(),
      entry.finishedAt.toISOString(),
      entry.durationSeconds,
      entry.adsDetected,
      entry.originalDuration ?? null,
      entry.newDuration ?? null,
      entry.errorMessage ?? null
    );
    return Number(result.lastInsertRowid);
  }

  getHistory(query: HistoryQuery): HistoryPage {
    const conditions: string[] = [];
    const params: string[] = [];
    if (query.status) {
      conditions.push('status = ?');
      params.push(query.status);
    }
    if (query.podcastSlug) {
      conditions.push('podcast_slug = ?');
      params.push(query.podcastSlug);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const total = this.db.prepare<string[], CountRow>(`SELECT COUNT(*) as count FROM processing_history ${where}`)
      .get(...params);
    const rows = this.db
      .prepare<Array<string | number>, HistoryRow>(
        `SELECT * FROM processing_history ${where} ORDER BY finished_at DESC, id DESC LIMIT ? OFFSET ?`
      )
      .all(...params, query.limit, (query.page - 1) * query.limit);

    return {
      entries: rows.map(row => this.mapHistory(row)),
      page: query.page,
      limit: query.limit,
      total: total?.count ?? 0
    };
  }

  getHistoryStats(): HistoryStats {
    const row = this.db.prepare<[], StatsRow>(`
      SELECT
        COUNT(*) as total_runs,
        SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) as completed,
        SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed,
        SUM(CASE WHEN status = 'completed' THEN ads_detected ELSE 0 END) as total_ads,
        SUM(CASE WHEN status = 'completed' THEN original_duration - new_duration ELSE 0 END) as time_saved,
        AVG(duration_seconds) as average_duration
      FROM processing_history
    `).get();

    return {
      totalRuns: row?.total_runs ?? 0,
      completed: row?.completed ?? 0,
      failed: row?.failed ?? 0,
      totalAdsRemoved: row?.total_ads ?? 0,
      totalTimeSavedSeconds: row?.time_saved ?? 0,
      averageDurationSeconds: row?.average_duration ?? 0
    };
  }

  // ========== UTILITY ==========

  private episodeParams(podcastSlug: string, episodeId: string, record: EpisodeRecord): EpisodeParams {
    const updatedAt = new Date().toISOString();
    switch (record.status) {
      case 'processing':
        return [podcastSlug, episodeId, record.status, record.originalUrl, record.title,
          record.startedAt.toISOString(), null, null, null, null, null, null, null, updatedAt];
      case 'processed':
        return [podcastSlug, episodeId, record.status, record.originalUrl, record.title,
          null, record.processedAt.toISOString(), record.processedFile,
          record.originalDuration, record.newDuration, record.adsRemoved, null, null, updatedAt];
      case 'failed':
        return [podcastSlug, episodeId, record.status, record.originalUrl, record.title,
          null, null, null, null, null, null, record.failedAt.toISOString(), record.errorMessage, updatedAt];
    }
  }

  /** Rows missing the fields their status requires are treated as absent. */
  private mapRecord(row: EpisodeRow): EpisodeRecord | null {
    const base = { originalUrl: row.original_url, title: row.title };

    switch (row.status) {
      case 'processing':
        if (row.started_at === null) break;
        return { ...base, status: 'processing', startedAt: new Date(row.started_at) };
      case 'processed':
        if (row.processed_at === null || row.processed_file === null) break;
        return {
          ...base,
          status: 'processed',
          processedAt: new Date(row.processed_at),
          processedFile: row.processed_file,
          originalDuration: row.original_duration ?? 0,
          newDuration: row.new_duration ?? 0,
          adsRemoved: row.ads_removed ?? 0
        };
      case 'failed':
        return {
          ...base,
          status: 'failed',
          failedAt: new Date(row.failed_at ?? row.updated_at),
          errorMessage: row.error_message ?? 'Unknown error'
        };
    }

    console.warn(`Ignoring malformed episode row ${row.podcast_slug}/${row.episode_id} (status ${row.status})`);
    return null;
  }

  private mapEpisodes(rows: EpisodeRow[]): StoredEpisode[] {
    const episodes: StoredEpisode[] = [];
    for (const row of rows) {
      const record = this.mapRecord(row);
      if (record) {
        episodes.push({
          podcastSlug: row.podcast_slug,
          episodeId: row.episode_id,
          record,
          updatedAt: new Date(row.updated_at)
        });
      }
    }
    return episodes;
  }

  private mapFeed(row: FeedRow): StoredFeed {
    return {
      slug: row.slug,
      sourceUrl: row.source_url,
      title: row.title ?? undefined,
      lastCheckedAt: row.last_checked_at ? new Date(row.last_checked_at) : undefined,
      createdAt: new Date(row.created_at)
    };
  }

  private mapHistory(row: HistoryRow): ProcessingHistoryEntry {
    return {
      id: row.id,
      podcastSlug: row.podcast_slug,
      episodeId: row.episode_id,
      title: row.title,
      status: row.status === 'completed' ? 'completed' : 'failed',
      startedAt: new Date(row.started_at),
      finishedAt: new Date(row.finished_at),
      durationSeconds: row.duration_seconds,
      adsDetected: row.ads_detected,
      originalDuration: row.original_duration ?? undefined,
      newDuration: row.new_duration ?? undefined,
      errorMessage: row.error_message ?? undefined
    };
  }

  close(): void {
    this.db.close();
  }
}

import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { z } from 'zod';
import {
  type EpisodeRecord,
  type EpisodeSummary,
  type FeedEpisode,
  type FeedSummary,
  type SystemStatus,
  formatError,
  isValidEpisodeId,
  isValidSlug
} from '@podstrip/shared';
import { streamAudioFile } from './audioStream';
import type { EpisodeService, ReprocessOutcome } from '../services/EpisodeService';
import type { FeedService } from '../services/FeedService';
import type { Database } from '../database/Database';
import type { ProcessingScheduler } from '../jobs/ProcessingScheduler';
import type { StorageManager } from '../storage/StorageManager';

export interface APIDependencies {
  episodes: EpisodeService;
  feeds: FeedService;
  database: Database;
  scheduler: ProcessingScheduler;
  storage: StorageManager;
  baseUrl: string;
  startedAt: Date;
}

const HistoryQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  status: z.enum(['completed', 'failed']).optional(),
  podcast: z.string().optional()
});

function episodeSummary(
  episodeId: string,
  podcastSlug: string,
  baseUrl: string,
  record: EpisodeRecord | null,
  feedEpisode?: FeedEpisode
): EpisodeSummary {
  const summary: EpisodeSummary = {
    episodeId,
    title: feedEpisode?.title ?? record?.title ?? episodeId,
    status: record?.status ?? 'none',
    originalUrl: feedEpisode?.audioUrl ?? record?.originalUrl ?? '',
    audioUrl: `${baseUrl}/episodes/${podcastSlug}/${episodeId}.mp3`
  };

  if (record?.status === 'processed') {
    summary.processedAt = record.processedAt.toISOString();
    summary.originalDuration = record.originalDuration;
    summary.newDuration = record.newDuration;
    summary.adsRemoved = record.adsRemoved;
  } else if (record?.status === 'failed') {
    summary.errorMessage = record.errorMessage;
  }
  return summary;
}

function reprocessStatus(outcome: ReprocessOutcome): 200 | 202 | 404 | 409 {
  switch (outcome.status) {
    case 'started':
      return 202;
    case 'reset':
      return 200;
    case 'busy':
      return 409;
    case 'not-found':
      return 404;
  }
}

export function createAPIServer(deps: APIDependencies) {
  const { episodes, feeds, database, scheduler, storage } = deps;
  const baseUrl = deps.baseUrl.replace(/\/+$/, '');
  const app = new Hono();

  app.use('*', logger());

  app.onError((error, c) => {
    console.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, error);
    return c.json({ error: formatError(error) }, 500);
  });

  // Health check
  app.get('/health', async (c) => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      feeds: feeds.getFeeds().length,
      currentJob: await scheduler.currentHolder()
    });
  });

  app.get('/api/feeds', (c) => {
    const summaries: FeedSummary[] = feeds.getFeeds().map(feed => {
      const stored = database.getFeed(feed.slug);
      const counts = database.getEpisodeCounts(feed.slug);
      return {
        slug: feed.slug,
        title: feed.name ?? stored?.title ?? feeds.getCachedTitle(feed.slug),
        sourceUrl: feed.sourceUrl,
        feedUrl: `${baseUrl}/${feed.slug}`,
        episodeCount: Math.max(feeds.getCachedEpisodes(feed.slug).length, counts.total),
        processedCount: counts.processed,
        lastCheckedAt: stored?.lastCheckedAt?.toISOString()
      };
    });
    return c.json(summaries);
  });

  app.get('/api/feeds/:slug/episodes', (c) => {
    const slug = c.req.param('slug');
    if (!feeds.hasFeed(slug)) {
      return c.json({ error: 'Feed not found' }, 404);
    }

    const records = new Map(database.listEpisodes(slug).map(stored => [stored.episodeId, stored.record]));
    const summaries: EpisodeSummary[] = feeds.getCachedEpisodes(slug).map(episode => {
      const record = records.get(episode.id) ?? null;
      records.delete(episode.id);
      return episodeSummary(episode.id, slug, baseUrl, record, episode);
    });
    for (const [episodeId, record] of records) {
      summaries.push(episodeSummary(episodeId, slug, baseUrl, record));
    }

    return c.json(summaries);
  });

  app.get('/api/feeds/:slug/episodes/:episodeId', async (c) => {
    const slug = c.req.param('slug');
    const episodeId = c.req.param('episodeId');
    if (!feeds.hasFeed(slug) || !isValidEpisodeId(episodeId)) {
      return c.json({ error: 'Episode not found' }, 404);
    }

    const record = database.loadEpisodeRecord(slug, episodeId);
    const feedEpisode = feeds.getCachedEpisodes(slug).find(episode => episode.id === episodeId);
    if (!record && !feedEpisode) {
      return c.json({ error: 'Episode not found' }, 404);
    }

    const storedDetection = await storage.loadAdDetection(slug, episodeId);
    const adDetection: unknown = storedDetection ? JSON.parse(storedDetection) : null;
    return c.json({
      ...episodeSummary(episodeId, slug, baseUrl, record, feedEpisode),
      adDetection
    });
  });

  app.get('/api/feeds/:slug/episodes/:episodeId/transcript', async (c) => {
    const slug = c.req.param('slug');
    const episodeId = c.req.param('episodeId');
    if (!isValidSlug(slug) || !isValidEpisodeId(episodeId)) {
      return c.json({ error: 'Invalid episode' }, 400);
    }

    const transcript = await storage.loadTranscript(slug, episodeId);
    if (transcript === null) {
      return c.json({ error: 'Transcript not found' }, 404);
    }
    return c.text(transcript);
  });

  app.post('/api/feeds/:slug/episodes/:episodeId/reprocess', async (c) => {
    const slug = c.req.param('slug');
    const episodeId = c.req.param('episodeId');
    if (!isValidSlug(slug) || !isValidEpisodeId(episodeId)) {
      return c.json({ error: 'Invalid episode' }, 400);
    }

    const outcome = await episodes.reprocessEpisode(slug, episodeId);
    return c.json(outcome, reprocessStatus(outcome));
  });

  app.post('/api/feeds/:slug/refresh', async (c) => {
    const feed = feeds.getFeed(c.req.param('slug'));
    if (!feed) {
      return c.json({ error: 'Feed not found' }, 404);
    }

    try {
      const parsed = await feeds.refreshFeed(feed);
      return c.json({ success: true, episodes: parsed.episodes.length });
    } catch (error) {
      return c.json({ success: false, error: formatError(error) }, 502);
    }
  });

  app.get('/api/system/status', async (c) => {
    const status: SystemStatus = {
      currentJob: await scheduler.currentHolder(),
      busy: await scheduler.isBusy(),
      feeds: feeds.getFeeds().length,
      uptimeSeconds: Math.floor((Date.now() - deps.startedAt.getTime()) / 1000)
    };
    return c.json(status);
  });

  app.get('/api/history', (c) => {
    const parsed = HistoryQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: parsed.error.issues.map(issue => issue.message).join('; ') }, 400);
    }

    const { page, limit, status, podcast } = parsed.data;
    return c.json(database.getHistory({ page, limit, status, podcastSlug: podcast }));
  });

  app.get('/api/history/stats', (c) => {
    return c.json(database.getHistoryStats());
  });

  // Just-in-time processed audio
  app.get('/episodes/:slug/:file', async (c) => {
    const slug = c.req.param('slug');
    const file = c.req.param('file');
    const episodeId = file.endsWith('.mp3') ? file.slice(0, -'.mp3'.length) : '';
    if (!isValidSlug(slug) || !isValidEpisodeId(episodeId)) {
      return c.json({ error: 'Invalid episode id' }, 400);
    }

    const outcome = await episodes.serveEpisode(slug, episodeId);
    switch (outcome.type) {
      case 'file':
        return streamAudioFile(c, outcome.path);
      case 'redirect':
        return c.redirect(outcome.url, 302);
      case 'unavailable':
        c.header('Retry-After', String(outcome.retryAfterSeconds));
        return c.json({ error: 'Episode is being processed, try again shortly' }, 503);
      case 'not-found':
        return c.json({ error: 'Episode not found' }, 404);
    }
  });

  // Rewritten feed; registered last so it doesn't shadow the routes above
  app.get('/:slug', async (c) => {
    const slug = c.req.param('slug');
    if (!isValidSlug(slug)) {
      return c.json({ error: 'Feed not found' }, 404);
    }

    let xml: string | null;
    try {
      xml = await feeds.getFeedXml(slug);
    } catch (error) {
      console.error(`❌ [${slug}] Feed unavailable: ${formatError(error)}`);
      c.header('Retry-After', '60');
      return c.json({ error: 'Feed temporarily unavailable' }, 503);
    }

    if (xml === null) {
      return c.json({ error: 'Feed not found' }, 404);
    }
    return c.body(xml, 200, { 'Content-Type': 'application/rss+xml; charset=utf-8' });
  });

  return app;
}

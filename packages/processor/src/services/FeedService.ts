import { type FeedConfig, type FeedEpisode, formatError } from '@podstrip/shared';
import type { ParsedFeed, RSSProcessor } from '../rss/RSSProcessor';
import type { StorageManager } from '../storage/StorageManager';
import type { Database } from '../database/Database';

export interface FeedSource {
  getFeeds(): FeedConfig[];
  /** Re-reads configuration; called when a request names an unknown slug. */
  reload(): boolean;
}

export interface FeedServiceOptions {
  baseUrl: string;
  rssRefreshMinutes: number;
  now?: () => number;
}

export interface EpisodeLookup {
  episode: FeedEpisode;
  podcastName: string;
}

interface CachedFeed {
  title: string;
  episodes: FeedEpisode[];
  fetchedAt: number;
}

/**
 * Upstream feeds: fetches, rewrites and caches them, and resolves episode ids
 * back to their source audio.
 */
export class FeedService {
  private cache = new Map<string, CachedFeed>();
  private refreshing = new Map<string, Promise<ParsedFeed>>();
  private now: () => number;

  constructor(
    private source: FeedSource,
    private rss: RSSProcessor,
    private storage: StorageManager,
    private database: Database,
    private options: FeedServiceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Looks the slug up, reloading configuration once if it is unknown. */
  getFeed(slug: string): FeedConfig | undefined {
    const find = () => this.source.getFeeds().find(feed => feed.slug === slug);
    const feed = find();
    if (feed) return feed;

    this.source.reload();
    return find();
  }

  hasFeed(slug: string): boolean {
    return this.getFeed(slug) !== undefined;
  }

  getFeeds(): FeedConfig[] {
    return this.source.getFeeds();
  }

  getCachedEpisodes(slug: string): FeedEpisode[] {
    return this.cache.get(slug)?.episodes ?? [];
  }

  getCachedTitle(slug: string): string | undefined {
    return this.cache.get(slug)?.title;
  }

  /** Concurrent refreshes of one feed share a single fetch. */
  async refreshFeed(feed: FeedConfig): Promise<ParsedFeed> {
    const inFlight = this.refreshing.get(feed.slug);
    if (inFlight) return inFlight;

    const refresh = this.doRefresh(feed).finally(() => {
      this.refreshing.delete(feed.slug);
    });
    this.refreshing.set(feed.slug, refresh);
    return refresh;
  }

  private async doRefresh(feed: FeedConfig): Promise<ParsedFeed> {
    const parsed = await this.rss.fetchFeed(feed.sourceUrl);
    const validation = this.rss.validateFeed(parsed.xml);
    validation.warnings.forEach(warning => console.warn(`[${feed.slug}] Feed warning: ${warning}`));

    const rewritten = this.rss.rewriteFeed(parsed.xml, feed.slug, this.options.baseUrl, parsed.episodes);
    await this.storage.saveRSSFeed(feed.slug, rewritten);

    const title = feed.name ?? parsed.title;
    this.cache.set(feed.slug, { title, episodes: parsed.episodes, fetchedAt: this.now() });
    this.database.upsertFeed(feed.slug, feed.sourceUrl, title);
    this.database.markFeedChecked(feed.slug, new Date(this.now()));

    console.log(`📡 [${feed.slug}] Feed refreshed: ${parsed.episodes.length} episodes`);
    return parsed;
  }

  async refreshAll(): Promise<{ refreshed: number; failed: number }> {
    let refreshed = 0;
    let failed = 0;

    for (const feed of this.source.getFeeds()) {
      try {
        await this.refreshFeed(feed);
        refreshed++;
      } catch (error) {
        failed++;
        console.error(`❌ [${feed.slug}] Feed refresh failed: ${formatError(error)}`);
      }
    }

    return { refreshed, failed };
  }

  /**
   * Rewritten feed XML. Refreshes when the stored copy is older than the
   * refresh interval; serves the stale copy if that refresh fails.
   */
  async getFeedXml(slug: string): Promise<string | null> {
    const feed = this.getFeed(slug);
    if (!feed) return null;

    const stored = await this.storage.getRSSFeed(slug);
    const maxAgeMs = this.options.rssRefreshMinutes * 60 * 1000;
    const fresh = stored !== null && this.cache.has(slug) && this.now() - stored.modifiedAt.getTime() < maxAgeMs;
    if (stored && fresh) {
      return stored.xml;
    }

    try {
      await this.refreshFeed(feed);
    } catch (error) {
      if (stored) {
        console.warn(`[${slug}] Refresh failed, serving cached feed: ${formatError(error)}`);
        return stored.xml;
      }
      throw error;
    }

    const updated = await this.storage.getRSSFeed(slug);
    return updated?.xml ?? null;
  }

  /** Finds an episode in the cached feed, refreshing once if it is not there. */
  async findEpisode(slug: string, episodeId: string): Promise<EpisodeLookup | null> {
    const feed = this.getFeed(slug);
    if (!feed) return null;

    const lookup = (): EpisodeLookup | null => {
      const cached = this.cache.get(slug);
      const episode = cached?.episodes.find(candidate => candidate.id === episodeId);
      return cached && episode ? { episode, podcastName: cached.title } : null;
    };

    const cachedHit = lookup();
    if (cachedHit) return cachedHit;

    await this.refreshFeed(feed);
    return lookup();
  }
}

import Parser from 'rss-parser';
import { XMLValidator } from 'fast-xml-parser';
import { createHash } from 'crypto';
import type { FeedEpisode } from '@podstrip/shared';

export interface ParsedFeed {
  title: string;
  description: string;
  link: string;
  episodes: FeedEpisode[];
  /** the feed document exactly as fetched */
  xml: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface RSSProcessorOptions {
  fetchImpl?: typeof fetch;
  userAgent?: string;
  timeoutMs?: number;
}

type FeedFields = {
  itunesAuthor?: string;
};

type ItemFields = {
  itunesDuration?: string;
};

/** Stable 16-hex-character id derived from the item's guid, or its audio URL when it has none. */
export function episodeIdFor(guid: string | undefined, audioUrl: string): string {
  return createHash('sha1').update(guid || audioUrl).digest('hex').slice(0, 16);
}

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

function escapeXmlAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export class RSSProcessor {
  private parser: Parser<FeedFields, ItemFields>;
  private fetchImpl: typeof fetch;
  private userAgent: string;
  private timeoutMs: number;

  constructor(options: RSSProcessorOptions = {}) {
    this.parser = new Parser<FeedFields, ItemFields>({
      customFields: {
        feed: [['itunes:author', 'itunesAuthor']],
        item: [['itunes:duration', 'itunesDuration']]
      }
    });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent ?? 'Podstrip/1.0';
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async fetchFeed(url: string): Promise<ParsedFeed> {
    console.log(`Fetching RSS feed: ${url}`);

    let xml: string;
    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      xml = await response.text();
    } catch (error) {
      throw new Error(`Failed to fetch RSS feed: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = await this.parseFeed(xml);
    console.log(`Parsed RSS feed: ${parsed.title} (${parsed.episodes.length} episodes)`);
    return parsed;
  }

  async parseFeed(xml: string): Promise<ParsedFeed> {
    const feed = await this.parser.parseString(xml).catch((error: unknown) => {
      throw new Error(`Failed to parse RSS feed: ${error instanceof Error ? error.message : String(error)}`);
    });

    const episodes: FeedEpisode[] = [];
    feed.items.forEach((item, index) => {
      const audioUrl = item.enclosure?.url;
      if (!audioUrl) {
        return;
      }

      const id = episodeIdFor(item.guid, audioUrl);
      episodes.push({
        id,
        guid: item.guid || audioUrl,
        title: item.title || `Episode ${index + 1}`,
        audioUrl,
        publishDate: item.isoDate ? new Date(item.isoDate) : undefined
      });
    });

    return {
      title: feed.title || 'Unknown Podcast',
      description: feed.description || '',
      link: feed.link || '',
      episodes,
      xml
    };
  }

  /**
   * Points every enclosure at this service's episode route, leaving the rest
   * of the document untouched. Enclosures whose URL is not a known episode
   * are kept as they are.
   */
  rewriteFeed(xml: string, podcastSlug: string, baseUrl: string, episodes: FeedEpisode[]): string {
    const idByUrl = new Map(episodes.map(episode => [episode.audioUrl, episode.id]));
    const base = baseUrl.replace(/\/+$/, '');

    return xml.replace(/<item[\s>][\s\S]*?<\/item>/g, item =>
      item.replace(/(<enclosure\b[^>]*?\burl=)(["'])(.*?)\2/, (match, prefix: string, quote: string, rawUrl: string) => {
        const id = idByUrl.get(decodeXmlEntities(rawUrl));
        if (!id) {
          return match;
        }
        const rewritten = escapeXmlAttribute(`${base}/episodes/${podcastSlug}/${id}.mp3`);
        return `${prefix}${quote}${rewritten}${quote}`;
      })
    );
  }

  validateFeed(feedXml: string): ValidationResult {
    const result: ValidationResult = { isValid: true, errors: [], warnings: [] };

    const wellFormed = XMLValidator.validate(feedXml);
    if (wellFormed !== true) {
      result.errors.push(`Malformed XML at line ${wellFormed.err.line}: ${wellFormed.err.msg}`);
      result.isValid = false;
      return result;
    }

    if (!/<rss[\s>]/.test(feedXml)) {
      result.errors.push('Not a valid RSS feed - missing <rss> element');
      result.isValid = false;
    }

    if (!/<channel[\s>]/.test(feedXml)) {
      result.errors.push('Missing required <channel> element');
      result.isValid = false;
    }

    for (const element of ['title', 'link']) {
      if (!new RegExp(`<${element}[\\s>]`).test(feedXml)) {
        result.errors.push(`Missing required element: <${element}>`);
        result.isValid = false;
      }
    }

    if (!/<description[\s>]/.test(feedXml)) {
      result.warnings.push('Missing recommended element: <description>');
    }

    if (!/<item[\s>]/.test(feedXml)) {
      result.warnings.push('No episodes found in feed');
    }

    return result;
  }
}

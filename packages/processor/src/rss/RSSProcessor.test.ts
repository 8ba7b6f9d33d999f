import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RSSProcessor, episodeIdFor } from './RSSProcessor';

const FEED_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">
  <channel>
    <title>The Test Show</title>
    <link>https://show.example.com</link>
    <description>A show for tests</description>
    <item>
      <title>First Episode</title>
      <guid>guid-1</guid>
      <pubDate>Wed, 01 May 2024 10:00:00 GMT</pubDate>
      <enclosure url="https://cdn.example.com/ep1.mp3" length="1000" type="audio/mpeg"/>
    </item>
    <item>
      <enclosure type="audio/mpeg" url="https://cdn.example.com/ep2.mp3?token=a&amp;b=1" length="2000"/>
    </item>
    <item>
      <title>Trailer without audio</title>
      <guid>guid-3</guid>
    </item>
  </channel>
</rss>`;

describe('episodeIdFor', () => {
  it('is a stable 16 character hex id', () => {
    const id = episodeIdFor('guid-1', 'https://cdn.example.com/ep1.mp3');
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(episodeIdFor('guid-1', 'https://cdn.example.com/other.mp3')).toBe(id);
  });

  it('falls back to the audio url without a guid', () => {
    expect(episodeIdFor(undefined, 'https://cdn.example.com/ep2.mp3')).toBe(episodeIdFor('', 'https://cdn.example.com/ep2.mp3'));
    expect(episodeIdFor(undefined, 'https://cdn.example.com/ep2.mp3')).not.toBe(episodeIdFor('guid-2', 'https://cdn.example.com/ep2.mp3'));
  });
});

describe('RSSProcessor', () => {
  const processor = new RSSProcessor();

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseFeed', () => {
    it('reads episodes with audio and skips the rest', async () => {
      const feed = await processor.parseFeed(FEED_XML);

      expect(feed.title).toBe('The Test Show');
      expect(feed.link).toBe('https://show.example.com');
      expect(feed.xml).toBe(FEED_XML);
      expect(feed.episodes).toEqual([
        {
          id: episodeIdFor('guid-1', 'https://cdn.example.com/ep1.mp3'),
          guid: 'guid-1',
          title: 'First Episode',
          audioUrl: 'https://cdn.example.com/ep1.mp3',
          publishDate: new Date('2024-05-01T10:00:00.000Z')
        },
        {
          id: episodeIdFor(undefined, 'https://cdn.example.com/ep2.mp3?token=a&b=1'),
          guid: 'https://cdn.example.com/ep2.mp3?token=a&b=1',
          title: 'Episode 2',
          audioUrl: 'https://cdn.example.com/ep2.mp3?token=a&b=1',
          publishDate: undefined
        }
      ]);
    });

    it('rejects a document that is not a feed', async () => {
      await expect(processor.parseFeed('not xml at all')).rejects.toThrow(/^Failed to parse RSS feed: /);
    });
  });

  describe('fetchFeed', () => {
    it('sends the user agent and parses the body', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => new Response(FEED_XML, { status: 200 }));
      const fetching = new RSSProcessor({ fetchImpl, userAgent: 'test-agent' });

      const feed = await fetching.fetchFeed('https://feeds.example.com/show.xml');

      expect(feed.episodes).toHaveLength(2);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl.mock.calls[0][0]).toBe('https://feeds.example.com/show.xml');
      expect(fetchImpl.mock.calls[0][1]?.headers).toEqual({ 'User-Agent': 'test-agent' });
    });

    it('reports upstream HTTP errors', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => new Response('', { status: 500, statusText: 'Internal Server Error' }));
      const fetching = new RSSProcessor({ fetchImpl });

      await expect(fetching.fetchFeed('https://feeds.example.com/show.xml'))
        .rejects.toThrow('Failed to fetch RSS feed: HTTP 500 Internal Server Error');
    });
  });

  describe('rewriteFeed', () => {
    it('points known enclosures at the episode route and keeps everything else', async () => {
      const feed = await processor.parseFeed(FEED_XML);
      const [first, second] = feed.episodes;

      const rewritten = processor.rewriteFeed(FEED_XML, 'show', 'http://localhost:8000/', feed.episodes);

      expect(rewritten).toContain(`<enclosure url="http://localhost:8000/episodes/show/${first.id}.mp3" length="1000" type="audio/mpeg"/>`);
      expect(rewritten).toContain(`<enclosure type="audio/mpeg" url="http://localhost:8000/episodes/show/${second.id}.mp3" length="2000"/>`);
      expect(rewritten).not.toContain('cdn.example.com');
      expect(rewritten.replace(/<enclosure[^>]*>/g, '')).toBe(FEED_XML.replace(/<enclosure[^>]*>/g, ''));
    });

    it('leaves enclosures of unknown episodes alone', () => {
      const rewritten = processor.rewriteFeed(FEED_XML, 'show', 'http://localhost:8000', []);
      expect(rewritten).toBe(FEED_XML);
    });
  });

  describe('validateFeed', () => {
    it('accepts a complete feed', () => {
      expect(processor.validateFeed(FEED_XML)).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it('rejects malformed XML', () => {
      const result = processor.validateFeed('<rss><channel></rss>');
      expect(result.isValid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^Malformed XML at line 1: /);
    });

    it('lists missing required elements and warns about optional ones', () => {
      const result = processor.validateFeed('<rss version="2.0"><channel><title>Only a title</title></channel></rss>');
      expect(result).toEqual({
        isValid: false,
        errors: ['Missing required element: <link>'],
        warnings: ['Missing recommended element: <description>', 'No episodes found in feed']
      });
    });
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createSignal } from '@podstrip/shared';
import {
  type LLMConfig,
  LLMOrchestrator,
  buildAdDetectionPrompt,
  parseAdDetectionResponse
} from './LLMOrchestrator';

const { createCompletion } = vi.hoisted(() => ({ createCompletion: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
  }
}));

const baseConfig: LLMConfig = {
  openrouterEndpoint: 'https://openrouter.example.com/api/v1',
  transcriptionModel: 'test-transcriber',
  adDetectionModel: 'test-detector',
  maxTokens: 2000,
  temperature: 0,
  timeoutMs: 1000
};

const segments = [
  { start: 0, end: 12.5, text: 'This episode is brought to you by Example Mattresses.' },
  { start: 12.5, end: 30, text: 'Welcome back to the show.' }
];

describe('buildAdDetectionPrompt', () => {
  it('lists transcript lines with second offsets', () => {
    const prompt = buildAdDetectionPrompt(segments, 'The Test Show', 'Episode 1');

    expect(prompt.startsWith('Podcast: The Test Show\nEpisode: Episode 1\n\nTranscript:\n')).toBe(true);
    expect(prompt).toContain('[0.0s - 12.5s] This episode is brought to you by Example Mattresses.\n[12.5s - 30.0s] Welcome back to the show.');
    expect(prompt).not.toContain('AUDIO HINTS');
  });

  it('adds loudness anomalies as hints', () => {
    const prompt = buildAdDetectionPrompt(segments, 'The Test Show', 'Episode 1', [
      createSignal(75, 135, 'volume_increase', 0.9)
    ]);

    expect(prompt).toContain('- 1:15 to 2:15 (75.0s - 135.0s): volume_increase, confidence 0.90');
  });
});

describe('parseAdDetectionResponse', () => {
  it('extracts the array from surrounding prose', () => {
    const reply = 'Here are the ads:\n[{"start": 0, "end": 12.5, "reason": "Sponsor read"}, {"start": "60", "end": "90"}]\nDone.';

    expect(parseAdDetectionResponse(reply)).toEqual({
      ads: [
        { start: 0, end: 12.5, reason: 'Sponsor read' },
        { start: 60, end: 90, reason: 'Advertisement detected' }
      ]
    });
  });

  it('drops unusable elements', () => {
    const reply = '[{"start": 10, "end": 5}, {"start": "soon"}, "text", {"start": 1, "end": 2, "extra": true}]';
    expect(parseAdDetectionResponse(reply)).toEqual({ ads: [{ start: 1, end: 2, reason: 'Advertisement detected' }] });
  });

  it('accepts an empty array', () => {
    expect(parseAdDetectionResponse('[]')).toEqual({ ads: [] });
  });

  it('reports replies without an array', () => {
    expect(parseAdDetectionResponse('No ads found.')).toEqual({ ads: [], error: 'No JSON array found in response' });
  });

  it('reports invalid JSON', () => {
    const result = parseAdDetectionResponse('[{"start": 1,}]');
    expect(result.ads).toEqual([]);
    expect(result.error).toMatch(/^Invalid JSON in response: /);
  });
});

describe('LLMOrchestrator', () => {
  beforeEach(() => {
    createCompletion.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('refuses to transcribe without a key', async () => {
    await expect(new LLMOrchestrator(baseConfig).transcribe('/tmp/episode.mp3'))
      .rejects.toThrow('Transcription unavailable: no Gemini API key configured');
  });

  it('skips ad detection without a key', async () => {
    const result = await new LLMOrchestrator(baseConfig).detectAds(segments, 'The Test Show', 'Episode 1');
    expect(result).toEqual({ ads: [], model: 'test-detector', error: 'No ad detection API key configured' });
  });

  it('skips ad detection for an empty transcript', async () => {
    const llm = new LLMOrchestrator({ ...baseConfig, openrouterApiKey: 'test-key' });
    expect(await llm.detectAds([], 'The Test Show', 'Episode 1')).toEqual({ ads: [], model: 'test-detector', error: 'Empty transcript' });
    expect(createCompletion).not.toHaveBeenCalled();
  });

  it('returns detected ads and tracks usage', async () => {
    createCompletion.mockResolvedValue({
      choices: [{ message: { content: '[{"start": 0, "end": 12.5, "reason": "Sponsor read"}]' } }],
      usage: { prompt_tokens: 120, completion_tokens: 30 }
    });
    const llm = new LLMOrchestrator({ ...baseConfig, openrouterApiKey: 'test-key' });

    const result = await llm.detectAds(segments, 'The Test Show', 'Episode 1');

    expect(result).toEqual({
      ads: [{ start: 0, end: 12.5, reason: 'Sponsor read' }],
      rawResponse: '[{"start": 0, "end": 12.5, "reason": "Sponsor read"}]',
      model: 'test-detector'
    });
    expect(createCompletion).toHaveBeenCalledWith(expect.objectContaining({ model: 'test-detector', max_tokens: 2000, temperature: 0 }));
    expect(llm.getTotalUsage()).toMatchObject({ inputTokens: 120, outputTokens: 30, calls: 1 });
  });

  it('turns a failed request into an empty result', async () => {
    createCompletion.mockRejectedValue(new Error('429 rate limited'));
    const llm = new LLMOrchestrator({ ...baseConfig, openrouterApiKey: 'test-key' });

    expect(await llm.detectAds(segments, 'The Test Show', 'Episode 1'))
      .toEqual({ ads: [], model: 'test-detector', error: '429 rate limited' });
  });
});

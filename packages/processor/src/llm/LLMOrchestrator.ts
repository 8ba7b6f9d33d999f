import { GoogleGenAI, Type, createPartFromUri } from '@google/genai';
import OpenAI from 'openai';
import { promises as fs } from 'fs';
import { basename } from 'path';
import {
  type AdDetectionResult,
  type AdRange,
  type AudioSegmentSignal,
  type TranscriptSegment,
  DetectedAdSchema,
  TranscriptResponseSchema,
  formatError,
  formatTime
} from '@podstrip/shared';
import type { AdDetector, Transcriber } from '../jobs/types';

export interface LLMConfig {
  geminiApiKey?: string;
  openrouterApiKey?: string;
  openrouterEndpoint: string;
  transcriptionModel: string;
  adDetectionModel: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
  calls: number;
  duration: number;
}

const AD_DETECTION_SYSTEM_PROMPT =
  'You are an expert at identifying advertisements in podcast transcripts. Answer with a JSON array only.';

/**
 * Transcript lines as `[12.5s - 30.0s] text`, followed by any loudness
 * anomalies as hints for where inserted ads may sit.
 */
export function buildAdDetectionPrompt(
  segments: TranscriptSegment[],
  podcastName: string,
  episodeTitle: string,
  signals: AudioSegmentSignal[] = []
): string {
  const transcript = segments
    .map(segment => `[${segment.start.toFixed(1)}s - ${segment.end.toFixed(1)}s] ${segment.text}`)
    .join('\n');

  const hints = signals.length > 0
    ? `\n\nAUDIO HINTS (volume changes relative to the episode baseline; inserted ads are often mastered louder):\n${signals
        .map(signal => `- ${formatTime(signal.start)} to ${formatTime(signal.end)} (${signal.start.toFixed(1)}s - ${signal.end.toFixed(1)}s): ${signal.signalType}, confidence ${signal.confidence.toFixed(2)}`)
        .join('\n')}`
    : '';

  return `Podcast: ${podcastName}
Episode: ${episodeTitle}

Transcript:
${transcript}${hints}

INSTRUCTIONS:
Analyze this podcast transcript and identify ALL advertisement segments. Look for:
- Product endorsements, sponsored content, or promotional messages
- Promo codes, special offers, or calls to action
- Clear transitions to/from ads (e.g., "This episode is brought to you by...")
- Host-read advertisements
- Pre-roll, mid-roll, or post-roll ads
- Long intro sections filled with multiple ads before actual content begins
- Mentions of other podcasts/shows from the network (cross-promotion)

MERGING RULES:
1. Multiple ads with no actual show content between them are ONE continuous segment
2. Gaps of up to 15 seconds between ads belong to the same ad block
3. Only split ads when there are at least 30 seconds of real show content between them
4. When in doubt, merge the segments

Return ONLY a JSON array of ad segments with start/end times in seconds.

Format:
[{"start": 0.0, "end": 240.0, "reason": "Continuous ad block: multiple sponsors"}]

If no ads are found, return an empty array: []`;
}

/**
 * Pulls the outermost JSON array out of a model reply. Elements without a
 * usable start/end are dropped; so are ranges that end before they start.
 */
export function parseAdDetectionResponse(responseText: string): { ads: AdRange[]; error?: string } {
  const start = responseText.indexOf('[');
  const end = responseText.lastIndexOf(']');
  if (start === -1 || end <= start) {
    return { ads: [], error: 'No JSON array found in response' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(responseText.slice(start, end + 1));
  } catch (error) {
    return { ads: [], error: `Invalid JSON in response: ${formatError(error)}` };
  }

  if (!Array.isArray(parsed)) {
    return { ads: [], error: 'Response JSON is not an array' };
  }

  const ads: AdRange[] = [];
  for (const item of parsed) {
    const result = DetectedAdSchema.safeParse(item);
    if (result.success && result.data.end > result.data.start) {
      ads.push({
        start: result.data.start,
        end: result.data.end,
        reason: result.data.reason ?? 'Advertisement detected'
      });
    }
  }
  return { ads };
}

export class LLMOrchestrator implements Transcriber, AdDetector {
  private geminiAI?: GoogleGenAI;
  private openrouterClient?: OpenAI;
  private config: LLMConfig;
  private totalUsage: LLMUsage = { inputTokens: 0, outputTokens: 0, calls: 0, duration: 0 };

  constructor(config: LLMConfig) {
    this.config = config;
    if (config.geminiApiKey) {
      this.geminiAI = new GoogleGenAI({ apiKey: config.geminiApiKey });
    }
    if (config.openrouterApiKey) {
      this.openrouterClient = new OpenAI({
        apiKey: config.openrouterApiKey,
        baseURL: config.openrouterEndpoint,
        timeout: config.timeoutMs
      });
    }
  }

  async transcribe(audioPath: string): Promise<TranscriptSegment[]> {
    if (!this.geminiAI) {
      throw new Error('Transcription unavailable: no Gemini API key configured');
    }

    const startTime = Date.now();
    const fileStats = await fs.stat(audioPath);
    console.log(`Uploading audio for transcription: ${basename(audioPath)} (${(fileStats.size / 1024 / 1024).toFixed(1)}MB)`);

    const uploadedFile = await this.geminiAI.files.upload({
      file: audioPath,
      config: { mimeType: 'audio/mp3' }
    });

    try {
      if (!uploadedFile.uri || !uploadedFile.mimeType) {
        throw new Error('Uploaded file has no URI');
      }

      const response = await this.geminiAI.models.generateContent({
        model: this.config.transcriptionModel,
        contents: [
          {
            role: 'user',
            parts: [
              createPartFromUri(uploadedFile.uri, uploadedFile.mimeType),
              { text: 'Transcribe this podcast episode verbatim. Split it into segments of one or two sentences, each with start and end times in seconds from the beginning of the audio.' }
            ]
          }
        ],
        config: {
          responseMimeType: 'application/json',
          responseSchema: {
            type: Type.OBJECT,
            properties: {
              segments: {
                type: Type.ARRAY,
                items: {
                  type: Type.OBJECT,
                  properties: {
                    start: { type: Type.NUMBER },
                    end: { type: Type.NUMBER },
                    text: { type: Type.STRING }
                  },
                  required: ['start', 'end', 'text']
                }
              }
            },
            required: ['segments']
          },
          temperature: 0
        }
      });

      const text = response.text;
      if (!text) {
        throw new Error('Empty response from Gemini API');
      }

      const parsed = TranscriptResponseSchema.parse(JSON.parse(text));
      const segments = parsed.segments
        .filter(segment => segment.text.trim().length > 0)
        .sort((a, b) => a.start - b.start);

      this.recordUsage(
        response.usageMetadata?.promptTokenCount ?? 0,
        response.usageMetadata?.candidatesTokenCount ?? 0,
        Date.now() - startTime
      );
      console.log(`Transcription completed in ${((Date.now() - startTime) / 1000).toFixed(1)}s: ${segments.length} segments`);
      return segments;
    } finally {
      if (uploadedFile.name) {
        try {
          await this.geminiAI.files.delete({ name: uploadedFile.name });
        } catch (cleanupError) {
          console.warn(`Failed to cleanup uploaded file: ${formatError(cleanupError)}`);
        }
      }
    }
  }

  /** Never throws; failures come back as zero ads with `error` set. */
  async detectAds(
    segments: TranscriptSegment[],
    podcastName: string,
    episodeTitle: string,
    signals: AudioSegmentSignal[] = []
  ): Promise<AdDetectionResult> {
    const model = this.config.adDetectionModel;
    if (!this.openrouterClient) {
      console.warn('Skipping ad detection - no API key');
      return { ads: [], model, error: 'No ad detection API key configured' };
    }
    if (segments.length === 0) {
      return { ads: [], model, error: 'Empty transcript' };
    }

    const startTime = Date.now();
    console.log(`Sending transcript for ad detection: ${podcastName} - ${episodeTitle}`);

    try {
      const response = await this.openrouterClient.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: AD_DETECTION_SYSTEM_PROMPT },
          { role: 'user', content: buildAdDetectionPrompt(segments, podcastName, episodeTitle, signals) }
        ],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens
      });

      this.recordUsage(
        response.usage?.prompt_tokens ?? 0,
        response.usage?.completion_tokens ?? 0,
        Date.now() - startTime
      );

      const responseText = response.choices[0]?.message?.content ?? '';
      const { ads, error } = parseAdDetectionResponse(responseText);
      const totalAdTime = ads.reduce((total, ad) => total + (ad.end - ad.start), 0);
      console.log(`Detected ${ads.length} ad segments (total ${(totalAdTime / 60).toFixed(1)} minutes)`);

      return error ? { ads, rawResponse: responseText, model, error } : { ads, rawResponse: responseText, model };
    } catch (error) {
      console.error(`Ad detection failed: ${formatError(error)}`);
      return { ads: [], model, error: formatError(error) };
    }
  }

  private recordUsage(inputTokens: number, outputTokens: number, durationMs: number): void {
    this.totalUsage.inputTokens += inputTokens;
    this.totalUsage.outputTokens += outputTokens;
    this.totalUsage.calls += 1;
    this.totalUsage.duration += durationMs;
  }

  getTotalUsage(): LLMUsage {
    return { ...this.totalUsage };
  }
}

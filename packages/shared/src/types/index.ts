export interface FeedConfig {
  slug: string;
  sourceUrl: string;
  name?: string;
  enabled: boolean;
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface AdRange {
  start: number;
  end: number;
  reason: string;
}

export interface AdDetectionResult {
  ads: AdRange[];
  rawResponse?: string;
  model?: string;
  error?: string;
}

export interface FeedEpisode {
  id: string;
  guid: string;
  title: string;
  audioUrl: string;
  publishDate?: Date;
}

export const SignalType = {
  VolumeIncrease: 'volume_increase',
  VolumeDecrease: 'volume_decrease',
  MusicBed: 'music_bed',
  Monologue: 'monologue',
  SpeakerChange: 'speaker_change'
} as const;

export type SignalType = (typeof SignalType)[keyof typeof SignalType];

export type SignalDetailValue = string | number | boolean | null;

/**
 * An audio feature detected over a time range, e.g. a stretch mastered
 * louder than the rest of the episode. Signals are never mutated once built.
 */
export interface AudioSegmentSignal {
  readonly start: number;
  readonly end: number;
  readonly signalType: SignalType;
  readonly confidence: number;
  readonly details: Readonly<Record<string, SignalDetailValue>>;
}

export interface LoudnessFrame {
  start: number;
  end: number;
  loudnessLufs: number;
  peakDbfs: number;
}

export interface SpeakerSegment {
  start: number;
  end: number;
  speaker: string;
}

export interface ConversationMetrics {
  numSpeakers: number;
  /** 0 when one speaker dominates, 1 for equal participation */
  speakerBalance: number;
  avgTurnDuration: number;
  /** speaker changes per minute */
  turnFrequency: number;
  isConversational: boolean;
  primarySpeaker?: string | null;
}

export interface AudioAnalysisResult {
  signals: AudioSegmentSignal[];
  loudnessBaseline: number | null;
  speakerCount: number | null;
  conversationMetrics: ConversationMetrics | null;
  analysisTimeSeconds: number;
  errors: string[];
}

export * from './database';
export * from './api';
export * from './jobs';

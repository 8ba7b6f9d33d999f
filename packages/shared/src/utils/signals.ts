import type {
  AudioAnalysisResult,
  AudioSegmentSignal,
  ConversationMetrics,
  SignalDetailValue,
  SignalType
} from '../types';
import {
  AudioAnalysisResultSchema,
  AudioSegmentSignalSchema,
  ConversationMetricsSchema,
  type AudioAnalysisResultJSON,
  type AudioSegmentSignalJSON,
  type ConversationMetricsJSON
} from '../schemas';

export function createSignal(
  start: number,
  end: number,
  signalType: SignalType,
  confidence: number,
  details: Record<string, SignalDetailValue> = {}
): AudioSegmentSignal {
  return Object.freeze({
    start,
    end,
    signalType,
    confidence,
    details: Object.freeze({ ...details })
  });
}

export function signalDuration(signal: AudioSegmentSignal): number {
  return signal.end - signal.start;
}

export function signalsOverlap(a: AudioSegmentSignal, b: AudioSegmentSignal, tolerance = 0): boolean {
  return a.start <= b.end + tolerance && a.end >= b.start - tolerance;
}

export function signalToJSON(signal: AudioSegmentSignal): AudioSegmentSignalJSON {
  return {
    start: signal.start,
    end: signal.end,
    signalType: signal.signalType,
    confidence: signal.confidence,
    duration: signalDuration(signal),
    details: { ...signal.details }
  };
}

export function signalFromJSON(data: unknown): AudioSegmentSignal {
  const parsed = AudioSegmentSignalSchema.parse(data);
  return createSignal(parsed.start, parsed.end, parsed.signalType, parsed.confidence, parsed.details);
}

export function conversationMetricsToJSON(metrics: ConversationMetrics): ConversationMetricsJSON {
  return { ...metrics };
}

export function conversationMetricsFromJSON(data: unknown): ConversationMetrics {
  return ConversationMetricsSchema.parse(data);
}

export function emptyAnalysisResult(): AudioAnalysisResult {
  return {
    signals: [],
    loudnessBaseline: null,
    speakerCount: null,
    conversationMetrics: null,
    analysisTimeSeconds: 0,
    errors: []
  };
}

export function analysisResultToJSON(result: AudioAnalysisResult): AudioAnalysisResultJSON {
  return {
    signals: result.signals.map(signalToJSON),
    loudnessBaseline: result.loudnessBaseline,
    speakerCount: result.speakerCount,
    conversationMetrics: result.conversationMetrics ? conversationMetricsToJSON(result.conversationMetrics) : null,
    analysisTimeSeconds: result.analysisTimeSeconds,
    errors: [...result.errors]
  };
}

export function analysisResultFromJSON(data: unknown): AudioAnalysisResult {
  const parsed = AudioAnalysisResultSchema.parse(data);
  return {
    signals: parsed.signals.map(signal =>
      createSignal(signal.start, signal.end, signal.signalType, signal.confidence, signal.details)
    ),
    loudnessBaseline: parsed.loudnessBaseline,
    speakerCount: parsed.speakerCount,
    conversationMetrics: parsed.conversationMetrics,
    analysisTimeSeconds: parsed.analysisTimeSeconds,
    errors: parsed.errors
  };
}

/** Signals intersecting the open range (start, end). */
export function signalsInRange(result: AudioAnalysisResult, start: number, end: number): AudioSegmentSignal[] {
  return result.signals.filter(signal => signal.start < end && signal.end > start);
}

export function signalsByType(result: AudioAnalysisResult, signalType: SignalType): AudioSegmentSignal[] {
  return result.signals.filter(signal => signal.signalType === signalType);
}

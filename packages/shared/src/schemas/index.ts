import { z } from 'zod';

export const FeedConfigSchema = z.object({
  slug: z.string().regex(/^[A-Za-z0-9_-]+$/, 'slug may only contain letters, digits, - and _'),
  sourceUrl: z.string().url(),
  name: z.string().min(1).optional(),
  enabled: z.boolean().default(true)
});

export const SignalTypeSchema = z.enum([
  'volume_increase',
  'volume_decrease',
  'music_bed',
  'monologue',
  'speaker_change'
]);

export const SignalDetailsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const AudioSegmentSignalSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  signalType: SignalTypeSchema,
  confidence: z.number().min(0).max(1),
  duration: z.number().optional(),
  details: SignalDetailsSchema.default({})
});

export const ConversationMetricsSchema = z.object({
  numSpeakers: z.number().int().nonnegative(),
  speakerBalance: z.number().min(0).max(1),
  avgTurnDuration: z.number().nonnegative(),
  turnFrequency: z.number().nonnegative(),
  isConversational: z.boolean(),
  primarySpeaker: z.string().nullable().optional()
});

export const AudioAnalysisResultSchema = z.object({
  signals: z.array(AudioSegmentSignalSchema).default([]),
  loudnessBaseline: z.number().nullable().default(null),
  speakerCount: z.number().int().nonnegative().nullable().default(null),
  conversationMetrics: ConversationMetricsSchema.nullable().default(null),
  analysisTimeSeconds: z.number().nonnegative().default(0),
  errors: z.array(z.string()).default([])
});

export const TranscriptSegmentSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string()
});

export const TranscriptResponseSchema = z.object({
  segments: z.array(TranscriptSegmentSchema)
});

/** One ad range as returned by the language model; anything extra is ignored. */
export const DetectedAdSchema = z.object({
  start: z.coerce.number().nonnegative(),
  end: z.coerce.number().nonnegative(),
  reason: z.string().optional()
});

export type AudioSegmentSignalJSON = z.infer<typeof AudioSegmentSignalSchema>;
export type ConversationMetricsJSON = z.infer<typeof ConversationMetricsSchema>;
export type AudioAnalysisResultJSON = z.input<typeof AudioAnalysisResultSchema>;

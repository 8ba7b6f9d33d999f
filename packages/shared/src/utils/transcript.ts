import type { TranscriptSegment } from '../types';
import { formatTimestamp, parseTimestamp } from './time';

export function segmentsToText(segments: TranscriptSegment[]): string {
  return segments
    .map(segment => `[${formatTimestamp(segment.start)} --> ${formatTimestamp(segment.end)}] ${segment.text.trim()}`)
    .join('\n');
}

/**
 * Parses a stored transcript. Lines that don't follow
 * `[HH:MM:SS.mmm --> HH:MM:SS.mmm] text` are skipped one by one.
 */
export function parseTranscript(text: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];

  for (const line of text.split('\n')) {
    if (!line.trim() || !line.startsWith('[')) continue;

    const separator = line.indexOf('] ');
    if (separator === -1) continue;

    const range = line.slice(1, separator).split(' --> ');
    if (range.length !== 2) continue;

    try {
      const start = parseTimestamp(range[0]);
      const end = parseTimestamp(range[1]);
      segments.push({ start, end, text: line.slice(separator + 2) });
    } catch {
      continue;
    }
  }

  return segments;
}

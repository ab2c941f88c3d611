/**
 * Segment Windower - Slides a fixed-length window over the utterance sequence
 */

import { NoViableSegmentsError } from '../errors';
import type { Segment, Utterance } from '../types';

export interface WindowOptions {
  window_sec?: number;
  slack_sec?: number;
}

/**
 * One candidate per utterance boundary whose trimmed window lands inside
 * [W - slack, W + slack]. Overlapping candidates are kept.
 */
export function buildCandidateSegments(
  utterances: readonly Utterance[],
  options: WindowOptions = {}
): Segment[] {
  const { window_sec = 30, slack_sec = 5 } = options;
  const minDuration = window_sec - slack_sec;
  const maxDuration = window_sec + slack_sec;

  if (utterances.length === 0) {
    throw new NoViableSegmentsError('Transcript has no utterances to window');
  }

  const total = utterances[utterances.length - 1].end_offset - utterances[0].start_offset;
  if (total < minDuration) {
    throw new NoViableSegmentsError(
      `Transcript spans ${total}s, shorter than the minimum clip length of ${minDuration}s`
    );
  }

  const segments: Segment[] = [];

  for (let first = 0; first < utterances.length; first++) {
    const start = utterances[first].start_offset;

    // Grow until the window first exceeds the upper bound (or the transcript ends)
    let last = first;
    while (last + 1 < utterances.length && utterances[last].end_offset - start <= maxDuration) {
      last++;
    }

    // Trim trailing utterances back into the band
    while (last >= first && utterances[last].end_offset - start > maxDuration) {
      last--;
    }
    if (last < first) continue;

    const end = utterances[last].end_offset;
    const duration = end - start;
    if (duration < minDuration) continue;

    segments.push({
      index: segments.length,
      start_offset: start,
      end_offset: end,
      duration,
      first_utterance: first,
      utterances: utterances.slice(first, last + 1),
    });
  }

  if (segments.length === 0) {
    throw new NoViableSegmentsError(
      `No window of ${minDuration}-${maxDuration}s fits between utterance boundaries`
    );
  }

  return segments;
}

export function segmentText(segment: Pick<Segment, 'utterances'>): string {
  return segment.utterances.map(u => u.text).join(' ');
}

export function formatDialogue(segment: Pick<Segment, 'utterances'>): string {
  return segment.utterances.map(u => `${u.speaker_id}: ${u.text}`).join('\n');
}

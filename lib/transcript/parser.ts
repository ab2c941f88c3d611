/**
 * Transcript Parser - Turns "HH:MM:SS Speaker: text" lines into utterances
 */

import { MalformedTranscriptError } from '../errors';
import type { Utterance } from '../types';
import { cleanText, estimateSpeechSeconds } from '../utils';

export interface ParseOptions {
  strictness?: 'lenient' | 'strict';
  timestamp_tolerance_sec?: number;
}

interface DraftUtterance {
  speaker_id: string;
  start_offset: number;
  text: string[];
}

const TIMESTAMP = /^(\d{1,2}):(\d{2}):(\d{2})$/;
const TIMESTAMPED_LINE = /^(\d{1,2}:\d{2}:\d{2})\s+(.*)$/;
// Speaker labels are short; a period may only close an abbreviation or initial ("Dr.", "J.K.")
const SPEAKER_LABEL = /^((?:[^:.!?]|(?<=(?:^|[\s.])\p{L}{1,3})\.){1,40}?)\s*:\s*(.*)$/u;

export function parseTimestamp(value: string): number | null {
  const match = TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, h, m, s] = match;
  const minutes = Number(m);
  const seconds = Number(s);
  if (minutes >= 60 || seconds >= 60) return null;

  return Number(h) * 3600 + minutes * 60 + seconds;
}

export function formatTimestamp(totalSeconds: number): string {
  const whole = Math.max(0, Math.round(totalSeconds));
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;
  return [h, m, s].map(n => String(n).padStart(2, '0')).join(':');
}

export function parseTranscript(raw: string, options: ParseOptions = {}): Utterance[] {
  const { strictness = 'lenient', timestamp_tolerance_sec = 1 } = options;
  const lenient = strictness === 'lenient';

  const drafts: DraftUtterance[] = [];
  const lines = raw.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((rawLine, idx) => {
    const lineNumber = idx + 1;
    const line = rawLine.trim();
    if (!line) return;

    const previous = drafts[drafts.length - 1];
    const timestamped = TIMESTAMPED_LINE.exec(line);

    if (!timestamped) {
      if (!lenient) {
        throw new MalformedTranscriptError(lineNumber, rawLine, 'expected "HH:MM:SS Speaker: text"');
      }
      if (!previous) {
        throw new MalformedTranscriptError(lineNumber, rawLine, 'continuation line before any utterance');
      }
      previous.text.push(line);
      return;
    }

    const [, stamp, rest] = timestamped;
    let start = parseTimestamp(stamp);
    if (start === null) {
      throw new MalformedTranscriptError(lineNumber, rawLine, `invalid timestamp ${stamp}`);
    }

    if (previous && start < previous.start_offset) {
      if (previous.start_offset - start > timestamp_tolerance_sec) {
        throw new MalformedTranscriptError(
          lineNumber,
          rawLine,
          `timestamp ${stamp} goes back before ${previous.start_offset}s`
        );
      }
      start = previous.start_offset;
    }

    const labelled = SPEAKER_LABEL.exec(rest);
    let speaker: string;
    let text: string;

    if (labelled && labelled[1].trim()) {
      speaker = cleanText(labelled[1]);
      text = labelled[2];
    } else {
      if (!lenient) {
        throw new MalformedTranscriptError(lineNumber, rawLine, 'missing speaker label');
      }
      if (!previous) {
        throw new MalformedTranscriptError(lineNumber, rawLine, 'no speaker label to recover');
      }
      speaker = previous.speaker_id;
      text = rest;
    }

    if (!lenient && !text.trim()) {
      throw new MalformedTranscriptError(lineNumber, rawLine, 'empty utterance');
    }

    drafts.push({ speaker_id: speaker, start_offset: start, text: text.trim() ? [text] : [] });
  });

  const kept = drafts.filter(d => d.text.length > 0);
  if (kept.length === 0) {
    throw new MalformedTranscriptError(lines.length, '', 'transcript contains no utterances');
  }

  return kept.map((draft, idx) => {
    const text = cleanText(draft.text.join(' '));
    const next = kept[idx + 1];
    const end = next ? next.start_offset : draft.start_offset + estimateSpeechSeconds(text);

    return Object.freeze({
      speaker_id: draft.speaker_id,
      start_offset: draft.start_offset,
      end_offset: end,
      text,
    });
  });
}

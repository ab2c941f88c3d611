/**
 * Tests for dialogue enhancement and its validation
 */

import { describe, it, expect } from 'vitest';
import {
  DialogueEnhancer,
  sanitizeEmotionTags,
  stripEmotionTags,
  unenhancedSegment,
  validateEnhancedLines,
  type EnhanceOptions,
} from '../lib/agents/enhancer';
import {
  CollaboratorRequestError,
  CollaboratorTransportError,
  EnhancementRejectedError,
} from '../lib/errors';
import type { ScoredSegment } from '../lib/types';
import { makeSegment, NO_DELAY_RETRY, PROFILE, rationale, StubEnhancement } from './helpers';

const OPTIONS: EnhanceOptions = {
  intensity: 'balanced',
  include_app_mention: true,
  retry: NO_DELAY_RETRY,
};

function scored(texts: string[], appMention = false): ScoredSegment {
  return {
    ...makeSegment(0, 0, texts),
    relevance_score: 0.8,
    rank: 1,
    app_mention_present: appMention,
    hook_text: texts[0],
    on_topic_terms: ['editing'],
    viral_rationale: rationale('strong claim'),
  };
}

const ORIGINAL = [
  { speaker: 'Speaker A', text: 'Editing takes hours.' },
  { speaker: 'Speaker B', text: 'It really does.' },
];

const NO_MENTION = { include_app_mention: false, product_name: 'Clipwise' };
const WITH_MENTION = { include_app_mention: true, product_name: 'Clipwise' };

describe('emotion tags', () => {
  it('should strip every bracketed tag', () => {
    expect(stripEmotionTags('[whispers] quiet  please')).toBe('quiet please');
  });

  it('should keep known tags and drop unknown ones', () => {
    expect(sanitizeEmotionTags('[laughs] So [excited] true')).toBe('So [excited] true');
  });
});

describe('validateEnhancedLines', () => {
  it('should accept tags and punctuation changes as unchanged wording', () => {
    const result = validateEnhancedLines(
      ORIGINAL,
      [
        { speaker: 'Speaker A', text: '[thoughtful] Editing takes hours.' },
        { speaker: 'Speaker B', text: 'It really does!' },
      ],
      NO_MENTION
    );

    expect(result).toEqual({ problems: [], rewritten: [] });
  });

  it('should report a changed line count', () => {
    const result = validateEnhancedLines(ORIGINAL, [ORIGINAL[0]], NO_MENTION);

    expect(result.problems).toEqual(['expected 2 lines, got 1']);
  });

  it('should report a swapped speaker', () => {
    const result = validateEnhancedLines(
      ORIGINAL,
      [ORIGINAL[0], { speaker: 'Speaker A', text: 'It really does.' }],
      NO_MENTION
    );

    expect(result.problems).toEqual(['line 2: speaker Speaker A where Speaker B was expected']);
  });

  it('should report a line left with only a tag', () => {
    const result = validateEnhancedLines(
      ORIGINAL,
      [{ speaker: 'Speaker A', text: '[sighs]' }, ORIGINAL[1]],
      NO_MENTION
    );

    expect(result.problems).toEqual(['line 1: empty text', '1 lines reworded (1), at most 0 allowed']);
  });

  it('should allow one reworded line that names the product', () => {
    const result = validateEnhancedLines(
      ORIGINAL,
      [ORIGINAL[0], { speaker: 'Speaker B', text: 'It really does, Clipwise fixed that.' }],
      WITH_MENTION
    );

    expect(result).toEqual({ problems: [], rewritten: [1] });
  });

  it('should reject a reworded line that does not name the product', () => {
    const result = validateEnhancedLines(
      ORIGINAL,
      [ORIGINAL[0], { speaker: 'Speaker B', text: 'It really does, and fast.' }],
      WITH_MENTION
    );

    expect(result.problems).toEqual(['line 2 reworded without referencing Clipwise']);
  });

  it('should reject more than one reworded line', () => {
    const result = validateEnhancedLines(
      ORIGINAL,
      [
        { speaker: 'Speaker A', text: 'Clipwise makes editing quick.' },
        { speaker: 'Speaker B', text: 'Clipwise really does.' },
      ],
      WITH_MENTION
    );

    expect(result.problems).toEqual(['2 lines reworded (1, 2), at most 1 allowed']);
  });
});

describe('DialogueEnhancer', () => {
  const TEXTS = ['Editing takes hours.', 'It really does.', 'Not anymore.'];

  it('should apply emotion tags and drop tags outside the vocabulary', async () => {
    const collaborator = new StubEnhancement(request => ({
      lines: request.lines.map((line, i) => ({
        speaker: line.speaker,
        text: i === 0 ? `[thoughtful] ${line.text}` : i === 1 ? `[laughs] ${line.text}` : line.text,
      })),
    }));
    const enhancer = new DialogueEnhancer(collaborator);

    const result = await enhancer.enhance(scored(TEXTS), PROFILE, OPTIONS);

    expect(result.utterances.map(u => u.text)).toEqual([
      '[thoughtful] Editing takes hours.',
      'It really does.',
      'Not anymore.',
    ]);
    expect(result.enhancement).toEqual({
      applied: true,
      intensity: 'balanced',
      app_mention_line: null,
      warning: null,
    });
    expect(result.utterances[0].start_offset).toBe(0);
    expect(collaborator.calls).toHaveLength(1);
    expect(collaborator.calls[0].include_app_mention).toBe(false);
  });

  it('should record the line carrying the product mention', async () => {
    const collaborator = new StubEnhancement(request => ({
      lines: request.lines.map((line, i) => (i === 2 ? { ...line, text: 'Not anymore, thanks to Clipwise.' } : line)),
    }));
    const enhancer = new DialogueEnhancer(collaborator);

    const result = await enhancer.enhance(scored(TEXTS, true), PROFILE, OPTIONS);

    expect(collaborator.calls[0].include_app_mention).toBe(true);
    expect(result.enhancement.app_mention_line).toBe(2);
    expect(result.app_mention_present).toBe(true);
    expect(result.utterances[2].text).toBe('Not anymore, thanks to Clipwise.');
  });

  it('should ask again once after a malformed response', async () => {
    const collaborator = new StubEnhancement((request, call) => ({
      lines: call === 1 ? request.lines.slice(1) : request.lines,
    }));
    const enhancer = new DialogueEnhancer(collaborator);

    const result = await enhancer.enhance(scored(TEXTS), PROFILE, OPTIONS);

    expect(collaborator.calls).toHaveLength(2);
    expect(result.enhancement.applied).toBe(true);
  });

  it('should reject after two responses with the wrong line count', async () => {
    const collaborator = new StubEnhancement(request => ({ lines: request.lines.slice(0, 3) }));
    const enhancer = new DialogueEnhancer(collaborator);

    const enhancing = enhancer.enhance(
      scored(['One line.', 'Two lines.', 'Three lines.', 'Four lines.']),
      PROFILE,
      OPTIONS
    );

    await expect(enhancing).rejects.toBeInstanceOf(EnhancementRejectedError);
    await expect(enhancing).rejects.toMatchObject({
      message: 'Enhanced dialogue for rank 1 failed validation: expected 4 lines, got 3',
      problems: ['expected 4 lines, got 3'],
      stage: 'enhancing',
    });
    expect(collaborator.calls).toHaveLength(2);
  });

  it('should reject without retrying when the collaborator refuses the request', async () => {
    const collaborator = new StubEnhancement(() => new CollaboratorRequestError('enhancement', 'bad request', 400));
    const enhancer = new DialogueEnhancer(collaborator);

    await expect(enhancer.enhance(scored(TEXTS), PROFILE, OPTIONS)).rejects.toThrow(
      'Enhancement collaborator unavailable for rank 1: enhancement: bad request'
    );
    expect(collaborator.calls).toHaveLength(1);
  });

  it('should retry transport failures before rejecting', async () => {
    const collaborator = new StubEnhancement(() => new CollaboratorTransportError('enhancement', 'HTTP 503', 503));
    const enhancer = new DialogueEnhancer(collaborator);

    await expect(enhancer.enhance(scored(TEXTS), PROFILE, OPTIONS)).rejects.toBeInstanceOf(
      EnhancementRejectedError
    );
    expect(collaborator.calls).toHaveLength(3);
  });
});

describe('unenhancedSegment', () => {
  it('should keep the ranked text and detect an existing mention', () => {
    const segment = scored(['We switched to Clipwise last year.', 'Nice.', 'Yes.']);

    const result = unenhancedSegment(segment, PROFILE, 'subtle', 'Enhancement rejected');

    expect(result.utterances).toBe(segment.utterances);
    expect(result.app_mention_present).toBe(true);
    expect(result.enhancement).toEqual({
      applied: false,
      intensity: 'subtle',
      app_mention_line: null,
      warning: 'Enhancement rejected',
    });
  });
});

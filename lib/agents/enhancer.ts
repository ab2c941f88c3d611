/**
 * Dialogue Enhancer - Adds emotion tags and at most one product mention to a
 * ranked clip, and refuses any rewrite that changes the clip's structure.
 */

import type { EnhancementCollaborator } from '../collaborators';
import { EnhancementRejectedError } from '../errors';
import type {
  DialogueLine,
  EnhancedSegment,
  EnhancementIntensity,
  ScoredSegment,
  SiteProfile,
} from '../types';
import { cleanText, Logger } from '../utils';
import { type RetryPolicy, withRetryPolicy } from '../utils/call-policy';

export const EMOTION_TAGS = [
  'thoughtful',
  'curious',
  'reflective',
  'excited',
  'narrating',
  'serious',
  'sarcastic',
  'whispers',
  'sighs',
] as const;

export interface EnhanceOptions {
  intensity: EnhancementIntensity;
  include_app_mention: boolean;
  retry: RetryPolicy;
}

export interface LineValidation {
  problems: string[];
  rewritten: number[];
}

const TAG = /\[([^\]]*)\]/g;

export function stripEmotionTags(text: string): string {
  return cleanText(text.replace(TAG, ' '));
}

/**
 * Drops bracketed tags outside the vocabulary, keeping known ones in place.
 */
export function sanitizeEmotionTags(text: string, vocabulary: readonly string[] = EMOTION_TAGS): string {
  const allowed = new Set(vocabulary.map(tag => tag.toLowerCase()));
  return cleanText(
    text.replace(TAG, (match, tag: string) => (allowed.has(tag.trim().toLowerCase()) ? match : ' '))
  );
}

/**
 * The words of a line with tags, punctuation and case removed.
 */
export function normalizeWords(text: string): string {
  return stripEmotionTags(text)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function mentionsProduct(text: string, productName: string): boolean {
  const name = productName.trim().toLowerCase();
  return name.length > 0 && stripEmotionTags(text).toLowerCase().includes(name);
}

export function validateEnhancedLines(
  original: readonly DialogueLine[],
  candidate: readonly DialogueLine[],
  options: { include_app_mention: boolean; product_name: string }
): LineValidation {
  const problems: string[] = [];
  const rewritten: number[] = [];

  if (candidate.length !== original.length) {
    problems.push(`expected ${original.length} lines, got ${candidate.length}`);
    return { problems, rewritten };
  }

  candidate.forEach((line, i) => {
    if (line.speaker !== original[i].speaker) {
      problems.push(`line ${i + 1}: speaker ${line.speaker} where ${original[i].speaker} was expected`);
    }
    if (!stripEmotionTags(line.text)) {
      problems.push(`line ${i + 1}: empty text`);
    }
    if (normalizeWords(line.text) !== normalizeWords(original[i].text)) {
      rewritten.push(i);
    }
  });

  const budget = options.include_app_mention ? 1 : 0;
  if (rewritten.length > budget) {
    problems.push(
      `${rewritten.length} lines reworded (${rewritten.map(i => i + 1).join(', ')}), at most ${budget} allowed`
    );
  } else if (rewritten.length === 1 && !mentionsProduct(candidate[rewritten[0]].text, options.product_name)) {
    problems.push(`line ${rewritten[0] + 1} reworded without referencing ${options.product_name}`);
  }

  return { problems, rewritten };
}

/**
 * The segment as it was ranked, for when enhancement is off or rejected.
 */
export function unenhancedSegment(
  segment: ScoredSegment,
  profile: SiteProfile,
  intensity: EnhancementIntensity,
  warning: string | null
): EnhancedSegment {
  return {
    ...segment,
    app_mention_present: segment.utterances.some(u => mentionsProduct(u.text, profile.product_name)),
    enhancement: { applied: false, intensity, app_mention_line: null, warning },
  };
}

const SHAPE_ATTEMPTS = 2;

export class DialogueEnhancer {
  constructor(private readonly collaborator: EnhancementCollaborator) {}

  async enhance(
    segment: ScoredSegment,
    profile: SiteProfile,
    options: EnhanceOptions
  ): Promise<EnhancedSegment> {
    const original: DialogueLine[] = segment.utterances.map(u => ({ speaker: u.speaker_id, text: u.text }));
    const includeMention = options.include_app_mention && segment.app_mention_present;
    let problems: string[] = [];

    for (let attempt = 1; attempt <= SHAPE_ATTEMPTS; attempt++) {
      let lines: DialogueLine[];
      try {
        const result = await withRetryPolicy(
          'enhancement',
          () =>
            this.collaborator.enhanceDialogue({
              lines: original,
              profile,
              intensity: options.intensity,
              include_app_mention: includeMention,
              emotion_tags: EMOTION_TAGS,
            }),
          options.retry
        );
        lines = result.lines.map(line => ({ speaker: line.speaker, text: sanitizeEmotionTags(line.text) }));
      } catch (error) {
        throw new EnhancementRejectedError(
          `Enhancement collaborator unavailable for rank ${segment.rank}: ${error instanceof Error ? error.message : String(error)}`,
          [],
          error
        );
      }

      const validation = validateEnhancedLines(original, lines, {
        include_app_mention: includeMention,
        product_name: profile.product_name,
      });

      if (validation.problems.length === 0) {
        const mentionLine = validation.rewritten.length === 1 ? validation.rewritten[0] : null;

        Logger.info('Clip enhanced', {
          rank: segment.rank,
          attempt,
          lines: lines.length,
          app_mention_line: mentionLine,
        });

        return {
          ...segment,
          utterances: segment.utterances.map((u, i) => ({ ...u, text: lines[i].text })),
          app_mention_present: lines.some(line => mentionsProduct(line.text, profile.product_name)),
          enhancement: {
            applied: true,
            intensity: options.intensity,
            app_mention_line: mentionLine,
            warning: null,
          },
        };
      }

      problems = validation.problems;
      Logger.warn('Enhanced dialogue rejected', { rank: segment.rank, attempt, problems });
    }

    throw new EnhancementRejectedError(
      `Enhanced dialogue for rank ${segment.rank} failed validation: ${problems.join('; ')}`,
      problems
    );
  }
}

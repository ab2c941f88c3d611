/**
 * Dialogue Enhancer Agent - Asks the model for expressive speech tags
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { BaseAgent } from './base';
import type {
  EnhancementCollaborator,
  EnhancementRequest,
  EnhancementResult,
} from '../collaborators';

const EnhancedDialogueSchema = z.object({
  dialogue_lines: z.array(
    z.object({
      speaker: z.string(),
      text: z.string(),
    })
  ),
});

const INTENSITY_GUIDE = {
  subtle: 'Use at most one tag every two lines. Prefer punctuation for pacing.',
  balanced: 'Use one tag per line at most, varied between speakers.',
  expressive: 'Use up to two tags per line where the emotion shifts mid-line.',
} as const;

export class DialogueEnhancerAgent
  extends BaseAgent<EnhancementRequest, EnhancementResult>
  implements EnhancementCollaborator
{
  constructor(client: OpenAI, model: string) {
    super(client, {
      name: 'DialogueEnhancerAgent',
      model,
      temperature: 0.6,
      maxTokens: 2000,
      systemPrompt: `You are a podcast script enhancer for expressive text-to-speech.
Your job is to turn plain dialogue into natural podcast speech by adding audio tags in square brackets.

Rules:
1. Only use tags from the allowed list you are given. Never use [laughs].
2. Place a tag at the start of a line or of a clause.
3. Add pacing with ellipses "..." and dashes where it helps the flow.
4. Keep tag usage balanced and subtle; it should sound like a real conversation, not acting.

CRITICAL RULES:
- Return EXACTLY the same number of lines, in the same order, with the same speakers.
- Do not change, add or remove any words. Only tags and punctuation.
- The single exception: when asked to include a product mention, rewrite ONE line so its speaker casually mentions the product
  in a personal, non-ad way (no "best", "download", "sign up", no commands, no exclamation marks, 20 words max).
  Only use facts from the product description.

You must respond with valid JSON only:
{"dialogue_lines": [{"speaker": "string", "text": "string"}]}`,
    });
  }

  enhanceDialogue(request: EnhancementRequest): Promise<EnhancementResult> {
    return this.execute(request);
  }

  protected async process(input: EnhancementRequest): Promise<EnhancementResult> {
    const { lines, profile, intensity, include_app_mention, emotion_tags } = input;

    const mentionInstruction = include_app_mention
      ? `Include ONE soft mention of ${profile.product_name} (${profile.product_description}) in a single line, ideally 7-15 seconds in, followed by at least two more lines.`
      : 'Do NOT mention any product.';

    const userPrompt = `ALLOWED TAGS: ${emotion_tags.map(tag => `[${tag}]`).join(' ')}
INTENSITY: ${intensity} - ${INTENSITY_GUIDE[intensity]}
${mentionInstruction}

Enhance this podcast clip:
${JSON.stringify({ dialogue_lines: lines }, null, 2)}`;

    const response = await this.callOpenAI(
      [
        { role: 'system', content: this.config.systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      { responseFormat: 'json_object' }
    );

    const parsed = this.parseJson(response, EnhancedDialogueSchema);
    return { lines: parsed.dialogue_lines };
  }
}

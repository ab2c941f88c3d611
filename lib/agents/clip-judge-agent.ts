/**
 * Clip Judge Agent - Rates one candidate segment for product fit and hook strength
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { BaseAgent } from './base';
import type { ReasoningCollaborator, ScoringRequest, ScoringResult } from '../collaborators';

const score05 = z.number().min(0).max(5);

const JudgementSchema = z.object({
  relevance_score_0_1: z.number().min(0).max(1),
  app_mention_fits: z.boolean(),
  hook_text: z.string().default(''),
  on_topic_terms_found: z.array(z.string()).default([]),
  viral_rationale: z.object({
    score_total_0_10: z.number().min(0).max(10),
    strong_claim_0_5: score05,
    tension_resolution_0_5: score05,
    quotability_0_5: score05,
    specificity_0_5: score05,
    emotion_fit_0_5: score05,
    notes: z.string().default(''),
  }),
});

export class ClipJudgeAgent
  extends BaseAgent<ScoringRequest, ScoringResult>
  implements ReasoningCollaborator
{
  constructor(client: OpenAI, model: string) {
    super(client, {
      name: 'ClipJudgeAgent',
      model,
      temperature: 0.2,
      maxTokens: 1200,
      systemPrompt: `You are a ruthless short-form podcast editor judging ONE ~30-second podcast moment.

Decide how strongly this moment fits the product's topic, value proposition and use cases, and how well it would perform as a vertical short.

## Relevance gate
- Build a topic ontology from the topic, value prop, use cases and whitelist keywords, including common synonyms.
- The opening line should contain at least one high-priority ontology term or a clear synonym.
- Within the window there should be a pain point or workflow aligned with at least one use case.
- Off-topic anecdotes, bios, tour dates, meta-chatter and politics score low. If uncertain, score low.

## Scoring
- relevance_score_0_1 measures CONTEXT FIT with the product only, not hook quality.
- viral_rationale rates the hook and flow; score_total_0_10 is your overall verdict.
- app_mention_fits is true only if one speaker could casually mention using such a product in this conversation without it sounding like an ad.
- hook_text quotes the strongest opening line verbatim.
- on_topic_terms_found lists ontology terms that literally appear in the dialogue.

Never invent dialogue. You must respond with valid JSON only:
{
  "relevance_score_0_1": 0.0,
  "app_mention_fits": true,
  "hook_text": "string",
  "on_topic_terms_found": ["string"],
  "viral_rationale": {
    "score_total_0_10": 0,
    "strong_claim_0_5": 0,
    "tension_resolution_0_5": 0,
    "quotability_0_5": 0,
    "specificity_0_5": 0,
    "emotion_fit_0_5": 0,
    "notes": "string (quote the hook, list on-topic lines)"
  }
}`,
    });
  }

  scoreSegment(request: ScoringRequest): Promise<ScoringResult> {
    return this.execute(request);
  }

  protected async process(input: ScoringRequest): Promise<ScoringResult> {
    const { profile, dialogue, whitelist, blacklist } = input;

    const userPrompt = `APP_NAME: ${profile.product_name}
APP_VALUE_PROP: ${profile.product_description}
APP_USE_CASES: ${profile.use_cases.join(' | ')}
AUDIENCE_DESC: ${profile.audience}
TOPIC: ${profile.topic}
OPTIONAL_WHITELIST_KEYWORDS: ${JSON.stringify(whitelist)}
OPTIONAL_BLACKLIST_KEYWORDS: ${JSON.stringify(blacklist)}

DIALOGUE:
${dialogue.map(line => `${line.speaker}: ${line.text}`).join('\n')}`;

    const response = await this.callOpenAI(
      [
        { role: 'system', content: this.config.systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      { responseFormat: 'json_object' }
    );

    const judgement = this.parseJson(response, JudgementSchema);

    return {
      relevance_score: judgement.relevance_score_0_1,
      app_mention_present: judgement.app_mention_fits,
      hook_text: judgement.hook_text,
      on_topic_terms: judgement.on_topic_terms_found,
      viral_rationale: judgement.viral_rationale,
    };
  }
}

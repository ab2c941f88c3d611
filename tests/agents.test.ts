/**
 * Tests for the OpenAI-backed agents, with the model call replaced by scripted replies
 */

import OpenAI from 'openai';
import { describe, it, expect } from 'vitest';
import { ClipJudgeAgent } from '../lib/agents/clip-judge-agent';
import { DialogueEnhancerAgent } from '../lib/agents/dialogue-enhancer-agent';
import { SiteAnalystAgent, toSiteProfile, type SiteAnalysis } from '../lib/agents/site-analyst-agent';
import type { ScoringRequest } from '../lib/collaborators';
import { CollaboratorTransportError } from '../lib/errors';
import { withRetryPolicy } from '../lib/utils/call-policy';
import { NO_DELAY_RETRY, PROFILE } from './helpers';

type Message = { role: string; content: string };

const client = new OpenAI({ apiKey: 'test-key' });

class ScriptedJudge extends ClipJudgeAgent {
  readonly prompts: string[] = [];

  constructor(private readonly replies: string[]) {
    super(client, 'gpt-test');
  }

  protected async callOpenAI(messages: Message[]): Promise<string> {
    this.prompts.push(messages[messages.length - 1].content);
    return this.replies.shift() ?? '';
  }
}

class ScriptedAnalyst extends SiteAnalystAgent {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string) {
    super(client, 'gpt-test', { scrapeMarkdown: async url => `# Clipwise\nScraped from ${url}` });
  }

  protected async callOpenAI(messages: Message[]): Promise<string> {
    this.prompts.push(messages[messages.length - 1].content);
    return this.reply;
  }
}

class ScriptedEnhancer extends DialogueEnhancerAgent {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string) {
    super(client, 'gpt-test');
  }

  protected async callOpenAI(messages: Message[]): Promise<string> {
    this.prompts.push(messages[messages.length - 1].content);
    return this.reply;
  }
}

const REQUEST: ScoringRequest = {
  segment_text: 'Editing took hours. Not anymore.',
  dialogue: [
    { speaker: 'Speaker A', text: 'Editing took hours.' },
    { speaker: 'Speaker B', text: 'Not anymore.' },
  ],
  profile: PROFILE,
  whitelist: [],
  blacklist: ['politics'],
};

const JUDGEMENT = JSON.stringify({
  relevance_score_0_1: 0.82,
  app_mention_fits: true,
  hook_text: 'Editing took hours.',
  on_topic_terms_found: ['editing'],
  viral_rationale: {
    score_total_0_10: 7,
    strong_claim_0_5: 4,
    tension_resolution_0_5: 3,
    quotability_0_5: 4,
    specificity_0_5: 3,
    emotion_fit_0_5: 3,
  },
});

describe('ClipJudgeAgent', () => {
  it('should map the judgement onto a scoring result', async () => {
    const judge = new ScriptedJudge([JUDGEMENT]);

    const result = await judge.scoreSegment(REQUEST);

    expect(result).toEqual({
      relevance_score: 0.82,
      app_mention_present: true,
      hook_text: 'Editing took hours.',
      on_topic_terms: ['editing'],
      viral_rationale: {
        score_total_0_10: 7,
        strong_claim_0_5: 4,
        tension_resolution_0_5: 3,
        quotability_0_5: 4,
        specificity_0_5: 3,
        emotion_fit_0_5: 3,
        notes: '',
      },
    });
    expect(judge.prompts[0]).toContain('APP_NAME: Clipwise');
    expect(judge.prompts[0]).toContain('OPTIONAL_BLACKLIST_KEYWORDS: ["politics"]');
    expect(judge.prompts[0]).toContain('Speaker A: Editing took hours.\nSpeaker B: Not anymore.');
  });

  it('should report a reply that is not JSON as a transport error', async () => {
    const judge = new ScriptedJudge(['nope']);

    const scoring = judge.scoreSegment(REQUEST);

    await expect(scoring).rejects.toBeInstanceOf(CollaboratorTransportError);
    await expect(scoring).rejects.toThrow('ClipJudgeAgent: response is not JSON: nope');
  });

  it('should report a reply outside the schema', async () => {
    const judge = new ScriptedJudge([JUDGEMENT.replace('0.82', '1.5')]);

    await expect(judge.scoreSegment(REQUEST)).rejects.toThrow(
      'ClipJudgeAgent: response does not match schema: relevance_score_0_1: Number must be less than or equal to 1'
    );
  });

  it('should succeed on the retry that follows a malformed reply', async () => {
    const judge = new ScriptedJudge(['{"relevance_score_0_1": "high"}', JUDGEMENT]);

    const result = await withRetryPolicy('reasoning', () => judge.scoreSegment(REQUEST), NO_DELAY_RETRY);

    expect(result.relevance_score).toBe(0.82);
    expect(judge.prompts).toHaveLength(2);
  });
});

describe('toSiteProfile', () => {
  it('should condense the analysis into a site profile', () => {
    const analysis: SiteAnalysis = {
      app_name: ' Clipwise ',
      what_it_does: 'Turns episodes into clips.',
      wow_factor: 'Finds the hook automatically',
      better_than_rest: '  ',
      hard_problem_solved: 'Hours of manual editing',
      topic_keywords: ['podcast editing', ' short-form video ', 'captions', 'hooks', 'clips', 'growth'],
      ideal_customer_profiles: [
        { profile: 'Indie podcasters', description: 'solo hosts' },
        { profile: 'Agencies', description: 'teams with many shows' },
      ],
      podcast_search_keywords: [],
    };

    expect(toSiteProfile(analysis)).toEqual({
      product_name: 'Clipwise',
      product_description: 'Turns episodes into clips.',
      topic: 'podcast editing, short-form video, captions, hooks, clips',
      audience: 'Indie podcasters: solo hosts | Agencies: teams with many shows',
      topic_keywords: ['podcast editing', 'short-form video', 'captions', 'hooks', 'clips', 'growth'],
      use_cases: ['Finds the hook automatically', 'Hours of manual editing'],
    });
  });

  it('should fall back to the description when there are no keywords', () => {
    const profile = toSiteProfile({
      app_name: 'Clipwise',
      what_it_does: 'Turns episodes into clips.',
      wow_factor: '',
      better_than_rest: '',
      hard_problem_solved: '',
      topic_keywords: [],
      ideal_customer_profiles: [],
      podcast_search_keywords: [],
    });

    expect(profile.topic).toBe('Turns episodes into clips.');
    expect(profile.use_cases).toEqual([]);
  });
});

describe('SiteAnalystAgent', () => {
  it('should analyze the scraped page', async () => {
    const analyst = new ScriptedAnalyst(
      JSON.stringify({ app_name: 'Clipwise', what_it_does: 'Turns episodes into clips.', topic_keywords: ['clips'] })
    );

    const profile = await analyst.analyzeSite('https://clipwise.example');

    expect(profile).toEqual({
      product_name: 'Clipwise',
      product_description: 'Turns episodes into clips.',
      topic: 'clips',
      audience: '',
      topic_keywords: ['clips'],
      use_cases: [],
    });
    expect(analyst.prompts[0]).toBe(
      'URL: https://clipwise.example\n\nPAGE:\n# Clipwise\nScraped from https://clipwise.example'
    );
  });
});

describe('DialogueEnhancerAgent', () => {
  it('should return the enhanced lines and forbid a mention unless asked', async () => {
    const enhancer = new ScriptedEnhancer(
      JSON.stringify({ dialogue_lines: [{ speaker: 'Speaker A', text: '[thoughtful] Editing took hours.' }] })
    );

    const result = await enhancer.enhanceDialogue({
      lines: [{ speaker: 'Speaker A', text: 'Editing took hours.' }],
      profile: PROFILE,
      intensity: 'subtle',
      include_app_mention: false,
      emotion_tags: ['thoughtful', 'excited'],
    });

    expect(result).toEqual({ lines: [{ speaker: 'Speaker A', text: '[thoughtful] Editing took hours.' }] });
    expect(enhancer.prompts[0]).toContain('ALLOWED TAGS: [thoughtful] [excited]');
    expect(enhancer.prompts[0]).toContain('Do NOT mention any product.');
  });
});

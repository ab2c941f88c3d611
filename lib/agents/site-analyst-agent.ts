/**
 * Site Analyst Agent - Reads a product website and summarizes what the product
 * does and for whom, as the profile the rest of the pipeline scores against.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { BaseAgent } from './base';
import type { SiteAnalysisCollaborator } from '../collaborators';
import type { PageScraper } from '../tools/firecrawl';
import type { SiteProfile } from '../types';
import { truncate } from '../utils';

const MAX_PAGE_CHARS = 20000;

export const SiteAnalysisSchema = z.object({
  app_name: z.string().min(1),
  what_it_does: z.string().min(1),
  wow_factor: z.string().default(''),
  better_than_rest: z.string().default(''),
  hard_problem_solved: z.string().default(''),
  topic_keywords: z.array(z.string()).default([]),
  ideal_customer_profiles: z
    .array(
      z.object({
        profile: z.string(),
        description: z.string(),
      })
    )
    .default([]),
  podcast_search_keywords: z.array(z.string()).default([]),
});

export type SiteAnalysis = z.infer<typeof SiteAnalysisSchema>;

export function toSiteProfile(analysis: SiteAnalysis): SiteProfile {
  const keywords = analysis.topic_keywords.map(k => k.trim()).filter(Boolean);

  return {
    product_name: analysis.app_name.trim(),
    product_description: analysis.what_it_does.trim(),
    topic: keywords.slice(0, 5).join(', ') || analysis.what_it_does.trim(),
    audience: analysis.ideal_customer_profiles
      .map(icp => `${icp.profile}: ${icp.description}`)
      .join(' | '),
    topic_keywords: keywords,
    use_cases: [analysis.wow_factor, analysis.better_than_rest, analysis.hard_problem_solved]
      .map(s => s.trim())
      .filter(Boolean),
  };
}

export class SiteAnalystAgent
  extends BaseAgent<string, SiteProfile>
  implements SiteAnalysisCollaborator
{
  constructor(
    client: OpenAI,
    model: string,
    private readonly scraper: PageScraper
  ) {
    super(client, {
      name: 'SiteAnalystAgent',
      model,
      temperature: 0.3,
      maxTokens: 2000,
      systemPrompt: `You are a product marketing analyst. Given the markdown of a product website,
extract a concise, factual profile of the product. Only use facts stated on the page.

You must respond with valid JSON only:
{
  "app_name": "string",
  "what_it_does": "one or two sentences",
  "wow_factor": "string",
  "better_than_rest": "string",
  "hard_problem_solved": "string",
  "topic_keywords": ["5-10 short keywords"],
  "ideal_customer_profiles": [{"profile": "string", "description": "string"}],
  "podcast_search_keywords": ["string"]
}`,
    });
  }

  analyzeSite(url: string): Promise<SiteProfile> {
    return this.execute(url);
  }

  protected async process(url: string): Promise<SiteProfile> {
    const markdown = await this.scraper.scrapeMarkdown(url);

    const response = await this.callOpenAI(
      [
        { role: 'system', content: this.config.systemPrompt },
        { role: 'user', content: `URL: ${url}\n\nPAGE:\n${truncate(markdown, MAX_PAGE_CHARS)}` },
      ],
      { responseFormat: 'json_object' }
    );

    return toSiteProfile(this.parseJson(response, SiteAnalysisSchema));
  }
}

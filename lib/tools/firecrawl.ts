/**
 * Firecrawl Tool - Scrapes a page to markdown
 */

import { z } from 'zod';
import { CollaboratorRequestError } from '../errors';
import { Logger } from '../utils';
import { HttpTool } from './http';

const FIRECRAWL_SCRAPE_URL = 'https://api.firecrawl.dev/v1/scrape';

const ScrapeResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      markdown: z.string().optional(),
    })
    .optional(),
  error: z.string().optional(),
});

export interface PageScraper {
  scrapeMarkdown(url: string): Promise<string>;
}

export class FirecrawlTool implements PageScraper {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number = 60000
  ) {}

  async scrapeMarkdown(url: string): Promise<string> {
    if (!this.apiKey) {
      throw new CollaboratorRequestError('firecrawl', 'FIRECRAWL_API_KEY is not set');
    }

    const raw = await HttpTool.requestJson('firecrawl', FIRECRAWL_SCRAPE_URL, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: { url, formats: ['markdown'] },
      timeout: this.timeoutMs,
    });

    const parsed = ScrapeResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorRequestError('firecrawl', `unexpected scrape response for ${url}`);
    }

    const markdown = parsed.data.data?.markdown?.trim() ?? '';
    if (!parsed.data.success || !markdown) {
      throw new CollaboratorRequestError(
        'firecrawl',
        `no content scraped from ${url}${parsed.data.error ? `: ${parsed.data.error}` : ''}`
      );
    }

    Logger.info('Site scraped', { url, characters: markdown.length });
    return markdown;
  }
}

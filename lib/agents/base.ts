/**
 * Base Agent class - Foundation for the OpenAI-backed collaborators
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { classifyError, CollaboratorTransportError } from '../errors';
import { Logger, truncate } from '../utils';

export interface AgentConfig {
  name: string;
  systemPrompt: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export abstract class BaseAgent<TInput, TOutput> {
  protected config: Required<AgentConfig>;

  // API call tracking
  protected apiCallCount: number = 0;

  constructor(
    protected client: OpenAI,
    config: AgentConfig
  ) {
    this.config = {
      temperature: 0.7,
      maxTokens: 4000,
      ...config,
    };
  }

  get apiCalls(): number {
    return this.apiCallCount;
  }

  /**
   * Runs one unit of work. Retrying is the caller's call policy; failures
   * leave here already classified as transient or permanent.
   */
  async execute(input: TInput): Promise<TOutput> {
    const startTime = Date.now();
    const callsBefore = this.apiCallCount;

    try {
      Logger.info(`${this.config.name} starting`);

      const output = await this.process(input);

      Logger.info(`${this.config.name} completed`, {
        api_calls: this.apiCallCount - callsBefore,
        duration_ms: Date.now() - startTime,
      });

      return output;
    } catch (error) {
      const classified = classifyError(this.config.name, error);

      Logger.error(`${this.config.name} failed`, {
        kind: classified.kind,
        error: classified.message,
        duration_ms: Date.now() - startTime,
      });

      throw classified;
    }
  }

  /**
   * Abstract method - must be implemented by each agent
   */
  protected abstract process(input: TInput): Promise<TOutput>;

  /**
   * Helper: Call OpenAI chat completion
   */
  protected async callOpenAI(
    messages: ChatMessage[],
    options: {
      temperature?: number;
      maxTokens?: number;
      responseFormat?: 'text' | 'json_object';
    } = {}
  ): Promise<string> {
    const {
      temperature = this.config.temperature,
      maxTokens = this.config.maxTokens,
      responseFormat = 'text',
    } = options;

    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages,
      temperature,
      max_tokens: maxTokens,
      response_format: responseFormat === 'json_object' ? { type: 'json_object' } : undefined,
    });

    // Increment API call counter
    this.apiCallCount++;

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new CollaboratorTransportError(this.config.name, 'empty completion');
    }
    return content;
  }

  /**
   * Helper: Parse a JSON completion against its schema. A reply that does not
   * match is treated as a transient fault so the call policy asks again.
   */
  protected parseJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CollaboratorTransportError(
        this.config.name,
        `response is not JSON: ${truncate(raw, 120)}`,
        undefined,
        error
      );
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new CollaboratorTransportError(
        this.config.name,
        `response does not match schema: ${issues.join('; ')}`
      );
    }
    return result.data;
  }
}

import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../observability/logger.js';

const MODEL = 'claude-sonnet-4-20250514';
const MAX_TOKENS = 512;
const TIMEOUT_MS = 30000;
const MAX_RETRIES = 1;

export interface TextCompletion {
  text: string;
  stopReason: string | null;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Narrow surface the doc suggester needs; tests substitute their own. */
export interface CompletionClient {
  complete(systemPrompt: string, userPrompt: string): Promise<TextCompletion>;
}

export class ClaudeClient implements CompletionClient {
  private client: Anthropic;

  constructor(apiKey: string) {
    if (!apiKey) {
      throw new Error('Anthropic API key is required');
    }

    this.client = new Anthropic({
      apiKey,
      timeout: TIMEOUT_MS,
      maxRetries: MAX_RETRIES,
    });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<TextCompletion> {
    try {
      const response = await this.client.messages.create({
        model: MODEL,
        max_tokens: MAX_TOKENS,
        temperature: 0,
        system: systemPrompt,
        messages: [
          {
            role: 'user',
            content: userPrompt,
          },
        ],
      });

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') parts.push(block.text);
      }

      return {
        text: parts.join('').trim(),
        stopReason: response.stop_reason,
        usage: response.usage ? {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        } : undefined,
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        logger.error('claude_api_error', 'Claude API error', {
          status: error.status,
          message: error.message,
        });
        throw new Error(`Claude API failed: ${error.message}`);
      }
      throw error;
    }
  }
}

export function createClaudeClient(apiKey: string | undefined): ClaudeClient | null {
  if (!apiKey) {
    return null;
  }
  return new ClaudeClient(apiKey);
}

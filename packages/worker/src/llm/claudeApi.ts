import { z } from 'zod';
import { LLMClient, LLMClientOptions } from './client';
import { LLMError } from '../errors';

const messagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/**
 * Anthropic Messages API client
 */
export class ClaudeAPI implements LLMClient {
  readonly provider = 'claude' as const;
  private model: string;
  private maxTokens: number;
  private baseUrl: string;

  constructor(private options: LLMClientOptions) {
    this.model = options.model || 'claude-3-5-sonnet-20241022';
    this.maxTokens = options.maxTokens || 8192;
    this.baseUrl = options.baseUrl || 'https://api.anthropic.com';
  }

  async complete(prompt: string): Promise<string> {
    console.log(`[Claude API] Sending prompt (${prompt.length} characters) to ${this.model}`);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.options.apiKey,
          'anthropic-version': '2023-06-01',
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [{ role: 'user', content: prompt }],
        }),
      });
    } catch (error) {
      throw new LLMError('Claude API request failed', { cause: error });
    }

    if (!response.ok) {
      const error = await response.text();
      throw new LLMError(`Claude API error (${response.status}): ${error}`);
    }

    const parsed = messagesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LLMError('Claude API returned an unexpected response');
    }

    return parsed.data.content
      .map((block) => (block.type === 'text' && block.text ? block.text : ''))
      .join('');
  }
}

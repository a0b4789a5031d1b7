import { z } from 'zod';
import { LLMClient, LLMClientOptions } from './client';
import { LLMError } from '../errors';

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

/**
 * Gemini `generateContent` client over the Generative Language REST API.
 */
export class GeminiAPI implements LLMClient {
  readonly provider = 'gemini' as const;
  private model: string;
  private maxTokens: number;
  private baseUrl: string;

  constructor(private options: LLMClientOptions) {
    this.model = options.model || 'gemini-flash-lite-latest';
    this.maxTokens = options.maxTokens || 8192;
    this.baseUrl = options.baseUrl || 'https://generativelanguage.googleapis.com';
  }

  async complete(prompt: string): Promise<string> {
    console.log(`[Gemini API] Sending prompt (${prompt.length} characters) to ${this.model}`);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1beta/models/${this.model}:generateContent`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.options.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: { maxOutputTokens: this.maxTokens },
        }),
      });
    } catch (error) {
      throw new LLMError('Gemini API request failed', { cause: error });
    }

    if (!response.ok) {
      const error = await response.text();
      throw new LLMError(`Gemini API error (${response.status}): ${error}`);
    }

    const parsed = generateContentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LLMError('Gemini API returned an unexpected response');
    }

    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new LLMError(`Gemini API blocked the prompt: ${blockReason}`);
    }

    const parts = parsed.data.candidates?.[0]?.content?.parts || [];
    return parts.map((part) => part.text || '').join('');
  }
}

import { LLMProvider } from '@pagelaunch/shared';

export interface LLMClient {
  readonly provider: LLMProvider;
  complete(prompt: string): Promise<string>;
}

export interface LLMClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  /** Overrides the provider's API origin. */
  baseUrl?: string;
}

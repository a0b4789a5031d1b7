import { LLMProvider } from '@pagelaunch/shared';
import { LLMClient, LLMClientOptions } from './client';
import { ClaudeAPI } from './claudeApi';
import { GeminiAPI } from './geminiApi';

export function createLLMClient(provider: LLMProvider, options: LLMClientOptions): LLMClient {
  switch (provider) {
    case 'claude':
      return new ClaudeAPI(options);
    case 'gemini':
      return new GeminiAPI(options);
  }
}

export * from './client';
export * from './claudeApi';
export * from './geminiApi';
export * from './prompts';
export * from './artifactParser';
export * from './codeGenerator';

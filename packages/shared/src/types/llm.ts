export type LLMProvider = 'gemini' | 'claude';

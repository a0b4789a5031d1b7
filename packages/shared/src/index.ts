export * from './types/task-request';
export * from './types/deployment';
export * from './types/llm';

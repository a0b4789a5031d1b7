export * from './errors';
export * from './cli/commandRunner';
export * from './cli/git';
export * from './cli/github';
export * from './llm';
export * from './publisher/repositoryPublisher';
export * from './publisher/license';
export * from './pages/pagesEnabler';
export * from './notifier/notifier';

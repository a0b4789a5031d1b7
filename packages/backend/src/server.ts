import 'dotenv/config';
import {
  CommandRunner,
  EvaluationNotifier,
  LLMCodeGenerator,
  PagesEnabler,
  RepositoryPublisher,
  createLLMClient,
} from '@pagelaunch/worker';
import { createApp } from './app';
import { ConfigError, loadConfig } from './config';
import { DeploymentService } from './services/deploymentService';

function main() {
  const config = loadConfig();

  const runner = new CommandRunner({ secrets: [config.github.token, config.llm.apiKey] });
  const service = new DeploymentService(
    {
      generator: new LLMCodeGenerator(
        createLLMClient(config.llm.provider, {
          apiKey: config.llm.apiKey,
          model: config.llm.model,
          maxTokens: config.llm.maxTokens,
        })
      ),
      publisher: new RepositoryPublisher(
        {
          owner: config.github.user,
          token: config.github.token,
          host: config.github.host,
          workDir: config.workDir,
          identity: { name: config.github.authorName, email: config.github.authorEmail },
          timeout: config.commandTimeoutMs,
        },
        runner
      ),
      pages: new PagesEnabler({
        owner: config.github.user,
        token: config.github.token,
        apiUrl: config.github.apiUrl,
        pagesDomain: config.github.pagesDomain,
      }),
      notifier: new EvaluationNotifier(),
    },
    { pagesSettleDelayMs: config.pagesSettleDelayMs }
  );

  const app = createApp({
    deployer: service,
    apiSecret: config.apiSecret,
    processingMode: config.processingMode,
  });

  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port} (${config.processingMode} mode, ${config.llm.provider})`);
  });
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

import {
  ArtifactSet,
  EvaluationPayload,
  ProjectBrief,
  PublishResult,
  TaskRequest,
} from '@pagelaunch/shared';
import {
  CodeGenerator,
  CompletionNotifier,
  HostingEnabler,
  PublishOptions,
  Publisher,
} from '@pagelaunch/worker';
import { DeploymentDependencies } from '../src/services/deploymentService';

export type StepCall =
  | { step: 'generate'; brief: ProjectBrief }
  | { step: 'revise'; brief: ProjectBrief; existingCode: string }
  | { step: 'readFile'; repoName: string; filePath: string }
  | { step: 'publish'; artifacts: ArtifactSet; options: PublishOptions }
  | { step: 'enable'; repoName: string }
  | { step: 'notify'; evaluationUrl: string; payload: EvaluationPayload };

/**
 * One journal shared by every fake step, so tests can assert ordering.
 * Set a step name in `failures` to make that step throw.
 */
export class StepJournal {
  calls: StepCall[] = [];
  failures = new Map<StepCall['step'], Error>();
  existingCode: string | null = '<html>v1</html>';

  steps(): StepCall['step'][] {
    return this.calls.map((call) => call.step);
  }

  record(call: StepCall): void {
    this.calls.push(call);
    const failure = this.failures.get(call.step);
    if (failure) {
      throw failure;
    }
  }
}

export function fakeDependencies(journal: StepJournal): DeploymentDependencies {
  const generator: CodeGenerator = {
    async generate(brief) {
      journal.record({ step: 'generate', brief });
      return { 'index.html': '<html>v1</html>' };
    },
    async revise(brief, existingCode) {
      journal.record({ step: 'revise', brief, existingCode });
      return { 'index.html': '<html>v2</html>' };
    },
  };

  const publisher: Publisher = {
    async publish(artifacts, options): Promise<PublishResult> {
      journal.record({ step: 'publish', artifacts, options });
      return { repo_url: `https://github.com/octo-user/${options.repoName}`, commit_sha: 'abc123' };
    },
    async readFile(repoName, filePath) {
      journal.record({ step: 'readFile', repoName, filePath });
      return journal.existingCode;
    },
  };

  const pages: HostingEnabler = {
    async enable(repoName) {
      journal.record({ step: 'enable', repoName });
      return `https://octo-user.github.io/${repoName}/`;
    },
  };

  const notifier: CompletionNotifier = {
    async notify(evaluationUrl, payload) {
      journal.record({ step: 'notify', evaluationUrl, payload });
    },
  };

  return { generator, publisher, pages, notifier };
}

export function taskRequest(overrides: Partial<TaskRequest> = {}): TaskRequest {
  return {
    email: 'student@example.com',
    secret: 'test-secret',
    task: 'my-site',
    round: 1,
    nonce: 'nonce-1',
    brief: 'Build a counter page.',
    checks: ['Has a button'],
    evaluation_url: 'http://evaluator.test/notify',
    ...overrides,
  };
}

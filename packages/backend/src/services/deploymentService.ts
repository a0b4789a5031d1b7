import {
  ArtifactSet,
  DeploymentRecord,
  EvaluationPayload,
  ProjectBrief,
  TaskRequest,
  modeForRound,
} from '@pagelaunch/shared';
import { CodeGenerator, CompletionNotifier, HostingEnabler, Publisher, PublishError } from '@pagelaunch/worker';

export interface DeploymentDependencies {
  generator: CodeGenerator;
  publisher: Publisher;
  pages: HostingEnabler;
  notifier: CompletionNotifier;
}

export interface DeploymentOptions {
  /** Wait between enabling Pages and notifying the evaluation server. */
  pagesSettleDelayMs?: number;
}

const ENTRY_FILE = 'index.html';

/**
 * Runs one deployment: generate → publish → enable Pages → notify.
 * Steps run strictly in order and the first failure aborts the rest.
 */
export class DeploymentService {
  constructor(
    private deps: DeploymentDependencies,
    private options: DeploymentOptions = {}
  ) {}

  async deploy(request: TaskRequest): Promise<DeploymentRecord> {
    const mode = modeForRound(request.round);
    console.log(`[Deployment] Processing round ${request.round} (${mode}) for task: ${request.task}`);

    const artifacts =
      mode === 'create' ? await this.deps.generator.generate(toBrief(request)) : await this.revise(request);

    const published = await this.deps.publisher.publish(artifacts, { repoName: request.task, mode });
    const pagesUrl = await this.deps.pages.enable(request.task);

    const delay = this.options.pagesSettleDelayMs || 0;
    if (delay > 0) {
      console.log(`[Deployment] Waiting ${delay / 1000} seconds for GitHub Pages to deploy...`);
      await sleep(delay);
    }

    const record: DeploymentRecord = {
      task: request.task,
      round: request.round,
      mode,
      repo_url: published.repo_url,
      commit_sha: published.commit_sha,
      pages_url: pagesUrl,
    };

    const payload: EvaluationPayload = {
      email: request.email,
      task: request.task,
      round: request.round,
      nonce: request.nonce,
      repo_url: record.repo_url,
      commit_sha: record.commit_sha,
      pages_url: record.pages_url,
    };
    await this.deps.notifier.notify(request.evaluation_url, payload);

    console.log(`[Deployment] Task ${request.task} round ${request.round} deployed at ${pagesUrl}`);
    return record;
  }

  private async revise(request: TaskRequest): Promise<ArtifactSet> {
    const existingCode = await this.deps.publisher.readFile(request.task, ENTRY_FILE);
    if (existingCode === null) {
      throw new PublishError(`Could not retrieve existing ${ENTRY_FILE} from repository ${request.task}.`);
    }
    return this.deps.generator.revise(toBrief(request), existingCode);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toBrief(request: TaskRequest): ProjectBrief {
  return {
    task: request.task,
    brief: request.brief,
    checks: request.checks,
    attachments: request.attachments,
  };
}

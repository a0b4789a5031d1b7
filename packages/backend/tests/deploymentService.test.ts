import { LLMError, CommandError } from '@pagelaunch/worker';
import { DeploymentService } from '../src/services/deploymentService';
import { StepJournal, fakeDependencies, taskRequest } from './fakes';

describe('DeploymentService', () => {
  let journal: StepJournal;
  let service: DeploymentService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    journal = new StepJournal();
    service = new DeploymentService(fakeDependencies(journal));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('create (round 1)', () => {
    it('runs generate → publish → enable → notify exactly once each, in order', async () => {
      const record = await service.deploy(taskRequest());

      expect(journal.steps()).toEqual(['generate', 'publish', 'enable', 'notify']);
      expect(record).toEqual({
        task: 'my-site',
        round: 1,
        mode: 'create',
        repo_url: 'https://github.com/octo-user/my-site',
        commit_sha: 'abc123',
        pages_url: 'https://octo-user.github.io/my-site/',
      });
    });

    it('hands the generator only the brief fields', async () => {
      await service.deploy(taskRequest({ attachments: [{ name: 'a.txt', url: 'data:,a' }] }));

      expect(journal.calls[0]).toEqual({
        step: 'generate',
        brief: {
          task: 'my-site',
          brief: 'Build a counter page.',
          checks: ['Has a button'],
          attachments: [{ name: 'a.txt', url: 'data:,a' }],
        },
      });
    });

    it('publishes the generated artifacts as a new repository', async () => {
      await service.deploy(taskRequest());

      expect(journal.calls[1]).toEqual({
        step: 'publish',
        artifacts: { 'index.html': '<html>v1</html>' },
        options: { repoName: 'my-site', mode: 'create' },
      });
    });

    it('notifies the evaluation server with the deployment URLs', async () => {
      await service.deploy(taskRequest());

      expect(journal.calls[3]).toEqual({
        step: 'notify',
        evaluationUrl: 'http://evaluator.test/notify',
        payload: {
          email: 'student@example.com',
          task: 'my-site',
          round: 1,
          nonce: 'nonce-1',
          repo_url: 'https://github.com/octo-user/my-site',
          commit_sha: 'abc123',
          pages_url: 'https://octo-user.github.io/my-site/',
        },
      });
    });
  });

  describe('failures', () => {
    it('does not publish when the LLM call fails', async () => {
      journal.failures.set('generate', new LLMError('Gemini API error (500): boom'));

      await expect(service.deploy(taskRequest())).rejects.toThrow('Gemini API error (500): boom');
      expect(journal.steps()).toEqual(['generate']);
    });

    it('neither enables hosting nor notifies when publishing fails', async () => {
      journal.failures.set('publish', new CommandError('git push', 1, 'rejected'));

      await expect(service.deploy(taskRequest())).rejects.toThrow(CommandError);
      expect(journal.steps()).toEqual(['generate', 'publish']);
    });

    it('does not notify when enabling hosting fails', async () => {
      journal.failures.set('enable', new Error('pages unavailable'));

      await expect(service.deploy(taskRequest())).rejects.toThrow('pages unavailable');
      expect(journal.steps()).toEqual(['generate', 'publish', 'enable']);
    });

    it('surfaces a failed notification', async () => {
      journal.failures.set('notify', new Error('evaluation server down'));

      await expect(service.deploy(taskRequest())).rejects.toThrow('evaluation server down');
    });
  });

  describe('revise (round 2+)', () => {
    it('reuses the existing repository instead of creating one', async () => {
      const record = await service.deploy(taskRequest({ round: 2, brief: 'Add a reset button.' }));

      expect(journal.steps()).toEqual(['readFile', 'revise', 'publish', 'enable', 'notify']);
      expect(journal.calls[0]).toEqual({ step: 'readFile', repoName: 'my-site', filePath: 'index.html' });
      expect(journal.calls[1]).toMatchObject({ step: 'revise', existingCode: '<html>v1</html>' });
      expect(journal.calls[2]).toEqual({
        step: 'publish',
        artifacts: { 'index.html': '<html>v2</html>' },
        options: { repoName: 'my-site', mode: 'revise' },
      });
      expect(record.mode).toBe('revise');
      expect(record.round).toBe(2);
    });

    it('fails before calling the LLM when the repository has no index.html', async () => {
      journal.existingCode = null;

      await expect(service.deploy(taskRequest({ round: 3 }))).rejects.toThrow(
        'Could not retrieve existing index.html from repository my-site.'
      );
      expect(journal.steps()).toEqual(['readFile']);
    });
  });

  it('waits the configured settle delay before notifying', async () => {
    jest.useFakeTimers();
    try {
      const delayed = new DeploymentService(fakeDependencies(journal), { pagesSettleDelayMs: 60_000 });
      const pending = delayed.deploy(taskRequest());

      await jest.advanceTimersByTimeAsync(59_999);
      expect(journal.steps()).toEqual(['generate', 'publish', 'enable']);

      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(journal.steps()).toEqual(['generate', 'publish', 'enable', 'notify']);
    } finally {
      jest.useRealTimers();
    }
  });
});

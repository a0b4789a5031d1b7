import { CommandExecutor, RunOptions } from './commandRunner';
import { CommandError } from '../errors';

/**
 * Wrapper over the GitHub CLI (`gh`). Authentication comes from the
 * `GITHUB_TOKEN` variable passed in `options.env`.
 */
export class GitHubCLI {
  constructor(
    private executor: CommandExecutor,
    private options: Pick<RunOptions, 'env' | 'timeout'> = {}
  ) {}

  /**
   * Creates a public repository owned by the authenticated account.
   * Returns false when the repository already exists.
   */
  async createRepo(name: string): Promise<boolean> {
    const result = await this.executor.run('gh', ['repo', 'create', name, '--public'], this.options);
    if (result.success) {
      return true;
    }
    if ((result.error || '').includes('already exists')) {
      console.log(`[GitHub CLI] Repository ${name} already exists. Proceeding to push updates.`);
      return false;
    }
    throw new CommandError('gh repo create', result.exitCode, result.error || '');
  }
}

import { CommandExecutor, CLIResult, RunOptions } from './commandRunner';
import { CommandError } from '../errors';

export interface GitIdentity {
  name: string;
  email: string;
}

/**
 * Thin wrapper over the `git` binary. Every method throws `CommandError`
 * on a non-zero exit.
 */
export class GitCLI {
  constructor(
    private executor: CommandExecutor,
    private identity: GitIdentity,
    private options: Pick<RunOptions, 'env' | 'timeout'> = {}
  ) {}

  private async git(subcommand: string, args: string[], cwd?: string, globalArgs: string[] = []): Promise<CLIResult> {
    const result = await this.executor.run('git', [...globalArgs, subcommand, ...args], { ...this.options, cwd });
    if (!result.success) {
      throw new CommandError(`git ${subcommand}`, result.exitCode, result.error || '');
    }
    return result;
  }

  async init(cwd: string): Promise<void> {
    await this.git('init', [], cwd);
    await this.git('branch', ['-M', 'main'], cwd);
  }

  async clone(remoteUrl: string, destination: string): Promise<void> {
    await this.git('clone', [remoteUrl, destination]);
  }

  async addAll(cwd: string): Promise<void> {
    await this.git('add', ['-A'], cwd);
  }

  /** True when the work tree has staged or unstaged changes. */
  async hasChanges(cwd: string): Promise<boolean> {
    const result = await this.git('status', ['--porcelain'], cwd);
    return result.output.length > 0;
  }

  async commit(cwd: string, message: string): Promise<void> {
    await this.git('commit', ['-m', message], cwd, [
      '-c',
      `user.name=${this.identity.name}`,
      '-c',
      `user.email=${this.identity.email}`,
    ]);
  }

  async addRemote(cwd: string, name: string, url: string): Promise<void> {
    await this.git('remote', ['add', name, url], cwd);
  }

  async push(cwd: string, remote: string, branch: string, setUpstream = false): Promise<void> {
    await this.git('push', setUpstream ? ['-u', remote, branch] : [remote, branch], cwd);
  }

  async head(cwd: string): Promise<string> {
    const result = await this.git('rev-parse', ['HEAD'], cwd);
    return result.output;
  }
}

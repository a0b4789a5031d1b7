import path from 'path';
import { ArtifactSet, DeploymentMode, PublishResult } from '@pagelaunch/shared';
import { CommandExecutor, CommandRunner } from '../cli/commandRunner';
import { GitCLI, GitIdentity } from '../cli/git';
import { GitHubCLI } from '../cli/github';
import { PublishError } from '../errors';
import { createFile, makeWorkDir, readFileIfExists, removeDirectory, validatePath } from '../utils/fileSystem';
import { renderMitLicense, renderReadme } from './license';

export interface PublishOptions {
  repoName: string;
  mode: DeploymentMode;
  message?: string;
}

export interface Publisher {
  publish(artifacts: ArtifactSet, options: PublishOptions): Promise<PublishResult>;
  readFile(repoName: string, filePath: string): Promise<string | null>;
}

export interface PublisherConfig {
  owner: string;
  token: string;
  host: string;
  workDir: string;
  identity: GitIdentity;
  timeout?: number;
}

const REPO_NAME_PATTERN = /^[A-Za-z0-9._-]{1,100}$/;
const DEFAULT_BRANCH = 'main';

/**
 * Pushes generated files to a GitHub repository using the `gh` and `git`
 * binaries. Each call works in its own temporary directory and removes it
 * before returning.
 */
export class RepositoryPublisher implements Publisher {
  private git: GitCLI;
  private gh: GitHubCLI;

  constructor(private config: PublisherConfig, executor?: CommandExecutor) {
    const runner = executor || new CommandRunner({ secrets: [config.token] });
    const runOptions = {
      env: {
        GITHUB_TOKEN: config.token,
        GH_HOST: config.host,
        GH_PROMPT_DISABLED: '1',
        GIT_TERMINAL_PROMPT: '0',
      },
      timeout: config.timeout,
    };
    this.git = new GitCLI(runner, config.identity, runOptions);
    this.gh = new GitHubCLI(runner, runOptions);
  }

  repoUrl(repoName: string): string {
    return `https://${this.config.host}/${this.config.owner}/${repoName}`;
  }

  private remoteUrl(repoName: string): string {
    const { owner, token, host } = this.config;
    return `https://${owner}:${token}@${host}/${owner}/${repoName}.git`;
  }

  async publish(artifacts: ArtifactSet, options: PublishOptions): Promise<PublishResult> {
    assertRepoName(options.repoName);
    return options.mode === 'create'
      ? this.createAndPush(options.repoName, artifacts, options.message || 'Initial commit')
      : this.updateAndPush(options.repoName, artifacts, options.message || 'Revise application based on new brief');
  }

  async readFile(repoName: string, filePath: string): Promise<string | null> {
    assertRepoName(repoName);
    const root = await makeWorkDir(this.config.workDir, repoName);
    try {
      const repoPath = path.join(root, 'repo');
      await this.git.clone(this.remoteUrl(repoName), repoPath);
      if (!validatePath(filePath, repoPath)) {
        throw new PublishError(`Invalid file path: ${filePath}`);
      }
      const content = await readFileIfExists(path.join(repoPath, filePath));
      if (content === null) {
        console.warn(`[Publisher] ${filePath} not found in ${repoName}`);
      }
      return content;
    } finally {
      await removeDirectory(root);
    }
  }

  private async createAndPush(repoName: string, artifacts: ArtifactSet, message: string): Promise<PublishResult> {
    console.log(`[Publisher] Creating repository ${repoName}`);
    await this.gh.createRepo(repoName);

    const repoPath = await makeWorkDir(this.config.workDir, repoName);
    try {
      await writeArtifacts(repoPath, {
        'README.md': renderReadme(repoName),
        ...artifacts,
        LICENSE: renderMitLicense(this.config.owner),
      });

      await this.git.init(repoPath);
      await this.git.addAll(repoPath);
      await this.git.commit(repoPath, message);
      await this.git.addRemote(repoPath, 'origin', this.remoteUrl(repoName));
      await this.git.push(repoPath, 'origin', DEFAULT_BRANCH, true);

      const commitSha = await this.git.head(repoPath);
      console.log(`[Publisher] Repo created: ${this.repoUrl(repoName)} with commit ${commitSha}`);
      return { repo_url: this.repoUrl(repoName), commit_sha: commitSha };
    } finally {
      await removeDirectory(repoPath);
    }
  }

  private async updateAndPush(repoName: string, artifacts: ArtifactSet, message: string): Promise<PublishResult> {
    console.log(`[Publisher] Updating repository ${repoName}`);
    const root = await makeWorkDir(this.config.workDir, repoName);
    try {
      const repoPath = path.join(root, 'repo');
      await this.git.clone(this.remoteUrl(repoName), repoPath);
      await writeArtifacts(repoPath, artifacts);

      if (await this.git.hasChanges(repoPath)) {
        await this.git.addAll(repoPath);
        await this.git.commit(repoPath, message);
        await this.git.push(repoPath, 'origin', DEFAULT_BRANCH);
      } else {
        console.log(`[Publisher] No changes to commit in ${repoName}`);
      }

      const commitSha = await this.git.head(repoPath);
      console.log(`[Publisher] Repo updated: ${this.repoUrl(repoName)} with commit ${commitSha}`);
      return { repo_url: this.repoUrl(repoName), commit_sha: commitSha };
    } finally {
      await removeDirectory(root);
    }
  }
}

function assertRepoName(repoName: string): void {
  if (!REPO_NAME_PATTERN.test(repoName) || repoName === '.' || repoName === '..') {
    throw new PublishError(`Invalid repository name: ${repoName}`);
  }
}

async function writeArtifacts(repoPath: string, files: ArtifactSet): Promise<void> {
  for (const [filePath, content] of Object.entries(files)) {
    if (!validatePath(filePath, repoPath) || isGitPath(filePath)) {
      throw new PublishError(`Invalid artifact path: ${filePath}`);
    }
    await createFile(path.join(repoPath, filePath), content);
  }
}

function isGitPath(filePath: string): boolean {
  return filePath.split(/[\\/]/).some((segment) => segment.toLowerCase() === '.git');
}

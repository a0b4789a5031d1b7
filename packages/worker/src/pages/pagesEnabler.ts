import axios, { AxiosInstance } from 'axios';
import { PagesError } from '../errors';

export interface HostingEnabler {
  enable(repoName: string): Promise<string>;
}

export interface PagesConfig {
  owner: string;
  token: string;
  apiUrl: string;
  /** Host that serves user sites, `github.io` unless set. */
  pagesDomain?: string;
  branch?: string;
}

/**
 * Turns on GitHub Pages for a repository, serving the root of `main`.
 * Does not wait for the first Pages build.
 */
export class PagesEnabler implements HostingEnabler {
  private http: AxiosInstance;

  constructor(private config: PagesConfig) {
    this.http = axios.create({
      baseURL: config.apiUrl,
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${config.token}`,
        'X-GitHub-Api-Version': '2022-11-28',
      },
      validateStatus: () => true,
    });
  }

  pagesUrl(repoName: string): string {
    const domain = this.config.pagesDomain || 'github.io';
    return `https://${this.config.owner.toLowerCase()}.${domain}/${repoName}/`;
  }

  async enable(repoName: string): Promise<string> {
    console.log(`[Pages] Enabling GitHub Pages for ${repoName}...`);

    let status: number;
    let body: unknown;
    try {
      const response = await this.http.post(`/repos/${this.config.owner}/${repoName}/pages`, {
        source: { branch: this.config.branch || 'main', path: '/' },
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new PagesError(`Failed to enable GitHub Pages: ${errorMessage(error)}`);
    }

    if (status === 201) {
      console.log('[Pages] GitHub Pages enabled successfully!');
    } else if (status === 409) {
      console.log('[Pages] GitHub Pages already enabled.');
    } else {
      console.error(`[Pages] Failed to enable GitHub Pages. Status: ${status}`);
      throw new PagesError(`Failed to enable GitHub Pages: ${JSON.stringify(body)}`, status);
    }

    return this.pagesUrl(repoName);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

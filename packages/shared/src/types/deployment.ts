export type DeploymentMode = 'create' | 'revise';

/** Relative file path → file content, as returned by the generator. */
export type ArtifactSet = Record<string, string>;

export interface PublishResult {
  repo_url: string;
  commit_sha: string;
}

export interface DeploymentRecord extends PublishResult {
  task: string;
  round: number;
  mode: DeploymentMode;
  pages_url: string;
}

export interface EvaluationPayload {
  email: string;
  task: string;
  round: number;
  nonce: string;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
}

export function modeForRound(round: number): DeploymentMode {
  return round <= 1 ? 'create' : 'revise';
}

/** Whether the submit endpoint waits for the pipeline or acknowledges first. */
export type ProcessingMode = 'sync' | 'background';

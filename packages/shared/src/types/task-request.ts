import type { DeploymentRecord } from './deployment';

export interface Attachment {
  name: string;
  url: string;
}

export interface TaskRequest {
  email: string;
  secret: string;
  task: string;
  round: number;
  nonce: string;
  brief: string;
  checks: string[];
  evaluation_url: string;
  attachments?: Attachment[];
}

/**
 * The part of a request the generator sees. The secret and the callback
 * details never reach a prompt.
 */
export type ProjectBrief = Pick<TaskRequest, 'task' | 'brief' | 'checks' | 'attachments'>;

export type SubmitResponse =
  | { status: 'success'; message: string; deployment: DeploymentRecord }
  | { status: 'accepted'; message: string }
  | { status: 'error'; error: string; details?: string[] };

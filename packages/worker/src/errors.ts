/**
 * Base class for every failure raised while running a deployment. The HTTP
 * layer reads `status`; nothing else distinguishes one failure from another.
 */
export class DeploymentError extends Error {
  status = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class LLMError extends DeploymentError {}

export class CommandError extends DeploymentError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(`Command failed: ${command}\nError: ${stderr || `exited with code ${exitCode}`}`);
  }
}

export class PublishError extends DeploymentError {}

export class PagesError extends DeploymentError {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
  }
}

export class NotificationError extends DeploymentError {}

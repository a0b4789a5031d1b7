import { spawn } from 'child_process';
import { EventEmitter } from 'events';

export interface CLIResult {
  success: boolean;
  output: string;
  error?: string;
  exitCode: number | null;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
}

/**
 * Anything that can run an external command. The publisher only depends on
 * this shape, so tests can hand it a recorder instead of a real process.
 */
export interface CommandExecutor {
  run(command: string, args: string[], options?: RunOptions): Promise<CLIResult>;
}

/**
 * Spawns CLI processes without a shell and collects their output.
 * Emits `output` and `stderr` with each chunk of the child's streams.
 */
export class CommandRunner extends EventEmitter implements CommandExecutor {
  private secrets: string[];
  private defaultTimeout?: number;

  constructor(options: { secrets?: string[]; timeout?: number } = {}) {
    super();
    this.secrets = (options.secrets || []).filter((secret) => secret.length > 0);
    this.defaultTimeout = options.timeout;
  }

  /** Replaces every configured secret with `***`. */
  redact(text: string): string {
    return this.secrets.reduce((acc, secret) => acc.split(secret).join('***'), text);
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CLIResult> {
    const printable = this.redact([command, ...args].join(' '));
    console.log(`[CLI] Running command: ${printable}`);

    return new Promise((resolve, reject) => {
      const childProcess = spawn(command, args, {
        cwd: options.cwd,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...options.env },
      });

      let output = '';
      let errorOutput = '';
      let timer: NodeJS.Timeout | undefined;

      childProcess.stdout.on('data', (data: Buffer) => {
        const text = data.toString();
        output += text;
        this.emit('output', this.redact(text));
      });

      childProcess.stderr.on('data', (data: Buffer) => {
        const text = data.toString();
        errorOutput += text;
        this.emit('stderr', this.redact(text));
      });

      childProcess.on('close', (code) => {
        if (timer) clearTimeout(timer);

        if (code === 0) {
          resolve({
            success: true,
            output: output.trim(),
            error: errorOutput ? this.redact(errorOutput) : undefined,
            exitCode: code,
          });
        } else {
          const error = this.redact(errorOutput.trim() || `${command} exited with code ${code}`);
          console.error(`[CLI] Error: ${error}`);
          resolve({
            success: false,
            output: this.redact(output.trim()),
            error,
            exitCode: code,
          });
        }
      });

      childProcess.on('error', (error) => {
        if (timer) clearTimeout(timer);
        console.error(`[CLI] Process error:`, this.redact(error.message));
        reject(new Error(this.redact(`Could not start ${command}: ${error.message}`)));
      });

      const timeout = options.timeout ?? this.defaultTimeout;
      if (timeout) {
        timer = setTimeout(() => {
          childProcess.kill();
          reject(new Error(`Command timeout: ${printable}`));
        }, timeout);
      }
    });
  }
}

import { spawn } from 'child_process';

const KILL_GRACE_MS = 5_000;
const MAX_CAPTURE_LENGTH = 64_000;

export interface RunOptions {
  cwd?: string;
  timeoutMs: number;
  env?: Record<string, string>;
}

export interface ProcessResult {
  /** null when the process was killed after the timeout */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  spawnError?: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map(part => (/[\s"'$`\\]/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part))
    .join(' ');
}

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURE_LENGTH ? next.slice(next.length - MAX_CAPTURE_LENGTH) : next;
}

/**
 * Runs commands as child processes without a shell. Resolves on every outcome;
 * a non-zero exit, a timeout and a failed spawn are all reported in the result.
 * After a timeout the result is settled once the child exits (or the SIGKILL
 * grace period ends) even if a grandchild still holds the output pipes.
 */
export class ChildProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe']
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let exited = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (result: ProcessResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        resolve(result);
      };

      const finishTimedOut = () => {
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish({ exitCode: null, stdout, stderr, timedOut: true });
      };

      const timer = setTimeout(() => {
        timedOut = true;
        if (exited) {
          finishTimedOut();
          return;
        }
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          child.kill('SIGKILL');
          finishTimedOut();
        }, KILL_GRACE_MS);
      }, options.timeoutMs);

      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (data: string) => {
        stdout = appendCapped(stdout, data);
      });

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (data: string) => {
        stderr = appendCapped(stderr, data);
      });

      child.on('error', (error) => {
        finish({
          exitCode: 127,
          stdout,
          stderr,
          timedOut: false,
          spawnError: error.message
        });
      });

      child.on('exit', () => {
        exited = true;
        if (timedOut) {
          finishTimedOut();
        }
      });

      child.on('close', (code) => {
        finish({
          exitCode: timedOut ? null : code ?? 1,
          stdout,
          stderr,
          timedOut
        });
      });
    });
  }
}

/**
 * Records every command instead of running it; used for --dry-run.
 */
export class DryRunProcessRunner implements ProcessRunner {
  readonly commands: string[] = [];

  constructor(private readonly onCommand?: (commandLine: string) => void) {}

  async run(command: string, args: string[]): Promise<ProcessResult> {
    const commandLine = formatCommand(command, args);
    this.commands.push(commandLine);
    this.onCommand?.(commandLine);
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false };
  }
}

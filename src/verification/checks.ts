import { CheckConfig, CommandCheckConfig, HttpCheckConfig } from '../types';
import { HttpClient, isSuccessStatus } from '../http/https-client';
import { ProcessRunner } from '../runtime/process-runner';
import { combinedOutput } from '../runtime/container-runtime';
import { VerificationCheck } from './types';

const MAX_DETAIL_LENGTH = 500;

export interface CheckDependencies {
  client: HttpClient;
  runner: ProcessRunner;
  cwd: string;
  requestTimeoutMs: number;
  commandTimeoutMs: number;
  /** Reads the current bearer token; checks never see it any other way */
  readToken: () => Promise<string | undefined>;
}

function truncate(text: string): string {
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}...` : text;
}

export function createHttpCheck(config: HttpCheckConfig, deps: CheckDependencies): VerificationCheck {
  return {
    name: config.name,
    async run() {
      const headers: Record<string, string> = {};
      if (config.auth) {
        const token = await deps.readToken();
        if (!token) {
          return { passed: false, detail: 'No bearer token is stored in the environment file' };
        }
        headers.Authorization = `Bearer ${token}`;
      }

      const response = await deps.client.request({
        url: config.url,
        headers,
        timeoutMs: deps.requestTimeoutMs
      });
      const detail = `GET ${config.url} -> HTTP ${response.status}`;
      return isSuccessStatus(response.status)
        ? { passed: true, detail }
        : { passed: false, detail: `${detail}: ${truncate(response.body.trim())}` };
    }
  };
}

export function createCommandCheck(config: CommandCheckConfig, deps: CheckDependencies): VerificationCheck {
  const args = config.args ?? [];
  return {
    name: config.name,
    async run() {
      const result = await deps.runner.run(config.command, args, {
        cwd: deps.cwd,
        timeoutMs: deps.commandTimeoutMs
      });
      const output = truncate(combinedOutput(result));
      if (result.timedOut) {
        return { passed: false, detail: `timed out after ${deps.commandTimeoutMs}ms${output ? `\n${output}` : ''}` };
      }
      if (result.exitCode !== 0) {
        const reason = result.spawnError ?? `exit code ${result.exitCode}`;
        return { passed: false, detail: `${reason}${output ? `\n${output}` : ''}` };
      }
      return { passed: true, detail: output || 'exit code 0' };
    }
  };
}

export function createCheck(config: CheckConfig, deps: CheckDependencies): VerificationCheck {
  return config.type === 'http' ? createHttpCheck(config, deps) : createCommandCheck(config, deps);
}

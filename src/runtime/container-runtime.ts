import { RecreateError } from '../errors';
import { ProcessResult, ProcessRunner } from './process-runner';

export type ContainerResource = 'container' | 'volume' | 'network';

export interface RunContainerOptions {
  name: string;
  image: string;
  ports: string[];
  volumes: Array<{ source: string; target: string }>;
  envFile?: string;
}

export interface BuildImageOptions {
  image: string;
  context: string;
  dockerfile?: string;
}

/**
 * Capability interface over a container CLI. Every call reports the raw
 * process result; callers decide what a non-zero exit means.
 */
export interface ContainerRuntime {
  readonly bin: string;
  exists(resource: ContainerResource, name: string): Promise<boolean>;
  stop(name: string): Promise<ProcessResult>;
  remove(name: string): Promise<ProcessResult>;
  removeVolume(name: string): Promise<ProcessResult>;
  createVolume(name: string): Promise<ProcessResult>;
  createNetwork(name: string): Promise<ProcessResult>;
  build(options: BuildImageOptions): Promise<ProcessResult>;
  run(options: RunContainerOptions): Promise<ProcessResult>;
  connectNetwork(network: string, container: string): Promise<ProcessResult>;
  copy(source: string, container: string, target: string): Promise<ProcessResult>;
  exec(container: string, command: string[]): Promise<ProcessResult>;
  logs(container: string, tail: number): Promise<ProcessResult>;
}

export interface CliContainerRuntimeOptions {
  bin: string;
  cwd: string;
  timeoutMs: number;
}

/**
 * podman/docker implementation; both tools accept the same arguments for
 * everything used here.
 */
export class CliContainerRuntime implements ContainerRuntime {
  readonly bin: string;

  constructor(private readonly runner: ProcessRunner, private readonly options: CliContainerRuntimeOptions) {
    this.bin = options.bin;
  }

  async exists(resource: ContainerResource, name: string): Promise<boolean> {
    const args = this.bin === 'podman'
      ? [resource, 'exists', name]
      : [resource, 'inspect', name];
    const result = await this.invoke(args);
    return result.exitCode === 0;
  }

  stop(name: string): Promise<ProcessResult> {
    return this.invoke(['stop', name]);
  }

  remove(name: string): Promise<ProcessResult> {
    return this.invoke(['rm', '-f', name]);
  }

  removeVolume(name: string): Promise<ProcessResult> {
    return this.invoke(['volume', 'rm', name]);
  }

  createVolume(name: string): Promise<ProcessResult> {
    return this.invoke(['volume', 'create', name]);
  }

  createNetwork(name: string): Promise<ProcessResult> {
    return this.invoke(['network', 'create', name]);
  }

  build(options: BuildImageOptions): Promise<ProcessResult> {
    const args = ['build', '-t', options.image];
    if (options.dockerfile) {
      args.push('-f', options.dockerfile);
    }
    args.push(options.context);
    return this.invoke(args);
  }

  run(options: RunContainerOptions): Promise<ProcessResult> {
    const args = ['run', '-d', '--name', options.name];
    for (const port of options.ports) {
      args.push('-p', port);
    }
    for (const volume of options.volumes) {
      args.push('-v', `${volume.source}:${volume.target}`);
    }
    if (options.envFile) {
      args.push('--env-file', options.envFile);
    }
    args.push(options.image);
    return this.invoke(args);
  }

  connectNetwork(network: string, container: string): Promise<ProcessResult> {
    return this.invoke(['network', 'connect', network, container]);
  }

  copy(source: string, container: string, target: string): Promise<ProcessResult> {
    return this.invoke(['cp', source, `${container}:${target}`]);
  }

  exec(container: string, command: string[]): Promise<ProcessResult> {
    return this.invoke(['exec', container, ...command]);
  }

  logs(container: string, tail: number): Promise<ProcessResult> {
    return this.invoke(['logs', '--tail', String(tail), container]);
  }

  private invoke(args: string[]): Promise<ProcessResult> {
    return this.runner.run(this.bin, args, {
      cwd: this.options.cwd,
      timeoutMs: this.options.timeoutMs
    });
  }
}

/**
 * Converts a failed process result into the matching RecreateError.
 */
export function assertSucceeded(result: ProcessResult, description: string): ProcessResult {
  if (result.timedOut) {
    throw new RecreateError('ProcessTimeout', `${description} timed out`, {
      details: combinedOutput(result)
    });
  }
  if (result.exitCode !== 0) {
    const reason = result.spawnError ?? `exit code ${result.exitCode}`;
    throw new RecreateError('ProcessNonZeroExit', `${description} failed (${reason})`, {
      details: combinedOutput(result)
    });
  }
  return result;
}

export function combinedOutput(result: ProcessResult): string {
  return [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
}

import { resolve } from 'path';
import { RecreateConfig, RunOutcome } from '../types';
import { ChildProcessRunner, DryRunProcessRunner, ProcessRunner } from '../runtime/process-runner';
import { CliContainerRuntime, ContainerRuntime } from '../runtime/container-runtime';
import { EnvironmentStore } from '../env/environment-store';
import { HttpClient, InsecureHttpsClient } from '../http/https-client';
import { ExecTokenProvisioner } from '../provisioning/exec-token-provisioner';
import { HttpTokenProvisioner } from '../provisioning/http-token-provisioner';
import { TokenProvisioner } from '../provisioning/types';
import { systemClock } from '../utils/clock';
import { OrchestratorDependencies, ProgressReporter } from './types';
import { RecreateOrchestrator } from './recreate-orchestrator';

export interface RecreateOptions {
  cwd?: string;
  dryRun?: boolean;
  reporter?: ProgressReporter;
  /** Receives every command line a dry run would have executed */
  onDryRunCommand?: (commandLine: string) => void;
}

export function createTokenProvisioner(
  config: RecreateConfig,
  runtime: ContainerRuntime,
  client: HttpClient,
  cwd: string
): TokenProvisioner {
  const { provisioning } = config;
  if (provisioning.strategy === 'exec') {
    return new ExecTokenProvisioner(runtime, {
      containerName: config.gateway.container_name,
      scriptPath: resolve(cwd, provisioning.bootstrap_script),
      interpreter: provisioning.bootstrap_interpreter,
      tokenName: provisioning.token_name
    });
  }
  return new HttpTokenProvisioner(client, {
    baseUrl: provisioning.base_url,
    tokenName: provisioning.token_name,
    expiresInDays: provisioning.expires_in_days,
    requestTimeoutMs: config.health.request_timeout_seconds * 1000
  });
}

export function createDependencies(config: RecreateConfig, options: RecreateOptions = {}): OrchestratorDependencies {
  const cwd = options.cwd ?? process.cwd();
  const toolRunner = new ChildProcessRunner();
  const runner: ProcessRunner = options.dryRun
    ? new DryRunProcessRunner(options.onDryRunCommand)
    : toolRunner;
  const runtime = new CliContainerRuntime(runner, {
    bin: config.runtime.tool,
    cwd,
    timeoutMs: config.runtime.command_timeout_seconds * 1000
  });
  const client = new InsecureHttpsClient();

  return {
    config,
    cwd,
    runner,
    toolRunner,
    runtime,
    store: new EnvironmentStore(),
    client,
    provisioner: createTokenProvisioner(config, runtime, client, cwd),
    clock: systemClock
  };
}

/**
 * Convenience function: wire the real collaborators and run the pipeline once
 */
export async function recreate(config: RecreateConfig, options: RecreateOptions = {}): Promise<RunOutcome> {
  const orchestrator = new RecreateOrchestrator(createDependencies(config, options), {
    dryRun: options.dryRun,
    reporter: options.reporter
  });
  return orchestrator.run();
}

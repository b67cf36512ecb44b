// Orchestration-specific types
import { FailurePolicy, RecreateConfig, StepName, StepRecord } from '../types';
import { ContainerRuntime } from '../runtime/container-runtime';
import { ProcessRunner } from '../runtime/process-runner';
import { EnvironmentStore } from '../env/environment-store';
import { HttpClient } from '../http/https-client';
import { TokenProvisioner } from '../provisioning/types';
import { Clock } from '../utils/clock';

export interface StepContext {
  /** Appends a line to the step's captured output */
  log(line: string): void;
}

/**
 * What a step action returns when it completes. A `warning` turns the step
 * into `warned` without failing it.
 */
export interface StepReport {
  warning?: string;
}

export interface DeploymentStep {
  name: StepName;
  policy: FailurePolicy;
  /** Extra attempts after the first failure */
  retries?: number;
  retryDelayMs?: number;
  /** Skipped during a dry run: needs a running service */
  liveOnly?: boolean;
  action(context: StepContext): Promise<StepReport | void>;
}

export interface ProgressReporter {
  runStarted(runId: string, dryRun: boolean): void;
  stepStarted(step: DeploymentStep, index: number, total: number): void;
  stepRetrying(step: DeploymentStep, attempt: number, reason: string): void;
  stepFinished(record: StepRecord): void;
}

export interface OrchestratorDependencies {
  config: RecreateConfig;
  cwd: string;
  runner: ProcessRunner;
  /** Runs the Preflight tool checks; stays live during a dry run */
  toolRunner: ProcessRunner;
  runtime: ContainerRuntime;
  store: EnvironmentStore;
  client: HttpClient;
  provisioner: TokenProvisioner;
  clock: Clock;
}

export interface OrchestratorOptions {
  dryRun?: boolean;
  reporter?: ProgressReporter;
}

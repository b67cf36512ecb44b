// Core type definitions for the gateway recreate tooling

export interface GatewayConfig {
  container_name: string;
  image: string;
  build_context: string;
  dockerfile?: string;
  volume: string;
  volume_mount: string;
  ports: string[];
  network: string;
  env_file: string;
  legacy_containers: string[];
}

export interface RuntimeConfig {
  tool: string;
  required_tools: string[];
  command_timeout_seconds: number;
}

export interface HealthConfig {
  url: string;
  interval_seconds: number;
  timeout_seconds: number;
  request_timeout_seconds: number;
}

export type ProvisioningStrategy = 'http' | 'exec';

export interface ProvisioningConfig {
  strategy: ProvisioningStrategy;
  base_url: string;
  token_key: string;
  token_name: string;
  expires_in_days: number;
  admin_email_key: string;
  admin_password_key: string;
  bootstrap_script: string;
  bootstrap_interpreter: string;
}

export interface NetworkAttachConfig {
  retries: number;
  retry_delay_seconds: number;
}

export interface HttpCheckConfig {
  name: string;
  type: 'http';
  url: string;
  auth?: boolean;
}

export interface CommandCheckConfig {
  name: string;
  type: 'command';
  command: string;
  args?: string[];
}

export type CheckConfig = HttpCheckConfig | CommandCheckConfig;

export interface VerificationConfig {
  checks: CheckConfig[];
}

export interface RecreateConfig {
  gateway: GatewayConfig;
  runtime: RuntimeConfig;
  health: HealthConfig;
  provisioning: ProvisioningConfig;
  network_attach: NetworkAttachConfig;
  verification: VerificationConfig;
}

export type HealthStatus = 'unknown' | 'unreachable' | 'unhealthy' | 'healthy';

export type FailurePolicy = 'fatal' | 'warn-and-continue';

export type StepName =
  | 'Preflight'
  | 'Teardown'
  | 'EnsureVolume'
  | 'Build'
  | 'Launch'
  | 'NetworkAttach'
  | 'AwaitHealthy'
  | 'Provision'
  | 'Verify';

export type StepStatus = 'passed' | 'warned' | 'failed' | 'skipped' | 'not-run';

export interface StepError {
  code: string;
  message: string;
  remediation?: string;
}

export interface StepRecord {
  name: StepName;
  policy: FailurePolicy;
  status: StepStatus;
  attempts: number;
  output: string[];
  error?: StepError;
}

export type RunStatus = 'succeeded' | 'verification-failed' | 'failed';

export interface RunOutcome {
  runId: string;
  startedAt: Date;
  durationMs: number;
  dryRun: boolean;
  status: RunStatus;
  exitCode: number;
  failedStep?: StepName;
  steps: StepRecord[];
}

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { RecreateError } from '../errors';
import { assertSucceeded, combinedOutput } from '../runtime/container-runtime';
import { createHttpProbe, waitUntilHealthy } from '../health/readiness-prober';
import { provisionAndPersist } from '../provisioning/token-persistence';
import { createCheck, runChecks } from '../verification';
import { DeploymentStep, OrchestratorDependencies, StepContext, StepReport } from './types';

const TOOL_CHECK_TIMEOUT_MS = 30_000;
const LOG_TAIL_LINES = 20;

/**
 * The recreate pipeline. Order and failure policy of every step live here and
 * nowhere else.
 */
export function createRecreateSteps(deps: OrchestratorDependencies): DeploymentStep[] {
  const { config } = deps;

  return [
    { name: 'Preflight', policy: 'fatal', action: ctx => preflight(deps, ctx) },
    { name: 'Teardown', policy: 'warn-and-continue', action: ctx => teardown(deps, ctx) },
    { name: 'EnsureVolume', policy: 'fatal', action: ctx => ensureVolume(deps, ctx) },
    { name: 'Build', policy: 'fatal', action: ctx => build(deps, ctx) },
    { name: 'Launch', policy: 'fatal', action: ctx => launch(deps, ctx) },
    {
      name: 'NetworkAttach',
      policy: 'warn-and-continue',
      retries: config.network_attach.retries,
      retryDelayMs: config.network_attach.retry_delay_seconds * 1000,
      action: ctx => networkAttach(deps, ctx)
    },
    { name: 'AwaitHealthy', policy: 'fatal', liveOnly: true, action: ctx => awaitHealthy(deps, ctx) },
    { name: 'Provision', policy: 'fatal', liveOnly: true, action: ctx => provision(deps, ctx) },
    { name: 'Verify', policy: 'warn-and-continue', liveOnly: true, action: ctx => verify(deps, ctx) }
  ];
}

export function envFilePath(deps: OrchestratorDependencies): string {
  return resolve(deps.cwd, deps.config.gateway.env_file);
}

async function preflight(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const tools = Array.from(new Set([deps.config.runtime.tool, ...deps.config.runtime.required_tools]));

  for (const tool of tools) {
    const result = await deps.toolRunner.run(tool, ['--version'], {
      cwd: deps.cwd,
      timeoutMs: TOOL_CHECK_TIMEOUT_MS
    });
    if (result.exitCode !== 0) {
      throw new RecreateError('ToolMissing', `Required tool '${tool}' not found in PATH`, {
        details: result.spawnError ?? combinedOutput(result)
      });
    }
    ctx.log(`${tool}: ${result.stdout.trim().split('\n')[0] || 'available'}`);
  }

  const envFile = envFilePath(deps);
  if (!existsSync(envFile)) {
    throw new RecreateError('EnvFileUnreadable', `Environment file not found: ${envFile}`, {
      remediation: `Create ${deps.config.gateway.env_file} with the gateway settings before recreating`
    });
  }
  if (!statSync(envFile).isFile()) {
    throw new RecreateError('EnvFileUnreadable', `${envFile} is not a file`);
  }

  const entries = await deps.store.load(envFile);
  if (entries.size === 0) {
    throw new RecreateError('EnvFileUnreadable', `Environment file is empty: ${envFile}`, {
      remediation: `Add the gateway settings to ${deps.config.gateway.env_file} before recreating`
    });
  }
  ctx.log(`Loaded ${entries.size} entries from ${deps.config.gateway.env_file}`);
}

async function teardown(deps: OrchestratorDependencies, ctx: StepContext): Promise<StepReport> {
  const { gateway } = deps.config;
  const containers = Array.from(new Set([gateway.container_name, ...gateway.legacy_containers]));
  const removed: string[] = [];
  const problems: string[] = [];

  for (const container of containers) {
    if (!(await deps.runtime.exists('container', container))) {
      continue;
    }

    const stopped = await deps.runtime.stop(container);
    if (stopped.exitCode !== 0) {
      ctx.log(`Stopping ${container} failed; removing it forcibly`);
    }

    const result = await deps.runtime.remove(container);
    if (result.exitCode === 0) {
      removed.push(`container ${container}`);
      ctx.log(`Removed container ${container}`);
    } else {
      problems.push(`container ${container}: ${combinedOutput(result) || `exit code ${result.exitCode}`}`);
    }
  }

  if (await deps.runtime.exists('volume', gateway.volume)) {
    const result = await deps.runtime.removeVolume(gateway.volume);
    if (result.exitCode === 0) {
      removed.push(`volume ${gateway.volume}`);
      ctx.log(`Removed volume ${gateway.volume}`);
    } else {
      problems.push(`volume ${gateway.volume}: ${combinedOutput(result) || `exit code ${result.exitCode}`}`);
    }
  }

  if (problems.length > 0) {
    return { warning: `Teardown incomplete: ${problems.join('; ')}` };
  }
  if (removed.length === 0) {
    return { warning: 'Nothing to remove: no previous container or volume exists' };
  }
  return {};
}

async function ensureVolume(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const { volume } = deps.config.gateway;
  assertSucceeded(await deps.runtime.createVolume(volume), `Creating volume '${volume}'`);
  ctx.log(`Created volume ${volume}`);
}

async function build(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const { gateway } = deps.config;
  const result = assertSucceeded(
    await deps.runtime.build({
      image: gateway.image,
      context: gateway.build_context,
      dockerfile: gateway.dockerfile
    }),
    `Building image '${gateway.image}'`
  );
  const lastLine = result.stdout.trim().split('\n').pop();
  ctx.log(`Built ${gateway.image}${lastLine ? ` (${lastLine})` : ''}`);
}

async function launch(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const { gateway } = deps.config;
  const result = assertSucceeded(
    await deps.runtime.run({
      name: gateway.container_name,
      image: gateway.image,
      ports: gateway.ports,
      volumes: [{ source: gateway.volume, target: gateway.volume_mount }],
      envFile: envFilePath(deps)
    }),
    `Launching container '${gateway.container_name}'`
  );
  const containerId = result.stdout.trim();
  ctx.log(`Started ${gateway.container_name}${containerId ? ` (${containerId.slice(0, 12)})` : ''}`);
}

async function networkAttach(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const { network, container_name: container } = deps.config.gateway;

  if (!(await deps.runtime.exists('network', network))) {
    const created = await deps.runtime.createNetwork(network);
    if (created.exitCode !== 0) {
      throw new RecreateError('NetworkAttachFailed', `Could not create network '${network}'`, {
        details: combinedOutput(created)
      });
    }
    ctx.log(`Created network ${network}`);
  }

  const result = await deps.runtime.connectNetwork(network, container);
  if (result.exitCode === 0) {
    ctx.log(`Connected ${container} to ${network}`);
    return;
  }
  if (/already connected|already exists in network|endpoint with name .* already exists/i.test(combinedOutput(result))) {
    ctx.log(`${container} already connected to ${network}`);
    return;
  }

  throw new RecreateError('NetworkAttachFailed', `Could not connect ${container} to network '${network}'`, {
    details: combinedOutput(result)
  });
}

async function awaitHealthy(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const { health, gateway } = deps.config;
  const probe = createHttpProbe(health.url, deps.client, health.request_timeout_seconds * 1000);

  const status = await waitUntilHealthy(probe, {
    intervalMs: health.interval_seconds * 1000,
    maxDurationMs: health.timeout_seconds * 1000,
    clock: deps.clock
  });

  if (status === 'healthy') {
    ctx.log(`${health.url} is healthy`);
    return;
  }

  const logs = await deps.runtime.logs(gateway.container_name, LOG_TAIL_LINES);
  throw new RecreateError(
    'HealthTimeout',
    `${health.url} did not become healthy within ${health.timeout_seconds}s (last status: ${status})`,
    { details: combinedOutput(logs) }
  );
}

async function provision(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const { provisioning } = deps.config;
  const envFile = envFilePath(deps);
  const entries = await deps.store.load(envFile);

  const email = entries.get(provisioning.admin_email_key);
  if (!email) {
    throw new RecreateError('ProvisionFailed', `${provisioning.admin_email_key} is not set in ${deps.config.gateway.env_file}`);
  }

  await provisionAndPersist(
    deps.provisioner,
    { email, password: entries.get(provisioning.admin_password_key) },
    { store: deps.store, envFile, tokenKey: provisioning.token_key }
  );
  ctx.log(`Stored a fresh ${deps.provisioner.strategy} token as ${provisioning.token_key} in ${deps.config.gateway.env_file}`);
}

async function verify(deps: OrchestratorDependencies, ctx: StepContext): Promise<void> {
  const envFile = envFilePath(deps);
  const checks = deps.config.verification.checks.map(check =>
    createCheck(check, {
      client: deps.client,
      runner: deps.runner,
      cwd: deps.cwd,
      requestTimeoutMs: deps.config.health.request_timeout_seconds * 1000,
      commandTimeoutMs: deps.config.runtime.command_timeout_seconds * 1000,
      readToken: () => deps.store.get(envFile, deps.config.provisioning.token_key)
    })
  );

  const report = await runChecks(checks);
  for (const result of report.results) {
    ctx.log(`${result.passed ? 'PASS' : 'FAIL'} ${result.name}: ${result.detail}`);
  }

  if (!report.passed) {
    const failed = report.results.filter(result => !result.passed).map(result => result.name);
    throw new RecreateError('VerificationFailed', `${failed.length} of ${report.results.length} checks failed: ${failed.join(', ')}`);
  }
}

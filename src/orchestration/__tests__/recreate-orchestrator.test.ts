import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RecreateConfig, StepRecord } from '../../types';
import { validateAndNormalizeConfig } from '../../config/validator';
import { EnvironmentStore } from '../../env/environment-store';
import { HttpTransportError } from '../../http/https-client';
import { ProcessResult } from '../../runtime/process-runner';
import { createTokenProvisioner } from '../factory';
import { createRecreateSteps } from '../steps';
import { RecreateOrchestrator } from '../recreate-orchestrator';
import { OrchestratorDependencies, ProgressReporter } from '../types';
import { FakeClock, FakeContainerRuntime, FakeHttpClient, processResult } from '../../__tests__/fakes';

const ENV_CONTENT = 'PORT="4444"\nPLATFORM_ADMIN_EMAIL=admin@example.com\nPLATFORM_ADMIN_PASSWORD=test-password\n';

interface GatewayState {
  healthy: boolean;
  rejectTools: boolean;
  issued: number;
}

function createGateway(state: GatewayState): FakeHttpClient {
  return new FakeHttpClient(request => {
    switch (new URL(request.url).pathname) {
      case '/health':
        if (!state.healthy) {
          throw new HttpTransportError('connect ECONNREFUSED 127.0.0.1:4444', 'connection');
        }
        return { status: 200, body: '{"status":"healthy"}' };
      case '/auth/email/login':
        return { status: 200, body: '{"access_token":"session-abc"}' };
      case '/tokens':
        state.issued += 1;
        return { status: 201, body: JSON.stringify({ access_token: `tok-${state.issued}` }) };
      case '/tools':
        return !state.rejectTools && request.headers?.Authorization === `Bearer tok-${state.issued}`
          ? { status: 200, body: '[]' }
          : { status: 401, body: '{"detail":"Not authenticated"}' };
      default:
        return { status: 404, body: '' };
    }
  });
}

function statuses(steps: StepRecord[]): Record<string, string> {
  return Object.fromEntries(steps.map(step => [step.name, step.status]));
}

function step(steps: StepRecord[], name: StepRecord['name']): StepRecord {
  const record = steps.find(candidate => candidate.name === name);
  if (!record) {
    throw new Error(`no record for ${name}`);
  }
  return record;
}

describe('RecreateOrchestrator', () => {
  let workDir: string;
  let envFile: string;
  let config: RecreateConfig;
  let runtime: FakeContainerRuntime;
  let clock: FakeClock;
  let gatewayState: GatewayState;
  let client: FakeHttpClient;
  let toolResult: ProcessResult;
  let deps: OrchestratorDependencies;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'recreate-'));
    envFile = join(workDir, '.env');
    writeFileSync(envFile, ENV_CONTENT);

    config = validateAndNormalizeConfig({});
    runtime = new FakeContainerRuntime();
    clock = new FakeClock();
    gatewayState = { healthy: true, rejectTools: false, issued: 0 };
    client = createGateway(gatewayState);
    toolResult = processResult({ stdout: 'podman version 4.9.3\n' });

    deps = {
      config,
      cwd: workDir,
      runner: { run: async () => processResult() },
      toolRunner: { run: async () => toolResult },
      runtime,
      store: new EnvironmentStore(),
      client,
      provisioner: createTokenProvisioner(config, runtime, client, workDir),
      clock
    };
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should recreate, provision and verify on a fresh host', async () => {
    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.status).toBe('succeeded');
    expect(outcome.exitCode).toBe(0);
    expect(outcome.failedStep).toBeUndefined();
    expect(outcome.dryRun).toBe(false);
    expect(outcome.durationMs).toBe(0);
    expect(statuses(outcome.steps)).toEqual({
      Preflight: 'passed',
      Teardown: 'warned',
      EnsureVolume: 'passed',
      Build: 'passed',
      Launch: 'passed',
      NetworkAttach: 'passed',
      AwaitHealthy: 'passed',
      Provision: 'passed',
      Verify: 'passed'
    });
    expect(runtime.calls).toEqual([
      'container exists mcp_gateway',
      'volume exists mcp_gateway_data',
      'volume create mcp_gateway_data',
      'build -t localhost/mcpgateway/mcpgateway:latest .',
      'run mcp_gateway localhost/mcpgateway/mcpgateway:latest',
      'network exists gateway_network',
      'network create gateway_network',
      'network connect gateway_network mcp_gateway'
    ]);
    expect(step(outcome.steps, 'Preflight').output).toEqual([
      'podman: podman version 4.9.3',
      'Loaded 3 entries from .env'
    ]);
    expect(step(outcome.steps, 'Verify').output).toEqual([
      'PASS health: GET https://localhost:4444/health -> HTTP 200',
      'PASS authenticated tools listing: GET https://localhost:4444/tools -> HTTP 200'
    ]);
    expect(readFileSync(envFile, 'utf-8')).toBe(`${ENV_CONTENT}MCPGATEWAY_BEARER_TOKEN="tok-1"\n`);
  });

  it('should replace the previous deployment and token on a second run', async () => {
    await new RecreateOrchestrator(deps).run();
    runtime.calls.length = 0;

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.exitCode).toBe(0);
    expect(step(outcome.steps, 'Teardown')).toMatchObject({
      status: 'passed',
      output: ['Removed container mcp_gateway', 'Removed volume mcp_gateway_data']
    });
    expect(runtime.calls.slice(0, 5)).toEqual([
      'container exists mcp_gateway',
      'stop mcp_gateway',
      'rm -f mcp_gateway',
      'volume exists mcp_gateway_data',
      'volume rm mcp_gateway_data'
    ]);

    const content = readFileSync(envFile, 'utf-8');
    expect(content).toBe(`${ENV_CONTENT}MCPGATEWAY_BEARER_TOKEN="tok-2"\n`);
    expect(content.match(/^MCPGATEWAY_BEARER_TOKEN=/gm)).toHaveLength(1);
  });

  it('should warn on teardown every time there is nothing to remove', async () => {
    const teardownOnly = createRecreateSteps(deps).filter(candidate => candidate.name === 'Teardown');

    for (let run = 0; run < 2; run++) {
      const outcome = await new RecreateOrchestrator(deps, {}, teardownOnly).run();

      expect(outcome.exitCode).toBe(0);
      expect(outcome.steps).toEqual([{
        name: 'Teardown',
        policy: 'warn-and-continue',
        status: 'warned',
        attempts: 1,
        output: ['Nothing to remove: no previous container or volume exists']
      }]);
    }
  });

  it('should also tear down legacy containers', async () => {
    config.gateway.legacy_containers = ['mcpgateway', 'mcp_gateway'];
    runtime.existing.add('container:mcpgateway');

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(step(outcome.steps, 'Teardown').status).toBe('passed');
    expect(runtime.calls.slice(0, 5)).toEqual([
      'container exists mcp_gateway',
      'container exists mcpgateway',
      'stop mcpgateway',
      'rm -f mcpgateway',
      'volume exists mcp_gateway_data'
    ]);
  });

  it('should warn about a failed removal and keep going', async () => {
    runtime.existing.add('volume:mcp_gateway_data');
    runtime.respond('removeVolume', processResult({ exitCode: 2, stderr: 'Error: volume is being used' }));

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(step(outcome.steps, 'Teardown')).toMatchObject({
      status: 'warned',
      output: ['Teardown incomplete: volume mcp_gateway_data: Error: volume is being used']
    });
    expect(outcome.exitCode).toBe(0);
  });

  it('should retry the network attach and continue when it keeps failing', async () => {
    runtime.respond('connectNetwork', processResult({ exitCode: 125, stderr: 'Error: unable to find network' }));
    const retries: number[] = [];
    const reporter: ProgressReporter = {
      runStarted: () => undefined,
      stepStarted: () => undefined,
      stepRetrying: (_step, attempt) => retries.push(attempt),
      stepFinished: () => undefined
    };

    const outcome = await new RecreateOrchestrator(deps, { reporter }).run();

    const networkAttach = step(outcome.steps, 'NetworkAttach');
    expect(networkAttach.status).toBe('warned');
    expect(networkAttach.attempts).toBe(3);
    expect(networkAttach.error).toMatchObject({
      code: 'NetworkAttachFailed',
      message: "Could not connect mcp_gateway to network 'gateway_network'"
    });
    expect(retries).toEqual([2, 3]);
    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(runtime.calls.filter(call => call === 'network create gateway_network')).toHaveLength(1);

    expect(step(outcome.steps, 'Provision').status).toBe('passed');
    expect(step(outcome.steps, 'Verify').status).toBe('passed');
    expect(outcome.status).toBe('succeeded');
    expect(outcome.exitCode).toBe(0);
  });

  it('should treat an existing attachment as attached', async () => {
    runtime.respond('connectNetwork', processResult({
      exitCode: 125,
      stderr: 'Error: container 4f2a is already connected to network "gateway_network"'
    }));

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(step(outcome.steps, 'NetworkAttach')).toMatchObject({
      status: 'passed',
      attempts: 1,
      output: ['Created network gateway_network', 'mcp_gateway already connected to gateway_network']
    });
  });

  it('should stop at a failed launch and mark later steps as not run', async () => {
    runtime.respond('run', processResult({ exitCode: 125, stderr: 'Error: localhost/mcpgateway/mcpgateway:latest: image not known' }));

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.status).toBe('failed');
    expect(outcome.exitCode).toBe(1);
    expect(outcome.failedStep).toBe('Launch');
    expect(step(outcome.steps, 'Launch').error).toEqual({
      code: 'ProcessNonZeroExit',
      message: "Launching container 'mcp_gateway' failed (exit code 125)",
      remediation: 'Inspect the captured output above and rerun the command by hand'
    });
    expect(outcome.steps.slice(5).map(record => record.status)).toEqual(['not-run', 'not-run', 'not-run', 'not-run']);
    expect(client.requests).toHaveLength(0);
    expect(readFileSync(envFile, 'utf-8')).toBe(ENV_CONTENT);
  });

  it('should exit with the verification code when checks fail after a good deployment', async () => {
    gatewayState.rejectTools = true;

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.status).toBe('verification-failed');
    expect(outcome.exitCode).toBe(2);
    expect(outcome.failedStep).toBeUndefined();
    expect(step(outcome.steps, 'Verify')).toMatchObject({
      status: 'warned',
      error: {
        code: 'VerificationFailed',
        message: '1 of 2 checks failed: authenticated tools listing'
      }
    });
    expect(readFileSync(envFile, 'utf-8')).toBe(`${ENV_CONTENT}MCPGATEWAY_BEARER_TOKEN="tok-1"\n`);
  });

  it('should fail with the container logs when the gateway never becomes healthy', async () => {
    gatewayState.healthy = false;
    runtime.respond('logs', processResult({ stdout: 'sqlite3.OperationalError: unable to open database file\n' }));

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.failedStep).toBe('AwaitHealthy');
    expect(outcome.exitCode).toBe(1);
    expect(step(outcome.steps, 'AwaitHealthy')).toMatchObject({
      status: 'failed',
      error: {
        code: 'HealthTimeout',
        message: 'https://localhost:4444/health did not become healthy within 30s (last status: unreachable)'
      },
      output: [
        'https://localhost:4444/health did not become healthy within 30s (last status: unreachable)',
        'sqlite3.OperationalError: unable to open database file'
      ]
    });
    expect(client.requests).toHaveLength(31);
    expect(clock.now()).toBe(30_000);
    expect(runtime.calls).toContain('logs --tail 20 mcp_gateway');
    expect(statuses(outcome.steps)).toMatchObject({ Provision: 'not-run', Verify: 'not-run' });
  });

  it('should skip the live-only steps during a dry run', async () => {
    const outcome = await new RecreateOrchestrator(deps, { dryRun: true }).run();

    expect(outcome.dryRun).toBe(true);
    expect(outcome.exitCode).toBe(0);
    expect(statuses(outcome.steps)).toMatchObject({
      NetworkAttach: 'passed',
      AwaitHealthy: 'skipped',
      Provision: 'skipped',
      Verify: 'skipped'
    });
    expect(step(outcome.steps, 'Provision').output).toEqual(['Skipped during dry run']);
    expect(client.requests).toHaveLength(0);
  });

  it('should fail preflight when the container tool is missing', async () => {
    toolResult = processResult({ exitCode: 127, spawnError: 'spawn podman ENOENT' });

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.failedStep).toBe('Preflight');
    expect(step(outcome.steps, 'Preflight').error).toMatchObject({
      code: 'ToolMissing',
      message: "Required tool 'podman' not found in PATH"
    });
    expect(step(outcome.steps, 'Preflight').output).toEqual([
      "Required tool 'podman' not found in PATH",
      'spawn podman ENOENT'
    ]);
    expect(runtime.calls).toEqual([]);
  });

  it('should fail preflight when the environment file is missing', async () => {
    rmSync(envFile);

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.failedStep).toBe('Preflight');
    expect(step(outcome.steps, 'Preflight').error).toMatchObject({
      code: 'EnvFileUnreadable',
      message: `Environment file not found: ${envFile}`
    });
  });

  it('should fail preflight when the environment file is empty', async () => {
    writeFileSync(envFile, '# nothing here yet\n');

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(step(outcome.steps, 'Preflight').error).toMatchObject({
      code: 'EnvFileUnreadable',
      message: `Environment file is empty: ${envFile}`
    });
  });

  it('should fail provisioning when the admin email is not configured', async () => {
    writeFileSync(envFile, 'PORT="4444"\n');

    const outcome = await new RecreateOrchestrator(deps).run();

    expect(outcome.failedStep).toBe('Provision');
    expect(step(outcome.steps, 'Provision').error).toMatchObject({
      code: 'ProvisionFailed',
      message: 'PLATFORM_ADMIN_EMAIL is not set in .env'
    });
    expect(step(outcome.steps, 'Verify').status).toBe('not-run');
    expect(readFileSync(envFile, 'utf-8')).toBe('PORT="4444"\n');
  });

  it('should report unexpected errors without a taxonomy code', async () => {
    const outcome = await new RecreateOrchestrator(deps, {}, [{
      name: 'Build',
      policy: 'fatal',
      action: async () => {
        throw new TypeError('Cannot read properties of undefined');
      }
    }]).run();

    expect(outcome.failedStep).toBe('Build');
    expect(outcome.steps[0].error).toEqual({
      code: 'UnexpectedError',
      message: 'Cannot read properties of undefined'
    });
  });

  it('should notify the reporter of every executed step', async () => {
    const reporter = {
      runStarted: vi.fn(),
      stepStarted: vi.fn(),
      stepRetrying: vi.fn(),
      stepFinished: vi.fn()
    };

    const outcome = await new RecreateOrchestrator(deps, { reporter }).run();

    expect(reporter.runStarted).toHaveBeenCalledWith(outcome.runId, false);
    expect(reporter.stepStarted).toHaveBeenCalledTimes(9);
    expect(reporter.stepStarted.mock.calls[0][1]).toBe(0);
    expect(reporter.stepStarted.mock.calls[0][2]).toBe(9);
    expect(reporter.stepFinished.mock.calls.map(call => call[0])).toEqual(outcome.steps);
    expect(reporter.stepRetrying).not.toHaveBeenCalled();
  });
});

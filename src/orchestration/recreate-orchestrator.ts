import { v4 as uuidv4 } from 'uuid';
import { RunOutcome, RunStatus, StepName, StepRecord, StepError } from '../types';
import { isRecreateError } from '../errors';
import { DeploymentStep, OrchestratorDependencies, OrchestratorOptions, ProgressReporter } from './types';
import { createRecreateSteps } from './steps';

export const EXIT_SUCCESS = 0;
export const EXIT_DEPLOYMENT_FAILED = 1;
export const EXIT_VERIFICATION_FAILED = 2;

const silentReporter: ProgressReporter = {
  runStarted: () => undefined,
  stepStarted: () => undefined,
  stepRetrying: () => undefined,
  stepFinished: () => undefined
};

function toStepError(error: unknown): { stepError: StepError; details?: string } {
  if (isRecreateError(error)) {
    return { stepError: error.toStepError(), details: error.details };
  }
  return {
    stepError: {
      code: 'UnexpectedError',
      message: error instanceof Error ? error.message : String(error)
    }
  };
}

/**
 * Runs the recreate pipeline once, strictly in order. A failed fatal step
 * stops the run; every later step is reported as not-run.
 */
export class RecreateOrchestrator {
  private readonly steps: DeploymentStep[];
  private readonly reporter: ProgressReporter;
  private readonly dryRun: boolean;

  constructor(private readonly deps: OrchestratorDependencies, options: OrchestratorOptions = {}, steps?: DeploymentStep[]) {
    this.steps = steps ?? createRecreateSteps(deps);
    this.reporter = options.reporter ?? silentReporter;
    this.dryRun = options.dryRun ?? false;
  }

  async run(): Promise<RunOutcome> {
    const runId = uuidv4();
    const startedAt = new Date();
    const startTime = this.deps.clock.now();
    const records: StepRecord[] = [];
    let failedStep: StepName | undefined;

    this.reporter.runStarted(runId, this.dryRun);

    for (const [index, step] of this.steps.entries()) {
      if (failedStep) {
        records.push(this.emptyRecord(step, 'not-run'));
        continue;
      }

      if (this.dryRun && step.liveOnly) {
        const skipped = this.emptyRecord(step, 'skipped');
        skipped.output.push('Skipped during dry run');
        this.reporter.stepFinished(skipped);
        records.push(skipped);
        continue;
      }

      this.reporter.stepStarted(step, index, this.steps.length);
      const record = await this.execute(step);
      this.reporter.stepFinished(record);
      records.push(record);

      if (record.status === 'failed') {
        failedStep = step.name;
      }
    }

    const status = this.resolveStatus(records, failedStep);

    return {
      runId,
      startedAt,
      durationMs: this.deps.clock.now() - startTime,
      dryRun: this.dryRun,
      status,
      exitCode: status === 'succeeded'
        ? EXIT_SUCCESS
        : status === 'verification-failed' ? EXIT_VERIFICATION_FAILED : EXIT_DEPLOYMENT_FAILED,
      failedStep,
      steps: records
    };
  }

  private async execute(step: DeploymentStep): Promise<StepRecord> {
    const maxAttempts = 1 + (step.retries ?? 0);
    const record = this.emptyRecord(step, 'passed');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      record.attempts = attempt;
      try {
        const report = await step.action({ log: line => record.output.push(line) });
        if (report && report.warning) {
          record.status = 'warned';
          record.output.push(report.warning);
        } else {
          record.status = 'passed';
        }
        record.error = undefined;
        return record;
      } catch (error) {
        const { stepError, details } = toStepError(error);
        record.error = stepError;
        record.output.push(stepError.message);
        if (details) {
          record.output.push(details);
        }

        if (attempt < maxAttempts) {
          this.reporter.stepRetrying(step, attempt + 1, stepError.message);
          await this.deps.clock.sleep(step.retryDelayMs ?? 0);
        }
      }
    }

    record.status = step.policy === 'fatal' ? 'failed' : 'warned';
    return record;
  }

  private resolveStatus(records: StepRecord[], failedStep: StepName | undefined): RunStatus {
    if (failedStep) {
      return 'failed';
    }
    const verification = records.find(record => record.name === 'Verify');
    if (verification?.error?.code === 'VerificationFailed') {
      return 'verification-failed';
    }
    return 'succeeded';
  }

  private emptyRecord(step: DeploymentStep, status: StepRecord['status']): StepRecord {
    return {
      name: step.name,
      policy: step.policy,
      status,
      attempts: 0,
      output: []
    };
  }
}

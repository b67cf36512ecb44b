import chalk from 'chalk';
import ora from 'ora';
import { RunOutcome, StepRecord } from '../types';
import { DeploymentStep, ProgressReporter } from '../orchestration/types';

export interface ConsoleReporterOptions {
  verbose?: boolean;
  /** Defaults to console.log */
  write?: (line: string) => void;
}

type Spinner = ReturnType<typeof ora>;

const STATUS_ICONS: Record<StepRecord['status'], string> = {
  passed: chalk.green('✔'),
  warned: chalk.yellow('⚠'),
  failed: chalk.red('✖'),
  skipped: chalk.gray('○'),
  'not-run': chalk.gray('-')
};

/**
 * Step-by-step progress on the terminal: one spinner per running step,
 * captured output under warned and failed steps (and under every step with
 * `verbose`).
 */
export class ConsoleReporter implements ProgressReporter {
  private spinner: Spinner | undefined;
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line: string) => console.log(line));
  }

  runStarted(runId: string, dryRun: boolean): void {
    this.write(chalk.bold('🛠  Gateway recreate'));
    this.write(chalk.gray(`🆔 Run ID: ${runId}`));
    if (dryRun) {
      this.write(chalk.blue('🏜  Dry run: commands are printed, not executed'));
    }
  }

  stepStarted(step: DeploymentStep, index: number, total: number): void {
    this.spinner = ora(`[${index + 1}/${total}] ${step.name}...`).start();
  }

  stepRetrying(step: DeploymentStep, attempt: number, reason: string): void {
    if (this.spinner) {
      this.spinner.text = `${step.name} (attempt ${attempt}): ${reason}`;
    }
  }

  stepFinished(record: StepRecord): void {
    const label = record.attempts > 1 ? `${record.name} (${record.attempts} attempts)` : record.name;
    const spinner = this.spinner;
    this.spinner = undefined;

    const settle = (method: 'succeed' | 'warn' | 'fail', text: string) => {
      if (spinner) {
        spinner[method](text);
      } else {
        this.write(`${STATUS_ICONS[record.status]} ${text}`);
      }
    };

    switch (record.status) {
      case 'passed':
        settle('succeed', label);
        break;
      case 'warned':
        settle('warn', chalk.yellow(label));
        break;
      case 'failed':
        settle('fail', chalk.red(label));
        break;
      default:
        spinner?.stop();
        this.write(`${STATUS_ICONS[record.status]} ${chalk.gray(`${label} (${record.status})`)}`);
    }

    if (record.status === 'warned' || record.status === 'failed' || this.options.verbose) {
      for (const line of record.output) {
        this.write(chalk.gray(`    ${line.split('\n').join('\n    ')}`));
      }
    }
    if (record.status === 'failed' && record.error?.remediation) {
      this.write(chalk.yellow(`  💡 ${record.error.remediation}`));
    }
  }
}

export function formatSummary(outcome: RunOutcome): string[] {
  const lines = ['', chalk.bold('Summary:')];

  for (const step of outcome.steps) {
    lines.push(`  ${STATUS_ICONS[step.status]} ${step.name.padEnd(14)} ${step.status}`);
  }

  lines.push('');
  switch (outcome.status) {
    case 'succeeded':
      lines.push(chalk.green(outcome.dryRun ? '✅ Dry run completed' : '✅ Gateway recreated and verified'));
      break;
    case 'verification-failed':
      lines.push(chalk.yellow('⚠️  Gateway deployed, but verification failed'));
      break;
    case 'failed':
      lines.push(chalk.red(`❌ Deployment failed at ${outcome.failedStep ?? 'an unknown step'}`));
      break;
  }
  lines.push(chalk.gray(`⏱️  Took ${outcome.durationMs}ms, exit code ${outcome.exitCode}`));

  return lines;
}

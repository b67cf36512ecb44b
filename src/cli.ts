#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { dump as dumpYaml } from 'js-yaml';
import * as packageJson from '../package.json';
import { RecreateConfig } from './types';
import { isRecreateError } from './errors';
import { createConfigLoader, loadDefaultConfig } from './config/loader';
import { validateAndNormalizeConfig } from './config/validator';
import { EnvironmentStore } from './env/environment-store';
import { recreate } from './orchestration';
import { ConsoleReporter, formatSummary } from './reporting/console-reporter';

interface RecreateCliOptions {
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

interface EnvCliOptions {
  config?: string;
  envFile?: string;
}

async function loadConfig(configPath?: string): Promise<RecreateConfig> {
  if (configPath) {
    return createConfigLoader().load(resolve(process.cwd(), configPath));
  }
  return loadDefaultConfig();
}

async function resolveEnvFile(options: EnvCliOptions): Promise<string> {
  if (options.envFile) {
    return resolve(process.cwd(), options.envFile);
  }
  const config = await loadConfig(options.config);
  return resolve(process.cwd(), config.gateway.env_file);
}

function printError(error: unknown, verbose?: boolean): void {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  if (isRecreateError(error)) {
    if (error.details) {
      console.error(chalk.gray(error.details));
    }
    console.error(chalk.yellow(`💡 ${error.remediation}`));
  }
  if (verbose) {
    console.error(error);
  }
}

const program = new Command();

program
  .name('gateway-recreate')
  .description('Tear down, rebuild, relaunch and verify the gateway container, then provision a fresh API token')
  .version(packageJson.version)
  .enablePositionalOptions()
  .option('-c, --config <path>', 'Path to configuration file (default: recreate.yml when present)')
  .option('--dry-run', 'Print the container commands without executing them')
  .option('-v, --verbose', 'Show the captured output of every step')
  .action(async (options: RecreateCliOptions) => {
    try {
      const config = await loadConfig(options.config);
      const outcome = await recreate(config, {
        dryRun: options.dryRun,
        reporter: new ConsoleReporter({ verbose: options.verbose }),
        onDryRunCommand: commandLine => console.log(chalk.blue(`    🏜  ${commandLine}`))
      });

      for (const line of formatSummary(outcome)) {
        console.log(line);
      }
      if (outcome.status !== 'failed' && !outcome.dryRun) {
        console.log(chalk.gray(`🔍 Manual verify: curl -k ${config.health.url}`));
      }
      process.exit(outcome.exitCode);
    } catch (error) {
      printError(error, options.verbose);
      process.exit(1);
    }
  });

program
  .command('init')
  .description('Write a configuration file with every default filled in')
  .option('-o, --output <path>', 'Output configuration file path', 'recreate.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options: { output: string; force?: boolean }) => {
    const spinner = ora('Initializing recreate configuration...').start();

    try {
      const outputPath = resolve(process.cwd(), options.output);
      if (existsSync(outputPath) && !options.force) {
        throw new Error(`${options.output} already exists (use --force to overwrite)`);
      }

      const yamlContent = `# Gateway recreate configuration
# Generated on ${new Date().toISOString()}
# Values may reference environment variables as \${VAR} or \${VAR:-default}

${dumpYaml(validateAndNormalizeConfig({}), { lineWidth: 120 })}`;

      writeFileSync(outputPath, yamlContent);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review the container, health and provisioning settings');
      console.log('2. Make sure the environment file holds the admin credentials');
      console.log(`3. Run: ${chalk.cyan('gateway-recreate')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      printError(error);
      process.exit(1);
    }
  });

const env = program
  .command('env')
  .description('Read or update the gateway environment file');

env
  .command('get <key>')
  .description('Print the value stored for a key')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--env-file <path>', 'Environment file (default: gateway.env_file from the configuration)')
  .action(async (key: string, options: EnvCliOptions) => {
    try {
      const value = await new EnvironmentStore().get(await resolveEnvFile(options), key);
      if (value === undefined) {
        console.error(chalk.yellow(`⚠️  ${key} is not set`));
        process.exit(1);
      }
      console.log(value);
    } catch (error) {
      printError(error);
      process.exit(1);
    }
  });

env
  .command('set <key> <value>')
  .description('Insert or replace a key, quoting the value when it needs it')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--env-file <path>', 'Environment file (default: gateway.env_file from the configuration)')
  .action(async (key: string, value: string, options: EnvCliOptions) => {
    try {
      const envFile = await resolveEnvFile(options);
      await new EnvironmentStore().upsert(envFile, key, value);
      console.log(chalk.green(`✅ ${key} updated in ${envFile}`));
    } catch (error) {
      printError(error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  printError(error);
  process.exit(1);
});

// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { RecreateConfig } from '../types';
import { RecreateError, isRecreateError } from '../errors';
import { ConfigLoader, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = [
  './recreate.yml',
  './recreate.yaml',
  './recreate.json'
];

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class RecreateConfigLoader implements ConfigLoader {

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @returns Promise resolving to validated and normalized RecreateConfig
   */
  async load(path: string): Promise<RecreateConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      // An empty YAML document parses to null
      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig ?? {});

      return validateAndNormalizeConfig(configWithEnvVars);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RecreateError('ConfigInvalid', `Failed to load configuration from ${path}: ${reason}`, {
        remediation: isRecreateError(error) ? error.remediation : undefined
      });
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first configuration file that exists among the search paths.
   * When none exists the built-in defaults are returned; a file that exists
   * but fails to load is an error.
   */
  async loadFromPaths(searchPaths: string[]): Promise<RecreateConfig> {
    for (const path of searchPaths) {
      if (existsSync(path)) {
        return this.load(path);
      }
    }

    return validateAndNormalizeConfig({});
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return this.substituteEnvironmentVariables(obj);
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.resolveEnvironmentVariables(item));
    }

    if (obj && typeof obj === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = this.resolveEnvironmentVariables(value);
      }
      return result;
    }

    return obj;
  }

  /**
   * Substitute environment variables in a string
   */
  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const separator = varExpression.indexOf(':-');
      const varName = separator === -1 ? varExpression : varExpression.slice(0, separator);
      const defaultValue = separator === -1 ? undefined : varExpression.slice(separator + 2);
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder so validation reports it
      return match;
    });
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(): RecreateConfigLoader {
  return new RecreateConfigLoader();
}

/**
 * Load configuration from the standard locations in the current directory,
 * falling back to defaults when no file exists
 */
export async function loadDefaultConfig(): Promise<RecreateConfig> {
  return createConfigLoader().loadFromPaths(DEFAULT_CONFIG_PATHS);
}

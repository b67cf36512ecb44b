// Configuration-specific types
import { RecreateConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<RecreateConfig>;
  validate(config: unknown): ConfigValidationResult;
}

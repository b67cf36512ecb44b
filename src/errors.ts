import { StepError } from './types';

export type RecreateErrorCode =
  | 'ToolMissing'
  | 'EnvFileUnreadable'
  | 'ProcessTimeout'
  | 'ProcessNonZeroExit'
  | 'HealthTimeout'
  | 'ProvisionFailed'
  | 'VerificationFailed'
  | 'NetworkAttachFailed'
  | 'ConfigInvalid';

const DEFAULT_REMEDIATION: Record<RecreateErrorCode, string> = {
  ToolMissing: 'Install the missing tool and make sure it is on your PATH',
  EnvFileUnreadable: 'Fix or recreate the environment file; every non-comment line must be KEY=VALUE',
  ProcessTimeout: 'Raise runtime.command_timeout_seconds or check that the container tool is responsive',
  ProcessNonZeroExit: 'Inspect the captured output above and rerun the command by hand',
  HealthTimeout: 'Check the container logs; the gateway may need more time or failed to start',
  ProvisionFailed: 'Confirm the admin credentials in the environment file and that the gateway accepts logins',
  VerificationFailed: 'The deployment is up; rerun the failing checks by hand to investigate',
  NetworkAttachFailed: 'Sibling services may be unreachable; start the container with --network instead',
  ConfigInvalid: 'Fix the configuration file or run "gateway-recreate init" to generate a fresh one'
};

export class RecreateError extends Error {
  readonly code: RecreateErrorCode;
  readonly remediation: string;
  readonly details?: string;

  constructor(code: RecreateErrorCode, message: string, options: { details?: string; remediation?: string } = {}) {
    super(message);
    this.name = 'RecreateError';
    this.code = code;
    this.details = options.details;
    this.remediation = options.remediation ?? DEFAULT_REMEDIATION[code];
  }

  toStepError(): StepError {
    return {
      code: this.code,
      message: this.message,
      remediation: this.remediation
    };
  }
}

export function isRecreateError(error: unknown): error is RecreateError {
  return error instanceof RecreateError;
}


import { existsSync } from 'fs';
import { RecreateError } from '../errors';
import { ContainerRuntime, combinedOutput } from '../runtime/container-runtime';
import { AdminIdentity, TokenProvisioner } from './types';

const TOKEN_MARKER_PATTERN = /BOOTSTRAP_TOKEN_START:(.*?):BOOTSTRAP_TOKEN_END/;
const CONTAINER_SCRIPT_PATH = '/tmp/bootstrap_token.py';

export interface ExecTokenProvisionerConfig {
  containerName: string;
  scriptPath: string;
  interpreter: string;
  tokenName: string;
}

export function extractBootstrapToken(output: string): string | undefined {
  const match = TOKEN_MARKER_PATTERN.exec(output);
  return match && match[1].length > 0 ? match[1] : undefined;
}

/**
 * Copies a bootstrap script into the running container and executes it as
 * `<interpreter> <script> <token name> <admin email>`. The script prints the
 * token between BOOTSTRAP_TOKEN_START: and :BOOTSTRAP_TOKEN_END markers.
 */
export class ExecTokenProvisioner implements TokenProvisioner {
  readonly strategy = 'exec';

  constructor(private readonly runtime: ContainerRuntime, private readonly config: ExecTokenProvisionerConfig) {}

  async provision(admin: AdminIdentity): Promise<string> {
    if (!existsSync(this.config.scriptPath)) {
      throw new RecreateError('ProvisionFailed', `Bootstrap script not found: ${this.config.scriptPath}`);
    }

    const copied = await this.runtime.copy(this.config.scriptPath, this.config.containerName, CONTAINER_SCRIPT_PATH);
    if (copied.exitCode !== 0) {
      throw new RecreateError('ProvisionFailed', `Could not copy the bootstrap script into ${this.config.containerName}`, {
        details: combinedOutput(copied)
      });
    }

    const result = await this.runtime.exec(this.config.containerName, [
      this.config.interpreter,
      CONTAINER_SCRIPT_PATH,
      this.config.tokenName,
      admin.email
    ]);
    if (result.exitCode !== 0) {
      throw new RecreateError('ProvisionFailed', `Bootstrap script exited with ${result.timedOut ? 'a timeout' : `code ${result.exitCode}`}`, {
        details: combinedOutput(result)
      });
    }

    const token = extractBootstrapToken(result.stdout);
    if (!token) {
      throw new RecreateError('ProvisionFailed', 'Bootstrap output did not contain a token', {
        details: combinedOutput(result)
      });
    }
    return token;
  }
}

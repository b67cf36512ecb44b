import { RecreateError } from '../errors';
import { HttpClient, HttpResponse, isSuccessStatus, parseJsonBody } from '../http/https-client';
import { AdminIdentity, TokenProvisioner } from './types';

export interface HttpTokenProvisionerConfig {
  baseUrl: string;
  tokenName: string;
  expiresInDays: number;
  requestTimeoutMs: number;
}

function readAccessToken(response: HttpResponse): string | undefined {
  const payload = parseJsonBody(response.body);
  if (payload && typeof payload === 'object' && 'access_token' in payload) {
    const token = payload.access_token;
    if (typeof token === 'string' && token.length > 0) {
      return token;
    }
  }
  return undefined;
}

/**
 * Logs the admin in through the gateway API and mints a named API token with
 * the resulting session.
 */
export class HttpTokenProvisioner implements TokenProvisioner {
  readonly strategy = 'http';

  constructor(private readonly client: HttpClient, private readonly config: HttpTokenProvisionerConfig) {}

  async provision(admin: AdminIdentity): Promise<string> {
    if (!admin.password) {
      throw new RecreateError('ProvisionFailed', `No password available for admin ${admin.email}`);
    }

    const sessionToken = await this.login(admin.email, admin.password);
    return this.createApiToken(sessionToken);
  }

  private async login(email: string, password: string): Promise<string> {
    const response = await this.send('/auth/email/login', { email, password });
    if (!isSuccessStatus(response.status)) {
      throw new RecreateError('ProvisionFailed', `Admin login was rejected with HTTP ${response.status}`, {
        details: response.body
      });
    }

    const token = readAccessToken(response);
    if (!token) {
      throw new RecreateError('ProvisionFailed', 'Admin login response did not contain an access_token', {
        details: response.body
      });
    }
    return token;
  }

  private async createApiToken(sessionToken: string): Promise<string> {
    const response = await this.send(
      '/tokens',
      {
        name: this.config.tokenName,
        description: 'Provisioned by gateway-recreate',
        expires_in_days: this.config.expiresInDays
      },
      sessionToken
    );
    if (!isSuccessStatus(response.status)) {
      throw new RecreateError('ProvisionFailed', `Token creation was rejected with HTTP ${response.status}`, {
        details: response.body
      });
    }

    const token = readAccessToken(response);
    if (!token) {
      throw new RecreateError('ProvisionFailed', 'Token creation response did not contain an access_token', {
        details: response.body
      });
    }
    return token;
  }

  private async send(path: string, body: unknown, bearer?: string): Promise<HttpResponse> {
    const url = new URL(path, this.config.baseUrl).toString();
    try {
      return await this.client.request({
        url,
        method: 'POST',
        body,
        headers: bearer ? { Authorization: `Bearer ${bearer}` } : undefined,
        timeoutMs: this.config.requestTimeoutMs
      });
    } catch (error) {
      throw new RecreateError('ProvisionFailed', `POST ${url} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

import * as http from 'http';
import * as https from 'https';

export interface HttpRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export class HttpTransportError extends Error {
  constructor(message: string, readonly kind: 'timeout' | 'connection') {
    super(message);
    this.name = 'HttpTransportError';
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Parses a JSON body, returning undefined for anything that is not JSON.
 */
export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * HTTP(S) client for a gateway serving a self-signed certificate: TLS
 * verification is off for every request it sends.
 */
export class InsecureHttpsClient implements HttpClient {
  private readonly agent = new https.Agent({ rejectUnauthorized: false });

  request(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    const payload = request.body === undefined ? undefined : JSON.stringify(request.body);
    const headers: Record<string, string | number> = {
      Accept: 'application/json',
      ...request.headers
    };
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(payload);
    }

    const options: http.RequestOptions = {
      method: request.method ?? 'GET',
      headers,
      timeout: request.timeoutMs
    };

    return new Promise<HttpResponse>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        let body = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => { body += chunk; });
        res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
        res.on('error', (error) => reject(new HttpTransportError(error.message, 'connection')));
      };

      const req = url.protocol === 'https:'
        ? https.request(url, { ...options, agent: this.agent }, onResponse)
        : http.request(url, options, onResponse);

      req.on('timeout', () => {
        req.destroy(new HttpTransportError(`Request to ${request.url} timed out after ${request.timeoutMs}ms`, 'timeout'));
      });
      req.on('error', (error) => {
        reject(error instanceof HttpTransportError ? error : new HttpTransportError(error.message, 'connection'));
      });

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}

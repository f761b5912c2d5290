import { AuditLogger } from './audit-logger';
import { DeviceIdentityService } from './device-identity-service';
import { isRecord } from './secure-storage-service';
import { BackendResponse, IdentityBackend } from '../types';

export interface RemoteBackendOptions {
  baseUrls: string[];
  timeoutMs: number;
  probeTimeoutMs: number;
  endpointCacheMs: number;
}

type FetchFn = typeof fetch;

const USER_AGENT = 'secure-session-core/0.1.0';

async function fetchWithTimeout(fetchImpl: FetchFn, url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Picks the first candidate base URL whose health check answers 200 and
 * remembers it for `endpointCacheMs`.
 */
export class EndpointResolver {
  private cachedEndpoint: string | null = null;
  private lastCheck = 0;

  constructor(
    private readonly options: RemoteBackendOptions,
    private readonly logger: AuditLogger,
    private readonly fetchImpl: FetchFn = fetch,
    private readonly now: () => number = Date.now
  ) {}

  async findWorkingEndpoint(): Promise<string | null> {
    if (this.cachedEndpoint && this.now() - this.lastCheck < this.options.endpointCacheMs) {
      return this.cachedEndpoint;
    }

    for (const baseUrl of this.options.baseUrls) {
      if (await this.probe(baseUrl)) {
        this.cachedEndpoint = baseUrl;
        this.lastCheck = this.now();
        return baseUrl;
      }
    }

    this.invalidate();
    return null;
  }

  async getEndpoint(): Promise<string> {
    return (await this.findWorkingEndpoint()) ?? this.options.baseUrls[0];
  }

  invalidate(): void {
    this.cachedEndpoint = null;
    this.lastCheck = 0;
  }

  private async probe(baseUrl: string): Promise<boolean> {
    try {
      const response = await fetchWithTimeout(this.fetchImpl, `${baseUrl}/health`, { method: 'GET' }, this.options.probeTimeoutMs);
      return response.status === 200;
    } catch (error) {
      this.logger.debug({ event: 'endpoint_probe_failed', baseUrl, error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }
}

/**
 * HTTP identity backend. Transport faults never throw: they come back as a
 * response with `statusCode: 0` so the orchestrator can report a
 * connectivity failure.
 */
export class RemoteIdentityBackend implements IdentityBackend {
  readonly name = 'remote';
  private readonly resolver: EndpointResolver;

  constructor(
    private readonly options: RemoteBackendOptions,
    private readonly deviceIdentity: DeviceIdentityService,
    private readonly logger: AuditLogger,
    private readonly fetchImpl: FetchFn = fetch,
    now: () => number = Date.now
  ) {
    this.resolver = new EndpointResolver(options, logger, fetchImpl, now);
  }

  async isReachable(): Promise<boolean> {
    return (await this.resolver.findWorkingEndpoint()) !== null;
  }

  login(email: string, password: string): Promise<BackendResponse> {
    return this.request('POST', '/auth/login', { email, password });
  }

  register(name: string, email: string, password: string): Promise<BackendResponse> {
    return this.request('POST', '/auth/register', { name, email, password });
  }

  getUser(userId: string, accessToken?: string): Promise<BackendResponse> {
    return this.request('GET', `/user/${encodeURIComponent(userId)}`, undefined, accessToken);
  }

  refresh(refreshToken: string): Promise<BackendResponse> {
    return this.request('POST', '/auth/refresh', { refresh_token: refreshToken });
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: Record<string, unknown>,
    accessToken?: string
  ): Promise<BackendResponse> {
    // Vault faults must surface as StorageError, not as a network failure
    const deviceId = await this.deviceIdentity.getDeviceId();

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      'X-Device-Id': deviceId
    };
    if (accessToken) {
      headers.Authorization = `Bearer ${accessToken}`;
    }

    try {
      const baseUrl = await this.resolver.getEndpoint();
      const response = await fetchWithTimeout(
        this.fetchImpl,
        `${baseUrl}${path}`,
        { method, headers, body: body ? JSON.stringify(body) : undefined },
        this.options.timeoutMs
      );

      const payload = await this.readJson(response);
      this.logger.debug({ event: 'api_response', method, path, statusCode: response.status });

      return {
        success: response.ok && payload.success !== false,
        statusCode: response.status,
        message: typeof payload.message === 'string' ? payload.message : 'Request completed',
        data: isRecord(payload.data) ? payload.data : null
      };
    } catch (error) {
      this.resolver.invalidate();
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.logError({ event: 'api_request_failed', method, path }, error);
      return { success: false, statusCode: 0, message: `Network error: ${reason}`, data: null };
    }
  }

  private async readJson(response: Response): Promise<Record<string, unknown>> {
    const text = await response.text();
    if (!text) return {};
    try {
      const parsed: unknown = JSON.parse(text);
      return isRecord(parsed) ? parsed : {};
    } catch (error) {
      this.logger.logError({ event: 'api_response_not_json', statusCode: response.status }, error);
      return {};
    }
  }
}

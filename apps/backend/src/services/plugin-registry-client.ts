import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ILogger } from '@homehub/types';
import { RPC_MAX_RETRIES, RPC_RETRY_DELAY_MS } from '../lib/constants.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { createHttpClient, httpStatusOf, isTransientHttpError } from '../lib/http-client.js';
import { retry } from '../lib/retry.js';

export type RegistryAuthType = 'bearer' | 'api_key';

export interface PluginRegistryClientOptions {
  baseUrl: string;
  apiKey?: string;
  authType?: RegistryAuthType;
  /** Defaults to `<baseUrl>/health` */
  healthUrl?: string;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

const registryPluginSchema = z.object({
  name: z.string(),
  latestVersion: z.string(),
  description: z.string().default(''),
  publisher: z.string().default(''),
  installType: z.enum(['url', 'source-control', 'local']).optional(),
  source: z.string().optional()
});

export type RegistryPlugin = z.infer<typeof registryPluginSchema>;

const searchResponseSchema = z.object({
  plugins: z.array(registryPluginSchema)
});

/**
 * PluginRegistryClient
 *
 * Read-only client of an external plugin registry, used to discover plugins
 * and their install sources. Network failures and 5xx replies are retried
 * with backoff; 4xx replies are returned to the caller straight away.
 */
export class PluginRegistryClient {
  private readonly http: AxiosInstance;
  private readonly logger: ILogger;
  private readonly healthUrl: string;

  constructor(
    private readonly options: PluginRegistryClientOptions,
    logger: ILogger,
    http?: AxiosInstance
  ) {
    this.logger = logger.child({ module: 'plugin-registry-client' });
    const baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.healthUrl = options.healthUrl ?? `${baseUrl}/health`;
    this.http =
      http ??
      createHttpClient({
        baseURL: baseUrl,
        timeout: options.timeoutMs ?? 10000,
        headers: this.authorizationHeaders()
      });
  }

  async search(query: string): Promise<RegistryPlugin[]> {
    const data = await this.request<unknown>('/plugins', { q: query });
    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError('Malformed registry search response', { issues: parsed.error.issues });
    }
    return parsed.data.plugins;
  }

  async getPlugin(name: string): Promise<RegistryPlugin> {
    try {
      const data = await this.request<unknown>(`/plugins/${encodeURIComponent(name)}`);
      const parsed = registryPluginSchema.safeParse(data);
      if (!parsed.success) {
        throw new ValidationError(`Malformed registry entry for ${name}`, { issues: parsed.error.issues });
      }
      return parsed.data;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        throw new NotFoundError(`Plugin ${name} not found in registry`, { name });
      }
      throw error;
    }
  }

  /**
   * Probe the registry's health endpoint once, without retries.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.http.get(this.healthUrl);
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      this.logger.warn({ url: this.healthUrl, error }, 'Plugin registry health check failed');
      return false;
    }
  }

  private async request<T>(path: string, params?: Record<string, string>): Promise<T> {
    return retry(
      async () => {
        const response = await this.http.get<T>(path, { params });
        return response.data;
      },
      {
        retries: this.options.retries ?? RPC_MAX_RETRIES,
        delayMs: this.options.retryDelayMs ?? RPC_RETRY_DELAY_MS,
        factor: 1,
        shouldRetry: isTransientHttpError,
        onRetry: (attempt, error) => this.logger.warn({ path, attempt, error }, 'Retrying plugin registry request')
      }
    );
  }

  authorizationHeaders(): Record<string, string> {
    const { apiKey, authType = 'bearer' } = this.options;
    if (!apiKey) {
      return {};
    }
    return authType === 'bearer' ? { Authorization: `Bearer ${apiKey}` } : { 'X-API-Key': apiKey };
  }
}

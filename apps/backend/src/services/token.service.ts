import type { AxiosInstance } from 'axios';
import type { ILogger, ITokenService } from '@homehub/types';
import { createHttpClient, httpStatusOf } from '../lib/http-client.js';

export interface TokenServiceOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * HttpTokenService
 *
 * Client of the token-issuing service. Tokens are addressed by service id at
 * `/tokens/:serviceId`; a 404 on read means no token is stored.
 */
export class HttpTokenService implements ITokenService {
  private readonly http: AxiosInstance;
  private readonly logger: ILogger;

  /**
   * @param options - Service location and credentials
   * @param logger - Parent logger
   * @param http - Preconfigured client, mainly for tests
   */
  constructor(options: TokenServiceOptions, logger: ILogger, http?: AxiosInstance) {
    this.logger = logger.child({ module: 'token-service' });
    this.http =
      http ??
      createHttpClient({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 10000,
        headers: options.apiKey ? { 'x-api-key': options.apiKey } : {}
      });
  }

  async storeToken(serviceId: string, token: string): Promise<void> {
    await this.http.put(this.path(serviceId), { token });
    this.logger.debug({ serviceId }, 'Token stored');
  }

  async getToken(serviceId: string): Promise<string | null> {
    try {
      const response = await this.http.get<{ token?: unknown }>(this.path(serviceId));
      const token = response.data.token;
      return typeof token === 'string' ? token : null;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  async deleteToken(serviceId: string): Promise<void> {
    try {
      await this.http.delete(this.path(serviceId));
    } catch (error) {
      if (httpStatusOf(error) !== 404) {
        throw error;
      }
    }
  }

  private path(serviceId: string): string {
    return `/tokens/${encodeURIComponent(serviceId)}`;
  }
}

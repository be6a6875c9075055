import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';

const USER_AGENT = 'HomeHub/1.0 (plugin-runtime)';

/**
 * Axios instance with the hub's user agent and status-prefixed error messages.
 */
export function createHttpClient(options: CreateAxiosDefaults = {}): AxiosInstance {
  const client = axios.create({
    timeout: 10000,
    ...options,
    headers: {
      'User-Agent': USER_AGENT,
      ...options.headers
    }
  });

  client.interceptors.response.use(
    response => response,
    (error: unknown) => {
      if (axios.isAxiosError(error) && error.response) {
        error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * True for failures worth retrying: network errors, timeouts and 5xx replies.
 */
export function isTransientHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  if (!error.response) {
    return true;
  }
  return error.response.status >= 500;
}

export function httpStatusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

export const httpClient = createHttpClient();

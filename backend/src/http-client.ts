import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';

export const HTTP_TIMEOUTS = {
  STANDARD: 30000,
  VERY_LONG: 300000, // file downloads
} as const;

/**
 * Axios instance with the project defaults; `config` overrides them.
 */
export function createHttpClient(config: CreateAxiosDefaults = {}): AxiosInstance {
  return axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    maxRedirects: 5,
    headers: { 'User-Agent': 'online-orders-etl/0.1' },
    ...config,
  });
}

import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_TIMEOUT } from './constants';
import { createLogger } from '../utils/logger';

const log = createLogger('http');

export function createHttpClient(): AxiosInstance {
  const client = axios.create({
    timeout: DEFAULT_TIMEOUT * 1000,
    headers: { 'User-Agent': 'travel-assistant/1.0' },
  });

  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        log.debug('upstream request failed', {
          url: error.config?.url,
          status: error.response?.status,
          message: error.message,
        });
      }
      return Promise.reject(error);
    }
  );

  return client;
}

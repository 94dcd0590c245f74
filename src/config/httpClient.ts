/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

export const HTTP_TIMEOUTS = {
  STANDARD: 30000,
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
});

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  const startTimes = new WeakMap<object, number>();

  client.interceptors.request.use((requestConfig) => {
    // Enforce a timeout on every request, even when a caller passes 0
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    startTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const startTime = startTimes.get(response.config);
      if (startTime !== undefined) {
        logger.debug(
          {
            url: response.config.url,
            method: response.config.method,
            status: response.status,
            duration: Date.now() - startTime,
          },
          'HTTP request completed'
        );
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error) && error.config) {
        const startTime = startTimes.get(error.config);
        logger.debug(
          {
            url: error.config.url,
            method: error.config.method,
            status: error.response?.status,
            code: error.code,
            duration: startTime !== undefined ? Date.now() - startTime : undefined,
          },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

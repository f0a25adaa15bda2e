import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import type {
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import { isCancel } from 'axios';

import { config } from '../../config/index.js';

import { NetworkError } from '../../errors/app-error.js';

import { logDebug, logError, logWarn } from '../logger.js';

interface RequestTiming {
  requestId: string;
  startTime: number;
}

const timings = new WeakMap<InternalAxiosRequestConfig, RequestTiming>();
const instrumentedClients = new WeakSet<AxiosInstance>();
const networkChannel = diagnosticsChannel.channel('hostswitch.network');

function calculateDuration(timing: RequestTiming | undefined): number {
  return timing ? Math.round(performance.now() - timing.startTime) : 0;
}

function publishEvent(event: Record<string, unknown>): void {
  if (!networkChannel.hasSubscribers) return;
  networkChannel.publish(event);
}

function logResponse(
  response: AxiosResponse,
  requestId: string | undefined,
  duration: number
): void {
  const url = response.config.url ?? 'unknown';

  logDebug('HTTP Response', {
    requestId,
    status: response.status,
    url,
    duration: `${duration}ms`,
  });

  if (duration > 5000) {
    logWarn('Slow HTTP request detected', {
      requestId,
      url,
      duration: `${duration}ms`,
    });
  }
}

function createCanceledError(url: string): NetworkError {
  logDebug('HTTP Request Aborted/Canceled', { url });
  return new NetworkError(url, 'ECANCELED', 'request was canceled');
}

function createTimeoutError(url: string): NetworkError {
  logError('HTTP Timeout', { url, timeout: config.network.timeout });
  return new NetworkError(
    url,
    'ETIMEDOUT',
    `timeout after ${config.network.timeout}ms`
  );
}

function createConnectionError(
  url: string,
  code: string | undefined
): NetworkError {
  logError('HTTP Network Error', { url, code });
  return new NetworkError(url, code, code);
}

export function handleRequest(
  requestConfig: InternalAxiosRequestConfig
): InternalAxiosRequestConfig {
  const timing: RequestTiming = {
    requestId: randomUUID().substring(0, 8),
    startTime: performance.now(),
  };
  timings.set(requestConfig, timing);

  const eventData = {
    requestId: timing.requestId,
    method: requestConfig.method?.toUpperCase(),
    url: requestConfig.url,
  };

  publishEvent({ type: 'start', ...eventData });
  logDebug('HTTP Request', eventData);

  return requestConfig;
}

export function handleRequestError(error: unknown): Promise<never> {
  logError(
    'HTTP Request Error',
    error instanceof Error ? error : { error: String(error) }
  );
  return Promise.reject(error);
}

export function handleResponse(response: AxiosResponse): AxiosResponse {
  const timing = timings.get(response.config);
  const duration = calculateDuration(timing);
  timings.delete(response.config);

  publishEvent({
    type: 'end',
    requestId: timing?.requestId,
    status: response.status,
    duration,
  });
  logResponse(response, timing?.requestId, duration);

  return response;
}

export function handleResponseError(error: AxiosError): Promise<never> {
  const url = error.config?.url ?? 'unknown';
  const timing = error.config ? timings.get(error.config) : undefined;

  publishEvent({
    type: 'error',
    requestId: timing?.requestId,
    url,
    error: error.message,
    code: error.code,
    duration: calculateDuration(timing),
  });

  if (
    isCancel(error) ||
    error.name === 'AbortError' ||
    error.name === 'CanceledError'
  ) {
    return Promise.reject(createCanceledError(url));
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return Promise.reject(createTimeoutError(url));
  }

  if (error.response) {
    return Promise.reject(error);
  }

  return Promise.reject(createConnectionError(url, error.code));
}

/**
 * Installs once per axios instance, so drivers may share a client.
 */
export function installInterceptors(client: AxiosInstance): void {
  if (instrumentedClients.has(client)) return;
  instrumentedClients.add(client);
  client.interceptors.request.use(handleRequest, handleRequestError);
  client.interceptors.response.use(handleResponse, handleResponseError);
}

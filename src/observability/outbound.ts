import type { AxiosInstance, InternalAxiosRequestConfig } from 'axios';

import { DEFAULT_HEADER_NAME } from '../config/logging';
import { ContextPropagationStore, contextStore } from './context-store';

/**
 * Headers carrying the bound correlation id to a downstream service; empty when
 * nothing is bound
 */
export const correlationHeaders = (
  headerName: string = DEFAULT_HEADER_NAME,
  store: ContextPropagationStore = contextStore
): Record<string, string> => {
  const correlationId = store.correlationId();
  return correlationId ? { [headerName]: correlationId } : {};
};

/**
 * Request interceptor body: sets the correlation header unless the caller
 * already chose one
 */
export const applyCorrelationHeader = (
  request: InternalAxiosRequestConfig,
  headerName: string = DEFAULT_HEADER_NAME,
  store: ContextPropagationStore = contextStore
): InternalAxiosRequestConfig => {
  const correlationId = store.correlationId();
  if (correlationId && !request.headers.has(headerName)) {
    request.headers.set(headerName, correlationId);
  }
  return request;
};

/**
 * Propagate the correlation id on every request made through `client`.
 * Returns the interceptor id for `client.interceptors.request.eject`.
 */
export const attachCorrelationInterceptor = (
  client: AxiosInstance,
  headerName: string = DEFAULT_HEADER_NAME,
  store: ContextPropagationStore = contextStore
): number =>
  client.interceptors.request.use((request) => applyCorrelationHeader(request, headerName, store));

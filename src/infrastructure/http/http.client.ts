import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import { ExternalServiceError, type ExternalServiceName } from '@core/errors/external-service.error.js';

export function createHttpClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    headers: { 'Content-Type': 'application/json' },
    timeout: timeoutMs,
    validateStatus: (s) => s < 500,
  });
}

export function isSuccess(res: AxiosResponse): boolean {
  return res.status >= 200 && res.status < 300;
}

/** Wraps transport failures (timeouts, refused connections, 5xx) into `ExternalServiceError`. */
export function toExternalError(
  service: ExternalServiceName,
  err: unknown,
  context: string,
): ExternalServiceError {
  if (err instanceof ExternalServiceError) return err;
  const detail = axios.isAxiosError(err)
    ? (err.code ?? err.message)
    : err instanceof Error
      ? err.message
      : String(err);
  return new ExternalServiceError(service, `${context}: ${detail}`);
}

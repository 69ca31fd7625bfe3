import axios, { AxiosInstance } from 'axios';

export type ServiceAuth =
  | { kind: 'basic'; username: string; password: string }
  | { kind: 'bearer'; token: string };

export interface HttpClientOptions {
  auth: ServiceAuth;
  timeoutMs: number;
}

/**
 * Axios instance shared by the upload, submit and poll calls. Every status is
 * resolved rather than thrown; callers classify responses themselves, so only
 * transport failures and aborts reject.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const { auth, timeoutMs } = options;

  return axios.create({
    timeout: timeoutMs,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
    validateStatus: () => true,
    headers: {
      Accept: 'application/json',
      ...(auth.kind === 'bearer' && { Authorization: `Bearer ${auth.token}` }),
    },
    ...(auth.kind === 'basic' && {
      auth: { username: auth.username, password: auth.password },
    }),
  });
}

export function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export function joinUrl(base: string, pathname: string): string {
  return `${base.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`;
}

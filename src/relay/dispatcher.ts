import { DispatchRejectedError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { DispatchRequest } from './model-output.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Appends `endpoint` to the path of `url`, so `http://host/api` + `/students`
 * is `http://host/api/students`. An absolute endpoint replaces `url`.
 */
export function joinTarget(url: string, endpoint: string): URL {
  if (ABSOLUTE_URL.test(endpoint)) {
    return new URL(endpoint);
  }
  const base = new URL(url);
  const basePath = base.pathname.replace(/\/+$/, '');
  return new URL(`${basePath}/${endpoint.replace(/^\/+/, '')}`, base.origin);
}

export interface DispatchResult {
  url: string;
  status: number;
}

/**
 * Sends the request described by the model's reply. Only hosts on the allow
 * list are ever contacted, since the target comes from model output.
 */
export class HttpDispatcher {
  private readonly allowedHosts: Set<string>;

  constructor(
    allowedHosts: readonly string[],
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.allowedHosts = new Set(allowedHosts.map((host) => host.toLowerCase()));
  }

  resolveTarget(request: DispatchRequest): URL {
    const target = joinTarget(request.url, request.endpoint);
    if (!this.allowedHosts.has(target.hostname.toLowerCase())) {
      throw new DispatchRejectedError(target.origin, 'host is not in the allow list');
    }
    if (request.method === 'GET' || request.method === 'DELETE') {
      for (const [key, value] of Object.entries(request.params)) {
        target.searchParams.set(key, typeof value === 'string' ? value : JSON.stringify(value));
      }
    }
    return target;
  }

  async dispatch(request: DispatchRequest, signal?: AbortSignal): Promise<DispatchResult> {
    const target = this.resolveTarget(request);
    const hasBody = request.method !== 'GET' && request.method !== 'DELETE';

    this.logger.info('Dispatching model request', { method: request.method, url: target.href });
    const response = await this.fetchImpl(target.href, {
      method: request.method,
      headers: hasBody
        ? { 'Content-Type': 'application/json', ...request.headers }
        : request.headers,
      body: hasBody ? JSON.stringify(request.params) : undefined,
      signal,
    });

    return { url: target.href, status: response.status };
  }
}

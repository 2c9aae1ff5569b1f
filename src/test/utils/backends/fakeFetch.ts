import { Response, type RequestInit } from 'node-fetch';
import type { FetchLike } from '../../../main/services/ServiceProxy';

export interface RecordedCall {
  url: string;
  init: RequestInit;
}

export type FetchStep = (call: RecordedCall) => Promise<Response>;

/**
 * Fetch stand-in answering the n-th call with the n-th step; the last step
 * answers every call after it.
 */
export const createFakeFetch = (...steps: FetchStep[]): { fetch: FetchLike; calls: RecordedCall[] } => {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    const call = { url, init };
    calls.push(call);
    const step = steps[Math.min(calls.length, steps.length) - 1];
    return step(call);
  };
  return { fetch, calls };
};

export const respondJson =
  (status: number, body: unknown): FetchStep =>
  async () =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

export const respondText =
  (status: number, text: string): FetchStep =>
  async () =>
    new Response(text, { status });

/** Never answers; rejects once the request signal aborts, as a real fetch does. */
export const hangUntilAborted = (): FetchStep => call =>
  new Promise<Response>((_resolve, reject) => {
    const abort = () => reject(Object.assign(new Error('The operation was aborted.'), { name: 'AbortError' }));
    if (call.init.signal?.aborted) {
      abort();
      return;
    }
    call.init.signal?.addEventListener('abort', abort);
  });

export const refuseConnection = (): FetchStep => async () => {
  throw Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' });
};

export const delayed =
  (ms: number, step: FetchStep): FetchStep =>
  call =>
    new Promise<Response>((resolve, reject) => {
      setTimeout(() => step(call).then(resolve, reject), ms);
    });

/**
 * Fetch stand-in answering by URL, ignoring the query string. Keys are
 * absolute URLs such as 'http://projects.test/health'.
 */
export const createRoutedFetch = (
  routes: Record<string, FetchStep>,
  fallback: FetchStep = respondJson(404, { detail: 'Not Found' })
): { fetch: FetchLike; calls: RecordedCall[] } => {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    const call = { url, init };
    calls.push(call);
    const { origin, pathname } = new URL(url);
    return (routes[`${origin}${pathname}`] ?? fallback)(call);
  };
  return { fetch, calls };
};

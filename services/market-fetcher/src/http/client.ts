import { request, type Dispatcher } from 'undici';
import { SchemaError, TransportError } from '../utils/errors.js';
import { BinanceErrorBody } from '../utils/validators.js';

export type GetJsonOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
};

export type JsonResponse = {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
};

export function headerValue(headers: JsonResponse['headers'], name: string): string | undefined {
  const v = headers[name.toLowerCase()];
  return Array.isArray(v) ? v[0] : v;
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * GET `url` and decode the JSON body. Non-2xx answers become `TransportError`
 * with the Binance `{code,msg}` attached when the body has one. The request is
 * aborted after `timeoutMs`, or as soon as `signal` fires.
 */
export async function getJson(url: string, opts: GetJsonOptions): Promise<JsonResponse> {
  if (opts.signal?.aborted) {
    throw new TransportError('request aborted', 'ABORTED', { details: { url }, cause: opts.signal.reason });
  }

  const ac = new AbortController();
  let timedOut = false;
  const to = setTimeout(() => {
    timedOut = true;
    ac.abort();
  }, opts.timeoutMs);
  const onAbort = () => ac.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const { statusCode, headers, body } = await request(url, {
      method: 'GET',
      signal: ac.signal,
      dispatcher: opts.dispatcher,
    });
    const text = await body.text();
    const json = parseJson(text);

    if (statusCode < 200 || statusCode >= 300) {
      const apiErr = BinanceErrorBody.safeParse(json);
      throw new TransportError(`HTTP ${statusCode}`, 'HTTP_ERROR', {
        status: statusCode,
        details: apiErr.success ? { url, binanceCode: apiErr.data.code, msg: apiErr.data.msg } : { url },
      });
    }
    if (json === undefined) throw new SchemaError('response is not JSON', { url });

    return { status: statusCode, headers, body: json };
  } catch (err) {
    if (err instanceof TransportError || err instanceof SchemaError) throw err;
    if (opts.signal?.aborted) {
      throw new TransportError('request aborted', 'ABORTED', { details: { url }, cause: err });
    }
    if (timedOut) {
      throw new TransportError(`request timed out after ${opts.timeoutMs}ms`, 'TIMEOUT', { details: { url }, cause: err });
    }
    throw new TransportError('network error', 'NETWORK_ERROR', { details: { url }, cause: err });
  } finally {
    clearTimeout(to);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

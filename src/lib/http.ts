import { HttpError, NetworkError, SchemaError, TimeoutError } from './errors';

type HttpMethod = 'GET' | 'POST' | 'PUT';

export type HttpOptions = {
  method?: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** JSON body; mutually exclusive with `form` */
  json?: unknown;
  form?: FormData;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type HttpResponse = {
  status: number;
  text: string;
};

function withTimeout(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal: AbortSignal | undefined; cleanup: () => void } {
  if (timeoutMs === undefined) return { signal, cleanup: () => undefined };

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs, 'request')), timeoutMs);

  if (signal) {
    if (signal.aborted) controller.abort(signal.reason);
    else signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }

  return { signal: controller.signal, cleanup: () => clearTimeout(timeout) };
}

/**
 * Issue one request. Non-2xx answers throw HttpError, transport failures throw
 * NetworkError, and an aborted signal rethrows the abort reason.
 */
export async function request(options: HttpOptions): Promise<HttpResponse> {
  const method = options.method ?? 'POST';
  const { signal, cleanup } = withTimeout(options.signal, options.timeoutMs);

  let body: string | FormData | undefined;
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (options.json !== undefined) {
    body = JSON.stringify(options.json);
    headers['Content-Type'] = 'application/json';
  } else if (options.form) {
    // fetch sets the multipart boundary itself
    body = options.form;
  }

  try {
    let res: Response;
    let text: string;
    try {
      res = await fetch(options.url, {
        method,
        headers: { ...headers, ...options.headers },
        body,
        signal,
      });
      text = await res.text();
    } catch (error) {
      if (signal?.aborted) throw signal.reason ?? error;
      throw new NetworkError(options.url, { cause: error });
    }

    if (!res.ok) {
      throw new HttpError({
        status: res.status,
        url: options.url,
        message: `HTTP ${res.status} ${res.statusText}`.trim(),
        responseText: text,
      });
    }

    return { status: res.status, text };
  } finally {
    cleanup();
  }
}

export function parseJsonBody(text: string, url: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SchemaError(`response from ${url} is not valid JSON: ${text.slice(0, 120)}`, { cause: error });
  }
}

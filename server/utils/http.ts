export interface FetchWithTimeoutOptions {
  timeoutMs: number;
  userAgent: string;
  method?: 'GET' | 'HEAD';
  accept?: string;
  signal?: AbortSignal;
}

export interface TextResponse {
  ok: boolean;
  status: number;
  statusText: string;
  /** Final URL after redirects, or the requested one when unknown. */
  url: string;
  body: string;
}

/**
 * Runs `task` under one abort signal that fires after `timeoutMs` or when the
 * caller's signal aborts, whichever comes first.
 */
const withTimeout = async <T>(
  options: Pick<FetchWithTimeoutOptions, 'timeoutMs' | 'signal'>,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  let abortListener: (() => void) | null = null;

  if (options.signal) {
    if (options.signal.aborted) {
      clearTimeout(timer);
      throw new Error('Aborted');
    }
    abortListener = () => controller.abort();
    options.signal.addEventListener('abort', abortListener, { once: true });
  }

  try {
    return await task(controller.signal);
  } finally {
    clearTimeout(timer);
    if (abortListener && options.signal) {
      options.signal.removeEventListener('abort', abortListener);
    }
  }
};

const request = (url: string, options: FetchWithTimeoutOptions, signal: AbortSignal): Promise<Response> =>
  fetch(url, {
    method: options.method ?? 'GET',
    headers: {
      'User-Agent': options.userAgent,
      Accept: options.accept ?? 'text/html,application/xhtml+xml',
      'Accept-Language': 'en-US,en;q=0.9',
    },
    redirect: 'follow',
    signal,
  });

/** Headers only: the timeout stops covering the request once the response starts. */
export const fetchWithTimeout = (url: string, options: FetchWithTimeoutOptions): Promise<Response> =>
  withTimeout(options, (signal) => request(url, options, signal));

/** Request plus body read, both inside the same timeout. */
export const fetchText = (url: string, options: FetchWithTimeoutOptions): Promise<TextResponse> =>
  withTimeout(options, async (signal) => {
    const response = await request(url, options, signal);
    const body = await response.text();
    return {
      ok: response.ok,
      status: response.status,
      statusText: response.statusText,
      url: response.url || url,
      body,
    };
  });

/** GET a page and return its body, throwing on a non-2xx status. */
export const fetchHtml = async (url: string, options: FetchWithTimeoutOptions): Promise<{ html: string; finalUrl: string }> => {
  const response = await fetchText(url, options);
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }
  return { html: response.body, finalUrl: response.url };
};

import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
  /** Delay before answering; a request timeout shorter than this fails. */
  delayMs?: number;
}

export type StubHandler = (url: URL, config: InternalAxiosRequestConfig) => StubReply | Error | Promise<StubReply | Error>;

export interface StubSession {
  session: AxiosInstance;
  /** Every requested URL, query string included, in request order. */
  calls: string[];
}

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/** Full URL of a request, the way axios would send it. */
function requestUrl(config: InternalAxiosRequestConfig): URL {
  const url = new URL(config.url ?? '', config.baseURL);
  const params: unknown = config.params;
  if (typeof params === 'object' && params !== null) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) url.searchParams.set(key, String(value));
    }
  }
  return url;
}

/**
 * An axios instance whose adapter answers in-process. Status handling
 * follows `validateStatus`, and `timeout` is honoured against `delayMs`.
 */
export function createStubSession(handler: StubHandler): StubSession {
  const calls: string[] = [];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = requestUrl(config);
    calls.push(url.toString());

    const reply = await handler(url, config);
    if (reply instanceof Error) {
      throw new AxiosError(reply.message, AxiosError.ERR_NETWORK, config);
    }

    const delayMs = reply.delayMs ?? 0;
    if (delayMs > 0) {
      if (config.timeout && config.timeout < delayMs) {
        await sleep(config.timeout);
        throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, AxiosError.ECONNABORTED, config);
      }
      await sleep(delayMs);
    }

    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status ?? 200,
      statusText: String(reply.status ?? 200),
      headers: reply.headers ?? {},
      config,
    };

    const validate = config.validateStatus;
    if (validate && !validate(response.status)) {
      throw new AxiosError(`Request failed with status code ${response.status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };

  return { session: axios.create({ adapter }), calls };
}

/** Answers by exact URL (query string included), else by path prefix; unknown URLs get a 404. */
export function routeTable(routes: Record<string, StubReply | Error | ((url: URL) => StubReply | Error)>): StubHandler {
  return url => {
    const full = url.toString();
    const exact = routes[full];
    const match =
      exact ?? Object.entries(routes).find(([prefix]) => full.startsWith(prefix))?.[1];
    if (!match) return { status: 404, data: 'not found' };
    return typeof match === 'function' ? match(url) : match;
  };
}

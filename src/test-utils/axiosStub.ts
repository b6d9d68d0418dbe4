import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface StubReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

/**
 * In-process axios adapter. Non-2xx replies reject with an AxiosError the same
 * way axios' own http adapter does.
 */
export function stubAdapter(handler: StubHandler): AxiosAdapter {
  return async (config) => {
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status,
      statusText: String(reply.status),
      headers: new AxiosHeaders(reply.headers),
      config,
    };
    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }
    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      null,
      response,
    );
  };
}

// 요청 URL 별로 응답을 정하는 스텁
export function routeAdapter(routes: Record<string, StubReply>, seen: string[] = []): AxiosAdapter {
  return stubAdapter((config) => {
    const url = config.url ?? '';
    seen.push(url);
    return routes[url] ?? { status: 404 };
  });
}

export function failingAdapter(code: string, message: string): AxiosAdapter {
  return async (config) => {
    throw new AxiosError(message, code, config);
  };
}

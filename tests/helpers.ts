import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface FakeResponse {
  status?: number;
  body?: string;
  contentType?: string;
}

export type Responder = (url: string) => FakeResponse | Error;

/** Axios instance whose adapter answers in-process instead of opening sockets. */
export function fakeAxios(responder: Responder, calls: string[] = []): AxiosInstance {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const url = config.url ?? '';
      calls.push(url);
      const answer = responder(url);
      if (answer instanceof Error) {
        throw answer;
      }
      return {
        data: answer.body ?? '',
        status: answer.status ?? 200,
        statusText: 'OK',
        headers: { 'content-type': answer.contentType ?? 'text/html; charset=utf-8' },
        config,
        request: {}
      };
    }
  });
}

export function fakeClock(start = 1000) {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    advance: (ms: number) => {
      current += ms;
    },
    sleeps
  };
}

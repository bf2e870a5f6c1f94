import axios, { AxiosInstance, isAxiosError } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'macd-volume-trader/1.0', Accept: 'application/json' },
  });

/** 4xx other than 429 will not get better by asking again. */
export const isRetryableHttpError = (error: unknown): boolean => {
  if (!isAxiosError(error)) {
    return true;
  }
  const status = error.response?.status;
  if (status === undefined) {
    return true;
  }
  return status === 429 || status >= 500;
};

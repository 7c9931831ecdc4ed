import axios, { AxiosInstance } from 'axios';

type HttpClientOptions = {
  baseURL?: string;
  timeoutMs: number;
};

export const createHttpClient = ({ baseURL, timeoutMs }: HttpClientOptions): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: {
      Accept: 'application/json',
    },
    validateStatus: () => true,
  });

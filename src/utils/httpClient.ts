import axios, { AxiosInstance } from 'axios';

export const DEFAULT_USER_AGENT = 'restaurant-lead-finder/1.0';

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export const createHttpClient = ({ timeoutMs = 20000, userAgent = DEFAULT_USER_AGENT }: HttpClientOptions = {}): AxiosInstance =>
  axios.create({
    timeout: timeoutMs,
    headers: { 'accept-language': 'en-US,en;q=0.9', 'user-agent': userAgent },
  });

export const describeHttpError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return `timeout (${error.message})`;
    if (error.response) return `HTTP ${error.response.status}`;
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { NearbySearchParams, PlacesTransport } from '../google_places';

export type ScriptedReply = unknown | Error;

export class ScriptedTransport implements PlacesTransport {
  readonly calls: NearbySearchParams[] = [];
  private cursor = 0;

  constructor(private readonly replies: ScriptedReply[]) {}

  async nearbySearch(params: NearbySearchParams): Promise<unknown> {
    this.calls.push({ ...params });
    const reply = this.replies[this.cursor];
    this.cursor += 1;
    if (reply instanceof Error) throw reply;
    if (reply === undefined) throw new Error(`no scripted reply for call ${this.cursor}`);
    return reply;
  }
}

export const place = (id: string, extra: Record<string, unknown> = {}): Record<string, unknown> => ({
  place_id: id,
  name: `Place ${id}`,
  vicinity: `${id} Castro St, Mountain View`,
  rating: 4.2,
  user_ratings_total: 80,
  ...extra,
});

export const okPage = (results: unknown[], nextPageToken?: string): Record<string, unknown> => ({
  status: 'OK',
  results,
  ...(nextPageToken ? { next_page_token: nextPageToken } : {}),
});

export const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, sleep };
};

/** An axios instance whose requests are answered in process. */
export const stubAxios = (respond: (config: InternalAxiosRequestConfig) => unknown): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } => {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push(config);
      const data = respond(config);
      if (data instanceof Error) throw data;
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { client, requests };
};

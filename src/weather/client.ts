import fetch from 'node-fetch';
import { z } from 'zod';
import { WeatherApiError } from '../errors';
import { logger } from '../observability/logger';

export type FetchResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
};

export type FetchLike = (url: string) => Promise<FetchResponse>;

const forecastSchema = z.object({
  current: z.object({
    temperature_2m: z.number()
  })
});

export class WeatherClient {
  constructor(
    private baseUrl: string,
    private fetchImpl: FetchLike = fetch
  ) {}

  forecastUrl(latitude: number, longitude: number): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('latitude', String(latitude));
    url.searchParams.set('longitude', String(longitude));
    url.searchParams.set('current', 'temperature_2m');
    return url.toString();
  }

  /** Current air temperature at 2m, passed through exactly as the endpoint reports it. */
  async currentTemperature(latitude: number, longitude: number): Promise<number> {
    const url = this.forecastUrl(latitude, longitude);
    logger.debug('weather request', url);
    const res = await this.fetchImpl(url);
    if (!res.ok) throw new WeatherApiError(res.status, res.statusText);
    const body = forecastSchema.parse(await res.json());
    return body.current.temperature_2m;
  }
}

import { z } from "zod";
import { UpstreamError, type HttpClient } from "../http/client.js";

export const GEOCODE_URL = "https://geocoding-api.open-meteo.com/v1/search";
export const FORECAST_URL = "https://api.open-meteo.com/v1/forecast";
// Commercial hosts, used when an API key is configured
export const CUSTOMER_GEOCODE_URL = "https://customer-geocoding-api.open-meteo.com/v1/search";
export const CUSTOMER_FORECAST_URL = "https://customer-api.open-meteo.com/v1/forecast";

export const GeocodeResultSchema = z
  .object({
    name: z.string().nullish(),
    latitude: z.number().nullish(),
    longitude: z.number().nullish(),
    country: z.string().nullish(),
    admin1: z.string().nullish(),
  })
  .passthrough();

const GeocodeResponseSchema = z
  .object({
    results: z.array(GeocodeResultSchema).nullish(),
  })
  .passthrough();

export const CurrentWeatherSchema = z
  .object({
    weathercode: z.number().nullish(),
  })
  .passthrough();

export const ForecastResponseSchema = z
  .object({
    current_weather: CurrentWeatherSchema.nullish(),
    hourly: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type GeocodeResult = z.infer<typeof GeocodeResultSchema>;
export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type ForecastResponse = z.infer<typeof ForecastResponseSchema>;

export interface ForecastParams {
  latitude: number;
  longitude: number;
  hourly: string[];
}

export interface OpenMeteoOptions {
  client: HttpClient;
  apiKey?: string;
  geocodeUrl?: string;
  forecastUrl?: string;
}

export class OpenMeteoApi {
  private readonly client: HttpClient;
  private readonly apiKey?: string;
  readonly geocodeUrl: string;
  readonly forecastUrl: string;

  constructor(opts: OpenMeteoOptions) {
    this.client = opts.client;
    this.apiKey = opts.apiKey;
    this.geocodeUrl = opts.geocodeUrl ?? (opts.apiKey ? CUSTOMER_GEOCODE_URL : GEOCODE_URL);
    this.forecastUrl = opts.forecastUrl ?? (opts.apiKey ? CUSTOMER_FORECAST_URL : FORECAST_URL);
  }

  async geocode(name: string, count: number): Promise<GeocodeResult[]> {
    const url = this.buildUrl(this.geocodeUrl, {
      name,
      count: String(count),
      language: "en",
      format: "json",
    });
    const data = parseUpstream(GeocodeResponseSchema, await this.client.getJson(url), "geocoding");
    return data.results ?? [];
  }

  async forecast(params: ForecastParams): Promise<ForecastResponse> {
    const query: Record<string, string> = {
      latitude: String(params.latitude),
      longitude: String(params.longitude),
      current_weather: "true",
    };
    if (params.hourly.length > 0) {
      query.hourly = params.hourly.join(",");
    }
    query.timezone = "auto";
    query.forecast_days = "1";
    const url = this.buildUrl(this.forecastUrl, query);
    return parseUpstream(ForecastResponseSchema, await this.client.getJson(url), "forecast");
  }

  private buildUrl(base: string, params: Record<string, string>): URL {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    if (this.apiKey) {
      url.searchParams.set("apikey", this.apiKey);
    }
    return url;
  }
}

function parseUpstream<S extends z.ZodTypeAny>(schema: S, payload: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new UpstreamError("malformed", `Unexpected ${what} response: ${issues}`);
  }
  return parsed.data;
}

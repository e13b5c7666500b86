import { CachedLoader } from "../cache/loader.js";
import type { Logger } from "../util/logger.js";
import { describeWeatherCode } from "./codes.js";
import { ApiError } from "./errors.js";
import type { CurrentWeather, ForecastResponse, GeocodeResult, OpenMeteoApi } from "./open_meteo.js";

export const DEFAULT_HOURLY_VARS = "temperature_2m,relativehumidity_2m,windspeed_10m";

export interface PlaceSuggestion {
  name: string | null;
  country: string | null;
  admin1: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface Location {
  name: string;
  latitude: number;
  longitude: number;
  country: string | null;
  admin1: string | null;
}

export interface WeatherReport {
  location: Location;
  current: CurrentWeather;
  hourly: Record<string, unknown>;
  weather_desc: string;
  weather_icon: string;
}

export interface WeatherQuery {
  city?: string;
  lat?: number;
  lon?: number;
  // Comma separated hourly variables; undefined means the configured default
  hourlyVars?: string;
}

export interface WeatherServiceOptions {
  api: OpenMeteoApi;
  logger: Logger;
  coalesce?: boolean;
  now?: () => number;
  defaultHourlyVars?: string;
}

export class WeatherService {
  private readonly api: OpenMeteoApi;
  private readonly logger: Logger;
  private readonly defaultHourlyVars: string;
  private readonly suggestions: CachedLoader<PlaceSuggestion[]>;
  private readonly places: CachedLoader<GeocodeResult>;
  private readonly forecasts: CachedLoader<ForecastResponse>;

  constructor(opts: WeatherServiceOptions) {
    this.api = opts.api;
    this.logger = opts.logger;
    this.defaultHourlyVars = opts.defaultHourlyVars ?? DEFAULT_HOURLY_VARS;
    const shared = { logger: opts.logger, coalesce: opts.coalesce, now: opts.now };
    this.suggestions = new CachedLoader<PlaceSuggestion[]>({ name: "autocomplete", ...shared });
    this.places = new CachedLoader<GeocodeResult>({ name: "geocode", ...shared });
    this.forecasts = new CachedLoader<ForecastResponse>({ name: "forecast", ...shared });
  }

  async autocomplete(query: string, limit: number): Promise<PlaceSuggestion[]> {
    const key = `autocomplete:${query.toLowerCase()}:${limit}`;
    const suggestions = await this.suggestions.load(key, async () => {
      const results = await this.api.geocode(query, limit);
      return results.map(toSuggestion);
    });
    // Cache entries are never handed out; callers get their own copy
    return suggestions.map((s) => ({ ...s }));
  }

  async getWeather(query: WeatherQuery): Promise<WeatherReport> {
    const { city, lat, lon } = query;
    if (!city && (lat === undefined || lon === undefined)) {
      throw new ApiError(400, "Provide either city or lat and lon");
    }

    const location = lat !== undefined && lon !== undefined ? coordinateLocation(lat, lon, city) : await this.locateCity(city ?? "");

    const hourly = parseHourlyVars(query.hourlyVars ?? this.defaultHourlyVars);
    const key = `forecast:${location.latitude.toFixed(4)},${location.longitude.toFixed(4)}:${hourly.join(",")}`;
    const forecast = await this.forecasts.load(key, async () => {
      const result = await this.api.forecast({ latitude: location.latitude, longitude: location.longitude, hourly });
      // Never cache a forecast the caller cannot use
      if (!result.current_weather) {
        throw new ApiError(502, "No current weather returned by upstream API");
      }
      return result;
    });

    const current = forecast.current_weather;
    if (!current) {
      throw new ApiError(502, "No current weather returned by upstream API");
    }
    const { desc, icon } = describeWeatherCode(current.weathercode);

    return {
      location,
      current: structuredClone(current),
      hourly: structuredClone(forecast.hourly ?? {}),
      weather_desc: desc,
      weather_icon: icon,
    };
  }

  /** Sweeps expired entries from every cache; returns the number removed. */
  prune(): number {
    const removed = this.suggestions.prune() + this.places.prune() + this.forecasts.prune();
    if (removed > 0) {
      this.logger.debug(`Pruned ${removed} expired cache entries`);
    }
    return removed;
  }

  private async locateCity(city: string): Promise<Location> {
    const top = await this.places.load(`geocode:${city.toLowerCase()}`, async () => {
      const results = await this.api.geocode(city, 1);
      const first = results[0];
      if (!first) {
        throw new ApiError(404, `City '${city}' not found`);
      }
      return first;
    });

    if (top.latitude === null || top.latitude === undefined || top.longitude === null || top.longitude === undefined) {
      throw new ApiError(502, "Upstream geocoding did not return coordinates");
    }
    return {
      name: top.name || city,
      latitude: top.latitude,
      longitude: top.longitude,
      country: top.country ?? null,
      admin1: top.admin1 ?? null,
    };
  }
}

export function parseHourlyVars(raw: string): string[] {
  return raw
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function coordinateLocation(lat: number, lon: number, city?: string): Location {
  return {
    name: city || `${lat.toFixed(3)},${lon.toFixed(3)}`,
    latitude: lat,
    longitude: lon,
    country: null,
    admin1: null,
  };
}

function toSuggestion(r: GeocodeResult): PlaceSuggestion {
  return {
    name: r.name ?? null,
    country: r.country ?? null,
    admin1: r.admin1 ?? null,
    latitude: r.latitude ?? null,
    longitude: r.longitude ?? null,
  };
}

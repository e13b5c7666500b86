import type { Profile } from "./config.js";
import { HttpClient, type FetchFn } from "./http/client.js";
import type { Logger } from "./util/logger.js";
import { OpenMeteoApi } from "./weather/open_meteo.js";
import { WeatherService } from "./weather/service.js";

export interface AppContext {
  weather: WeatherService;
  logger: Logger;
  version: string;
}

export interface AppContextOptions {
  version: string;
  // Test seams; production uses global fetch and Date.now
  fetch?: FetchFn;
  now?: () => number;
  retryDelayMs?: number;
}

export function createAppContext(config: Profile, logger: Logger, opts: AppContextOptions): AppContext {
  const client = new HttpClient({
    timeoutMs: config.timeout_ms,
    logger,
    userAgent: config.user_agent,
    fetch: opts.fetch,
    retryDelayMs: opts.retryDelayMs,
  });
  const api = new OpenMeteoApi({
    client,
    apiKey: config.api_key,
    geocodeUrl: config.geocode_url,
    forecastUrl: config.forecast_url,
  });
  const weather = new WeatherService({
    api,
    logger,
    coalesce: config.coalesce_requests,
    now: opts.now,
    defaultHourlyVars: config.default_hourly_vars,
  });
  return { weather, logger, version: opts.version };
}

import { z } from "zod";
import type { RegisterFn } from "../types.js";

export const registerGetWeather: RegisterFn = (server, ctx) => {
  const schema = z.object({
    city: z.string().optional().describe("City name (use city or latitude/longitude)"),
    latitude: z.number().min(-90).max(90).optional().describe("Latitude; skips geocoding when given with longitude"),
    longitude: z.number().min(-180).max(180).optional().describe("Longitude; skips geocoding when given with latitude"),
    hourly_vars: z.string().optional().describe("Comma separated Open-Meteo hourly variables, e.g. 'temperature_2m,windspeed_10m'"),
  });

  server.registerTool(
    "weather_get",
    {
      title: "Current Weather",
      description: "Current conditions and today's hourly forecast for a city or coordinate pair.",
      inputSchema: schema.shape,
    },
    async ({ city, latitude, longitude, hourly_vars }) => {
      try {
        const report = await ctx.weather.getWeather({ city, lat: latitude, lon: longitude, hourlyVars: hourly_vars });
        return { content: [{ type: "text", text: JSON.stringify(report, null, 2) }] };
      } catch (e: unknown) {
        const msg = e instanceof Error ? e.message : String(e);
        ctx.logger.debug(`weather_get failed: ${msg}`);
        return { content: [{ type: "text", text: `Weather lookup failed: ${msg}` }], isError: true };
      }
    }
  );
};

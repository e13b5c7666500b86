import { z } from "zod";
import type { RegisterFn } from "../types.js";

export const registerAutocomplete: RegisterFn = (server, ctx) => {
  const schema = z.object({
    query: z.string().min(1).describe("Partial city name"),
    limit: z.number().int().min(1).max(100).optional().describe("Maximum number of suggestions (default: 6, max: 100)"),
  });

  server.registerTool(
    "weather_autocomplete",
    {
      title: "Place Autocomplete",
      description: "Suggest places matching a partial city name, with their coordinates.",
      inputSchema: schema.shape,
    },
    async ({ query, limit = 6 }) => {
      try {
        const suggestions = await ctx.weather.autocomplete(query, limit);
        return { content: [{ type: "text", text: JSON.stringify(suggestions, null, 2) }] };
      } catch (e: unknown) {
        const msg = e instanceof Error ? e.message : String(e);
        ctx.logger.debug(`weather_autocomplete failed: ${msg}`);
        return { content: [{ type: "text", text: `Autocomplete failed: ${msg}` }], isError: true };
      }
    }
  );
};

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolContext } from "./types.js";
import { registerAutocomplete } from "./builtin/autocomplete.js";
import { registerGetWeather } from "./builtin/get_weather.js";

export const SERVER_NAME = "weather-lookup";

export function registerAllTools(server: McpServer, ctx: ToolContext) {
  registerAutocomplete(server, ctx);
  registerGetWeather(server, ctx);
}

export function createWeatherMcpServer(ctx: ToolContext, version: string): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version,
    },
    {
      capabilities: {
        tools: { listChanged: false },
      },
    }
  );
  registerAllTools(server, ctx);
  return server;
}

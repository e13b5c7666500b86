import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "../util/logger.js";
import type { WeatherService } from "../weather/service.js";

export interface ToolContext {
  weather: WeatherService;
  logger: Logger;
}

export type RegisterFn = (server: McpServer, ctx: ToolContext) => void;

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { z } from "zod";
import type { AppContext } from "../context.js";
import { HttpError, UpstreamError } from "../http/client.js";
import { createWeatherMcpServer } from "../tools/registry.js";
import { ApiError } from "../weather/errors.js";

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// An empty query value counts as absent; a blank or non-numeric one is rejected rather than read as 0.
const optionalNumber = (min: number, max: number) =>
  z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.string().trim().regex(NUMERIC, "Expected a number").pipe(z.coerce.number().min(min).max(max)).optional()
  );

const AutocompleteQuerySchema = z.object({
  query: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(100).optional().default(6),
});

const WeatherQuerySchema = z.object({
  city: z.string().optional(),
  lat: optionalNumber(-90, 90),
  lon: optionalNumber(-180, 180),
  hourly_vars: z.string().optional(),
});

export function createRequestHandler(ctx: AppContext) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");
    res.on("finish", () => {
      ctx.logger.debug(`${req.method ?? "GET"} ${url.pathname} -> ${res.statusCode}`);
    });

    try {
      if (url.pathname === "/health") {
        if (req.method !== "GET") {
          sendJson(res, 405, { detail: "Method not allowed" });
          return;
        }
        sendJson(res, 200, { status: "ok" });
        return;
      }

      if (url.pathname === "/mcp") {
        await handleMcp(ctx, req, res);
        return;
      }

      if (url.pathname === "/api/autocomplete" || url.pathname === "/api/weather") {
        if (req.method !== "GET") {
          sendJson(res, 405, { detail: "Method not allowed" });
          return;
        }
        const params = Object.fromEntries(url.searchParams);

        if (url.pathname === "/api/autocomplete") {
          const parsed = AutocompleteQuerySchema.safeParse(params);
          if (!parsed.success) {
            sendJson(res, 422, { detail: describeIssues(parsed.error) });
            return;
          }
          sendJson(res, 200, await ctx.weather.autocomplete(parsed.data.query, parsed.data.limit));
          return;
        }

        const parsed = WeatherQuerySchema.safeParse(params);
        if (!parsed.success) {
          sendJson(res, 422, { detail: describeIssues(parsed.error) });
          return;
        }
        const { city, lat, lon, hourly_vars } = parsed.data;
        sendJson(res, 200, await ctx.weather.getWeather({ city, lat, lon, hourlyVars: hourly_vars }));
        return;
      }

      sendJson(res, 404, { error: "Not found" });
    } catch (e: unknown) {
      const { status, detail } = toErrorResponse(e);
      if (status === 500) {
        ctx.logger.error(`Request handling error for ${req.method ?? "GET"} ${url.pathname}: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
      }
      sendJson(res, status, { detail });
    }
  };
}

export function createHttpServer(ctx: AppContext): Server {
  const handle = createRequestHandler(ctx);
  return createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      ctx.logger.error(`Unhandled request error: ${String(err)}`);
      sendJson(res, 500, { detail: "Internal server error" });
    });
  });
}

/** Resolves once the server is listening; a bind failure such as EADDRINUSE rejects. */
export function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

// Stateless Streamable HTTP: each request gets its own MCP server and transport.
async function handleMcp(ctx: AppContext, req: IncomingMessage, res: ServerResponse): Promise<void> {
  if (req.method !== "POST") {
    sendJson(res, 405, { jsonrpc: "2.0", error: { code: -32000, message: "Method not allowed." }, id: null });
    return;
  }

  const body = await readBody(req);
  let parsedBody: unknown;
  try {
    parsedBody = body ? JSON.parse(body) : undefined;
  } catch {
    sendJson(res, 400, { jsonrpc: "2.0", error: { code: -32700, message: "Parse error" }, id: null });
    return;
  }

  const server = createWeatherMcpServer(ctx, ctx.version);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true,
  });
  res.on("close", () => {
    server.close().catch((err: unknown) => ctx.logger.error(`Failed to close MCP server: ${String(err)}`));
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, parsedBody);
}

export function toErrorResponse(e: unknown): { status: number; detail: string } {
  if (e instanceof ApiError) {
    return { status: e.status, detail: e.detail };
  }
  if (e instanceof HttpError) {
    return { status: 502, detail: `Upstream request failed: ${e.message}` };
  }
  if (e instanceof UpstreamError) {
    switch (e.reason) {
      case "timeout":
        return { status: 504, detail: "Upstream request timed out" };
      case "network":
        return { status: 502, detail: "Upstream service unreachable" };
      case "malformed":
        return { status: 502, detail: "Malformed upstream response" };
    }
  }
  return { status: 500, detail: "Internal server error" };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: unknown) {
  if (res.headersSent) {
    res.end();
    return;
  }
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

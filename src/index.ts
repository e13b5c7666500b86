#!/usr/bin/env node

// Check Node.js version before anything else
const nodeVersion = process.versions.node;
const majorVersion = parseInt(nodeVersion.split('.')[0], 10);

if (majorVersion < 20) {
  console.error(`Error: Node.js 20 or higher is required. You are using Node.js ${nodeVersion}.`);
  process.exit(1);
}

import { readFile } from "node:fs/promises";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { createAppContext } from "./context.js";
import { createHttpServer, listen } from "./server/http.js";
import { createWeatherMcpServer } from "./tools/registry.js";
import { Logger } from "./util/logger.js";
import { redactedJson } from "./util/redact.js";

const PackageSchema = z.object({ version: z.string() });

// Read package version at runtime to avoid import-attributes incompatibility
async function getPackageVersion(): Promise<string> {
  try {
    const pkgPath = new URL("../package.json", import.meta.url);
    const raw = await readFile(pkgPath, "utf8");
    const pkg = PackageSchema.safeParse(JSON.parse(raw));
    return pkg.success ? pkg.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

async function main() {
  const config = await loadConfig(process.argv.slice(2));
  const logger = new Logger(config.log_level);

  const version = await getPackageVersion();
  logger.info(`Starting weather lookup service v${version}`);
  logger.debug(`Config: ${redactedJson(config)}`);

  const ctx = createAppContext(config, logger, { version });

  if (config.transport === "http") {
    const httpServer = createHttpServer(ctx);

    // A bind failure rejects here and is reported by main's error handler
    await listen(httpServer, config.port, config.host);
    httpServer.on("error", (err) => logger.error(`HTTP server error: ${err.message}`));
    logger.info(`HTTP server listening on ${config.host}:${config.port}`);
    logger.info(`Health check available at http://localhost:${config.port}/health`);
    logger.info(`MCP endpoint available at http://localhost:${config.port}/mcp`);

    let sweep: NodeJS.Timeout | undefined;
    if (config.cache_sweep_ms > 0) {
      sweep = setInterval(() => ctx.weather.prune(), config.cache_sweep_ms);
      sweep.unref();
    }

    // Exit cleanly on SIGTERM/SIGINT
    const onExit = () => {
      if (sweep) clearInterval(sweep);
      httpServer.close(() => {
        logger.info("HTTP server closed");
        process.exit(0);
      });
    };
    process.on("SIGTERM", onExit);
    process.on("SIGINT", onExit);
  } else {
    const server = createWeatherMcpServer(ctx, version);
    const transport = new StdioServerTransport();

    // Exit cleanly on stdin close or SIGTERM
    const onExit = () => process.exit(0);
    process.on("SIGTERM", onExit);
    process.on("SIGINT", onExit);
    process.stdin.on("close", onExit);

    await server.connect(transport);
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[${new Date().toISOString()}] ERROR ${msg}\n`);
  process.exit(1);
});

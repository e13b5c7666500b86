import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_HOURLY_VARS } from "./weather/service.js";

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_PORT = 3000;

export const ProfileSchema = z
  .object({
    transport: z.enum(["http", "stdio"]).optional().default("http").describe("Transport type: http (REST + MCP, default) or stdio (MCP only)"),
    port: z.number().int().min(0).max(65535).optional().default(DEFAULT_PORT).describe("Port to listen on when using HTTP transport"),
    host: z.string().optional().default("0.0.0.0"),
    timeout_ms: z.number().int().positive().optional().default(DEFAULT_TIMEOUT_MS).describe("Per-attempt timeout for upstream requests"),
    log_level: z.enum(["silent", "error", "info", "debug"]).optional().default("info"),
    api_key: z.coerce.string().optional().describe("Open-Meteo customer API key; switches to the customer hosts"),
    geocode_url: z.string().url().optional(),
    forecast_url: z.string().url().optional(),
    user_agent: z.string().optional().default("weather-lookup-service"),
    coalesce_requests: z.boolean().optional().default(true).describe("Share one upstream call between concurrent misses for the same key"),
    cache_sweep_ms: z.number().int().min(0).optional().default(0).describe("Interval for sweeping expired cache entries; 0 disables the sweep"),
    default_hourly_vars: z.string().optional().default(DEFAULT_HOURLY_VARS),
  })
  .strict();

export type Profile = z.infer<typeof ProfileSchema>;

export function parseArgs(argv: string[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const eq = arg.indexOf("=");
    if (eq !== -1) {
      out[normalizeKey(arg.slice(2, eq))] = coerceValue(arg.slice(eq + 1));
    } else {
      const key = normalizeKey(arg.slice(2));
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        out[key] = coerceValue(next);
        i++;
      } else {
        out[key] = true;
      }
    }
  }
  return out;
}

function normalizeKey(key: string): string {
  return key.replace(/-/g, "_");
}

export function coerceValue(val: string): unknown {
  if (val === "true") return true;
  if (val === "false") return false;
  const num = Number(val);
  if (!Number.isNaN(num) && val.trim() !== "") return num;
  return val;
}

export async function loadProfile(path?: string): Promise<Partial<Profile>> {
  if (!path) return {};
  const txt = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(txt);
  } catch (e: unknown) {
    throw new Error(`Invalid profile JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = ProfileSchema.partial().safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid profile JSON: ${parsed.error.message}`);
  return parsed.data;
}

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.PORT) out.port = coerceValue(env.PORT);
  if (env.HOST) out.host = env.HOST;
  if (env.LOG_LEVEL) out.log_level = env.LOG_LEVEL;
  if (env.OPEN_METEO_API_KEY) out.api_key = env.OPEN_METEO_API_KEY;
  return out;
}

// Precedence: CLI flags, then environment, then the profile file.
export function mergeConfig(profile: Partial<Profile>, flags: Record<string, unknown>, env: NodeJS.ProcessEnv = {}): Profile {
  const merged: Record<string, unknown> = { ...stripUndefined(profile), ...envOverrides(env), ...flags };
  const result = ProfileSchema.safeParse(merged);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${message}`);
  }
  return result.data;
}

export async function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<Profile> {
  const { profile: profilePath, ...flags } = parseArgs(argv);
  if (profilePath !== undefined && typeof profilePath !== "string") {
    throw new Error("--profile expects a file path");
  }
  const profile = await loadProfile(profilePath).catch((e: unknown) => {
    throw new Error(`Failed to load profile: ${e instanceof Error ? e.message : String(e)}`);
  });
  return mergeConfig(profile, flags, env);
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

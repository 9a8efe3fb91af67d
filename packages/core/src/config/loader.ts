import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  LogLevel,
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const configPath =
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json");

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // Missing file means all defaults
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ServerConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  // Environment overrides apply to this process only and are never persisted
  return applyEnvOverrides(config, options?.env ?? process.env);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === "") return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return num;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Layers environment variables over a parsed config:
 *
 *   PORT, MEDIA_DIR, CREDFILE, TIMEDELTA (lookback hours),
 *   LATEST_MAX_AGE_HOURS, LATEST_MAX_COUNT, LAST_IMAGE_FILENAME, LOG_LEVEL
 *
 * The result is re-validated, so a bad value fails the same way a bad
 * config.json does.
 */
export function applyEnvOverrides(
  config: ServerConfig,
  env: NodeJS.ProcessEnv,
): ServerConfig {
  const port = readNumber(env, "PORT");
  const lookbackHours = readNumber(env, "TIMEDELTA");
  const maxAgeHours = readNumber(env, "LATEST_MAX_AGE_HOURS");
  const maxCount = readNumber(env, "LATEST_MAX_COUNT");
  const mediaRoot = readString(env, "MEDIA_DIR");
  const credentialsPath = readString(env, "CREDFILE");
  const lastImageFilename = readString(env, "LAST_IMAGE_FILENAME");
  const logLevel = readString(env, "LOG_LEVEL");

  return ServerConfigSchema.parse({
    ...config,
    server: {
      ...config.server,
      ...(port !== undefined && { port }),
    },
    logging: {
      ...config.logging,
      ...(logLevel !== undefined && { level: LogLevel.parse(logLevel) }),
    },
    media: {
      ...config.media,
      ...(mediaRoot !== undefined && { root: mediaRoot }),
      ...(lastImageFilename !== undefined && { lastImageFilename }),
    },
    ingest: {
      ...config.ingest,
      ...(lookbackHours !== undefined && { lookbackHours }),
    },
    latest: {
      ...config.latest,
      ...(maxAgeHours !== undefined && { maxAgeHours }),
      ...(maxCount !== undefined && { maxCount }),
    },
    blink: {
      ...config.blink,
      ...(credentialsPath !== undefined && { credentialsPath }),
    },
  });
}

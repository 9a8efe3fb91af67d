import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 5001,
    origin: "http://localhost:5001",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  media: {
    root: "./media",
    lastImageFilename: "last_snap.jpg",
    perCameraArchive: true,
  },
  ingest: {
    lookbackHours: 6,
    fetchDelayMs: 2_000,
    manifestPollIntervalMs: 1_000,
    manifestPollAttempts: 60,
  },
  latest: {
    maxAgeHours: 0,
    maxCount: 20,
  },
  snapshot: {
    settleDelayMs: 5_000,
  },
  blink: {
    credentialsPath: "./credentials.json",
    maxMediaPages: 10,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const RetentionPolicySchema = z.object({
  maxAgeHours: z.number().min(0).default(DEFAULTS.latest.maxAgeHours),
  maxCount: z.number().int().min(0).default(DEFAULTS.latest.maxCount),
});

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      origin: z.url().default(DEFAULTS.server.origin),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  media: z
    .object({
      root: z.string().min(1).default(DEFAULTS.media.root),
      lastImageFilename: z
        .string()
        .min(1)
        .default(DEFAULTS.media.lastImageFilename)
        .describe("Snapshot filename written under {root}/{camera}/"),
      perCameraArchive: z
        .boolean()
        .default(DEFAULTS.media.perCameraArchive)
        .describe("Partition the archive under a per-camera directory"),
    })
    .default(DEFAULTS.media),
  ingest: z
    .object({
      lookbackHours: z
        .number()
        .positive()
        .default(DEFAULTS.ingest.lookbackHours),
      fetchDelayMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.ingest.fetchDelayMs),
      manifestPollIntervalMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.ingest.manifestPollIntervalMs),
      manifestPollAttempts: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.ingest.manifestPollAttempts),
    })
    .default(DEFAULTS.ingest),
  latest: RetentionPolicySchema.default(DEFAULTS.latest),
  snapshot: z
    .object({
      settleDelayMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.snapshot.settleDelayMs),
    })
    .default(DEFAULTS.snapshot),
  blink: z
    .object({
      credentialsPath: z
        .string()
        .min(1)
        .default(DEFAULTS.blink.credentialsPath),
      maxMediaPages: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.blink.maxMediaPages),
    })
    .default(DEFAULTS.blink),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type RetentionPolicy = z.infer<typeof RetentionPolicySchema>;

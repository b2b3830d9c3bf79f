import "dotenv/config";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";
import { validateFootprintMap } from "./metrics/footprints.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  OUTPUT_PREFIX: z.string().optional(),
  TIMEZONE: z.string().optional(),
  USERINFO_PATH: z.string().optional(),
  USERFILTER_PATH: z.string().optional(),

  BUCKET_TYPE: z.enum(["local", "s3"]).optional(),
  BUCKET_URI: z.string().optional(),
  BUCKET_NAME: z.string().optional(),
  BUCKET_REGION: z.string().optional(),
  BUCKET_ENDPOINT: z.string().optional(),
  BUCKET_FORCE_PATH_STYLE: z.string().optional(),
  BUCKET_ACCESS_KEY_ID: z.string().optional(),
  BUCKET_SECRET_ACCESS_KEY: z.string().optional(),

  RETRY_COUNT: z.coerce.number().int().nonnegative().optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_INCLUDE_TIMINGS: z.string().optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional(),

  PERIOD_DAYS: z.coerce.number().positive().optional(),
  TOP_LIMIT: z.coerce.number().int().positive().optional(),
  REPEAT_MIN_BUILDS: z.coerce.number().int().min(2).optional(),
  REPEAT_PERIOD_DAYS: z.coerce.number().positive().optional(),
  ACTIVE_MIN_DAYS: z.coerce.number().int().positive().optional(),
  ACTIVE_RECENT_DAYS: z.coerce.number().positive().optional(),
});

export const fileConfigSchema = z.object({
  output: z
    .object({
      prefix: z.string().default("reports"),
    })
    .default({}),
  storage: z
    .object({
      type: z.enum(["local", "s3"]).default("local"),
      bucket: z.string().optional(),
      region: z.string().optional(),
      endpoint: z.string().optional(),
      forcePathStyle: z.boolean().default(false),
      accessKeyId: z.string().optional(),
      secretAccessKey: z.string().optional(),
    })
    .default({}),
  network: z
    .object({
      retryCount: z.coerce.number().int().nonnegative().default(2),
      retryBackoffMs: z.coerce.number().int().positive().default(500),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      includeTimings: z.boolean().default(false),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false),
      timeZone: z.string().optional(),
    })
    .default({}),
  metrics: z
    .object({
      periodDays: z.number().positive().default(7),
      slidingWindowDays: z.number().positive().default(30),
      trendStdDev: z.number().positive().default(7),
      topLimit: z.number().int().positive().default(20),
      repeat: z
        .object({
          minBuilds: z.number().int().min(2).default(3),
          periodDays: z.number().positive().default(7),
        })
        .default({}),
      active: z
        .object({
          minDays: z.number().int().positive().default(3),
          recentLimitDays: z.number().positive().default(30),
        })
        .default({}),
      footprints: z.record(z.string()).default({}),
    })
    .default({}),
});

export type ConfigFileInput = z.input<typeof fileConfigSchema>;
export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  fileDefaults: ConfigFileInput = defaultConfig
) {
  const env = envSchema.parse(source);
  const fileConfig = fileConfigSchema.parse(fileDefaults);

  const storage = {
    type: env.BUCKET_TYPE ?? fileConfig.storage.type,
    bucket: resolveBucketName(env, fileConfig.storage.bucket),
    region: env.BUCKET_REGION ?? fileConfig.storage.region,
    endpoint: env.BUCKET_ENDPOINT ?? fileConfig.storage.endpoint,
    forcePathStyle: resolveBool(
      env.BUCKET_FORCE_PATH_STYLE,
      fileConfig.storage.forcePathStyle
    ),
    accessKeyId: env.BUCKET_ACCESS_KEY_ID ?? fileConfig.storage.accessKeyId,
    secretAccessKey:
      env.BUCKET_SECRET_ACCESS_KEY ?? fileConfig.storage.secretAccessKey,
  };

  if (storage.type === "s3" && !storage.bucket) {
    throw new Error("Missing BUCKET_NAME/BUCKET_URI for S3 storage.");
  }

  const metrics = fileConfig.metrics;
  return {
    input: {
      userInfoPath: env.USERINFO_PATH,
      userFilterPath: env.USERFILTER_PATH,
    },
    output: {
      prefix: env.OUTPUT_PREFIX ?? fileConfig.output.prefix,
    },
    storage,
    network: {
      retryCount: env.RETRY_COUNT ?? fileConfig.network.retryCount,
      retryBackoffMs: env.RETRY_BACKOFF_MS ?? fileConfig.network.retryBackoffMs,
    },
    logging: {
      level: env.LOG_LEVEL ?? fileConfig.logging.level,
      includeTimings: resolveBool(
        env.LOG_INCLUDE_TIMINGS,
        fileConfig.logging.includeTimings
      ),
      format: env.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(env.LOG_COLOR, fileConfig.logging.color),
      timeZone: env.TIMEZONE ?? fileConfig.logging.timeZone,
    },
    metrics: {
      periodDays: env.PERIOD_DAYS ?? metrics.periodDays,
      slidingWindowDays: metrics.slidingWindowDays,
      trendStdDev: metrics.trendStdDev,
      topLimit: env.TOP_LIMIT ?? metrics.topLimit,
      repeat: {
        minBuilds: env.REPEAT_MIN_BUILDS ?? metrics.repeat.minBuilds,
        periodDays: env.REPEAT_PERIOD_DAYS ?? metrics.repeat.periodDays,
      },
      active: {
        minDays: env.ACTIVE_MIN_DAYS ?? metrics.active.minDays,
        recentLimitDays: env.ACTIVE_RECENT_DAYS ?? metrics.active.recentLimitDays,
      },
      footprints: validateFootprintMap(metrics.footprints),
    },
  };
}

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}

function resolveBucketName(
  env: { BUCKET_NAME?: string; BUCKET_URI?: string },
  fallback?: string
) {
  if (env.BUCKET_NAME) return env.BUCKET_NAME;
  if (env.BUCKET_URI) return stripBucketScheme(env.BUCKET_URI);
  return fallback;
}

function stripBucketScheme(value: string) {
  return value.replace(/^s3:\/\//, "");
}

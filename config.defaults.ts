import type { ConfigFileInput } from "./src/config.js";

export const defaultConfig: ConfigFileInput = {
  output: {
    prefix: "reports", // Storage path prefix for written reports
  },
  storage: {
    type: "local", // "local" writes under ./out, "s3" writes to the bucket below
    bucket: "build-metrics",
    region: "auto",
    forcePathStyle: true, // Needed for S3-compatible services
  },
  network: {
    retryCount: 2, // Retry attempts for storage writes
    retryBackoffMs: 500, // Base delay, doubled on every attempt
  },
  logging: {
    level: "info",
    includeTimings: true,
    format: "pretty",
    color: true,
  },
  metrics: {
    periodDays: 7, // Width of the builds/users-over-time periods
    slidingWindowDays: 30, // Width of the "users in the previous N days" series
    trendStdDev: 7, // Standard deviation (in points) of the trendline kernel
    topLimit: 20, // Rows in the packages and accounts tables
    repeat: {
      minBuilds: 3, // Builds needed inside one period
      periodDays: 7,
    },
    active: {
      minDays: 3, // Distinct days with at least one build
      recentLimitDays: 30, // Latest build must be newer than this
    },
    footprints: {
      "rhel-edge-commit": "edge",
      "rhel-edge-installer": "edge",
      vsphere: "private-cloud",
      "guest-image": "private-cloud",
      "image-installer": "bare-metal",
      gcp: "gcp",
      aws: "aws",
      azure: "azure",
      vhd: "azure",
    },
  },
};

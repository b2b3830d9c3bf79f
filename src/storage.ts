import { access, mkdir, writeFile } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import {
  S3Client,
  PutObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand
} from "@aws-sdk/client-s3";
import { withRetry, type RetryConfig } from "./retry.js";

export type StorageConfig = {
  type: "local" | "s3";
  bucket?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Root directory for local storage. Defaults to `./out`. */
  basePath?: string;
};

export type StoredArtifact = {
  key: string;
  uri: string;
  size: number;
};

export type StorageClient = {
  put: (key: string, body: string, contentType?: string) => Promise<StoredArtifact>;
  exists: (key: string) => Promise<boolean>;
};

/** Storage keys of one rendered report, grouped under the dump's file name. */
export type ReportKeys = {
  baseKey: string;
  markdown: string;
  json: string;
};

export type RenderedReport = {
  markdown: string;
  json: string;
};

export function reportKeys(prefix: string, dumpPath: string): ReportKeys {
  const baseKey = `${prefix}/${basename(dumpPath, extname(dumpPath))}`;
  return {
    baseKey,
    markdown: `${baseKey}/report.md`,
    json: `${baseKey}/report.json`
  };
}

/** Writes the Markdown, then the JSON artifact. `report --skip-existing` checks for the JSON. */
export async function writeReport(
  client: StorageClient,
  keys: ReportKeys,
  report: RenderedReport,
  retry: Omit<RetryConfig, "label">
): Promise<StoredArtifact[]> {
  const markdown = await withRetry(
    () => client.put(keys.markdown, report.markdown, "text/markdown; charset=utf-8"),
    { ...retry, label: keys.markdown }
  );
  const json = await withRetry(() => client.put(keys.json, report.json, "application/json"), {
    ...retry,
    label: keys.json
  });
  return [markdown, json];
}

export function describeStorage(config: StorageConfig) {
  return {
    type: config.type,
    bucket: config.bucket ?? null,
    region: config.region ?? null,
    endpoint: config.endpoint ?? null,
    forcePathStyle: config.forcePathStyle ?? false
  };
}

export function createStorageClient(config: StorageConfig): StorageClient {
  if (config.type === "local") {
    return createLocalClient(resolveBasePath(config));
  }
  return createS3Client(config);
}

export async function validateStorage(config: StorageConfig) {
  if (config.type === "local") {
    await mkdir(resolveBasePath(config), { recursive: true });
    return;
  }
  if (!config.bucket) {
    throw new Error("Storage validation failed: missing bucket name.");
  }
  try {
    await buildS3Client(config).send(new HeadBucketCommand({ Bucket: config.bucket }));
  } catch (error) {
    const status = httpStatus(error);
    const hint =
      status === 403
        ? "Check access keys, token scope, and bucket permissions."
        : status === 404
        ? "Bucket not found; check bucket name and endpoint."
        : "Check endpoint and credentials.";
    throw new Error(`Storage validation failed (${status ?? "unknown"}): ${hint}`, { cause: error });
  }
}

function resolveBasePath(config: StorageConfig) {
  return config.basePath ?? join(process.cwd(), "out");
}

function createLocalClient(basePath: string): StorageClient {
  return {
    async put(key, body) {
      const filePath = join(basePath, key);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, body, "utf8");
      return {
        key,
        uri: filePath,
        size: Buffer.byteLength(body, "utf8")
      };
    },
    async exists(key) {
      try {
        await access(join(basePath, key), fsConstants.F_OK);
        return true;
      } catch {
        return false;
      }
    }
  };
}

function buildS3Client(config: StorageConfig) {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: config.accessKeyId
      ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey ?? ""
        }
      : undefined
  });
}

function createS3Client(config: StorageConfig): StorageClient {
  const bucket = config.bucket;
  if (!bucket) {
    throw new Error("Missing storage.bucket for S3.");
  }
  const client = buildS3Client(config);

  return {
    async put(key, body, contentType) {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? "text/plain; charset=utf-8"
        })
      );
      return {
        key,
        uri: `s3://${bucket}/${key}`,
        size: Buffer.byteLength(body, "utf8")
      };
    },
    async exists(key) {
      try {
        await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
        return true;
      } catch (error) {
        if (httpStatus(error) === 404) return false;
        throw error;
      }
    }
  };
}

function httpStatus(error: unknown) {
  if (typeof error !== "object" || error === null || !("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

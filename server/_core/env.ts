import "dotenv/config";
import { SSMClient, GetParameterCommand } from "@aws-sdk/client-ssm";
import { z } from "zod";

/**
 * Ingestion configuration
 *
 * Secrets (DATABASE_URL, S3_BUCKET_NAME) are read from the environment first
 * and fall back to SSM Parameter Store under /football/<NAME>.
 */

export interface ParameterSource {
  getParameter(name: string): Promise<string | undefined>;
}

export class SsmParameterSource implements ParameterSource {
  private client: SSMClient;

  constructor(region: string) {
    this.client = new SSMClient({ region });
  }

  async getParameter(name: string): Promise<string | undefined> {
    const response = await this.client.send(
      new GetParameterCommand({ Name: name, WithDecryption: true })
    );
    return response.Parameter?.Value;
  }
}

export const PARAMETER_PREFIX = "/football/";

const settingsSchema = z.object({
  AWS_REGION: z.string().min(1).default("us-west-1"),
  S3_PREFIX: z.string().default("open-data/data/"),
  OBJECT_STORE_DRIVER: z.enum(["s3", "http"]).default("s3"),
  OBJECT_STORE_BASE_URL: z.string().url().optional(),
  INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  LINEUPS_UNIQUE: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
});

export type ObjectStoreDriver = "s3" | "http";

export interface IngestConfig {
  databaseUrl: string;
  region: string;
  prefix: string;
  driver: ObjectStoreDriver;
  bucket: string | null;
  baseUrl: string | null;
  concurrency: number;
  lineupsUnique: boolean;
}

type Env = Record<string, string | undefined>;

function nonEmpty(env: Env): Env {
  const out: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

/**
 * Resolve one secret: environment variable first, parameter store second.
 */
export async function resolveSecret(
  name: string,
  env: Env,
  parameters: () => ParameterSource
): Promise<string> {
  const fromEnv = env[name];
  if (fromEnv) return fromEnv;

  let value: string | undefined;
  try {
    value = await parameters().getParameter(`${PARAMETER_PREFIX}${name}`);
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    throw new Error(`${name} is not set and parameter ${PARAMETER_PREFIX}${name} could not be read: ${errorMsg}`);
  }
  if (!value) {
    throw new Error(`${name} is not set and parameter ${PARAMETER_PREFIX}${name} is empty`);
  }
  return value;
}

export async function loadIngestConfig(
  env: Env = process.env,
  parameterSource?: ParameterSource
): Promise<IngestConfig> {
  const cleaned = nonEmpty(env);
  const parsed = settingsSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const settings = parsed.data;

  // The SSM client is only built when a secret is actually missing
  let source = parameterSource;
  const parameters = () => {
    if (!source) source = new SsmParameterSource(settings.AWS_REGION);
    return source;
  };

  const databaseUrl = await resolveSecret("DATABASE_URL", cleaned, parameters);

  let bucket: string | null = null;
  let baseUrl: string | null = null;
  if (settings.OBJECT_STORE_DRIVER === "s3") {
    bucket = await resolveSecret("S3_BUCKET_NAME", cleaned, parameters);
  } else {
    if (!settings.OBJECT_STORE_BASE_URL) {
      throw new Error("OBJECT_STORE_BASE_URL is required when OBJECT_STORE_DRIVER=http");
    }
    baseUrl = settings.OBJECT_STORE_BASE_URL;
  }

  return {
    databaseUrl,
    region: settings.AWS_REGION,
    prefix: settings.S3_PREFIX,
    driver: settings.OBJECT_STORE_DRIVER,
    bucket,
    baseUrl,
    concurrency: settings.INGEST_CONCURRENCY,
    lineupsUnique: settings.LINEUPS_UNIQUE,
  };
}

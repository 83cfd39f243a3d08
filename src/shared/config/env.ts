export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  DATABASE_URL: string;
  PREDICTION_BASE_URL: string;
  PREDICTION_API_KEY: string;
  S3_BUCKET: string;
  AWS_REGION: string;
  S3_ENDPOINT?: string;
};

const parseUrl = (name: string, value: string): URL => {
  try {
    return new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute URL. Received: ${value}`);
  }
};

const validateUrlScheme = (name: string, value: string, schemes: readonly string[]): string => {
  const parsed = parseUrl(name, value);
  if (!schemes.includes(parsed.protocol)) {
    throw new Error(`${name} must use one of ${schemes.map((s) => s.replace(/:$/, "")).join("/")}. Received: ${value}`);
  }
  return value;
};

const httpSchemes = ["http:", "https:"] as const;
const postgresSchemes = ["postgres:", "postgresql:"] as const;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/predictions";
  const MONGO_DB_NAME = env.MONGO_DB_NAME?.trim() || "predictions";
  const DATABASE_URL = validateUrlScheme(
    "DATABASE_URL",
    env.DATABASE_URL ?? "postgres://localhost:5432/measurements",
    postgresSchemes
  );
  const PREDICTION_BASE_URL = validateUrlScheme(
    "PREDICTION_BASE_URL",
    env.PREDICTION_BASE_URL ?? "http://localhost:4100",
    httpSchemes
  );
  const PREDICTION_API_KEY = env.PREDICTION_API_KEY ?? "";
  const S3_BUCKET = env.S3_BUCKET?.trim() || "prediction-pipeline-data";
  const AWS_REGION = env.AWS_REGION?.trim() || "us-east-1";
  const S3_ENDPOINT = env.S3_ENDPOINT?.trim()
    ? validateUrlScheme("S3_ENDPOINT", env.S3_ENDPOINT.trim(), httpSchemes)
    : undefined;

  return {
    MONGO_URI,
    MONGO_DB_NAME,
    DATABASE_URL,
    PREDICTION_BASE_URL,
    PREDICTION_API_KEY,
    S3_BUCKET,
    AWS_REGION,
    ...(S3_ENDPOINT ? { S3_ENDPOINT } : {})
  };
};

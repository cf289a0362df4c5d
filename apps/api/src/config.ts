export interface ApiConfig {
  port: number;
  /** Deliver host actions and refresh events through Redis when set. */
  redisUrl?: string;
  /** Bearer secret the interception host must send with captured traffic. */
  ingestSecret?: string;
  defaultGreedy: boolean;
  corsAllowedOrigins: string[];
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = parseInt(env.PORT || env.API_PORT || "3001", 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT || env.API_PORT}`);
  }

  return {
    port,
    redisUrl: env.REDIS_URL || undefined,
    ingestSecret: env.INGEST_SECRET || undefined,
    defaultGreedy: parseFlag(env.DEFAULT_GREEDY, true),
    corsAllowedOrigins: (env.CORS_ALLOWED_ORIGINS || "")
      .split(",")
      .map((value) => value.trim())
      .filter(Boolean),
  };
}

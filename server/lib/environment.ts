import { z } from "zod";

export type DeploymentEnvironment = "development" | "production" | "preview";
export type StorageDriver = "postgres" | "memory";

export interface AppConfig {
  environment: DeploymentEnvironment;
  isDevelopment: boolean;
  isProduction: boolean;
  isPreview: boolean;
  nodeEnv: string;
  databaseUrl: string;
  storageDriver: StorageDriver;
  port: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  heartbeatSweepMs: number;
  dispatchTimeoutMs: number;
  submissionBaseTimeoutMs: number;
  submissionPerTargetMs: number;
  submissionMaxTimeoutMs: number;
  schedulerCron: string;
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  DATABASE_URL: z.string().default(""),
  STORAGE_DRIVER: z.enum(["postgres", "memory"]).optional(),
  PORT: positiveInt.max(65535).default(5000),
  HEARTBEAT_INTERVAL_SECONDS: positiveInt.default(60),
  HEARTBEAT_TIMEOUT_SECONDS: positiveInt.optional(),
  HEARTBEAT_SWEEP_SECONDS: positiveInt.default(60),
  DISPATCH_TIMEOUT_MS: positiveInt.default(5000),
  SUBMISSION_BASE_TIMEOUT_MS: positiveInt.default(5000),
  SUBMISSION_PER_TARGET_MS: positiveInt.default(50),
  SUBMISSION_MAX_TIMEOUT_MS: positiveInt.default(60000),
  SCHEDULER_CRON: z.string().min(1).default("* * * * *"),
});

/**
 * Detects the deployment environment
 * Uses NODE_ENV and DEPLOYMENT_ENV environment variables
 */
function detectEnvironment(env: NodeJS.ProcessEnv): DeploymentEnvironment {
  // Allow explicit override via DEPLOYMENT_ENV
  const deploymentEnv = env.DEPLOYMENT_ENV?.toLowerCase();
  if (deploymentEnv === "production" || deploymentEnv === "preview" || deploymentEnv === "development") {
    return deploymentEnv;
  }

  const nodeEnv = env.NODE_ENV?.toLowerCase();
  if (nodeEnv === "production") {
    return "production";
  }

  if (nodeEnv === "preview" || nodeEnv === "staging") {
    return "preview";
  }

  return "development";
}

/**
 * Builds the immutable service configuration from an environment map.
 * Throws with every offending variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new Error(`Invalid environment configuration - ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  const environment = detectEnvironment(env);
  const heartbeatIntervalMs = vars.HEARTBEAT_INTERVAL_SECONDS * 1000;
  // 3 missed heartbeats before an agent is considered gone
  const heartbeatTimeoutMs = (vars.HEARTBEAT_TIMEOUT_SECONDS ?? vars.HEARTBEAT_INTERVAL_SECONDS * 3) * 1000;

  return Object.freeze({
    environment,
    isDevelopment: environment === "development",
    isProduction: environment === "production",
    isPreview: environment === "preview",
    nodeEnv: env.NODE_ENV || "development",
    databaseUrl: vars.DATABASE_URL,
    storageDriver: vars.STORAGE_DRIVER ?? (vars.DATABASE_URL ? "postgres" : "memory"),
    port: vars.PORT,
    heartbeatIntervalMs,
    heartbeatTimeoutMs,
    heartbeatSweepMs: vars.HEARTBEAT_SWEEP_SECONDS * 1000,
    dispatchTimeoutMs: vars.DISPATCH_TIMEOUT_MS,
    submissionBaseTimeoutMs: vars.SUBMISSION_BASE_TIMEOUT_MS,
    submissionPerTargetMs: vars.SUBMISSION_PER_TARGET_MS,
    submissionMaxTimeoutMs: vars.SUBMISSION_MAX_TIMEOUT_MS,
    schedulerCron: vars.SCHEDULER_CRON,
  });
}

/**
 * Logs environment information on startup
 */
export function logEnvironmentInfo(config: AppConfig): void {
  console.log(`[Environment] Detected: ${config.environment}`);
  console.log(`[Environment] NODE_ENV: ${config.nodeEnv}`);
  console.log(`[Environment] Storage: ${config.storageDriver}${config.storageDriver === "postgres" ? "" : " (data is not persisted)"}`);
  console.log(
    `[Environment] Heartbeat: every ${config.heartbeatIntervalMs / 1000}s, ` +
    `timeout ${config.heartbeatTimeoutMs / 1000}s, sweep ${config.heartbeatSweepMs / 1000}s`
  );

  if (config.isProduction && config.storageDriver === "memory") {
    console.warn(`[Environment] Running in PRODUCTION with in-memory storage`);
  }
}

import dotenv from "dotenv";

dotenv.config();

const requiredEnv = ["DATABASE_URL"] as const;

export function assertEnv(): void {
  const missing = requiredEnv.filter((key) => !process.env[key]);
  if (missing.length > 0) {
    throw new Error(`missing_env:${missing.join(",")}`);
  }
}

function getEnvValue(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

export function getDatabaseUrl(): string {
  const value = getEnvValue("DATABASE_URL");
  if (!value) {
    throw new Error("missing_env:DATABASE_URL");
  }
  return value;
}

export function getDbPoolMax(): number {
  return parsePositiveInt(getEnvValue("DB_POOL_MAX"), 10);
}

export function getOmrEngineUrl(): string | null {
  return getEnvValue("OMR_ENGINE_URL") ?? null;
}

export function getOmrEngineTimeoutMs(): number {
  return parsePositiveInt(getEnvValue("OMR_ENGINE_TIMEOUT_MS"), 60_000);
}

export function getImageDownloadTimeoutMs(): number {
  return parsePositiveInt(getEnvValue("IMAGE_DOWNLOAD_TIMEOUT_MS"), 30_000);
}

export function getImageMaxBytes(): number {
  return parsePositiveInt(getEnvValue("IMAGE_MAX_BYTES"), 20 * 1024 * 1024);
}

export function getWebhookTimeoutMs(): number {
  return parsePositiveInt(getEnvValue("WEBHOOK_TIMEOUT_MS"), 30_000);
}

export function getCallbackMaxAttempts(): number {
  return parsePositiveInt(getEnvValue("CALLBACK_MAX_ATTEMPTS"), 3);
}

export function getCallbackSweepEnabled(): boolean {
  return parseBoolean(getEnvValue("CALLBACK_SWEEP_ENABLED"), false);
}

export function getCallbackSweepIntervalMs(): number {
  return parsePositiveInt(getEnvValue("CALLBACK_SWEEP_INTERVAL_MS"), 60_000);
}

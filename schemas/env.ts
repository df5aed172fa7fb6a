export type EnvConfig = {
  openAiApiKey: string | null;
  transcriptionBaseUrl: string | null;
  transcriptionModel: string;
  extractionBaseUrl: string | null;
  extractionModel: string;
  laborRatePerHour: number;
  lowStockThreshold: number;
  staleJobHours: number;
  followupCriticalAfterDays: number;
  extractionConfidenceThreshold: number;
  alertRetentionHours: number;
  transcriptionTimeoutMs: number;
  extractionTimeoutMs: number;
  concurrencyMaxAttempts: number;
};

function trimOrNull(value: string | undefined | null) {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
}

function parseNumber(
  value: string | undefined | null,
  fallback: number,
  { min = 0, max = Number.POSITIVE_INFINITY }: { min?: number; max?: number } = {},
) {
  const normalized = trimOrNull(value);
  if (!normalized) {
    return fallback;
  }
  const parsed = Number(normalized);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    console.warn("[env] Ignoring out-of-range numeric value", { value: normalized, fallback });
    return fallback;
  }
  return parsed;
}

function parseInteger(value: string | undefined | null, fallback: number, min = 0) {
  return Math.floor(parseNumber(value, fallback, { min }));
}

export function parseEnvConfig(env: Partial<NodeJS.ProcessEnv> = process.env): EnvConfig {
  return {
    openAiApiKey: trimOrNull(env.OPENAI_API_KEY),
    transcriptionBaseUrl: trimOrNull(env.TRANSCRIPTION_BASE_URL),
    transcriptionModel: trimOrNull(env.TRANSCRIPTION_MODEL) ?? "whisper-1",
    extractionBaseUrl: trimOrNull(env.EXTRACTION_BASE_URL),
    extractionModel: trimOrNull(env.EXTRACTION_MODEL) ?? "gpt-4.1-mini",
    laborRatePerHour: parseNumber(env.LABOR_RATE_PER_HOUR, 75),
    lowStockThreshold: parseInteger(env.LOW_STOCK_THRESHOLD, 5),
    staleJobHours: parseNumber(env.STALE_JOB_HOURS, 72),
    followupCriticalAfterDays: parseNumber(env.FOLLOWUP_CRITICAL_AFTER_DAYS, 7),
    extractionConfidenceThreshold: parseNumber(env.EXTRACTION_CONFIDENCE_THRESHOLD, 0.6, {
      max: 1,
    }),
    alertRetentionHours: parseNumber(env.ALERT_RETENTION_HOURS, 168),
    transcriptionTimeoutMs: parseInteger(env.TRANSCRIPTION_TIMEOUT_MS, 30_000, 1),
    extractionTimeoutMs: parseInteger(env.EXTRACTION_TIMEOUT_MS, 45_000, 1),
    concurrencyMaxAttempts: parseInteger(env.CONCURRENCY_MAX_ATTEMPTS, 3, 1),
  };
}

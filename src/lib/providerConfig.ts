import { z } from "zod";

import { ConfigurationError } from "../../engine/ai/errors";

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ProviderEnvSchema = z.object({
  PAVEWISE_DATABASE_PATH: optionalText.transform((value) => value ?? "pavewise.db"),
  OLLAMA_BASE_URL: optionalText.pipe(z.string().url().optional()),
  OLLAMA_CHAT_MODEL: optionalText.transform((value) => value ?? "llama3.1"),
  DETECTOR_BASE_URL: optionalText.pipe(z.string().url().optional()),
  DETECTOR_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.25),
  STAGE_TIMEOUT_MS: positiveInt(30_000),
  WORKFLOW_MAX_STEPS: positiveInt(25),
});

export type ProviderEnvConfig = {
  databasePath: string;
  ollamaBaseUrl?: string;
  ollamaChatModel: string;
  detectorBaseUrl?: string;
  detectorConfidenceThreshold: number;
  stageTimeoutMs: number;
  workflowMaxSteps: number;
};

type Env = Record<string, string | undefined>;

// Empty strings count as unset so numeric defaults still apply.
const withoutBlanks = (env: Env): Env =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0));

export function getProviderEnvConfig(env: Env = process.env): ProviderEnvConfig {
  const parsed = ProviderEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`[config] Invalid environment: ${issues.join("; ")}`);
  }

  const values = parsed.data;
  return {
    databasePath: values.PAVEWISE_DATABASE_PATH,
    ollamaBaseUrl: values.OLLAMA_BASE_URL,
    ollamaChatModel: values.OLLAMA_CHAT_MODEL,
    detectorBaseUrl: values.DETECTOR_BASE_URL,
    detectorConfidenceThreshold: values.DETECTOR_CONFIDENCE_THRESHOLD,
    stageTimeoutMs: values.STAGE_TIMEOUT_MS,
    workflowMaxSteps: values.WORKFLOW_MAX_STEPS,
  };
}

export function requireSetting<K extends keyof ProviderEnvConfig>(
  config: ProviderEnvConfig,
  key: K,
  envName: string,
): NonNullable<ProviderEnvConfig[K]> {
  const value = config[key];
  if (value === undefined || value === null) {
    throw new ConfigurationError(
      `[config] Missing required environment variable ${envName}. ` +
        "Set it in your deployment environment before starting the app.",
    );
  }

  return value;
}

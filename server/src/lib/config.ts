import { z } from 'zod';

export const DEFAULT_API_VERSIONS = ['2024-02-29-preview', '2023-07-31', '2022-08-31'] as const;

type Env = Record<string, string | undefined>;

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

function positiveInt(fallback: number) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      const parsed = Number.parseInt(raw ?? '', 10);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
    });
}

function envBool(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined) return fallback;
      return val === '1' || val.toLowerCase() === 'true';
    });
}

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: positiveInt(3001),
  MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),

  DI_ENDPOINT: optionalString,
  DI_KEY: optionalString,
  DI_USE_SDK: envBool(true),
  DI_API_VERSIONS: optionalString,
  DI_POLL_INTERVAL_MS: positiveInt(2_000),
  DI_POLL_MAX_ATTEMPTS: positiveInt(30),
  DI_SUBMIT_TIMEOUT_MS: positiveInt(60_000),

  LLM_PROVIDER: z
    .string()
    .optional()
    .transform((val): LLMProviderName => (val?.trim().toLowerCase() === 'anthropic' ? 'anthropic' : 'azure-openai')),
  LLM_TIMEOUT_MS: positiveInt(120_000),
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_API_VERSION: optionalString,
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
});

export interface DocumentServiceConfig {
  endpoint?: string;
  key?: string;
  useSdk: boolean;
  apiVersions: string[];
  pollIntervalMs: number;
  pollMaxAttempts: number;
  submitTimeoutMs: number;
}

export type LLMProviderName = 'azure-openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProviderName;
  timeoutMs: number;
  azure: {
    endpoint?: string;
    apiKey?: string;
    apiVersion: string;
    deployment: string;
  };
  anthropic: {
    apiKey?: string;
    model: string;
  };
}

export interface AppConfig {
  isProduction: boolean;
  port: number;
  maxUploadBytes: number;
  documentService: DocumentServiceConfig;
  llm: LLMConfig;
}

function parseApiVersions(raw: string | undefined): string[] {
  if (!raw) return [...DEFAULT_API_VERSIONS];
  const versions = raw.split(',').map((v) => v.trim()).filter(Boolean);
  return versions.length > 0 ? versions : [...DEFAULT_API_VERSIONS];
}

/**
 * Builds the application configuration once at startup. Credentials stay
 * optional here so the server can boot for health checks; the components that
 * need them raise a CredentialError at call time.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    isProduction: parsed.NODE_ENV === 'production',
    port: parsed.PORT,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    documentService: {
      endpoint: parsed.DI_ENDPOINT?.replace(/\/+$/, ''),
      key: parsed.DI_KEY,
      useSdk: parsed.DI_USE_SDK,
      apiVersions: parseApiVersions(parsed.DI_API_VERSIONS),
      pollIntervalMs: parsed.DI_POLL_INTERVAL_MS,
      pollMaxAttempts: parsed.DI_POLL_MAX_ATTEMPTS,
      submitTimeoutMs: parsed.DI_SUBMIT_TIMEOUT_MS,
    },
    llm: {
      provider: parsed.LLM_PROVIDER,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
      azure: {
        endpoint: parsed.AZURE_OPENAI_ENDPOINT?.replace(/\/+$/, ''),
        apiKey: parsed.AZURE_OPENAI_API_KEY,
        apiVersion: parsed.AZURE_OPENAI_API_VERSION ?? '2024-02-15-preview',
        deployment: parsed.AZURE_OPENAI_DEPLOYMENT_NAME ?? 'gpt-4o',
      },
      anthropic: {
        apiKey: parsed.ANTHROPIC_API_KEY,
        model: parsed.ANTHROPIC_MODEL ?? 'claude-sonnet-4-5-20250929',
      },
    },
  };
}

export function isDocumentServiceConfigured(config: DocumentServiceConfig): boolean {
  return Boolean(config.endpoint && config.key);
}

export function isLLMConfigured(config: LLMConfig): boolean {
  if (config.provider === 'anthropic') return Boolean(config.anthropic.apiKey);
  return Boolean(config.azure.endpoint && config.azure.apiKey);
}

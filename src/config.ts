import { SecretManagerServiceClient } from '@google-cloud/secret-manager';

export interface ValidModels {
  readonly local: readonly string[];
  readonly cloud: readonly string[];
}

export interface LLMSettings {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryInitialDelayMs: number;
  readonly retryMaxDelayMs: number;
  readonly maxCategories: number;
  readonly maxPaymentTextLength: number;
  readonly enableRequestLogging: boolean;
  readonly enableResponseLogging: boolean;
  readonly temperature: number;
}

export interface AppConfig {
  readonly port: number;
  readonly projectId: string | undefined;
  readonly region: string;
  readonly corsAllowedOrigin: string | undefined;
  readonly validModels: ValidModels;
  readonly llm: LLMSettings;
  readonly anthropic: {
    readonly apiKey: string | undefined;
    readonly maxTokens: number;
  };
  readonly openai: {
    readonly apiKey: string | undefined;
    readonly maxTokens: number;
  };
  readonly vertex: {
    readonly location: string;
    readonly maxOutputTokens: number;
  };
  readonly ollama: {
    readonly baseUrl: string;
  };
  readonly search: {
    readonly apiKey: string | undefined;
    readonly engineId: string | undefined;
    readonly maxResults: number;
    readonly timeoutMs: number;
  };
}

type Env = Record<string, string | undefined>;

export const DEFAULT_LLM_SETTINGS: LLMSettings = {
  timeoutMs: 30000,
  maxRetries: 3,
  retryInitialDelayMs: 1000,
  retryMaxDelayMs: 10000,
  maxCategories: 50,
  maxPaymentTextLength: 10000,
  enableRequestLogging: true,
  enableResponseLogging: false,
  temperature: 0,
};

const DEFAULT_LOCAL_MODELS = ['qwen2.5:1.5b', 'qwen2.5:3b', 'llama3.1:8b'];
const DEFAULT_CLOUD_MODELS = [
  'gemini-2.5-flash',
  'gemini-1.5-pro',
  'claude-sonnet-4-20250514',
  'gpt-4o-mini',
];

/**
 * Load configuration from environment variables and Secret Manager
 */
export async function loadConfig(env: Env = process.env): Promise<AppConfig> {
  const projectId = env.GCP_PROJECT_ID || env.GOOGLE_CLOUD_PROJECT || undefined;

  const [anthropicApiKey, openaiApiKey, searchApiKey] = await Promise.all([
    resolveSecret(projectId, env.ANTHROPIC_API_KEY, env.ANTHROPIC_API_KEY_SECRET),
    resolveSecret(projectId, env.OPENAI_API_KEY, env.OPENAI_API_KEY_SECRET),
    resolveSecret(projectId, env.GOOGLE_SEARCH_API_KEY, env.GOOGLE_SEARCH_API_KEY_SECRET),
  ]);

  return {
    port: parseInteger(env.PORT, 8080),
    projectId,
    region: env.GCP_REGION || 'northamerica-northeast1',
    corsAllowedOrigin: env.CORS_ALLOWED_ORIGIN || undefined,
    validModels: {
      local: parseList(env.VALID_LOCAL_MODELS, DEFAULT_LOCAL_MODELS),
      cloud: parseList(env.VALID_CLOUD_MODELS, DEFAULT_CLOUD_MODELS),
    },
    llm: {
      timeoutMs: parseInteger(env.LLM_TIMEOUT_MS, DEFAULT_LLM_SETTINGS.timeoutMs),
      maxRetries: parseInteger(env.LLM_MAX_RETRIES, DEFAULT_LLM_SETTINGS.maxRetries),
      retryInitialDelayMs: parseInteger(
        env.LLM_RETRY_INITIAL_DELAY_MS,
        DEFAULT_LLM_SETTINGS.retryInitialDelayMs
      ),
      retryMaxDelayMs: parseInteger(env.LLM_RETRY_MAX_DELAY_MS, DEFAULT_LLM_SETTINGS.retryMaxDelayMs),
      maxCategories: parseInteger(env.LLM_MAX_CATEGORIES, DEFAULT_LLM_SETTINGS.maxCategories),
      maxPaymentTextLength: parseInteger(
        env.LLM_MAX_PAYMENT_TEXT_LENGTH,
        DEFAULT_LLM_SETTINGS.maxPaymentTextLength
      ),
      enableRequestLogging: parseBoolean(
        env.LLM_LOG_REQUESTS,
        DEFAULT_LLM_SETTINGS.enableRequestLogging
      ),
      enableResponseLogging: parseBoolean(
        env.LLM_LOG_RESPONSES,
        DEFAULT_LLM_SETTINGS.enableResponseLogging
      ),
      temperature: clamp(parseFloatOr(env.LLM_TEMPERATURE, DEFAULT_LLM_SETTINGS.temperature), 0, 2),
    },
    anthropic: {
      apiKey: anthropicApiKey,
      maxTokens: parseInteger(env.ANTHROPIC_MAX_TOKENS, 1024),
    },
    openai: {
      apiKey: openaiApiKey,
      maxTokens: parseInteger(env.OPENAI_MAX_TOKENS, 1024),
    },
    vertex: {
      location: env.VERTEX_LOCATION || 'us-central1',
      maxOutputTokens: parseInteger(env.VERTEX_MAX_OUTPUT_TOKENS, 1024),
    },
    ollama: {
      baseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
    },
    search: {
      apiKey: searchApiKey,
      engineId: env.GOOGLE_SEARCH_ENGINE_ID || undefined,
      maxResults: parseInteger(env.SEARCH_MAX_RESULTS, 3),
      timeoutMs: parseInteger(env.SEARCH_TIMEOUT_MS, 10000),
    },
  };
}

/**
 * Environment value first, then Secret Manager when a project and secret name are set
 */
async function resolveSecret(
  projectId: string | undefined,
  envValue: string | undefined,
  secretName: string | undefined
): Promise<string | undefined> {
  if (envValue) {
    return envValue;
  }
  if (!projectId || !secretName) {
    return undefined;
  }

  try {
    const value = await getSecret(projectId, secretName);
    console.info(`Loaded secret from Secret Manager: ${secretName}`);
    return value;
  } catch (error) {
    console.warn(`Failed to load secret ${secretName} from Secret Manager:`, error);
    return undefined;
  }
}

/**
 * Retrieve a secret from Google Cloud Secret Manager
 */
async function getSecret(projectId: string, secretId: string): Promise<string> {
  const client = new SecretManagerServiceClient();

  const name = `projects/${projectId}/secrets/${secretId}/versions/latest`;
  const [version] = await client.accessSecretVersion({ name });

  const payload = version.payload?.data;
  if (!payload) {
    throw new Error(`Secret ${secretId} has no data`);
  }

  return payload.toString();
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true';
}

function parseList(value: string | undefined, fallback: readonly string[]): string[] {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : [...fallback];
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

import * as z from 'zod';

const flag = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase()));

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const list = z
  .string()
  .optional()
  .transform((value) => (value ?? '').split(',').map((item) => item.trim()).filter(Boolean));

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOSTNAME: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  ENVIRONMENT: z.string().default('production'),
  KV_PERSIST: flag,
  LOG_FILE: optionalText,

  COMPLETION_PROVIDER: z.enum(['OpenAI', 'Azure OpenAI']).default('Azure OpenAI'),
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: optionalText,
  AZURE_OPENAI_ENDPOINT: optionalText,
  AZURE_OPENAI_KEY: optionalText,
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalText,
  AZURE_OPENAI_API_VERSION: z.string().default('2025-01-01-preview'),
  COMPLETION_MAX_TOKENS: z.coerce.number().int().positive().default(4000),

  AZURE_DEVOPS_ORG: optionalText,
  AZURE_DEVOPS_PROJECT: optionalText,
  AZURE_DEVOPS_PAT: optionalText,
  REPOSITORY_CONFIG_FILE: optionalText,

  RESEARCH_MAX_ROUNDS: z.coerce.number().int().min(1).max(10).default(5),
  RESEARCH_KEYWORD_LIMIT: z.coerce.number().int().min(1).max(20).default(5),
  RESEARCH_TIMEOUT_MS: z.coerce.number().int().min(0).max(2_147_483_647).default(300_000),
  RESEARCH_EVENT_BUFFER: z.coerce.number().int().min(1).default(64),
  RESEARCH_STOP_ON_NO_NEW_HITS: flag,

  SEARCH_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  SEARCH_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(7 * 24 * 3600),

  ALLOWED_UI_ORIGINS: list,
  STRICT_REFERER_CHECK: flag,
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export type CompletionProvider = ServerEnv['COMPLETION_PROVIDER'];

export interface ServerConfig {
  port: number;
  hostname: string;
  logLevel: ServerEnv['LOG_LEVEL'];
  /** JSON lines are appended here as well as printed, when set. */
  logFile?: string;
  environment: string;
  /** Keep notes and cached file contents in data/kv-codescout.json across restarts. */
  persistKv: boolean;
  completion: {
    provider: CompletionProvider;
    maxTokens: number;
    openai: { apiKey?: string; model: string; baseURL?: string };
    azure: { endpoint?: string; apiKey?: string; deployment?: string; apiVersion: string };
  };
  devops: { organization?: string; project?: string; pat?: string; maxRetries: number; cacheTtlSeconds: number };
  repositoryConfigFile?: string;
  research: { maxRounds: number; keywordLimit: number; timeoutMs: number; bufferSize: number; stopOnNoNewHits: boolean };
  referer: { allowedOrigins: string[]; strict: boolean };
}

export const DEFAULT_ALLOWED_ORIGINS = ['localhost', '127.0.0.1'];

/** Validates the process environment. Throws a readable error naming every bad variable. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid server configuration (${problems.join('; ')})`);
  }

  const value = parsed.data;

  return {
    port: value.PORT,
    hostname: value.HOSTNAME,
    logLevel: value.LOG_LEVEL,
    logFile: value.LOG_FILE,
    environment: value.ENVIRONMENT,
    persistKv: value.KV_PERSIST,
    completion: {
      provider: value.COMPLETION_PROVIDER,
      maxTokens: value.COMPLETION_MAX_TOKENS,
      openai: { apiKey: value.OPENAI_API_KEY, model: value.OPENAI_MODEL, baseURL: value.OPENAI_BASE_URL },
      azure: {
        endpoint: value.AZURE_OPENAI_ENDPOINT,
        apiKey: value.AZURE_OPENAI_KEY,
        deployment: value.AZURE_OPENAI_DEPLOYMENT_NAME,
        apiVersion: value.AZURE_OPENAI_API_VERSION,
      },
    },
    devops: {
      organization: value.AZURE_DEVOPS_ORG,
      project: value.AZURE_DEVOPS_PROJECT,
      pat: value.AZURE_DEVOPS_PAT,
      maxRetries: value.SEARCH_MAX_RETRIES,
      cacheTtlSeconds: value.SEARCH_CACHE_TTL_SECONDS,
    },
    repositoryConfigFile: value.REPOSITORY_CONFIG_FILE,
    research: {
      maxRounds: value.RESEARCH_MAX_ROUNDS,
      keywordLimit: value.RESEARCH_KEYWORD_LIMIT,
      timeoutMs: value.RESEARCH_TIMEOUT_MS,
      bufferSize: value.RESEARCH_EVENT_BUFFER,
      stopOnNoNewHits: value.RESEARCH_STOP_ON_NO_NEW_HITS,
    },
    referer: {
      allowedOrigins: value.ALLOWED_UI_ORIGINS.length ? value.ALLOWED_UI_ORIGINS : DEFAULT_ALLOWED_ORIGINS,
      strict: value.STRICT_REFERER_CHECK,
    },
  };
}

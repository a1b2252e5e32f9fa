import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LLM_PROVIDER: z.enum(['openai', 'gemini']).default('openai'),
  GROQ_API_KEY: z.string().optional(),
  GROQ_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  VISION_MODEL: z.string().default('llama-3.2-90b-vision-preview'),
  RECOMMENDATION_MODEL: z.string().default('llama3-70b-8192'),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  GEMINI_API_VERSION: z.string().default('v1beta'),
  GEMINI_BASE_URL: z.string().url().optional(),
  VISION_TIMEOUT_MS: positiveInt(30_000),
  VISION_MAX_TOKENS: positiveInt(1000),
  RECOMMENDATION_TIMEOUT_MS: positiveInt(20_000),
  RECOMMENDATION_MAX_TOKENS: positiveInt(500),
  RECOMMENDATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  OPENFDA_URL: z.string().url().default('https://api.fda.gov/drug/label.json'),
  OPENFDA_API_KEY: z.string().optional(),
  OPENFDA_LIMIT: positiveInt(5),
  OPENFDA_TIMEOUT_MS: positiveInt(10_000),
  MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),
});

type Env = z.infer<typeof envSchema>;

export interface OpenAiLlmConfig {
  readonly provider: 'openai';
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly visionModel: string;
  readonly recommendationModel: string;
  readonly maxRetries: number;
}

export interface GeminiLlmConfig {
  readonly provider: 'gemini';
  readonly apiKey: string;
  readonly model: string;
  readonly apiVersion: string;
  readonly baseUrl?: string;
}

export type LlmConfig = OpenAiLlmConfig | GeminiLlmConfig;

export interface VisionConfig {
  readonly timeoutMs: number;
  readonly maxTokens: number;
}

export interface RecommendationConfig {
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly temperature: number;
}

export interface OpenFdaConfig {
  readonly url: string;
  readonly apiKey?: string;
  readonly limit: number;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly port: number;
  readonly llm: LlmConfig;
  readonly vision: VisionConfig;
  readonly recommendation: RecommendationConfig;
  readonly openFda: OpenFdaConfig;
  readonly upload: { readonly maxFileSizeBytes: number };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

const requireKey = (value: string | undefined, name: string, provider: string): string => {
  if (!value) {
    throw new ConfigError(`${name} is required when LLM_PROVIDER=${provider}.`);
  }
  return value;
};

const buildLlmConfig = (env: Env): LlmConfig => {
  if (env.LLM_PROVIDER === 'gemini') {
    return Object.freeze({
      provider: 'gemini',
      apiKey: requireKey(env.GEMINI_API_KEY, 'GEMINI_API_KEY', 'gemini'),
      model: env.GEMINI_MODEL,
      apiVersion: env.GEMINI_API_VERSION,
      baseUrl: env.GEMINI_BASE_URL,
    });
  }

  return Object.freeze({
    provider: 'openai',
    apiKey: requireKey(env.GROQ_API_KEY, 'GROQ_API_KEY', 'openai'),
    baseUrl: env.GROQ_BASE_URL,
    visionModel: env.VISION_MODEL,
    recommendationModel: env.RECOMMENDATION_MODEL,
    maxRetries: env.LLM_MAX_RETRIES,
  });
};

/**
 * Reads the process environment once and returns an immutable configuration
 * that is handed to each collaborator. Blank variables count as unset.
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const present = Object.fromEntries(
    Object.entries(source).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== ''
    )
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(issues);
  }

  const env = parsed.data;
  return Object.freeze({
    port: env.PORT,
    llm: buildLlmConfig(env),
    vision: Object.freeze({
      timeoutMs: env.VISION_TIMEOUT_MS,
      maxTokens: env.VISION_MAX_TOKENS,
    }),
    recommendation: Object.freeze({
      timeoutMs: env.RECOMMENDATION_TIMEOUT_MS,
      maxTokens: env.RECOMMENDATION_MAX_TOKENS,
      temperature: env.RECOMMENDATION_TEMPERATURE,
    }),
    openFda: Object.freeze({
      url: env.OPENFDA_URL,
      apiKey: env.OPENFDA_API_KEY,
      limit: env.OPENFDA_LIMIT,
      timeoutMs: env.OPENFDA_TIMEOUT_MS,
    }),
    upload: Object.freeze({ maxFileSizeBytes: env.MAX_UPLOAD_BYTES }),
  });
};

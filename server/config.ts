import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

export const TEXT_GENERATOR_BACKENDS = ['ollama', 'huggingface', 'openai', 'anthropic', 'gemini', 'none'] as const;

export type TextGeneratorBackend = (typeof TEXT_GENERATOR_BACKENDS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'http']).default('info'),
  LOG_DIR: z.string().optional(),

  TEXT_GENERATOR: z.enum(TEXT_GENERATOR_BACKENDS).default('ollama'),

  // Local Ollama server (OpenAI-compatible endpoint)
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('mistral:7b'),

  // Hugging Face router (OpenAI-compatible endpoint)
  HF_TOKEN: z.string().optional(),
  HF_BASE_URL: z.string().url().default('https://router.huggingface.co/v1'),
  HF_MODEL: z.string().default('mistralai/Mistral-7B-Instruct-v0.2'),

  // Hosted APIs
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),

  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(768),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  RANDOM_SEED: z.coerce.number().int().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface LoadedConfig {
  env: Env;
  warnings: string[];
}

export class ConfigError extends Error {
  code = "CONFIG_INVALID";
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const requiredKeys: Partial<Record<TextGeneratorBackend, keyof Env>> = {
  huggingface: 'HF_TOKEN',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(fromZodError(result.error).message);
  }

  const env = result.data;
  const warnings: string[] = [];

  const keyName = requiredKeys[env.TEXT_GENERATOR];
  if (keyName && !env[keyName]) {
    warnings.push(`${keyName} not set - ${env.TEXT_GENERATOR} generation will fall back to built-in generators`);
  }

  if (env.TEXT_GENERATOR === 'none') {
    warnings.push('TEXT_GENERATOR is none - using built-in generators only');
  }

  return { env, warnings };
}

import { z } from 'zod';
import { LOCALES } from '../core/nlp/types.js';
import { ConfigError } from '../utils/errors.js';

const confidence = z.coerce.number().min(0).max(1);

const localeList = z
  .string()
  .transform((value) => value.split(',').map((locale) => locale.trim()).filter(Boolean))
  .pipe(z.array(z.enum(LOCALES)).min(1));

const configSchema = z
  .object({
    // App
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().positive().default(8001),

    // Interpreter
    locales: localeList.default('es,en'),
    defaultLocale: z.enum(LOCALES).default('es'),
    lexiconDir: z.string().default('data/lexicon'),
    intentThreshold: confidence.default(0.8),
    deviceThreshold: confidence.default(0.7),
    leadingMatchBonus: confidence.default(0.05),

    // Fallback interpreter
    fallbackProvider: z.enum(['anthropic', 'ollama', 'http', 'disabled']).default('disabled'),
    fallbackTimeoutMs: z.coerce.number().int().positive().default(8000),
    anthropicApiKey: z.string().min(1).optional(),
    llmFallbackModel: z.string().optional(),
    ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
    ollamaModel: z.string().default('llama3.2'),
    fallbackUrl: z.string().url().optional(),

    // Device vocabulary
    devicesSource: z.enum(['json', 'database']).default('json'),
    devicesFile: z.string().default('data/devices.json'),
    databasePath: z.string().optional(),
    vocabularyRefreshCron: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.locales.includes(value.defaultLocale)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultLocale'],
        message: `must be one of the enabled locales (${value.locales.join(', ')})`,
      });
    }
    if (value.fallbackProvider === 'anthropic' && !value.anthropicApiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['anthropicApiKey'],
        message: 'required when FALLBACK_PROVIDER=anthropic',
      });
    }
    if (value.fallbackProvider === 'http' && !value.fallbackUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fallbackUrl'],
        message: 'required when FALLBACK_PROVIDER=http',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
export type FallbackProvider = Config['fallbackProvider'];

export function parseConfig(source: NodeJS.ProcessEnv): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    locales: env('LOCALES'),
    defaultLocale: env('DEFAULT_LOCALE'),
    lexiconDir: env('LEXICON_DIR'),
    intentThreshold: env('INTENT_THRESHOLD'),
    deviceThreshold: env('DEVICE_THRESHOLD'),
    leadingMatchBonus: env('LEADING_MATCH_BONUS'),
    fallbackProvider: env('FALLBACK_PROVIDER'),
    fallbackTimeoutMs: env('FALLBACK_TIMEOUT_MS'),
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmFallbackModel: env('LLM_FALLBACK_MODEL'),
    ollamaBaseUrl: env('OLLAMA_BASE_URL'),
    ollamaModel: env('OLLAMA_MODEL'),
    fallbackUrl: env('FALLBACK_URL'),
    devicesSource: env('DEVICES_SOURCE'),
    devicesFile: env('DEVICES_FILE'),
    databasePath: env('DATABASE_PATH'),
    vocabularyRefreshCron: env('VOCABULARY_REFRESH_CRON'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

export const config = parseConfig(process.env);

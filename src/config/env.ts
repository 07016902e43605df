import { z } from 'zod';

// Process configuration, parsed once from the environment.
const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  EVENTS_PATH: z.string().min(1).default('data/strategy-events.json'),
  MAX_PRICE_AGE_SECONDS: z.coerce.number().int().positive().default(86_400),
  DEFAULT_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).default(50),
});

export type AppConfig = z.infer<typeof EnvSchema>;

let cached: AppConfig | undefined;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}

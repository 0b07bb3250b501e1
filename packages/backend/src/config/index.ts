import { z } from 'zod';

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess(
    (val) => (typeof val === 'string' ? val !== 'false' : val),
    z.boolean().default(defaultValue)
  );

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().default(3000),
  host: z.string().default('0.0.0.0'),

  // Database
  databaseUrl: z.string(),
  databasePoolMax: z.coerce.number().int().positive().default(10),

  // Redis (sweep locks only)
  redisUrl: z.string().default('redis://localhost:6379'),

  // Shared secrets
  adminSecret: z.string().min(8),
  webhookSecret: z.string().min(8),

  // Language model
  anthropicApiKey: z.string().default(''),
  anthropicModel: z.string().default('claude-haiku-4-5'),

  // Spreadsheet mirror
  googleSheetId: z.string().default(''),
  googleCredentialsFile: z.string().default('credentials.json'),

  // Channels
  telegramBotToken: z.string().default(''),

  // Projects catalogue (specialists, services, work hours)
  projectsFile: z.string().default('config/projects.json'),

  cors: z.object({
    origin: z.string().default('*'),
    credentials: booleanFromEnv(false),
  }).default({}),

  // Rate limiting
  rateLimitMax: z.coerce.number().default(200),
  rateLimitWindow: z.coerce.number().default(60000), // 1 minute

  // Logging
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Timezone used for "today" when sweeping the mirror and prompting the assistant
  timezone: z.string().default('Europe/Kyiv'),

  mirror: z.object({
    reconcileEnabled: booleanFromEnv(true),
    reconcileIntervalMs: z.coerce.number().default(5 * 60 * 1000),
    reconcileDays: z.coerce.number().int().positive().default(14),
  }).default({}),
});

function loadConfig() {
  const rawConfig = {
    env: process.env.NODE_ENV,
    port: process.env.PORT,
    host: process.env.HOST,
    databaseUrl: process.env.DATABASE_URL,
    databasePoolMax: process.env.DATABASE_POOL_MAX,
    redisUrl: process.env.REDIS_URL,
    adminSecret: process.env.ADMIN_SECRET,
    webhookSecret: process.env.WEBHOOK_SECRET,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY,
    anthropicModel: process.env.ANTHROPIC_MODEL,
    googleSheetId: process.env.GOOGLE_SHEET_ID,
    googleCredentialsFile: process.env.GOOGLE_CREDENTIALS_FILE,
    telegramBotToken: process.env.TELEGRAM_BOT_TOKEN,
    projectsFile: process.env.PROJECTS_FILE,
    cors: {
      origin: process.env.CORS_ORIGIN,
      credentials: process.env.CORS_CREDENTIALS,
    },
    rateLimitMax: process.env.RATE_LIMIT_MAX,
    rateLimitWindow: process.env.RATE_LIMIT_WINDOW,
    logLevel: process.env.LOG_LEVEL,
    timezone: process.env.TIMEZONE,
    mirror: {
      reconcileEnabled: process.env.MIRROR_RECONCILE_ENABLED,
      reconcileIntervalMs: process.env.MIRROR_RECONCILE_INTERVAL_MS,
      reconcileDays: process.env.MIRROR_RECONCILE_DAYS,
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    // Logger depends on config, so validation errors go to stderr directly.
    console.error('Configuration validation failed:', error);
    process.exit(1);
  }
}

export const config = loadConfig();

export type Config = z.infer<typeof configSchema>;

import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toBool = (fallback: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    if (typeof v === 'boolean') return v;
    const s = String(v).toLowerCase().trim();
    return ['1', 'true', 'yes', 'y', 'on'].includes(s);
  }, z.boolean());

const toOptionalString = () =>
  z.preprocess((v) => (v === undefined || v === '' ? undefined : v), z.string().optional());

// "0,1000,500,1000" -> [0, 1000, 500, 1000]
const toPattern = (fallback: number[]) =>
  z.preprocess(
    (v) => {
      if (v === undefined || v === '') return fallback;
      return String(v)
        .split(',')
        .map((part) => Number(part.trim()));
    },
    z.array(z.number().int().nonnegative()).min(1),
  );

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),

  BUS_TRANSPORT: z.enum(['memory', 'redis']).default('memory'),
  BUS_CHANNEL_PREFIX: z.string().default('alerts'),

  QUEUE_ENABLED: toBool(true),
  QUEUE_CONCURRENCY: toNumber(1),
  QUEUE_MAX_ATTEMPTS: toNumber(3),

  EVENTS_WEBHOOK_SECRET: toOptionalString(),

  BACKEND_URL: toOptionalString(),
  BACKEND_COOKIE: toOptionalString(),

  PENDING_STORE: z.enum(['memory', 'redis']).default('redis'),
  // 0 keeps a pending decision until it is delivered
  PENDING_DECISION_TTL_SEC: toNumber(0),

  ALERT_SOUND_FILE: z.string().default('assets/order_alert.wav'),
  ALERT_PLAYER_CMD: z.string().default('paplay'),
  ALERT_VOLUME_GET_CMD: toOptionalString(),
  ALERT_VOLUME_SET_CMD: toOptionalString(),
  ALERT_MIXER_TIMEOUT_MS: toNumber(3000),
  ALERT_VIBRATION_PATTERN: toPattern([0, 1000, 500, 1000, 500, 1000]),

  ALERT_SLIDE_THRESHOLD_RATIO: toNumber(0.35).pipe(z.number().gt(0).lte(1)),
  ALERT_TRACK_WIDTH: toNumber(360),
  ALERT_THUMB_SIZE: toNumber(60),
  ALERT_TRACK_PADDING: toNumber(6),
  ALERT_CURRENCY_SYMBOL: z.string().default('₹'),

  ALERT_DEDUP_WINDOW_SEC: toNumber(600),
  ALERT_RESOLVED_HISTORY: toNumber(50),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();

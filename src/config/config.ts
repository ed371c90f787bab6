import 'dotenv/config';
import { z } from 'zod';
import { setLogLevel } from '../utils/logger';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);

export const SERVER_PORTS = {
  booking: 5001,
  places: 5002,
  trip_planner: 5003,
  weather: 5004,
} as const;

export const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  AGENT_MODEL: z.string().default('gpt-4.1-mini'),
  GUARDRAIL_MODEL: z.string().default('gpt-4o-mini'),

  BOOKING_API_KEY: optionalString,
  GOOGLE_PLACES_API_KEY: optionalString,

  WEATHER_SERVER_URL: z.string().url().default(`http://localhost:${SERVER_PORTS.weather}/mcp`),
  BOOKING_SERVER_URL: z.string().url().default(`http://localhost:${SERVER_PORTS.booking}/mcp`),
  PLACES_SERVER_URL: z.string().url().default(`http://localhost:${SERVER_PORTS.places}/mcp`),
  PLANNER_SERVER_URL: z.string().url().default(`http://localhost:${SERVER_PORTS.trip_planner}/mcp`),

  WEATHER_PORT: port(SERVER_PORTS.weather),
  BOOKING_PORT: port(SERVER_PORTS.booking),
  PLACES_PORT: port(SERVER_PORTS.places),
  PLANNER_PORT: port(SERVER_PORTS.trip_planner),
  MCP_HOST: z.string().default('127.0.0.1'),

  PORT: port(7860),
  HOST: z.string().default('0.0.0.0'),

  CHAT_STORE: z.enum(['file', 'redis']).default('file'),
  CHAT_DATA_DIR: z.string().default('data/chats'),
  CHAT_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24 * 7),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

let cached: AppConfig | undefined;

/** Process-wide config; the first call also applies LOG_LEVEL to every logger. */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
    setLogLevel(cached.LOG_LEVEL);
  }
  return cached;
}

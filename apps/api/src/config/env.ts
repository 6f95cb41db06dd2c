import 'dotenv/config';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';

/**
 * Process configuration.
 * Every value can be overridden from the environment (or a .env file).
 */
const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(5000),
  CORS_ORIGIN: z.string().default('*'),

  MQTT_BROKER: z.string().min(1).default('broker.hivemq.com'),
  MQTT_PORT: z.coerce.number().int().min(1).max(65_535).default(1883),
  MQTT_TOPIC_SUBSCRIBE: z.string().min(1).default('pool/data'),
  MQTT_CLIENT_ID: z.string().min(1).optional(),

  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65_535).default(5432),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().min(1).default('pool_monitor_db'),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  mqtt: {
    host: string;
    port: number;
    topic: string;
    clientId: string;
  };
  db: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    connectionTimeoutMillis: number;
  };
}

/** Throws ZodError when a variable is present but invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    mqtt: {
      host: parsed.MQTT_BROKER,
      port: parsed.MQTT_PORT,
      topic: parsed.MQTT_TOPIC_SUBSCRIBE,
      clientId: parsed.MQTT_CLIENT_ID ?? `poolwatch-api-${randomBytes(4).toString('hex')}`,
    },
    db: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      database: parsed.DB_NAME,
      connectionTimeoutMillis: parsed.DB_CONNECT_TIMEOUT_MS,
    },
  };
}

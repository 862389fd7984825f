import dotenv from 'dotenv';
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';

dotenv.config();

export type StorageKind = 'memory' | 'mongo';
export type DateFallbackPolicy = 'reprompt' | 'next-day-9am';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: 'silent' | 'debug' | 'info' | 'warn' | 'error';
  storage: StorageKind;
  mongoUri?: string;
  assistant: {
    businessName: string;
    timezone: string;
    dateFallback: DateFallbackPolicy;
  };
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['silent', 'debug', 'info', 'warn', 'error']).optional(),
  STORAGE: z.enum(['memory', 'mongo']).default('memory'),
  MONGODB_URI: z.string().min(1).optional(),
  BUSINESS_NAME: z.string().min(1).default('Slotline'),
  TIMEZONE: z.string().min(1).refine(zone => IANAZone.isValidZone(zone), 'Unknown IANA time zone').default('UTC'),
  DATE_FALLBACK: z.enum(['reprompt', 'next-day-9am']).default('reprompt')
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const values = parsed.data;
  if (values.STORAGE === 'mongo' && !values.MONGODB_URI) {
    throw new ConfigError('MONGODB_URI environment variable is not defined');
  }

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'test' ? 'silent' : 'info'),
    storage: values.STORAGE,
    mongoUri: values.MONGODB_URI,
    assistant: {
      businessName: values.BUSINESS_NAME,
      timezone: values.TIMEZONE,
      dateFallback: values.DATE_FALLBACK
    }
  };
}

export const config = loadConfig();

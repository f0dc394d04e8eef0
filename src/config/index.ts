/**
 * Configuration Module
 *
 * Loads and validates the environment variables that supply runtime
 * defaults (locale, currency, log level). Uses Zod for validation with
 * sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Culture used by extraction, comparison and formatting when a config omits it
  PIPELINE_LOCALE: z
    .string()
    .min(2)
    .refine((tag) => isSupportedLocale(tag), { message: 'Unknown locale tag' })
    .default('en-US'),

  // ISO 4217 code used by currency formatting
  PIPELINE_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, 'Expected a three-letter ISO 4217 code')
    .default('USD'),

  PIPELINE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),

  // Any non-empty value disables colour (https://no-color.org)
  NO_COLOR: z.string().optional(),
});

type Env = z.infer<typeof envSchema>;

function isSupportedLocale(tag: string): boolean {
  try {
    return Intl.getCanonicalLocales(tag).length === 1;
  } catch {
    return false;
  }
}

function buildConfig(env: Env) {
  return Object.freeze({
    // Formatting defaults
    locale: env.PIPELINE_LOCALE,
    currency: env.PIPELINE_CURRENCY,

    // Output
    logLevel: env.PIPELINE_LOG_LEVEL,
    color: env.NO_COLOR === undefined || env.NO_COLOR === '',
  });
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Parse an environment record into a frozen configuration object.
 *
 * @throws ConfigurationError when a variable is present but malformed
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
  const parseResult = envSchema.safeParse(source);
  if (!parseResult.success) {
    throw ConfigurationError.fromZodError('environment variables', parseResult.error);
  }
  return buildConfig(parseResult.data);
}

/**
 * Application configuration singleton
 */
export const config: Config = loadConfig(process.env);

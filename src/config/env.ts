import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const currencyCode = z.string().regex(/^[A-Z]{3}$/, 'Expected a 3-letter ISO currency code');

const envSchema = z.object({
  NODE_ENV: z.string().optional().default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  RYANAIR_API_URL: z.string().url().default('https://www.ryanair.com/api'),
  RYANAIR_MARKET: z.string().min(2).default('en-gb'),
  OUTBOUND_CURRENCY: currencyCode.default('GBP'),
  RETURN_CURRENCY: currencyCode.default('EUR'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(0),
  SEARCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  SEARCH_TTL_MINUTES: z.coerce.number().positive().default(30),
  RESULTS_PER_PAGE: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_FILE: z.string().optional()
});

export type EnvVars = z.infer<typeof envSchema>;

export interface AppConfig {
  env: string;
  port: number;
  ryanair: {
    baseUrl: string;
    market: string;
    timeoutMs: number;
    requestDelayMs: number;
  };
  search: {
    outboundCurrency: string;
    returnCurrency: string;
    concurrency: number;
    ttlMinutes: number;
    resultsPerPage: number;
  };
  logging: {
    level: EnvVars['LOG_LEVEL'];
    file?: string;
  };
}

/**
 * Parses environment variables into the application config.
 * Throws when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    ryanair: {
      baseUrl: vars.RYANAIR_API_URL.replace(/\/$/, ''),
      market: vars.RYANAIR_MARKET,
      timeoutMs: vars.REQUEST_TIMEOUT_MS,
      requestDelayMs: vars.REQUEST_DELAY_MS
    },
    search: {
      outboundCurrency: vars.OUTBOUND_CURRENCY,
      returnCurrency: vars.RETURN_CURRENCY,
      concurrency: vars.SEARCH_CONCURRENCY,
      ttlMinutes: vars.SEARCH_TTL_MINUTES,
      resultsPerPage: vars.RESULTS_PER_PAGE
    },
    logging: {
      level: vars.LOG_LEVEL,
      file: vars.LOG_FILE
    }
  };
}

export const config = loadConfig();

export default config;

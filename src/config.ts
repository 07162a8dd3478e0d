import { z } from 'zod';
import type { Config, HourWindow } from './types.js';

const positiveInt = z.string().transform(Number).pipe(z.number().int().positive());
const hour = z.string().transform(Number).pipe(z.number().int().min(0).max(23));

const envSchema = z
  .object({
    DISCORD_TOKEN: z.string().min(1),
    DISCORD_CLIENT_ID: z.string().min(1),
    DISCORD_GUILD_ID: z.string().optional(),
    STOCK_API_URL: z.string().url(),
    STOCK_API_SESSION_URL: z.string().url().optional(),
    STOCK_API_PREFERENCES_URL: z.string().url().optional(),
    STOCK_API_STORE: z.string().min(1).optional(),
    STOCK_API_TIMEOUT_MS: positiveInt.default('15000'),
    POLL_INTERVAL_SECONDS: positiveInt.default('120'),
    PEAK_POLL_INTERVAL_SECONDS: positiveInt.optional(),
    PEAK_HOURS_START: hour.optional(),
    PEAK_HOURS_END: hour.optional(),
    QUIET_HOURS_START: hour.optional(),
    QUIET_HOURS_END: hour.optional(),
    SCHEDULE_TIMEZONE: z.string().min(1).default('UTC'),
    SEND_CONCURRENCY: positiveInt.default('3'),
    SEND_RATE_LIMIT: positiveInt.default('5'),
    SHUTDOWN_TIMEOUT_MS: positiveInt.default('10000'),
    DATA_DIR: z.string().min(1).default('./data'),
    CATALOG_PATH: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    const pairs = [
      ['PEAK_HOURS_START', 'PEAK_HOURS_END'],
      ['QUIET_HOURS_START', 'QUIET_HOURS_END'],
    ] as const;
    if ((env.STOCK_API_PREFERENCES_URL === undefined) !== (env.STOCK_API_STORE === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.STOCK_API_STORE === undefined ? 'STOCK_API_STORE' : 'STOCK_API_PREFERENCES_URL'],
        message: 'STOCK_API_PREFERENCES_URL and STOCK_API_STORE must be set together',
      });
    }
    if (env.STOCK_API_PREFERENCES_URL !== undefined && env.STOCK_API_SESSION_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STOCK_API_SESSION_URL'],
        message: 'STOCK_API_PREFERENCES_URL requires STOCK_API_SESSION_URL',
      });
    }
    for (const [start, end] of pairs) {
      if ((env[start] === undefined) !== (env[end] === undefined)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [env[start] === undefined ? start : end],
          message: `${start} and ${end} must be set together`,
        });
      }
    }
    if (env.PEAK_POLL_INTERVAL_SECONDS !== undefined && env.PEAK_HOURS_START === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PEAK_HOURS_START'],
        message: 'PEAK_POLL_INTERVAL_SECONDS requires PEAK_HOURS_START and PEAK_HOURS_END',
      });
    }
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: env.SCHEDULE_TIMEZONE });
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SCHEDULE_TIMEZONE'],
        message: `Unknown timezone: ${env.SCHEDULE_TIMEZONE}`,
      });
    }
  });

function hourWindow(start: number | undefined, end: number | undefined): HourWindow | undefined {
  if (start === undefined || end === undefined) return undefined;
  return { start, end };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = envSchema.parse(source);

  return {
    discord: {
      token: env.DISCORD_TOKEN,
      clientId: env.DISCORD_CLIENT_ID,
      guildId: env.DISCORD_GUILD_ID,
    },
    stockApi: {
      url: env.STOCK_API_URL,
      sessionUrl: env.STOCK_API_SESSION_URL,
      preferences:
        env.STOCK_API_PREFERENCES_URL !== undefined && env.STOCK_API_STORE !== undefined
          ? { url: env.STOCK_API_PREFERENCES_URL, store: env.STOCK_API_STORE }
          : undefined,
      timeoutMs: env.STOCK_API_TIMEOUT_MS,
    },
    monitoring: {
      pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
      peakPollIntervalSeconds: env.PEAK_POLL_INTERVAL_SECONDS,
      peakHours: hourWindow(env.PEAK_HOURS_START, env.PEAK_HOURS_END),
      quietHours: hourWindow(env.QUIET_HOURS_START, env.QUIET_HOURS_END),
      timezone: env.SCHEDULE_TIMEZONE,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    },
    delivery: {
      sendConcurrency: env.SEND_CONCURRENCY,
      sendRateLimit: env.SEND_RATE_LIMIT,
    },
    dataDir: env.DATA_DIR,
    catalogPath: env.CATALOG_PATH,
    logLevel: env.LOG_LEVEL,
  };
}

import { z } from 'zod';

function isTruthy(value: string | undefined | null): boolean {
  if (!value) return false;
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    default:
      return false;
  }
}

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? fallback : isTruthy(value)));

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Parses "90", "15m", "12h" or "7d" into seconds. */
export function parseDurationSeconds(value: string): number | null {
  const match = /^(\d+)\s*([smhd])?$/.exec(value.trim());
  if (!match) return null;
  const amount = Number(match[1]);
  const unit = match[2] ?? 's';
  const seconds = amount * DURATION_UNITS[unit];
  return seconds > 0 ? seconds : null;
}

const duration = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const seconds = parseDurationSeconds(value);
      if (seconds === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a duration such as 900, 15m, 12h or 7d' });
        return z.NEVER;
      }
      return seconds;
    });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  BASE_URL: z.string().url().default('http://localhost:3000'),
  DATABASE_URL: z.string().min(1).default('postgres://qa:qa@localhost:5432/classroom_qa'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_SSL: booleanFlag(false),
  DB_LOG_SQL: booleanFlag(false),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  JWT_SECRET: z.string().min(1).default('change-me'),
  JWT_EXPIRES_IN: duration('7d'),
  MEETING_TOKEN_EXPIRES_IN: duration('12h'),
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),
  PROFANITY_FILTER_ENABLED: booleanFlag(true),
  MODERATION_REQUIRE_APPROVAL: booleanFlag(false),
  REGISTRATION_ENABLED: booleanFlag(true),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  BROADCAST_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RATE_LIMIT_DISABLED: booleanFlag(false),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface AppConfig {
  readonly env: 'development' | 'test' | 'production';
  readonly port: number;
  readonly baseUrl: string;
  readonly database: {
    readonly connectionString: string;
    readonly poolMin: number;
    readonly poolMax: number;
    readonly ssl: boolean;
    readonly logSql: boolean;
    readonly connectionTimeoutMs: number;
  };
  readonly auth: {
    readonly jwtSecret: string;
    readonly accessTokenTtlSeconds: number;
    readonly meetingTokenTtlSeconds: number;
    readonly registrationEnabled: boolean;
    readonly passwordHashRounds: number;
  };
  readonly corsOrigins: readonly string[];
  readonly moderation: {
    readonly profanityFilterEnabled: boolean;
    readonly requireApproval: boolean;
  };
  readonly broadcast: {
    readonly sendTimeoutMs: number;
  };
  readonly rateLimitDisabled: boolean;
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse environment variables into a frozen AppConfig.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;
  if (e.NODE_ENV === 'production' && e.JWT_SECRET === 'change-me') {
    throw new ConfigError('Invalid configuration: JWT_SECRET must be set in production', ['JWT_SECRET']);
  }
  return Object.freeze({
    env: e.NODE_ENV,
    port: e.PORT,
    baseUrl: e.BASE_URL.replace(/\/+$/, ''),
    database: Object.freeze({
      connectionString: e.DATABASE_URL,
      poolMin: e.DB_POOL_MIN,
      poolMax: e.DB_POOL_MAX,
      ssl: e.DB_SSL,
      logSql: e.DB_LOG_SQL,
      connectionTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
    }),
    auth: Object.freeze({
      jwtSecret: e.JWT_SECRET,
      accessTokenTtlSeconds: e.JWT_EXPIRES_IN,
      meetingTokenTtlSeconds: e.MEETING_TOKEN_EXPIRES_IN,
      registrationEnabled: e.REGISTRATION_ENABLED,
      passwordHashRounds: e.BCRYPT_ROUNDS,
    }),
    corsOrigins: Object.freeze(
      e.CORS_ORIGINS.split(',')
        .map((o) => o.trim())
        .filter(Boolean)
    ),
    moderation: Object.freeze({
      profanityFilterEnabled: e.PROFANITY_FILTER_ENABLED,
      requireApproval: e.MODERATION_REQUIRE_APPROVAL,
    }),
    broadcast: Object.freeze({ sendTimeoutMs: e.BROADCAST_SEND_TIMEOUT_MS }),
    rateLimitDisabled: e.RATE_LIMIT_DISABLED,
    logLevel: e.LOG_LEVEL,
  });
}

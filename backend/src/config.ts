import nconf from 'nconf';
import { z } from 'zod';

const truthy = new Set(['1', 'true', 'yes', 'on']);

const BooleanFlag = z
  .union([z.boolean(), z.string(), z.number()], {
    invalid_type_error: 'must be a boolean flag.',
  })
  .optional()
  .transform((value) => {
    if (value === undefined) return false;
    if (typeof value === 'boolean') return value;
    return truthy.has(String(value).trim().toLowerCase());
  });

// "a b,c" -> ['a', 'b', 'c']
const WordList = (fallback: string) =>
  z
    .string({ invalid_type_error: 'must be a space or comma separated list.' })
    .optional()
    .transform((value) =>
      (value ?? fallback)
        .split(/[\s,]+/)
        .map((part) => part.trim())
        .filter(Boolean)
    );

export const ConfigSchema = z
  .object({
    PORT: z.coerce
      .number({ invalid_type_error: 'PORT must be a number.' })
      .int()
      .min(0)
      .max(65535)
      .default(8080),
    SECRET_KEY: z.string().optional(),
    DEBUG: BooleanFlag,
    ALLOWED_HOSTS: WordList('localhost 127.0.0.1'),
    CSRF_TRUSTED_ORIGINS: WordList(''),
    DATABASE_URL: z.string().min(1).default('sqlite:./data/oficina.db'),
    RESEND_API_KEY: z.string().default(''),
    EMAIL_FROM: z.string().default('no-reply@oficina.local'),
    CONTACT_EMAIL: z.string().default('suporte@oficina.local'),
    RESEND_TEST_FROM_EMAIL: z.string().default(''),
    RESEND_ALLOW_TEST_FALLBACK: BooleanFlag,
    TIME_ZONE: z
      .string()
      .default('America/Sao_Paulo')
      .refine((zone) => {
        try {
          new Intl.DateTimeFormat('en-CA', { timeZone: zone });
          return true;
        } catch {
          return false;
        }
      }, 'TIME_ZONE must be a valid IANA time zone.'),
    TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(12),
    PUBLIC_URL: z.string().url('PUBLIC_URL must be a URL.').default('http://localhost:8080'),
    LOG_FILE: z.string().default(''),
  })
  .superRefine((cfg, ctx) => {
    if (!cfg.SECRET_KEY && !cfg.DEBUG) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SECRET_KEY'],
        message: 'SECRET_KEY is required when DEBUG is off.',
      });
    }
  })
  .transform((cfg) => ({
    port: cfg.PORT,
    secretKey: cfg.SECRET_KEY || 'dev-secret-key',
    debug: cfg.DEBUG,
    allowedHosts: cfg.DEBUG
      ? [...cfg.ALLOWED_HOSTS, 'localhost', '127.0.0.1', '[::1]']
      : cfg.ALLOWED_HOSTS,
    trustedOrigins: cfg.CSRF_TRUSTED_ORIGINS,
    databaseUrl: cfg.DATABASE_URL,
    resendApiKey: cfg.RESEND_API_KEY.trim(),
    emailFrom: cfg.EMAIL_FROM.trim(),
    contactEmail: cfg.CONTACT_EMAIL.trim(),
    resendTestFromEmail: cfg.RESEND_TEST_FROM_EMAIL.trim(),
    resendAllowTestFallback: cfg.RESEND_ALLOW_TEST_FALLBACK,
    timeZone: cfg.TIME_ZONE,
    tokenTtlHours: cfg.TOKEN_TTL_HOURS,
    publicUrl: cfg.PUBLIC_URL.replace(/\/+$/, ''),
    logFile: cfg.LOG_FILE,
  }));

export type AppConfig = z.output<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const KEYS = [
  'PORT',
  'SECRET_KEY',
  'DEBUG',
  'ALLOWED_HOSTS',
  'CSRF_TRUSTED_ORIGINS',
  'DATABASE_URL',
  'RESEND_API_KEY',
  'EMAIL_FROM',
  'CONTACT_EMAIL',
  'RESEND_TEST_FROM_EMAIL',
  'RESEND_ALLOW_TEST_FALLBACK',
  'TIME_ZONE',
  'TOKEN_TTL_HOURS',
  'PUBLIC_URL',
  'LOG_FILE',
] as const;

/** Validate a raw key/value bag. Throws ConfigError listing every bad key. */
export function parseConfig(raw: Record<string, unknown>): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** argv > env > config file */
export function loadConfig(): AppConfig {
  const store = nconf
    .argv()
    .env()
    .file({ file: process.env.CONFIG_FILE || './config.json' });

  const raw: Record<string, unknown> = {};
  for (const key of KEYS) {
    const value: unknown = store.get(key);
    if (value !== undefined && value !== '') raw[key] = value;
  }
  return parseConfig(raw);
}

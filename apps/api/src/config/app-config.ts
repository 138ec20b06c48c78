import * as path from 'path';
import { z } from 'zod';

import { ConfigError } from '../common/errors';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface Credential {
  username: string;
  password: string;
}

export interface AppConfig {
  port: number;
  catalog: {
    path: string;
    bomSheet: string;
  };
  branding: {
    logoPath: string;
    companyName: string;
    referencePrefix: string;
  };
  auth: {
    credentials: Credential[];
    jwtSecret: string;
    jwtIssuer: string;
    jwtAudience: string;
    sessionTtlMinutes: number;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user?: string;
    password?: string;
  };
  mail: {
    from: string;
  };
  dispatch: {
    retry: boolean;
    retryDelayMs: number;
  };
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// Blank values (`SMTP_USER=` in a .env file) count as unset.
const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  RFQ_CATALOG_PATH: z.string().min(1).default('data/rfq-catalog.xlsx'),
  RFQ_CATALOG_BOM_SHEET: z.string().min(1).default('BOM'),
  RFQ_LOGO_PATH: z.string().min(1).default('assets/logo.png'),
  RFQ_COMPANY_NAME: z.string().min(1).default('RFQ Intake'),
  RFQ_REFERENCE_PREFIX: z.string().min(1).default('RFQ'),
  RFQ_CREDENTIALS: z.string().min(1, 'at least one user:password pair is required'),
  JWT_SECRET: z.string().min(1),
  JWT_ISSUER: z.string().min(1).default('rfq-intake'),
  JWT_AUDIENCE: z.string().min(1).default('rfq-intake-api'),
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(120),
  SMTP_HOST: z.string().min(1),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: flag.default('false'),
  SMTP_USER: optionalText,
  SMTP_PASSWORD: optionalText,
  MAIL_FROM: z.string().min(1),
  DISPATCH_RETRY: flag.default('true'),
  DISPATCH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

/**
 * Parses `user:password,user2:password2`. Passwords may contain `:`; usernames may not.
 */
export function parseCredentials(value: string): Credential[] {
  return value
    .split(',')
    .map((pair) => pair.trim())
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const separator = pair.indexOf(':');
      if (separator <= 0 || separator === pair.length - 1) {
        throw new ConfigError([`RFQ_CREDENTIALS: "${pair.split(':')[0]}" is not a user:password pair`]);
      }
      return { username: pair.slice(0, separator), password: pair.slice(separator + 1) };
    });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  const credentials = parseCredentials(e.RFQ_CREDENTIALS);
  if (credentials.length === 0) {
    throw new ConfigError(['RFQ_CREDENTIALS: no user:password pairs']);
  }

  return {
    port: e.PORT,
    catalog: {
      path: path.resolve(e.RFQ_CATALOG_PATH),
      bomSheet: e.RFQ_CATALOG_BOM_SHEET,
    },
    branding: {
      logoPath: path.resolve(e.RFQ_LOGO_PATH),
      companyName: e.RFQ_COMPANY_NAME,
      referencePrefix: e.RFQ_REFERENCE_PREFIX,
    },
    auth: {
      credentials,
      jwtSecret: e.JWT_SECRET,
      jwtIssuer: e.JWT_ISSUER,
      jwtAudience: e.JWT_AUDIENCE,
      sessionTtlMinutes: e.SESSION_TTL_MINUTES,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_SECURE,
      user: e.SMTP_USER,
      password: e.SMTP_PASSWORD,
    },
    mail: { from: e.MAIL_FROM },
    dispatch: {
      retry: e.DISPATCH_RETRY,
      retryDelayMs: e.DISPATCH_RETRY_DELAY_MS,
    },
  };
}

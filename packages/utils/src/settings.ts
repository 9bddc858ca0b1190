/**
 * Process settings
 *
 * Reads `.env` (when present) and validates the environment once.
 */

import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const SettingsSchema = z
  .object({
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    AUDIT_STORAGE: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
    RULE_CATALOG_PATH: z.string().min(1).optional(),
    ESCALATION_THRESHOLD: z.coerce.number().int().positive().default(10),
    REFERENCE_CURRENCY: z
      .string()
      .regex(/^[A-Za-z]{3}$/, 'must be a 3-letter currency code')
      .transform((code) => code.toUpperCase())
      .default('EUR'),
  })
  .superRefine((value, ctx) => {
    if (value.AUDIT_STORAGE === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when AUDIT_STORAGE is postgres',
      });
    }
  });

export type RawSettings = z.infer<typeof SettingsSchema>;

export interface Settings {
  logLevel: RawSettings['LOG_LEVEL'];
  auditStorage: RawSettings['AUDIT_STORAGE'];
  databaseUrl?: string;
  ruleCatalogPath?: string;
  escalationThreshold: number;
  referenceCurrency: string;
}

let envLoaded = false;

/**
 * Validate settings from the given environment. When no environment is
 * passed, `.env` in the working directory is loaded into `process.env` first.
 */
export function loadSettings(env?: NodeJS.ProcessEnv): Settings {
  if (!env && !envLoaded) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
    envLoaded = true;
  }

  const parsed = SettingsSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid settings', {
      issues: parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const raw = parsed.data;
  return {
    logLevel: raw.LOG_LEVEL,
    auditStorage: raw.AUDIT_STORAGE,
    databaseUrl: raw.DATABASE_URL,
    ruleCatalogPath: raw.RULE_CATALOG_PATH,
    escalationThreshold: raw.ESCALATION_THRESHOLD,
    referenceCurrency: raw.REFERENCE_CURRENCY,
  };
}

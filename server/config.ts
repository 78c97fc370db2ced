import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

import { GRANULARITIES, isGranularity } from './lib/chunkCalendar.js';
import { moduleLogger } from './logger.js';
import type { Granularity } from './lib/chunkCalendar.js';

// --- Server ---
export const PORT = Math.max(1, Number(process.env.PORT) || 3000);
export const HOST = String(process.env.HOST || '127.0.0.1').trim();

// --- Store ---
export const STORE_ROOT = path.resolve(String(process.env.STORE_ROOT || '').trim() || path.join(process.cwd(), 'database'));

function parseGranularityList(raw: string | undefined): Granularity[] {
  const requested = String(raw || '')
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
  if (requested.length === 0) return [...GRANULARITIES];
  return Array.from(new Set(requested.filter(isGranularity)));
}

export const STORE_GRANULARITIES: Granularity[] = parseGranularityList(process.env.STORE_GRANULARITIES);

// --- Sync ---
/** Minimum spacing between two provider calls. */
export const SYNC_MIN_CALL_SPACING_MS = Math.max(0, Number(process.env.SYNC_MIN_CALL_SPACING_MS) || 5_000);
/** Cooldown after the provider signals throttling. */
export const SYNC_THROTTLE_COOLDOWN_MS = Math.max(1_000, Number(process.env.SYNC_THROTTLE_COOLDOWN_MS) || 60_000);
export const SYNC_MAX_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.SYNC_MAX_ATTEMPTS) || 5));

// --- Provider ---
export const PROVIDER_BASE_URL = String(process.env.PROVIDER_BASE_URL || '').trim();
export const PROVIDER_API_KEY = String(process.env.PROVIDER_API_KEY || '').trim();
export const PROVIDER_TIMEOUT_MS = Math.max(1_000, Number(process.env.PROVIDER_TIMEOUT_MS) || 15_000);

const optionalNumber = (check: z.ZodNumber) =>
  z
    .string()
    .optional()
    .refine((raw) => raw === undefined || raw === '' || check.safeParse(Number(raw)).success, {
      message: 'must be a valid number',
    });

const StartupEnvSchema = z.object({
  PORT: optionalNumber(z.number().int().positive()),
  STORE_GRANULARITIES: z
    .string()
    .optional()
    .refine(
      (raw) =>
        String(raw || '')
          .split(',')
          .map((value) => value.trim().toLowerCase())
          .filter(Boolean)
          .every(isGranularity),
      { message: `must be a comma-separated list of ${GRANULARITIES.join(', ')}` },
    ),
  SYNC_MIN_CALL_SPACING_MS: optionalNumber(z.number().nonnegative()),
  SYNC_THROTTLE_COOLDOWN_MS: optionalNumber(z.number().positive()),
  SYNC_MAX_ATTEMPTS: optionalNumber(z.number().int().positive()),
  PROVIDER_BASE_URL: z.string().url().optional().or(z.literal('')),
  PROVIDER_TIMEOUT_MS: optionalNumber(z.number().positive()),
});

// --- Startup validation ---
const log = moduleLogger('config');

export function validateStartupEnvironment(env: NodeJS.ProcessEnv = process.env): { warnings: string[] } {
  const warnings: string[] = [];
  const parsed = StartupEnvSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    for (const error of errors) {
      log.error(`[startup-env] ${error}`);
    }
    throw new Error(`Startup environment validation failed: ${errors.join('; ')}`);
  }

  if (!String(env.PROVIDER_BASE_URL || '').trim()) {
    warnings.push('PROVIDER_BASE_URL is not set; every provider fetch will fail');
  }
  if (!String(env.PROVIDER_API_KEY || '').trim()) {
    warnings.push('PROVIDER_API_KEY is not set');
  }
  for (const warning of warnings) {
    log.warn(`[startup-env] ${warning}`);
  }
  return { warnings };
}

/**
 * Runtime configuration for pricing runs.
 *
 * `.env` is loaded once on import; values are validated with zod and
 * invalid settings fail fast with EstimateInputError.
 */
import 'dotenv/config';
import { availableParallelism } from 'node:os';
import { z } from 'zod';
import type { MatchThresholds } from '@shared/estimate/priceMatcher';
import { describeZodError, EstimateInputError } from './services/estimating/errors';

const optionalNumber = z.coerce.number().finite().nonnegative().optional();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  ESTIMATE_CONCURRENCY: z.coerce.number().int().positive().optional(),
  ESTIMATE_DICTIONARY_PATH: z.string().min(1).optional(),
  ESTIMATE_EXACT_MIN: optionalNumber,
  ESTIMATE_PARTIAL_MIN: optionalNumber,
  ESTIMATE_CATEGORY_FALLBACK_MIN: optionalNumber,
  ESTIMATE_APPLY_CONFIDENCE_MIN: z.coerce.number().min(0).max(1).optional(),
});

export type EstimatingConfig = {
  concurrency: number;
  dictionaryPath: string | null;
  thresholds: Partial<MatchThresholds>;
};

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return out;
}

export function loadEstimatingConfig(env: NodeJS.ProcessEnv = process.env): EstimatingConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new EstimateInputError(describeZodError(parsed.error, 'Invalid environment'), 'INVALID_CONFIG', {
      issues: parsed.error.issues,
    });
  }

  const e = parsed.data;
  const thresholds: Partial<MatchThresholds> = {};
  if (e.ESTIMATE_EXACT_MIN !== undefined) thresholds.exactMin = e.ESTIMATE_EXACT_MIN;
  if (e.ESTIMATE_PARTIAL_MIN !== undefined) thresholds.partialMin = e.ESTIMATE_PARTIAL_MIN;
  if (e.ESTIMATE_CATEGORY_FALLBACK_MIN !== undefined) thresholds.categoryFallbackMin = e.ESTIMATE_CATEGORY_FALLBACK_MIN;
  if (e.ESTIMATE_APPLY_CONFIDENCE_MIN !== undefined) thresholds.applyConfidenceMin = e.ESTIMATE_APPLY_CONFIDENCE_MIN;

  return {
    concurrency: e.ESTIMATE_CONCURRENCY ?? availableParallelism(),
    dictionaryPath: e.ESTIMATE_DICTIONARY_PATH ?? null,
    thresholds,
  };
}

import { z } from 'zod';
import type { AnalysisOptions } from './pipeline/types';

const blankToUndefined = (value: unknown) =>
  value == null || (typeof value === 'string' && value.trim() === '') ? undefined : value;

const optionalPath = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  RMR_UCS_CLASS: z.preprocess(blankToUndefined, z.string().trim().toUpperCase().default('R4')),
  RMR_ORIENTATION_ADJUSTMENT: z.preprocess(blankToUndefined, z.coerce.number().min(-60).max(0).default(-5)),
  RMR_CLUSTER_TOLERANCE_DEG: z.preprocess(blankToUndefined, z.coerce.number().gt(0).max(90).default(15)),
  RMR_MIN_FAMILY_SIZE: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(3)),
  RMR_CLUSTER_METRIC: z.preprocess(blankToUndefined, z.enum(['independent', 'angular']).default('independent')),
  RMR_CLUSTER_SCOPE: z.preprocess(blankToUndefined, z.enum(['project', 'station']).default('project')),
  RMR_DICTIONARY_PATH: optionalPath,
  RMR_STATIONS_PATH: optionalPath,
  RMR_EXPORT_DIR: z.preprocess(blankToUndefined, z.string().trim().default('rmr14-exports'))
});

export type RmrConfig = {
  options: Omit<AnalysisOptions, 'stations'>;
  dictionaryPath: string | null;
  stationsPath: string | null;
  exportDir: string;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): RmrConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const cfg = parsed.data;
  return {
    options: {
      ucsClass: cfg.RMR_UCS_CLASS,
      orientationAdjustment: cfg.RMR_ORIENTATION_ADJUSTMENT,
      toleranceDeg: cfg.RMR_CLUSTER_TOLERANCE_DEG,
      minFamilySize: cfg.RMR_MIN_FAMILY_SIZE,
      metric: cfg.RMR_CLUSTER_METRIC,
      scope: cfg.RMR_CLUSTER_SCOPE
    },
    dictionaryPath: cfg.RMR_DICTIONARY_PATH ?? null,
    stationsPath: cfg.RMR_STATIONS_PATH ?? null,
    exportDir: cfg.RMR_EXPORT_DIR
  };
}

// Per-criterion weight, impact and default value bookkeeping
import type { CriteriaConfigMap, CriterionConfig, Impact } from '@/types/facility';
import { normalizeHeader } from '@/utils/coordinateUtils';
import {
  DEFAULT_CRITERION_VALUE,
  DEFAULT_CRITERION_WEIGHT,
  DEFAULT_IMPACT,
} from '@/utils/plannerConfig';

export function defaultCriterionConfig(): CriterionConfig {
  return {
    weight: DEFAULT_CRITERION_WEIGHT,
    impact: DEFAULT_IMPACT,
    defaultValue: DEFAULT_CRITERION_VALUE,
  };
}

export function isImpact(value: unknown): value is Impact {
  return value === 'benefit' || value === 'cost';
}

/**
 * Keep entries for selected columns that still exist, create missing ones
 * with defaults and drop the rest.
 */
export function syncCriteriaConfig(
  config: CriteriaConfigMap,
  columns: readonly string[],
  selected: readonly string[]
): CriteriaConfigMap {
  const available = new Set(columns.map(normalizeHeader));
  const next: CriteriaConfigMap = {};

  selected.forEach(raw => {
    const name = normalizeHeader(raw);
    if (!available.has(name) || next[name]) return;
    next[name] = config[name] ?? defaultCriterionConfig();
  });

  return next;
}

/**
 * Merge a partial edit into one entry. Negative or non-finite weights and
 * non-finite default values are ignored.
 */
export function updateCriterionConfig(
  config: CriteriaConfigMap,
  criterion: string,
  patch: Partial<CriterionConfig>
): CriteriaConfigMap {
  const name = normalizeHeader(criterion);
  const current = config[name] ?? defaultCriterionConfig();
  const next: CriterionConfig = { ...current };

  if (patch.weight !== undefined && Number.isFinite(patch.weight) && patch.weight >= 0) {
    next.weight = patch.weight;
  }
  if (patch.impact !== undefined && isImpact(patch.impact)) {
    next.impact = patch.impact;
  }
  if (patch.defaultValue !== undefined && Number.isFinite(patch.defaultValue)) {
    next.defaultValue = patch.defaultValue;
  }

  return { ...config, [name]: next };
}

/**
 * Default values for points created from new map markers.
 */
export function criterionDefaults(
  config: CriteriaConfigMap,
  columns: readonly string[]
): Record<string, number> {
  const defaults: Record<string, number> = {};
  columns.forEach(raw => {
    const name = normalizeHeader(raw);
    defaults[name] = config[name]?.defaultValue ?? DEFAULT_CRITERION_VALUE;
  });
  return defaults;
}

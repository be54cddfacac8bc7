import { registerAs } from '@nestjs/config';
import { parseBool } from '../../infra/mongo/mongo.config';

export const ENV_LIST_DEFAULT_PER_PAGE = 'LIST_DEFAULT_PER_PAGE';
export const ENV_LIST_MAX_PER_PAGE = 'LIST_MAX_PER_PAGE';
export const ENV_ON_DELETE = 'ENTITIES_ON_DELETE';
export const ENV_LOG_QUERY_PLANS = 'LOG_QUERY_PLANS';

/** What deleting a parent does to records on its `many` relationships. */
export type OnDeletePolicy = 'cascade' | 'restrict';

export interface EntitiesConfig {
  readonly defaultPerPage: number;
  /** Upper bound for `per_page`; larger values are rejected. */
  readonly maxPerPage: number;
  readonly onDelete: OnDeletePolicy;
  /** Debug-log every translated plan. */
  readonly logQueryPlans: boolean;
}

export const ENTITIES_DEFAULTS: Readonly<EntitiesConfig> = {
  defaultPerPage: 10,
  maxPerPage: 100,
  onDelete: 'cascade',
  logQueryPlans: false,
};

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

function parseOnDelete(
  value: string | undefined,
  fallback: OnDeletePolicy,
): OnDeletePolicy {
  const v = value?.trim().toLowerCase();
  if (v === 'cascade' || v === 'restrict') return v;
  return fallback;
}

/**
 * Never throws. A default page size above the maximum is clamped to it.
 */
export function loadEntitiesConfig(
  env: NodeJS.ProcessEnv = process.env,
): EntitiesConfig {
  const maxPerPage = parsePositiveInt(
    env[ENV_LIST_MAX_PER_PAGE],
    ENTITIES_DEFAULTS.maxPerPage,
  );
  const defaultPerPage = Math.min(
    parsePositiveInt(
      env[ENV_LIST_DEFAULT_PER_PAGE],
      ENTITIES_DEFAULTS.defaultPerPage,
    ),
    maxPerPage,
  );
  return {
    defaultPerPage,
    maxPerPage,
    onDelete: parseOnDelete(
      env[ENV_ON_DELETE],
      ENTITIES_DEFAULTS.onDelete,
    ),
    logQueryPlans: parseBool(
      env[ENV_LOG_QUERY_PLANS],
      ENTITIES_DEFAULTS.logQueryPlans,
    ),
  };
}

export const entitiesConfig = registerAs('entities', () =>
  loadEntitiesConfig(),
);

import { z } from 'zod';
import { ENV_KEYS, LEDGER_CONFIG } from '@cashsplit/shared';
import type { Participant } from '@cashsplit/shared';

export interface EngineConfig {
  settlementEpsilon: number;
  applyCashbackAsDiscount: boolean;
  defaultParticipants: Participant[];
}

type EnvSource = Record<string, string | undefined>;

const epsilonSchema = z.coerce.number().finite().nonnegative();
const booleanSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');
const participantsSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  )
  .refine((names) => new Set(names).size === names.length, {
    message: 'Participant names must be unique',
  });

const readOverride = <S extends z.ZodTypeAny>(
  env: EnvSource,
  key: string,
  schema: S,
  fallback: z.output<S>
): z.output<S> => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = schema.safeParse(raw.trim());
  if (!parsed.success) {
    console.warn(`[config] Ignoring invalid ${key}="${raw}":`, parsed.error.issues[0]?.message);
    return fallback;
  }
  return parsed.data;
};

export const buildEngineConfig = (env: EnvSource = process.env): EngineConfig => ({
  settlementEpsilon: readOverride(
    env,
    ENV_KEYS.SETTLEMENT_EPSILON,
    epsilonSchema,
    LEDGER_CONFIG.SETTLEMENT_EPSILON
  ),
  applyCashbackAsDiscount: readOverride(
    env,
    ENV_KEYS.APPLY_CASHBACK_AS_DISCOUNT,
    booleanSchema,
    LEDGER_CONFIG.DEFAULT_APPLY_CASHBACK_AS_DISCOUNT
  ),
  defaultParticipants: readOverride(env, ENV_KEYS.DEFAULT_PARTICIPANTS, participantsSchema, []),
});

let cachedConfig: EngineConfig | null = null;

export const loadEngineConfig = (): EngineConfig => {
  if (!cachedConfig) {
    cachedConfig = buildEngineConfig();
  }
  return cachedConfig;
};

export const resetEngineConfig = (): void => {
  cachedConfig = null;
};

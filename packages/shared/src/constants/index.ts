export const LEDGER_CONFIG = {
  SETTLEMENT_EPSILON: 1e-6,
  DEFAULT_APPLY_CASHBACK_AS_DISCOUNT: true,
  LEDGER_VERSION: 1,
  FALLBACK_INSTRUMENT: {
    name: 'Default 0%',
    cashbackRate: 0,
  },
} as const;

export const REPORT_CONFIG = {
  AMOUNT_DECIMALS: 2,
  ALLOCATION_DECIMALS: 2,
  RATE_DECIMALS: 2,
  EMPTY_BOUND_LABEL: '—',
} as const;

export const ENV_KEYS = {
  SETTLEMENT_EPSILON: 'CASHSPLIT_SETTLEMENT_EPSILON',
  APPLY_CASHBACK_AS_DISCOUNT: 'CASHSPLIT_APPLY_CASHBACK_AS_DISCOUNT',
  DEFAULT_PARTICIPANTS: 'CASHSPLIT_DEFAULT_PARTICIPANTS',
} as const;

export type {
  Participant,
  AllocationShares,
  Instrument,
  ExpenseRecord,
  Ledger,
  ExpenseDraftDefaults,
} from './types/ledger';
export type {
  CalendarDate,
  DateWindow,
  SummaryEntry,
  Transfer,
  SplitPreview,
  LedgerDrift,
} from './types/summary';
export { LEDGER_CONFIG, REPORT_CONFIG, ENV_KEYS } from './constants';

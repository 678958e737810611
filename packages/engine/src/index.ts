export { normalizeAllocations, equalAllocations, getShare } from './domain/calculations/allocation-normalizer';
export { filterRecordsByDate, isRecordInWindow } from './domain/calculations/record-filter';
export {
  summarizeLedger,
  getNetBalances,
  buildInstrumentRateMap,
  computeSplitBase,
  computeCashback,
  getRecordRate,
} from './domain/calculations/ledger-aggregator';
export {
  settleBalances,
  getTotalTransferAmount,
  applyTransfers,
  isSettled,
} from './domain/calculations/settlement-reducer';
export {
  parseIsoDate,
  tryParseIsoDate,
  compareCalendarDates,
  formatIsoDate,
  todayIsoDate,
} from './domain/calendar/calendar-date';
export {
  addParticipant,
  removeParticipant,
  addInstrument,
  updateInstrument,
  removeInstrument,
  createExpenseRecord,
  addExpenseRecord,
  updateExpenseRecord,
  removeExpenseRecord,
  previewExpenseSplit,
  resolveDraftDefaults,
  rememberDraftDefaults,
} from './domain/ledger/ledger-editor';
export type { ExpenseDraft } from './domain/ledger/ledger-editor';
export {
  ledgerSnapshotSchema,
  parseLedgerSnapshot,
  toLedgerSnapshot,
  createDefaultLedger,
  findLedgerDrift,
  hasLedgerDrift,
} from './domain/ledger/ledger-snapshot';
export type { LedgerSnapshot } from './domain/ledger/ledger-snapshot';
export { buildLedgerReport, describeReport, listRecordRows } from './domain/reports/ledger-report';
export type {
  LedgerReport,
  LedgerReportOptions,
  RecordRow,
  SummaryRow,
} from './domain/reports/ledger-report';
export { formatAmount, formatRate, formatAllocation, formatWindowBound } from './domain/reports/formatters';
export { buildEngineConfig, loadEngineConfig, resetEngineConfig } from './config';
export type { EngineConfig } from './config';
export { LedgerValidationError, RecordNotFoundError } from './core/errors';

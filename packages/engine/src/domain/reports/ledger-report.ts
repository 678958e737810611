/**
 * Ledger report
 *
 * Assembles what a reporting collaborator (display table, spreadsheet
 * writer) needs: per-participant summary rows, settlement transfers, a
 * description of the filter and mode, and the expense table rows.
 */

import type {
  AllocationShares,
  DateWindow,
  ExpenseRecord,
  Ledger,
  LedgerDrift,
  Participant,
  SummaryEntry,
  Transfer,
} from '@cashsplit/shared';
import { loadEngineConfig } from '../../config';
import { normalizeAllocations } from '../calculations/allocation-normalizer';
import {
  buildInstrumentRateMap,
  computeCashback,
  computeSplitBase,
  getNetBalances,
  getRecordRate,
  summarizeLedger,
} from '../calculations/ledger-aggregator';
import { settleBalances } from '../calculations/settlement-reducer';
import { compareCalendarDates, tryParseIsoDate } from '../calendar/calendar-date';
import { findLedgerDrift, hasLedgerDrift } from '../ledger/ledger-snapshot';
import { formatWindowBound } from './formatters';

export interface SummaryRow extends SummaryEntry {
  participant: Participant;
}

export interface RecordRow {
  record: ExpenseRecord;
  rate: number;
  cashback: number;
  splitBase: number;
  allocation: AllocationShares;
}

export interface LedgerReport {
  summary: SummaryRow[];
  transfers: Transfer[];
  note: string;
  drift: LedgerDrift;
}

export interface LedgerReportOptions {
  eps?: number;
}

const DISCOUNT_MODE_NOTE = 'Split base = amount*(1-cashback)';
const SEPARATE_MODE_NOTE = 'Split base = amount (cashback tracked separately)';

/**
 * Describe the date filter and the split-base mode of a report
 */
export function describeReport(ledger: Ledger, window: DateWindow = {}): string {
  const mode = ledger.applyCashbackAsDiscount ? DISCOUNT_MODE_NOTE : SEPARATE_MODE_NOTE;
  return `Date filter: ${formatWindowBound(window.start)} to ${formatWindowBound(window.end)}; ${mode}`;
}

/**
 * Summarize the ledger and settle the net balances
 *
 * Transfers settle `net`, not `netAfterCashback`: cashback stays with the
 * payer.
 */
export function buildLedgerReport(
  ledger: Ledger,
  window: DateWindow = {},
  options: LedgerReportOptions = {}
): LedgerReport {
  const eps = options.eps ?? loadEngineConfig().settlementEpsilon;

  const drift = findLedgerDrift(ledger);
  if (hasLedgerDrift(drift)) {
    console.warn(
      `[ledger-report] Ledger references removed data: ${drift.staleRecordPayers.length} stale payer(s), ` +
        `${drift.unknownRecordInstruments.length} unknown instrument(s), ` +
        `${drift.staleAllocationKeys.length} stale allocation key(s)`
    );
  }

  const summary = summarizeLedger(ledger, window);
  const transfers = settleBalances(getNetBalances(summary), eps);

  return {
    summary: Array.from(summary, ([participant, entry]) => ({ participant, ...entry })),
    transfers,
    note: describeReport(ledger, window),
    drift,
  };
}

/**
 * Expense table rows sorted by date, payer, merchant and item
 */
export function listRecordRows(ledger: Ledger): RecordRow[] {
  const rates = buildInstrumentRateMap(ledger.instruments);
  const sorted = [...ledger.records].sort(
    (a, b) =>
      compareRecordDates(a.date, b.date) ||
      compareText(a.payer, b.payer) ||
      compareText(a.merchant, b.merchant) ||
      compareText(a.item, b.item)
  );

  return sorted.map((record) => {
    const rate = getRecordRate(record, rates);
    return {
      record,
      rate,
      cashback: computeCashback(record.amount, rate),
      splitBase: computeSplitBase(record.amount, rate, ledger.applyCashbackAsDiscount),
      allocation: normalizeAllocations(record.allocations, ledger.participants),
    };
  });
}

function compareRecordDates(a: string, b: string): number {
  const dateA = tryParseIsoDate(a);
  const dateB = tryParseIsoDate(b);
  if (dateA && dateB) {
    return compareCalendarDates(dateA, dateB);
  }
  // Unparseable dates sort after valid ones
  if (dateA) return -1;
  if (dateB) return 1;
  return compareText(a, b);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
